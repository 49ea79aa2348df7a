import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { InMemoryConversationStore } from '../chat/store.js';
import { createServer } from '../server/app.js';
import { log } from '../utils/logger.js';

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

export function createServeCommand(): Command {
  const command = new Command('serve');

  command
    .description('Start the HTTP chat front end')
    .option('--host <host>', 'Interface to bind (defaults to config)')
    .option('--port <port>', 'Port to listen on (defaults to config)', parsePort)
    .action((options: { host?: string; port?: number }) => {
      const config = loadConfig();
      const host = options.host ?? config.settings.server.host;
      const port = options.port ?? config.settings.server.port;

      const server = createServer({
        gateway: config.gateway,
        store: new InMemoryConversationStore(),
        credentials: config.credentials,
      });

      server.on('error', (error) => {
        log.error('Server error', error);
        console.error(chalk.red('Error:'), error.message);
        process.exit(1);
      });

      server.listen(port, host, () => {
        const address = server.address();
        const boundPort = typeof address === 'object' && address ? address.port : port;
        log.info('Server listening', { host, port: boundPort });
        console.log(chalk.green(`Listening on http://${host}:${boundPort}`));
      });
    });

  return command;
}
