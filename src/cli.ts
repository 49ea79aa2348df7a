import { Command } from 'commander';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createHealthCommand } from './commands/health.js';
import { createModelsCommand } from './commands/models.js';
import { createServeCommand } from './commands/serve.js';
import { getVersion } from './commands/version.js';
import { setVerboseLogging } from './logger.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('chatgate')
    .description('One interface to chat models from OpenAI, Anthropic, DeepSeek, Gemini and Mistral')
    .version(getVersion())
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-c, --config <path>', 'Path to the config file');

  program.hook('preAction', (thisCommand) => {
    const options = thisCommand.opts<{ verbose?: boolean; config?: string }>();
    setVerboseLogging(Boolean(options.verbose));
    if (options.config) {
      process.env.CHATGATE_CONFIG = options.config;
    }
  });

  program.addCommand(createAskCommand());
  program.addCommand(createChatCommand());
  program.addCommand(createModelsCommand());
  program.addCommand(createHealthCommand());
  program.addCommand(createServeCommand());

  return program;
}
