import { Command } from 'commander';
import chalk from 'chalk';
import { configExists, loadConfig } from '../config.js';
import { buildHealthReport } from '../catalog.js';

export function createHealthCommand(): Command {
  const command = new Command('health');

  command
    .description('Show which providers are configured')
    .option('--json', 'Print the report as JSON')
    .action((options: { json?: boolean }) => {
      const { registry, credentials, configPath } = loadConfig();
      const report = buildHealthReport(registry, credentials);

      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }

      const source = configExists(configPath) ? configPath : `${configPath} (not found, using defaults)`;
      console.log(chalk.gray(`Config: ${source}`));
      for (const [provider, health] of Object.entries(report)) {
        const status =
          health.credentials === 'configured'
            ? chalk.green('✓ key configured')
            : chalk.yellow('! key missing');
        console.log(`${chalk.bold(provider.padEnd(10))} ${status} ${chalk.gray(`${health.models.length} models`)}`);
      }
    });

  return command;
}
