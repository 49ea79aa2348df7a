import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { buildModelCatalog } from '../catalog.js';

export function createModelsCommand(): Command {
  const command = new Command('models');

  command
    .description('List providers and the model names each one accepts')
    .option('--json', 'Print the catalog as JSON')
    .action((options: { json?: boolean }) => {
      const { registry, settings, gateway } = loadConfig();
      const catalog = buildModelCatalog(registry);

      if (options.json) {
        console.log(JSON.stringify(catalog, null, 2));
        return;
      }

      for (const provider of catalog.providers) {
        const marker = provider === settings.defaultProvider ? chalk.green(' (default)') : '';
        const mode = chalk.gray(` ${gateway.streamingMode(provider) ?? 'unknown'} streaming`);
        console.log(chalk.bold(provider) + marker + mode);
        for (const model of catalog.models[provider] ?? []) {
          console.log(`  ${chalk.cyan(model)} ${chalk.gray('→ ' + registry.resolveModel(provider, model))}`);
        }
      }
    });

  return command;
}
