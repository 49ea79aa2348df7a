import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../config.js';
import { loadImageAttachments } from '../chat/attachments.js';
import type { ContentPart, GenerationOptions, Turn } from '../providers/base.js';
import { textPart } from '../providers/content.js';
import { logVerbose } from '../logger.js';

interface AskOptions {
  provider?: string;
  model?: string;
  system?: string;
  image?: string[];
  temperature?: number;
  maxTokens?: number;
  stream: boolean;
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export async function buildAskTurns(prompt: string, options: Pick<AskOptions, 'system' | 'image'>): Promise<Turn[]> {
  const turns: Turn[] = [];
  if (options.system) {
    turns.push({ role: 'system', content: options.system });
  }

  const images = await loadImageAttachments(options.image ?? []);
  const content: string | ContentPart[] = images.length > 0 ? [textPart(prompt), ...images] : prompt;
  turns.push({ role: 'user', content });
  return turns;
}

export function createAskCommand(): Command {
  const command = new Command('ask');

  command
    .description('Send a single prompt to a provider and print the answer')
    .argument('<prompt...>', 'The prompt to send')
    .option('-p, --provider <name>', 'Provider to use (defaults to config)')
    .option('-m, --model <alias>', 'Model alias or literal id (defaults to config)')
    .option('-s, --system <text>', 'System instructions (ignored by anthropic and gemini)')
    .option('-i, --image <paths...>', 'Attach up to 5 images')
    .option('-t, --temperature <value>', 'Sampling temperature (0-2)', parseNumberOption)
    .option('--max-tokens <count>', 'Maximum tokens to generate (1-4000)', parseNumberOption)
    .option('--no-stream', 'Wait for the complete answer instead of streaming')
    .action(async (promptParts: string[], options: AskOptions) => {
      try {
        const config = loadConfig();
        const provider = options.provider ?? config.settings.defaultProvider;
        const model = options.model ?? config.settings.defaultModel;
        const turns = await buildAskTurns(promptParts.join(' '), options);
        const generationOptions: GenerationOptions = {
          temperature: options.temperature,
          maxTokens: options.maxTokens,
        };

        logVerbose(
          chalk.gray(`Provider: ${provider} • Model: ${config.registry.resolveModel(provider, model)}`)
        );

        if (!options.stream) {
          const spinner = ora(`Asking ${provider}:${model}`).start();
          try {
            const result = await config.gateway.generate(provider, model, turns, generationOptions);
            spinner.succeed(`Answer from ${result.model}`);
            console.log(result.content);
            if (result.usage) {
              logVerbose(chalk.gray(`Usage: ${JSON.stringify(result.usage)}`));
            }
          } catch (error) {
            spinner.fail('Request failed');
            throw error;
          }
          return;
        }

        const spinner = ora(`Waiting for ${provider}:${model}`).start();
        for await (const event of config.gateway.generateStreaming(provider, model, turns, generationOptions)) {
          switch (event.type) {
            case 'started':
              spinner.text = `Streaming from ${event.provider}:${event.model}`;
              break;
            case 'chunk':
              if (spinner.isSpinning) {
                spinner.stop();
              }
              process.stdout.write(event.text);
              break;
            case 'completed':
              spinner.stop();
              process.stdout.write('\n');
              break;
            case 'failed':
              spinner.stop();
              throw new Error(`${event.errorKind}: ${event.message}`);
          }
        }
      } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  return command;
}
