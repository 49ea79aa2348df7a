import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createInterface } from 'readline/promises';
import { loadConfig } from '../config.js';
import { AttachmentError, MAX_ATTACHMENTS, loadImageAttachments } from '../chat/attachments.js';
import { ChatSession } from '../chat/session.js';
import { InMemoryConversationStore } from '../chat/store.js';
import { UnsupportedProviderError } from '../errors.js';
import { isProviderName } from '../providers/base.js';

interface ChatOptions {
  provider?: string;
  model?: string;
  title?: string;
}

const IMAGE_COMMAND = /^\/image\s+(.+)$/;

export function createChatCommand(): Command {
  const command = new Command('chat');

  command
    .description('Start an interactive conversation')
    .option('-p, --provider <name>', 'Provider to use (defaults to config)')
    .option('-m, --model <alias>', 'Model alias or literal id (defaults to config)')
    .option('--title <title>', 'Conversation title')
    .action(async (options: ChatOptions) => {
      const config = loadConfig();
      const provider = (options.provider ?? config.settings.defaultProvider).toLowerCase();
      if (!isProviderName(provider)) {
        throw new UnsupportedProviderError(provider);
      }
      const store = new InMemoryConversationStore();
      const session = new ChatSession(config.gateway, store);
      const conversation = await store.createConversation({
        title: options.title,
        modelProvider: provider,
        modelName: (options.model ?? config.settings.defaultModel).toLowerCase(),
      });

      console.log(
        chalk.gray(
          `Chatting with ${conversation.modelProvider}:${conversation.modelName}. ` +
            `/image <path> attaches an image to the next message, /exit quits.`
        )
      );

      const rl = createInterface({ input: process.stdin, output: process.stdout });
      let pendingImages: string[] = [];

      try {
        for (;;) {
          const line = (await rl.question(chalk.cyan('you › '))).trim();
          if (!line) {
            continue;
          }
          if (line === '/exit' || line === '/quit') {
            break;
          }

          const imageCommand = IMAGE_COMMAND.exec(line);
          if (imageCommand) {
            try {
              if (pendingImages.length >= MAX_ATTACHMENTS) {
                throw new AttachmentError(`You can attach a maximum of ${MAX_ATTACHMENTS} files.`);
              }
              const parts = await loadImageAttachments([imageCommand[1]]);
              pendingImages = [...pendingImages, ...parts.map((part) => part.url)];
              console.log(chalk.gray(`${pendingImages.length} image(s) attached`));
            } catch (error) {
              console.error(chalk.red(error instanceof Error ? error.message : String(error)));
            }
            continue;
          }

          const images = pendingImages;
          pendingImages = [];
          const spinner = ora('Thinking...').start();

          for await (const event of session.streamReply(conversation.id, { content: line, images })) {
            switch (event.type) {
              case 'start':
                spinner.text = `${event.provider}:${event.model}`;
                break;
              case 'chunk':
                if (spinner.isSpinning) {
                  spinner.stop();
                  process.stdout.write(chalk.magenta('ai  › '));
                }
                process.stdout.write(event.content);
                break;
              case 'complete':
                spinner.stop();
                process.stdout.write('\n');
                break;
              case 'error':
                spinner.fail(chalk.red(`${event.errorKind}: ${event.message}`));
                break;
            }
          }
        }
      } finally {
        rl.close();
      }
    });

  return command;
}
