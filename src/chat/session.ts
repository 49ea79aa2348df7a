import { GatewayError, type GatewayErrorKind } from '../errors.js';
import type { Gateway } from '../gateway.js';
import type { CallOptions, GenerationOptions, StreamEvent, TokenUsage, Turn } from '../providers/base.js';
import { imagePart, messagesHaveImages, textPart } from '../providers/content.js';
import { createComponentLogger } from '../utils/logger.js';
import type { Conversation, ConversationStore, StoredMessage } from './store.js';

const logger = createComponentLogger('chat-session');

export interface UserInput {
  content: string;
  /** Image attachments as data URIs. */
  images?: string[];
  modelProvider?: string;
  modelName?: string;
  options?: GenerationOptions;
}

export interface ModelUsed {
  provider: string;
  model: string;
  apiModel: string;
}

export interface ReplyResult {
  userMessage: StoredMessage;
  assistantMessage: StoredMessage;
  usage?: TokenUsage;
  modelUsed: ModelUsed;
}

export type SessionEvent =
  | { type: 'start'; provider: string; model: string; hasImages: boolean }
  | { type: 'chunk'; content: string }
  | {
      type: 'complete';
      userMessage: StoredMessage;
      assistantMessage: StoredMessage;
      modelUsed: ModelUsed;
    }
  | { type: 'error'; errorKind: GatewayErrorKind; message: string };

export class ConversationNotFoundError extends Error {
  constructor(readonly conversationId: string) {
    super(`Conversation not found: ${conversationId}`);
    this.name = 'ConversationNotFoundError';
  }
}

/**
 * Stored history to provider turns. Messages with images become a text part
 * followed by the images; the rest stay plain strings.
 */
export function buildTurns(messages: readonly StoredMessage[]): Turn[] {
  return messages.map((message) => ({
    role: message.role,
    content:
      message.images.length === 0
        ? message.content
        : [textPart(message.content), ...message.images.map(imagePart)],
  }));
}

/**
 * One user turn at a time against a stored conversation. The user message is
 * written before the provider is called; the assistant message only once the
 * reply is complete.
 */
export class ChatSession {
  constructor(
    private readonly gateway: Gateway,
    private readonly store: ConversationStore
  ) {}

  async reply(conversationId: string, input: UserInput, callOptions: CallOptions = {}): Promise<ReplyResult> {
    const conversation = await this.requireConversation(conversationId);
    const { provider, model } = selectModel(conversation, input);
    const { userMessage, turns } = await this.recordUserTurn(conversation, input);

    const result = await this.gateway.generate(provider, model, turns, input.options, callOptions);

    const assistantMessage = await this.store.appendMessage(conversation.id, {
      role: 'assistant',
      content: result.content,
      modelName: result.model,
    });

    const reply: ReplyResult = {
      userMessage,
      assistantMessage,
      modelUsed: { provider, model, apiModel: result.model },
    };
    if (result.usage) {
      reply.usage = result.usage;
    }
    return reply;
  }

  async *streamReply(
    conversationId: string,
    input: UserInput,
    callOptions: CallOptions = {}
  ): AsyncGenerator<SessionEvent, void, undefined> {
    const conversation = await this.requireConversation(conversationId);
    const { provider, model } = selectModel(conversation, input);
    const { userMessage, turns } = await this.recordUserTurn(conversation, input);

    let events: AsyncGenerator<StreamEvent, void, undefined>;
    try {
      events = this.gateway.generateStreaming(provider, model, turns, input.options, callOptions);
    } catch (error) {
      if (error instanceof GatewayError) {
        yield { type: 'error', errorKind: error.kind, message: error.message };
        return;
      }
      throw error;
    }

    for await (const event of events) {
      switch (event.type) {
        case 'started':
          yield {
            type: 'start',
            provider: event.provider,
            model: event.model,
            hasImages: messagesHaveImages(turns),
          };
          break;

        case 'chunk':
          yield { type: 'chunk', content: event.text };
          break;

        case 'completed': {
          const assistantMessage = await this.store.appendMessage(conversation.id, {
            role: 'assistant',
            content: event.finalText,
            modelName: event.model,
          });
          yield {
            type: 'complete',
            userMessage,
            assistantMessage,
            modelUsed: { provider, model, apiModel: event.model },
          };
          break;
        }

        case 'failed':
          logger.warn('Reply stream failed; assistant message not stored', {
            conversation_id: conversation.id,
            provider,
            model,
            kind: event.errorKind,
          });
          yield { type: 'error', errorKind: event.errorKind, message: event.message };
          break;
      }
    }
  }

  async getConversation(conversationId: string): Promise<Conversation | undefined> {
    return this.store.getConversation(conversationId);
  }

  private async requireConversation(conversationId: string): Promise<Conversation> {
    const conversation = await this.store.getConversation(conversationId);
    if (!conversation) {
      throw new ConversationNotFoundError(conversationId);
    }
    return conversation;
  }

  private async recordUserTurn(
    conversation: Conversation,
    input: UserInput
  ): Promise<{ userMessage: StoredMessage; turns: Turn[] }> {
    const userMessage = await this.store.appendMessage(conversation.id, {
      role: 'user',
      content: input.content,
      images: input.images ?? [],
    });
    const turns = buildTurns(await this.store.listMessages(conversation.id));
    return { userMessage, turns };
  }
}

/**
 * Request values win over the conversation defaults. Request values are lower-cased.
 */
export function selectModel(
  conversation: Conversation,
  input: Pick<UserInput, 'modelProvider' | 'modelName'>
): { provider: string; model: string } {
  return {
    provider: input.modelProvider ? input.modelProvider.toLowerCase() : conversation.modelProvider,
    model: input.modelName ? input.modelName.toLowerCase() : conversation.modelName,
  };
}
