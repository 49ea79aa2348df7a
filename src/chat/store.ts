import { randomUUID } from 'crypto';
import type { ProviderName } from '../providers/base.js';

export type MessageRole = 'system' | 'user' | 'assistant';

export interface Conversation {
  id: string;
  title: string;
  modelProvider: ProviderName;
  modelName: string;
  createdAt: Date;
}

export interface StoredMessage {
  id: string;
  conversationId: string;
  role: MessageRole;
  content: string;
  /** Attached images as data URIs. */
  images: string[];
  /** Literal model id for assistant messages, null otherwise. */
  modelName: string | null;
  createdAt: Date;
}

export type NewConversation = Pick<Conversation, 'modelProvider' | 'modelName'> & { title?: string };

export type NewMessage = Pick<StoredMessage, 'role' | 'content'> &
  Partial<Pick<StoredMessage, 'images' | 'modelName'>>;

/**
 * Persistence boundary for conversations. The gateway never touches it;
 * chat sessions write through it once a turn is final.
 */
export interface ConversationStore {
  createConversation(input: NewConversation): Promise<Conversation>;
  getConversation(id: string): Promise<Conversation | undefined>;
  appendMessage(conversationId: string, message: NewMessage): Promise<StoredMessage>;
  /** Oldest first. */
  listMessages(conversationId: string): Promise<StoredMessage[]>;
}

export class InMemoryConversationStore implements ConversationStore {
  private conversations = new Map<string, Conversation>();
  private messages = new Map<string, StoredMessage[]>();

  async createConversation(input: NewConversation): Promise<Conversation> {
    const conversation: Conversation = {
      id: randomUUID(),
      title: input.title ?? 'New conversation',
      modelProvider: input.modelProvider,
      modelName: input.modelName,
      createdAt: new Date(),
    };
    this.conversations.set(conversation.id, conversation);
    this.messages.set(conversation.id, []);
    return conversation;
  }

  async getConversation(id: string): Promise<Conversation | undefined> {
    return this.conversations.get(id);
  }

  async appendMessage(conversationId: string, message: NewMessage): Promise<StoredMessage> {
    const list = this.messages.get(conversationId);
    if (!list) {
      throw new Error(`Unknown conversation: ${conversationId}`);
    }
    const stored: StoredMessage = {
      id: randomUUID(),
      conversationId,
      role: message.role,
      content: message.content,
      images: message.images ?? [],
      modelName: message.modelName ?? null,
      createdAt: new Date(),
    };
    list.push(stored);
    return stored;
  }

  async listMessages(conversationId: string): Promise<StoredMessage[]> {
    return [...(this.messages.get(conversationId) ?? [])];
  }
}
