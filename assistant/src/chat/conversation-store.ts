import type { ToolInvocationRecord } from '../types.js';
import { ConversationNotFoundError } from '../errors.js';
import { generateId } from '../helpers.js';

export type StoredMessageRole = 'user' | 'assistant';

export type StoredMessage = {
  id: string;
  role: StoredMessageRole;
  content: string;
  sequenceNum: number;
  toolCalls: ToolInvocationRecord[];
  createdAt: string;
};

export type NewMessage = {
  role: StoredMessageRole;
  content: string;
  toolCalls?: ToolInvocationRecord[];
};

export type Conversation = {
  id: string;
  agentId: string;
  createdAt: string;
  updatedAt: string;
};

/**
 * Persistence seam for chat history. Sequence numbers start at 1 and increase
 * by one per appended message.
 */
export interface ConversationStore {
  createConversation(agentId: string): Promise<Conversation>;
  getConversation(conversationId: string): Promise<Conversation | undefined>;
  appendMessage(conversationId: string, message: NewMessage): Promise<StoredMessage>;
  loadHistory(conversationId: string): Promise<StoredMessage[]>;
}

type ConversationRecord = {
  conversation: Conversation;
  messages: StoredMessage[];
};

export class InMemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, ConversationRecord>();

  public async createConversation(agentId: string): Promise<Conversation> {
    const now = new Date().toISOString();
    const conversation: Conversation = { id: generateId(), agentId, createdAt: now, updatedAt: now };
    this.conversations.set(conversation.id, { conversation, messages: [] });
    return { ...conversation };
  }

  public async getConversation(conversationId: string): Promise<Conversation | undefined> {
    const record = this.conversations.get(conversationId);
    return record ? { ...record.conversation } : undefined;
  }

  public async appendMessage(conversationId: string, message: NewMessage): Promise<StoredMessage> {
    const record = this.requireRecord(conversationId);
    const createdAt = new Date().toISOString();
    const lastMessage = record.messages[record.messages.length - 1];
    const stored: StoredMessage = {
      id: generateId(),
      role: message.role,
      content: message.content,
      sequenceNum: (lastMessage?.sequenceNum ?? 0) + 1,
      toolCalls: [...(message.toolCalls ?? [])],
      createdAt,
    };
    record.messages.push(stored);
    record.conversation.updatedAt = createdAt;
    return stored;
  }

  public async loadHistory(conversationId: string): Promise<StoredMessage[]> {
    return [...this.requireRecord(conversationId).messages];
  }

  private requireRecord(conversationId: string): ConversationRecord {
    const record = this.conversations.get(conversationId);
    if (!record) {
      throw new ConversationNotFoundError(conversationId);
    }
    return record;
  }
}
