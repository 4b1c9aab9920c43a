import type { ConversationTurnItem, ToolInvocationRecord } from '../types.js';
import { Logger } from '../logger.js';
import type { AgentPool } from '../agents/factory.js';
import type { ConversationStore, StoredMessage } from './conversation-store.js';

export type ChatRequest = {
  agentId: string;
  conversationId?: string;
  message: string;
  signal?: AbortSignal;
};

export type ChatResponse = {
  conversationId: string;
  agentId: string;
  messageId: string;
  response: string;
  toolCalls: ToolInvocationRecord[];
  sequenceNum: number;
};

/**
 * Rebuilds engine context from stored messages. An assistant message expands to
 * its tool invocations, their results, then its text.
 */
export const messagesToTurnItems = (messages: readonly StoredMessage[]): ConversationTurnItem[] => {
  const items: ConversationTurnItem[] = [];
  for (const message of messages) {
    if (message.role === 'user') {
      items.push({ kind: 'user_text', text: message.content });
      continue;
    }
    for (const call of message.toolCalls) {
      items.push({ kind: 'tool_invocation', callId: call.id, name: call.name, arguments: call.arguments });
    }
    for (const call of message.toolCalls) {
      items.push({ kind: 'tool_result', callId: call.id, output: call.output });
    }
    items.push({ kind: 'assistant_text', text: message.content });
  }
  return items;
};

/**
 * Runs chat turns against pooled agents and persists both sides of each exchange.
 */
export class ChatService {
  constructor(
    private readonly pool: AgentPool,
    private readonly store: ConversationStore,
  ) {}

  public async chat(request: ChatRequest): Promise<ChatResponse> {
    this.pool.require(request.agentId);

    const existing = request.conversationId
      ? await this.store.getConversation(request.conversationId)
      : undefined;
    const conversation = existing ?? await this.store.createConversation(request.agentId);
    if (request.conversationId && !existing) {
      Logger.warn('chat', `Conversation ${request.conversationId} not found, started ${conversation.id}`);
    }

    const history = await this.store.loadHistory(conversation.id);
    const engine = this.pool.spawn(request.agentId, conversation.id);
    engine.loadHistory(messagesToTurnItems(history));

    // Both sides are stored only after the turn succeeds.
    const turn = await engine.chat(request.message, { signal: request.signal });

    await this.store.appendMessage(conversation.id, { role: 'user', content: request.message });
    const reply = await this.store.appendMessage(conversation.id, {
      role: 'assistant',
      content: turn.text,
      toolCalls: turn.toolCalls,
    });

    Logger.info('chat', `Turn completed for agent ${request.agentId}`, {
      conversationId: conversation.id,
      rounds: turn.rounds,
      outcome: turn.outcome,
      toolCalls: turn.toolCalls.length,
    });

    return {
      conversationId: conversation.id,
      agentId: request.agentId,
      messageId: reply.id,
      response: turn.text,
      toolCalls: turn.toolCalls,
      sequenceNum: reply.sequenceNum,
    };
  }

  /**
   * Clears the pooled agent's in-memory state. Stored conversations are untouched.
   */
  public resetAgent(agentId: string): boolean {
    return this.pool.reset(agentId);
  }
}
