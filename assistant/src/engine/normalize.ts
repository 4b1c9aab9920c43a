import type { ConversationTurnItem, ToolInvocationItem } from '../types.js';
import { isPlainObject } from '../helpers.js';

/**
 * Canonical view of one backend response.
 */
export type NormalizedResponse = {
  /**
   * Explicit final-text field (`output_text`), when present and non-blank.
   */
  finalText?: string;
  /**
   * First non-blank text found in a message-type output item, trimmed.
   */
  messageText?: string;
  /**
   * Assistant text and tool invocations in output order.
   */
  items: ConversationTurnItem[];
  toolCalls: ToolInvocationItem[];
  continuationToken?: string;
  /**
   * Output items that could not be used (unknown types, tool calls without an id, repeats of an id already kept).
   */
  skippedItems: number;
};

/**
 * Precedence for the identifier that correlates a tool invocation with its result.
 */
export const CALL_ID_FIELDS = ['call_id', 'tool_call_id', 'id'] as const;

const TOOL_INVOCATION_TYPES = new Set(['function_call', 'tool_call', 'function']);

const nonBlankString = (value: unknown): string | undefined => (
  typeof value === 'string' && value.trim().length > 0 ? value : undefined
);

const readCallId = (item: Record<string, unknown>): string | undefined => {
  for (const field of CALL_ID_FIELDS) {
    const candidate = nonBlankString(item[field]);
    if (candidate) {
      return candidate;
    }
  }
  return undefined;
};

/**
 * Reads text from message content: a plain string, or a list of parts
 * carrying `text` / `output_text` (or bare strings).
 */
export const extractContentText = (content: unknown): string | undefined => {
  const direct = nonBlankString(content);
  if (direct) {
    return direct.trim();
  }

  if (!Array.isArray(content)) {
    return undefined;
  }

  for (const part of content) {
    const bare = nonBlankString(part);
    if (bare) {
      return bare.trim();
    }
    if (isPlainObject(part)) {
      const text = nonBlankString(part.text) ?? nonBlankString(part.output_text);
      if (text) {
        return text.trim();
      }
    }
  }

  return undefined;
};

type ToolInvocationCandidate = {
  callId?: string;
  name?: string;
  arguments: unknown;
};

const readToolInvocation = (item: Record<string, unknown>): ToolInvocationCandidate => {
  const fn = isPlainObject(item.function) ? item.function : undefined;
  return {
    callId: readCallId(item),
    name: nonBlankString(item.name) ?? nonBlankString(fn?.name),
    arguments: item.arguments ?? fn?.arguments ?? item.args ?? item.input,
  };
};

class ResponseCollector {
  public readonly items: ConversationTurnItem[] = [];
  public readonly toolCalls: ToolInvocationItem[] = [];
  public messageText: string | undefined;
  public skippedItems = 0;
  private readonly seenCallIds = new Set<string>();

  public addText(text: string | undefined): void {
    if (!text) {
      return;
    }
    if (this.messageText === undefined) {
      this.messageText = text;
    }
    this.items.push({ kind: 'assistant_text', text });
  }

  /**
   * An invocation with an id is always kept so that the id gets a result; a missing
   * name becomes `''` and resolves to a tool-not-found result.
   */
  public addToolInvocation(candidate: ToolInvocationCandidate): void {
    if (!candidate.callId || this.seenCallIds.has(candidate.callId)) {
      this.skippedItems += 1;
      return;
    }
    this.seenCallIds.add(candidate.callId);
    const invocation: ToolInvocationItem = {
      kind: 'tool_invocation',
      callId: candidate.callId,
      name: candidate.name ?? '',
      arguments: candidate.arguments,
    };
    this.items.push(invocation);
    this.toolCalls.push(invocation);
  }

  /**
   * Responses-style output list: `message`, `function_call` and other typed items.
   */
  public addOutputItems(output: unknown[]): void {
    for (const item of output) {
      if (!isPlainObject(item)) {
        this.skippedItems += 1;
        continue;
      }
      const type = typeof item.type === 'string' ? item.type : undefined;
      if (type === 'message') {
        this.addText(extractContentText(item.content));
      } else if (type !== undefined && TOOL_INVOCATION_TYPES.has(type)) {
        this.addToolInvocation(readToolInvocation(item));
      } else if (type !== 'reasoning') {
        this.skippedItems += 1;
      }
    }
  }

  /**
   * Chat-style assistant message: `content` plus an optional `tool_calls` list.
   */
  public addChatMessage(message: Record<string, unknown>): void {
    this.addText(extractContentText(message.content));
    const toolCalls = message.tool_calls;
    if (!Array.isArray(toolCalls)) {
      return;
    }
    for (const call of toolCalls) {
      if (isPlainObject(call)) {
        this.addToolInvocation(readToolInvocation(call));
      } else {
        this.skippedItems += 1;
      }
    }
  }
}

const findChatMessage = (payload: Record<string, unknown>): Record<string, unknown> | undefined => {
  if (Array.isArray(payload.choices)) {
    const first: unknown = payload.choices[0];
    if (isPlainObject(first) && isPlainObject(first.message)) {
      return first.message;
    }
    return undefined;
  }
  return isPlainObject(payload.message) ? payload.message : undefined;
};

/**
 * Converts any backend payload into canonical turn items. Never throws:
 * anything unrecognised is counted in `skippedItems` and otherwise ignored.
 */
export const normalizeBackendResponse = (payload: unknown): NormalizedResponse => {
  const collector = new ResponseCollector();

  if (!isPlainObject(payload)) {
    return { items: [], toolCalls: [], skippedItems: payload === undefined || payload === null ? 0 : 1 };
  }

  if (Array.isArray(payload.output)) {
    collector.addOutputItems(payload.output);
  }

  const chatMessage = findChatMessage(payload);
  if (chatMessage) {
    collector.addChatMessage(chatMessage);
  }

  const finalText = nonBlankString(payload.output_text) ?? nonBlankString(payload.outputText);
  const continuationToken = nonBlankString(payload.continuation_token)
    ?? nonBlankString(payload.response_id)
    ?? nonBlankString(payload.id);

  return {
    finalText,
    messageText: collector.messageText,
    items: collector.items,
    toolCalls: collector.toolCalls,
    continuationToken,
    skippedItems: collector.skippedItems,
  };
};
