import type { BackendClient, BackendRequest, ConversationTurnItem, ToolSchema } from '../types.js';
import { joinUrl, postJson } from './http.js';
import { DEFAULT_OPENAI_BASE_URL, encodeArguments } from './responses.js';

// Wire types for the OpenAI-compatible Chat Completions API (snake_case).

export type WireToolDef = {
  type: 'function';
  function: { name: string; description: string; parameters: Record<string, unknown> };
};

export type WireToolCall = {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
};

export type WireMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: WireToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

export type ChatCompletionsClientOptions = {
  baseUrl?: string;
  apiKey?: string;
};

/**
 * Folds turn items into chat messages. Consecutive tool invocations (and any
 * text emitted alongside them) share one assistant message.
 */
export const toWireMessages = (input: string | ConversationTurnItem[]): WireMessage[] => {
  if (typeof input === 'string') {
    return [{ role: 'user', content: input }];
  }

  const messages: WireMessage[] = [];
  let pendingAssistant: { content: string | null; tool_calls: WireToolCall[] } | undefined;

  const flushAssistant = (): void => {
    if (!pendingAssistant) {
      return;
    }
    messages.push(
      pendingAssistant.tool_calls.length > 0
        ? { role: 'assistant', content: pendingAssistant.content, tool_calls: pendingAssistant.tool_calls }
        : { role: 'assistant', content: pendingAssistant.content },
    );
    pendingAssistant = undefined;
  };

  for (const item of input) {
    switch (item.kind) {
      case 'user_text':
        flushAssistant();
        messages.push({ role: 'user', content: item.text });
        break;
      case 'assistant_text':
        if (pendingAssistant && pendingAssistant.tool_calls.length === 0) {
          flushAssistant();
        }
        if (pendingAssistant) {
          pendingAssistant.content = `${pendingAssistant.content ?? ''}${item.text}`;
        } else {
          pendingAssistant = { content: item.text, tool_calls: [] };
        }
        break;
      case 'tool_invocation':
        if (!pendingAssistant) {
          pendingAssistant = { content: null, tool_calls: [] };
        }
        pendingAssistant.tool_calls.push({
          id: item.callId,
          type: 'function',
          function: { name: item.name, arguments: encodeArguments(item.arguments) },
        });
        break;
      case 'tool_result':
        flushAssistant();
        messages.push({ role: 'tool', tool_call_id: item.callId, content: item.output });
        break;
    }
  }
  flushAssistant();

  return messages;
};

export const toWireToolDef = (schema: ToolSchema): WireToolDef => ({
  type: 'function',
  function: {
    name: schema.name,
    description: schema.description,
    parameters: schema.parameterSchema,
  },
});

/**
 * Client for OpenAI-compatible `/chat/completions` servers (OpenAI, Ollama's `/v1`, LM Studio).
 * The API keeps no server-side state, so it only runs in stateless mode.
 */
export class ChatCompletionsClient implements BackendClient {
  public readonly name = 'chat_completions';
  public readonly supportsContinuation = false;
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;

  constructor(options: ChatCompletionsClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_OPENAI_BASE_URL;
    this.apiKey = options.apiKey;
  }

  public buildBody(request: BackendRequest): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: request.model,
      messages: toWireMessages(request.input),
      stream: false,
    };

    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools.map(toWireToolDef);
    }
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }

    return body;
  }

  public async send(request: BackendRequest): Promise<unknown> {
    return postJson(joinUrl(this.baseUrl, 'chat/completions'), this.buildBody(request), {
      backendName: 'Chat Completions API',
      apiKey: this.apiKey,
      signal: request.signal,
    });
  }
}
