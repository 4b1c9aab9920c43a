import type { BackendClient, BackendRequest, ConversationTurnItem, ToolSchema } from '../types.js';
import { joinUrl, postJson } from './http.js';

// Wire types for the Responses API input list (snake_case).

export type ResponsesInputItem =
  | { type: 'message'; role: 'user' | 'assistant'; content: string }
  | { type: 'function_call'; call_id: string; name: string; arguments: string }
  | { type: 'function_call_output'; call_id: string; output: string };

export type ResponsesToolDef = {
  type: 'function';
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type ResponsesClientOptions = {
  baseUrl?: string;
  apiKey?: string;
};

export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';

export const encodeArguments = (value: unknown): string => {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value ?? {});
};

export const toResponsesInputItem = (item: ConversationTurnItem): ResponsesInputItem => {
  switch (item.kind) {
    case 'user_text':
      return { type: 'message', role: 'user', content: item.text };
    case 'assistant_text':
      return { type: 'message', role: 'assistant', content: item.text };
    case 'tool_invocation':
      return {
        type: 'function_call',
        call_id: item.callId,
        name: item.name,
        arguments: encodeArguments(item.arguments),
      };
    case 'tool_result':
      return { type: 'function_call_output', call_id: item.callId, output: item.output };
  }
};

export const toResponsesToolDef = (schema: ToolSchema): ResponsesToolDef => ({
  type: 'function',
  name: schema.name,
  description: schema.description,
  parameters: schema.parameterSchema,
});

/**
 * Client for the Responses API. Responses are stored server-side, so the
 * returned `id` can chain the next request as `previous_response_id`.
 */
export class ResponsesClient implements BackendClient {
  public readonly name = 'responses';
  public readonly supportsContinuation = true;
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;

  constructor(options: ResponsesClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_OPENAI_BASE_URL;
    this.apiKey = options.apiKey;
  }

  public buildBody(request: BackendRequest): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: request.model,
      input: typeof request.input === 'string'
        ? request.input
        : request.input.map(toResponsesInputItem),
      store: true,
    };

    if (request.tools && request.tools.length > 0) {
      body.tools = request.tools.map(toResponsesToolDef);
    }
    // 1.0 is the server default.
    if (request.temperature !== undefined && request.temperature !== 1.0) {
      body.temperature = request.temperature;
    }
    if (request.continuationToken) {
      body.previous_response_id = request.continuationToken;
    }

    return body;
  }

  public async send(request: BackendRequest): Promise<unknown> {
    return postJson(joinUrl(this.baseUrl, 'responses'), this.buildBody(request), {
      backendName: 'Responses API',
      apiKey: this.apiKey,
      signal: request.signal,
    });
  }
}
