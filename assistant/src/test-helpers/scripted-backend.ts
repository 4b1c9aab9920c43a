import type { BackendClient, BackendRequest } from '../types.js';

export type ReplyFactory = (request: BackendRequest, round: number) => unknown;

export type ScriptedReply = Record<string, unknown> | ReplyFactory;

/**
 * In-process backend double. Replies are consumed in order; the last one repeats
 * once the script runs out. Every request is recorded for assertions.
 */
export class ScriptedBackend implements BackendClient {
  public readonly name = 'scripted';
  public readonly requests: BackendRequest[] = [];
  private index = 0;

  constructor(
    private readonly replies: readonly ScriptedReply[],
    public readonly supportsContinuation = true,
  ) {}

  public async send(request: BackendRequest): Promise<unknown> {
    this.requests.push({ ...request, input: typeof request.input === 'string' ? request.input : [...request.input] });
    const reply = this.replies[Math.min(this.index, this.replies.length - 1)];
    this.index += 1;
    return typeof reply === 'function' ? reply(request, this.index) : reply;
  }
}

/**
 * Responses-style payload with a single function call.
 */
export const functionCallReply = (
  name: string,
  args: Record<string, unknown>,
  callId = `call_${name}`,
  responseId = `resp_${callId}`,
): Record<string, unknown> => ({
  id: responseId,
  output: [
    { type: 'function_call', id: `fc_${callId}`, call_id: callId, name, arguments: JSON.stringify(args) },
  ],
});

export const textReply = (text: string, responseId = 'resp_text'): Record<string, unknown> => ({
  id: responseId,
  output_text: text,
  output: [
    { type: 'message', role: 'assistant', content: [{ type: 'output_text', text }] },
  ],
});

/**
 * Backend that answers every first-round question by calling calculate on a fixed
 * expression, then repeats the tool output as its answer.
 */
export const createCalculatorBackend = (expression: string): ScriptedBackend => new ScriptedBackend([
  (request: BackendRequest) => {
    const input = typeof request.input === 'string' ? [] : request.input;
    const result = input.find((item) => item.kind === 'tool_result');
    if (result && result.kind === 'tool_result') {
      return textReply(result.output);
    }
    return functionCallReply('calculate', { expression });
  },
]);
