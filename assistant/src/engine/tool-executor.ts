import type { PendingToolCall, ToolCallStatus, ToolInvocationItem } from '../types.js';
import type { ToolRegistry } from '../tools/registry.js';
import { describeError, isPlainObject, measureDurationMs, stringifyToolResult } from '../helpers.js';
import { Logger } from '../logger.js';

/**
 * Normalizes backend-sent arguments to an object.
 * JSON text is parsed; anything unparseable or not an object becomes `{}`.
 */
export const resolveToolArguments = (raw: unknown): Record<string, unknown> => {
  if (isPlainObject(raw)) {
    return raw;
  }

  if (typeof raw !== 'string' || raw.trim().length === 0) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(raw);
    return isPlainObject(parsed) ? parsed : {};
  } catch {
    Logger.debug('tools', 'Unparseable tool arguments, invoking with {}', { raw });
    return {};
  }
};

export const toPendingToolCall = (invocation: ToolInvocationItem): PendingToolCall => ({
  callId: invocation.callId,
  toolName: invocation.name,
  rawArguments: invocation.arguments,
  resolvedArguments: resolveToolArguments(invocation.arguments),
  status: 'pending',
});

export const toolNotFoundMessage = (name: string): string => `Error: Tool '${name}' not found`;

export const toolExecutionErrorMessage = (name: string, error: unknown): string =>
  `Error executing tool '${name}': ${describeError(error)}`;

export type ToolExecutionOutcome = {
  output: string;
  status: Exclude<ToolCallStatus, 'pending'>;
};

/**
 * Runs one pending call against the registry. Never throws: a missing tool or a
 * handler failure becomes result text and marks the call `failed`.
 */
export const executeToolCall = async (
  registry: ToolRegistry,
  call: PendingToolCall,
): Promise<ToolExecutionOutcome> => {
  const tool = registry.get(call.toolName);
  if (!tool) {
    Logger.warn('tools', `Tool not found: ${call.toolName}`, { callId: call.callId });
    call.status = 'failed';
    return { output: toolNotFoundMessage(call.toolName), status: 'failed' };
  }

  const startMs = Date.now();
  try {
    const result: unknown = await tool.handler(call.resolvedArguments);
    call.status = 'executed';
    const output = stringifyToolResult(result);
    Logger.debug('tools', `Tool ${call.toolName} executed`, {
      callId: call.callId,
      durationMs: measureDurationMs(startMs),
      outputLength: output.length,
    });
    return { output, status: 'executed' };
  } catch (error) {
    call.status = 'failed';
    Logger.warn('tools', `Tool ${call.toolName} failed`, {
      callId: call.callId,
      error: describeError(error),
    });
    return { output: toolExecutionErrorMessage(call.toolName, error), status: 'failed' };
  }
};
