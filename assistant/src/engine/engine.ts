import type {
  BackendClient,
  BackendRequest,
  ChatAgent,
  ChatOptions,
  ConversationTurnItem,
  EngineState,
  StatefulnessMode,
  ToolInvocationRecord,
  TurnResult,
} from '../types.js';
import { AgentError, BackendError, ConfigError } from '../errors.js';
import {
  describeError,
  generateId,
  isAbortError,
  isPlainObject,
  measureDurationMs,
  throwIfAborted,
  toTrimmedString,
} from '../helpers.js';
import { Logger } from '../logger.js';
import { createDefaultToolRegistry, type ToolRegistry } from '../tools/registry.js';
import { normalizeBackendResponse } from './normalize.js';
import { executeToolCall, toPendingToolCall } from './tool-executor.js';

export const DEFAULT_MODEL = 'gpt-4o';
export const DEFAULT_TEMPERATURE = 1.0;
export const DEFAULT_MAX_ITERATIONS = 6;
export const NO_RESPONSE_TEXT = 'No response from model.';

export type ConversationEngineOptions = {
  backend: BackendClient;
  registry?: ToolRegistry;
  model?: string;
  temperature?: number;
  maxIterations?: number;
  statefulness?: StatefulnessMode;
  conversationId?: string;
};

export type EngineConfig = {
  model: string;
  temperature: number;
  conversationId: string;
  statefulness: StatefulnessMode;
  maxIterations: number;
  backend: string;
};

const assertPositiveInteger = (value: number, label: string): number => {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${label} must be a positive integer, got ${value}`);
  }
  return value;
};

/**
 * Error payloads some servers return with a 200 status.
 */
const readErrorPayload = (payload: unknown): string | undefined => {
  if (!isPlainObject(payload) || payload.error === undefined || payload.error === null) {
    return undefined;
  }
  const { error } = payload;
  if (typeof error === 'string') {
    return error;
  }
  if (isPlainObject(error)) {
    return toTrimmedString(error.message) || JSON.stringify(error);
  }
  return String(error);
};

/**
 * Drives one conversation against a backend, executing any tools it asks for
 * until it produces a final answer or the round budget runs out.
 *
 * Not re-entrant: callers serialize turns per engine.
 */
export class ConversationEngine implements ChatAgent {
  public readonly model: string;
  public readonly temperature: number;
  public readonly statefulness: StatefulnessMode;

  private readonly backend: BackendClient;
  private readonly registry: ToolRegistry;
  private readonly maxIterations: number;
  private conversationId: string;
  private context: ConversationTurnItem[] = [];
  /**
   * Number of leading context items the backend already holds (backend_stateful only).
   */
  private sentCount = 0;
  private continuationToken: string | undefined;
  private lastToolCalls: ToolInvocationRecord[] = [];
  private currentState: EngineState = 'awaiting_backend';

  constructor(options: ConversationEngineOptions) {
    this.backend = options.backend;
    this.registry = options.registry ?? createDefaultToolRegistry();
    this.model = options.model ?? DEFAULT_MODEL;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxIterations = assertPositiveInteger(
      options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
      'maxIterations',
    );
    this.statefulness = options.statefulness ?? 'stateless';
    this.conversationId = options.conversationId ?? generateId();

    if (this.statefulness === 'backend_stateful' && !this.backend.supportsContinuation) {
      throw new ConfigError(
        `Backend ${this.backend.name} does not support continuation tokens; use stateless mode`,
      );
    }
  }

  public get state(): EngineState {
    return this.currentState;
  }

  public get toolRegistry(): ToolRegistry {
    return this.registry;
  }

  public async chat(userMessage: string, options: ChatOptions = {}): Promise<TurnResult> {
    const { signal } = options;
    const maxIterations = assertPositiveInteger(
      options.maxIterations ?? this.maxIterations,
      'maxIterations',
    );
    throwIfAborted(signal);

    this.lastToolCalls = [];
    this.context.push({ kind: 'user_text', text: userMessage });

    let lastSeenText: string | undefined;
    let toolResultsFolded = false;

    for (let round = 1; round <= maxIterations; round += 1) {
      throwIfAborted(signal);
      this.transition('awaiting_backend', { round });

      const payload = await this.sendRound(!toolResultsFolded, signal);
      this.transition('backend_responded', { round });

      const response = normalizeBackendResponse(payload);
      if (response.skippedItems > 0) {
        Logger.warn('engine', 'Ignored unusable backend output items', {
          round,
          skippedItems: response.skippedItems,
        });
      }
      if (response.continuationToken) {
        this.continuationToken = response.continuationToken;
      }
      this.context.push(...response.items);
      this.sentCount = this.context.length;

      const roundText = response.finalText ?? response.messageText;

      if (response.toolCalls.length === 0) {
        this.transition('has_final_text', { round });
        if (response.finalText && response.messageText === undefined) {
          this.context.push({ kind: 'assistant_text', text: response.finalText });
          this.sentCount = this.context.length;
        }
        return {
          text: roundText ?? lastSeenText ?? NO_RESPONSE_TEXT,
          toolCalls: [...this.lastToolCalls],
          rounds: round,
          outcome: 'completed',
          finalState: 'has_final_text',
        };
      }

      if (roundText) {
        lastSeenText = roundText;
      }

      this.transition('has_tool_calls', { round, toolCalls: response.toolCalls.length });
      this.transition('executing_tools', { round });

      for (const invocation of response.toolCalls) {
        const pending = toPendingToolCall(invocation);
        const outcome = await executeToolCall(this.registry, pending);
        this.context.push({ kind: 'tool_result', callId: pending.callId, output: outcome.output });
        this.lastToolCalls.push({
          id: pending.callId,
          name: pending.toolName,
          arguments: pending.rawArguments,
          resolvedArguments: pending.resolvedArguments,
          output: outcome.output,
          status: outcome.status,
        });
      }
      toolResultsFolded = true;
    }

    this.transition('budget_exhausted', { maxIterations });
    Logger.warn('engine', `Round budget of ${maxIterations} exhausted`, {
      conversationId: this.conversationId,
    });

    return {
      text: lastSeenText ?? NO_RESPONSE_TEXT,
      toolCalls: [...this.lastToolCalls],
      rounds: maxIterations,
      outcome: 'budget_exhausted',
      finalState: 'budget_exhausted',
    };
  }

  public reset(options: { clearConversationId?: boolean } = {}): void {
    this.context = [];
    this.sentCount = 0;
    this.continuationToken = undefined;
    this.lastToolCalls = [];
    this.currentState = 'awaiting_backend';
    if (options.clearConversationId) {
      this.conversationId = generateId();
    }
  }

  public getConversationId(): string {
    return this.conversationId;
  }

  public getLastToolCalls(): ToolInvocationRecord[] {
    return [...this.lastToolCalls];
  }

  public getHistory(): ConversationTurnItem[] {
    return [...this.context];
  }

  /**
   * Replaces retained context with stored turns. The backend has seen none of
   * them, so the next round sends all of them.
   */
  public loadHistory(items: readonly ConversationTurnItem[]): void {
    this.context = [...items];
    this.sentCount = 0;
    this.continuationToken = undefined;
  }

  public getConfig(): EngineConfig {
    return {
      model: this.model,
      temperature: this.temperature,
      conversationId: this.conversationId,
      statefulness: this.statefulness,
      maxIterations: this.maxIterations,
      backend: this.backend.name,
    };
  }

  private buildRequest(offerTools: boolean, signal?: AbortSignal): BackendRequest {
    const stateful = this.statefulness === 'backend_stateful' && this.continuationToken !== undefined;
    const items = stateful ? this.context.slice(this.sentCount) : [...this.context];
    const [only] = items;
    const input = items.length === 1 && only?.kind === 'user_text' ? only.text : items;

    return {
      model: this.model,
      input,
      tools: offerTools && this.registry.size > 0 ? this.registry.schemas() : undefined,
      temperature: this.temperature,
      continuationToken: stateful ? this.continuationToken : undefined,
      signal,
    };
  }

  private async sendRound(offerTools: boolean, signal?: AbortSignal): Promise<unknown> {
    const request = this.buildRequest(offerTools, signal);
    const startMs = Date.now();
    let payload: unknown;

    try {
      payload = await this.backend.send(request);
    } catch (error) {
      if (isAbortError(error) || error instanceof AgentError) {
        throw error;
      }
      throw new BackendError(
        `Backend ${this.backend.name} request failed: ${describeError(error)}`,
        undefined,
        error,
      );
    }

    Logger.debug('engine', 'Backend responded', {
      backend: this.backend.name,
      durationMs: measureDurationMs(startMs),
      toolsOffered: request.tools?.length ?? 0,
    });

    const errorMessage = readErrorPayload(payload);
    if (errorMessage !== undefined) {
      throw new BackendError(`Backend ${this.backend.name} returned an error: ${errorMessage}`);
    }

    return payload;
  }

  private transition(next: EngineState, data?: Record<string, unknown>): void {
    Logger.debug('engine', `${this.currentState} -> ${next}`, {
      conversationId: this.conversationId,
      ...data,
    });
    this.currentState = next;
  }
}
