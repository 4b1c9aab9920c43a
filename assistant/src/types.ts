/**
 * Type of the result of validating an untrusted value.
 */
export type ValidationResult<Value = unknown, ErrorCode = string> =
  | { ok: true; value: Value }
  | { ok: false; error: ErrorCode };

/**
 * One step of dialogue in the canonical in-memory representation.
 * Backend payloads of any shape are converted into these before the engine acts on them.
 */
export type ConversationTurnItem =
  | { kind: 'user_text'; text: string }
  | { kind: 'assistant_text'; text: string }
  | {
      kind: 'tool_invocation';
      callId: string;
      name: string;
      /**
       * Arguments exactly as the backend sent them (JSON text or an object).
       */
      arguments: unknown;
    }
  | { kind: 'tool_result'; callId: string; output: string };

export type ToolInvocationItem = Extract<ConversationTurnItem, { kind: 'tool_invocation' }>;

/**
 * Tool offer presented to the backend.
 */
export type ToolSchema = {
  name: string;
  description: string;
  parameterSchema: Record<string, unknown>;
};

/**
 * Controls how much context the engine re-sends on every round.
 */
export type StatefulnessMode = 'stateless' | 'backend_stateful';

/**
 * Parameters used to invoke the language-model backend for one round.
 */
export type BackendRequest = {
  model: string;
  input: string | ConversationTurnItem[];
  tools?: ToolSchema[];
  temperature?: number;
  continuationToken?: string;
  signal?: AbortSignal;
};

/**
 * Minimal interface that a backend client needs to fulfill.
 * The payload is returned untouched; the engine normalizes whatever shape comes back.
 */
export interface BackendClient {
  readonly name: string;
  /**
   * Whether the backend honours `continuationToken` (required for `backend_stateful`).
   */
  readonly supportsContinuation: boolean;
  send(request: BackendRequest): Promise<unknown>;
}

export type ToolCallStatus = 'pending' | 'executed' | 'failed';

/**
 * A tool invocation requested by the backend, tracked until its result is folded back.
 */
export type PendingToolCall = {
  callId: string;
  toolName: string;
  rawArguments: unknown;
  resolvedArguments: Record<string, unknown>;
  status: ToolCallStatus;
};

/**
 * Tool invocation exposed after a turn for persistence and evaluation.
 */
export type ToolInvocationRecord = {
  id: string;
  name: string;
  arguments: unknown;
  resolvedArguments: Record<string, unknown>;
  output: string;
  status: Exclude<ToolCallStatus, 'pending'>;
};

export type EngineState =
  | 'awaiting_backend'
  | 'backend_responded'
  | 'has_final_text'
  | 'has_tool_calls'
  | 'executing_tools'
  | 'budget_exhausted';

export type TurnOutcome = 'completed' | 'budget_exhausted';

/**
 * Result of one chat turn.
 */
export type TurnResult = {
  text: string;
  toolCalls: ToolInvocationRecord[];
  rounds: number;
  outcome: TurnOutcome;
  finalState: Extract<EngineState, 'has_final_text' | 'budget_exhausted'>;
};

export type ChatOptions = {
  maxIterations?: number;
  signal?: AbortSignal;
};

/**
 * Anything the evaluator and trainer can drive: one conversation at a time.
 */
export interface ChatAgent {
  readonly model: string;
  readonly temperature: number;
  chat(userMessage: string, options?: ChatOptions): Promise<TurnResult>;
  reset(options?: { clearConversationId?: boolean }): void;
  getConversationId(): string;
  getLastToolCalls(): ToolInvocationRecord[];
}
