// Error taxonomy. Tool-level failures never use these: the engine turns them
// into result text for the next round.

export type AgentErrorCode =
  | 'BACKEND_UNAVAILABLE'
  | 'BACKEND_ERROR'
  | 'TEST_CASE_NOT_FOUND'
  | 'AGENT_NOT_FOUND'
  | 'CONVERSATION_NOT_FOUND'
  | 'EVALUATION_ERROR'
  | 'CHECKPOINT_ERROR'
  | 'CONFIG_ERROR';

export class AgentError extends Error {
  constructor(
    message: string,
    public readonly code: AgentErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'AgentError';
  }
}

/**
 * The backend could not be reached or refused our credentials. Fatal to the turn.
 */
export class BackendUnavailableError extends AgentError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, 'BACKEND_UNAVAILABLE', cause);
    this.name = 'BackendUnavailableError';
  }
}

/**
 * The backend answered but rejected the request (rate limit, bad request, server error).
 */
export class BackendError extends AgentError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, 'BACKEND_ERROR', cause);
    this.name = 'BackendError';
  }
}

export class TestCaseNotFoundError extends AgentError {
  constructor(public readonly testCaseId: string) {
    super(`Test case ${testCaseId} not found`, 'TEST_CASE_NOT_FOUND');
    this.name = 'TestCaseNotFoundError';
  }
}

export class AgentNotFoundError extends AgentError {
  constructor(public readonly agentId: string) {
    super(`Agent ${agentId} not found`, 'AGENT_NOT_FOUND');
    this.name = 'AgentNotFoundError';
  }
}

export class ConversationNotFoundError extends AgentError {
  constructor(public readonly conversationId: string) {
    super(`Conversation ${conversationId} not found`, 'CONVERSATION_NOT_FOUND');
    this.name = 'ConversationNotFoundError';
  }
}

export class EvaluationError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, 'EVALUATION_ERROR', cause);
    this.name = 'EvaluationError';
  }
}

export class CheckpointError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CHECKPOINT_ERROR', cause);
    this.name = 'CheckpointError';
  }
}

export class ConfigError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}
