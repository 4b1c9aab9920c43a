import { randomUUID } from 'node:crypto';
import type { ZodError } from 'zod';

/**
 * Helper to measure execution duration in milliseconds.
 */
export function measureDurationMs(startMs: number): number {
  return Math.round((Date.now() - startMs) * 100) / 100;
}

/**
 * Create a standard AbortError instance.
 */
export const createAbortError = (message = 'Operation aborted'): Error => {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
};

/**
 * Throws an AbortError if the given AbortSignal has been aborted.
 */
export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) throw createAbortError();
};

export const isAbortError = (error: unknown): error is Error => (
  error instanceof Error && error.name === 'AbortError'
);

export const isPlainObject = (value: unknown): value is Record<string, unknown> => (
  value !== null && typeof value === 'object' && !Array.isArray(value)
);

export const toTrimmedString = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

export const describeError = (error: unknown): string => (
  error instanceof Error ? error.message : String(error)
);

/**
 * Coerces a tool return value to the text fed back to the model.
 * Strings pass through; structured values are serialized as JSON.
 */
export const stringifyToolResult = (toolResult: unknown): string => {
  if (typeof toolResult === 'string') {
    return toolResult;
  }
  if (toolResult === null || toolResult === undefined || typeof toolResult !== 'object') {
    return String(toolResult);
  }
  try {
    return JSON.stringify(toolResult);
  } catch {
    return String(toolResult);
  }
};

/**
 * Arithmetic mean; 0 for an empty list.
 */
export const mean = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total / values.length;
};

export const generateId = (): string => randomUUID();

/**
 * Joins zod issues as `path: message` pairs.
 */
export const formatZodIssues = (error: ZodError): string => {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return issues.join('; ') || 'unknown error';
};
