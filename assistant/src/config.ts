// Configuration from environment variables, validated with zod.

import { z } from 'zod';
import type { BackendClient } from './types.js';
import { ConfigError } from './errors.js';
import { formatZodIssues } from './helpers.js';
import { LOG_LEVELS } from './logger.js';
import { ChatCompletionsClient } from './models/chat-completions.js';
import { DEFAULT_OPENAI_BASE_URL, ResponsesClient } from './models/responses.js';

export const BACKEND_KINDS = ['responses', 'chat_completions'] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

// Empty variables count as unset.
const optional = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(
  (value) => (value === '' ? undefined : value),
  schema,
);

const envSchema = z.object({
  AGENT_BACKEND: optional(z.enum(BACKEND_KINDS).default('responses')),
  OPENAI_BASE_URL: optional(z.string().url().default(DEFAULT_OPENAI_BASE_URL)),
  OPENAI_API_KEY: optional(z.string().optional()),
  OPENAI_MODEL: optional(z.string().default('gpt-4o')),
  OPENAI_TEMPERATURE: optional(z.coerce.number().min(0).max(2).default(1.0)),
  AGENT_MAX_ITERATIONS: optional(z.coerce.number().int().positive().default(6)),
  AGENT_STATEFULNESS: optional(z.enum(['stateless', 'backend_stateful']).default('stateless')),
  CHECKPOINT_DIR: optional(z.string().default('checkpoints')),
  LOG_LEVEL: optional(z.enum(LOG_LEVELS).default('info')),
});

export type AppConfig = {
  readonly backend: BackendKind;
  readonly baseUrl: string;
  readonly apiKey?: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxIterations: number;
  readonly statefulness: 'stateless' | 'backend_stateful';
  readonly checkpointDir: string;
  readonly logLevel: (typeof LOG_LEVELS)[number];
};

/**
 * Reads configuration from the environment. Throws ConfigError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodIssues(parsed.error)}`, parsed.error);
  }

  const values = parsed.data;
  return {
    backend: values.AGENT_BACKEND,
    baseUrl: values.OPENAI_BASE_URL,
    apiKey: values.OPENAI_API_KEY,
    model: values.OPENAI_MODEL,
    temperature: values.OPENAI_TEMPERATURE,
    maxIterations: values.AGENT_MAX_ITERATIONS,
    statefulness: values.AGENT_STATEFULNESS,
    checkpointDir: values.CHECKPOINT_DIR,
    logLevel: values.LOG_LEVEL,
  };
}

export function createBackendClient(config: Pick<AppConfig, 'backend' | 'baseUrl' | 'apiKey'>): BackendClient {
  const options = { baseUrl: config.baseUrl, apiKey: config.apiKey };
  if (config.backend === 'chat_completions') {
    return new ChatCompletionsClient(options);
  }
  return new ResponsesClient(options);
}
