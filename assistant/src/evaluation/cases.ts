import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ValidationResult } from '../types.js';
import { EvaluationError } from '../errors.js';
import { describeError, formatZodIssues } from '../helpers.js';
import { TASK_TYPES, type TaskType } from './metrics.js';

export type EvaluationCase = {
  userInput: string;
  expectedOutput?: string;
  expectedTools?: string[];
  taskType: TaskType;
};

/**
 * One entry of a case file, as written on disk (snake_case).
 */
const caseFileEntrySchema = z.object({
  user_input: z.string(),
  expected_output: z.string().nullish(),
  expected_tools: z.array(z.string()).nullish(),
  task_type: z.enum(TASK_TYPES).default('exact_match'),
}).transform((entry): EvaluationCase => ({
  userInput: entry.user_input,
  expectedOutput: entry.expected_output ?? undefined,
  expectedTools: entry.expected_tools ?? undefined,
  taskType: entry.task_type,
}));

export const caseFileSchema = z.array(caseFileEntrySchema);

/**
 * Validates an already-decoded case file.
 */
export const parseCases = (raw: unknown): ValidationResult<EvaluationCase[]> => {
  const parsed = caseFileSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: formatZodIssues(parsed.error) };
  }
  return { ok: true, value: parsed.data };
};

export async function loadCasesFromFile(filePath: string): Promise<EvaluationCase[]> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new EvaluationError(`Cannot read case file ${filePath}: ${describeError(error)}`, error);
  }

  const result = parseCases(raw);
  if (!result.ok) {
    throw new EvaluationError(`Invalid case file ${filePath}: ${result.error}`);
  }
  return result.value;
}

export const createSampleCases = (): EvaluationCase[] => [
  {
    userInput: 'What is 15 * 23?',
    expectedOutput: '345',
    expectedTools: ['calculate'],
    taskType: 'exact_match',
  },
  {
    userInput: 'Calculate 100 divided by 4',
    expectedOutput: '25',
    expectedTools: ['calculate'],
    taskType: 'exact_match',
  },
  {
    userInput: "What's the weather in New York?",
    expectedTools: ['get_weather'],
    taskType: 'contains',
  },
  {
    userInput: 'Hello, how are you?',
    expectedTools: [],
    taskType: 'contains',
  },
];
