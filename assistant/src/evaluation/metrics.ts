/**
 * Scoring functions for a single interaction. All pure; no I/O.
 */

import { mean } from '../helpers.js';

export const TASK_TYPES = ['exact_match', 'contains', 'semantic'] as const;

export type TaskType = (typeof TASK_TYPES)[number];

export type Metrics = {
  taskSuccess: number;
  toolUsageEfficiency: number;
  responseQuality: number;
  reward: number;
};

export const METRIC_NAMES = [
  'taskSuccess',
  'toolUsageEfficiency',
  'responseQuality',
  'reward',
] as const satisfies readonly (keyof Metrics)[];

export type MetricName = (typeof METRIC_NAMES)[number];

export type RewardWeights = {
  taskSuccess: number;
  toolUsageEfficiency: number;
  responseQuality: number;
};

export const DEFAULT_REWARD_WEIGHTS: Readonly<RewardWeights> = Object.freeze({
  taskSuccess: 0.5,
  toolUsageEfficiency: 0.3,
  responseQuality: 0.2,
});

/**
 * Placeholder score for `semantic` cases; no similarity model is involved.
 */
export const SEMANTIC_PLACEHOLDER_SCORE = 0.5;

export const UNNECESSARY_CALL_PENALTY = 0.2;

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

export function taskSuccess(expected: string, actual: string, mode: TaskType = 'exact_match'): number {
  switch (mode) {
    case 'exact_match':
      return expected.trim().toLowerCase() === actual.trim().toLowerCase() ? 1 : 0;
    case 'contains':
      return actual.toLowerCase().includes(expected.toLowerCase()) ? 1 : 0;
    case 'semantic':
      return SEMANTIC_PLACEHOLDER_SCORE;
  }
}

/**
 * F1 of the tools called against the tools expected.
 * With nothing expected, every call counts as unnecessary unless told otherwise.
 */
export function toolUsageEfficiency(
  callsMade: readonly { name: string }[],
  expectedTools: readonly string[],
  unnecessaryCalls: number = callsMade.length,
): number {
  if (expectedTools.length === 0) {
    return Math.max(0, 1 - UNNECESSARY_CALL_PENALTY * unnecessaryCalls);
  }

  const called = new Set(callsMade.map((call) => call.name));
  const expected = new Set(expectedTools);
  let hits = 0;
  for (const tool of expected) {
    if (called.has(tool)) {
      hits += 1;
    }
  }

  const precision = called.size > 0 ? hits / called.size : 0;
  const recall = hits / expected.size;
  if (precision + recall === 0) {
    return 0;
  }
  return (2 * precision * recall) / (precision + recall);
}

export function responseQuality(text: string, minLength = 10, maxLength = 500): number {
  if (text.length === 0) {
    return 0;
  }

  const length = text.length;
  let lengthFit: number;
  if (length >= minLength && length <= maxLength) {
    lengthFit = 1;
  } else if (length < minLength) {
    lengthFit = length / minLength;
  } else {
    lengthFit = Math.max(0, 1 - (length - maxLength) / maxLength);
  }

  const nonBlank = text.trim().length > 0 ? 1 : 0;
  const noError = text.toLowerCase().slice(0, 50).includes('error') ? 0 : 1;

  return clamp01(lengthFit * 0.6 + nonBlank * 0.2 + noError * 0.2);
}

/**
 * Weighted sum. Neither clamped nor normalized by the weight total.
 */
export function reward(
  taskSuccessScore: number,
  toolUsageEfficiencyScore: number,
  responseQualityScore: number,
  weights: RewardWeights = DEFAULT_REWARD_WEIGHTS,
): number {
  return (
    taskSuccessScore * weights.taskSuccess
    + toolUsageEfficiencyScore * weights.toolUsageEfficiency
    + responseQualityScore * weights.responseQuality
  );
}

export const averageMetrics = (items: readonly Metrics[]): Metrics => {
  const average = (name: MetricName): number => mean(items.map((item) => item[name]));
  return {
    taskSuccess: average('taskSuccess'),
    toolUsageEfficiency: average('toolUsageEfficiency'),
    responseQuality: average('responseQuality'),
    reward: average('reward'),
  };
};
