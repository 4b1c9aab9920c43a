import type { ChatAgent, ToolInvocationRecord, TurnOutcome } from '../types.js';
import { AgentNotFoundError, EvaluationError } from '../errors.js';
import { measureDurationMs, throwIfAborted } from '../helpers.js';
import { Logger } from '../logger.js';
import { loadCasesFromFile, type EvaluationCase } from './cases.js';
import { resolveTestCases, type TestCaseStore } from './case-store.js';
import {
  averageMetrics,
  DEFAULT_REWARD_WEIGHTS,
  responseQuality,
  reward,
  taskSuccess,
  toolUsageEfficiency,
  type MetricName,
  type Metrics,
  type RewardWeights,
} from './metrics.js';

export type CaseResult = {
  case: EvaluationCase;
  response: string;
  toolCalls: ToolInvocationRecord[];
  outcome: TurnOutcome;
  metrics: Metrics;
};

export type BatchResult = {
  aggregateMetrics: Metrics;
  results: CaseResult[];
  numTestCases: number;
};

export type EvaluatorOptions = {
  weights?: RewardWeights;
  /**
   * Round budget per case; the agent's own default when omitted.
   */
  maxIterations?: number;
};

export type BatchOptions = {
  onProgress?: (completed: number, total: number, result: CaseResult) => void;
  signal?: AbortSignal;
};

/**
 * Scores one finished interaction. A case without an expected output scores 0 on task success.
 */
export function scoreInteraction(
  testCase: EvaluationCase,
  response: string,
  toolCalls: readonly { name: string }[],
  weights: RewardWeights = DEFAULT_REWARD_WEIGHTS,
): Metrics {
  const success = testCase.expectedOutput
    ? taskSuccess(testCase.expectedOutput, response, testCase.taskType)
    : 0;
  const efficiency = toolUsageEfficiency(toolCalls, testCase.expectedTools ?? []);
  const quality = responseQuality(response);

  return {
    taskSuccess: success,
    toolUsageEfficiency: efficiency,
    responseQuality: quality,
    reward: reward(success, efficiency, quality, weights),
  };
}

/**
 * Runs labeled cases against one agent and averages the scores.
 */
export class Evaluator {
  private readonly weights: RewardWeights;
  private readonly maxIterations: number | undefined;

  constructor(private readonly agent: ChatAgent, options: EvaluatorOptions = {}) {
    this.weights = options.weights ?? DEFAULT_REWARD_WEIGHTS;
    this.maxIterations = options.maxIterations;
  }

  public async evaluateSingle(testCase: EvaluationCase, signal?: AbortSignal): Promise<CaseResult> {
    this.agent.reset({ clearConversationId: true });

    const turn = await this.agent.chat(testCase.userInput, {
      maxIterations: this.maxIterations,
      signal,
    });
    const toolCalls = this.agent.getLastToolCalls();

    return {
      case: testCase,
      response: turn.text,
      toolCalls,
      outcome: turn.outcome,
      metrics: scoreInteraction(testCase, turn.text, toolCalls, this.weights),
    };
  }

  public async evaluateBatch(
    cases: readonly EvaluationCase[],
    options: BatchOptions = {},
  ): Promise<BatchResult> {
    if (cases.length === 0) {
      throw new EvaluationError('Cannot evaluate an empty batch of cases');
    }

    const startMs = Date.now();
    const results: CaseResult[] = [];
    for (const testCase of cases) {
      throwIfAborted(options.signal);
      const result = await this.evaluateSingle(testCase, options.signal);
      results.push(result);
      options.onProgress?.(results.length, cases.length, result);
    }

    const aggregateMetrics = averageMetrics(results.map((result) => result.metrics));
    Logger.info('evaluator', `Evaluated ${cases.length} cases`, {
      model: this.agent.model,
      reward: aggregateMetrics.reward,
      durationMs: measureDurationMs(startMs),
    });

    return {
      aggregateMetrics,
      results,
      numTestCases: cases.length,
    };
  }

  public async evaluateFromFile(filePath: string, options: BatchOptions = {}): Promise<BatchResult> {
    const cases = await loadCasesFromFile(filePath);
    return this.evaluateBatch(cases, options);
  }

  /**
   * Evaluates stored cases by id. Every id is resolved before the first case runs.
   */
  public async evaluateStoredCases(
    store: TestCaseStore,
    testCaseIds: readonly string[],
    options: BatchOptions = {},
  ): Promise<BatchResult> {
    const cases = await resolveTestCases(store, testCaseIds);
    return this.evaluateBatch(cases, options);
  }
}

export type RankingEntry = {
  agentId: string;
  score: number;
};

export type AgentComparison = {
  agentMetrics: Record<string, Metrics>;
  rankings: Record<MetricName, RankingEntry[]>;
  bestOverall: string;
};

/**
 * Orders agents by each metric, highest first. Ties keep the given order.
 */
export function rankAgents(entries: readonly { agentId: string; metrics: Metrics }[]): Record<MetricName, RankingEntry[]> {
  const rank = (name: MetricName): RankingEntry[] => entries
    .map((entry) => ({ agentId: entry.agentId, score: entry.metrics[name] }))
    .sort((left, right) => right.score - left.score);

  return {
    taskSuccess: rank('taskSuccess'),
    toolUsageEfficiency: rank('toolUsageEfficiency'),
    responseQuality: rank('responseQuality'),
    reward: rank('reward'),
  };
}

/**
 * Runs the same cases against several agents, one after another.
 * Agents share nothing but the tool registry they were built with.
 */
export class MultiAgentEvaluator {
  private readonly evaluators = new Map<string, Evaluator>();

  constructor(agents: Iterable<readonly [string, ChatAgent]>, options: EvaluatorOptions = {}) {
    for (const [agentId, agent] of agents) {
      this.evaluators.set(agentId, new Evaluator(agent, options));
    }
  }

  public agentIds(): string[] {
    return Array.from(this.evaluators.keys());
  }

  public async evaluateAgent(
    agentId: string,
    cases: readonly EvaluationCase[],
    options: BatchOptions = {},
  ): Promise<BatchResult> {
    const evaluator = this.evaluators.get(agentId);
    if (!evaluator) {
      throw new AgentNotFoundError(agentId);
    }
    Logger.info('evaluator', `Evaluating agent ${agentId}`, { cases: cases.length });
    return evaluator.evaluateBatch(cases, options);
  }

  public async evaluateAll(
    cases: readonly EvaluationCase[],
    options: BatchOptions = {},
  ): Promise<Map<string, BatchResult>> {
    const results = new Map<string, BatchResult>();
    for (const agentId of this.evaluators.keys()) {
      results.set(agentId, await this.evaluateAgent(agentId, cases, options));
    }
    return results;
  }

  public async compareAgents(
    cases: readonly EvaluationCase[],
    options: BatchOptions = {},
  ): Promise<AgentComparison> {
    const results = await this.evaluateAll(cases, options);
    const entries = Array.from(results, ([agentId, result]) => ({
      agentId,
      metrics: result.aggregateMetrics,
    }));

    const rankings = rankAgents(entries);
    const [best] = rankings.reward;
    if (!best) {
      throw new EvaluationError('No agents registered for comparison');
    }

    const agentMetrics: Record<string, Metrics> = {};
    for (const entry of entries) {
      agentMetrics[entry.agentId] = entry.metrics;
    }

    return { agentMetrics, rankings, bestOverall: best.agentId };
  }
}
