import type { ChatAgent } from '../types.js';
import { AgentNotFoundError, EvaluationError } from '../errors.js';
import { mean, measureDurationMs } from '../helpers.js';
import { Logger } from '../logger.js';
import type { EvaluationCase } from '../evaluation/cases.js';
import {
  Evaluator,
  MultiAgentEvaluator,
  type AgentComparison,
  type BatchResult,
  type CaseResult,
  type EvaluatorOptions,
} from '../evaluation/evaluator.js';
import type { MetricName } from '../evaluation/metrics.js';
import {
  checkpointFileName,
  FileCheckpointStore,
  type Checkpoint,
  type CheckpointStore,
} from './checkpoint-store.js';

export const DEFAULT_NUM_EPISODES = 10;
export const DEFAULT_CHECKPOINT_DIR = 'checkpoints';

export type EpisodeRecord = {
  episode: number;
  /**
   * Per-case rewards. Empty for records restored from a checkpoint.
   */
  rewards: number[];
  avgReward: number;
  totalReward: number;
  numTestCases: number;
};

export type EpisodeData = {
  episode: number;
  results: CaseResult[];
  rewards: number[];
};

/**
 * Extension point for a learning step, run after each recorded episode.
 */
export type PolicyUpdate = (episode: EpisodeData, record: EpisodeRecord) => void | Promise<void>;

export const noopPolicyUpdate: PolicyUpdate = () => undefined;

export type TrainerOptions = EvaluatorOptions & {
  checkpointStore?: CheckpointStore;
  checkpointDir?: string;
  policyUpdate?: PolicyUpdate;
};

export type TrainOptions = {
  numEpisodes?: number;
  /**
   * Checked between episodes only; an episode in progress always finishes.
   */
  signal?: AbortSignal;
  onEpisode?: (record: EpisodeRecord) => void;
};

export type TrainingRun = {
  history: EpisodeRecord[];
  completedEpisodes: number;
  cancelled: boolean;
};

const toCheckpointHistory = (history: readonly EpisodeRecord[]): Checkpoint['training_history'] => (
  history.map((record) => ({
    episode: record.episode,
    avg_reward: record.avgReward,
    total_reward: record.totalReward,
    num_test_cases: record.numTestCases,
  }))
);

const fromCheckpointHistory = (history: Checkpoint['training_history']): EpisodeRecord[] => (
  history.map((entry) => ({
    episode: entry.episode,
    rewards: [],
    avgReward: entry.avg_reward,
    totalReward: entry.total_reward,
    numTestCases: entry.num_test_cases,
  }))
);

/**
 * Scores repeated episodes of the same cases. There is no learning step:
 * `policyUpdate` is the hook where one would go.
 */
export class EpisodeTrainer {
  private readonly evaluator: Evaluator;
  private readonly checkpointStore: CheckpointStore;
  private readonly policyUpdate: PolicyUpdate;
  private history: EpisodeRecord[] = [];

  constructor(private readonly agent: ChatAgent, options: TrainerOptions = {}) {
    this.evaluator = new Evaluator(agent, options);
    this.checkpointStore = options.checkpointStore
      ?? new FileCheckpointStore(options.checkpointDir ?? DEFAULT_CHECKPOINT_DIR);
    this.policyUpdate = options.policyUpdate ?? noopPolicyUpdate;
  }

  public async collectEpisode(cases: readonly EvaluationCase[], episode: number): Promise<EpisodeData> {
    const results: CaseResult[] = [];
    for (const testCase of cases) {
      results.push(await this.evaluator.evaluateSingle(testCase));
    }
    return {
      episode,
      results,
      rewards: results.map((result) => result.metrics.reward),
    };
  }

  public async trainStep(cases: readonly EvaluationCase[], episode: number): Promise<EpisodeRecord> {
    if (cases.length === 0) {
      throw new EvaluationError('Cannot train on an empty batch of cases');
    }

    const data = await this.collectEpisode(cases, episode);
    const totalReward = data.rewards.reduce((total, value) => total + value, 0);
    const record: EpisodeRecord = {
      episode,
      rewards: data.rewards,
      avgReward: mean(data.rewards),
      totalReward,
      numTestCases: cases.length,
    };

    this.history.push(record);
    await this.policyUpdate(data, record);
    return record;
  }

  public async train(cases: readonly EvaluationCase[], options: TrainOptions = {}): Promise<TrainingRun> {
    const numEpisodes = options.numEpisodes ?? DEFAULT_NUM_EPISODES;
    const startMs = Date.now();
    const recorded: EpisodeRecord[] = [];
    let cancelled = false;

    Logger.info('trainer', `Starting training for ${numEpisodes} episodes`, { model: this.agent.model });

    for (let episode = 0; episode < numEpisodes; episode += 1) {
      if (options.signal?.aborted) {
        cancelled = true;
        Logger.warn('trainer', `Training cancelled before episode ${episode}`);
        break;
      }
      const record = await this.trainStep(cases, episode);
      recorded.push(record);
      Logger.info('trainer', `Episode ${episode + 1}/${numEpisodes}`, { avgReward: record.avgReward });
      options.onEpisode?.(record);
    }

    Logger.info('trainer', 'Training finished', {
      completedEpisodes: recorded.length,
      cancelled,
      durationMs: measureDurationMs(startMs),
    });

    return { history: recorded, completedEpisodes: recorded.length, cancelled };
  }

  public async evaluate(cases: readonly EvaluationCase[]): Promise<BatchResult> {
    return this.evaluator.evaluateBatch(cases);
  }

  public getHistory(): EpisodeRecord[] {
    return [...this.history];
  }

  public toCheckpoint(episode: number): Checkpoint {
    return {
      episode,
      training_history: toCheckpointHistory(this.history),
      agent_config: {
        model: this.agent.model,
        temperature: this.agent.temperature,
      },
    };
  }

  public async saveCheckpoint(episode: number, fileName = checkpointFileName(episode)): Promise<string> {
    const location = await this.checkpointStore.save(fileName, this.toCheckpoint(episode));
    Logger.info('trainer', `Checkpoint saved to ${location}`);
    return location;
  }

  /**
   * Replaces the training history with the checkpoint's.
   */
  public async loadCheckpoint(location: string): Promise<Checkpoint> {
    const checkpoint = await this.checkpointStore.load(location);
    this.history = fromCheckpointHistory(checkpoint.training_history);
    Logger.info('trainer', `Checkpoint loaded from ${location}`, { episode: checkpoint.episode });
    return checkpoint;
  }
}

export type BestAgent = {
  agentId: string;
  score: number;
};

/**
 * Trains several agents independently over the same cases and episode count.
 */
export class MultiAgentTrainer {
  private readonly trainers = new Map<string, EpisodeTrainer>();
  private readonly evaluator: MultiAgentEvaluator;

  constructor(agents: Iterable<readonly [string, ChatAgent]>, options: TrainerOptions = {}) {
    const entries = Array.from(agents);
    for (const [agentId, agent] of entries) {
      this.trainers.set(agentId, new EpisodeTrainer(agent, options));
    }
    this.evaluator = new MultiAgentEvaluator(entries, options);
  }

  public agentIds(): string[] {
    return Array.from(this.trainers.keys());
  }

  public async trainAll(
    cases: readonly EvaluationCase[],
    options: TrainOptions = {},
  ): Promise<Map<string, TrainingRun>> {
    const runs = new Map<string, TrainingRun>();
    for (const [agentId, trainer] of this.trainers) {
      Logger.info('trainer', `Training agent ${agentId}`);
      runs.set(agentId, await trainer.train(cases, options));
    }
    return runs;
  }

  public async compareAgents(cases: readonly EvaluationCase[]): Promise<AgentComparison> {
    return this.evaluator.compareAgents(cases);
  }

  /**
   * Argmax of the aggregate metric; ties go to the agent registered first.
   */
  public async getBestAgent(
    cases: readonly EvaluationCase[],
    metric: MetricName = 'reward',
  ): Promise<BestAgent> {
    const comparison = await this.compareAgents(cases);
    const [best] = comparison.rankings[metric];
    if (!best) {
      throw new EvaluationError('No agents registered for comparison');
    }
    return { agentId: best.agentId, score: best.score };
  }

  public async saveAllCheckpoints(episode: number): Promise<Map<string, string>> {
    const locations = new Map<string, string>();
    for (const [agentId, trainer] of this.trainers) {
      locations.set(agentId, await trainer.saveCheckpoint(episode, checkpointFileName(episode, agentId)));
    }
    return locations;
  }

  public getTrainer(agentId: string): EpisodeTrainer {
    const trainer = this.trainers.get(agentId);
    if (!trainer) {
      throw new AgentNotFoundError(agentId);
    }
    return trainer;
  }

  public getHistory(agentId: string): EpisodeRecord[] {
    return this.getTrainer(agentId).getHistory();
  }
}
