import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { CheckpointError } from '../errors.js';
import { describeError, formatZodIssues } from '../helpers.js';

/**
 * On-disk checkpoint layout (snake_case, shared with existing checkpoint files).
 */
export const checkpointSchema = z.object({
  episode: z.number().int(),
  training_history: z.array(z.object({
    episode: z.number().int(),
    avg_reward: z.number(),
    total_reward: z.number(),
    num_test_cases: z.number().int(),
  })),
  agent_config: z.object({
    model: z.string(),
    temperature: z.number(),
  }),
});

export type Checkpoint = z.infer<typeof checkpointSchema>;

export interface CheckpointStore {
  /**
   * Persists a checkpoint and returns where it was written.
   */
  save(fileName: string, checkpoint: Checkpoint): Promise<string>;
  load(location: string): Promise<Checkpoint>;
}

export const checkpointFileName = (episode: number, agentId?: string): string => (
  agentId === undefined
    ? `checkpoint_episode_${episode}.json`
    : `checkpoint_${agentId}_episode_${episode}.json`
);

export const parseCheckpoint = (raw: unknown, location: string): Checkpoint => {
  const parsed = checkpointSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CheckpointError(`Invalid checkpoint ${location}: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
};

/**
 * Writes pretty-printed JSON files into one directory, creating it on first save.
 */
export class FileCheckpointStore implements CheckpointStore {
  constructor(public readonly directory: string) {}

  public async save(fileName: string, checkpoint: Checkpoint): Promise<string> {
    const filePath = path.join(this.directory, fileName);
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(filePath, `${JSON.stringify(checkpoint, null, 2)}\n`, 'utf8');
    } catch (error) {
      throw new CheckpointError(`Cannot write checkpoint ${filePath}: ${describeError(error)}`, error);
    }
    return filePath;
  }

  public async load(location: string): Promise<Checkpoint> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(location, 'utf8'));
    } catch (error) {
      throw new CheckpointError(`Cannot read checkpoint ${location}: ${describeError(error)}`, error);
    }
    return parseCheckpoint(raw, location);
  }
}
