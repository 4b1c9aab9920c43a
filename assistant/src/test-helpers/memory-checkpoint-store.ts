import { CheckpointError } from '../errors.js';
import type { Checkpoint, CheckpointStore } from '../training/checkpoint-store.js';

/**
 * Keeps checkpoints in a map keyed by file name.
 */
export class MemoryCheckpointStore implements CheckpointStore {
  public readonly saved = new Map<string, Checkpoint>();

  public async save(fileName: string, checkpoint: Checkpoint): Promise<string> {
    this.saved.set(fileName, structuredClone(checkpoint));
    return fileName;
  }

  public async load(location: string): Promise<Checkpoint> {
    const checkpoint = this.saved.get(location);
    if (!checkpoint) {
      throw new CheckpointError(`Checkpoint ${location} not found`);
    }
    return structuredClone(checkpoint);
  }
}
