import type { ReadPosition } from '../types/record';

/**
 * Last-read position per (project directory, queue name).
 *
 * A checkpoint names the last record a consumer finished with; resuming
 * starts at the record after it. Saves must be all-or-nothing and must
 * propagate failures: a lost checkpoint means silent reprocessing.
 */
export interface CheckpointStore {
  /** Stored position, or null when the queue was never checkpointed */
  load(projectDir: string, queue: string): ReadPosition | null;

  /** Replace the stored position */
  save(projectDir: string, queue: string, position: ReadPosition): void;

  /** Forget the stored position (no-op when none) */
  clear(projectDir: string, queue: string): void;
}
