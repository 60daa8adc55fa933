/**
 * In-memory CheckpointStore — for testing.
 * Positions lost on process restart.
 */

import { resolve } from 'node:path';
import type { CheckpointStore } from '../interfaces/checkpoint-store';
import type { ReadPosition } from '../types/record';

export class MemoryCheckpointStore implements CheckpointStore {
  private positions = new Map<string, ReadPosition>();

  load(projectDir: string, queue: string): ReadPosition | null {
    const position = this.positions.get(this.keyOf(projectDir, queue));
    return position ? { ...position } : null;
  }

  save(projectDir: string, queue: string, position: ReadPosition): void {
    this.positions.set(this.keyOf(projectDir, queue), { filename: position.filename, index: position.index });
  }

  clear(projectDir: string, queue: string): void {
    this.positions.delete(this.keyOf(projectDir, queue));
  }

  /** Number of stored checkpoints (for testing/assertions) */
  size(): number {
    return this.positions.size;
  }

  private keyOf(projectDir: string, queue: string): string {
    return `${resolve(projectDir)}\0${queue}`;
  }
}
