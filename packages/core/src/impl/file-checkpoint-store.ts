/**
 * FileCheckpointStore — one small file per queue, next to its segments.
 *
 * Storage format:
 *   <project_dir>/.<queue>.checkpoint     — codec-encoded { filename, index }
 *   <project_dir>/.<queue>.checkpoint.tmp — transient, during save
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { CheckpointStore } from '../interfaces/checkpoint-store';
import type { RecordCodec } from '../interfaces/codec';
import type { EventBus } from '../interfaces/event-bus';
import type { ReadPosition } from '../types/record';
import { CheckpointError } from '../types/errors';
import { MsgpackCodec } from '../codec/msgpack-codec';
import { assertValidName, atomicWriteFileSync, errorCode, unlinkIfExists, validateReadPosition } from '../utils';

export interface FileCheckpointStoreOptions {
  codec?: RecordCodec;
  events?: EventBus;
}

export class FileCheckpointStore implements CheckpointStore {
  private readonly codec: RecordCodec;
  private readonly events?: EventBus;

  constructor(options: FileCheckpointStoreOptions = {}) {
    this.codec = options.codec ?? new MsgpackCodec();
    this.events = options.events;
  }

  /** Path of the checkpoint file for a queue. */
  pathFor(projectDir: string, queue: string): string {
    assertValidName(queue);
    return join(projectDir, `.${queue}.checkpoint`);
  }

  load(projectDir: string, queue: string): ReadPosition | null {
    let bytes: Uint8Array;
    try {
      bytes = readFileSync(this.pathFor(projectDir, queue));
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return null;
      throw err;
    }

    let decoded: unknown;
    try {
      decoded = this.codec.decode(bytes);
    } catch (err) {
      throw new CheckpointError(queue, 'cannot decode', err);
    }
    if (!validateReadPosition(decoded)) {
      throw new CheckpointError(queue, 'expected { filename, index }');
    }

    const position: ReadPosition = { filename: decoded.filename, index: decoded.index };
    this.events?.onCheckpointLoaded?.({ queue, ...position });
    return position;
  }

  save(projectDir: string, queue: string, position: ReadPosition): void {
    const bytes = this.codec.encode({ filename: position.filename, index: position.index });
    atomicWriteFileSync(this.pathFor(projectDir, queue), bytes);
    this.events?.onCheckpointSaved?.({ queue, filename: position.filename, index: position.index });
  }

  clear(projectDir: string, queue: string): void {
    unlinkIfExists(this.pathFor(projectDir, queue));
  }
}
