/**
 * Source — ordered, resumable reader over every segment of one queue.
 *
 * Each pass lists the queue's segments once, when it starts, and reads them
 * in name order; segments created after that are picked up by the next pass.
 * A pass never waits for data.
 *
 * `position` is the last record handed out. Iterating again continues after
 * it, so nothing is yielded twice in one process unless `reset()` is called.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import type { RecordCodec } from '../interfaces/codec';
import type { EventBus } from '../interfaces/event-bus';
import type { ReadPosition, RecordValue, SourceEntry } from '../types/record';
import { CleanupError, SegmentReadError } from '../types/errors';
import { MsgpackCodec } from '../codec/msgpack-codec';
import { isRecordMap } from '../codec/value-model';
import { assertValidName, errorCode, segmentMatcher, unlinkIfExists } from '../utils';

export interface SourceOptions {
  /** Resume after this record (a checkpoint). */
  startAfter?: ReadPosition | null;
  /** Start at this record, inclusive. Ignored when `startAfter` is set. */
  startAt?: ReadPosition | null;
  /** Segments an open Sink is still appending to; never unlinked. */
  isSegmentOpen?: (filename: string) => boolean;
  codec?: RecordCodec;
  events?: EventBus;
}

/** What `unlinkTo` may remove up to: a segment name, or a consumed position. */
export type UnlinkTarget = { filename: string } | { position: ReadPosition };

type Start =
  | { kind: 'beginning' }
  | { kind: 'after'; position: ReadPosition }
  | { kind: 'at'; position: ReadPosition };

export class Source implements Iterable<SourceEntry> {
  private readonly codec: RecordCodec;
  private readonly events?: EventBus;
  private readonly isSegmentOpen: (filename: string) => boolean;
  private readonly matches: (filename: string) => boolean;
  private readonly initialStart: Start;
  private readonly initialPosition: ReadPosition | null;

  private _position: ReadPosition | null;

  constructor(
    readonly dir: string,
    readonly queue: string,
    options: SourceOptions = {}
  ) {
    assertValidName(queue);
    this.codec = options.codec ?? new MsgpackCodec();
    this.events = options.events;
    this.isSegmentOpen = options.isSegmentOpen ?? (() => false);
    this.matches = segmentMatcher(queue);

    if (options.startAfter) {
      this.initialStart = { kind: 'after', position: options.startAfter };
      this.initialPosition = options.startAfter;
    } else if (options.startAt) {
      this.initialStart = { kind: 'at', position: options.startAt };
      this.initialPosition = null;
    } else {
      this.initialStart = { kind: 'beginning' };
      this.initialPosition = null;
    }
    this._position = this.initialPosition;
  }

  /** Last record yielded by iteration, or the checkpoint it resumed from. */
  get position(): ReadPosition | null {
    return this._position;
  }

  *[Symbol.iterator](): Generator<SourceEntry, void, undefined> {
    const start: Start = this._position
      ? { kind: 'after', position: this._position }
      : this.initialStart;

    for (const entry of this.read(start)) {
      this._position = { filename: entry[0], index: entry[1] };
      yield entry;
    }
  }

  /** Go back to where this Source started. */
  reset(): void {
    this._position = this.initialPosition;
  }

  /** Every record of the queue. Does not move `position`. */
  all(): Generator<SourceEntry, void, undefined> {
    return this.read({ kind: 'beginning' });
  }

  /** Records from `position` inclusive. Does not move `position`. */
  from(position: ReadPosition): Generator<SourceEntry, void, undefined> {
    return this.read({ kind: 'at', position });
  }

  /** Segment names of this queue in write order. */
  segments(): string[] {
    let names: string[];
    try {
      names = readdirSync(this.dir);
    } catch (err) {
      if (errorCode(err) === 'ENOENT') return [];
      throw err;
    }
    return names.filter(this.matches).sort();
  }

  segmentPath(filename: string): string {
    return join(this.dir, filename);
  }

  /**
   * Delete consumed segments, oldest first, up to and including the target
   * segment (default: the segment of `position`).
   *
   * A segment goes only when `position` (and a `{ position }` target) is at
   * or past its last record. Deletion stops at the first segment that is
   * not fully consumed or that an open Sink is still writing, and never
   * reaches the newest segment: a Sink in the same boundary would re-create
   * that name with indexes starting over under a stored checkpoint.
   *
   * @returns names of the deleted segments
   */
  unlinkTo(target?: UnlinkTarget): string[] {
    const consumed = this._position;
    if (!consumed) return [];

    const references = [consumed];
    let limit = consumed.filename;
    if (target && 'position' in target) {
      references.push(target.position);
      limit = target.position.filename;
    } else if (target) {
      limit = target.filename;
    }

    const segments = this.segments();
    const deleted: string[] = [];
    for (const [i, filename] of segments.entries()) {
      if (i === segments.length - 1) break;
      if (filename > limit) break;
      if (this.isSegmentOpen(filename)) break;
      if (!references.every(ref => this.isConsumed(filename, ref))) break;

      try {
        if (unlinkIfExists(this.segmentPath(filename))) deleted.push(filename);
      } catch (err) {
        throw new CleanupError(filename, err);
      }
    }

    if (deleted.length > 0) {
      this.events?.onSegmentsUnlinked?.({ queue: this.queue, filenames: deleted });
    }
    return deleted;
  }

  // --- Private ---

  private *read(start: Start): Generator<SourceEntry, void, undefined> {
    const segments = this.segments();
    if (start.kind === 'beginning') {
      for (const filename of segments) {
        yield* this.readSegment(filename, 0);
      }
      return;
    }

    const { filename: startFile, index } = start.position;
    const firstIndex = start.kind === 'after' ? index + 1 : index;

    // A start segment that was cleaned up resumes at the next one that remains
    for (const filename of segments) {
      if (filename < startFile) continue;
      yield* this.readSegment(filename, filename === startFile ? firstIndex : 0);
    }
  }

  private *readSegment(filename: string, fromIndex: number): Generator<SourceEntry, void, undefined> {
    let bytes: Uint8Array;
    try {
      bytes = readFileSync(this.segmentPath(filename));
    } catch (err) {
      // Unlinked between listing and reading
      if (errorCode(err) === 'ENOENT') return;
      throw err;
    }

    const records = this.codec.decodeAll(bytes);
    let index = 0;
    while (true) {
      let step: IteratorResult<RecordValue, void>;
      try {
        step = records.next();
      } catch (err) {
        throw new SegmentReadError(filename, index, err);
      }
      if (step.done) return;

      const record = step.value;
      if (!isRecordMap(record)) {
        throw new SegmentReadError(filename, index, new TypeError('record is not a map'));
      }
      if (index >= fromIndex) {
        yield [filename, index, record];
      }
      index++;
    }
  }

  private isConsumed(filename: string, position: ReadPosition): boolean {
    if (filename < position.filename) return true;
    if (filename > position.filename) return false;
    return position.index + 1 >= this.countRecords(filename);
  }

  private countRecords(filename: string): number {
    let count = 0;
    for (const _ of this.readSegment(filename, 0)) count++;
    return count;
  }
}
