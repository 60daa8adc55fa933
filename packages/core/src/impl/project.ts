/**
 * Project — a directory holding named queues, their checkpoints and
 * consumer state folders.
 *
 * Layout:
 *   <dir>/<queue>.<stamp>       — segments, one per rotation boundary
 *   <dir>/.<queue>.checkpoint   — last record consumed via continueSource
 *   <dir>/state/<name>/         — state folders
 *
 * A Project is a scoped resource. `close()` (or leaving `Project.use`)
 * closes every Sink, saves the position of every tracked Source as its
 * queue's checkpoint, and flushes every state folder, so the next
 * `continueSource` picks up exactly where this scope stopped.
 *
 * Usage:
 * ```typescript
 * Project.use('./data', project => {
 *   const sink = project.openSink('orders');
 *   sink.writeDict({ id: 1 });
 * });
 *
 * Project.use('./data', project => {
 *   for (const [, , order] of project.continueSource('orders')) {
 *     handle(order);
 *   }
 * });
 * ```
 */

import { join } from 'node:path';
import type { CheckpointStore } from '../interfaces/checkpoint-store';
import type { RecordCodec } from '../interfaces/codec';
import type { EventBus } from '../interfaces/event-bus';
import type { ReadPosition } from '../types/record';
import { AsyncScopeError, ClosedProjectError } from '../types/errors';
import { MsgpackCodec } from '../codec/msgpack-codec';
import { assertSettings, assertValidName, ensureWritableDir, now, validateProjectSettings, type Clock } from '../utils';
import { FileCheckpointStore } from './file-checkpoint-store';
import { Sink, DEFAULT_ROTATION_INTERVAL_MS } from './sink';
import { Source } from './source';
import { StateFolder } from './state-folder';

export interface ProjectOptions {
  /** Segment length in ms (default: 600000) */
  rotationIntervalMs?: number;
  /** fsync after every write instead of only on rotate/close (default: false) */
  syncOnWrite?: boolean;
  /** Record codec (default: MsgpackCodec) */
  codec?: RecordCodec;
  /** Where checkpoints live (default: FileCheckpointStore in the project dir) */
  checkpoints?: CheckpointStore;
  events?: EventBus;
  clock?: Clock;
}

export interface OpenSourceOptions {
  /** Start at this record, inclusive (default: first record of the earliest segment) */
  startAt?: ReadPosition;
  /** Save this Source's position as the queue's checkpoint on close (default: false) */
  saveCheckpoint?: boolean;
}

interface TrackedSource {
  readonly queue: string;
  readonly source: Source;
}

export class Project {
  private readonly rotationIntervalMs: number;
  private readonly syncOnWrite: boolean;
  private readonly codec: RecordCodec;
  private readonly checkpoints: CheckpointStore;
  private readonly events?: EventBus;
  private readonly clock: Clock;

  private readonly sinks = new Map<string, Sink>();
  private readonly tracked: TrackedSource[] = [];
  private readonly folders: StateFolder[] = [];
  private _closed = false;

  /**
   * @param dir - Project directory (created if missing)
   * @throws DirectoryError when `dir` cannot be created or written
   */
  constructor(
    readonly dir: string,
    options: ProjectOptions = {}
  ) {
    assertSettings(validateProjectSettings, {
      rotationIntervalMs: options.rotationIntervalMs,
      syncOnWrite: options.syncOnWrite,
    });
    ensureWritableDir(dir);

    this.rotationIntervalMs = options.rotationIntervalMs ?? DEFAULT_ROTATION_INTERVAL_MS;
    this.syncOnWrite = options.syncOnWrite ?? false;
    this.codec = options.codec ?? new MsgpackCodec();
    this.events = options.events;
    this.clock = options.clock ?? now;
    this.checkpoints = options.checkpoints ?? new FileCheckpointStore({ codec: this.codec, events: this.events });
  }

  /**
   * Run `fn` with a fresh Project and close it afterwards, whether `fn`
   * returns or throws. `fn` must be synchronous: a returned promise is
   * rejected with AsyncScopeError after the project is closed.
   */
  static use<T>(dir: string, fn: (project: Project) => T, options?: ProjectOptions): T {
    const project = new Project(dir, options);
    let result: T;
    try {
      result = fn(project);
    } catch (err) {
      try {
        project.close();
      } catch (closeErr) {
        throw new AggregateError([err, closeErr], `Project "${dir}" failed and did not close cleanly`);
      }
      throw err;
    }
    project.close();
    if (isThenable(result)) throw new AsyncScopeError(dir);
    return result;
  }

  get isClosed(): boolean {
    return this._closed;
  }

  /**
   * Sink for `name`. Returns the Sink already open for that queue, if any.
   */
  openSink(name: string): Sink {
    this.assertOpen();
    const existing = this.sinks.get(name);
    if (existing && !existing.isClosed) return existing;

    const sink = new Sink(this.dir, name, {
      rotationIntervalMs: this.rotationIntervalMs,
      syncOnWrite: this.syncOnWrite,
      codec: this.codec,
      events: this.events,
      clock: this.clock,
    });
    this.sinks.set(name, sink);
    return sink;
  }

  /**
   * Source reading `name` from its first record, ignoring any checkpoint.
   */
  openSource(name: string, options: OpenSourceOptions = {}): Source {
    this.assertOpen();
    const source = this.createSource(name, { startAt: options.startAt ?? null });
    if (options.saveCheckpoint) {
      this.tracked.push({ queue: name, source });
    }
    return source;
  }

  /**
   * Source resuming after the checkpoint of `name`; from the first record
   * when there is none. Its position is saved as the checkpoint on close.
   */
  continueSource(name: string): Source {
    this.assertOpen();
    assertValidName(name);
    const startAfter = this.checkpoints.load(this.dir, name);
    const source = this.createSource(name, { startAfter });
    this.tracked.push({ queue: name, source });
    return source;
  }

  /** Stored checkpoint of `name`, if any. */
  checkpointOf(name: string): ReadPosition | null {
    return this.checkpoints.load(this.dir, name);
  }

  /** Forget the checkpoint of `name`; the next continueSource starts over. */
  clearCheckpoint(name: string): void {
    this.checkpoints.clear(this.dir, name);
  }

  /**
   * State folder `<dir>/state/<name>`; its vars are flushed on close.
   */
  stateFolder(name: string): StateFolder {
    this.assertOpen();
    assertValidName(name);
    const folder = new StateFolder(join(this.dir, 'state', name), { codec: this.codec });
    this.folders.push(folder);
    return folder;
  }

  /**
   * Close sinks, save tracked positions, flush state folders.
   * Every step runs even when an earlier one fails; failures are rethrown
   * afterwards (several as an AggregateError).
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;

    const errors: unknown[] = [];
    const attempt = (step: () => void): void => {
      try {
        step();
      } catch (err) {
        errors.push(err);
      }
    };

    for (const sink of this.sinks.values()) {
      attempt(() => sink.close());
    }
    for (const { queue, source } of this.tracked) {
      const position = source.position;
      if (position) {
        attempt(() => this.checkpoints.save(this.dir, queue, position));
      }
    }
    for (const folder of this.folders) {
      attempt(() => folder.close());
    }

    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) {
      throw new AggregateError(errors, `Project "${this.dir}" did not close cleanly`);
    }
  }

  // --- Private ---

  private assertOpen(): void {
    if (this._closed) throw new ClosedProjectError(this.dir);
  }

  private createSource(name: string, start: { startAfter?: ReadPosition | null; startAt?: ReadPosition | null }): Source {
    return new Source(this.dir, name, {
      ...start,
      codec: this.codec,
      events: this.events,
      isSegmentOpen: filename => this.sinks.get(name)?.currentSegment === filename,
    });
  }
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}
