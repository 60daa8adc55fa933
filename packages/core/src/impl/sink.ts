/**
 * Sink — append-only writer for one queue, rotating segments on time boundaries.
 *
 * Every write reads the clock and maps it to a boundary
 * (`floor(now / rotationIntervalMs) * rotationIntervalMs`). The segment for a
 * boundary is `<queue>.<stamp of boundary start>`, opened lazily in append
 * mode, so a process restarting inside the same boundary appends to the
 * segment it was writing before instead of truncating it.
 *
 * A closed Sink does not reopen: further writes throw ClosedSinkError.
 */

import { closeSync, fsyncSync, openSync } from 'node:fs';
import { join } from 'node:path';
import type { RecordCodec } from '../interfaces/codec';
import type { EventBus } from '../interfaces/event-bus';
import type { QueueRecord } from '../types/record';
import { ClosedSinkError } from '../types/errors';
import { MsgpackCodec } from '../codec/msgpack-codec';
import {
  assertSettings,
  assertValidName,
  boundaryStart,
  ensureWritableDir,
  now,
  segmentName,
  validateProjectSettings,
  writeAll,
  type Clock,
} from '../utils';

/** Ten minutes per segment unless configured otherwise. */
export const DEFAULT_ROTATION_INTERVAL_MS = 10 * 60 * 1000;

export interface SinkOptions {
  /** Segment length in ms (default: 600000) */
  rotationIntervalMs?: number;
  /** fsync after every write instead of only on rotate/close (default: false) */
  syncOnWrite?: boolean;
  codec?: RecordCodec;
  events?: EventBus;
  clock?: Clock;
}

interface OpenSegment {
  readonly fd: number;
  readonly filename: string;
  readonly boundary: number;
  records: number;
}

export class Sink {
  private readonly intervalMs: number;
  private readonly syncOnWrite: boolean;
  private readonly codec: RecordCodec;
  private readonly events?: EventBus;
  private readonly clock: Clock;

  private segment: OpenSegment | null = null;
  private _written = 0;
  private _closed = false;

  constructor(
    readonly dir: string,
    readonly queue: string,
    options: SinkOptions = {}
  ) {
    assertValidName(queue);
    assertSettings(validateProjectSettings, {
      rotationIntervalMs: options.rotationIntervalMs,
      syncOnWrite: options.syncOnWrite,
    });
    ensureWritableDir(dir);

    this.intervalMs = options.rotationIntervalMs ?? DEFAULT_ROTATION_INTERVAL_MS;
    this.syncOnWrite = options.syncOnWrite ?? false;
    this.codec = options.codec ?? new MsgpackCodec();
    this.events = options.events;
    this.clock = options.clock ?? now;
  }

  /** Segment currently open for appends, if any. */
  get currentSegment(): string | null {
    return this.segment?.filename ?? null;
  }

  /** Records written through this Sink. */
  get written(): number {
    return this._written;
  }

  get isClosed(): boolean {
    return this._closed;
  }

  /**
   * Append one record, rotating first if the clock crossed a boundary.
   */
  writeDict(record: QueueRecord): void {
    if (this._closed) throw new ClosedSinkError(this.queue);

    // Encode first: a rejected record must not open or rotate a segment
    const bytes = this.codec.encode(record);
    const segment = this.segmentAt(this.clock());

    writeAll(segment.fd, bytes);
    if (this.syncOnWrite) fsyncSync(segment.fd);
    segment.records++;
    this._written++;
  }

  /**
   * Flush and release the open segment. Safe to call more than once.
   */
  close(): void {
    if (this._closed) return;
    this._closed = true;
    this.closeSegment();
  }

  // --- Private ---

  private segmentAt(at: number): OpenSegment {
    const boundary = boundaryStart(at, this.intervalMs);
    const current = this.segment;

    // Same boundary, or the clock went backwards: keep appending here
    if (current && boundary <= current.boundary) return current;

    this.closeSegment();
    const filename = segmentName(this.queue, boundary);
    const fd = openSync(join(this.dir, filename), 'a');
    const opened: OpenSegment = { fd, filename, boundary, records: 0 };
    this.segment = opened;

    this.events?.onSegmentOpened?.({ queue: this.queue, filename, boundary });
    if (current) {
      this.events?.onSegmentRotated?.({ queue: this.queue, from: current.filename, to: filename });
    }
    return opened;
  }

  private closeSegment(): void {
    const segment = this.segment;
    if (!segment) return;
    this.segment = null;
    try {
      fsyncSync(segment.fd);
    } finally {
      closeSync(segment.fd);
    }
    this.events?.onSegmentClosed?.({ queue: this.queue, filename: segment.filename, records: segment.records });
  }
}
