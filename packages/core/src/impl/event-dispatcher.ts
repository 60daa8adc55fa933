/**
 * EventDispatcher — event bus with multi-listener support,
 * async dispatch, listener isolation, and automatic timestamping.
 *
 * Implements the EventBus interface so it can be handed to a Project,
 * a Sink, a Source or a DiskCache directly.
 *
 * Features:
 * - Multiple listeners per event type via `.on(type, listener)`
 * - Wildcard `'*'` listener receives every event
 * - Async dispatch (queueMicrotask) — listeners never block file I/O
 * - Sync mode for testing — events dispatched inline
 * - try/catch per listener — one bad listener can't break a write
 * - Every dispatched event has `type` and `timestamp` fields
 * - `.on()` returns its unsubscribe function
 *
 * Usage:
 * ```typescript
 * const dispatcher = new EventDispatcher();
 *
 * dispatcher.on('segment.rotated', (e) => {
 *   console.log(`rotated ${e.queue} to ${e.to}`);
 * });
 *
 * const project = new Project('./data', { events: dispatcher });
 * ```
 */

import type { EventBus } from '../interfaces/event-bus';
import { now } from '../utils';

// ── Event Types ─────────────────────────────────────────────────

/** All event type strings emitted by the system. */
export type EventType =
  // Segments
  | 'segment.opened'
  | 'segment.rotated'
  | 'segment.closed'
  | 'segments.unlinked'
  // Checkpoints
  | 'checkpoint.loaded'
  | 'checkpoint.saved'
  // Cache
  | 'cache.hit'
  | 'cache.miss'
  | 'cache.written'
  | 'cache.discarded'
  | 'cache.cleared'
  | 'cache.read_failed'
  | 'cache.write_failed';

/** Every dispatched event carries its type and a millisecond timestamp. */
export interface DispatchedEvent {
  readonly type: EventType;
  readonly timestamp: number;
  readonly [key: string]: unknown;
}

/** Listener callback signature. */
export type EventListener = (event: DispatchedEvent) => void;

// ── Options ─────────────────────────────────────────────────────

export interface EventDispatcherOptions {
  /**
   * Dispatch mode.
   * - `'async'` (default) — listeners fire on next microtask via queueMicrotask.
   * - `'sync'` — listeners fire inline. Use for testing or when you need
   *   to assert events immediately after an operation.
   */
  mode?: 'sync' | 'async';

  /**
   * Called when a listener throws. Without this, listener errors are dropped
   * so they never surface from a write or a read. Set this to log or report.
   */
  onError?: (error: unknown, event: DispatchedEvent) => void;
}

// ── EventDispatcher ─────────────────────────────────────────────

export class EventDispatcher implements EventBus {
  private readonly _listeners = new Map<string, Set<EventListener>>();
  private readonly _mode: 'sync' | 'async';
  private readonly _onError?: (error: unknown, event: DispatchedEvent) => void;

  readonly onSegmentOpened: NonNullable<EventBus['onSegmentOpened']> = e => this._dispatch('segment.opened', e);
  readonly onSegmentRotated: NonNullable<EventBus['onSegmentRotated']> = e => this._dispatch('segment.rotated', e);
  readonly onSegmentClosed: NonNullable<EventBus['onSegmentClosed']> = e => this._dispatch('segment.closed', e);
  readonly onSegmentsUnlinked: NonNullable<EventBus['onSegmentsUnlinked']> = e => this._dispatch('segments.unlinked', e);
  readonly onCheckpointLoaded: NonNullable<EventBus['onCheckpointLoaded']> = e => this._dispatch('checkpoint.loaded', e);
  readonly onCheckpointSaved: NonNullable<EventBus['onCheckpointSaved']> = e => this._dispatch('checkpoint.saved', e);
  readonly onCacheHit: NonNullable<EventBus['onCacheHit']> = e => this._dispatch('cache.hit', e);
  readonly onCacheMiss: NonNullable<EventBus['onCacheMiss']> = e => this._dispatch('cache.miss', e);
  readonly onCacheWritten: NonNullable<EventBus['onCacheWritten']> = e => this._dispatch('cache.written', e);
  readonly onCacheDiscarded: NonNullable<EventBus['onCacheDiscarded']> = e => this._dispatch('cache.discarded', e);
  readonly onCacheCleared: NonNullable<EventBus['onCacheCleared']> = e => this._dispatch('cache.cleared', e);
  readonly onCacheReadFailed: NonNullable<EventBus['onCacheReadFailed']> = e => this._dispatch('cache.read_failed', e);
  readonly onCacheWriteFailed: NonNullable<EventBus['onCacheWriteFailed']> = e => this._dispatch('cache.write_failed', e);

  constructor(options: EventDispatcherOptions = {}) {
    this._mode = options.mode ?? 'async';
    this._onError = options.onError;
  }

  // ── Public API ──────────────────────────────────────────────────

  /**
   * Subscribe to an event type, or `'*'` for every event.
   * Returns the unsubscribe function.
   */
  on(type: EventType | '*', listener: EventListener): () => void {
    const listeners = this._listeners.get(type) ?? new Set<EventListener>();
    this._listeners.set(type, listeners);
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  /**
   * Resolves once async dispatches queued so far have run.
   */
  async flush(): Promise<void> {
    await new Promise<void>(resolve => queueMicrotask(resolve));
  }

  // ── Internal ────────────────────────────────────────────────────

  private _dispatch(type: EventType, payload: object): void {
    // Listeners registered at emit time; type-specific ones first
    const targets = [...(this._listeners.get(type) ?? []), ...(this._listeners.get('*') ?? [])];
    if (targets.length === 0) return;

    const event: DispatchedEvent = Object.freeze({ ...payload, type, timestamp: now() });
    if (this._mode === 'sync') {
      this._deliver(targets, event);
    } else {
      queueMicrotask(() => this._deliver(targets, event));
    }
  }

  private _deliver(targets: EventListener[], event: DispatchedEvent): void {
    for (const listener of targets) {
      try {
        listener(event);
      } catch (err) {
        this._onError?.(err, event);
      }
    }
  }
}
