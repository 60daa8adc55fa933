/**
 * EventDispatcher Tests
 *
 * Verifies:
 * - Multi-listener support (.on and its unsubscribe function)
 * - Wildcard listener receives all events
 * - Sync mode: events dispatched inline
 * - Async mode: events dispatched on microtask
 * - Listener isolation: throwing listener doesn't affect others
 * - Every EventBus hook maps to its event type
 * - logEvents / formatEvent line format
 * - Integration: a Project reports its segment lifecycle
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventDispatcher, type DispatchedEvent } from '../impl/event-dispatcher';
import { formatEvent, logEvents } from '../impl/console-logger';
import { Project } from '../impl/project';
import { createTempDir, removeDir, FakeClock } from './helpers';

const opened = { queue: 'q', filename: 'q.19700101T000000000Z', boundary: 0 };

// ── Sync Mode Tests ─────────────────────────────────────────────

describe('EventDispatcher (sync)', () => {
  let dispatcher: EventDispatcher;

  beforeEach(() => {
    dispatcher = new EventDispatcher({ mode: 'sync' });
  });

  it('dispatches to a single listener', () => {
    const received: DispatchedEvent[] = [];
    dispatcher.on('segment.opened', e => received.push(e));

    dispatcher.onSegmentOpened(opened);

    expect(received).toHaveLength(1);
    expect(received[0].type).toBe('segment.opened');
    expect(received[0].filename).toBe('q.19700101T000000000Z');
  });

  it('dispatches to multiple listeners on same event', () => {
    let a = 0, b = 0;
    dispatcher.on('cache.hit', () => { a++; });
    dispatcher.on('cache.hit', () => { b++; });

    dispatcher.onCacheHit({ key: 'k', path: '/tmp/k' });

    expect(a).toBe(1);
    expect(b).toBe(1);
  });

  it('wildcard listener receives all events', () => {
    const all: string[] = [];
    dispatcher.on('*', e => all.push(e.type));

    dispatcher.onSegmentOpened(opened);
    dispatcher.onCheckpointSaved({ queue: 'q', filename: 'q.19700101T000000000Z', index: 0 });
    dispatcher.onCacheMiss({ key: 'k', path: '/tmp/k' });

    expect(all).toEqual(['segment.opened', 'checkpoint.saved', 'cache.miss']);
  });

  it('adds timestamp to every event', () => {
    const received: DispatchedEvent[] = [];
    dispatcher.on('segment.opened', e => received.push(e));

    const before = Date.now();
    dispatcher.onSegmentOpened(opened);

    expect(received[0].timestamp).toBeGreaterThanOrEqual(before);
    expect(received[0].timestamp).toBeLessThanOrEqual(Date.now() + 10);
  });

  it('events are frozen', () => {
    const received: DispatchedEvent[] = [];
    dispatcher.on('segment.opened', e => received.push(e));

    dispatcher.onSegmentOpened(opened);

    expect(Object.isFrozen(received[0])).toBe(true);
  });

  it('unsubscribe function removes listener', () => {
    let count = 0;
    const unsub = dispatcher.on('segment.opened', () => { count++; });

    dispatcher.onSegmentOpened(opened);
    expect(count).toBe(1);

    unsub();
    dispatcher.onSegmentOpened(opened);
    expect(count).toBe(1);
  });

  it('unsubscribing one listener keeps the others', () => {
    const seen: string[] = [];
    const stopA = dispatcher.on('segment.opened', () => { seen.push('a'); });
    dispatcher.on('segment.opened', () => { seen.push('b'); });
    dispatcher.on('*', () => { seen.push('*'); });

    stopA();
    dispatcher.onSegmentOpened(opened);

    expect(seen).toEqual(['b', '*']);
  });

  it('no listeners, no errors', () => {
    expect(() => dispatcher.onCacheMiss({ key: 'k', path: '/tmp/k' })).not.toThrow();
  });
});

// ── Listener Isolation ──────────────────────────────────────────

describe('EventDispatcher isolation', () => {
  it('throwing listener does not affect other listeners', () => {
    const dispatcher = new EventDispatcher({ mode: 'sync' });
    let reached = false;

    dispatcher.on('segment.opened', () => { throw new Error('boom'); });
    dispatcher.on('segment.opened', () => { reached = true; });

    dispatcher.onSegmentOpened(opened);

    expect(reached).toBe(true);
  });

  it('onError receives the error and the event that caused it', () => {
    const captured: Array<[unknown, DispatchedEvent]> = [];
    const dispatcher = new EventDispatcher({
      mode: 'sync',
      onError: (err, event) => captured.push([err, event]),
    });

    dispatcher.on('cache.cleared', () => { throw new Error('bad listener'); });
    dispatcher.onCacheCleared({ key: 'k', path: '/tmp/k' });

    expect(captured).toHaveLength(1);
    expect(captured[0][0]).toEqual(new Error('bad listener'));
    expect(captured[0][1]).toMatchObject({ type: 'cache.cleared', key: 'k' });
  });
});

// ── Async Mode Tests ────────────────────────────────────────────

describe('EventDispatcher (async)', () => {
  it('does not fire listeners synchronously', () => {
    const dispatcher = new EventDispatcher();
    let count = 0;
    dispatcher.on('segment.opened', () => { count++; });

    dispatcher.onSegmentOpened(opened);

    expect(count).toBe(0);
  });

  it('fires listeners in order after flush()', async () => {
    const dispatcher = new EventDispatcher({ mode: 'async' });
    const types: string[] = [];
    dispatcher.on('*', e => types.push(e.type));

    dispatcher.onSegmentOpened(opened);
    dispatcher.onSegmentRotated({ queue: 'q', from: 'a', to: 'b' });
    await dispatcher.flush();

    expect(types).toEqual(['segment.opened', 'segment.rotated']);
  });
});

// ── Every EventBus hook wired ───────────────────────────────────

describe('EventDispatcher covers all EventBus methods', () => {
  it('every hook fires the matching event type', () => {
    const dispatcher = new EventDispatcher({ mode: 'sync' });
    const received: string[] = [];
    dispatcher.on('*', e => received.push(e.type));

    const error = { code: '', message: '' };
    dispatcher.onSegmentOpened(opened);
    dispatcher.onSegmentRotated({ queue: '', from: '', to: '' });
    dispatcher.onSegmentClosed({ queue: '', filename: '', records: 0 });
    dispatcher.onSegmentsUnlinked({ queue: '', filenames: [] });
    dispatcher.onCheckpointLoaded({ queue: '', filename: '', index: 0 });
    dispatcher.onCheckpointSaved({ queue: '', filename: '', index: 0 });
    dispatcher.onCacheHit({ key: '', path: '' });
    dispatcher.onCacheMiss({ key: '', path: '' });
    dispatcher.onCacheWritten({ key: '', path: '', count: 0 });
    dispatcher.onCacheDiscarded({ key: '', path: '', reason: 'error' });
    dispatcher.onCacheCleared({ key: '', path: '' });
    dispatcher.onCacheReadFailed({ key: '', path: '', error });
    dispatcher.onCacheWriteFailed({ key: '', path: '', error });

    expect(received).toEqual([
      'segment.opened', 'segment.rotated', 'segment.closed', 'segments.unlinked',
      'checkpoint.loaded', 'checkpoint.saved',
      'cache.hit', 'cache.miss', 'cache.written', 'cache.discarded', 'cache.cleared',
      'cache.read_failed', 'cache.write_failed',
    ]);
  });
});

// ── Logging ─────────────────────────────────────────────────────

describe('logEvents', () => {
  it('formats fields after the event type', () => {
    const line = formatEvent({ type: 'segment.closed', timestamp: 1, queue: 'q', filename: 'q.x', records: 3 });
    expect(line).toBe('[diskspool] segment.closed queue=q filename=q.x records=3');
  });

  it('renders non-string fields as JSON', () => {
    const line = formatEvent({ type: 'cache.read_failed', timestamp: 1, key: 'k', error: { code: 'E', message: 'm' } });
    expect(line).toBe('[diskspool] cache.read_failed key=k error={"code":"E","message":"m"}');
  });

  it('writes one line per event until unsubscribed', () => {
    const dispatcher = new EventDispatcher({ mode: 'sync' });
    const lines: string[] = [];
    const stop = logEvents(dispatcher, line => lines.push(line));

    dispatcher.onSegmentsUnlinked({ queue: 'q', filenames: ['q.a', 'q.b'] });
    stop();
    dispatcher.onSegmentsUnlinked({ queue: 'q', filenames: [] });

    expect(lines).toEqual(['[diskspool] segments.unlinked queue=q filenames=["q.a","q.b"]']);
  });
});

// ── Integration: EventDispatcher as a Project's EventBus ────────

describe('EventDispatcher + Project integration', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('captures the segment and checkpoint lifecycle', () => {
    const dispatcher = new EventDispatcher({ mode: 'sync' });
    const events: DispatchedEvent[] = [];
    dispatcher.on('*', e => events.push(e));
    const clock = new FakeClock(0);
    const options = { rotationIntervalMs: 1000, clock: clock.now, events: dispatcher };

    Project.use(dir, project => {
      const sink = project.openSink('q');
      sink.writeDict({ n: 1 });
      clock.set(1000);
      sink.writeDict({ n: 2 });
    }, options);

    Project.use(dir, project => {
      [...project.continueSource('q')];
    }, options);

    expect(events.map(e => e.type)).toEqual([
      'segment.opened',
      'segment.closed',
      'segment.opened',
      'segment.rotated',
      'segment.closed',
      'checkpoint.saved',
    ]);
    expect(events[3]).toMatchObject({ queue: 'q', from: 'q.19700101T000000000Z', to: 'q.19700101T000001000Z' });
    expect(events[5]).toMatchObject({ queue: 'q', filename: 'q.19700101T000001000Z', index: 0 });
  });
});
