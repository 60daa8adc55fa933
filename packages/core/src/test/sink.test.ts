/**
 * Sink Tests
 *
 * - Writes within one boundary share a segment
 * - Crossing a boundary rotates to a new, later-sorting segment
 * - Restarting inside a boundary appends to the same segment
 * - Clock going backwards never reopens an older segment
 * - Closed sinks refuse writes
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { Sink } from '../impl/sink';
import { MsgpackCodec } from '../codec/msgpack-codec';
import { EventDispatcher, type DispatchedEvent } from '../impl/event-dispatcher';
import { ClosedSinkError, CodecError, ConfigError } from '../types/errors';
import { createTempDir, removeDir, listFiles, FakeClock } from './helpers';

const codec = new MsgpackCodec();

function readSegment(dir: string, filename: string): unknown[] {
  return [...codec.decodeAll(readFileSync(join(dir, filename)))];
}

describe('Sink', () => {
  let dir: string;
  let clock: FakeClock;

  beforeEach(() => {
    dir = createTempDir();
    clock = new FakeClock(500);
  });

  afterEach(() => {
    removeDir(dir);
  });

  function openSink(): Sink {
    return new Sink(dir, 'q', { rotationIntervalMs: 1000, clock: clock.now });
  }

  it('keeps writes of one boundary in one segment', () => {
    const sink = openSink();
    sink.writeDict({ a: 1 });
    clock.set(999);
    sink.writeDict({ b: 2 });
    sink.close();

    expect(listFiles(dir)).toEqual(['q.19700101T000000000Z']);
    expect(readSegment(dir, 'q.19700101T000000000Z')).toEqual([{ a: 1 }, { b: 2 }]);
    expect(sink.written).toBe(2);
  });

  it('rotates when a write crosses a boundary', () => {
    const sink = openSink();
    sink.writeDict({ a: 1 });
    clock.set(1500);
    sink.writeDict({ b: 2 });
    expect(sink.currentSegment).toBe('q.19700101T000001000Z');
    sink.close();

    expect(listFiles(dir)).toEqual(['q.19700101T000000000Z', 'q.19700101T000001000Z']);
    expect(readSegment(dir, 'q.19700101T000000000Z')).toEqual([{ a: 1 }]);
    expect(readSegment(dir, 'q.19700101T000001000Z')).toEqual([{ b: 2 }]);
  });

  it('skips boundaries with no writes', () => {
    const sink = openSink();
    sink.writeDict({ a: 1 });
    clock.set(5_200);
    sink.writeDict({ b: 2 });
    sink.close();

    expect(listFiles(dir)).toEqual(['q.19700101T000000000Z', 'q.19700101T000005000Z']);
  });

  it('appends to the same segment after a restart inside the boundary', () => {
    const first = openSink();
    first.writeDict({ run: 1 });
    first.close();

    clock.set(700);
    const second = openSink();
    second.writeDict({ run: 2 });
    second.close();

    expect(listFiles(dir)).toEqual(['q.19700101T000000000Z']);
    expect(readSegment(dir, 'q.19700101T000000000Z')).toEqual([{ run: 1 }, { run: 2 }]);
  });

  it('keeps the current segment when the clock goes backwards', () => {
    const sink = openSink();
    clock.set(2_100);
    sink.writeDict({ a: 1 });
    clock.set(400);
    sink.writeDict({ b: 2 });
    sink.close();

    expect(listFiles(dir)).toEqual(['q.19700101T000002000Z']);
    expect(readSegment(dir, 'q.19700101T000002000Z')).toEqual([{ a: 1 }, { b: 2 }]);
  });

  it('creates no segment until the first write', () => {
    const sink = openSink();
    sink.close();
    expect(listFiles(dir)).toEqual([]);
    expect(sink.currentSegment).toBeNull();
  });

  it('rejects an unencodable record without opening a segment', () => {
    const sink = openSink();
    const record = JSON.parse('{"a": 1}');
    record.b = undefined;

    expect(() => sink.writeDict(record)).toThrow(CodecError);
    expect(listFiles(dir)).toEqual([]);
    expect(sink.written).toBe(0);
  });

  it('refuses writes after close, and close is repeatable', () => {
    const sink = openSink();
    sink.writeDict({ a: 1 });
    sink.close();
    sink.close();

    expect(sink.isClosed).toBe(true);
    expect(() => sink.writeDict({ b: 2 })).toThrow(ClosedSinkError);
    expect(readSegment(dir, 'q.19700101T000000000Z')).toEqual([{ a: 1 }]);
  });

  it('validates the rotation interval', () => {
    expect(() => new Sink(dir, 'q', { rotationIntervalMs: 0 })).toThrow(ConfigError);
    expect(() => new Sink(dir, 'q', { rotationIntervalMs: 1.5 })).toThrow('/rotationIntervalMs must be integer');
  });

  it('writes through syncOnWrite', () => {
    const sink = new Sink(dir, 'q', { rotationIntervalMs: 1000, clock: clock.now, syncOnWrite: true });
    sink.writeDict({ a: 1 });
    sink.close();
    expect(readSegment(dir, 'q.19700101T000000000Z')).toEqual([{ a: 1 }]);
  });

  it('reports open, rotate and close', () => {
    const dispatcher = new EventDispatcher({ mode: 'sync' });
    const events: DispatchedEvent[] = [];
    dispatcher.on('*', e => events.push(e));

    const sink = new Sink(dir, 'q', { rotationIntervalMs: 1000, clock: clock.now, events: dispatcher });
    sink.writeDict({ a: 1 });
    clock.set(1000);
    sink.writeDict({ b: 2 });
    sink.writeDict({ c: 3 });
    sink.close();

    expect(events.map(e => e.type)).toEqual([
      'segment.opened',
      'segment.closed',
      'segment.opened',
      'segment.rotated',
      'segment.closed',
    ]);
    expect(events[3]).toMatchObject({ queue: 'q', from: 'q.19700101T000000000Z', to: 'q.19700101T000001000Z' });
    expect(events[4]).toMatchObject({ filename: 'q.19700101T000001000Z', records: 2 });
  });
});
