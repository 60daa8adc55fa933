/**
 * DiskCache — replayable disk-backed iterables.
 *
 * The first call runs the producer and writes every value it yields to a
 * temporary file while handing it to the caller. Only when the producer is
 * exhausted is the file fsynced and renamed to its final name. Later calls
 * replay that file from the start without running the producer.
 *
 * Storage format:
 *   <baseDir>/diskspool_<key>.cache     — complete, codec-encoded values
 *   <baseDir>/diskspool_<key>.cache.tmp — pass in progress
 *
 * Failures degrade to recomputation:
 * - a temp file that cannot be created or written is dropped and the rest
 *   of the values pass through uncached (CacheWriteError, reported)
 * - a corrupt cache file, or one holding values `guard` rejects, is removed
 *   and the producer is run again (CacheReadError, reported)
 *
 * One pass per key at a time. Two iterables for the same key consumed
 * concurrently share one temp file; that use is not supported.
 *
 * Usage:
 * ```typescript
 * const rows = cachedIter({ baseDir: './cache', name: 'rows' })((day: string) => {
 *   return queryWarehouse(day);
 * });
 *
 * [...rows('2026-10-19')]; // runs the query, writes the cache
 * [...rows('2026-10-19')]; // reads the cache
 * rows.cacheClear('2026-10-19');
 * ```
 */

import { closeSync, existsSync, fsyncSync, mkdirSync, openSync, readFileSync, renameSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import {
  CacheReadError,
  CacheWriteError,
  ConfigError,
  MsgpackCodec,
  assertSettings,
  assertValidName,
  unlinkIfExists,
  validateCacheSettings,
  writeAll,
  type DiskSpoolError,
  type EventBus,
  type RecordCodec,
  type RecordValue,
} from '@diskspool/core';
import { shortDigest } from './digest';

export const CACHE_FILE_PREFIX = 'diskspool_';
export const CACHE_FILE_SUFFIX = '.cache';

export interface CacheOptions {
  /** Directory for cache files (default: the OS temp directory) */
  baseDir?: string;
  /** Producer identity digested into the key; one of name, key or location is required */
  name?: string;
  /** Fixed key; the arguments, if any, are digested and appended */
  key?: string;
  /** Full control over the cache file path, given the name and the call arguments */
  location?: (name: string, args: readonly unknown[]) => string;
  codec?: RecordCodec;
  events?: EventBus;
}

export interface DiskCacheOptions<T extends RecordValue> extends CacheOptions {
  /** Accepts values read back from the cache file; anything else is a corrupt cache */
  guard: (value: RecordValue) => value is T;
}

export type Producer<A extends unknown[], T> = (...args: A) => Iterable<T>;

export class DiskCache<A extends unknown[], T extends RecordValue> {
  readonly name: string;

  private readonly baseDir: string;
  private readonly key?: string;
  private readonly location?: (name: string, args: readonly unknown[]) => string;
  private readonly guard: (value: RecordValue) => value is T;
  private readonly codec: RecordCodec;
  private readonly events?: EventBus;

  constructor(
    private readonly producer: Producer<A, T>,
    options: DiskCacheOptions<T>
  ) {
    assertSettings(validateCacheSettings, { baseDir: options.baseDir, name: options.name });
    if (options.key !== undefined) assertValidName(options.key);

    // Bundlers rewrite Function.name, so it never feeds the key
    if (options.name === undefined && options.key === undefined && !options.location) {
      throw new ConfigError(['name, key or location is required']);
    }
    this.name = options.name ?? options.key ?? '';

    this.baseDir = options.baseDir ?? tmpdir();
    this.key = options.key;
    this.location = options.location;
    this.guard = options.guard;
    this.codec = options.codec ?? new MsgpackCodec();
    this.events = options.events;
  }

  /** Cache key for a call with `args`. */
  keyFor(...args: A): string {
    if (this.key === undefined) return shortDigest(this.name, ...args);
    return args.length === 0 ? this.key : `${this.key}_${shortDigest(...args)}`;
  }

  /** Path of the complete cache file for a call with `args`. */
  pathFor(...args: A): string {
    if (this.location) return this.location(this.name, args);
    return join(this.baseDir, `${CACHE_FILE_PREFIX}${this.keyFor(...args)}${CACHE_FILE_SUFFIX}`);
  }

  /**
   * Values of `producer(...args)`, from the cache file when there is a
   * complete one. Each call starts a fresh pass.
   */
  call(...args: A): Generator<T, void, undefined> {
    return this.run(args);
  }

  /**
   * Remove the cache file for `args`, complete or in progress.
   * Safe when there is none.
   */
  clear(...args: A): void {
    const key = this.keyFor(...args);
    const path = this.pathFor(...args);
    const removed = unlinkIfExists(path);
    unlinkIfExists(`${path}.tmp`);
    if (removed) this.events?.onCacheCleared?.({ key, path });
  }

  // --- Private ---

  private *run(args: A): Generator<T, void, undefined> {
    const key = this.keyFor(...args);
    const path = this.pathFor(...args);

    if (!existsSync(path)) {
      this.events?.onCacheMiss?.({ key, path });
      yield* this.populate(key, path, args, 0);
      return;
    }

    this.events?.onCacheHit?.({ key, path });
    let replayed = 0;
    try {
      for (const value of this.replay(path)) {
        yield value;
        replayed++;
      }
    } catch (err) {
      if (!(err instanceof CacheReadError)) throw err;
      this.events?.onCacheReadFailed?.({ key, path, error: describe(err) });
      unlinkIfExists(path);
      // The caller already has the first `replayed` values
      yield* this.populate(key, path, args, replayed);
    }
  }

  private *replay(path: string): Generator<T, void, undefined> {
    let bytes: Uint8Array;
    try {
      bytes = readFileSync(path);
    } catch (err) {
      throw new CacheReadError(path, 'cannot open', err);
    }

    const values = this.codec.decodeAll(bytes);
    while (true) {
      let step: IteratorResult<RecordValue, void>;
      try {
        step = values.next();
      } catch (err) {
        throw new CacheReadError(path, 'corrupt data', err);
      }
      if (step.done) return;
      if (!this.guard(step.value)) {
        throw new CacheReadError(path, 'value rejected by guard');
      }
      yield step.value;
    }
  }

  private *populate(key: string, path: string, args: A, skip: number): Generator<T, void, undefined> {
    const tmpPath = `${path}.tmp`;
    let fd = this.openTemp(key, path, tmpPath);
    let count = 0;
    let outcome: 'complete' | 'error' | 'incomplete' = 'incomplete';

    try {
      for (const value of this.producer(...args)) {
        if (fd !== null) {
          const bytes = this.codec.encode(value);
          try {
            writeAll(fd, bytes);
          } catch (err) {
            this.abandon(fd, tmpPath, key, path, new CacheWriteError(tmpPath, err));
            fd = null;
          }
        }
        count++;
        if (count > skip) yield value;
      }
      outcome = 'complete';
    } catch (err) {
      outcome = 'error';
      throw err;
    } finally {
      if (fd !== null) {
        if (outcome === 'complete') {
          this.promote(fd, tmpPath, key, path, count);
        } else {
          this.discard(fd, tmpPath, key, path, outcome);
        }
      }
    }
  }

  private openTemp(key: string, path: string, tmpPath: string): number | null {
    try {
      mkdirSync(dirname(path), { recursive: true });
      return openSync(tmpPath, 'w');
    } catch (err) {
      this.events?.onCacheWriteFailed?.({ key, path, error: describe(new CacheWriteError(tmpPath, err)) });
      return null;
    }
  }

  private promote(fd: number, tmpPath: string, key: string, path: string, count: number): void {
    let open = true;
    try {
      fsyncSync(fd);
      closeSync(fd);
      open = false;
      renameSync(tmpPath, path);
    } catch (err) {
      this.abandon(open ? fd : null, tmpPath, key, path, new CacheWriteError(path, err));
      return;
    }
    this.events?.onCacheWritten?.({ key, path, count });
  }

  private discard(fd: number, tmpPath: string, key: string, path: string, reason: 'error' | 'incomplete'): void {
    this.release(fd, tmpPath, key, path);
    this.events?.onCacheDiscarded?.({ key, path, reason });
  }

  private abandon(fd: number | null, tmpPath: string, key: string, path: string, error: CacheWriteError): void {
    this.events?.onCacheWriteFailed?.({ key, path, error: describe(error) });
    this.release(fd, tmpPath, key, path);
  }

  /**
   * Close and remove the temp file. Runs inside `finally` blocks, so its own
   * failures are reported instead of replacing the error in flight.
   */
  private release(fd: number | null, tmpPath: string, key: string, path: string): void {
    try {
      if (fd !== null) closeSync(fd);
      unlinkIfExists(tmpPath);
    } catch (err) {
      this.events?.onCacheWriteFailed?.({ key, path, error: describe(new CacheWriteError(tmpPath, err)) });
    }
  }
}

function describe(err: DiskSpoolError): { code: string; message: string } {
  return { code: err.code, message: err.message };
}

// ── Decorator-style wrappers ────────────────────────────────────

/** A producer wrapped by `cachedIter`; call it like the producer. */
export type CachedIter<A extends unknown[], T extends RecordValue> = ((...args: A) => Generator<T, void, undefined>) & {
  /** Remove the cache file for these arguments */
  cacheClear(...args: A): void;
  /** The underlying cache handle */
  readonly cache: DiskCache<A, T>;
};

const acceptAny = (_value: RecordValue): _value is RecordValue => true;

/**
 * Wrap a producer of record values in a DiskCache.
 *
 * ```typescript
 * const numbers = cachedIter({ baseDir, name: 'numbers' })(function* () {
 *   yield 1;
 *   yield 2;
 * });
 * ```
 */
export function cachedIter(
  options: CacheOptions = {}
): <A extends unknown[]>(producer: Producer<A, RecordValue>) => CachedIter<A, RecordValue> {
  return producer => wrap(new DiskCache(producer, { ...options, guard: acceptAny }));
}

/**
 * Like `cachedIter`, with values read back from the cache checked by
 * `guard` and typed accordingly.
 */
export function cachedIterOf<T extends RecordValue>(
  guard: (value: RecordValue) => value is T,
  options: CacheOptions = {}
): <A extends unknown[]>(producer: Producer<A, T>) => CachedIter<A, T> {
  return producer => wrap(new DiskCache(producer, { ...options, guard }));
}

function wrap<A extends unknown[], T extends RecordValue>(cache: DiskCache<A, T>): CachedIter<A, T> {
  const call = (...args: A): Generator<T, void, undefined> => cache.call(...args);
  return Object.assign(call, {
    cacheClear: (...args: A): void => cache.clear(...args),
    cache,
  });
}
