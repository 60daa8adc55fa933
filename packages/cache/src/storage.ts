/**
 * Single-file helpers: one codec-encoded value, or a stream of them,
 * at a path of the caller's choosing. No temp file, no rename; use a
 * DiskCache when a half-written file must never be read back.
 */

import { closeSync, openSync, readFileSync, writeFileSync } from 'node:fs';
import {
  MsgpackCodec,
  errorCode,
  unlinkIfExists,
  writeAll,
  type RecordCodec,
  type RecordValue,
} from '@diskspool/core';

export interface StorageOptions {
  codec?: RecordCodec;
  /** Add to the end of the file instead of replacing it (default: false) */
  append?: boolean;
}

/** Write `value` to `path`. */
export function save(path: string, value: RecordValue, options: StorageOptions = {}): void {
  const codec = options.codec ?? new MsgpackCodec();
  writeFileSync(path, codec.encode(value), { flag: options.append ? 'a' : 'w' });
}

/** First value stored at `path`, or null when there is no such file. */
export function load(path: string, options: Pick<StorageOptions, 'codec'> = {}): RecordValue | null {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null;
    throw err;
  }
  const codec = options.codec ?? new MsgpackCodec();
  for (const value of codec.decodeAll(bytes)) return value;
  return null;
}

/** Every value stored at `path`, in write order. */
export function* scan(path: string, options: Pick<StorageOptions, 'codec'> = {}): Generator<RecordValue, void, undefined> {
  const codec = options.codec ?? new MsgpackCodec();
  yield* codec.decodeAll(readFileSync(path));
}

/**
 * Pass `iterable` through while writing each value to `path`.
 *
 * When `iterable` throws, the file is removed and the error rethrown.
 * When the caller stops early, the values written so far stay.
 */
export function* tee<T extends RecordValue>(
  iterable: Iterable<T>,
  path: string,
  options: Pick<StorageOptions, 'codec'> = {}
): Generator<T, void, undefined> {
  const codec = options.codec ?? new MsgpackCodec();
  const fd = openSync(path, 'w');
  let failed = false;
  try {
    for (const value of iterable) {
      writeAll(fd, codec.encode(value));
      yield value;
    }
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    closeSync(fd);
    if (failed) unlinkIfExists(path);
  }
}
