import {
  accessSync,
  closeSync,
  constants,
  fsyncSync,
  mkdirSync,
  openSync,
  renameSync,
  unlinkSync,
  writeSync,
} from 'node:fs';
import { DirectoryError } from '../types/errors';

/** The `code` of a Node.js system error, if it is one. */
export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Create `dir` (and parents) and check it is writable. */
export function ensureWritableDir(dir: string): void {
  try {
    mkdirSync(dir, { recursive: true });
    accessSync(dir, constants.W_OK);
  } catch (err) {
    throw new DirectoryError(dir, err);
  }
}

/** Write every byte; writeSync may accept fewer than asked. */
export function writeAll(fd: number, bytes: Uint8Array): void {
  let offset = 0;
  while (offset < bytes.byteLength) {
    offset += writeSync(fd, bytes, offset, bytes.byteLength - offset);
  }
}

/** Remove a file; returns false when it was already gone. */
export function unlinkIfExists(path: string): boolean {
  try {
    unlinkSync(path);
    return true;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return false;
    throw err;
  }
}

/**
 * Replace `path` with `bytes` so that readers only ever see the old or the
 * new content: write `<path>.tmp`, fsync, rename over `path`.
 */
export function atomicWriteFileSync(path: string, bytes: Uint8Array): void {
  const tmpPath = `${path}.tmp`;
  const fd = openSync(tmpPath, 'w');
  try {
    writeAll(fd, bytes);
    fsyncSync(fd);
  } catch (err) {
    closeSync(fd);
    unlinkIfExists(tmpPath);
    throw err;
  }
  closeSync(fd);
  try {
    renameSync(tmpPath, path);
  } catch (err) {
    unlinkIfExists(tmpPath);
    throw err;
  }
}
