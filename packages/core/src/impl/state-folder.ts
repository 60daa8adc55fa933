/**
 * StateFolder — a directory for a consumer's own files, plus a small
 * string-to-string `vars` map persisted beside them.
 *
 * Storage format:
 *   <path>/vars.msgpack — codec-encoded map, written on close
 *
 * `vars.msgpack` is only written when its content changed, and never
 * created for an empty map.
 */

import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { RecordCodec } from '../interfaces/codec';
import { CodecError } from '../types/errors';
import { MsgpackCodec } from '../codec/msgpack-codec';
import { atomicWriteFileSync, ensureWritableDir, validateVars } from '../utils';

export const VARS_FILENAME = 'vars.msgpack';

export interface StateFolderOptions {
  codec?: RecordCodec;
}

export class StateFolder {
  vars: Record<string, string> = {};

  private readonly codec: RecordCodec;
  private readContents: Uint8Array = new Uint8Array(0);

  /**
   * Open the folder at `path`, creating it if it does not exist.
   */
  constructor(
    readonly path: string,
    options: StateFolderOptions = {}
  ) {
    this.codec = options.codec ?? new MsgpackCodec();
    this.open();
  }

  /** (Re)load `vars` from disk, discarding unsaved changes. */
  open(): void {
    ensureWritableDir(this.path);
    this.vars = {};
    this.readContents = new Uint8Array(0);

    const varsPath = this.child(VARS_FILENAME);
    if (!existsSync(varsPath)) return;

    const contents = readFileSync(varsPath);
    const decoded = this.codec.decode(contents);
    if (!validateVars(decoded)) {
      throw new CodecError(varsPath, 'vars must map strings to strings');
    }
    this.vars = { ...decoded };
    this.readContents = contents;
  }

  child(subPath: string): string {
    return join(this.path, subPath);
  }

  createPath(subPath: string): string {
    const fullPath = this.child(subPath);
    mkdirSync(fullPath, { recursive: true });
    return fullPath;
  }

  /**
   * Flush `vars` to disk.
   */
  close(): void {
    const varsPath = this.child(VARS_FILENAME);
    if (Object.keys(this.vars).length === 0 && !existsSync(varsPath)) return;

    const contents = this.codec.encode(this.vars);
    if (!Buffer.from(contents).equals(this.readContents)) {
      atomicWriteFileSync(varsPath, contents);
      this.readContents = contents;
    }
  }
}
