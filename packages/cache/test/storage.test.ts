/**
 * Storage and iterator helper tests.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { load, save, scan, tee } from '../src/storage';
import { countIter, first } from '../src/iter';

describe('storage', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'diskspool-storage-'));
    path = join(dir, 'values.bin');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads a saved value', () => {
    save(path, { name: 'alpha', tags: ['a', 'b'] });
    expect(load(path)).toEqual({ name: 'alpha', tags: ['a', 'b'] });
  });

  it('loads null for a missing file', () => {
    expect(load(path)).toBeNull();
  });

  it('appends when asked and overwrites otherwise', () => {
    save(path, 1);
    save(path, 2, { append: true });
    expect([...scan(path)]).toEqual([1, 2]);
    expect(load(path)).toBe(1);

    save(path, 3);
    expect([...scan(path)]).toEqual([3]);
  });

  it('scan throws for a missing file', () => {
    expect(() => [...scan(path)]).toThrow(/ENOENT/);
  });

  it('tee writes every value it passes through', () => {
    expect([...tee([1, 2, 3], path)]).toEqual([1, 2, 3]);
    expect([...scan(path)]).toEqual([1, 2, 3]);
  });

  it('tee keeps what was written when the caller stops early', () => {
    expect(first(tee([1, 2, 3], path))).toBe(1);
    expect([...scan(path)]).toEqual([1]);
  });

  it('tee removes the file when the source throws', () => {
    function* failing() {
      yield 1;
      throw new Error('boom');
    }
    expect(() => [...tee(failing(), path)]).toThrow('boom');
    expect(existsSync(path)).toBe(false);
  });
});

describe('first', () => {
  it('returns the first value', () => {
    expect(first([4, 5])).toBe(4);
    expect(first(new Set(['a']))).toBe('a');
  });

  it('returns null for empty or absent iterables', () => {
    expect(first([])).toBeNull();
    expect(first(null)).toBeNull();
    expect(first(undefined)).toBeNull();
  });

  it('takes one value from a generator', () => {
    function* counting() {
      yield 1;
      yield 2;
    }
    const values = counting();
    expect(first(values)).toBe(1);
    expect([...values]).toEqual([]);
  });
});

describe('countIter', () => {
  it('counts values', () => {
    expect(countIter([1, 2, 3])).toBe(3);
    expect(countIter(new Map([['a', 1]]))).toBe(1);
    expect(countIter(null)).toBe(0);
  });
});
