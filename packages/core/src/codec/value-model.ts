import type { QueueRecord, RecordValue } from '../types/record';

export interface ValueIssue {
  readonly path: string;
  readonly reason: string;
}

export function isRecordValue(value: unknown): value is RecordValue {
  return findValueIssue(value) === null;
}

export function isQueueRecord(value: unknown): value is QueueRecord {
  return isPlainObject(value) && findValueIssue(value) === null;
}

/** A decoded RecordValue that is a map, i.e. a queue record. */
export function isRecordMap(value: RecordValue): value is QueueRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk a value and report the first part that is not a RecordValue.
 * Paths use `$` for the root, `.key` for map entries and `[i]` for items.
 */
export function findValueIssue(value: unknown, path = '$'): ValueIssue | null {
  return walk(value, path, new Set());
}

function walk(value: unknown, path: string, ancestors: Set<object>): ValueIssue | null {
  if (value === null) return null;

  switch (typeof value) {
    case 'boolean':
    case 'number':
    case 'string':
      return null;
    case 'undefined':
      return { path, reason: 'undefined is not supported' };
    case 'bigint':
      return { path, reason: 'bigint is not supported' };
    case 'function':
    case 'symbol':
      return { path, reason: `${typeof value} is not supported` };
  }

  if (ancestors.has(value)) {
    return { path, reason: 'circular reference' };
  }

  if (Array.isArray(value)) {
    ancestors.add(value);
    for (let i = 0; i < value.length; i++) {
      const issue = walk(value[i], `${path}[${i}]`, ancestors);
      if (issue) return issue;
    }
    ancestors.delete(value);
    return null;
  }

  if (!isPlainObject(value)) {
    const name = value.constructor?.name ?? 'object';
    return { path, reason: `${name} is not supported, use plain objects and arrays` };
  }

  ancestors.add(value);
  for (const [key, item] of Object.entries(value)) {
    const issue = walk(item, `${path}.${key}`, ancestors);
    if (issue) return issue;
  }
  ancestors.delete(value);
  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
