import { createHash } from 'node:crypto';

/**
 * JSON with object keys sorted, so equal arguments give equal keys
 * regardless of property order. `undefined` is kept distinct from `null`.
 */
export function stableStringify(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (typeof value === 'bigint') return `${value}n`;
  if (Array.isArray(value)) {
    return `[${value.map(item => stableStringify(item)).join(',')}]`;
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
  }
  throw new TypeError(`Cannot derive a cache key from a ${typeof value}`);
}

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

/**
 * Digest function returning `digestSize` bytes of hex.
 *
 * ```typescript
 * shortDigester(4)('hello'); // 8 hex characters
 * ```
 */
export function shortDigester(digestSize = 8): (...values: unknown[]) => string {
  return (...values) => sha256Hex(stableStringify(values)).slice(0, digestSize * 2);
}

/** 16 hex characters identifying the given values. */
export const shortDigest = shortDigester();
