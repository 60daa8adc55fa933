import { InvalidNameError } from '../types/errors';

/**
 * Reject names that cannot be used as a single path component.
 * Names starting with a dot are reserved for checkpoint and temp files.
 */
export function assertValidName(name: string): void {
  if (name.length === 0) throw new InvalidNameError(name, 'must not be empty');
  if (name === '.' || name === '..') throw new InvalidNameError(name, 'reserved path component');
  if (name.startsWith('.')) throw new InvalidNameError(name, 'must not start with "."');
  if (/[/\\\0]/.test(name)) throw new InvalidNameError(name, 'must not contain path separators or NUL');
}

// ── Segment names ───────────────────────────────────────────────

const STAMP_PATTERN = '\\d{8}T\\d{9}Z';

/** Start of the rotation boundary containing `at`. */
export function boundaryStart(at: number, intervalMs: number): number {
  return Math.floor(at / intervalMs) * intervalMs;
}

/** `20261019T162000000Z` — UTC, fixed width, sorts chronologically. */
export function formatStamp(at: number): string {
  return new Date(at).toISOString().replace(/[-:.]/g, '');
}

export function segmentName(queue: string, boundary: number): string {
  return `${queue}.${formatStamp(boundary)}`;
}

/** Build a matcher for segment names of exactly this queue. */
export function segmentMatcher(queue: string): (filename: string) => boolean {
  const escaped = queue.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const pattern = new RegExp(`^${escaped}\\.${STAMP_PATTERN}$`);
  return filename => pattern.test(filename);
}
