/** First value of `iterable`, or null when it is empty or absent. */
export function first<T>(iterable: Iterable<T> | null | undefined): T | null {
  if (iterable == null) return null;
  for (const value of iterable) return value;
  return null;
}

/** Number of values in `iterable`; consumes it. */
export function countIter(iterable: Iterable<unknown> | null | undefined): number {
  if (iterable == null) return 0;
  let count = 0;
  for (const _ of iterable) count++;
  return count;
}
