/** Millisecond wall clock. Injected wherever rotation or timestamps depend on time. */
export type Clock = () => number;

export function now(): number {
  return Date.now();
}
