/**
 * Example 01 — Cached Iterables
 *
 * Demonstrates:
 * - Wrapping a producer with cachedIter
 * - Replaying a complete cache file on later calls
 * - Typed replays with cachedIterOf and a guard
 * - Clearing a cached call
 */

import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EventDispatcher, logEvents, type RecordValue } from '@diskspool/core';
import { cachedIter, cachedIterOf } from '@diskspool/cache';

function main(): void {
  const baseDir = mkdtempSync(join(tmpdir(), 'diskspool-cache-example-'));
  const events = new EventDispatcher({ mode: 'sync' });
  logEvents(events);

  const squares = cachedIter({ baseDir, events, name: 'squares' })(function* (n: number) {
    console.log(`  computing ${n} squares`);
    for (let i = 1; i <= n; i++) yield i * i;
  });

  console.log([...squares(4)]);
  console.log([...squares(4)]);
  squares.cacheClear(4);

  const isRow = (value: RecordValue): value is { day: string; rides: number } =>
    typeof value === 'object' && value !== null && !Array.isArray(value) &&
    typeof value.day === 'string' && typeof value.rides === 'number';

  const rides = cachedIterOf(isRow, { baseDir, events, name: 'rides' })(function* (days: string[]) {
    for (const day of days) yield { day, rides: day.length * 100 };
  });

  let total = 0;
  for (const row of rides(['mon', 'tue'])) total += row.rides;
  for (const row of rides(['mon', 'tue'])) total += row.rides;
  console.log('  total rides', total);
}

main();
