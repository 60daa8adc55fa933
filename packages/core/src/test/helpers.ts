/**
 * Shared test helpers: scratch directories and a hand-driven clock.
 */
import { mkdtempSync, readdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export function createTempDir(prefix = 'diskspool-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Directory entries, sorted, without state folders. */
export function listFiles(dir: string): string[] {
  return readdirSync(dir).filter(name => name !== 'state').sort();
}

export class FakeClock {
  constructor(public time = 0) {}

  readonly now = (): number => this.time;

  set(time: number): void {
    this.time = time;
  }
}
