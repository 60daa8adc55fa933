import type { DispatchedEvent, EventDispatcher } from './event-dispatcher';

/**
 * Print every dispatched event as one line:
 * `[diskspool] segment.rotated queue=jobs from=jobs.2026… to=jobs.2026…`
 *
 * Returns the unsubscribe function.
 */
export function logEvents(
  dispatcher: EventDispatcher,
  log: (line: string) => void = line => console.log(line)
): () => void {
  return dispatcher.on('*', event => log(formatEvent(event)));
}

export function formatEvent(event: DispatchedEvent): string {
  const fields = Object.entries(event)
    .filter(([key]) => key !== 'type' && key !== 'timestamp')
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return [`[diskspool] ${event.type}`, ...fields].join(' ');
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? String(value);
}
