/**
 * Example 01 — Queue Round Trip
 *
 * Demonstrates:
 * - Writing records through a Sink
 * - Resuming with continueSource across Project scopes
 * - Cleaning up consumed segments with unlinkTo
 * - Logging segment events with logEvents
 */

import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EventDispatcher, Project, logEvents } from '@diskspool/core';

function main(): void {
  const dir = mkdtempSync(join(tmpdir(), 'diskspool-example-'));
  const dispatcher = new EventDispatcher({ mode: 'sync' });
  logEvents(dispatcher);

  // Producer side
  Project.use(dir, project => {
    const orders = project.openSink('orders');
    for (let id = 1; id <= 5; id++) {
      orders.writeDict({ id, total: id * 10 });
    }
  }, { events: dispatcher });

  // First consumer pass stops after two records
  Project.use(dir, project => {
    let handled = 0;
    for (const [, , order] of project.continueSource('orders')) {
      console.log('  handled', order);
      if (++handled === 2) break;
    }
  }, { events: dispatcher });

  // Second pass picks up at record three and removes what it finished
  Project.use(dir, project => {
    const source = project.continueSource('orders');
    for (const [, , order] of source) {
      console.log('  handled', order);
    }
    console.log('  removed', source.unlinkTo());
  }, { events: dispatcher });
}

main();
