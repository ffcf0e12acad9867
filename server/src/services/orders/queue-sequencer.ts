/**
 * Queue Sequencer
 *
 * Next queue number for a day = 1 + max(queue numbers of that day), or 1.
 * Ledgers call this inside their per-day atomic unit; on its own
 * `nextNumber` is only a preview and reserves nothing.
 */

import type { DayKey } from '../../lib/time/business-calendar.js';

export interface QueueSequencer {
  nextNumber(day: DayKey): Promise<number>;
}

export function nextQueueNumber(queueNumbers: Iterable<number>): number {
  let max = 0;
  for (const queueNumber of queueNumbers) {
    if (queueNumber > max) {
      max = queueNumber;
    }
  }
  return max + 1;
}
