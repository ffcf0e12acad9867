/**
 * Status Projection
 * Read-only views computed from a day's orders on demand.
 */

import type { BusinessCalendar, DayKey } from '../../lib/time/business-calendar.js';
import type { OrderLedger } from './order-ledger.interface.js';
import type { Order, OrderStatus } from './order.types.js';
import { SERVING_STATUSES } from './order-status.js';

export interface StatusSummary extends Record<OrderStatus, number> {
  day: DayKey;
  total: number;
  currentlyServing: number | null;
}

/**
 * Lowest queue number among orders being prepared or ready for pickup.
 * Pending and completed orders never count.
 */
export function computeCurrentlyServing(orders: readonly Order[]): number | null {
  let serving: number | null = null;
  for (const order of orders) {
    if (SERVING_STATUSES.has(order.status) && (serving === null || order.queueNumber < serving)) {
      serving = order.queueNumber;
    }
  }
  return serving;
}

export function summarizeOrders(day: DayKey, orders: readonly Order[]): StatusSummary {
  const counts: Record<OrderStatus, number> = { pending: 0, preparing: 0, ready: 0, completed: 0 };
  for (const order of orders) {
    counts[order.status]++;
  }
  return {
    day,
    total: orders.length,
    ...counts,
    currentlyServing: computeCurrentlyServing(orders)
  };
}

export class StatusProjection {
  constructor(
    private readonly ledger: OrderLedger,
    private readonly calendar: BusinessCalendar
  ) {}

  async currentlyServing(day: DayKey = this.calendar.today()): Promise<number | null> {
    return computeCurrentlyServing(await this.ledger.listByDay(day));
  }

  async summarize(day: DayKey = this.calendar.today()): Promise<StatusSummary> {
    return summarizeOrders(day, await this.ledger.listByDay(day));
  }
}
