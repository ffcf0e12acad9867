/**
 * Order Ledger Interface - Storage Abstraction
 * Allows switching between InMemory and Redis implementations
 *
 * Invariants every implementation upholds:
 * - at most one order per (deviceId, day)
 * - queue number assignment and insert happen in one atomic unit per day
 * - setStatus never resurrects an order cleared concurrently
 * - setStatus with expectedFrom writes only if the stored status still matches
 */

import type { DayKey } from '../../lib/time/business-calendar.js';
import type { QueueSequencer } from './queue-sequencer.js';
import type { NewOrder, Order, OrderStatus } from './order.types.js';

export type StatusWriteResult =
  | { outcome: 'updated'; order: Order }
  | { outcome: 'conflict'; current: Order }
  | { outcome: 'not_found' };

export interface OrderLedger extends QueueSequencer {
  readonly backend: 'memory' | 'redis';

  findActiveOrder(deviceId: string, day: DayKey): Promise<Order | null>;

  /**
   * Insert with the next queue number of the order's day
   * @throws DuplicateOrderError when the device already ordered that day
   */
  createOrder(order: NewOrder): Promise<Order>;

  getById(orderId: number): Promise<Order | null>;

  /**
   * Compare-and-set when `expectedFrom` is given, overwrite otherwise.
   * Transition rules live in the service.
   */
  setStatus(orderId: number, status: OrderStatus, expectedFrom?: OrderStatus): Promise<StatusWriteResult>;

  /**
   * @returns true if an order was deleted
   */
  clearOrder(deviceId: string, day: DayKey): Promise<boolean>;

  /** Orders of the day, queue number ascending */
  listByDay(day: DayKey): Promise<Order[]>;

  /** Liveness of the underlying store, for /ready */
  ping(): Promise<boolean>;
}
