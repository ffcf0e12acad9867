/**
 * In-Memory Order Ledger
 * Single-process store; check-then-insert runs under a per-day keyed mutex.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { KeyedMutex } from '../../lib/concurrency/keyed-mutex.js';
import type { BusinessCalendar, DayKey } from '../../lib/time/business-calendar.js';
import type { OrderLedger, StatusWriteResult } from './order-ledger.interface.js';
import type { NewOrder, Order, OrderStatus } from './order.types.js';
import { INITIAL_STATUS } from './order-status.js';
import { nextQueueNumber } from './queue-sequencer.js';
import { DuplicateOrderError } from './order.errors.js';

function deviceKey(deviceId: string, day: DayKey): string {
  return `${day}\u0000${deviceId}`;
}

function copyOrder(order: Order): Order {
  return { ...order, items: order.items.map((item) => ({ ...item })) };
}

export class InMemoryOrderLedger implements OrderLedger {
  readonly backend = 'memory' as const;

  private orders = new Map<number, Order>();
  private byDevice = new Map<string, number>();
  private lastId = 0;
  private readonly dayLocks = new KeyedMutex();

  constructor(private readonly calendar: BusinessCalendar) {
    logger.info({ msg: '[InMemoryOrderLedger] Initialized' });
  }

  async findActiveOrder(deviceId: string, day: DayKey): Promise<Order | null> {
    const orderId = this.byDevice.get(deviceKey(deviceId, day));
    const order = orderId === undefined ? undefined : this.orders.get(orderId);
    return order ? copyOrder(order) : null;
  }

  async nextNumber(day: DayKey): Promise<number> {
    return nextQueueNumber(this.queueNumbersOf(day));
  }

  createOrder(draft: NewOrder): Promise<Order> {
    const day = this.calendar.dayOf(draft.createdAt);

    return this.dayLocks.runExclusive(day, () => {
      const key = deviceKey(draft.deviceId, day);
      const existingId = this.byDevice.get(key);
      const existing = existingId === undefined ? undefined : this.orders.get(existingId);
      if (existing) {
        throw new DuplicateOrderError(copyOrder(existing));
      }

      const order: Order = {
        id: ++this.lastId,
        queueNumber: nextQueueNumber(this.queueNumbersOf(day)),
        deviceId: draft.deviceId,
        items: draft.items.map((item) => ({ ...item })),
        status: INITIAL_STATUS,
        createdAt: draft.createdAt,
        day,
        notes: draft.notes
      };

      this.orders.set(order.id, order);
      this.byDevice.set(key, order.id);

      logger.debug({
        orderId: order.id,
        queueNumber: order.queueNumber,
        day,
        msg: '[InMemoryOrderLedger] Order created'
      });

      return copyOrder(order);
    });
  }

  async getById(orderId: number): Promise<Order | null> {
    const order = this.orders.get(orderId);
    return order ? copyOrder(order) : null;
  }

  async setStatus(orderId: number, status: OrderStatus, expectedFrom?: OrderStatus): Promise<StatusWriteResult> {
    const order = this.orders.get(orderId);
    if (!order) {
      return { outcome: 'not_found' };
    }
    if (expectedFrom !== undefined && order.status !== expectedFrom) {
      return { outcome: 'conflict', current: copyOrder(order) };
    }
    order.status = status;
    return { outcome: 'updated', order: copyOrder(order) };
  }

  clearOrder(deviceId: string, day: DayKey): Promise<boolean> {
    return this.dayLocks.runExclusive(day, () => {
      const key = deviceKey(deviceId, day);
      const orderId = this.byDevice.get(key);
      if (orderId === undefined) {
        return false;
      }
      this.byDevice.delete(key);
      this.orders.delete(orderId);
      return true;
    });
  }

  async listByDay(day: DayKey): Promise<Order[]> {
    return [...this.orders.values()]
      .filter((order) => order.day === day)
      .sort((a, b) => a.queueNumber - b.queueNumber)
      .map(copyOrder);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  private *queueNumbersOf(day: DayKey): Iterable<number> {
    for (const order of this.orders.values()) {
      if (order.day === day) {
        yield order.queueNumber;
      }
    }
  }
}
