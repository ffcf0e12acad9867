/**
 * Order Service
 *
 * Customer operations resolve the device identity first, then act on the
 * device's order for today. Staff operations act on explicit order ids.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import type { BusinessCalendar } from '../../lib/time/business-calendar.js';
import type { DeviceIdentityResolver } from '../identity/device-identity.resolver.js';
import type { MenuCatalog, MenuItem } from '../menu/menu.types.js';
import type { OrderLedger } from './order-ledger.interface.js';
import type { Order, OrderStatus, OrderSubmission } from './order.types.js';
import { StatusProjection, type StatusSummary } from './status-projection.js';
import { unrestrictedPolicy, type StatusPolicy } from './order-status.js';
import {
  DuplicateOrderError,
  InvalidStatusTransitionError,
  OrderNotFoundError,
  UnknownMenuItemError
} from './order.errors.js';

const MAX_STATUS_WRITE_ATTEMPTS = 3;

export interface OrderServiceDeps {
  ledger: OrderLedger;
  menu: MenuCatalog;
  resolver: DeviceIdentityResolver;
  calendar: BusinessCalendar;
  statusPolicy?: StatusPolicy;
  /** Reject items whose name is not an available menu item */
  requireMenuItems?: boolean;
}

export interface SubmitResult {
  order: Order;
  alreadyOrdered: boolean;
}

export class OrderService {
  private readonly ledger: OrderLedger;
  private readonly menu: MenuCatalog;
  private readonly resolver: DeviceIdentityResolver;
  private readonly calendar: BusinessCalendar;
  private readonly projection: StatusProjection;
  private readonly statusPolicy: StatusPolicy;
  private readonly requireMenuItems: boolean;

  constructor(deps: OrderServiceDeps) {
    this.ledger = deps.ledger;
    this.menu = deps.menu;
    this.resolver = deps.resolver;
    this.calendar = deps.calendar;
    this.projection = new StatusProjection(deps.ledger, deps.calendar);
    this.statusPolicy = deps.statusPolicy ?? unrestrictedPolicy;
    this.requireMenuItems = deps.requireMenuItems ?? false;
  }

  // ==========================================================================
  // Customer
  // ==========================================================================

  listMenu(): Promise<MenuItem[]> {
    return this.menu.listAvailable();
  }

  currentlyServing(): Promise<number | null> {
    return this.projection.currentlyServing(this.calendar.today());
  }

  /**
   * Place today's order for the device, or return the one it already has.
   */
  async submit(address: string, submission: OrderSubmission): Promise<SubmitResult> {
    const deviceId = await this.resolver.resolve(address);
    const day = this.calendar.today();

    const existing = await this.ledger.findActiveOrder(deviceId, day);
    if (existing) {
      logger.info({
        deviceId,
        orderId: existing.id,
        queueNumber: existing.queueNumber,
        msg: '[OrderService] Device already ordered today'
      });
      return { order: existing, alreadyOrdered: true };
    }

    if (this.requireMenuItems) {
      await this.assertOnMenu(submission);
    }

    try {
      const order = await this.ledger.createOrder({
        deviceId,
        items: submission.items,
        notes: submission.notes,
        createdAt: this.calendar.nowSeconds()
      });

      logger.info({
        deviceId,
        orderId: order.id,
        queueNumber: order.queueNumber,
        itemCount: order.items.length,
        msg: '[OrderService] Order created'
      });

      return { order, alreadyOrdered: false };
    } catch (err) {
      // Lost a race against a concurrent submission from the same device
      if (err instanceof DuplicateOrderError) {
        return { order: err.existing, alreadyOrdered: true };
      }
      throw err;
    }
  }

  /**
   * @throws OrderNotFoundError when the device has no order today
   */
  async status(address: string): Promise<Order> {
    const deviceId = await this.resolver.resolve(address);
    const order = await this.ledger.findActiveOrder(deviceId, this.calendar.today());
    if (!order) {
      throw new OrderNotFoundError();
    }
    return order;
  }

  /**
   * Idempotent; clearing without an order is a no-op
   */
  async clear(address: string): Promise<boolean> {
    const deviceId = await this.resolver.resolve(address);
    const cleared = await this.ledger.clearOrder(deviceId, this.calendar.today());

    logger.info({ deviceId, cleared, msg: '[OrderService] Order cleared' });

    return cleared;
  }

  // ==========================================================================
  // Staff
  // ==========================================================================

  listToday(): Promise<Order[]> {
    return this.ledger.listByDay(this.calendar.today());
  }

  summary(): Promise<StatusSummary> {
    return this.projection.summarize(this.calendar.today());
  }

  /**
   * Policy check and write form a compare-and-set on the status that was
   * checked; a concurrent change sends the request back through the policy.
   *
   * @throws OrderNotFoundError for unknown ids
   * @throws InvalidStatusTransitionError when the policy rejects the move
   */
  async updateStatus(orderId: number, status: OrderStatus): Promise<Order> {
    let current = await this.ledger.getById(orderId);

    for (let attempt = 1; ; attempt++) {
      if (!current) {
        throw new OrderNotFoundError(`Order ${orderId} not found`);
      }

      if (!this.statusPolicy.allows(current.status, status)) {
        logger.warn({
          orderId,
          from: current.status,
          to: status,
          policy: this.statusPolicy.name,
          msg: '[OrderService] Status transition rejected'
        });
        throw new InvalidStatusTransitionError(current.status, status);
      }

      const result = await this.ledger.setStatus(orderId, status, current.status);

      if (result.outcome === 'updated') {
        logger.info({
          orderId,
          queueNumber: result.order.queueNumber,
          from: current.status,
          to: status,
          msg: '[OrderService] Status updated'
        });
        return result.order;
      }

      // Cleared between the read and the write
      if (result.outcome === 'not_found') {
        throw new OrderNotFoundError(`Order ${orderId} not found`);
      }

      if (attempt >= MAX_STATUS_WRITE_ATTEMPTS) {
        throw new InvalidStatusTransitionError(result.current.status, status);
      }

      logger.debug({
        orderId,
        expected: current.status,
        actual: result.current.status,
        msg: '[OrderService] Status changed concurrently, re-checking'
      });
      current = result.current;
    }
  }

  private async assertOnMenu(submission: OrderSubmission): Promise<void> {
    const unknown: string[] = [];
    for (const item of submission.items) {
      const menuItem = await this.menu.findByName(item.name);
      if (!menuItem || !menuItem.available) {
        unknown.push(item.name);
      }
    }
    if (unknown.length > 0) {
      throw new UnknownMenuItemError(unknown);
    }
  }
}
