/**
 * Order domain errors
 * Each maps to one HTTP status through the error middleware.
 */

import { AppError } from '../../middleware/error.middleware.js';
import type { Order, OrderStatus } from './order.types.js';

/**
 * Raised by a ledger when the device already has an order for the day.
 * The service recovers it by returning `existing`.
 */
export class DuplicateOrderError extends AppError {
  constructor(public readonly existing: Order) {
    super(
      `Device already has order #${existing.queueNumber} for ${existing.day}`,
      409,
      'DUPLICATE_ORDER',
      { queueNumber: existing.queueNumber },
      true
    );
    this.name = 'DuplicateOrderError';
  }
}

export class OrderNotFoundError extends AppError {
  constructor(message = 'No order found') {
    super(message, 404, 'ORDER_NOT_FOUND', undefined, true);
    this.name = 'OrderNotFoundError';
  }
}

export class InvalidStatusTransitionError extends AppError {
  constructor(
    public readonly from: OrderStatus,
    public readonly to: OrderStatus
  ) {
    super(`Cannot move order from ${from} to ${to}`, 409, 'INVALID_STATUS_TRANSITION', { from, to }, true);
    this.name = 'InvalidStatusTransitionError';
  }
}

export class UnknownMenuItemError extends AppError {
  constructor(public readonly names: string[]) {
    super(`Not on the menu: ${names.join(', ')}`, 422, 'UNKNOWN_MENU_ITEM', { names }, true);
    this.name = 'UnknownMenuItemError';
  }
}

/**
 * Store round-trip failed; nothing was written.
 * Message stays internal, clients get the generic "try again".
 */
export class StoreUnavailableError extends AppError {
  constructor(operation: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Order store unavailable during ${operation}: ${reason}`, 503, 'STORE_UNAVAILABLE');
    this.name = 'StoreUnavailableError';
  }
}
