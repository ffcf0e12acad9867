/**
 * Response shapes shared by the customer and staff controllers
 */

import type { ZodError } from 'zod';
import { createValidationError, type AppError } from '../../middleware/error.middleware.js';
import { formatItemSummary } from '../../services/orders/item-summary.js';
import type { Order } from '../../services/orders/order.types.js';

export interface OrderView extends Order {
  itemSummary: string;
}

export function toOrderView(order: Order): OrderView {
  return { ...order, itemSummary: formatItemSummary(order.items) };
}

export function toValidationError(error: ZodError): AppError {
  return createValidationError(
    'Invalid request',
    error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
  );
}
