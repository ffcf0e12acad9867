/**
 * Order DTOs and Zod schemas
 */

import { z } from 'zod';
import type { DayKey } from '../../lib/time/business-calendar.js';

// ============================================================================
// Zod Schemas
// ============================================================================

export const ORDER_STATUSES = ['pending', 'preparing', 'ready', 'completed'] as const;

export const orderStatusSchema = z.enum(ORDER_STATUSES);

export const orderItemSchema = z.object({
  name: z.string().trim().min(1).max(100),
  quantity: z.number().int().min(1).max(99)
});

export const orderSubmissionSchema = z.object({
  items: z.array(orderItemSchema).min(1, 'At least one item is required').max(50),
  notes: z.string().max(500).optional().default('')
});

export const statusUpdateSchema = z.object({
  status: orderStatusSchema
});

export const orderIdParamSchema = z.coerce.number().int().positive();

// ============================================================================
// TypeScript Types
// ============================================================================

export type OrderStatus = z.infer<typeof orderStatusSchema>;

export type OrderItem = z.infer<typeof orderItemSchema>;

export type OrderSubmission = z.infer<typeof orderSubmissionSchema>;

export interface Order {
  id: number;
  queueNumber: number;
  deviceId: string;
  items: OrderItem[];
  status: OrderStatus;
  /** Epoch seconds */
  createdAt: number;
  day: DayKey;
  notes: string;
}

export interface NewOrder {
  deviceId: string;
  items: OrderItem[];
  notes: string;
  createdAt: number;
}
