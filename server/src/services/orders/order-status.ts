/**
 * Order status state machine
 *
 * pending -> preparing -> ready -> completed
 *
 * Two policies share one transition table:
 * - unrestricted: staff may set any status (corrections included)
 * - forward-only: only moves along the table are accepted
 */

import type { OrderStatus } from './order.types.js';
import type { StatusPolicyName } from '../../config/env.js';

export const INITIAL_STATUS: OrderStatus = 'pending';

/** Forward moves; skipping ahead (pending -> ready) is a forward move too. */
const FORWARD_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  pending: ['preparing', 'ready', 'completed'],
  preparing: ['ready', 'completed'],
  ready: ['completed'],
  completed: []
};

/** Statuses that count as "being worked on or waiting for pickup". */
export const SERVING_STATUSES: ReadonlySet<OrderStatus> = new Set<OrderStatus>(['preparing', 'ready']);

export interface StatusPolicy {
  readonly name: StatusPolicyName;
  allows(from: OrderStatus, to: OrderStatus): boolean;
}

export function isForwardTransition(from: OrderStatus, to: OrderStatus): boolean {
  return FORWARD_TRANSITIONS[from].includes(to);
}

export const unrestrictedPolicy: StatusPolicy = {
  name: 'unrestricted',
  allows: () => true
};

export const forwardOnlyPolicy: StatusPolicy = {
  name: 'forward-only',
  // Re-applying the current status is a no-op, not a regression
  allows: (from, to) => from === to || isForwardTransition(from, to)
};

export function getStatusPolicy(name: StatusPolicyName): StatusPolicy {
  return name === 'forward-only' ? forwardOnlyPolicy : unrestrictedPolicy;
}
