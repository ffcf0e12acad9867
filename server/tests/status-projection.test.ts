import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { computeCurrentlyServing, summarizeOrders } from '../src/services/orders/status-projection.js';
import type { Order, OrderStatus } from '../src/services/orders/order.types.js';

function order(queueNumber: number, status: OrderStatus): Order {
  return {
    id: queueNumber,
    queueNumber,
    deviceId: `dev-${queueNumber}`,
    items: [],
    status,
    createdAt: 1773489600,
    day: '2026-03-14',
    notes: ''
  };
}

describe('Status projection', () => {
  it('is null when nothing is preparing or ready', () => {
    assert.equal(computeCurrentlyServing([]), null);
    assert.equal(computeCurrentlyServing([order(1, 'pending'), order(2, 'completed')]), null);
  });

  it('is the lowest queue number among preparing and ready orders', () => {
    const orders = [order(1, 'completed'), order(2, 'pending'), order(3, 'ready'), order(4, 'preparing')];
    assert.equal(computeCurrentlyServing(orders), 3);
  });

  it('counts orders per status for the dashboard', () => {
    const orders = [order(1, 'completed'), order(2, 'pending'), order(3, 'pending'), order(4, 'ready')];

    assert.deepEqual(summarizeOrders('2026-03-14', orders), {
      day: '2026-03-14',
      total: 4,
      pending: 2,
      preparing: 0,
      ready: 1,
      completed: 1,
      currentlyServing: 4
    });
  });
});
