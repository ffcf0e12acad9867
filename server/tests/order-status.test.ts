import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  forwardOnlyPolicy,
  getStatusPolicy,
  isForwardTransition,
  unrestrictedPolicy
} from '../src/services/orders/order-status.js';
import { ORDER_STATUSES } from '../src/services/orders/order.types.js';

describe('Order status transitions', () => {
  it('treats skipping ahead as forward progress', () => {
    assert.equal(isForwardTransition('pending', 'preparing'), true);
    assert.equal(isForwardTransition('pending', 'ready'), true);
    assert.equal(isForwardTransition('ready', 'completed'), true);
    assert.equal(isForwardTransition('ready', 'preparing'), false);
    assert.equal(isForwardTransition('completed', 'pending'), false);
  });

  it('forward-only policy rejects regressions and accepts re-applying a status', () => {
    assert.equal(forwardOnlyPolicy.allows('completed', 'pending'), false);
    assert.equal(forwardOnlyPolicy.allows('ready', 'preparing'), false);
    assert.equal(forwardOnlyPolicy.allows('preparing', 'preparing'), true);
    assert.equal(forwardOnlyPolicy.allows('pending', 'completed'), true);
  });

  it('unrestricted policy accepts every pair', () => {
    for (const from of ORDER_STATUSES) {
      for (const to of ORDER_STATUSES) {
        assert.equal(unrestrictedPolicy.allows(from, to), true, `${from} -> ${to}`);
      }
    }
  });

  it('selects the policy by configured name', () => {
    assert.equal(getStatusPolicy('forward-only'), forwardOnlyPolicy);
    assert.equal(getStatusPolicy('unrestricted'), unrestrictedPolicy);
  });
});
