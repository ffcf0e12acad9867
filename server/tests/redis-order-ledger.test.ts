import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { BusinessCalendar, FixedClock } from '../src/lib/time/business-calendar.js';
import { RedisOrderLedger } from '../src/services/orders/redis-order-ledger.js';
import { DuplicateOrderError, StoreUnavailableError } from '../src/services/orders/order.errors.js';
import { StubRedis } from './helpers/stub-redis.js';

const DAY = '2026-03-14';
const NOON = 1773489600;
const PREFIX = 'test:';

const STORED_ORDER = {
  id: '7',
  queueNumber: '2',
  deviceId: 'aa:bb:cc:00:00:0a',
  items: 'Tiramisu x1,Lemonade\\, large x2',
  status: 'ready',
  createdAt: String(NOON),
  day: DAY,
  notes: 'window seat'
};

function flatten(record: Record<string, string>): string[] {
  return Object.entries(record).flat();
}

describe('RedisOrderLedger', () => {
  let redis: StubRedis;
  let ledger: RedisOrderLedger;

  beforeEach(() => {
    redis = new StubRedis();
    ledger = new RedisOrderLedger(redis, new BusinessCalendar(new FixedClock('2026-03-14T12:00:00Z'), 'UTC'), PREFIX);
  });

  describe('reads', () => {
    it('turns the stored hash into an order', async () => {
      redis.strings.set(`${PREFIX}day:${DAY}:device:aa:bb:cc:00:00:0a`, '7');
      redis.hashes.set(`${PREFIX}order:7`, STORED_ORDER);

      assert.deepEqual(await ledger.findActiveOrder('aa:bb:cc:00:00:0a', DAY), {
        id: 7,
        queueNumber: 2,
        deviceId: 'aa:bb:cc:00:00:0a',
        items: [
          { name: 'Tiramisu', quantity: 1 },
          { name: 'Lemonade, large', quantity: 2 }
        ],
        status: 'ready',
        createdAt: NOON,
        day: DAY,
        notes: 'window seat'
      });
    });

    it('returns null without a device index or a hash', async () => {
      assert.equal(await ledger.findActiveOrder('aa:bb:cc:00:00:0a', DAY), null);
      assert.equal(await ledger.getById(42), null);
    });

    it('maps a malformed hash to a store error', async () => {
      redis.hashes.set(`${PREFIX}order:7`, { ...STORED_ORDER, status: 'cooking' });

      await assert.rejects(ledger.getById(7), StoreUnavailableError);
    });

    it('numbers from the highest queue score', async () => {
      assert.equal(await ledger.nextNumber(DAY), 1);

      redis.sortedSets.set(`${PREFIX}day:${DAY}:queue`, [
        { member: '3', score: 1 },
        { member: '5', score: 4 }
      ]);
      assert.equal(await ledger.nextNumber(DAY), 5);
    });

    it('lists the day through a pipeline in queue order', async () => {
      redis.sortedSets.set(`${PREFIX}day:${DAY}:queue`, [
        { member: '7', score: 2 },
        { member: '3', score: 1 }
      ]);
      redis.hashes.set(`${PREFIX}order:7`, STORED_ORDER);
      redis.hashes.set(`${PREFIX}order:3`, { ...STORED_ORDER, id: '3', queueNumber: '1', status: 'pending' });

      const orders = await ledger.listByDay(DAY);

      assert.deepEqual(
        orders.map((order) => [order.id, order.queueNumber, order.status]),
        [
          [3, 1, 'pending'],
          [7, 2, 'ready']
        ]
      );
    });

    it('skips queue members whose hash is gone', async () => {
      redis.sortedSets.set(`${PREFIX}day:${DAY}:queue`, [
        { member: '3', score: 1 },
        { member: '7', score: 2 }
      ]);
      redis.hashes.set(`${PREFIX}order:7`, STORED_ORDER);

      assert.deepEqual((await ledger.listByDay(DAY)).map((order) => order.id), [7]);
    });

    it('maps a failed pipeline reply to a store error', async () => {
      redis.sortedSets.set(`${PREFIX}day:${DAY}:queue`, [{ member: '7', score: 2 }]);
      redis.failingHashes.add(`${PREFIX}order:7`);

      await assert.rejects(ledger.listByDay(DAY), (err: unknown) => {
        assert.ok(err instanceof StoreUnavailableError);
        assert.equal(err.statusCode, 503);
        assert.equal(err.code, 'STORE_UNAVAILABLE');
        assert.equal(err.message, 'Order store unavailable during listByDay: READONLY');
        return true;
      });
    });
  });

  describe('createOrder', () => {
    const draft = {
      deviceId: 'aa:bb:cc:00:00:0a',
      items: [{ name: 'Lemonade, large', quantity: 2 }],
      notes: '',
      createdAt: NOON
    };

    it('passes keys and fields to the script and builds the new order', async () => {
      redis.evalReply = async () => [1, 5, 3];

      const order = await ledger.createOrder(draft);

      assert.deepEqual(order, {
        id: 5,
        queueNumber: 3,
        deviceId: 'aa:bb:cc:00:00:0a',
        items: [{ name: 'Lemonade, large', quantity: 2 }],
        status: 'pending',
        createdAt: NOON,
        day: DAY,
        notes: ''
      });
      assert.deepEqual(redis.evalCalls, [
        {
          numKeys: 3,
          args: [
            `${PREFIX}day:${DAY}:device:aa:bb:cc:00:00:0a`,
            `${PREFIX}day:${DAY}:queue`,
            `${PREFIX}order:id`,
            `${PREFIX}order:`,
            'aa:bb:cc:00:00:0a',
            'Lemonade\\, large x2',
            'pending',
            NOON,
            DAY,
            ''
          ]
        }
      ]);
    });

    it('raises DuplicateOrderError carrying the existing order', async () => {
      redis.evalReply = async () => [0, 7, flatten(STORED_ORDER)];

      await assert.rejects(ledger.createOrder(draft), (err: unknown) => {
        assert.ok(err instanceof DuplicateOrderError);
        assert.equal(err.existing.id, 7);
        assert.equal(err.existing.queueNumber, 2);
        assert.equal(err.existing.status, 'ready');
        assert.deepEqual(err.details, { queueNumber: 2 });
        return true;
      });
    });

    it('treats a device index without its order as a store error', async () => {
      redis.evalReply = async () => [0, 7, []];

      await assert.rejects(ledger.createOrder(draft), (err: unknown) => {
        assert.ok(err instanceof StoreUnavailableError);
        assert.equal(err.message, 'Order store unavailable during createOrder: dangling device index for order 7');
        return true;
      });
    });

    it('maps a rejected eval to a 503 store error', async () => {
      redis.evalReply = async () => {
        throw new Error('ECONNREFUSED');
      };

      await assert.rejects(ledger.createOrder(draft), (err: unknown) => {
        assert.ok(err instanceof StoreUnavailableError);
        assert.equal(err.statusCode, 503);
        assert.equal(err.message, 'Order store unavailable during createOrder: ECONNREFUSED');
        return true;
      });
    });

    it('rejects an unexpected script reply', async () => {
      redis.evalReply = async () => 'OK';

      await assert.rejects(ledger.createOrder(draft), StoreUnavailableError);
    });
  });

  describe('setStatus', () => {
    it('reports an unknown order', async () => {
      redis.evalReply = async () => null;

      assert.deepEqual(await ledger.setStatus(7, 'ready'), { outcome: 'not_found' });
      assert.deepEqual(redis.evalCalls, [{ numKeys: 1, args: [`${PREFIX}order:7`, 'ready', ''] }]);
    });

    it('returns the updated order', async () => {
      redis.evalReply = async () => [1, flatten({ ...STORED_ORDER, status: 'completed' })];

      const result = await ledger.setStatus(7, 'completed', 'ready');

      assert.equal(result.outcome, 'updated');
      assert.equal(result.outcome === 'updated' && result.order.status, 'completed');
      assert.deepEqual(redis.evalCalls[0].args, [`${PREFIX}order:7`, 'completed', 'ready']);
    });

    it('returns the current order when the expected status no longer holds', async () => {
      redis.evalReply = async () => [0, flatten({ ...STORED_ORDER, status: 'completed' })];

      const result = await ledger.setStatus(7, 'preparing', 'ready');

      assert.equal(result.outcome, 'conflict');
      assert.equal(result.outcome === 'conflict' && result.current.status, 'completed');
    });
  });

  describe('clearOrder and ping', () => {
    it('reports whether the script deleted an order', async () => {
      redis.evalReply = async () => 1;
      assert.equal(await ledger.clearOrder('aa:bb:cc:00:00:0a', DAY), true);

      redis.evalReply = async () => 0;
      assert.equal(await ledger.clearOrder('aa:bb:cc:00:00:0a', DAY), false);

      assert.deepEqual(redis.evalCalls[0], {
        numKeys: 2,
        args: [`${PREFIX}day:${DAY}:device:aa:bb:cc:00:00:0a`, `${PREFIX}day:${DAY}:queue`, `${PREFIX}order:`]
      });
    });

    it('answers ping from the server reply', async () => {
      assert.equal(await ledger.ping(), true);

      redis.pingReply = async () => {
        throw new Error('ECONNREFUSED');
      };
      assert.equal(await ledger.ping(), false);
    });
  });
});
