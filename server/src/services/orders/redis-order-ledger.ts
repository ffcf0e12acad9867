/**
 * Redis-backed Order Ledger
 * Persistent storage that survives server restarts
 *
 * Key layout (prefix omitted):
 *   order:id                      INCR counter for order ids
 *   order:<id>                    hash with the order fields, items as summary text
 *   day:<day>:queue               zset, member = order id, score = queue number
 *   day:<day>:device:<deviceId>   order id of the device's order that day
 *
 * Every invariant-establishing sequence is a single Lua script, so it runs
 * atomically on the server. Scripts derive order hash keys from ARGV, which
 * ties the ledger to a single (non-cluster) Redis instance.
 */

import { z } from 'zod';
import type { StoreCommands } from '../../infra/redis/redis-commands.js';
import { logger } from '../../lib/logger/structured-logger.js';
import type { BusinessCalendar, DayKey } from '../../lib/time/business-calendar.js';
import type { OrderLedger, StatusWriteResult } from './order-ledger.interface.js';
import { orderStatusSchema, type NewOrder, type Order, type OrderStatus } from './order.types.js';
import { INITIAL_STATUS } from './order-status.js';
import { formatItemSummary, parseItemSummary } from './item-summary.js';
import { DuplicateOrderError, StoreUnavailableError } from './order.errors.js';

const CREATE_ORDER_SCRIPT = `
local existing = redis.call('GET', KEYS[1])
if existing then
  return {0, tonumber(existing), redis.call('HGETALL', ARGV[1] .. existing)}
end
local top = redis.call('ZREVRANGE', KEYS[2], 0, 0, 'WITHSCORES')
local queueNumber = 1
if top[2] then
  queueNumber = tonumber(top[2]) + 1
end
local id = redis.call('INCR', KEYS[3])
redis.call('HSET', ARGV[1] .. id,
  'id', id, 'queueNumber', queueNumber, 'deviceId', ARGV[2], 'items', ARGV[3],
  'status', ARGV[4], 'createdAt', ARGV[5], 'day', ARGV[6], 'notes', ARGV[7])
redis.call('ZADD', KEYS[2], queueNumber, id)
redis.call('SET', KEYS[1], id)
return {1, id, queueNumber}
`;

// ARGV[2] is the expected current status, '' for an unconditional write
const SET_STATUS_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return nil
end
if ARGV[2] ~= '' and redis.call('HGET', KEYS[1], 'status') ~= ARGV[2] then
  return {0, redis.call('HGETALL', KEYS[1])}
end
redis.call('HSET', KEYS[1], 'status', ARGV[1])
return {1, redis.call('HGETALL', KEYS[1])}
`;

const CLEAR_ORDER_SCRIPT = `
local id = redis.call('GET', KEYS[1])
if not id then
  return 0
end
redis.call('DEL', ARGV[1] .. id)
redis.call('ZREM', KEYS[2], id)
redis.call('DEL', KEYS[1])
return 1
`;

const storedOrderSchema = z.object({
  id: z.coerce.number().int().positive(),
  queueNumber: z.coerce.number().int().positive(),
  deviceId: z.string(),
  items: z.string(),
  status: orderStatusSchema,
  createdAt: z.coerce.number().int(),
  day: z.string(),
  notes: z.string().default('')
});

const createResultSchema = z.union([
  z.tuple([z.literal(1), z.number(), z.number()]),
  z.tuple([z.literal(0), z.number(), z.array(z.string())])
]);

const statusWriteSchema = z
  .tuple([z.union([z.literal(0), z.literal(1)]), z.array(z.string())])
  .nullable();

function pairsToRecord(flat: readonly string[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (let i = 0; i + 1 < flat.length; i += 2) {
    record[flat[i]] = flat[i + 1];
  }
  return record;
}

function toOrder(fields: Record<string, string>): Order | null {
  if (Object.keys(fields).length === 0) {
    return null;
  }
  const stored = storedOrderSchema.parse(fields);
  return {
    id: stored.id,
    queueNumber: stored.queueNumber,
    deviceId: stored.deviceId,
    items: parseItemSummary(stored.items),
    status: stored.status,
    createdAt: stored.createdAt,
    day: stored.day,
    notes: stored.notes
  };
}

export class RedisOrderLedger implements OrderLedger {
  readonly backend = 'redis' as const;

  constructor(
    private readonly redis: StoreCommands,
    private readonly calendar: BusinessCalendar,
    private readonly keyPrefix: string = 'portal:'
  ) {
    logger.info({ keyPrefix, msg: '[RedisOrderLedger] Initialized with shared Redis client' });
  }

  private orderKeyPrefix(): string {
    return `${this.keyPrefix}order:`;
  }

  private orderKey(orderId: number): string {
    return `${this.orderKeyPrefix()}${orderId}`;
  }

  private idCounterKey(): string {
    return `${this.keyPrefix}order:id`;
  }

  private queueKey(day: DayKey): string {
    return `${this.keyPrefix}day:${day}:queue`;
  }

  private deviceKey(deviceId: string, day: DayKey): string {
    return `${this.keyPrefix}day:${day}:device:${deviceId}`;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      logger.error({
        operation,
        error: err instanceof Error ? err.message : String(err),
        msg: '[RedisOrderLedger] Store operation failed'
      });
      throw new StoreUnavailableError(operation, err);
    }
  }

  async findActiveOrder(deviceId: string, day: DayKey): Promise<Order | null> {
    return this.run('findActiveOrder', async () => {
      const orderId = await this.redis.get(this.deviceKey(deviceId, day));
      if (orderId === null) {
        return null;
      }
      return toOrder(await this.redis.hgetall(this.orderKey(Number(orderId))));
    });
  }

  async nextNumber(day: DayKey): Promise<number> {
    return this.run('nextNumber', async () => {
      const top = await this.redis.zrevrange(this.queueKey(day), 0, 0, 'WITHSCORES');
      return top.length >= 2 ? Number(top[1]) + 1 : 1;
    });
  }

  async createOrder(draft: NewOrder): Promise<Order> {
    const day = this.calendar.dayOf(draft.createdAt);
    const itemSummary = formatItemSummary(draft.items);

    const result = await this.run('createOrder', async () =>
      createResultSchema.parse(
        await this.redis.eval(
          CREATE_ORDER_SCRIPT,
          3,
          this.deviceKey(draft.deviceId, day),
          this.queueKey(day),
          this.idCounterKey(),
          this.orderKeyPrefix(),
          draft.deviceId,
          itemSummary,
          INITIAL_STATUS,
          draft.createdAt,
          day,
          draft.notes
        )
      )
    );

    if (result[0] === 0) {
      const existing = toOrder(pairsToRecord(result[2]));
      if (existing) {
        throw new DuplicateOrderError(existing);
      }
      throw new StoreUnavailableError('createOrder', new Error(`dangling device index for order ${result[1]}`));
    }

    const [, id, queueNumber] = result;
    logger.debug({ orderId: id, queueNumber, day, msg: '[RedisOrderLedger] Order created' });

    return {
      id,
      queueNumber,
      deviceId: draft.deviceId,
      items: parseItemSummary(itemSummary),
      status: INITIAL_STATUS,
      createdAt: draft.createdAt,
      day,
      notes: draft.notes
    };
  }

  async getById(orderId: number): Promise<Order | null> {
    return this.run('getById', async () => toOrder(await this.redis.hgetall(this.orderKey(orderId))));
  }

  async setStatus(orderId: number, status: OrderStatus, expectedFrom?: OrderStatus): Promise<StatusWriteResult> {
    return this.run('setStatus', async (): Promise<StatusWriteResult> => {
      const reply = statusWriteSchema.parse(
        await this.redis.eval(SET_STATUS_SCRIPT, 1, this.orderKey(orderId), status, expectedFrom ?? '')
      );
      const order = reply ? toOrder(pairsToRecord(reply[1])) : null;
      if (!reply || !order) {
        return { outcome: 'not_found' };
      }
      return reply[0] === 1 ? { outcome: 'updated', order } : { outcome: 'conflict', current: order };
    });
  }

  async clearOrder(deviceId: string, day: DayKey): Promise<boolean> {
    return this.run('clearOrder', async () => {
      const deleted = await this.redis.eval(
        CLEAR_ORDER_SCRIPT,
        2,
        this.deviceKey(deviceId, day),
        this.queueKey(day),
        this.orderKeyPrefix()
      );
      return deleted === 1;
    });
  }

  async listByDay(day: DayKey): Promise<Order[]> {
    return this.run('listByDay', async () => {
      const ids = await this.redis.zrange(this.queueKey(day), 0, -1);
      if (ids.length === 0) {
        return [];
      }

      const pipeline = this.redis.pipeline();
      for (const id of ids) {
        pipeline.hgetall(this.orderKey(Number(id)));
      }
      const replies = (await pipeline.exec()) ?? [];

      const orders: Order[] = [];
      for (const [err, fields] of replies) {
        if (err) {
          throw err;
        }
        const order = toOrder(z.record(z.string()).parse(fields));
        if (order) {
          orders.push(order);
        }
      }
      return orders.sort((a, b) => a.queueNumber - b.queueNumber);
    });
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch {
      return false;
    }
  }
}
