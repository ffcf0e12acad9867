/**
 * Order Portal Factory
 * DI: choose Redis or InMemory stores based on config and wire the service.
 */

import type { Redis as RedisClient } from 'ioredis';
import type { AppConfig } from '../../config/env.js';
import { logger } from '../../lib/logger/structured-logger.js';
import { BusinessCalendar, systemClock, type Clock } from '../../lib/time/business-calendar.js';
import { DeviceIdentityResolver } from '../identity/device-identity.resolver.js';
import { DnsmasqLeaseTable, type LeaseTable } from '../identity/lease-table.js';
import { InMemoryMenuCatalog } from '../menu/inmemory-menu-catalog.js';
import { RedisMenuCatalog } from '../menu/redis-menu-catalog.js';
import { loadMenuSeed } from '../menu/menu-seed.js';
import type { MenuCatalog } from '../menu/menu.types.js';
import { InMemoryOrderLedger } from './inmemory-order-ledger.js';
import { RedisOrderLedger } from './redis-order-ledger.js';
import type { OrderLedger } from './order-ledger.interface.js';
import { getStatusPolicy } from './order-status.js';
import { OrderService } from './order.service.js';

export interface OrderPortal {
  orderService: OrderService;
  ledger: OrderLedger;
  menu: MenuCatalog;
  calendar: BusinessCalendar;
}

export interface OrderPortalOptions {
  config: AppConfig;
  /** Required when config.orderStore === 'redis' */
  redis?: RedisClient | null;
  clock?: Clock;
  leaseTable?: LeaseTable;
}

export async function createOrderPortal(options: OrderPortalOptions): Promise<OrderPortal> {
  const { config } = options;
  const calendar = new BusinessCalendar(options.clock ?? systemClock, config.businessTimeZone);

  let ledger: OrderLedger;
  let menu: MenuCatalog;

  if (config.orderStore === 'redis') {
    if (!options.redis) {
      throw new Error('ORDER_STORE=redis but no Redis client was provided');
    }
    ledger = new RedisOrderLedger(options.redis, calendar, config.redisKeyPrefix);
    menu = new RedisMenuCatalog(options.redis, config.redisKeyPrefix);
  } else {
    if (config.env === 'production') {
      logger.warn({
        store: 'memory',
        msg: '[OrderPortal] In-memory store in production; orders are lost on restart'
      });
    }
    ledger = new InMemoryOrderLedger(calendar);
    menu = new InMemoryMenuCatalog();
  }

  if (config.seedMenu) {
    const inserted = await menu.seed(await loadMenuSeed());
    logger.info({ inserted, msg: inserted > 0 ? '[OrderPortal] Menu seeded' : '[OrderPortal] Menu already seeded' });
  }

  const resolver = new DeviceIdentityResolver(options.leaseTable ?? new DnsmasqLeaseTable(config.leasesFile));

  const orderService = new OrderService({
    ledger,
    menu,
    resolver,
    calendar,
    statusPolicy: getStatusPolicy(config.statusPolicy),
    requireMenuItems: config.requireMenuItems
  });

  logger.info({
    store: ledger.backend,
    timeZone: calendar.timeZone,
    statusPolicy: config.statusPolicy,
    requireMenuItems: config.requireMenuItems,
    msg: '[OrderPortal] Ready'
  });

  return { orderService, ledger, menu, calendar };
}
