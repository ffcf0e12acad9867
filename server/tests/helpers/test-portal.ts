/**
 * In-memory portal for tests: fixed clock in UTC, static lease table.
 */

import { parseConfig } from '../../src/config/env.js';
import { FixedClock } from '../../src/lib/time/business-calendar.js';
import { StaticLeaseTable } from '../../src/services/identity/lease-table.js';
import { createOrderPortal } from '../../src/services/orders/index.js';

export const DEVICE_A = { address: '192.168.4.10', mac: 'AA:BB:CC:00:00:0A' };
export const DEVICE_B = { address: '192.168.4.11', mac: 'AA:BB:CC:00:00:0B' };

export const START_OF_TEST_DAY = '2026-03-14T12:00:00Z';

export async function createTestPortal(env: NodeJS.ProcessEnv = {}) {
  const clock = new FixedClock(START_OF_TEST_DAY);
  const leaseTable = new StaticLeaseTable({
    [DEVICE_A.address]: DEVICE_A.mac,
    [DEVICE_B.address]: DEVICE_B.mac
  });
  const config = parseConfig({ NODE_ENV: 'test', BUSINESS_TIMEZONE: 'UTC', ...env });
  const portal = await createOrderPortal({ config, clock, leaseTable });

  return { ...portal, clock, leaseTable, config };
}
