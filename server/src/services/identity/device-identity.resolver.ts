/**
 * Device Identity Resolver
 *
 * Maps the transient client address to the device's hardware address via the
 * lease table. Never throws: on any miss or failure the (normalized) address
 * itself becomes the identity, so ordering keeps working with less precision.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import type { LeaseTable } from './lease-table.js';

const IPV4_MAPPED_PREFIX = '::ffff:';

export function normalizeAddress(address: string): string {
  const trimmed = address.trim();
  if (trimmed.toLowerCase().startsWith(IPV4_MAPPED_PREFIX) && trimmed.includes('.')) {
    return trimmed.slice(IPV4_MAPPED_PREFIX.length);
  }
  return trimmed;
}

export class DeviceIdentityResolver {
  constructor(private readonly leases: LeaseTable) {}

  async resolve(address: string): Promise<string> {
    const normalized = normalizeAddress(address);

    try {
      const hardwareId = await this.leases.lookup(normalized);
      if (hardwareId && hardwareId.trim() !== '') {
        return hardwareId.trim().toLowerCase();
      }

      logger.debug({
        event: 'identity_resolution_fallback',
        address: normalized,
        reason: 'no_lease',
        msg: '[DeviceIdentity] No lease for address, using address as identity'
      });
    } catch (err) {
      logger.warn({
        event: 'identity_resolution_fallback',
        address: normalized,
        reason: 'lookup_failed',
        error: err instanceof Error ? err.message : String(err),
        msg: '[DeviceIdentity] Lease lookup failed, using address as identity'
      });
    }

    return normalized;
  }
}
