/**
 * DHCP lease tables
 *
 * The dnsmasq lease file holds one lease per line:
 *   <expiry-epoch> <mac> <ip> <hostname|*> [client-id]
 * It is rewritten by dnsmasq; we only ever read it.
 */

import { readFile } from 'node:fs/promises';

export interface LeaseEntry {
  timestamp: number;
  hardwareId: string;
  address: string;
  label?: string;
}

export interface LeaseTable {
  /** Hardware id for the address, or null when no lease matches */
  lookup(address: string): Promise<string | null>;
}

export function parseLeaseLine(line: string): LeaseEntry | null {
  const parts = line.trim().split(/\s+/);
  if (parts.length < 3) {
    return null;
  }

  const [rawTimestamp, hardwareId, address, label] = parts;
  const timestamp = Number(rawTimestamp);

  return {
    timestamp: Number.isFinite(timestamp) ? timestamp : 0,
    hardwareId,
    address,
    ...(label && label !== '*' ? { label } : {})
  };
}

export function parseLeases(text: string): LeaseEntry[] {
  const entries: LeaseEntry[] = [];
  for (const line of text.split('\n')) {
    const entry = parseLeaseLine(line);
    if (entry) {
      entries.push(entry);
    }
  }
  return entries;
}

/**
 * Most recent lease for the address; later lines win ties.
 */
export function findLatestLease(entries: readonly LeaseEntry[], address: string): LeaseEntry | null {
  let latest: LeaseEntry | null = null;
  for (const entry of entries) {
    if (entry.address === address && (!latest || entry.timestamp >= latest.timestamp)) {
      latest = entry;
    }
  }
  return latest;
}

/**
 * Reads the lease file on every lookup; it changes on each DHCP cycle.
 * I/O errors propagate to the resolver, which falls back.
 */
export class DnsmasqLeaseTable implements LeaseTable {
  constructor(readonly filePath: string) {}

  async lookup(address: string): Promise<string | null> {
    const text = await readFile(this.filePath, 'utf8');
    return findLatestLease(parseLeases(text), address)?.hardwareId ?? null;
  }
}

/**
 * Fixed address -> hardware id mappings
 */
export class StaticLeaseTable implements LeaseTable {
  private readonly entries: Map<string, string>;

  constructor(mappings: Record<string, string> = {}) {
    this.entries = new Map(Object.entries(mappings));
  }

  set(address: string, hardwareId: string): void {
    this.entries.set(address, hardwareId);
  }

  delete(address: string): void {
    this.entries.delete(address);
  }

  async lookup(address: string): Promise<string | null> {
    return this.entries.get(address) ?? null;
  }
}
