/**
 * Item summary text
 *
 * Orders persist their items as "Margherita Pizza x1,French Fries x2".
 * Inside a name, "\" is written "\\" and "," is written "\,", so any name
 * survives the round trip. Plain summaries without escapes parse unchanged.
 */

import type { OrderItem } from './order.types.js';

const QUANTITY_SUFFIX = /^(.*) x(\d+)$/s;

function escapeName(name: string): string {
  return name.replace(/\\/g, '\\\\').replace(/,/g, '\\,');
}

export function formatItemSummary(items: readonly OrderItem[]): string {
  return items.map((item) => `${escapeName(item.name)} x${item.quantity}`).join(',');
}

function splitEntries(summary: string): string[] {
  const entries: string[] = [];
  let current = '';

  for (let i = 0; i < summary.length; i++) {
    const char = summary[i];
    if (char === '\\' && i + 1 < summary.length) {
      current += summary[i + 1];
      i++;
    } else if (char === ',') {
      entries.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  entries.push(current);

  return entries;
}

export function parseItemSummary(summary: string): OrderItem[] {
  if (summary.trim() === '') {
    return [];
  }

  const items: OrderItem[] = [];
  for (const raw of splitEntries(summary)) {
    const entry = raw.trim();
    if (entry === '') {
      continue;
    }

    const match = QUANTITY_SUFFIX.exec(entry);
    const quantity = match ? Number(match[2]) : 0;
    if (match && quantity > 0) {
      items.push({ name: match[1], quantity });
    } else {
      items.push({ name: entry, quantity: 1 });
    }
  }

  return items;
}
