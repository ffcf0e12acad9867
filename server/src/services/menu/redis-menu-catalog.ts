/**
 * Redis-backed Menu Catalog
 * One hash, field = item id, value = item JSON.
 * Seeding is a Lua script so "seed only when empty" holds across processes.
 */

import type { StoreCommands } from '../../infra/redis/redis-commands.js';
import { logger } from '../../lib/logger/structured-logger.js';
import { StoreUnavailableError } from '../orders/order.errors.js';
import { menuItemSchema, sameItemName, type MenuCatalog, type MenuItem, type MenuItemDraft } from './menu.types.js';

const SEED_SCRIPT = `
if redis.call('HLEN', KEYS[1]) > 0 then
  return 0
end
for i = 1, #ARGV, 2 do
  redis.call('HSET', KEYS[1], ARGV[i], ARGV[i + 1])
end
return #ARGV / 2
`;

function parseJson(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
}

export class RedisMenuCatalog implements MenuCatalog {
  constructor(
    private readonly redis: Pick<StoreCommands, 'hgetall' | 'eval'>,
    private readonly keyPrefix: string = 'portal:'
  ) {}

  private itemsKey(): string {
    return `${this.keyPrefix}menu:items`;
  }

  private async loadAll(): Promise<MenuItem[]> {
    let fields: Record<string, string>;
    try {
      fields = await this.redis.hgetall(this.itemsKey());
    } catch (err) {
      throw new StoreUnavailableError('menu.list', err);
    }

    const items: MenuItem[] = [];
    for (const [field, value] of Object.entries(fields)) {
      const parsed = menuItemSchema.safeParse(parseJson(value));
      if (parsed.success) {
        items.push(parsed.data);
      } else {
        logger.warn({ field, msg: '[RedisMenuCatalog] Skipping malformed menu item' });
      }
    }
    return items.sort((a, b) => a.id - b.id);
  }

  async listAvailable(): Promise<MenuItem[]> {
    return (await this.loadAll()).filter((item) => item.available);
  }

  async findByName(name: string): Promise<MenuItem | null> {
    return (await this.loadAll()).find((item) => sameItemName(item.name, name)) ?? null;
  }

  async seed(drafts: readonly MenuItemDraft[]): Promise<number> {
    const args = drafts.flatMap((draft, index) => {
      const item: MenuItem = { ...draft, id: index + 1 };
      return [String(item.id), JSON.stringify(item)];
    });

    try {
      const inserted = await this.redis.eval(SEED_SCRIPT, 1, this.itemsKey(), ...args);
      return typeof inserted === 'number' ? inserted : 0;
    } catch (err) {
      throw new StoreUnavailableError('menu.seed', err);
    }
  }
}
