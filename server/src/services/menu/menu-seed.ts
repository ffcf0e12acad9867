/**
 * Starter menu, read from server/data/menu-seed.json
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { menuItemDraftSchema, type MenuItemDraft } from './menu.types.js';

export const DEFAULT_MENU_SEED_URL = new URL('../../../data/menu-seed.json', import.meta.url);

export async function loadMenuSeed(source: URL | string = DEFAULT_MENU_SEED_URL): Promise<MenuItemDraft[]> {
  const raw: unknown = JSON.parse(await readFile(source, 'utf8'));
  return z.array(menuItemDraftSchema).parse(raw);
}
