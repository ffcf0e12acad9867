/**
 * Menu DTOs and Zod schemas
 */

import { z } from 'zod';

export const menuItemDraftSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  price: z.number().nonnegative(),
  category: z.string().min(1),
  available: z.boolean().default(true)
});

export const menuItemSchema = menuItemDraftSchema.extend({
  id: z.number().int().positive()
});

export type MenuItemDraft = z.infer<typeof menuItemDraftSchema>;

export type MenuItem = z.infer<typeof menuItemSchema>;

export interface MenuCatalog {
  /** Available items in insertion (id) order */
  listAvailable(): Promise<MenuItem[]>;

  /** Case-insensitive lookup among all items, available or not */
  findByName(name: string): Promise<MenuItem | null>;

  /**
   * Insert the starter set only when the catalog is empty
   * @returns number of items inserted (0 when already seeded)
   */
  seed(items: readonly MenuItemDraft[]): Promise<number>;
}

export function sameItemName(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}
