/**
 * In-Memory Menu Catalog
 */

import type { MenuCatalog, MenuItem, MenuItemDraft } from './menu.types.js';
import { sameItemName } from './menu.types.js';

export class InMemoryMenuCatalog implements MenuCatalog {
  private items: MenuItem[] = [];

  async listAvailable(): Promise<MenuItem[]> {
    return this.items.filter((item) => item.available).map((item) => ({ ...item }));
  }

  async findByName(name: string): Promise<MenuItem | null> {
    const item = this.items.find((candidate) => sameItemName(candidate.name, name));
    return item ? { ...item } : null;
  }

  async seed(drafts: readonly MenuItemDraft[]): Promise<number> {
    if (this.items.length > 0) {
      return 0;
    }
    this.items = drafts.map((draft, index) => ({ ...draft, id: index + 1 }));
    return this.items.length;
  }

  /**
   * Out-of-band edit (availability, price); not part of the customer surface
   */
  update(id: number, patch: Partial<Pick<MenuItem, 'available' | 'price'>>): MenuItem | null {
    const item = this.items.find((candidate) => candidate.id === id);
    if (!item) {
      return null;
    }
    Object.assign(item, patch);
    return { ...item };
  }
}
