/**
 * InventorySystem.ts — Consumable items and the player's inventory.
 *
 * Item definitions are loaded from items.json.  An inventory is an ordered
 * list of item instances (duplicates are separate entries, in pickup order),
 * and using one removes exactly that instance and applies its effect once.
 */

import { z } from 'zod';

import itemsData from '@/data/items.json';
import { ContentValidationError } from '@/engine/errors';
import { createLogger } from '@/engine/Logger';
import type { Stats } from '@/rpg/StatSystem';

const log = createLogger('InventorySystem');

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const ItemEffectSchema = z
  .object({
    hp: z.number().int().positive().optional(),
    mp: z.number().int().positive().optional(),
  })
  .strict();

const ItemSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  category: z.string().min(1),
  effect: ItemEffectSchema.default({}),
});

const ItemCatalogSchema = z.object({ items: z.array(ItemSchema) }).superRefine((catalog, ctx) => {
  const seen = new Set<string>();
  catalog.items.forEach((item, index) => {
    if (seen.has(item.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate item id "${item.id}"`,
        path: ['items', index, 'id'],
      });
    }
    seen.add(item.id);
  });
});

// ---------------------------------------------------------------------------
// Interfaces
// ---------------------------------------------------------------------------

export type ItemEffect = Readonly<z.infer<typeof ItemEffectSchema>>;
export type ItemDef = Readonly<z.infer<typeof ItemSchema>>;

export type ItemUseOutcome =
  | {
      success: true;
      item: ItemDef;
      hpRestored: number;
      mpRestored: number;
      message: string;
    }
  | {
      success: false;
      reason: 'empty_inventory' | 'invalid_index' | 'no_effect';
      message: string;
    };

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export function parseItemCatalog(raw: unknown, source: string = 'items.json'): ItemDef[] {
  const result = ItemCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw ContentValidationError.fromZodIssues(source, result.error.issues);
  }
  return result.data.items;
}

const itemMap = new Map<string, ItemDef>();

for (const item of parseItemCatalog(itemsData)) {
  itemMap.set(item.id, item);
}

log.debug({ count: itemMap.size }, 'item catalog loaded');

export function getItem(id: string): ItemDef | undefined {
  return itemMap.get(id);
}

export function getAllItems(): ItemDef[] {
  return Array.from(itemMap.values());
}

/** Whether the item does anything when used in combat. */
export function isUsableInCombat(item: ItemDef): boolean {
  return item.effect.hp !== undefined || item.effect.mp !== undefined;
}

// ---------------------------------------------------------------------------
// Inventory class
// ---------------------------------------------------------------------------

export class Inventory {
  private readonly items: ItemDef[];

  constructor(items: readonly ItemDef[] = []) {
    this.items = [...items];
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Items in pickup order. */
  getContents(): readonly ItemDef[] {
    return [...this.items];
  }

  at(index: number): ItemDef | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) return undefined;
    return this.items[index];
  }

  addItem(item: ItemDef): void {
    this.items.push(item);
  }

  /** Number of instances with the given item id. */
  countItem(itemId: string): number {
    return this.items.filter((i) => i.id === itemId).length;
  }

  /**
   * Use the item at `index` on `stats`.
   *
   * HP effects go through `heal`, MP effects through `restoreMp`.  Items
   * with neither are declined and stay in the inventory.
   */
  useItem(index: number, stats: Stats): ItemUseOutcome {
    if (this.isEmpty()) {
      return { success: false, reason: 'empty_inventory', message: 'You have no items!' };
    }

    const item = this.at(index);
    if (!item) {
      return { success: false, reason: 'invalid_index', message: 'There is no item in that slot.' };
    }

    if (!isUsableInCombat(item)) {
      return {
        success: false,
        reason: 'no_effect',
        message: `${item.name} can't be used in combat.`,
      };
    }

    this.items.splice(index, 1);

    const parts: string[] = [];
    let hpRestored = 0;
    let mpRestored = 0;

    if (item.effect.hp !== undefined) {
      stats.heal(item.effect.hp);
      hpRestored = item.effect.hp;
      parts.push(`${hpRestored} HP`);
    }
    if (item.effect.mp !== undefined) {
      stats.restoreMp(item.effect.mp);
      mpRestored = item.effect.mp;
      parts.push(`${mpRestored} MP`);
    }

    return {
      success: true,
      item,
      hpRestored,
      mpRestored,
      message: `Used ${item.name}! Restored ${parts.join(' and ')}.`,
    };
  }
}
