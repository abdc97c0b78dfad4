// worldcore/items/ItemTypes.ts

import { z } from "zod";

export interface ItemDefinition {
  id: string;          // "energy_drink"
  name: string;

  // Stack size. 1 (or less) means the item never stacks.
  maxStack: number;

  // Optional flavor / metadata – safe to omit for simple items.
  category?: string | null;     // "cash", "consumable", "gear", ...
  description?: string | null;
}

/** A concrete stack of an item, ready to be placed in storage. */
export interface ItemInstance {
  itemId: string;
  qty: number;
}

export type ItemAddResult = { ok: true } | { ok: false; reason: string };

/**
 * Item lookups the drop core needs from the host.
 * Both calls return null rather than throwing when the id or qty is unusable.
 */
export interface ItemCatalog {
  resolve(itemId: string): ItemDefinition | null;
  createInstance(def: ItemDefinition, qty: number): ItemInstance | null;
}

// Row coming back from Postgres
export const ItemRowSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  max_stack: z.number().int().nullable(),
  category: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
});

export type ItemRow = z.infer<typeof ItemRowSchema>;

export function rowToItemDefinition(row: ItemRow): ItemDefinition {
  return {
    id: row.id,
    name: row.name,
    maxStack: row.max_stack ?? 1,
    category: row.category ?? null,
    description: row.description ?? null,
  };
}
