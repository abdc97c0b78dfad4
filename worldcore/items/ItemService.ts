// worldcore/items/ItemService.ts

import type { Queryable } from "../db/Database";
import { Logger, type LogSink } from "../utils/logger";
import { listAllItems } from "./ItemCatalog";
import {
  ItemCatalog,
  ItemDefinition,
  ItemInstance,
  ItemRowSchema,
  rowToItemDefinition,
} from "./ItemTypes";

/**
 * In-memory item cache. Starts from the given definitions (the static
 * catalog by default) and can be replaced wholesale from Postgres.
 */
export class ItemService implements ItemCatalog {
  private itemsById = new Map<string, ItemDefinition>();

  constructor(
    defs: readonly ItemDefinition[] = listAllItems(),
    private readonly log: LogSink = Logger.scope("ITEMS"),
  ) {
    for (const def of defs) this.itemsById.set(def.id, def);
  }

  /**
   * Load all item definitions from Postgres into memory.
   * Call this once at host startup, before the mod initializes.
   * Rows that fail validation are skipped with a warning.
   */
  async loadAll(db: Queryable): Promise<number> {
    this.log.info("Loading item definitions from DB...");

    const res = await db.query(
      "SELECT id, name, max_stack, category, description FROM items",
    );
    const map = new Map<string, ItemDefinition>();

    for (const raw of res.rows) {
      const parsed = ItemRowSchema.safeParse(raw);
      if (!parsed.success) {
        this.log.warn("Skipping malformed item row", {
          issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        });
        continue;
      }
      const def = rowToItemDefinition(parsed.data);
      map.set(def.id, def);
    }

    this.itemsById = map;
    this.log.info("Loaded item definitions", { count: map.size });
    return map.size;
  }

  resolve(itemId: string): ItemDefinition | null {
    return this.itemsById.get(itemId) ?? null;
  }

  listAll(): ItemDefinition[] {
    return Array.from(this.itemsById.values());
  }

  createInstance(def: ItemDefinition, qty: number): ItemInstance | null {
    if (!this.itemsById.has(def.id)) return null;
    const q = Math.floor(qty);
    if (!Number.isFinite(q) || q < 1) return null;
    return { itemId: def.id, qty: Math.min(q, Math.max(1, def.maxStack)) };
  }
}
