// worldcore/drops/dropFill.ts

import type { ItemAddResult, ItemCatalog, ItemDefinition } from "../items/ItemTypes";
import type { LogSink } from "../utils/logger";
import type { RandomSource } from "../utils/Rng";
import { rollQuantity } from "./DropPolicy";
import type { StorageHandle } from "./DropTypes";

/**
 * Create one item stack and put it in storage. Every failure mode
 * (no instance, storage refusal, a throw from either side) comes back
 * as `ok: false` so the caller can log and move on.
 */
export function tryAddItem(
  items: ItemCatalog,
  storage: StorageHandle,
  def: ItemDefinition,
  qty: number,
): ItemAddResult {
  try {
    const instance = items.createInstance(def, qty);
    if (!instance) {
      return { ok: false, reason: "failed to create instance" };
    }
    return storage.addItem(instance);
  } catch (err: unknown) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

export type FillResult = {
  requested: number;
  added: { itemId: string; qty: number }[];
  skipped: { itemId: string; reason: string }[];
};

/**
 * Pick `count` entries from `loot` with replacement and add each one
 * with a random quantity. An empty `loot` list adds nothing.
 */
export function fillStorage(
  storage: StorageHandle,
  loot: readonly ItemDefinition[],
  count: number,
  deps: { items: ItemCatalog; rng: RandomSource; log: LogSink },
): FillResult {
  const result: FillResult = { requested: count, added: [], skipped: [] };

  if (loot.length === 0) {
    deps.log.warn("No items retrieved for tier, drop will be empty.");
    return result;
  }

  for (const def of deps.rng.pickMany(loot, count)) {
    const qty = rollQuantity(deps.rng, def);
    const res = tryAddItem(deps.items, storage, def, qty);
    if (res.ok) {
      result.added.push({ itemId: def.id, qty });
      deps.log.debug(`Added: ${def.id} x${qty}`);
    } else {
      result.skipped.push({ itemId: def.id, reason: res.reason });
      deps.log.warn(`Error adding item ${def.id}: ${res.reason}`);
    }
  }

  return result;
}
