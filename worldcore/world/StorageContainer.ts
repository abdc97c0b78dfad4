// worldcore/world/StorageContainer.ts

import type { StorageHandle } from "../drops/DropTypes";
import type { ItemAddResult, ItemInstance } from "../items/ItemTypes";

/**
 * Fixed-slot container. Adding an item id already present merges into
 * that slot; a new id needs a free slot.
 */
export class StorageContainer implements StorageHandle {
  private readonly slots = new Map<string, number>();

  constructor(readonly slotCount = 8) {}

  addItem(instance: ItemInstance): ItemAddResult {
    if (instance.qty < 1) {
      return { ok: false, reason: "quantity must be at least 1" };
    }

    const existing = this.slots.get(instance.itemId);
    if (existing !== undefined) {
      this.slots.set(instance.itemId, existing + instance.qty);
      return { ok: true };
    }

    if (this.slots.size >= this.slotCount) {
      return { ok: false, reason: "storage full" };
    }

    this.slots.set(instance.itemId, instance.qty);
    return { ok: true };
  }

  contents(): ItemInstance[] {
    return Array.from(this.slots, ([itemId, qty]) => ({ itemId, qty }));
  }

  isEmpty(): boolean {
    return this.slots.size === 0;
  }

  clear(): void {
    this.slots.clear();
  }
}
