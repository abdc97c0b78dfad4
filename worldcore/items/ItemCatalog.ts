// worldcore/items/ItemCatalog.ts

import { ItemDefinition } from "./ItemTypes";

// Built-in definitions for everything the supplier can drop.
// DB-backed definitions are loaded by ItemService; this is the static fallback.
const ITEMS: Record<string, ItemDefinition> = {
  // --- Tier 1: street basics ---

  cash: {
    id: "cash",
    name: "Cash",
    maxStack: 1000,
    category: "cash",
    description: "Crumpled bills. Nobody asks where they came from.",
  },

  soda: {
    id: "soda",
    name: "Soda",
    maxStack: 10,
    category: "consumable",
    description: "Flat, warm, still better than nothing.",
  },

  energy_drink: {
    id: "energy_drink",
    name: "Energy Drink",
    maxStack: 10,
    category: "consumable",
    description: "Keeps you up long after you should be asleep.",
  },

  // --- Tier 2: grow supplies ---

  weed_bag: {
    id: "weed_bag",
    name: "Baggie",
    maxStack: 20,
    category: "product",
  },

  fertilizer: {
    id: "fertilizer",
    name: "Fertilizer",
    maxStack: 10,
    category: "grow",
    description: "Smells exactly like you think.",
  },

  clippers: {
    id: "clippers",
    name: "Trimming Clippers",
    maxStack: 1,
    category: "tool",
  },

  // --- Tier 3: the good stuff ---

  goldwatch: {
    id: "goldwatch",
    name: "Gold Watch",
    maxStack: 1,
    category: "valuable",
    description: "Heavy, shiny, definitely not yours.",
  },

  m1911: {
    id: "m1911",
    name: "M1911",
    maxStack: 1,
    category: "gear",
  },

  goldbar: {
    id: "goldbar",
    name: "Gold Bar",
    maxStack: 5,
    category: "valuable",
  },
};

export function getItemTemplate(id: string): ItemDefinition | null {
  return ITEMS[id] ?? null;
}

export function listAllItems(): ItemDefinition[] {
  return Object.values(ITEMS);
}
