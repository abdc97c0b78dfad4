// worldcore/drops/TierCatalog.ts

import type { ItemCatalog, ItemDefinition } from "../items/ItemTypes";
import { Logger, type LogSink } from "../utils/logger";
import { DEFAULT_DROP_CONFIG, type DropConfig, type TierUnlockRule } from "./DropConfig";
import type { ItemRef, Tier } from "./DropTypes";

/**
 * Read-only tier → loot table plus the week → unlocked-tier policy.
 * Built once from a validated DropConfig; never gains tiers afterwards.
 */
export class TierCatalog {
  private readonly lootByTier: ReadonlyMap<Tier, readonly ItemRef[]>;
  private readonly unlockRules: readonly TierUnlockRule[];
  private readonly topTier: Tier;

  constructor(
    config: Pick<DropConfig, "tierLoot" | "unlockRules" | "topTier"> = DEFAULT_DROP_CONFIG,
    private readonly log: LogSink = Logger.scope("DROPS"),
  ) {
    const map = new Map<Tier, readonly ItemRef[]>();
    for (const [key, refs] of Object.entries(config.tierLoot)) {
      map.set(Number(key), Object.freeze([...refs]));
    }
    this.lootByTier = map;
    this.unlockRules = [...config.unlockRules];
    this.topTier = config.topTier;
  }

  isValidTier(tier: Tier): boolean {
    return this.lootByTier.has(tier);
  }

  tiers(): Tier[] {
    return Array.from(this.lootByTier.keys()).sort((a, b) => a - b);
  }

  lootFor(tier: Tier): ItemRef[] {
    const refs = this.lootByTier.get(tier);
    if (!refs) {
      this.log.warn(`Unknown loot tier requested: ${tier}`);
      return [];
    }
    return [...refs];
  }

  unlockedTierFor(week: number): Tier {
    for (const rule of this.unlockRules) {
      if (week <= rule.maxWeek) return rule.tier;
    }
    return this.topTier;
  }

  /**
   * Resolve a tier's refs to definitions. Refs the catalog does not know
   * are skipped with a warning.
   */
  resolveLoot(tier: Tier, items: ItemCatalog): ItemDefinition[] {
    const out: ItemDefinition[] = [];
    for (const ref of this.lootFor(tier)) {
      const def = items.resolve(ref);
      if (def) {
        out.push(def);
      } else {
        this.log.warn(`Item not found for ID: ${ref}`, { tier });
      }
    }
    return out;
  }
}
