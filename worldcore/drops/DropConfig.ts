// worldcore/drops/DropConfig.ts

import { z } from "zod";
import type { ItemRef, Tier } from "./DropTypes";

export interface FillWindow {
  min: number;
  max: number;
}

/** `week <= maxWeek` unlocks up to `tier`. Rules are checked in order. */
export interface TierUnlockRule {
  maxWeek: number;
  tier: Tier;
}

export interface DropConfig {
  tierLoot: Readonly<Record<number, readonly ItemRef[]>>;

  unlockRules: readonly TierUnlockRule[];
  // Unlocked once every rule's maxWeek has been passed.
  topTier: Tier;

  // Auto + manual drops: uniform count in [min, max].
  tieredFill: FillWindow;
  // Daily refresh: clamp(week + 1, min, max).
  dailyFill: FillWindow;
}

export const DEFAULT_TIER_LOOT: Readonly<Record<number, readonly ItemRef[]>> = {
  1: ["cash", "soda", "energy_drink"],
  2: ["weed_bag", "fertilizer", "clippers"],
  3: ["goldwatch", "m1911", "goldbar"],
};

export const DEFAULT_DROP_CONFIG: DropConfig = {
  tierLoot: DEFAULT_TIER_LOOT,
  unlockRules: [
    { maxWeek: 1, tier: 1 },
    { maxWeek: 3, tier: 2 },
  ],
  topTier: 3,
  tieredFill: { min: 2, max: 5 },
  dailyFill: { min: 2, max: 5 },
};

const FillWindowSchema = z
  .object({
    min: z.number().int().min(1),
    max: z.number().int().min(1),
  })
  .refine((w) => w.min <= w.max, { message: "fill window min must be <= max" });

const DropConfigSchema = z
  .object({
    tierLoot: z.record(z.string().regex(/^\d+$/), z.array(z.string().min(1))),
    unlockRules: z.array(
      z.object({ maxWeek: z.number().int().min(0), tier: z.number().int().min(1) }),
    ),
    topTier: z.number().int().min(1),
    tieredFill: FillWindowSchema,
    dailyFill: FillWindowSchema,
  })
  .superRefine((cfg, ctx) => {
    const known = new Set(Object.keys(cfg.tierLoot).map(Number));
    const chain = [...cfg.unlockRules.map((r) => r.tier), cfg.topTier];

    for (const tier of chain) {
      if (!known.has(tier)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unlock tier ${tier} has no loot table` });
      }
    }
    for (let i = 1; i < cfg.unlockRules.length; i++) {
      if (cfg.unlockRules[i].maxWeek <= cfg.unlockRules[i - 1].maxWeek) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "unlock rules must have increasing maxWeek" });
      }
    }
    for (let i = 1; i < chain.length; i++) {
      if (chain[i] < chain[i - 1]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "unlocked tier must never decrease with week" });
      }
    }
  });

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws with every issue listed when the config is unusable.
 */
export function resolveDropConfig(overrides: Partial<DropConfig> = {}): DropConfig {
  const merged: DropConfig = { ...DEFAULT_DROP_CONFIG, ...overrides };
  const parsed = DropConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => i.message).join("; ");
    throw new Error(`Invalid drop config: ${issues}`);
  }
  return merged;
}
