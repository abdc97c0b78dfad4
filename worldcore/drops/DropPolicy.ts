// worldcore/drops/DropPolicy.ts
//
// Small scheduling helpers shared by the drop paths.

import type { ItemDefinition } from "../items/ItemTypes";
import type { RandomSource } from "../utils/Rng";
import type { FillWindow } from "./DropConfig";

export const DAYS_PER_WEEK = 7;

export function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}

export function weekForDays(elapsedDays: number): number {
  return Math.floor(Math.max(0, elapsedDays) / DAYS_PER_WEEK);
}

export function dayOfWeek(elapsedDays: number): number {
  return Math.max(0, elapsedDays) % DAYS_PER_WEEK;
}

/** Uniform day in 0..6. */
export function rollScheduledDay(rng: RandomSource): number {
  return rng.int(0, DAYS_PER_WEEK - 1);
}

/** Tiered path (automatic + manual): uniform in the window. */
export function tieredFillCount(rng: RandomSource, window: FillWindow): number {
  return rng.int(window.min, window.max);
}

/** Daily refresh path: grows with the week, pinned to the window. */
export function dailyFillCount(week: number, window: FillWindow): number {
  return clamp(week + 1, window.min, window.max);
}

// Items without a meaningful stack limit always come as a single unit.
export function rollQuantity(rng: RandomSource, def: ItemDefinition): number {
  return def.maxStack > 1 ? rng.int(1, def.maxStack) : 1;
}
