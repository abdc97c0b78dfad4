// mod-host/config.ts

import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import type { FillWindow, TierUnlockRule } from "../worldcore/drops/DropConfig";
import { Logger } from "../worldcore/utils/logger";

const log = Logger.scope("HOST");

export interface HostConfig {
  seed: string;
  startDay: number;

  // Real ms per in-game day.
  dayMs: number;
  daysPerSleep: number;

  dailyRefresh: boolean;
  scheduleOnStart: boolean;

  locationsFile: string;
  databaseUrl?: string;
  fileLog?: string;

  tieredFill: FillWindow;
  dailyFill: FillWindow;
  // maxWeek per tier, tier 1 first; the tier after the last entry is the top tier.
  unlockRules: TierUnlockRule[];
}

// Defaults (human readable)
const DEFAULT_DAY_MS = 60_000; // 1 minute per in-game day
const DEFAULT_LOCATIONS_FILE = path.join(__dirname, "locations.json");

function intFrom(fallback: number, min: number, name: string) {
  return z
    .string()
    .optional()
    .transform((v) => (v ? Number(v) : fallback))
    .refine((n) => Number.isInteger(n) && n >= min, {
      message: `${name} must be an integer >= ${min}`,
    });
}

function flag(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((v) => (v ? v.toLowerCase() === "true" : fallback));
}

// "2-5" → { min: 2, max: 5 }
function windowFrom(fallback: FillWindow, name: string) {
  return z
    .string()
    .optional()
    .transform((v, ctx): FillWindow => {
      if (!v) return fallback;
      const m = /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(v);
      if (!m || Number(m[1]) < 1 || Number(m[1]) > Number(m[2])) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must look like "2-5" with 1 <= min <= max` });
        return z.NEVER;
      }
      return { min: Number(m[1]), max: Number(m[2]) };
    });
}

// "1,3" → [{ maxWeek: 1, tier: 1 }, { maxWeek: 3, tier: 2 }]
const UnlockWeeksSchema = z
  .string()
  .optional()
  .transform((v, ctx): TierUnlockRule[] => {
    const raw = v?.trim() || "1,3";
    const weeks = raw.split(",").map((s) => Number(s.trim()));
    if (weeks.some((w) => !Number.isInteger(w) || w < 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "SD_TIER_UNLOCK_WEEKS must be comma-separated week numbers" });
      return z.NEVER;
    }
    return weeks.map((maxWeek, i) => ({ maxWeek, tier: i + 1 }));
  });

const ConfigSchema = z.object({
  SD_SEED: z.string().optional().default("supply-drops"),
  SD_START_DAY: intFrom(0, 0, "SD_START_DAY"),
  SD_DAY_MS: intFrom(DEFAULT_DAY_MS, 10, "SD_DAY_MS"),
  SD_DAYS_PER_SLEEP: intFrom(1, 0, "SD_DAYS_PER_SLEEP"),
  SD_DAILY_REFRESH: flag(false),
  SD_SCHEDULE_ON_START: flag(false),
  SD_LOCATIONS_FILE: z.string().optional(),
  SD_DATABASE_URL: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  SD_FILELOG: z.string().optional(),
  SD_TIERED_FILL: windowFrom({ min: 2, max: 5 }, "SD_TIERED_FILL"),
  SD_DAILY_FILL: windowFrom({ min: 2, max: 5 }, "SD_DAILY_FILL"),
  SD_TIER_UNLOCK_WEEKS: UnlockWeeksSchema,
});

/**
 * Validate the environment into a HostConfig. Logs every issue and
 * throws when anything is off.
 */
export function parseHostConfig(env: NodeJS.ProcessEnv = process.env): HostConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path.join("."), msg: i.message }));
    log.error("Invalid environment configuration", { issues });
    throw new Error("Invalid environment configuration");
  }

  const e = parsed.data;
  return {
    seed: e.SD_SEED,
    startDay: e.SD_START_DAY,
    dayMs: e.SD_DAY_MS,
    daysPerSleep: e.SD_DAYS_PER_SLEEP,
    dailyRefresh: e.SD_DAILY_REFRESH,
    scheduleOnStart: e.SD_SCHEDULE_ON_START,
    locationsFile: e.SD_LOCATIONS_FILE ?? DEFAULT_LOCATIONS_FILE,
    databaseUrl: e.SD_DATABASE_URL ?? e.DATABASE_URL,
    fileLog: e.SD_FILELOG,
    tieredFill: e.SD_TIERED_FILL,
    dailyFill: e.SD_DAILY_FILL,
    unlockRules: e.SD_TIER_UNLOCK_WEEKS,
  };
}

/** Load .env into process.env, then parse. */
export function loadHostConfig(): HostConfig {
  dotenv.config();
  return parseHostConfig(process.env);
}
