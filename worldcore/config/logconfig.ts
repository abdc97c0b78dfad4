//worldcore/config/logconfig.ts

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") {
    return v;
  }
  return null;
}

// Per-scope defaults (can be overridden by env per scope)
const PER_SCOPE_DEFAULTS: Record<string, LogLevel> = {
  // Day-advance lines only show with LOG_SCOPE_CLOCK=debug.
  CLOCK: "info",
};

// Allow env overrides like LOG_SCOPE_DROPS=warn, LOG_SCOPE_CLOCK=debug, etc.
function getScopeLevel(scope: string): LogLevel {
  const key = scope.toUpperCase();

  // 1) Explicit per-scope env override
  const fromEnv = parseLevel(process.env[`LOG_SCOPE_${key}`]);
  if (fromEnv) return fromEnv;

  // 2) Default table
  const fromTable = PER_SCOPE_DEFAULTS[key];
  if (fromTable) return fromTable;

  // 3) Global fallback; read per call so tests and the host can change it.
  return parseLevel(process.env.LOG_LEVEL) ?? "info";
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  const wantedIdx = LOG_LEVELS.indexOf(getScopeLevel(scope));
  const levelIdx = LOG_LEVELS.indexOf(level);
  return levelIdx >= wantedIdx;
}
