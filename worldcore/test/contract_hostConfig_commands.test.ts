// worldcore/test/contract_hostConfig_commands.test.ts
//
// Contract: environment parsing (defaults, overrides, rejects), console command parsing,
// and file log line formatting.

import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";

import { parseHostConfig } from "../../mod-host/config";
import { parseCommand } from "../../mod-host/commands";
import { formatLogLine, stripAnsi } from "../../mod-host/FileLogTap";
import { DropMod } from "../drops/DropMod";
import { ItemService } from "../items/ItemService";
import { GameClock } from "../time/GameClock";
import { FakeLocations, RecordingLog, RecordingNotifier, ScriptedRandom } from "./testUtils";

test("[contract] host config defaults match the reference drop policy", () => {
  const cfg = parseHostConfig({});

  assert.deepEqual(cfg, {
    seed: "supply-drops",
    startDay: 0,
    dayMs: 60_000,
    daysPerSleep: 1,
    dailyRefresh: false,
    scheduleOnStart: false,
    locationsFile: path.join(__dirname, "..", "..", "mod-host", "locations.json"),
    databaseUrl: undefined,
    fileLog: undefined,
    tieredFill: { min: 2, max: 5 },
    dailyFill: { min: 2, max: 5 },
    unlockRules: [
      { maxWeek: 1, tier: 1 },
      { maxWeek: 3, tier: 2 },
    ],
  });
});

test("[contract] host config reads overrides from the environment", () => {
  const cfg = parseHostConfig({
    SD_SEED: "test-seed",
    SD_START_DAY: "14",
    SD_DAY_MS: "250",
    SD_DAYS_PER_SLEEP: "0",
    SD_DAILY_REFRESH: "TRUE",
    SD_TIERED_FILL: " 3 - 4 ",
    SD_TIER_UNLOCK_WEEKS: "0, 2",
    DATABASE_URL: "postgres://localhost/test",
  });

  assert.equal(cfg.seed, "test-seed");
  assert.equal(cfg.startDay, 14);
  assert.equal(cfg.dayMs, 250);
  assert.equal(cfg.daysPerSleep, 0);
  assert.equal(cfg.dailyRefresh, true);
  assert.deepEqual(cfg.tieredFill, { min: 3, max: 4 });
  assert.deepEqual(cfg.dailyFill, { min: 2, max: 5 });
  assert.deepEqual(cfg.unlockRules, [
    { maxWeek: 0, tier: 1 },
    { maxWeek: 2, tier: 2 },
  ]);
  assert.equal(cfg.databaseUrl, "postgres://localhost/test");
});

test("[contract] empty env values fall back to the defaults", () => {
  const cfg = parseHostConfig({ SD_TIER_UNLOCK_WEEKS: "", SD_TIERED_FILL: "", SD_DAY_MS: "" });

  assert.deepEqual(cfg.unlockRules, [
    { maxWeek: 1, tier: 1 },
    { maxWeek: 3, tier: 2 },
  ]);
  assert.deepEqual(cfg.tieredFill, { min: 2, max: 5 });
  assert.equal(cfg.dayMs, 60_000);
});

test("[contract] host config rejects bad values", () => {
  for (const env of [
    { SD_DAY_MS: "5" },
    { SD_START_DAY: "-1" },
    { SD_TIERED_FILL: "5-2" },
    { SD_DAILY_FILL: "lots" },
    { SD_TIER_UNLOCK_WEEKS: "1,x" },
  ]) {
    assert.throws(() => parseHostConfig(env), /Invalid environment configuration/, JSON.stringify(env));
  }
});

test("[contract] host unlock weeks become a valid drop config", () => {
  const cfg = parseHostConfig({ SD_TIER_UNLOCK_WEEKS: "0,2" });
  const mod = new DropMod(
    {
      clock: new GameClock(0, new RecordingLog()),
      items: new ItemService(undefined, new RecordingLog()),
      locations: new FakeLocations(),
      notifier: new RecordingNotifier(),
      rng: new ScriptedRandom(),
      log: new RecordingLog(),
    },
    { config: { unlockRules: cfg.unlockRules, topTier: cfg.unlockRules.length + 1 } },
  );

  assert.deepEqual(
    [0, 1, 2, 3].map((w) => mod.catalog.unlockedTierFor(w)),
    [1, 2, 2, 3],
  );
});

test("[contract] console commands parse into host actions", () => {
  assert.deepEqual(parseCommand("drop 2"), { kind: "drop", tier: 2 });
  assert.deepEqual(parseCommand("  DROP   3 "), { kind: "drop", tier: 3 });
  assert.deepEqual(parseCommand("drop two"), { kind: "unknown", input: "drop two", hint: "usage: drop <tier>" });
  assert.deepEqual(parseCommand("day"), { kind: "day", count: 1 });
  assert.deepEqual(parseCommand("day 7"), { kind: "day", count: 7 });
  assert.deepEqual(parseCommand("day 0"), { kind: "unknown", input: "day 0", hint: "usage: day [n]" });
  assert.deepEqual(parseCommand("exit"), { kind: "quit" });
  assert.deepEqual(parseCommand("?"), { kind: "help" });
  assert.deepEqual(parseCommand("dance"), { kind: "unknown", input: "dance" });
});

test("[contract] file log lines are timestamped and colour-free", () => {
  const line = formatLogLine(
    "log",
    ["\x1b[32m[DROPS:INFO]\x1b[0m Fill complete", { count: 2 }],
    new Date("2026-03-04T05:06:07.000Z"),
  );

  assert.equal(line, "[2026-03-04T05:06:07.000Z] [log] [DROPS:INFO] Fill complete { count: 2 }\n");
  assert.equal(stripAnsi("\x1b[93mhi\x1b[0m"), "hi");
});
