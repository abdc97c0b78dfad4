// mod-host/main.ts
//
// Runs the drop mod against in-process stand-ins for the game:
// a real-time day clock, dead-drop spots from a JSON file, the item
// catalog (static or Postgres) and a console for talking to the supplier.

import fs from "fs";
import readline from "readline";

import { createDbPool, closeDbPool } from "../worldcore/db/Database";
import { TickEngine } from "../worldcore/core/TickEngine";
import { DropMod } from "../worldcore/drops/DropMod";
import { ItemService } from "../worldcore/items/ItemService";
import { ContactInbox } from "../worldcore/npc/ContactInbox";
import { GameClock } from "../worldcore/time/GameClock";
import { Logger } from "../worldcore/utils/logger";
import { Rng } from "../worldcore/utils/Rng";
import {
  DropLocationFileSchema,
  DropLocationRegistry,
} from "../worldcore/world/DropLocationRegistry";
import { HELP_LINES, parseCommand, type HostCommand } from "./commands";
import { loadHostConfig, type HostConfig } from "./config";
import { installFileLogTap } from "./FileLogTap";

const log = Logger.scope("HOST");

interface HostContext {
  clock: GameClock;
  inbox: ContactInbox;
  mod: DropMod;
  registry: DropLocationRegistry;
}

function loadLocations(file: string): DropLocationRegistry {
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  const specs = DropLocationFileSchema.parse(raw);
  const registry = DropLocationRegistry.fromSpecs(specs);
  log.info("Loaded drop locations", { file, count: registry.size() });
  return registry;
}

async function loadItems(cfg: HostConfig): Promise<ItemService> {
  const items = new ItemService();
  if (!cfg.databaseUrl) {
    log.info("Using built-in item catalog", { count: items.listAll().length });
    return items;
  }

  const pool = createDbPool(cfg.databaseUrl);
  try {
    await items.loadAll(pool);
  } finally {
    await closeDbPool(pool);
  }
  return items;
}

/** Returns false when the host should stop. */
function runCommand(cmd: HostCommand, ctx: HostContext): boolean {
  const { mod } = ctx;

  switch (cmd.kind) {
    case "drop":
      mod.supplier.requestCustomDrop(cmd.tier);
      break;
    case "daily":
      mod.scheduler.spawnDailyDrop();
      break;
    case "loot":
      log.info(`This week's loot: ${mod.scheduler.lootForCurrentWeek().join(", ")}`);
      break;
    case "status": {
      const snap = mod.scheduler.snapshot();
      log.info("Scheduler", {
        phase: snap.phase,
        elapsedDays: snap.elapsedDays,
        week: snap.week,
        dayOfWeek: snap.dayOfWeek,
        scheduledDayOfWeek: snap.scheduledDayOfWeek,
        lastAutoDropWeek: snap.lastAutoDropWeek,
        activeDrop: snap.activeDrop?.id ?? null,
        locations: ctx.registry.allAvailableLocations().length,
        unlockedTier: mod.catalog.unlockedTierFor(snap.week),
      });
      break;
    }
    case "inbox": {
      const unread = ctx.inbox.readAll();
      if (unread.length === 0) log.info("No new messages.");
      for (const m of unread) log.info(`[${m.sentAt}] ${m.from}: ${m.text}`);
      break;
    }
    case "day":
      for (let i = 0; i < cmd.count; i++) ctx.clock.advanceDay();
      break;
    case "sleep":
      ctx.clock.startSleep();
      break;
    case "help":
      for (const line of HELP_LINES) log.info(line);
      break;
    case "quit":
      return false;
    case "unknown":
      log.warn(cmd.hint ?? `Unknown command: ${cmd.input.trim()} (try "help")`);
      break;
  }
  return true;
}

async function main(): Promise<void> {
  const cfg = loadHostConfig();
  const uninstallTap = cfg.fileLog ? installFileLogTap(cfg.fileLog) : undefined;

  log.info("Starting supply-drops host...", {
    seed: cfg.seed,
    dayMs: cfg.dayMs,
    startDay: cfg.startDay,
  });

  const items = await loadItems(cfg);
  const registry = loadLocations(cfg.locationsFile);

  const clock = new GameClock(cfg.startDay);
  const inbox = new ContactInbox({ id: "supplier", firstName: "The", lastName: "Supplier" });

  const mod = new DropMod(
    { clock, items, locations: registry, notifier: inbox, rng: new Rng(cfg.seed) },
    {
      dailyRefresh: cfg.dailyRefresh,
      config: {
        unlockRules: cfg.unlockRules,
        topTier: cfg.unlockRules.length + 1,
        tieredFill: cfg.tieredFill,
        dailyFill: cfg.dailyFill,
      },
    },
  );
  mod.initialize();

  if (cfg.scheduleOnStart) {
    clock.announceWeek();
  }

  const engine = new TickEngine(clock, {
    intervalMs: cfg.dayMs,
    daysPerSleep: cfg.daysPerSleep,
  });
  engine.start();

  const ctx: HostContext = { clock, inbox, mod, registry };
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("> ");
  rl.prompt();

  rl.on("line", (line) => {
    if (line.trim() === "") {
      rl.prompt();
      return;
    }
    if (!runCommand(parseCommand(line), ctx)) {
      rl.close();
      return;
    }
    rl.prompt();
  });

  rl.on("close", () => {
    engine.stop();
    mod.shutdown();
    log.info("Host stopped");
    uninstallTap?.();
  });
}

main().catch((err: unknown) => {
  log.error("Host failed to start", err);
  process.exitCode = 1;
});
