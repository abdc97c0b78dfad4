// worldcore/test/contract_dropFill_policies.test.ts
//
// Contract: tiered fill counts stay in their window, daily fill scales with the week,
// picks are with replacement, and a failing item is logged and skipped without failing the drop.
// The daily refresh announces its tier only when the drop is actually placed.

import test from "node:test";
import assert from "node:assert/strict";

import { DropScheduler } from "../drops/DropScheduler";
import { TierCatalog } from "../drops/TierCatalog";
import { clamp, dailyFillCount, rollQuantity, tieredFillCount } from "../drops/DropPolicy";
import { fillStorage, tryAddItem } from "../drops/dropFill";
import { ItemService } from "../items/ItemService";
import type { ItemCatalog, ItemDefinition, ItemInstance } from "../items/ItemTypes";
import { Rng } from "../utils/Rng";
import { StorageContainer } from "../world/StorageContainer";
import {
  FakeClock,
  FakeLocations,
  RecordingLog,
  RecordingNotifier,
  ScriptedRandom,
  makeScheduler,
} from "./testUtils";

const soda: ItemDefinition = { id: "soda", name: "Soda", maxStack: 10 };
const watch: ItemDefinition = { id: "goldwatch", name: "Gold Watch", maxStack: 1 };

test("[contract] daily fill count is clamp(week + 1, 2, 5)", () => {
  const window = { min: 2, max: 5 };
  const got = [0, 1, 2, 3, 4, 5, 20].map((w) => dailyFillCount(w, window));
  assert.deepEqual(got, [2, 2, 3, 4, 5, 5, 5]);
  assert.equal(clamp(9, 2, 5), 5);
  assert.equal(clamp(-3, 2, 5), 2);
});

test("[contract] tiered fill count always lands in [2, 5]", () => {
  const rng = new Rng("fill-window");
  const seen = new Set<number>();
  for (let i = 0; i < 500; i++) {
    const n = tieredFillCount(rng, { min: 2, max: 5 });
    assert.ok(n >= 2 && n <= 5, `count ${n} out of range`);
    seen.add(n);
  }
  assert.deepEqual([...seen].sort(), [2, 3, 4, 5]);
});

test("[contract] tiered drops over many seeds request between 2 and 5 items", () => {
  for (let seed = 1; seed <= 50; seed++) {
    const locations = new FakeLocations([{ x: 0, y: 0, z: 0 }]);
    const scheduler = new DropScheduler({
      clock: new FakeClock(0),
      catalog: new TierCatalog(undefined, new RecordingLog()),
      items: new ItemService(undefined, new RecordingLog()),
      locations,
      notifier: new RecordingNotifier(),
      rng: new Rng(seed),
      log: new RecordingLog(),
    });

    const res = scheduler.spawnDrop(1, "manual");
    assert.ok(res.ok);
    assert.ok(res.requestedCount >= 2 && res.requestedCount <= 5, `seed ${seed}: ${res.requestedCount}`);
    assert.equal(res.itemsAdded, res.requestedCount);
  }
});

test("[contract] the daily path uses the week-scaled count, the tiered path the random one", () => {
  const h = makeScheduler({ week: 3 });

  const daily = h.scheduler.spawnDailyDrop();
  assert.ok(daily.ok);
  assert.equal(daily.requestedCount, 4);
  assert.equal(daily.origin, "daily");

  // Daily path never asks the rng for a count; first int call is a quantity.
  assert.deepEqual(h.rng.intCalls[0], [1, 20]);
  assert.deepEqual(h.rng.pickManyCalls, [{ size: 3, count: 4 }]);
});

test("[contract] daily refresh announces the week's tier before the drop message", () => {
  const h = makeScheduler({ week: 2 });

  h.scheduler.spawnDailyDrop();

  assert.deepEqual(h.notifier.messages, [
    "Today's drop tier: 2. Better loot awaits. 💼",
    "Tier 2 package is live. Go get it: (1.0, 2.0, 3.0) 📍",
  ]);
  assert.equal(h.scheduler.snapshot().lastAutoDropWeek, null);
});

test("[contract] daily refresh with no locations fails silently to the player", () => {
  const h = makeScheduler({ week: 2, locations: [] });

  const res = h.scheduler.spawnDailyDrop();

  assert.deepEqual(res, { ok: false, tier: 2, origin: "daily", reason: "no locations" });
  assert.deepEqual(h.notifier.messages, []);
  assert.equal(h.scheduler.snapshot().phase, "idle");
});

test("[contract] picks are with replacement: a short list still fills the whole count", () => {
  const rng = new ScriptedRandom();
  const storage = new StorageContainer();
  const res = fillStorage(storage, [soda, watch], 5, {
    items: new ItemService([soda, watch], new RecordingLog()),
    rng,
    log: new RecordingLog(),
  });

  assert.deepEqual(
    res.added.map((a) => a.itemId),
    ["soda", "goldwatch", "soda", "goldwatch", "soda"],
  );
  assert.deepEqual(storage.contents(), [
    { itemId: "soda", qty: 3 },
    { itemId: "goldwatch", qty: 2 },
  ]);
});

test("[contract] Rng.pickMany repeats entries when the list is shorter than the count", () => {
  const picks = new Rng(42).pickMany(["only"], 4);
  assert.deepEqual(picks, ["only", "only", "only", "only"]);
  assert.deepEqual(new Rng(42).pickMany([], 3), []);
});

test("[contract] quantity is 1..maxStack, and exactly 1 without a stack limit", () => {
  const rng = new ScriptedRandom([7]);
  assert.equal(rollQuantity(rng, soda), 7);
  assert.deepEqual(rng.intCalls, [[1, 10]]);

  assert.equal(rollQuantity(rng, watch), 1);
  assert.equal(rollQuantity(rng, { id: "x", name: "X", maxStack: 0 }), 1);
  assert.equal(rng.intCalls.length, 1);
});

test("[contract] an empty loot list yields an empty but successful drop", () => {
  const log = new RecordingLog();
  const notifier = new RecordingNotifier();
  const locations = new FakeLocations([{ x: 1, y: 1, z: 1 }]);
  const scheduler = new DropScheduler({
    clock: new FakeClock(0),
    catalog: new TierCatalog({ tierLoot: { 1: ["nope"] }, unlockRules: [], topTier: 1 }, log),
    items: new ItemService([], new RecordingLog()),
    locations,
    notifier,
    rng: new ScriptedRandom(),
    log,
  });

  const res = scheduler.spawnDrop(1, "manual");
  assert.ok(res.ok);
  assert.equal(res.itemsAdded, 0);
  assert.ok(locations.list[0].storage.isEmpty());
  assert.equal(notifier.messages.length, 1);
  assert.deepEqual(log.warnings(), [
    "Item not found for ID: nope",
    "No items retrieved for tier, drop will be empty.",
  ]);
});

class FlakyItems implements ItemCatalog {
  constructor(private readonly behaviour: Record<string, "ok" | "null" | "throw">) {}

  resolve(itemId: string): ItemDefinition | null {
    return { id: itemId, name: itemId, maxStack: 1 };
  }

  createInstance(def: ItemDefinition, qty: number): ItemInstance | null {
    const mode = this.behaviour[def.id] ?? "ok";
    if (mode === "throw") throw new Error(`boom ${def.id}`);
    if (mode === "null") return null;
    return { itemId: def.id, qty };
  }
}

test("[contract] item failures are logged and skipped; the drop still succeeds", () => {
  const log = new RecordingLog();
  const notifier = new RecordingNotifier();
  const locations = new FakeLocations([{ x: 0, y: 0, z: 0 }]);
  const scheduler = new DropScheduler({
    clock: new FakeClock(0),
    catalog: new TierCatalog(
      { tierLoot: { 1: ["good", "bad_null", "bad_throw", "good_two"] }, unlockRules: [], topTier: 1 },
      log,
    ),
    items: new FlakyItems({ bad_null: "null", bad_throw: "throw" }),
    locations,
    notifier,
    // count roll = 4 → one pick of each entry
    rng: new ScriptedRandom([4]),
    log,
  });

  const res = scheduler.spawnDrop(1, "manual");

  assert.ok(res.ok);
  assert.equal(res.itemsAdded, 2);
  assert.deepEqual(locations.list[0].storage.contents(), [
    { itemId: "good", qty: 1 },
    { itemId: "good_two", qty: 1 },
  ]);
  assert.deepEqual(log.warnings(), [
    "Error adding item bad_null: failed to create instance",
    "Error adding item bad_throw: boom bad_throw",
  ]);
  assert.equal(notifier.messages.length, 1);
});

test("[contract] storage refusals come back as ok:false from tryAddItem", () => {
  const items = new ItemService([soda, watch], new RecordingLog());
  const storage = new StorageContainer(1);

  assert.deepEqual(tryAddItem(items, storage, soda, 2), { ok: true });
  assert.deepEqual(tryAddItem(items, storage, watch, 1), { ok: false, reason: "storage full" });

  const throwing = {
    addItem(): never {
      throw new Error("container locked");
    },
  };
  assert.deepEqual(tryAddItem(items, throwing, soda, 1), { ok: false, reason: "container locked" });
});
