// worldcore/drops/DropScheduler.ts

import type { ItemCatalog } from "../items/ItemTypes";
import { Logger, type LogSink } from "../utils/logger";
import type { RandomSource } from "../utils/Rng";
import { DEFAULT_DROP_CONFIG, type DropConfig } from "./DropConfig";
import {
  dailyFillCount,
  dayOfWeek,
  rollScheduledDay,
  tieredFillCount,
  weekForDays,
} from "./DropPolicy";
import { fillStorage } from "./dropFill";
import { dailyAnnouncementText, dropLiveText, formatPosition } from "./dropText";
import type {
  DropOrigin,
  DropRequest,
  ItemRef,
  LocationProvider,
  Notifier,
  SchedulerPhase,
  SchedulerSnapshot,
  SchedulerState,
  Tier,
  TimeSource,
} from "./DropTypes";
import { TierCatalog } from "./TierCatalog";

export interface DropSchedulerDeps {
  clock: Pick<TimeSource, "elapsedDays">;
  catalog: TierCatalog;
  items: ItemCatalog;
  locations: LocationProvider;
  notifier: Notifier;
  rng: RandomSource;
  config?: Pick<DropConfig, "tieredFill" | "dailyFill">;
  log?: LogSink;
}

/**
 * Weekly drop state machine.
 *
 * Idle → Active on any successful spawn, Active → Idle on sleep. A new
 * automatic drop day is rolled on every week-passed signal and at most
 * one automatic drop fires per week. Manual requests go through the
 * same spawn path, gated by the catalog's unlock policy.
 *
 * All handlers are synchronous and expect single-threaded delivery.
 */
export class DropScheduler {
  private readonly log: LogSink;
  private readonly cfg: Pick<DropConfig, "tieredFill" | "dailyFill">;

  private state: SchedulerState = {
    activeDrop: null,
    lastAutoDropWeek: null,
    scheduledDayOfWeek: null,
  };

  constructor(private readonly deps: DropSchedulerDeps) {
    this.log = deps.log ?? Logger.scope("DROPS");
    this.cfg = deps.config ?? DEFAULT_DROP_CONFIG;
  }

  get currentWeek(): number {
    return weekForDays(this.deps.clock.elapsedDays);
  }

  snapshot(): SchedulerSnapshot {
    const elapsedDays = this.deps.clock.elapsedDays;
    const phase: SchedulerPhase = this.state.activeDrop ? "active" : "idle";
    return Object.freeze({
      ...this.state,
      phase,
      elapsedDays,
      week: weekForDays(elapsedDays),
      dayOfWeek: dayOfWeek(elapsedDays),
    });
  }

  onWeekPass(): void {
    this.state.scheduledDayOfWeek = rollScheduledDay(this.deps.rng);
    this.log.info(`Week ${this.currentWeek} began (ElapsedDays=${this.deps.clock.elapsedDays})`);
    this.log.info(`Scheduled auto-drop for day ${this.state.scheduledDayOfWeek}`);
  }

  /** Returns the automatic spawn attempt, or null when today is not the drop day. */
  onDayPass(): DropRequest | null {
    const week = this.currentWeek;
    const today = dayOfWeek(this.deps.clock.elapsedDays);
    this.log.debug(`New in-game day ${today} of week ${week}`);

    if (this.state.lastAutoDropWeek === week) return null;
    if (this.state.scheduledDayOfWeek !== today) return null;

    const tier = this.deps.rng.pick(this.deps.catalog.tiers());
    this.log.info(`Auto-drop trigger matched today=${today}, rolling tier=${tier}`);

    const res = this.spawnDrop(tier, "auto");
    if (res.ok) {
      this.state.lastAutoDropWeek = week;
    }
    return res;
  }

  onSleepStart(): void {
    const active = this.state.activeDrop;
    if (active) {
      this.log.info(`Cleaning up drop ${active.id}`);
    }
    this.state.activeDrop = null;
  }

  /** Manual request with the rejection reason kept. */
  tryManualDrop(tier: Tier): DropRequest {
    if (!this.deps.catalog.isValidTier(tier)) {
      this.log.warn(`Manual drop rejected: unknown tier ${tier}`);
      return { ok: false, tier, origin: "manual", reason: "unknown tier" };
    }

    const unlocked = this.deps.catalog.unlockedTierFor(this.currentWeek);
    if (tier > unlocked) {
      this.log.info(
        `Manual drop for tier ${tier} blocked due to insufficient week (${this.currentWeek}, unlocked=${unlocked})`,
      );
      return { ok: false, tier, origin: "manual", reason: "not unlocked yet" };
    }

    return this.spawnDrop(tier, "manual");
  }

  requestManualDrop(tier: Tier): boolean {
    return this.tryManualDrop(tier).ok;
  }

  /**
   * Unconditional daily refresh: drop the week's tier with the week-scaled
   * fill count, announced ahead of the drop message. Nothing is sent when
   * the drop cannot be placed. Does not count as the weekly automatic drop.
   */
  spawnDailyDrop(): DropRequest {
    const tier = this.deps.catalog.unlockedTierFor(this.currentWeek);
    return this.placeDrop(tier, "daily", dailyAnnouncementText(tier));
  }

  lootForCurrentWeek(): ItemRef[] {
    return this.deps.catalog.lootFor(this.deps.catalog.unlockedTierFor(this.currentWeek));
  }

  /**
   * Place a drop at one available location and tell the player where.
   * Fails without side effects when the tier is unknown or there is
   * nowhere to put it; item-level failures only shrink the drop.
   */
  spawnDrop(tier: Tier, origin: DropOrigin): DropRequest {
    return this.placeDrop(tier, origin);
  }

  private placeDrop(tier: Tier, origin: DropOrigin, announcement?: string): DropRequest {
    if (!this.deps.catalog.isValidTier(tier)) {
      this.log.warn(`Refusing ${origin} drop for unknown tier ${tier}`);
      return { ok: false, tier, origin, reason: "unknown tier" };
    }

    this.log.info(`Spawning ${origin} dead drop for tier ${tier}...`);

    const locations = this.deps.locations.allAvailableLocations();
    if (locations.length === 0) {
      this.log.warn("No drop locations available. Aborting spawn.");
      return { ok: false, tier, origin, reason: "no locations" };
    }

    const location = this.deps.rng.pick(locations);
    this.log.debug("Drop selected", {
      id: location.id,
      position: formatPosition(location.position),
    });

    const count =
      origin === "daily"
        ? dailyFillCount(this.currentWeek, this.cfg.dailyFill)
        : tieredFillCount(this.deps.rng, this.cfg.tieredFill);

    const loot = this.deps.catalog.resolveLoot(tier, this.deps.items);
    const fill = fillStorage(location.storage, loot, count, {
      items: this.deps.items,
      rng: this.deps.rng,
      log: this.log,
    });

    this.state.activeDrop = location;
    if (announcement) this.deps.notifier.sendMessage(announcement);
    this.deps.notifier.sendMessage(dropLiveText(tier, location.position));

    this.log.info(
      `Fill complete: ${fill.added.length}/${count} items at ${formatPosition(location.position)}`,
    );

    return {
      ok: true,
      tier,
      origin,
      location,
      requestedCount: count,
      itemsAdded: fill.added.length,
    };
  }
}
