// worldcore/drops/DropMod.ts

import type { ItemCatalog } from "../items/ItemTypes";
import { SupplierContact } from "../npc/SupplierContact";
import { Logger, type LogSink } from "../utils/logger";
import type { RandomSource } from "../utils/Rng";
import { resolveDropConfig, type DropConfig } from "./DropConfig";
import { DropScheduler } from "./DropScheduler";
import type { LocationProvider, Notifier, TimeSource } from "./DropTypes";
import { TierCatalog } from "./TierCatalog";

export interface DropModEnvironment {
  clock: TimeSource;
  items: ItemCatalog;
  locations: LocationProvider;
  notifier: Notifier;
  rng: RandomSource;
  log?: LogSink;
}

export interface DropModOptions {
  config?: Partial<DropConfig>;
  // Run the daily refresh drop on every day pass that placed no automatic drop.
  dailyRefresh?: boolean;
}

/**
 * One instance per process. Builds the catalog, scheduler and supplier
 * contact, and hooks the scheduler to the clock on initialize().
 */
export class DropMod {
  readonly config: DropConfig;
  readonly catalog: TierCatalog;
  readonly scheduler: DropScheduler;
  readonly supplier: SupplierContact;

  private readonly log: LogSink;
  private readonly dailyRefresh: boolean;
  private unsubscribers: (() => void)[] = [];

  constructor(
    private readonly env: DropModEnvironment,
    opts: DropModOptions = {},
  ) {
    this.log = env.log ?? Logger.scope("DROPS");
    this.config = resolveDropConfig(opts.config);
    this.dailyRefresh = opts.dailyRefresh ?? false;

    this.catalog = new TierCatalog(this.config, this.log);
    this.scheduler = new DropScheduler({
      clock: env.clock,
      catalog: this.catalog,
      items: env.items,
      locations: env.locations,
      notifier: env.notifier,
      rng: env.rng,
      config: this.config,
      log: this.log,
    });
    this.supplier = new SupplierContact(this.scheduler, env.notifier);
  }

  get initialized(): boolean {
    return this.unsubscribers.length > 0;
  }

  /** Returns false when already initialized. */
  initialize(): boolean {
    if (this.initialized) {
      this.log.debug("DropMod.initialize called twice; ignoring");
      return false;
    }

    const { clock } = this.env;
    this.unsubscribers = [
      clock.onWeekPass(() => this.scheduler.onWeekPass()),
      clock.onDayPass(() => this.handleDayPass()),
      clock.onSleepStart(() => this.scheduler.onSleepStart()),
    ];

    this.log.info("DropMod initialized", {
      tiers: this.catalog.tiers(),
      dailyRefresh: this.dailyRefresh,
    });
    return true;
  }

  shutdown(): void {
    for (const off of this.unsubscribers) off();
    this.unsubscribers = [];
  }

  private handleDayPass(): void {
    const auto = this.scheduler.onDayPass();
    if (!this.dailyRefresh) return;

    // The automatic drop stands in for the refresh on its day.
    if (auto?.ok) {
      this.log.debug("Automatic drop placed today; skipping daily refresh");
      return;
    }
    this.scheduler.spawnDailyDrop();
  }
}
