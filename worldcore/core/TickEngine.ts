// worldcore/core/TickEngine.ts

import { Logger } from "../utils/logger";
import type { GameClock } from "../time/GameClock";

export interface TickEngineConfig {
  intervalMs: number; // real ms per in-game day

  // Fire sleep-start before the day that follows every N days (0 disables).
  daysPerSleep: number;

  /**
   * Optional hook invoked once per tick, after the clock moved:
   *  - tick: current tick count (starting at 1)
   *  - elapsedDays: clock value after the advance
   */
  onTick?: (tick: number, elapsedDays: number) => void;
}

/**
 * Drives the GameClock in real time: one tick = one in-game day.
 */
export class TickEngine {
  private readonly log = Logger.scope("TICK");
  private readonly intervalMs: number;

  private running = false;
  private handle: NodeJS.Timeout | null = null;
  private tickCount = 0;

  constructor(
    private readonly clock: GameClock,
    private readonly cfg: TickEngineConfig,
  ) {
    this.intervalMs = Math.max(cfg.intervalMs, 10);
  }

  get ticks(): number {
    return this.tickCount;
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    this.log.info("Starting TickEngine", {
      intervalMs: this.intervalMs,
      daysPerSleep: this.cfg.daysPerSleep,
    });

    this.handle = setInterval(() => this.tick(), this.intervalMs);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;

    if (this.handle) {
      clearInterval(this.handle);
      this.handle = null;
    }

    this.log.info("TickEngine stopped", {
      lastTick: this.tickCount,
    });
  }

  /** Sleep (when due) closes out the previous day, then the next day begins. */
  tick(): void {
    const every = this.cfg.daysPerSleep;
    if (every > 0 && this.tickCount > 0 && this.tickCount % every === 0) {
      this.clock.startSleep();
    }

    this.tickCount++;
    this.clock.advanceDay();

    try {
      this.cfg.onTick?.(this.tickCount, this.clock.elapsedDays);
    } catch (err: unknown) {
      this.log.warn("Error in TickEngine onTick hook", {
        error: String(err),
      });
    }
  }
}
