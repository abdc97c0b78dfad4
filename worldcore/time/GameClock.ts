// worldcore/time/GameClock.ts

import type { TimeSource } from "../drops/DropTypes";
import { DAYS_PER_WEEK } from "../drops/DropPolicy";
import { Logger, type LogSink } from "../utils/logger";

type Listener = () => void;

/**
 * In-process stand-in for the game's time manager.
 *
 * advanceDay() emits week-passed before day-passed when it crosses a
 * week boundary, so the new week's schedule is in place for its first day.
 * A throwing listener is logged and does not stop the others.
 */
export class GameClock implements TimeSource {
  private days: number;
  private readonly dayListeners = new Set<Listener>();
  private readonly weekListeners = new Set<Listener>();
  private readonly sleepListeners = new Set<Listener>();

  constructor(
    startDays = 0,
    private readonly log: LogSink = Logger.scope("CLOCK"),
  ) {
    this.days = Math.max(0, Math.floor(startDays));
  }

  get elapsedDays(): number {
    return this.days;
  }

  onDayPass(listener: Listener): () => void {
    return this.subscribe(this.dayListeners, listener);
  }

  onWeekPass(listener: Listener): () => void {
    return this.subscribe(this.weekListeners, listener);
  }

  onSleepStart(listener: Listener): () => void {
    return this.subscribe(this.sleepListeners, listener);
  }

  advanceDay(): void {
    this.days++;
    this.log.debug(`Day advanced`, { elapsedDays: this.days });

    if (this.days % DAYS_PER_WEEK === 0) {
      this.emit("week", this.weekListeners);
    }
    this.emit("day", this.dayListeners);
  }

  /** Fire week-passed without moving time (used at startup to seed the schedule). */
  announceWeek(): void {
    this.emit("week", this.weekListeners);
  }

  startSleep(): void {
    this.emit("sleep", this.sleepListeners);
  }

  private subscribe(set: Set<Listener>, listener: Listener): () => void {
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  private emit(kind: string, set: Set<Listener>): void {
    for (const listener of Array.from(set)) {
      try {
        listener();
      } catch (err: unknown) {
        this.log.warn(`Error in ${kind} listener`, { error: String(err) });
      }
    }
  }
}
