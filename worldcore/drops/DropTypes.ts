// worldcore/drops/DropTypes.ts

import type { ItemAddResult, ItemInstance } from "../items/ItemTypes";

export type Tier = number;

/** Opaque item id; resolved to a definition through the host's ItemCatalog. */
export type ItemRef = string;

export interface Position {
  x: number;
  y: number;
  z: number;
}

export interface StorageHandle {
  addItem(instance: ItemInstance): ItemAddResult;
}

export interface DropLocation {
  id: string;
  position: Position;
  storage: StorageHandle;
}

export interface LocationProvider {
  allAvailableLocations(): readonly DropLocation[];
}

export interface Notifier {
  sendMessage(text: string): void;
}

/**
 * Host-side clock. Subscriptions return an unsubscribe function.
 */
export interface TimeSource {
  readonly elapsedDays: number;
  onDayPass(listener: () => void): () => void;
  onWeekPass(listener: () => void): () => void;
  onSleepStart(listener: () => void): () => void;
}

export type DropOrigin = "auto" | "manual" | "daily";

export type DropFailureReason = "unknown tier" | "not unlocked yet" | "no locations";

export type DropRequest =
  | {
      ok: true;
      tier: Tier;
      origin: DropOrigin;
      location: DropLocation;
      requestedCount: number;
      itemsAdded: number;
    }
  | {
      ok: false;
      tier: Tier;
      origin: DropOrigin;
      reason: DropFailureReason;
    };

export type SchedulerPhase = "idle" | "active";

export interface SchedulerState {
  activeDrop: DropLocation | null;
  // null = no automatic drop has fired yet
  lastAutoDropWeek: number | null;
  // null until the first week-passed signal
  scheduledDayOfWeek: number | null;
}

export interface SchedulerSnapshot extends Readonly<SchedulerState> {
  phase: SchedulerPhase;
  elapsedDays: number;
  week: number;
  dayOfWeek: number;
}
