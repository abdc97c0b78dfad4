// worldcore/npc/SupplierContact.ts

import type { DropScheduler } from "../drops/DropScheduler";
import type { DropRequest, Notifier, Tier } from "../drops/DropTypes";
import {
  manualAcceptedText,
  noLocationsText,
  notUnlockedText,
  unknownTierText,
} from "../drops/dropText";

/**
 * The supplier the player messages to order drops. Every request gets a
 * reply, whether or not a drop was placed.
 */
export class SupplierContact {
  constructor(
    private readonly scheduler: DropScheduler,
    private readonly notifier: Notifier,
  ) {}

  requestCustomDrop(tier: Tier): DropRequest {
    const res = this.scheduler.tryManualDrop(tier);

    if (res.ok) {
      this.notifier.sendMessage(manualAcceptedText(tier));
      return res;
    }

    switch (res.reason) {
      case "unknown tier":
        this.notifier.sendMessage(unknownTierText());
        break;
      case "not unlocked yet":
        this.notifier.sendMessage(notUnlockedText(tier));
        break;
      case "no locations":
        this.notifier.sendMessage(noLocationsText());
        break;
    }

    return res;
  }
}
