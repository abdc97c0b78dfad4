// worldcore/drops/dropText.ts

import type { Position, Tier } from "./DropTypes";

export function formatPosition(pos: Position): string {
  return `(${pos.x.toFixed(1)}, ${pos.y.toFixed(1)}, ${pos.z.toFixed(1)})`;
}

export function dropLiveText(tier: Tier, pos: Position): string {
  return `Tier ${tier} package is live. Go get it: ${formatPosition(pos)} 📍`;
}

export function dailyAnnouncementText(tier: Tier): string {
  return `Today's drop tier: ${tier}. Better loot awaits. 💼`;
}

export function manualAcceptedText(tier: Tier): string {
  return `You got it. Dropping tier ${tier} supply now. 📦`;
}

export function unknownTierText(): string {
  return "I don't know what kind of drop you're asking for. ❌";
}

export function notUnlockedText(tier: Tier): string {
  return `You're not high enough in the game to get a tier ${tier} drop yet. 📉`;
}

export function noLocationsText(): string {
  return "No safe spot to stash anything right now. Ask me again later. 🚫";
}
