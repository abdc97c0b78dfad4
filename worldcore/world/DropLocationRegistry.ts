// worldcore/world/DropLocationRegistry.ts

import { z } from "zod";
import type { DropLocation, LocationProvider, Position } from "../drops/DropTypes";
import { StorageContainer } from "./StorageContainer";

export const DropLocationSpecSchema = z.object({
  id: z.string().min(1),
  position: z.object({ x: z.number(), y: z.number(), z: z.number() }),
  slots: z.number().int().min(1).optional(),
  enabled: z.boolean().optional(),
});

export type DropLocationSpec = z.infer<typeof DropLocationSpecSchema>;

export const DropLocationFileSchema = z.array(DropLocationSpecSchema);

export interface RegisteredLocation extends DropLocation {
  storage: StorageContainer;
  enabled: boolean;
}

/** The world's dead-drop spots, keyed by id. */
export class DropLocationRegistry implements LocationProvider {
  private readonly byId = new Map<string, RegisteredLocation>();

  static fromSpecs(specs: readonly DropLocationSpec[]): DropLocationRegistry {
    const registry = new DropLocationRegistry();
    for (const spec of specs) {
      registry.add(spec.id, spec.position, spec.slots, spec.enabled ?? true);
    }
    return registry;
  }

  add(id: string, position: Position, slots?: number, enabled = true): RegisteredLocation {
    if (this.byId.has(id)) {
      throw new Error(`Duplicate drop location '${id}'`);
    }
    const loc: RegisteredLocation = {
      id,
      position: { ...position },
      storage: new StorageContainer(slots),
      enabled,
    };
    this.byId.set(id, loc);
    return loc;
  }

  get(id: string): RegisteredLocation | null {
    return this.byId.get(id) ?? null;
  }

  setEnabled(id: string, enabled: boolean): boolean {
    const loc = this.byId.get(id);
    if (!loc) return false;
    loc.enabled = enabled;
    return true;
  }

  size(): number {
    return this.byId.size;
  }

  allAvailableLocations(): RegisteredLocation[] {
    return Array.from(this.byId.values()).filter((l) => l.enabled);
  }
}
