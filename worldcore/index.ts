// worldcore/index.ts

// Config
export * from "./config/logconfig";
export * from "./drops/DropConfig";

// Drop core
export * from "./drops/DropTypes";
export * from "./drops/DropPolicy";
export * from "./drops/TierCatalog";
export * from "./drops/DropScheduler";
export * from "./drops/DropMod";
export * from "./drops/dropFill";
export * from "./drops/dropText";

// Items
export * from "./items/ItemTypes";
export * from "./items/ItemCatalog";
export * from "./items/ItemService";

// Environment stand-ins
export * from "./npc/ContactInbox";
export * from "./npc/SupplierContact";
export * from "./time/GameClock";
export * from "./core/TickEngine";
export * from "./world/StorageContainer";
export * from "./world/DropLocationRegistry";

// Utils
export * from "./utils/logger";
export * from "./utils/Rng";
