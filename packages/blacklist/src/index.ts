export { BlacklistStore, normalizeValue, entryKey } from "./blacklist-store.js";
export type { AddEntryInput, BlacklistStats, BlacklistStoreConfig, EntryFilter, RemoveOptions } from "./blacklist-store.js";
export { AppealDesk } from "./appeal-desk.js";
export type { AppealDeskConfig, AppealEvent, AppealFilter, AppealListener } from "./appeal-desk.js";
export { BlacklistEnforcer } from "./enforcement.js";
export type { BlacklistEnforcerConfig, EnforcementAction, EnforcementResult } from "./enforcement.js";
export { createBlacklistStores } from "./stores.js";
export { createBlacklistRoutes } from "./blacklist-routes.js";
