export { JsonlStore } from "./jsonl-store.js";
export type { KeyValueStore, JsonlStoreOptions } from "./jsonl-store.js";
