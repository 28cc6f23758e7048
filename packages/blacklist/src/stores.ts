import { join } from "node:path";
import { JsonlStore } from "@wardline/store";
import { isAllowlistException, isAppeal, isBlacklistEntry } from "@wardline/schemas";
import type { AllowlistException, Appeal, BlacklistEntry } from "@wardline/schemas";
import { entryKey } from "./blacklist-store.js";

export function createBlacklistStores(dataDir: string): {
  entries: JsonlStore<BlacklistEntry>;
  exceptions: JsonlStore<AllowlistException>;
  appeals: JsonlStore<Appeal>;
} {
  return {
    entries: new JsonlStore<BlacklistEntry>(join(dataDir, "blacklist-entries.jsonl"), {
      keyOf: (e) => e.id,
      guard: isBlacklistEntry,
    }),
    exceptions: new JsonlStore<AllowlistException>(join(dataDir, "blacklist-exceptions.jsonl"), {
      keyOf: (e) => entryKey(e.type, e.value),
      guard: isAllowlistException,
    }),
    appeals: new JsonlStore<Appeal>(join(dataDir, "appeals.jsonl"), {
      keyOf: (a) => a.id,
      guard: isAppeal,
    }),
  };
}
