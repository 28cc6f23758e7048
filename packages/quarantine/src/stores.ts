import { join } from "node:path";
import { JsonlStore } from "@wardline/store";
import { isQuarantineEntry } from "@wardline/schemas";
import type { QuarantineEntry } from "@wardline/schemas";

export function createQuarantineStore(dataDir: string): JsonlStore<QuarantineEntry> {
  return new JsonlStore<QuarantineEntry>(join(dataDir, "quarantine-entries.jsonl"), {
    keyOf: (e) => e.entry_id,
    guard: isQuarantineEntry,
  });
}
