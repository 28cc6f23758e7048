import { join } from "node:path";
import { JsonlStore } from "@wardline/store";
import { isEscalationRecord, isEscalationRule } from "@wardline/schemas";
import type { EscalationRecord, EscalationRule } from "@wardline/schemas";
import { ruleKey } from "./rule-table.js";

export function createEscalationStores(dataDir: string): {
  rulesStore: JsonlStore<EscalationRule>;
  historyStore: JsonlStore<EscalationRecord>;
} {
  return {
    rulesStore: new JsonlStore<EscalationRule>(join(dataDir, "escalation-rules.jsonl"), {
      keyOf: (r) => ruleKey(r.threat_type, r.confidence_threshold),
      guard: isEscalationRule,
    }),
    historyStore: new JsonlStore<EscalationRecord>(join(dataDir, "escalation-history.jsonl"), {
      keyOf: (r) => r.record_id,
      guard: isEscalationRecord,
    }),
  };
}
