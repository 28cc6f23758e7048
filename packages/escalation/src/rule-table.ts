import type { EscalationAction, EscalationLevel, EscalationRule } from "@wardline/schemas";
import { parseEscalationRule } from "@wardline/schemas";

export const WILDCARD = "*";

export const DEFAULT_RULES: readonly EscalationRule[] = [
  { threat_type: WILDCARD, confidence_threshold: 0, level: 1, action: "log" },
  { threat_type: WILDCARD, confidence_threshold: 0.5, level: 2, action: "watch" },
  { threat_type: WILDCARD, confidence_threshold: 0.7, level: 3, action: "alert_mods" },
  { threat_type: WILDCARD, confidence_threshold: 0.85, level: 4, action: "timeout" },
  { threat_type: WILDCARD, confidence_threshold: 0.95, level: 5, action: "ban_lockdown" },
];

export interface Resolution {
  level: EscalationLevel;
  action: EscalationAction;
  rule: EscalationRule | null;
}

export function ruleKey(threatType: string, threshold: number): string {
  return `${threatType}|${threshold}`;
}

/**
 * threat_type → rules ordered by ascending threshold. A threat type with
 * its own list never falls back to the wildcard list.
 */
export class RuleTable {
  private lists = new Map<string, EscalationRule[]>();

  constructor(rules: readonly EscalationRule[] = DEFAULT_RULES) {
    for (const rule of rules) this.set(rule);
  }

  /** Validates and upserts by (threat_type, threshold). */
  set(input: unknown): { rule: EscalationRule; created: boolean } {
    const rule = parseEscalationRule(input);
    const copy: EscalationRule = { ...rule };
    const list = this.lists.get(copy.threat_type) ?? [];
    const idx = list.findIndex((r) => r.confidence_threshold === copy.confidence_threshold);
    if (idx >= 0) list[idx] = copy;
    else list.push(copy);
    list.sort((a, b) => a.confidence_threshold - b.confidence_threshold);
    this.lists.set(copy.threat_type, list);
    return { rule: { ...copy }, created: idx < 0 };
  }

  remove(threatType: string, threshold: number): boolean {
    const list = this.lists.get(threatType);
    if (!list) return false;
    const idx = list.findIndex((r) => r.confidence_threshold === threshold);
    if (idx < 0) return false;
    list.splice(idx, 1);
    if (list.length === 0) this.lists.delete(threatType);
    return true;
  }

  list(threatType?: string): EscalationRule[] {
    if (threatType !== undefined) return (this.lists.get(threatType) ?? []).map((r) => ({ ...r }));
    return [...this.lists.keys()]
      .sort()
      .flatMap((t) => (this.lists.get(t) ?? []).map((r) => ({ ...r })));
  }

  get size(): number {
    let n = 0;
    for (const list of this.lists.values()) n += list.length;
    return n;
  }

  /**
   * Highest level among rules whose threshold the confidence meets (ties
   * go to the higher threshold). Falls back to level 1 / log.
   */
  resolve(threatType: string, confidence: number): Resolution {
    const list = this.lists.get(threatType) ?? this.lists.get(WILDCARD) ?? [];
    let best: EscalationRule | null = null;
    for (const rule of list) {
      if (rule.confidence_threshold > confidence) continue;
      if (
        best === null ||
        rule.level > best.level ||
        (rule.level === best.level && rule.confidence_threshold > best.confidence_threshold)
      ) {
        best = rule;
      }
    }
    if (best === null) return { level: 1, action: "log", rule: null };
    return { level: best.level, action: best.action, rule: { ...best } };
  }
}
