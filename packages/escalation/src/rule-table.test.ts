import { describe, it, expect } from "vitest";
import { ValidationError } from "@wardline/schemas";
import { DEFAULT_RULES, RuleTable, ruleKey } from "./rule-table.js";

describe("RuleTable", () => {
  it("resolves the default wildcard ladder", () => {
    const table = new RuleTable();
    expect(table.resolve("spam", 0.3)).toMatchObject({ level: 1, action: "log" });
    expect(table.resolve("spam", 0.6)).toMatchObject({ level: 2, action: "watch" });
    expect(table.resolve("spam", 0.7)).toMatchObject({ level: 3, action: "alert_mods" });
    expect(table.resolve("spam", 0.9)).toMatchObject({ level: 4, action: "timeout" });
    expect(table.resolve("spam", 1)).toMatchObject({ level: 5, action: "ban_lockdown" });
  });

  it("uses a threat type's own list instead of the wildcard", () => {
    const table = new RuleTable();
    table.set({ threat_type: "phishing", confidence_threshold: 0.8, level: 4, action: "timeout" });

    const hit = table.resolve("phishing", 0.9);
    expect(hit).toEqual({
      level: 4,
      action: "timeout",
      rule: { threat_type: "phishing", confidence_threshold: 0.8, level: 4, action: "timeout" },
    });
    // Below every phishing threshold: no wildcard fallback
    expect(table.resolve("phishing", 0.5)).toEqual({ level: 1, action: "log", rule: null });
  });

  it("never lowers the level as confidence rises", () => {
    const table = new RuleTable([
      { threat_type: "raid", confidence_threshold: 0.5, level: 3, action: "alert_mods" },
      { threat_type: "raid", confidence_threshold: 0.8, level: 2, action: "watch" },
    ]);
    expect(table.resolve("raid", 0.6)).toMatchObject({ level: 3, action: "alert_mods" });
    expect(table.resolve("raid", 0.9)).toMatchObject({ level: 3, action: "alert_mods" });
  });

  it("breaks level ties in favour of the higher threshold", () => {
    const table = new RuleTable([
      { threat_type: "raid", confidence_threshold: 0.4, level: 3, action: "alert_mods" },
      { threat_type: "raid", confidence_threshold: 0.6, level: 3, action: "watch" },
    ]);
    expect(table.resolve("raid", 0.7).rule?.confidence_threshold).toBe(0.6);
  });

  it("upserts by threat type and threshold", () => {
    const table = new RuleTable([]);
    expect(table.set({ threat_type: "spam", confidence_threshold: 0.5, level: 2, action: "watch" }).created).toBe(true);
    expect(table.set({ threat_type: "spam", confidence_threshold: 0.5, level: 3, action: "alert_mods" }).created).toBe(false);
    expect(table.list("spam")).toEqual([
      { threat_type: "spam", confidence_threshold: 0.5, level: 3, action: "alert_mods" },
    ]);
    expect(table.size).toBe(1);
  });

  it("falls back to the wildcard once a type's last rule is removed", () => {
    const table = new RuleTable();
    table.set({ threat_type: "phishing", confidence_threshold: 0.8, level: 4, action: "timeout" });
    expect(table.remove("phishing", 0.8)).toBe(true);
    expect(table.remove("phishing", 0.8)).toBe(false);
    expect(table.resolve("phishing", 0.6)).toMatchObject({ level: 2, action: "watch" });
  });

  it("rejects malformed rules", () => {
    const table = new RuleTable([]);
    expect(() => table.set({ threat_type: "spam", confidence_threshold: 1.5, level: 2, action: "watch" })).toThrow(ValidationError);
    expect(() => table.set({ threat_type: "spam", confidence_threshold: 0.5, level: 6, action: "watch" })).toThrow(ValidationError);
    expect(() => table.set({ threat_type: "spam", confidence_threshold: 0.5, level: 2, action: "nuke" })).toThrow(ValidationError);
    expect(table.size).toBe(0);
  });

  it("lists rules sorted by threat type then threshold", () => {
    const table = new RuleTable([
      { threat_type: "spam", confidence_threshold: 0.9, level: 3, action: "alert_mods" },
      { threat_type: "malware", confidence_threshold: 0.5, level: 4, action: "timeout" },
      { threat_type: "spam", confidence_threshold: 0.2, level: 2, action: "watch" },
    ]);
    expect(table.list().map((r) => ruleKey(r.threat_type, r.confidence_threshold))).toEqual([
      "malware|0.5",
      "spam|0.2",
      "spam|0.9",
    ]);
    expect(new RuleTable().size).toBe(DEFAULT_RULES.length);
  });
});
