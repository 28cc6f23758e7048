import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join, resolve } from "node:path";
import { tmpdir } from "node:os";
import { fileURLToPath } from "node:url";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { ConfigError, loadConfig, loadRulesFile } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      dataDir: resolve("data"),
      port: 3100,
      host: "127.0.0.1",
      insecure: false,
      trustedProxies: [],
      logLevel: "info",
      overflowPolicy: "block",
      dedupWindowMs: 300_000,
      aggregationWindowMs: 60_000,
      autoQuarantineThreshold: 0.85,
      sweepIntervalMs: 60_000,
      journalFsync: true,
      autoBlacklistOnBan: true,
      onCallByLevel: {},
    });
    expect(config.apiToken).toBeUndefined();
    expect(config.rulesFile).toBeUndefined();
  });

  it("reads WARDLINE_ variables", () => {
    const config = loadConfig({
      WARDLINE_PORT: "4000",
      WARDLINE_API_TOKEN: "test-secret",
      WARDLINE_LOG_LEVEL: "DEBUG",
      WARDLINE_OVERFLOW_POLICY: "drop-oldest",
      WARDLINE_AUTO_QUARANTINE_THRESHOLD: "0.9",
      WARDLINE_TRUSTED_PROXIES: "10.0.0.1, 10.0.0.2,",
      WARDLINE_ON_CALL: "mod-7",
      WARDLINE_ON_CALL_L5: "lead-1",
      WARDLINE_JOURNAL_FSYNC: "0",
    });

    expect(config).toMatchObject({
      port: 4000,
      apiToken: "test-secret",
      logLevel: "debug",
      overflowPolicy: "drop-oldest",
      autoQuarantineThreshold: 0.9,
      trustedProxies: ["10.0.0.1", "10.0.0.2"],
      onCall: "mod-7",
      onCallByLevel: { 5: "lead-1" },
      journalFsync: false,
    });
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ WARDLINE_API_TOKEN: "  ", WARDLINE_PORT: "" })).toMatchObject({ apiToken: undefined, port: 3100 });
  });

  it("reports every problem at once", () => {
    let caught: unknown;
    try {
      loadConfig({ WARDLINE_PORT: "99999", WARDLINE_OVERFLOW_POLICY: "drop", WARDLINE_INSECURE: "maybe" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      problems: [
        'WARDLINE_OVERFLOW_POLICY must be "block" or "drop-oldest" (got "drop")',
        'WARDLINE_PORT must be an integer between 1 and 65535 (got "99999")',
        'WARDLINE_INSECURE must be true or false (got "maybe")',
      ],
    });
  });

  it("rejects an unknown log level and an out-of-range threshold", () => {
    expect(() => loadConfig({ WARDLINE_LOG_LEVEL: "loud" })).toThrow(
      'WARDLINE_LOG_LEVEL must be one of: debug, info, warn, error, silent (got "loud")',
    );
    expect(() => loadConfig({ WARDLINE_AUTO_QUARANTINE_THRESHOLD: "1.5" })).toThrow(
      'WARDLINE_AUTO_QUARANTINE_THRESHOLD must be a number between 0 and 1 (got "1.5")',
    );
  });
});

describe("loadRulesFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "wardline-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("parses a YAML rule list", async () => {
    const path = join(dir, "rules.yaml");
    await writeFile(path, "rules:\n  - threat_type: phishing\n    confidence_threshold: 0.8\n    level: 4\n    action: timeout\n");

    expect(await loadRulesFile(path)).toEqual([
      { threat_type: "phishing", confidence_threshold: 0.8, level: 4, action: "timeout" },
    ]);
  });

  it("rejects a rule with an unknown action", async () => {
    const path = join(dir, "rules.yaml");
    await writeFile(path, "rules:\n  - threat_type: spam\n    confidence_threshold: 0.5\n    level: 2\n    action: explode\n");

    await expect(loadRulesFile(path)).rejects.toThrow("Invalid escalation rule file");
  });

  it("loads the shipped example rules", async () => {
    const shipped = fileURLToPath(new URL("../../../config/escalation-rules.yaml", import.meta.url));

    const rules = await loadRulesFile(shipped);

    expect(rules).toHaveLength(5);
    expect(rules[1]).toEqual({ threat_type: "phishing", confidence_threshold: 0.8, level: 4, action: "timeout" });
  });
});
