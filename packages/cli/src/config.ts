import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import yaml from "js-yaml";
import type { EscalationLevel, EscalationRule, LogLevel, OverflowPolicy } from "@wardline/schemas";
import { ESCALATION_LEVELS, parseEscalationRuleFile, parseLogLevel } from "@wardline/schemas";

export interface WardlineConfig {
  dataDir: string;
  port: number;
  host: string;
  apiToken?: string;
  insecure: boolean;
  trustedProxies: string[];
  rateLimitMax: number;
  logLevel: LogLevel;
  /** Optional YAML file with escalation rules applied over the persisted table. */
  rulesFile?: string;
  journalFsync: boolean;
  inboxCapacity: number;
  overflowPolicy: OverflowPolicy;
  dedupWindowMs: number;
  aggregationWindowMs: number;
  timeoutMs: number;
  platformTimeoutMs: number;
  autoQuarantineThreshold: number;
  sweepIntervalMs: number;
  isolationRoleId?: string;
  isolationChannelId?: string;
  modLogChannel?: string;
  modAlertChannel?: string;
  onCall?: string;
  /** From WARDLINE_ON_CALL_L1 .. WARDLINE_ON_CALL_L5. */
  onCallByLevel: Partial<Record<EscalationLevel, string>>;
  autoBlacklistOnBan: boolean;
}

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Reads WARDLINE_* variables. Every bad value is collected so one run
 * reports all of them.
 */
export function loadConfig(env: Env = process.env): WardlineConfig {
  const problems: string[] = [];

  const int = (name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number => {
    const raw = optional(env, name);
    if (raw === undefined) return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < min || n > max) {
      problems.push(`${name} must be an integer between ${min} and ${max} (got "${raw}")`);
      return fallback;
    }
    return n;
  };

  const bool = (name: string, fallback: boolean): boolean => {
    const raw = optional(env, name)?.toLowerCase();
    if (raw === undefined) return fallback;
    if (raw === "true" || raw === "1") return true;
    if (raw === "false" || raw === "0") return false;
    problems.push(`${name} must be true or false (got "${raw}")`);
    return fallback;
  };

  const rawLevel = optional(env, "WARDLINE_LOG_LEVEL");
  const logLevel = parseLogLevel(rawLevel);
  if (rawLevel !== undefined && logLevel !== rawLevel.toLowerCase()) {
    problems.push(`WARDLINE_LOG_LEVEL must be one of: debug, info, warn, error, silent (got "${rawLevel}")`);
  }

  let overflowPolicy: OverflowPolicy = "block";
  const rawPolicy = optional(env, "WARDLINE_OVERFLOW_POLICY");
  if (rawPolicy === "block" || rawPolicy === "drop-oldest") {
    overflowPolicy = rawPolicy;
  } else if (rawPolicy !== undefined) {
    problems.push(`WARDLINE_OVERFLOW_POLICY must be "block" or "drop-oldest" (got "${rawPolicy}")`);
  }

  let autoQuarantineThreshold = 0.85;
  const rawThreshold = optional(env, "WARDLINE_AUTO_QUARANTINE_THRESHOLD");
  if (rawThreshold !== undefined) {
    const n = Number(rawThreshold);
    if (Number.isFinite(n) && n >= 0 && n <= 1) autoQuarantineThreshold = n;
    else problems.push(`WARDLINE_AUTO_QUARANTINE_THRESHOLD must be a number between 0 and 1 (got "${rawThreshold}")`);
  }

  const onCallByLevel: Partial<Record<EscalationLevel, string>> = {};
  for (const level of ESCALATION_LEVELS) {
    const responder = optional(env, `WARDLINE_ON_CALL_L${level}`);
    if (responder !== undefined) onCallByLevel[level] = responder;
  }

  const rulesFile = optional(env, "WARDLINE_RULES_FILE");
  const config: WardlineConfig = {
    dataDir: resolve(optional(env, "WARDLINE_DATA_DIR") ?? "data"),
    port: int("WARDLINE_PORT", 3100, 1, 65535),
    host: optional(env, "WARDLINE_HOST") ?? "127.0.0.1",
    apiToken: optional(env, "WARDLINE_API_TOKEN"),
    insecure: bool("WARDLINE_INSECURE", false),
    trustedProxies: (optional(env, "WARDLINE_TRUSTED_PROXIES") ?? "").split(",").map((s) => s.trim()).filter(Boolean),
    rateLimitMax: int("WARDLINE_RATE_LIMIT_MAX", 100, 1),
    logLevel,
    rulesFile: rulesFile ? resolve(rulesFile) : undefined,
    journalFsync: bool("WARDLINE_JOURNAL_FSYNC", true),
    inboxCapacity: int("WARDLINE_INBOX_CAPACITY", 1000, 1),
    overflowPolicy,
    dedupWindowMs: int("WARDLINE_DEDUP_WINDOW_MS", 300_000, 0),
    aggregationWindowMs: int("WARDLINE_AGGREGATION_WINDOW_MS", 60_000, 1),
    timeoutMs: int("WARDLINE_TIMEOUT_MS", 3_600_000, 1000),
    platformTimeoutMs: int("WARDLINE_PLATFORM_TIMEOUT_MS", 10_000, 0),
    autoQuarantineThreshold,
    sweepIntervalMs: int("WARDLINE_SWEEP_INTERVAL_MS", 60_000, 0),
    isolationRoleId: optional(env, "WARDLINE_ISOLATION_ROLE_ID"),
    isolationChannelId: optional(env, "WARDLINE_ISOLATION_CHANNEL_ID"),
    modLogChannel: optional(env, "WARDLINE_MOD_LOG_CHANNEL"),
    modAlertChannel: optional(env, "WARDLINE_MOD_ALERT_CHANNEL"),
    onCall: optional(env, "WARDLINE_ON_CALL"),
    onCallByLevel,
    autoBlacklistOnBan: bool("WARDLINE_AUTO_BLACKLIST_ON_BAN", true),
  };

  if (problems.length > 0) throw new ConfigError(problems);
  return config;
}

/** Loads a YAML file of the form `rules: [{ threat_type, confidence_threshold, level, action }]`. */
export async function loadRulesFile(path: string): Promise<EscalationRule[]> {
  const text = await readFile(path, "utf-8");
  return parseEscalationRuleFile(yaml.load(text));
}
