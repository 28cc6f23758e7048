import { join } from "node:path";
import type { Server } from "node:http";
import { Command } from "commander";
import { ApiServer } from "@wardline/api";
import { AuditStore } from "@wardline/journal";
import { DEFAULT_RULES, RuleTable, createEscalationStores } from "@wardline/escalation";
import { createBlacklistStores, entryKey } from "@wardline/blacklist";
import type { BlacklistEntry, BlacklistStatus, BlacklistTier, BlacklistType, Clock } from "@wardline/schemas";
import { BLACKLIST_TIERS, BLACKLIST_TYPES, systemClock } from "@wardline/schemas";
import type { Env, WardlineConfig } from "./config.js";
import { loadConfig, loadRulesFile } from "./config.js";
import { createRuntime } from "./runtime.js";
import type { Runtime, RuntimeOverrides } from "./runtime.js";

export const VERSION = "0.1.0";

/** A command failed; the entry point prints the message and exits 1. */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

export interface CliIO {
  out(line: string): void;
  env: Env;
  clock?: Clock;
  runtime?: RuntimeOverrides;
  /** Called with the running runtime and server once `serve` is listening. */
  onServing?: (runtime: Runtime, server: ApiServer, httpServer: Server) => void;
}

const BLACKLIST_STATUSES: readonly BlacklistStatus[] = ["active", "expired", "removed"];

function isBlacklistType(value: string): value is BlacklistType {
  return (BLACKLIST_TYPES as readonly string[]).includes(value);
}

function isBlacklistTier(value: string): value is BlacklistTier {
  return (BLACKLIST_TIERS as readonly string[]).includes(value);
}

function isBlacklistStatus(value: string): value is BlacklistStatus {
  return (BLACKLIST_STATUSES as readonly string[]).includes(value);
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  // 0 asks the OS for a free port
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new CliError(`Invalid port: "${value}" (must be 0-65535)`);
  }
  return port;
}

/** An active entry whose expiry has passed counts as expired in offline reads. */
function effectiveStatus(entry: BlacklistEntry, now: number): BlacklistStatus {
  if (entry.status === "active" && entry.expires_at !== undefined && Date.parse(entry.expires_at) <= now) return "expired";
  return entry.status;
}

function formatEntry(entry: BlacklistEntry, status: BlacklistStatus): string {
  const expiry = entry.expires_at ? ` until ${entry.expires_at}` : "";
  return `${entry.id}  ${entry.type}:${entry.value}  ${entry.tier}  ${status}${expiry}  "${entry.reason}" (by ${entry.added_by}, hits ${entry.times_triggered})`;
}

export function createProgram(io: CliIO): Command {
  const clock = io.clock ?? systemClock;
  const config = (): WardlineConfig => loadConfig(io.env);

  const program = new Command();
  program.name("wardline").description("Wardline: moderation signal coordination core").version(VERSION);

  program.command("serve").description("Start the runtime and the HTTP API")
    .option("-p, --port <port>", "Port (default: WARDLINE_PORT or 3100)")
    .option("--host <host>", "Bind address (default: WARDLINE_HOST or 127.0.0.1)")
    .option("--insecure", "Allow running without WARDLINE_API_TOKEN")
    .action(async (opts: { port?: string; host?: string; insecure?: boolean }) => {
      const cfg = config();
      const port = opts.port !== undefined ? parsePort(opts.port) : cfg.port;
      const runtime = await createRuntime(cfg, { clock, ...io.runtime });
      let server: ApiServer;
      let httpServer: Server;
      try {
        server = new ApiServer({
          audit: runtime.audit,
          bus: runtime.bus,
          detectors: runtime.detectors,
          routes: runtime.routes,
          metricsCollector: runtime.metrics,
          apiToken: cfg.apiToken,
          insecure: opts.insecure === true || cfg.insecure,
          trustedProxies: cfg.trustedProxies,
          rateLimitMax: cfg.rateLimitMax,
          logger: runtime.logger,
          version: VERSION,
        });
        httpServer = await server.listen(port, opts.host ?? cfg.host);
      } catch (err) {
        await runtime.close();
        throw err;
      }
      io.onServing?.(runtime, server, httpServer);
    });

  program.command("verify").description("Check the hash chain of every journal stream")
    .action(async () => {
      const cfg = config();
      // No init: opening a journal repairs it, and this command only reads
      const audit = new AuditStore(join(cfg.dataDir, "journal"), { lock: false, fsync: false });
      try {
        const reports = await audit.verify();
        for (const report of reports) {
          const where = report.valid ? "" : ` (broken at event ${report.brokenAt ?? "?"})`;
          io.out(`${report.stream}: ${report.valid ? "ok" : "BROKEN"}, ${report.events} events${where}`);
        }
        const broken = reports.filter((r) => !r.valid).map((r) => r.stream);
        if (broken.length > 0) throw new CliError(`Journal integrity check failed: ${broken.join(", ")}`);
      } finally {
        await audit.close();
      }
    });

  program.command("rules").description("Print the effective escalation rules")
    .option("-t, --threat-type <type>", "Only rules for one threat type")
    .action(async (opts: { threatType?: string }) => {
      const cfg = config();
      const { rulesStore } = createEscalationStores(cfg.dataDir);
      await rulesStore.load();
      const persisted = rulesStore.getAll();
      const table = new RuleTable(persisted.length > 0 ? persisted : DEFAULT_RULES);
      if (cfg.rulesFile) {
        for (const rule of await loadRulesFile(cfg.rulesFile)) table.set(rule);
      }
      const rules = table.list(opts.threatType);
      if (rules.length === 0) {
        io.out("No rules.");
        return;
      }
      for (const rule of rules) {
        io.out(`${rule.threat_type}  >= ${rule.confidence_threshold}  level ${rule.level}  ${rule.action}`);
      }
    });

  const blacklistCmd = program.command("blacklist").description("Read the persisted blacklist");

  blacklistCmd.command("check").description("Show whether a key is blacklisted")
    .argument("<type>", `One of: ${BLACKLIST_TYPES.join(", ")}`)
    .argument("<value>", "User id, guild id, IP, domain or email")
    .action(async (type: string, value: string) => {
      if (!isBlacklistType(type)) throw new CliError(`type must be one of: ${BLACKLIST_TYPES.join(", ")}`);
      const tables = createBlacklistStores(config().dataDir);
      await tables.entries.load();
      await tables.exceptions.load();
      const key = entryKey(type, value);
      const now = clock.now();
      const history = tables.entries.getAll().filter((e) => entryKey(e.type, e.value) === key);
      const active = history.find((e) => effectiveStatus(e, now) === "active");

      if (tables.exceptions.has(key)) {
        io.out(`${key} is allowlisted`);
      } else if (active) {
        io.out(`${key} is BLACKLISTED`);
        io.out(formatEntry(active, "active"));
      } else {
        io.out(`${key} is not blacklisted`);
      }
      if (history.length > 0) io.out(`History: ${history.length} entr${history.length === 1 ? "y" : "ies"}`);
    });

  blacklistCmd.command("list").description("List blacklist entries, newest first")
    .option("-s, --status <status>", "active, expired or removed")
    .option("--type <type>", "Entry type")
    .option("--tier <tier>", "Entry tier")
    .action(async (opts: { status?: string; type?: string; tier?: string }) => {
      const { status, type, tier } = opts;
      if (status !== undefined && !isBlacklistStatus(status)) throw new CliError(`status must be one of: ${BLACKLIST_STATUSES.join(", ")}`);
      if (type !== undefined && !isBlacklistType(type)) throw new CliError(`type must be one of: ${BLACKLIST_TYPES.join(", ")}`);
      if (tier !== undefined && !isBlacklistTier(tier)) throw new CliError(`tier must be one of: ${BLACKLIST_TIERS.join(", ")}`);

      const tables = createBlacklistStores(config().dataDir);
      await tables.entries.load();
      const now = clock.now();
      const rows = tables.entries.getAll()
        .map((entry) => ({ entry, status: effectiveStatus(entry, now) }))
        .filter((r) => (status === undefined || r.status === status)
          && (type === undefined || r.entry.type === type)
          && (tier === undefined || r.entry.tier === tier))
        .sort((a, b) => b.entry.created_at.localeCompare(a.entry.created_at));

      if (rows.length === 0) {
        io.out("No entries.");
        return;
      }
      for (const row of rows) io.out(formatEntry(row.entry, row.status));
    });

  return program;
}

