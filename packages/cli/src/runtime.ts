import { join } from "node:path";
import { AuditStore, EvidenceStore } from "@wardline/journal";
import { DetectorRegistry, SignalBus, memberJoinDetector } from "@wardline/signal-bus";
import { EscalationEngine, createEscalationRoutes, createEscalationStores } from "@wardline/escalation";
import { QuarantineMachine, createQuarantineRoutes, createQuarantineStore } from "@wardline/quarantine";
import {
  AppealDesk,
  BlacklistEnforcer,
  BlacklistStore,
  createBlacklistRoutes,
  createBlacklistStores,
} from "@wardline/blacklist";
import { MetricsCollector } from "@wardline/metrics";
import type { Clock, EscalationRule, Logger, PlatformClient, Route, Subject } from "@wardline/schemas";
import { ConsoleLogger, systemClock } from "@wardline/schemas";
import type { WardlineConfig } from "./config.js";
import { loadRulesFile } from "./config.js";
import { LoggingPlatformClient } from "./platform.js";

export interface RuntimeOverrides {
  platform?: PlatformClient;
  logger?: Logger;
  clock?: Clock;
  /** Skips the Prometheus default process metrics. */
  collectDefaultMetrics?: boolean;
}

export interface Runtime {
  config: WardlineConfig;
  logger: Logger;
  audit: AuditStore;
  evidence: EvidenceStore;
  bus: SignalBus;
  detectors: DetectorRegistry;
  escalation: EscalationEngine;
  quarantine: QuarantineMachine;
  blacklist: BlacklistStore;
  appeals: AppealDesk;
  enforcer: BlacklistEnforcer;
  metrics: MetricsCollector;
  routes: Route[];
  close(): Promise<void>;
}

function childLogger(logger: Logger, component: string): Logger {
  return logger instanceof ConsoleLogger ? logger.child(component) : logger;
}

/**
 * Lets appeals drive the review states of a live quarantine on the same
 * subject: filing requests review, denial keeps the subject isolated,
 * approval releases it.
 */
export function linkAppealsToQuarantine(appeals: AppealDesk, quarantine: QuarantineMachine, logger: Logger): () => void {
  return appeals.onAppeal(async ({ type, appeal, entry, actor }) => {
    const subject: Subject = { kind: entry.type, value: entry.value };
    const state = quarantine.status(subject);
    if (state === "NONE") return;
    switch (type) {
      case "submitted":
        if (state !== "QUARANTINED") return;
        await quarantine.requestReview(subject, actor, `appeal ${appeal.id}: ${appeal.reason}`);
        break;
      case "denied":
        if (state !== "UNDER_REVIEW") return;
        await quarantine.maintain(subject, actor, appeal.decision_note ?? `appeal ${appeal.id} denied`);
        break;
      case "approved":
        await quarantine.release(subject, actor, appeal.decision_note ?? `appeal ${appeal.id} approved`);
        break;
    }
    logger.info(`appeal ${appeal.id} ${type}: quarantine of ${entry.type}:${entry.value} updated`, { from: state });
  });
}

/**
 * Opens every store under the data directory and starts the responders.
 * Startup order follows the subscription graph: stores first, then the
 * components that subscribe to the bus.
 */
export async function createRuntime(config: WardlineConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const logger = overrides.logger ?? new ConsoleLogger("wardline", config.logLevel);
  const clock = overrides.clock ?? systemClock;
  const platform = overrides.platform ?? new LoggingPlatformClient(childLogger(logger, "platform"));

  const rules: EscalationRule[] = config.rulesFile ? await loadRulesFile(config.rulesFile) : [];

  const audit = new AuditStore(join(config.dataDir, "journal"), {
    clock,
    fsync: config.journalFsync,
    logger: childLogger(logger, "journal"),
  });
  await audit.init();

  const evidence = new EvidenceStore(audit, { clock });
  await evidence.init();

  const bus = new SignalBus({
    clock,
    audit,
    inboxCapacity: config.inboxCapacity,
    overflowPolicy: config.overflowPolicy,
    dedupWindowMs: config.dedupWindowMs,
    logger: childLogger(logger, "bus"),
  });

  const detectors = new DetectorRegistry(bus, { logger: childLogger(logger, "detectors") });
  detectors.register(memberJoinDetector);

  const escalationStores = createEscalationStores(config.dataDir);
  const escalation = new EscalationEngine({
    bus,
    platform,
    audit,
    clock,
    rules,
    ...escalationStores,
    aggregationWindowMs: config.aggregationWindowMs,
    timeoutMs: config.timeoutMs,
    platformTimeoutMs: config.platformTimeoutMs,
    modLogChannel: config.modLogChannel,
    modAlertChannel: config.modAlertChannel,
    onCall: config.onCall ?? null,
    onCallByLevel: config.onCallByLevel,
    logger: childLogger(logger, "escalation"),
  });

  const quarantine = new QuarantineMachine({
    platform,
    store: createQuarantineStore(config.dataDir),
    evidence,
    bus,
    audit,
    clock,
    autoQuarantineThreshold: config.autoQuarantineThreshold,
    isolationRoleId: config.isolationRoleId,
    isolationChannelId: config.isolationChannelId,
    platformTimeoutMs: config.platformTimeoutMs,
    logger: childLogger(logger, "quarantine"),
  });

  const blacklistStores = createBlacklistStores(config.dataDir);
  const blacklist = new BlacklistStore({
    entries: blacklistStores.entries,
    exceptions: blacklistStores.exceptions,
    bus,
    audit,
    clock,
    sweepIntervalMs: config.sweepIntervalMs,
    logger: childLogger(logger, "blacklist"),
  });
  const appeals = new AppealDesk({
    blacklist,
    appeals: blacklistStores.appeals,
    platform,
    audit,
    clock,
    platformTimeoutMs: config.platformTimeoutMs,
    logger: childLogger(logger, "appeals"),
  });
  const enforcer = new BlacklistEnforcer({
    blacklist,
    bus,
    platform,
    audit,
    clock,
    autoBlacklistOnBan: config.autoBlacklistOnBan,
    platformTimeoutMs: config.platformTimeoutMs,
    logger: childLogger(logger, "enforcement"),
  });

  const metrics = new MetricsCollector({
    collectDefault: overrides.collectDefaultMetrics,
    activeQuarantines: () => quarantine.stats().active,
    activeBlacklistEntries: () => blacklist.stats().active,
  });

  metrics.attach(audit);

  await blacklist.start();
  await appeals.start();
  await escalation.start();
  await quarantine.start();
  enforcer.start();
  const unlinkAppeals = linkAppealsToQuarantine(appeals, quarantine, childLogger(logger, "appeals"));

  const routes: Route[] = [
    ...createEscalationRoutes(escalation, childLogger(logger, "api")),
    ...createQuarantineRoutes(quarantine, childLogger(logger, "api")),
    ...createBlacklistRoutes(blacklist, appeals, childLogger(logger, "api")),
  ];

  let closed = false;
  const close = async (): Promise<void> => {
    if (closed) return;
    closed = true;
    await bus.drain();
    unlinkAppeals();
    enforcer.stop();
    quarantine.stop();
    escalation.stop();
    await bus.close();
    await blacklist.stop();
    metrics.detach();
    await audit.close();
    logger.info("runtime closed");
  };

  logger.info("runtime started", { data_dir: config.dataDir, rules_from_file: rules.length });

  return {
    config,
    logger,
    audit,
    evidence,
    bus,
    detectors,
    escalation,
    quarantine,
    blacklist,
    appeals,
    enforcer,
    metrics,
    routes,
    close,
  };
}
