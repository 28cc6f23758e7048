import { v4 as uuid } from "uuid";
import type { AuditStore } from "@wardline/journal";
import type { SignalBus } from "@wardline/signal-bus";
import type { KeyValueStore } from "@wardline/store";
import type {
  Clock,
  EscalationAction,
  EscalationLevel,
  EscalationRecord,
  EscalationRule,
  JournalEventType,
  Logger,
  PlatformClient,
  Signal,
} from "@wardline/schemas";
import {
  ESCALATION_LEVELS,
  KeyedMutex,
  ValidationError,
  callPlatform,
  createSignal,
  errorMessage,
  silentLogger,
  subjectKey,
  systemClock,
} from "@wardline/schemas";
import { CorrelationWindow } from "./correlation-window.js";
import { DEFAULT_RULES, RuleTable, ruleKey } from "./rule-table.js";

export interface EscalationEngineConfig {
  bus: SignalBus;
  platform: PlatformClient;
  rulesStore: KeyValueStore<EscalationRule>;
  historyStore: KeyValueStore<EscalationRecord>;
  audit?: AuditStore;
  clock?: Clock;
  logger?: Logger;
  /** Rules applied over the persisted table at start (e.g. from a rules file). */
  rules?: EscalationRule[];
  /** Default: 60000 */
  aggregationWindowMs?: number;
  /** Length of a "timeout" action. Default: 3600000 */
  timeoutMs?: number;
  modLogChannel?: string;
  modAlertChannel?: string;
  onCall?: string | null;
  /** Responders that take over from `onCall` for specific levels. */
  onCallByLevel?: Partial<Record<EscalationLevel, string>>;
  /** Per platform call deadline; 0 disables. Default: 10000 */
  platformTimeoutMs?: number;
  /** Records kept in the history table. Default: 10000 */
  historyLimit?: number;
}

export interface EscalationStats {
  evaluations: number;
  aggregated: number;
  by_level: Record<EscalationLevel, number>;
  by_action: Partial<Record<EscalationAction, number>>;
  action_errors: number;
  notification_gaps: number;
  rules: number;
  on_call: string | null;
  on_call_by_level: Partial<Record<EscalationLevel, string>>;
}

export interface OnCallRoster {
  on_call: string | null;
  by_level: Partial<Record<EscalationLevel, string>>;
}

const LEVEL_SEVERITY = { 1: "low", 2: "medium", 3: "high", 4: "high", 5: "critical" } as const;

/**
 * Maps THREAT_DETECTED signals to graduated actions through a
 * confidence-threshold rule table and records every decision.
 */
export class EscalationEngine {
  private bus: SignalBus;
  private platform: PlatformClient;
  private rulesStore: KeyValueStore<EscalationRule>;
  private historyStore: KeyValueStore<EscalationRecord>;
  private audit: AuditStore | undefined;
  private clock: Clock;
  private logger: Logger;
  private configuredRules: EscalationRule[];
  private table = new RuleTable([]);
  private window: CorrelationWindow;
  private mutex = new KeyedMutex();
  private records: EscalationRecord[] = [];
  private timeoutMs: number;
  private modLogChannel: string | undefined;
  private modAlertChannel: string | undefined;
  private onCallResponder: string | null;
  private onCallByLevel = new Map<EscalationLevel, string>();
  private platformTimeoutMs: number;
  private historyLimit: number;
  private unsubscribe: (() => void) | null = null;

  constructor(config: EscalationEngineConfig) {
    this.bus = config.bus;
    this.platform = config.platform;
    this.rulesStore = config.rulesStore;
    this.historyStore = config.historyStore;
    this.audit = config.audit;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? silentLogger;
    this.configuredRules = config.rules ?? [];
    this.window = new CorrelationWindow(config.aggregationWindowMs ?? 60_000);
    this.timeoutMs = config.timeoutMs ?? 3_600_000;
    this.modLogChannel = config.modLogChannel;
    this.modAlertChannel = config.modAlertChannel;
    this.onCallResponder = config.onCall ?? null;
    for (const level of ESCALATION_LEVELS) {
      const responder = config.onCallByLevel?.[level];
      if (responder) this.onCallByLevel.set(level, responder);
    }
    this.platformTimeoutMs = config.platformTimeoutMs ?? 10_000;
    this.historyLimit = config.historyLimit ?? 10_000;
  }

  /** Loads rules and history, then subscribes to THREAT_DETECTED. */
  async start(): Promise<void> {
    await this.rulesStore.load();
    await this.historyStore.load();

    const persisted = this.rulesStore.getAll();
    this.table = new RuleTable(persisted.length > 0 ? persisted : DEFAULT_RULES);
    for (const rule of this.configuredRules) this.table.set(rule);
    this.syncRules();
    await this.safeSave(this.rulesStore, "rules");

    this.records = this.historyStore.getAll().sort((a, b) => a.timestamp.localeCompare(b.timestamp));

    if (!this.unsubscribe) {
      this.unsubscribe = this.bus.subscribe(
        "THREAT_DETECTED",
        async (signal) => {
          await this.handle(signal);
        },
        { name: "escalation-engine" },
      );
    }
    this.logger.info("escalation engine started", { rules: this.table.size, history: this.records.length });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /** Evaluates one THREAT_DETECTED signal. Serialised per subject. */
  handle(signal: Signal): Promise<EscalationRecord> {
    if (signal.type !== "THREAT_DETECTED") {
      return Promise.reject(new ValidationError(`Escalation expects THREAT_DETECTED, got ${signal.type}`));
    }
    return this.mutex.runExclusive(subjectKey(signal.subject), () => this.evaluate(signal));
  }

  /** Validates and upserts a rule; takes effect for the next evaluation. */
  async setRule(threatType: string, threshold: number, level: number, action: string): Promise<EscalationRule> {
    const { rule, created } = this.table.set({ threat_type: threatType, confidence_threshold: threshold, level, action });
    this.syncRules();
    this.journal("escalation.rule_set", `rule:${threatType}`, { rule, created });
    await this.safeSave(this.rulesStore, "rules");
    return rule;
  }

  async removeRule(threatType: string, threshold: number): Promise<boolean> {
    const removed = this.table.remove(threatType, threshold);
    if (removed) {
      this.syncRules();
      this.journal("escalation.rule_removed", `rule:${threatType}`, { threat_type: threatType, confidence_threshold: threshold });
      await this.safeSave(this.rulesStore, "rules");
    }
    return removed;
  }

  rules(threatType?: string): EscalationRule[] {
    return this.table.list(threatType);
  }

  /** Most recent first. */
  history(limit = 50): EscalationRecord[] {
    return this.records.slice(-limit).reverse();
  }

  /**
   * Sets the default responder, or with `level` the responder for that
   * level only. A blank or null responder clears the slot; a cleared
   * level falls back to the default.
   */
  setOnCall(responder: string | null, level?: EscalationLevel): void {
    const trimmed = responder?.trim() ?? "";
    const current = trimmed.length > 0 ? trimmed : null;
    if (level === undefined) {
      const previous = this.onCallResponder;
      this.onCallResponder = current;
      this.journal("escalation.oncall_changed", "on-call", { previous, current });
      return;
    }
    const previous = this.onCallByLevel.get(level) ?? null;
    if (current === null) this.onCallByLevel.delete(level);
    else this.onCallByLevel.set(level, current);
    this.journal("escalation.oncall_changed", "on-call", { level, previous, current });
  }

  /** The responder paged for `level`, or the default responder. */
  onCall(level?: EscalationLevel): string | null {
    if (level !== undefined) return this.onCallByLevel.get(level) ?? this.onCallResponder;
    return this.onCallResponder;
  }

  onCallRoster(): OnCallRoster {
    return { on_call: this.onCallResponder, by_level: this.levelResponders() };
  }

  stats(): EscalationStats {
    const byLevel: Record<EscalationLevel, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
    const byAction: Partial<Record<EscalationAction, number>> = {};
    let aggregated = 0;
    let actionErrors = 0;
    let gaps = 0;
    for (const r of this.records) {
      byLevel[r.level]++;
      byAction[r.action_taken] = (byAction[r.action_taken] ?? 0) + 1;
      if (r.aggregated) aggregated++;
      if (r.action_error !== undefined) actionErrors++;
      if (r.notification_gap !== undefined) gaps++;
    }
    return {
      evaluations: this.records.length,
      aggregated,
      by_level: byLevel,
      by_action: byAction,
      action_errors: actionErrors,
      notification_gaps: gaps,
      rules: this.table.size,
      on_call: this.onCallResponder,
      on_call_by_level: this.levelResponders(),
    };
  }

  private async evaluate(signal: Signal): Promise<EscalationRecord> {
    const now = this.clock.now();
    const threatType = typeof signal.payload["threat_type"] === "string" ? signal.payload["threat_type"] : "unknown";
    const correlationId = signal.correlation_id;
    const subject = subjectKey(signal.subject);

    let effective = signal.confidence;
    let executedLevel = 0;
    if (correlationId !== undefined) {
      const correlation = this.window.observe(correlationId, subject, signal.confidence, now);
      effective = correlation.effective;
      executedLevel = correlation.executedLevel;
    }

    const { level, action } = this.table.resolve(threatType, effective);
    const aggregated = correlationId !== undefined && executedLevel > 0 && level <= executedLevel;

    const record: EscalationRecord = {
      record_id: uuid(),
      signal_id: signal.id,
      subject: { kind: signal.subject.kind, value: signal.subject.value },
      threat_type: threatType,
      confidence: effective,
      level,
      action_taken: action,
      aggregated,
      timestamp: new Date(now).toISOString(),
    };

    if (!aggregated) {
      const actionError = await this.execute(action, signal, level, threatType);
      if (actionError !== null) record.action_error = actionError;
      if (correlationId !== undefined) this.window.markExecuted(correlationId, subject, level);

      if (level >= 4) {
        await this.raise(signal, level, action, threatType, effective);
        const notice = await this.notifyOnCall(signal, level, action, threatType);
        if (notice.notified !== undefined) record.on_call_notified = notice.notified;
        if (notice.gap !== undefined) record.notification_gap = notice.gap;
      }
    }

    this.records.push(record);
    this.historyStore.set(record);
    this.trimHistory();
    this.journal("escalation.evaluated", subject, { ...record });
    await this.safeSave(this.historyStore, "history");
    this.logger.info(`${threatType} on ${subject} → level ${level} (${action})`, {
      signal_id: signal.id,
      confidence: effective,
      aggregated,
    });
    return record;
  }

  /** Returns the failure message, or null when the action succeeded. */
  private async execute(action: EscalationAction, signal: Signal, level: EscalationLevel, threatType: string): Promise<string | null> {
    const { kind, value } = signal.subject;
    const reason = `Escalation level ${level}: ${threatType} (confidence ${signal.confidence.toFixed(2)})`;
    try {
      switch (action) {
        case "log":
          return null;
        case "watch": {
          const channel = this.modLogChannel;
          if (!channel) return this.actionFailed(action, signal, "no mod-log channel configured");
          await callPlatform("post_mod_log", () => this.platform.postAlert(channel, `[watch] ${kind}:${value}: ${reason}`), this.platformTimeoutMs);
          return null;
        }
        case "alert_mods": {
          const channel = this.modAlertChannel;
          if (!channel) return this.actionFailed(action, signal, "no mod-alert channel configured");
          await callPlatform("post_mod_alert", () => this.platform.postAlert(channel, `[alert] ${kind}:${value}: ${reason}`), this.platformTimeoutMs);
          return null;
        }
        case "timeout": {
          if (kind !== "user") return this.actionFailed(action, signal, `timeout not applicable to ${kind} subjects`);
          const until = new Date(this.clock.now() + this.timeoutMs).toISOString();
          await callPlatform("timeout_member", () => this.platform.timeoutMember(value, until, reason), this.platformTimeoutMs);
          return null;
        }
        case "ban_lockdown":
          if (kind === "user") {
            await callPlatform("ban_member", () => this.platform.banMember(value, reason), this.platformTimeoutMs);
            return null;
          }
          if (kind === "channel") {
            await callPlatform("lock_channel", () => this.platform.lockChannel(value, reason), this.platformTimeoutMs);
            return null;
          }
          return this.actionFailed(action, signal, `ban_lockdown not applicable to ${kind} subjects`);
      }
    } catch (err) {
      return this.actionFailed(action, signal, errorMessage(err));
    }
  }

  private actionFailed(action: EscalationAction, signal: Signal, message: string): string {
    this.logger.warn(`action ${action} failed for ${subjectKey(signal.subject)}: ${message}`);
    this.journal("escalation.action_failed", subjectKey(signal.subject), { signal_id: signal.id, action, error: message });
    return message;
  }

  private async raise(signal: Signal, level: EscalationLevel, action: EscalationAction, threatType: string, confidence: number): Promise<void> {
    const derived = createSignal(
      {
        type: "ESCALATION_REQUIRED",
        subject: { kind: signal.subject.kind, value: signal.subject.value },
        severity: LEVEL_SEVERITY[level],
        confidence,
        payload: { level, action, origin_signal_id: signal.id, threat_type: threatType },
        correlation_id: signal.correlation_id ?? signal.id,
      },
      { clock: this.clock, source: "escalation-engine" },
    );
    try {
      await this.bus.publish(derived);
    } catch (err) {
      this.logger.error("failed to publish ESCALATION_REQUIRED", { signal_id: signal.id, error: errorMessage(err) });
    }
  }

  /** Direct-messages the on-call responder, retrying once. */
  private async notifyOnCall(
    signal: Signal,
    level: EscalationLevel,
    action: EscalationAction,
    threatType: string,
  ): Promise<{ notified?: string; gap?: string }> {
    const responder = this.onCall(level);
    const subject = subjectKey(signal.subject);
    if (responder === null) {
      const gap = "no on-call responder configured";
      this.journal("escalation.oncall_failed", subject, { signal_id: signal.id, error: gap });
      return { gap };
    }
    const message = `Level ${level} escalation (${action}) for ${subject}: ${threatType}, confidence ${signal.confidence.toFixed(2)}. Signal ${signal.id}`;
    let lastError = "";
    for (let attempt = 1; attempt <= 2; attempt++) {
      try {
        await callPlatform("notify_on_call", () => this.platform.sendDirectMessage(responder, message), this.platformTimeoutMs);
        this.journal("escalation.oncall_notified", subject, { signal_id: signal.id, responder, attempt });
        return { notified: responder };
      } catch (err) {
        lastError = errorMessage(err);
        this.logger.warn(`on-call notification attempt ${attempt} failed`, { responder, error: lastError });
      }
    }
    const gap = `on-call notification to ${responder} failed after 2 attempts: ${lastError}`;
    this.journal("escalation.oncall_failed", subject, { signal_id: signal.id, responder, error: lastError });
    return { gap };
  }

  private levelResponders(): Partial<Record<EscalationLevel, string>> {
    const byLevel: Partial<Record<EscalationLevel, string>> = {};
    for (const [level, responder] of this.onCallByLevel) byLevel[level] = responder;
    return byLevel;
  }

  private syncRules(): void {
    const current = this.table.list();
    const keys = new Set(current.map((r) => ruleKey(r.threat_type, r.confidence_threshold)));
    for (const rule of this.rulesStore.getAll()) {
      const key = ruleKey(rule.threat_type, rule.confidence_threshold);
      if (!keys.has(key)) this.rulesStore.delete(key);
    }
    for (const rule of current) this.rulesStore.set(rule);
  }

  private trimHistory(): void {
    while (this.records.length > this.historyLimit) {
      const oldest = this.records.shift();
      if (oldest) this.historyStore.delete(oldest.record_id);
    }
  }

  private journal(type: JournalEventType, subject: string, payload: Record<string, unknown>): void {
    this.audit?.record("escalation", subject, type, payload);
  }

  private async safeSave(store: { save(): Promise<void> }, context: string): Promise<void> {
    try {
      await store.save();
    } catch (err) {
      this.logger.error(`failed to persist escalation ${context}`, { error: errorMessage(err) });
      this.journal("store.save_failed", `escalation:${context}`, { context, error: errorMessage(err) });
    }
  }
}
