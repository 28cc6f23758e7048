import {
  Registry,
  Counter,
  Gauge,
  collectDefaultMetrics,
} from "prom-client";
import type { AuditStore } from "@wardline/journal";
import type { JournalEvent } from "@wardline/schemas";

export interface MetricsCollectorConfig {
  registry?: Registry;
  prefix?: string;
  collectDefault?: boolean;
  /** Read at scrape time; the gauge stays at 0 when omitted. */
  activeQuarantines?: () => number;
  /** Read at scrape time; the gauge stays at 0 when omitted. */
  activeBlacklistEntries?: () => number;
}

function label(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "unknown";
}

/**
 * Prometheus view of the audit trail. Every counter is driven by journal
 * events, so the numbers match what was recorded.
 */
export class MetricsCollector {
  private readonly registry: Registry;
  private readonly prefix: string;
  private unsubscribe?: () => void;

  // ─── Bus Metrics ───────────────────────────────────────────────────
  private readonly signalsDroppedTotal: Counter;
  private readonly subscriberFailuresTotal: Counter;

  // ─── Escalation Metrics ────────────────────────────────────────────
  private readonly escalationsTotal: Counter;
  private readonly oncallNotificationsTotal: Counter;
  private readonly oncallGapsTotal: Counter;

  // ─── Quarantine Metrics ────────────────────────────────────────────
  private readonly quarantineTransitionsTotal: Counter;
  private readonly quarantineActive: Gauge;

  // ─── Platform Metrics ──────────────────────────────────────────────
  private readonly platformFailuresTotal: Counter;

  // ─── Blacklist & Appeal Metrics ────────────────────────────────────
  private readonly blacklistChangesTotal: Counter;
  private readonly blacklistHitsTotal: Counter;
  private readonly blacklistActive: Gauge;
  private readonly appealsTotal: Counter;

  // ─── Persistence Metrics ───────────────────────────────────────────
  private readonly storeSaveFailuresTotal: Counter;

  constructor(config?: MetricsCollectorConfig) {
    this.registry = config?.registry ?? new Registry();
    this.prefix = config?.prefix ?? "wardline_";

    if (config?.collectDefault !== false) {
      collectDefaultMetrics({ register: this.registry, prefix: this.prefix });
    }

    // Bus metrics
    this.signalsDroppedTotal = new Counter({
      name: `${this.prefix}signals_dropped_total`,
      help: "Signals dropped from a full subscriber inbox, by subscriber and signal type",
      labelNames: ["subscriber", "signal_type"] as const,
      registers: [this.registry],
    });

    this.subscriberFailuresTotal = new Counter({
      name: `${this.prefix}subscriber_failures_total`,
      help: "Subscriber handler failures after retry, by subscriber",
      labelNames: ["subscriber"] as const,
      registers: [this.registry],
    });

    // Escalation metrics
    this.escalationsTotal = new Counter({
      name: `${this.prefix}escalations_total`,
      help: "Escalation decisions by level, action and whether they were aggregated",
      labelNames: ["level", "action", "aggregated"] as const,
      registers: [this.registry],
    });

    this.oncallNotificationsTotal = new Counter({
      name: `${this.prefix}oncall_notifications_total`,
      help: "Direct messages delivered to the on-call responder",
      registers: [this.registry],
    });

    this.oncallGapsTotal = new Counter({
      name: `${this.prefix}oncall_gaps_total`,
      help: "Escalations that required a responder but reached none",
      registers: [this.registry],
    });

    // Quarantine metrics
    this.quarantineTransitionsTotal = new Counter({
      name: `${this.prefix}quarantine_transitions_total`,
      help: "Quarantine state transitions by transition",
      labelNames: ["transition"] as const,
      registers: [this.registry],
    });

    const activeQuarantines = config?.activeQuarantines;
    this.quarantineActive = new Gauge({
      name: `${this.prefix}quarantine_active`,
      help: "Subjects currently quarantined or under review",
      registers: [this.registry],
      collect() {
        if (activeQuarantines) this.set(activeQuarantines());
      },
    });

    // Platform metrics
    this.platformFailuresTotal = new Counter({
      name: `${this.prefix}platform_failures_total`,
      help: "Failed platform calls by component and step",
      labelNames: ["component", "step"] as const,
      registers: [this.registry],
    });

    // Blacklist & appeal metrics
    this.blacklistChangesTotal = new Counter({
      name: `${this.prefix}blacklist_changes_total`,
      help: "Blacklist entry changes by change",
      labelNames: ["change"] as const,
      registers: [this.registry],
    });

    this.blacklistHitsTotal = new Counter({
      name: `${this.prefix}blacklist_hits_total`,
      help: "Blacklist enforcement hits by action",
      labelNames: ["action"] as const,
      registers: [this.registry],
    });

    const activeBlacklistEntries = config?.activeBlacklistEntries;
    this.blacklistActive = new Gauge({
      name: `${this.prefix}blacklist_active`,
      help: "Active blacklist entries",
      registers: [this.registry],
      collect() {
        if (activeBlacklistEntries) this.set(activeBlacklistEntries());
      },
    });

    this.appealsTotal = new Counter({
      name: `${this.prefix}appeals_total`,
      help: "Appeal submissions and decisions by outcome",
      labelNames: ["outcome"] as const,
      registers: [this.registry],
    });

    // Persistence metrics
    this.storeSaveFailuresTotal = new Counter({
      name: `${this.prefix}store_save_failures_total`,
      help: "Failed table saves by journal stream",
      labelNames: ["stream"] as const,
      registers: [this.registry],
    });
  }

  attach(audit: AuditStore): void {
    this.detach();
    this.unsubscribe = audit.on((event) => this.handleEvent(event));
  }

  detach(): void {
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = undefined;
    }
  }

  handleEvent(event: JournalEvent): void {
    const payload = event.payload;
    switch (event.type) {
      // ─── Bus Events ────────────────────────────────────────────────
      case "bus.signal_dropped":
        this.signalsDroppedTotal.inc({ subscriber: label(payload, "subscriber"), signal_type: label(payload, "signal_type") });
        break;

      case "bus.subscriber_failed":
        this.subscriberFailuresTotal.inc({ subscriber: label(payload, "subscriber") });
        break;

      // ─── Escalation Events ─────────────────────────────────────────
      case "escalation.evaluated":
        this.escalationsTotal.inc({
          level: label(payload, "level"),
          action: label(payload, "action_taken"),
          aggregated: label(payload, "aggregated"),
        });
        break;

      case "escalation.oncall_notified":
        this.oncallNotificationsTotal.inc();
        break;

      case "escalation.oncall_failed":
        this.oncallGapsTotal.inc();
        break;

      case "escalation.action_failed":
        this.platformFailuresTotal.inc({ component: "escalation", step: label(payload, "action") });
        break;

      // ─── Quarantine Events ─────────────────────────────────────────
      case "quarantine.entered":
        this.quarantineTransitionsTotal.inc({ transition: "quarantined" });
        break;

      case "quarantine.review_requested":
        this.quarantineTransitionsTotal.inc({ transition: "review_requested" });
        break;

      case "quarantine.released":
        this.quarantineTransitionsTotal.inc({ transition: "released" });
        break;

      case "quarantine.maintained":
        this.quarantineTransitionsTotal.inc({ transition: "maintained" });
        break;

      case "quarantine.action_failed":
        this.platformFailuresTotal.inc({ component: "quarantine", step: label(payload, "step") });
        break;

      // ─── Blacklist Events ──────────────────────────────────────────
      case "blacklist.added":
        this.blacklistChangesTotal.inc({ change: "added" });
        break;

      case "blacklist.removed":
        this.blacklistChangesTotal.inc({ change: "removed" });
        break;

      case "blacklist.expired":
        this.blacklistChangesTotal.inc({ change: "expired" });
        break;

      case "blacklist.hit":
        this.blacklistHitsTotal.inc({ action: label(payload, "action") });
        break;

      case "blacklist.enforcement_failed":
        this.platformFailuresTotal.inc({ component: "blacklist", step: label(payload, "action") });
        break;

      // ─── Appeal Events ─────────────────────────────────────────────
      case "appeal.submitted":
        this.appealsTotal.inc({ outcome: "submitted" });
        break;

      case "appeal.rejected":
        this.appealsTotal.inc({ outcome: "rejected" });
        break;

      case "appeal.approved":
        this.appealsTotal.inc({ outcome: "approved" });
        break;

      case "appeal.denied":
        this.appealsTotal.inc({ outcome: "denied" });
        break;

      // ─── Persistence Events ────────────────────────────────────────
      case "store.save_failed":
        this.storeSaveFailuresTotal.inc({ stream: event.stream });
        break;

      default:
        break;
    }
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getContentType(): string {
    return this.registry.contentType;
  }

  getRegistry(): Registry {
    return this.registry;
  }

  reset(): void {
    this.registry.resetMetrics();
  }
}
