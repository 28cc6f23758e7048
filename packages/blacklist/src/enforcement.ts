import type { AuditStore } from "@wardline/journal";
import type { SignalBus } from "@wardline/signal-bus";
import type { BlacklistEntry, Clock, Logger, PlatformClient, Signal } from "@wardline/schemas";
import { ConflictError, callPlatform, createSignal, errorMessage, silentLogger, systemClock } from "@wardline/schemas";
import type { BlacklistStore } from "./blacklist-store.js";
import { entryKey } from "./blacklist-store.js";

export interface BlacklistEnforcerConfig {
  blacklist: BlacklistStore;
  bus: SignalBus;
  platform: PlatformClient;
  audit?: AuditStore;
  clock?: Clock;
  logger?: Logger;
  /** Blacklist users hit by a ban_lockdown escalation. Default: true */
  autoBlacklistOnBan?: boolean;
  /** Per platform call deadline; 0 disables. Default: 10000 */
  platformTimeoutMs?: number;
}

export type EnforcementAction = "ban" | "timeout";

export interface EnforcementResult {
  entry: BlacklistEntry;
  action: EnforcementAction;
  error?: string;
}

/**
 * Applies the blacklist to joining members and turns ban_lockdown
 * escalations into APPEAL_ELIGIBLE entries.
 */
export class BlacklistEnforcer {
  private blacklist: BlacklistStore;
  private bus: SignalBus;
  private platform: PlatformClient;
  private audit: AuditStore | undefined;
  private clock: Clock;
  private logger: Logger;
  private autoBlacklistOnBan: boolean;
  private platformTimeoutMs: number;
  private unsubscribers: Array<() => void> = [];

  constructor(config: BlacklistEnforcerConfig) {
    this.blacklist = config.blacklist;
    this.bus = config.bus;
    this.platform = config.platform;
    this.audit = config.audit;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? silentLogger;
    this.autoBlacklistOnBan = config.autoBlacklistOnBan ?? true;
    this.platformTimeoutMs = config.platformTimeoutMs ?? 10_000;
  }

  start(): void {
    if (this.unsubscribers.length > 0) return;
    this.unsubscribers.push(
      this.bus.subscribe("MEMBER_JOINED", async (signal) => { await this.enforce(signal); }, { name: "blacklist-enforcement" }),
    );
    if (this.autoBlacklistOnBan) {
      this.unsubscribers.push(
        this.bus.subscribe("ESCALATION_REQUIRED", async (signal) => { await this.onEscalation(signal); }, { name: "blacklist-escalations" }),
      );
    }
  }

  stop(): void {
    for (const off of this.unsubscribers) off();
    this.unsubscribers = [];
  }

  /**
   * Bans a blacklisted joining user, or times them out until expiry for
   * TEMPORARY entries. Returns null when the user is not blacklisted.
   */
  async enforce(signal: Signal): Promise<EnforcementResult | null> {
    if (signal.subject.kind !== "user") return null;
    const userId = signal.subject.value;
    const entry = this.blacklist.lookup("user", userId);
    if (!entry) return null;

    const guildId = typeof signal.payload["guild_id"] === "string" ? signal.payload["guild_id"] : undefined;
    const reason = `Blacklisted: ${entry.reason}`;
    const action: EnforcementAction = entry.tier === "TEMPORARY" && entry.expires_at !== undefined ? "timeout" : "ban";

    let error: string | undefined;
    try {
      if (action === "timeout" && entry.expires_at !== undefined) {
        const until = entry.expires_at;
        await callPlatform("timeout_member", () => this.platform.timeoutMember(userId, until, reason), this.platformTimeoutMs);
      } else {
        await callPlatform("ban_member", () => this.platform.banMember(userId, reason), this.platformTimeoutMs);
      }
    } catch (err) {
      error = errorMessage(err);
      this.logger.warn(`could not enforce blacklist on ${userId}`, { entry_id: entry.id, action, error });
      this.audit?.record("blacklist", entryKey(entry.type, entry.value), "blacklist.enforcement_failed", {
        entry_id: entry.id,
        action,
        error,
      });
    }

    const hit = this.blacklist.recordHit(entry.id, { action, signal_id: signal.id, ...(guildId !== undefined ? { guild_id: guildId } : {}) });

    const violation = createSignal(
      {
        type: "POLICY_VIOLATION",
        subject: { kind: "user", value: userId },
        severity: entry.tier === "TEMPORARY" ? "medium" : "high",
        confidence: 1,
        payload: {
          policy: "blacklist_enforcement",
          entry_id: entry.id,
          tier: entry.tier,
          action,
          enforced: error === undefined,
          ...(guildId !== undefined ? { guild_id: guildId } : {}),
        },
        correlation_id: signal.id,
      },
      { clock: this.clock, source: "blacklist-enforcement" },
    );
    await this.bus.publish(violation);

    return { entry: hit ?? entry, action, ...(error !== undefined ? { error } : {}) };
  }

  private async onEscalation(signal: Signal): Promise<void> {
    if (signal.payload["action"] !== "ban_lockdown" || signal.subject.kind !== "user") return;
    const userId = signal.subject.value;
    if (this.blacklist.lookup("user", userId) || this.blacklist.isAllowlisted("user", userId)) return;

    const threatType = typeof signal.payload["threat_type"] === "string" ? signal.payload["threat_type"] : "unknown";
    try {
      const entry = await this.blacklist.add({
        type: "user",
        value: userId,
        tier: "APPEAL_ELIGIBLE",
        durationMs: 0,
        reason: `ban_lockdown escalation (${threatType})`,
        actor: signal.source,
      });
      this.logger.info(`auto-blacklisted ${userId} after ban_lockdown`, { entry_id: entry.id, signal_id: signal.id });
    } catch (err) {
      // Another path blacklisted the user between lookup and add
      if (err instanceof ConflictError && err.code === "DUPLICATE_ACTIVE_ENTRY") {
        this.logger.debug(`${userId} already blacklisted`, { signal_id: signal.id });
        return;
      }
      throw err;
    }
  }
}
