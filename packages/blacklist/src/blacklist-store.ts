import { v4 as uuid } from "uuid";
import type { AuditStore } from "@wardline/journal";
import type { SignalBus } from "@wardline/signal-bus";
import type { KeyValueStore } from "@wardline/store";
import type {
  AllowlistException,
  BlacklistEntry,
  BlacklistStatus,
  BlacklistTier,
  BlacklistType,
  Clock,
  JournalEventType,
  Logger,
  Severity,
} from "@wardline/schemas";
import {
  BLACKLIST_TIERS,
  BLACKLIST_TYPES,
  ConflictError,
  DAY_MS,
  KeyedMutex,
  NotFoundError,
  ValidationError,
  createSignal,
  errorMessage,
  silentLogger,
  systemClock,
} from "@wardline/schemas";

export interface BlacklistStoreConfig {
  entries: KeyValueStore<BlacklistEntry>;
  exceptions: KeyValueStore<AllowlistException>;
  /** When set, every add publishes a POLICY_VIOLATION signal. */
  bus?: SignalBus;
  audit?: AuditStore;
  clock?: Clock;
  logger?: Logger;
  /** Longest accepted duration. Default: 365 days */
  maxDurationMs?: number;
  /** Background expiry sweep; 0 disables. Default: 60000 */
  sweepIntervalMs?: number;
}

export interface AddEntryInput {
  type: BlacklistType;
  value: string;
  tier: BlacklistTier;
  /** Lifetime of a TEMPORARY entry; validated but unused for other tiers. */
  durationMs: number;
  reason: string;
  actor: string;
}

export interface RemoveOptions {
  /** Owner/manual override; required for APPEAL_ELIGIBLE and PERMANENT. */
  override?: boolean;
  reason?: string;
}

export interface EntryFilter {
  status?: BlacklistStatus;
  type?: BlacklistType;
  tier?: BlacklistTier;
  limit?: number;
}

export interface BlacklistStats {
  total: number;
  active: number;
  expired: number;
  removed: number;
  by_tier: Record<BlacklistTier, number>;
  by_type: Partial<Record<BlacklistType, number>>;
  hits: number;
  exceptions: number;
}

const TIER_SEVERITY: Record<BlacklistTier, Severity> = {
  TEMPORARY: "low",
  APPEAL_ELIGIBLE: "medium",
  PERMANENT: "high",
};

function isBlacklistType(value: unknown): value is BlacklistType {
  return typeof value === "string" && (BLACKLIST_TYPES as readonly string[]).includes(value);
}

function isBlacklistTier(value: unknown): value is BlacklistTier {
  return typeof value === "string" && (BLACKLIST_TIERS as readonly string[]).includes(value);
}

/** Trims every value; domains and emails compare case-insensitively. */
export function normalizeValue(type: BlacklistType, value: string): string {
  const trimmed = value.trim();
  return type === "domain" || type === "email" ? trimmed.toLowerCase() : trimmed;
}

export function entryKey(type: BlacklistType, value: string): string {
  return `${type}:${normalizeValue(type, value)}`;
}

/**
 * Tiered ban list with an allowlist. Lookups are synchronous and expire
 * due TEMPORARY entries on the way; entries are never deleted, only
 * moved to expired or removed.
 */
export class BlacklistStore {
  private entries: KeyValueStore<BlacklistEntry>;
  private exceptionStore: KeyValueStore<AllowlistException>;
  private bus: SignalBus | undefined;
  private audit: AuditStore | undefined;
  private clock: Clock;
  private logger: Logger;
  private maxDurationMs: number;
  private sweepIntervalMs: number;
  private mutex = new KeyedMutex();
  /** entry key → id of the active entry */
  private active = new Map<string, string>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private saving: Promise<void> = Promise.resolve();

  constructor(config: BlacklistStoreConfig) {
    this.entries = config.entries;
    this.exceptionStore = config.exceptions;
    this.bus = config.bus;
    this.audit = config.audit;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? silentLogger;
    this.maxDurationMs = config.maxDurationMs ?? 365 * DAY_MS;
    this.sweepIntervalMs = config.sweepIntervalMs ?? 60_000;
  }

  /** Loads the tables, expires what fell due while stopped and starts the sweeper. */
  async start(): Promise<void> {
    await this.entries.load();
    await this.exceptionStore.load();
    this.active.clear();
    const sorted = this.entries.getAll().sort((a, b) => a.created_at.localeCompare(b.created_at));
    for (const entry of sorted) {
      if (entry.status === "active") this.active.set(entryKey(entry.type, entry.value), entry.id);
    }
    const expired = this.sweep();
    await this.flush();

    if (this.sweepIntervalMs > 0 && !this.sweepTimer) {
      this.sweepTimer = setInterval(() => {
        this.sweep();
      }, this.sweepIntervalMs);
      this.sweepTimer.unref();
    }
    this.logger.info("blacklist started", { entries: this.entries.size, active: this.active.size, expired: expired.length });
  }

  async stop(): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await this.flush();
  }

  /** The active entry for the key, or null. Allowlisted keys are never blacklisted. */
  lookup(type: BlacklistType, value: string): BlacklistEntry | null {
    if (this.isAllowlisted(type, value)) return null;
    const entry = this.activeEntry(entryKey(type, value));
    return entry ? { ...entry } : null;
  }

  isBlacklisted(type: BlacklistType, value: string): boolean {
    return this.lookup(type, value) !== null;
  }

  async add(input: AddEntryInput): Promise<BlacklistEntry> {
    if (!isBlacklistType(input.type)) throw new ValidationError(`Unknown blacklist type: "${String(input.type)}"`);
    if (!isBlacklistTier(input.tier)) throw new ValidationError(`Unknown blacklist tier: "${String(input.tier)}"`);
    const value = normalizeValue(input.type, input.value);
    if (value.length === 0) throw new ValidationError("value must not be empty");
    if (!Number.isFinite(input.durationMs) || input.durationMs < 0) {
      throw new ValidationError(`duration must be a non-negative number of milliseconds, got ${input.durationMs}`);
    }
    if (input.durationMs > this.maxDurationMs) {
      throw new ValidationError(`duration ${input.durationMs}ms exceeds the maximum of ${this.maxDurationMs}ms`);
    }
    if (input.reason.trim().length === 0) throw new ValidationError("reason must not be empty");

    const key = entryKey(input.type, value);
    const entry = await this.mutex.runExclusive(key, async () => {
      const existing = this.activeEntry(key);
      if (existing) {
        throw new ConflictError(`${key} is already blacklisted`, "DUPLICATE_ACTIVE_ENTRY", {
          entry_id: existing.id,
          tier: existing.tier,
        });
      }
      const now = this.clock.now();
      const created: BlacklistEntry = {
        id: uuid(),
        type: input.type,
        value,
        tier: input.tier,
        reason: input.reason,
        added_by: input.actor,
        created_at: new Date(now).toISOString(),
        ...(input.tier === "TEMPORARY" ? { expires_at: new Date(now + input.durationMs).toISOString() } : {}),
        status: "active",
        times_triggered: 0,
      };
      this.entries.set(created);
      this.active.set(key, created.id);
      this.journal("blacklist.added", key, { entry_id: created.id, tier: created.tier, reason: created.reason, actor: input.actor, expires_at: created.expires_at ?? null });
      await this.persist();
      this.logger.info(`blacklisted ${key} (${created.tier})`, { entry_id: created.id });
      return created;
    });

    await this.announce(entry);
    return { ...entry };
  }

  /**
   * Lifts an active entry. TEMPORARY entries always; APPEAL_ELIGIBLE
   * and PERMANENT only with an override.
   */
  remove(type: BlacklistType, value: string, actor: string, options: RemoveOptions = {}): Promise<BlacklistEntry> {
    const key = entryKey(type, value);
    return this.mutex.runExclusive(key, async () => {
      const entry = this.activeEntry(key);
      if (!entry) throw new NotFoundError(`No active blacklist entry for ${key}`);
      if (entry.tier !== "TEMPORARY" && !options.override) {
        throw new ConflictError(`${entry.tier} entries can only be removed with an override`, "REMOVAL_NOT_PERMITTED", {
          entry_id: entry.id,
          tier: entry.tier,
        });
      }
      return this.close(entry, actor, options.reason ?? "manual removal", options.override ? "override" : "manual");
    });
  }

  /**
   * Lifts an APPEAL_ELIGIBLE entry for an approved appeal. Returns null
   * when the entry is no longer active.
   */
  removeForAppeal(entryId: string, reviewer: string, appealId: string): Promise<BlacklistEntry | null> {
    const stored = this.entries.get(entryId);
    if (!stored) return Promise.reject(new NotFoundError(`Blacklist entry not found: ${entryId}`));
    const key = entryKey(stored.type, stored.value);
    return this.mutex.runExclusive(key, async () => {
      const entry = this.activeEntry(key);
      if (!entry || entry.id !== entryId) return null;
      if (entry.tier !== "APPEAL_ELIGIBLE") {
        throw new ConflictError(`${entry.tier} entries cannot be lifted by appeal`, "NOT_APPEALABLE", { entry_id: entry.id, tier: entry.tier });
      }
      return this.close(entry, reviewer, `appeal ${appealId} approved`, "appeal");
    });
  }

  /** Moves every due TEMPORARY entry to expired. */
  sweep(): BlacklistEntry[] {
    const expired: BlacklistEntry[] = [];
    for (const [key, id] of [...this.active]) {
      const entry = this.entries.get(id);
      if (entry && this.expireIfDue(key, entry)) expired.push({ ...entry });
    }
    if (expired.length > 0) this.logger.info(`expired ${expired.length} blacklist entr${expired.length === 1 ? "y" : "ies"}`);
    return expired;
  }

  /** Counts an enforcement hit against an active entry. */
  recordHit(entryId: string, context: Record<string, unknown> = {}): BlacklistEntry | null {
    const entry = this.entries.get(entryId);
    if (!entry || entry.status !== "active") return null;
    entry.times_triggered++;
    entry.last_triggered = new Date(this.clock.now()).toISOString();
    this.entries.set(entry);
    this.journal("blacklist.hit", entryKey(entry.type, entry.value), { entry_id: entry.id, times_triggered: entry.times_triggered, ...context });
    void this.persist();
    return { ...entry };
  }

  /** Whether the entry is active, expiring it first if it fell due. */
  isActive(entryId: string): boolean {
    const entry = this.entries.get(entryId);
    if (!entry) return false;
    const current = this.activeEntry(entryKey(entry.type, entry.value));
    return current?.id === entryId;
  }

  get(id: string): BlacklistEntry | undefined {
    // Expires the entry first if it fell due
    this.isActive(id);
    const entry = this.entries.get(id);
    return entry ? { ...entry } : undefined;
  }

  /** Every entry ever recorded for the key, oldest first. */
  history(type: BlacklistType, value: string): BlacklistEntry[] {
    const key = entryKey(type, value);
    this.activeEntry(key); // lazy expiry
    return this.entries
      .getAll()
      .filter((e) => entryKey(e.type, e.value) === key)
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map((e) => ({ ...e }));
  }

  /** Most recent first. */
  list(filter: EntryFilter = {}): BlacklistEntry[] {
    this.sweep();
    const matches = this.entries
      .getAll()
      .filter((e) =>
        (filter.status === undefined || e.status === filter.status) &&
        (filter.type === undefined || e.type === filter.type) &&
        (filter.tier === undefined || e.tier === filter.tier),
      )
      .sort((a, b) => b.created_at.localeCompare(a.created_at));
    return matches.slice(0, filter.limit ?? matches.length).map((e) => ({ ...e }));
  }

  /** Case-insensitive match on value or reason, most recent first. */
  search(query: string, limit = 50): BlacklistEntry[] {
    const needle = query.trim().toLowerCase();
    if (needle.length === 0) return [];
    return this.list()
      .filter((e) => e.value.toLowerCase().includes(needle) || e.reason.toLowerCase().includes(needle))
      .slice(0, limit);
  }

  stats(): BlacklistStats {
    this.sweep();
    const stats: BlacklistStats = {
      total: 0,
      active: 0,
      expired: 0,
      removed: 0,
      by_tier: { TEMPORARY: 0, APPEAL_ELIGIBLE: 0, PERMANENT: 0 },
      by_type: {},
      hits: 0,
      exceptions: this.exceptionStore.size,
    };
    for (const entry of this.entries.getAll()) {
      stats.total++;
      stats.hits += entry.times_triggered;
      if (entry.status === "expired") stats.expired++;
      else if (entry.status === "removed") stats.removed++;
      else {
        stats.active++;
        stats.by_tier[entry.tier]++;
        stats.by_type[entry.type] = (stats.by_type[entry.type] ?? 0) + 1;
      }
    }
    return stats;
  }

  // ─── Allowlist ────────────────────────────────────────────────────

  async addException(type: BlacklistType, value: string, reason: string, actor: string): Promise<AllowlistException> {
    if (!isBlacklistType(type)) throw new ValidationError(`Unknown blacklist type: "${String(type)}"`);
    const normalized = normalizeValue(type, value);
    if (normalized.length === 0) throw new ValidationError("value must not be empty");
    const key = entryKey(type, normalized);
    if (this.exceptionStore.has(key)) throw new ConflictError(`${key} is already allowlisted`);
    const exception: AllowlistException = {
      type,
      value: normalized,
      reason,
      added_by: actor,
      created_at: new Date(this.clock.now()).toISOString(),
    };
    this.exceptionStore.set(exception);
    this.journal("blacklist.exception_added", key, { reason, actor });
    await this.persist();
    return { ...exception };
  }

  async removeException(type: BlacklistType, value: string, actor: string): Promise<void> {
    const key = entryKey(type, value);
    if (!this.exceptionStore.delete(key)) throw new NotFoundError(`No allowlist exception for ${key}`);
    this.journal("blacklist.exception_removed", key, { actor });
    await this.persist();
  }

  exceptions(): AllowlistException[] {
    return this.exceptionStore
      .getAll()
      .sort((a, b) => a.created_at.localeCompare(b.created_at))
      .map((e) => ({ ...e }));
  }

  isAllowlisted(type: BlacklistType, value: string): boolean {
    return this.exceptionStore.has(entryKey(type, value));
  }

  /** Resolves once every pending save has landed. */
  async flush(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.saving;
      await current;
    } while (current !== this.saving);
  }

  private activeEntry(key: string): BlacklistEntry | undefined {
    const id = this.active.get(key);
    if (id === undefined) return undefined;
    const entry = this.entries.get(id);
    if (!entry || this.expireIfDue(key, entry)) return undefined;
    return entry;
  }

  private expireIfDue(key: string, entry: BlacklistEntry): boolean {
    if (entry.tier !== "TEMPORARY" || entry.expires_at === undefined) return false;
    if (Date.parse(entry.expires_at) > this.clock.now()) return false;
    entry.status = "expired";
    this.entries.set(entry);
    this.active.delete(key);
    this.journal("blacklist.expired", key, { entry_id: entry.id, expires_at: entry.expires_at });
    void this.persist();
    return true;
  }

  private async close(entry: BlacklistEntry, actor: string, reason: string, via: "manual" | "override" | "appeal"): Promise<BlacklistEntry> {
    const key = entryKey(entry.type, entry.value);
    entry.status = "removed";
    entry.removed_at = new Date(this.clock.now()).toISOString();
    entry.removed_by = actor;
    entry.removal_reason = reason;
    this.entries.set(entry);
    this.active.delete(key);
    this.journal("blacklist.removed", key, { entry_id: entry.id, tier: entry.tier, actor, reason, via });
    await this.persist();
    return { ...entry };
  }

  private async announce(entry: BlacklistEntry): Promise<void> {
    if (!this.bus) return;
    const signal = createSignal(
      {
        type: "POLICY_VIOLATION",
        subject: { kind: entry.type, value: entry.value },
        severity: TIER_SEVERITY[entry.tier],
        confidence: 1,
        payload: { policy: "blacklist", entry_id: entry.id, tier: entry.tier, reason: entry.reason },
      },
      { clock: this.clock, source: "blacklist" },
    );
    try {
      await this.bus.publish(signal);
    } catch (err) {
      this.logger.error("failed to publish POLICY_VIOLATION", { entry_id: entry.id, error: errorMessage(err) });
    }
  }

  /**
   * Queues a save of both tables behind any in flight. Never rejects:
   * a failed save is logged and journalled.
   */
  private persist(): Promise<void> {
    this.saving = this.saving.then(async () => {
      try {
        await this.entries.save();
        await this.exceptionStore.save();
      } catch (err) {
        this.logger.error("failed to persist blacklist", { error: errorMessage(err) });
        this.journal("store.save_failed", "blacklist", { error: errorMessage(err) });
      }
    });
    return this.saving;
  }

  private journal(type: JournalEventType, subject: string, payload: Record<string, unknown>): void {
    this.audit?.record("blacklist", subject, type, payload);
  }
}
