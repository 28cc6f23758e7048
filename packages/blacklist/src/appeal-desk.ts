import { v4 as uuid } from "uuid";
import type { AuditStore } from "@wardline/journal";
import type { KeyValueStore } from "@wardline/store";
import type {
  Appeal,
  AppealDecision,
  AppealStatus,
  BlacklistEntry,
  Clock,
  JournalEventType,
  Logger,
  PlatformClient,
} from "@wardline/schemas";
import {
  ConflictError,
  DAY_MS,
  KeyedMutex,
  NotFoundError,
  TerminalStateError,
  ValidationError,
  callPlatform,
  errorMessage,
  silentLogger,
  systemClock,
} from "@wardline/schemas";
import type { BlacklistStore } from "./blacklist-store.js";
import { entryKey } from "./blacklist-store.js";

export interface AppealDeskConfig {
  blacklist: BlacklistStore;
  appeals: KeyValueStore<Appeal>;
  platform: PlatformClient;
  audit?: AuditStore;
  clock?: Clock;
  logger?: Logger;
  /** Appeals (any status) one submitter may file per window. Default: 3 */
  maxAppealsPerWindow?: number;
  /** Default: 30 days */
  appealWindowMs?: number;
  /** Per platform call deadline; 0 disables. Default: 10000 */
  platformTimeoutMs?: number;
}

export interface AppealFilter {
  status?: AppealStatus;
  submitter?: string;
  entryId?: string;
}

export interface AppealEvent {
  type: "submitted" | "approved" | "denied";
  appeal: Appeal;
  /** The appealed entry as it stood when the appeal was filed or decided. */
  entry: BlacklistEntry;
  /** Who acted: the submitter, or the deciding reviewer. */
  actor: string;
}

export type AppealListener = (event: AppealEvent) => void | Promise<void>;

/**
 * Appeals against APPEAL_ELIGIBLE blacklist entries. Submissions are
 * rate limited per submitter over a trailing window; a decided appeal
 * is final.
 */
export class AppealDesk {
  private blacklist: BlacklistStore;
  private appealStore: KeyValueStore<Appeal>;
  private platform: PlatformClient;
  private audit: AuditStore | undefined;
  private clock: Clock;
  private logger: Logger;
  private maxAppeals: number;
  private windowMs: number;
  private platformTimeoutMs: number;
  private mutex = new KeyedMutex();
  private listeners = new Set<AppealListener>();

  constructor(config: AppealDeskConfig) {
    this.blacklist = config.blacklist;
    this.appealStore = config.appeals;
    this.platform = config.platform;
    this.audit = config.audit;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? silentLogger;
    this.maxAppeals = config.maxAppealsPerWindow ?? 3;
    this.windowMs = config.appealWindowMs ?? 30 * DAY_MS;
    this.platformTimeoutMs = config.platformTimeoutMs ?? 10_000;
  }

  async start(): Promise<void> {
    await this.appealStore.load();
    this.logger.info("appeal desk started", { appeals: this.appealStore.size });
  }

  /** Called after an appeal is filed or decided and persisted. Listener failures are logged. */
  onAppeal(listener: AppealListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async submitAppeal(entryId: string, submitter: string, reason: string): Promise<Appeal> {
    if (submitter.trim().length === 0) throw new ValidationError("submitter must not be empty");
    if (reason.trim().length === 0) throw new ValidationError("reason must not be empty");

    // Entry lock first, then submitter lock: one pending appeal per entry, exact rate counting per submitter
    return this.mutex.runExclusive(`entry:${entryId}`, () =>
      this.mutex.runExclusive(`submitter:${submitter}`, async () => {
        const entry = this.blacklist.get(entryId);
        if (!entry) throw new NotFoundError(`Blacklist entry not found: ${entryId}`);
        const key = entryKey(entry.type, entry.value);

        if (entry.status !== "active") {
          throw this.reject(key, entryId, submitter, new ConflictError(`Blacklist entry ${entryId} is ${entry.status}`, "NOT_APPEALABLE", { status: entry.status }));
        }
        if (entry.tier !== "APPEAL_ELIGIBLE") {
          throw this.reject(key, entryId, submitter, new ConflictError(`${entry.tier} entries are not appealable`, "NOT_APPEALABLE", { tier: entry.tier }));
        }
        const pending = this.appealStore.getAll().find((a) => a.blacklist_entry_id === entryId && a.status === "pending");
        if (pending) {
          throw this.reject(key, entryId, submitter, new ConflictError(`Appeal ${pending.id} is already pending for this entry`, "CONFLICT", { appeal_id: pending.id }));
        }
        const recent = this.recentAppeals(submitter);
        if (recent >= this.maxAppeals) {
          throw this.reject(key, entryId, submitter, new ConflictError(
            `Appeal limit reached: ${recent} appeals in the last ${Math.round(this.windowMs / DAY_MS)} days`,
            "RATE_LIMITED",
            { limit: this.maxAppeals, window_ms: this.windowMs },
          ));
        }

        const appeal: Appeal = {
          id: uuid(),
          blacklist_entry_id: entryId,
          submitted_by: submitter,
          reason,
          status: "pending",
          submitted_at: this.now(),
        };
        this.appealStore.set(appeal);
        this.journal("appeal.submitted", key, { appeal_id: appeal.id, entry_id: entryId, submitted_by: submitter });
        await this.save();
        await this.emit({ type: "submitted", appeal: { ...appeal }, entry, actor: submitter });
        return { ...appeal };
      }),
    );
  }

  /**
   * Approve lifts the entry and tells the submitter; deny keeps it.
   * Either way the appeal is final.
   */
  decideAppeal(appealId: string, reviewer: string, decision: AppealDecision, note?: string): Promise<Appeal> {
    if (decision !== "approve" && decision !== "deny") {
      return Promise.reject(new ValidationError(`decision must be "approve" or "deny", got "${String(decision)}"`));
    }
    return this.mutex.runExclusive(`appeal:${appealId}`, async () => {
      const appeal = this.appealStore.get(appealId);
      if (!appeal) throw new NotFoundError(`Appeal not found: ${appealId}`);
      if (appeal.status !== "pending") {
        throw new TerminalStateError(`Appeal ${appealId} was already ${appeal.status}`, { status: appeal.status });
      }
      const entry = this.blacklist.get(appeal.blacklist_entry_id);
      const key = entry ? entryKey(entry.type, entry.value) : `appeal:${appealId}`;

      // Lift first so a refused removal leaves the appeal pending
      const lifted = decision === "approve"
        ? await this.blacklist.removeForAppeal(appeal.blacklist_entry_id, reviewer, appealId)
        : null;

      appeal.decided_by = reviewer;
      appeal.decided_at = this.now();
      if (note !== undefined) appeal.decision_note = note;

      if (decision === "deny") {
        appeal.status = "denied";
        this.journal("appeal.denied", key, { appeal_id: appealId, reviewer, ...(note !== undefined ? { note } : {}) });
      } else {
        appeal.status = "approved";
        try {
          const outcome = lifted !== null
            ? "the blacklist entry has been lifted"
            : "the blacklist entry was no longer active";
          await callPlatform(
            "notify_submitter",
            () => this.platform.sendDirectMessage(appeal.submitted_by, `Your appeal ${appealId} was approved; ${outcome}.`),
            this.platformTimeoutMs,
          );
        } catch (err) {
          appeal.notification_error = errorMessage(err);
          this.logger.warn(`could not notify ${appeal.submitted_by} of approved appeal`, { appeal_id: appealId, error: appeal.notification_error });
        }
        this.journal("appeal.approved", key, {
          appeal_id: appealId,
          reviewer,
          entry_lifted: lifted !== null,
          ...(appeal.notification_error !== undefined ? { notification_error: appeal.notification_error } : {}),
        });
      }

      this.appealStore.set(appeal);
      await this.save();
      if (entry) await this.emit({ type: appeal.status === "approved" ? "approved" : "denied", appeal: { ...appeal }, entry, actor: reviewer });
      return { ...appeal };
    });
  }

  get(appealId: string): Appeal | undefined {
    const appeal = this.appealStore.get(appealId);
    return appeal ? { ...appeal } : undefined;
  }

  /** Most recent first. */
  list(filter: AppealFilter = {}): Appeal[] {
    return this.appealStore
      .getAll()
      .filter((a) =>
        (filter.status === undefined || a.status === filter.status) &&
        (filter.submitter === undefined || a.submitted_by === filter.submitter) &&
        (filter.entryId === undefined || a.blacklist_entry_id === filter.entryId),
      )
      .sort((a, b) => b.submitted_at.localeCompare(a.submitted_at))
      .map((a) => ({ ...a }));
  }

  /** Appeals of any status the submitter filed inside the trailing window. */
  recentAppeals(submitter: string): number {
    const now = this.clock.now();
    return this.appealStore
      .getAll()
      .filter((a) => a.submitted_by === submitter && now - Date.parse(a.submitted_at) < this.windowMs).length;
  }

  private reject(key: string, entryId: string, submitter: string, error: ConflictError): ConflictError {
    this.journal("appeal.rejected", key, { entry_id: entryId, submitted_by: submitter, code: error.code, error: error.message });
    return error;
  }

  private async emit(event: AppealEvent): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(event);
      } catch (err) {
        this.logger.error(`appeal listener failed on ${event.type}`, { appeal_id: event.appeal.id, error: errorMessage(err) });
      }
    }
  }

  private async save(): Promise<void> {
    try {
      await this.appealStore.save();
    } catch (err) {
      this.logger.error("failed to persist appeals", { error: errorMessage(err) });
      this.journal("store.save_failed", "appeals", { error: errorMessage(err) });
    }
  }

  private journal(type: JournalEventType, subject: string, payload: Record<string, unknown>): void {
    this.audit?.record("blacklist", subject, type, payload);
  }

  private now(): string {
    return new Date(this.clock.now()).toISOString();
  }
}
