import { v4 as uuid } from "uuid";
import type { AuditStore, EvidenceStore } from "@wardline/journal";
import type { SignalBus } from "@wardline/signal-bus";
import type { KeyValueStore } from "@wardline/store";
import type {
  Clock,
  EvidenceSnapshot,
  JournalEventType,
  Logger,
  PlatformClient,
  QuarantineEntry,
  QuarantineReason,
  QuarantineState,
  Signal,
  Subject,
} from "@wardline/schemas";
import {
  ConflictError,
  KeyedMutex,
  NotFoundError,
  PlatformActionError,
  QUARANTINE_REASONS,
  ValidationError,
  callPlatform,
  errorMessage,
  parseSubject,
  silentLogger,
  subjectKey,
  systemClock,
} from "@wardline/schemas";

export interface QuarantineMachineConfig {
  platform: PlatformClient;
  store: KeyValueStore<QuarantineEntry>;
  evidence: EvidenceStore;
  /** When set, THREAT_DETECTED and ESCALATION_REQUIRED signals trigger quarantine. */
  bus?: SignalBus;
  audit?: AuditStore;
  clock?: Clock;
  logger?: Logger;
  /** Default: 0.85 */
  autoQuarantineThreshold?: number;
  isolationRoleId?: string;
  isolationChannelId?: string;
  /** Per platform call deadline; 0 disables. Default: 10000 */
  platformTimeoutMs?: number;
}

export interface QuarantineRequest {
  subject: Subject;
  reason: QuarantineReason;
  confidence: number;
  evidence: Record<string, unknown>;
  actor: string;
  threatType?: string;
  /** The signal that triggered the request; null for manual commands. */
  signalId?: string | null;
}

export interface QuarantineOutcome {
  entry: QuarantineEntry;
  /** False when the subject was already isolated. */
  created: boolean;
  /** Null when the triggering signal was already on record. */
  snapshot: EvidenceSnapshot | null;
  failures: PlatformActionError[];
}

export interface QuarantineStats {
  total: number;
  active: number;
  quarantined: number;
  under_review: number;
  released: number;
  platform_failures: number;
  by_reason: Partial<Record<QuarantineReason, number>>;
}

type Attempt<T> = { ok: true; value: T } | { ok: false };

function isLive(entry: QuarantineEntry): boolean {
  return entry.state === "QUARANTINED" || entry.state === "UNDER_REVIEW";
}

function isQuarantineReason(value: string): value is QuarantineReason {
  return (QUARANTINE_REASONS as readonly string[]).includes(value);
}

function copyEntry(entry: QuarantineEntry): QuarantineEntry {
  return structuredClone(entry);
}

/**
 * Isolate, preserve, review, release. One live entry per subject;
 * transitions for a subject run one at a time. Platform steps are
 * best-effort: a failed step is recorded on the entry and the
 * transition still completes.
 */
export class QuarantineMachine {
  private platform: PlatformClient;
  private store: KeyValueStore<QuarantineEntry>;
  private evidenceStore: EvidenceStore;
  private bus: SignalBus | undefined;
  private audit: AuditStore | undefined;
  private clock: Clock;
  private logger: Logger;
  private threshold: number;
  private isolationRoleId: string | undefined;
  private isolationChannelId: string | undefined;
  private platformTimeoutMs: number;
  private mutex = new KeyedMutex();
  /** subject key → entry_id of the live entry */
  private live = new Map<string, string>();
  private unsubscribers: Array<() => void> = [];

  constructor(config: QuarantineMachineConfig) {
    this.platform = config.platform;
    this.store = config.store;
    this.evidenceStore = config.evidence;
    this.bus = config.bus;
    this.audit = config.audit;
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? silentLogger;
    this.threshold = config.autoQuarantineThreshold ?? 0.85;
    this.isolationRoleId = config.isolationRoleId;
    this.isolationChannelId = config.isolationChannelId;
    this.platformTimeoutMs = config.platformTimeoutMs ?? 10_000;
  }

  async start(): Promise<void> {
    await this.store.load();
    this.live.clear();
    const entries = this.store.getAll().sort((a, b) => a.quarantined_at.localeCompare(b.quarantined_at));
    for (const entry of entries) {
      if (isLive(entry)) this.live.set(subjectKey(entry.subject), entry.entry_id);
    }
    if (this.bus && this.unsubscribers.length === 0) {
      this.unsubscribers.push(
        this.bus.subscribe("THREAT_DETECTED", async (signal) => { await this.onSignal(signal); }, { name: "quarantine-threats" }),
        this.bus.subscribe("ESCALATION_REQUIRED", async (signal) => { await this.onSignal(signal); }, { name: "quarantine-escalations" }),
      );
    }
    this.logger.info("quarantine machine started", { entries: entries.length, live: this.live.size });
  }

  stop(): void {
    for (const off of this.unsubscribers) off();
    this.unsubscribers = [];
  }

  /**
   * NONE → QUARANTINED, or evidence appended to the live entry. Manual
   * commands and signal triggers both come through here.
   */
  async quarantine(request: QuarantineRequest): Promise<QuarantineOutcome> {
    const subject = parseSubject(request.subject);
    if (!isQuarantineReason(request.reason)) {
      throw new ValidationError(`Unknown quarantine reason: "${String(request.reason)}"`);
    }
    if (!Number.isFinite(request.confidence) || request.confidence < 0 || request.confidence > 1) {
      throw new ValidationError(`confidence must be within [0, 1], got ${request.confidence}`);
    }
    if (request.actor.trim().length === 0) {
      throw new ValidationError("actor is required");
    }
    return this.mutex.runExclusive(subjectKey(subject), () => this.enter({ ...request, subject }));
  }

  /** QUARANTINED → UNDER_REVIEW. No platform change. */
  requestReview(subject: Subject, requester: string, reason?: string): Promise<QuarantineEntry> {
    return this.mutex.runExclusive(subjectKey(subject), async () => {
      const entry = this.requireLive(subject);
      if (entry.state === "UNDER_REVIEW") {
        throw new ConflictError(`${subjectKey(subject)} is already under review`, "INVALID_TRANSITION", { state: entry.state });
      }
      this.markUnderReview(entry, requester, reason);
      await this.commit(entry);
      return copyEntry(entry);
    });
  }

  /**
   * UNDER_REVIEW → RELEASED. A subject still QUARANTINED is put under
   * review on the reviewer's behalf first.
   */
  release(subject: Subject, reviewer: string, note?: string): Promise<QuarantineOutcome> {
    return this.mutex.runExclusive(subjectKey(subject), async () => {
      const entry = this.requireLive(subject);
      if (entry.state === "QUARANTINED") this.markUnderReview(entry, reviewer, note);

      const failures: PlatformActionError[] = [];
      const reason = `Quarantine released by ${reviewer}`;
      const { kind, value } = entry.subject;
      let rolesRestored: boolean | undefined;

      if (kind === "user") {
        const roleId = this.isolationRoleId;
        if (roleId) {
          await this.attempt(entry, failures, "remove_isolation_role", () => this.platform.removeRole(value, roleId, reason));
        }
        const priorRoles = entry.prior_roles;
        if (priorRoles === undefined) {
          rolesRestored = false;
          this.logger.warn(`prior roles unknown for ${subjectKey(entry.subject)}; none restored`, { entry_id: entry.entry_id });
        } else if (priorRoles.length === 0) {
          rolesRestored = true;
        } else {
          const restored = await this.attempt(entry, failures, "restore_roles", () => this.platform.restoreRoles(value, priorRoles, reason));
          rolesRestored = restored.ok;
        }
        await this.attempt(entry, failures, "notify_subject", () =>
          this.platform.sendDirectMessage(value, "Your quarantine has been lifted."),
        );
      } else if (kind === "channel") {
        await this.attempt(entry, failures, "unlock_channel", () => this.platform.unlockChannel(value, reason));
      }

      const snapshot = await this.evidenceStore.createSnapshot({
        subject: entry.subject,
        originating_signal_id: null,
        payload: {
          closing: true,
          reviewer,
          ...(note !== undefined ? { note } : {}),
          ...(rolesRestored !== undefined ? { roles_restored: rolesRestored } : {}),
        },
        actor: reviewer,
        action: "released",
      });

      entry.evidence_refs.push(snapshot.id);
      entry.state = "RELEASED";
      entry.reviewed_by = reviewer;
      entry.released_at = this.now();
      if (note !== undefined) entry.review_note = note;
      if (rolesRestored !== undefined) entry.roles_restored = rolesRestored;
      this.live.delete(subjectKey(entry.subject));

      this.journal("quarantine.released", entry, {
        reviewer,
        roles_restored: rolesRestored ?? null,
        ...(rolesRestored === false && entry.prior_roles === undefined ? { gap: "prior roles unknown" } : {}),
        failures: failures.map((f) => f.message),
      });
      await this.commit(entry);
      return { entry: copyEntry(entry), created: false, snapshot, failures };
    });
  }

  /** UNDER_REVIEW → QUARANTINED. The review is recorded as denied. */
  maintain(subject: Subject, reviewer: string, note?: string): Promise<QuarantineEntry> {
    return this.mutex.runExclusive(subjectKey(subject), async () => {
      const entry = this.requireLive(subject);
      if (entry.state !== "UNDER_REVIEW") {
        throw new ConflictError(`${subjectKey(subject)} is not under review`, "INVALID_TRANSITION", { state: entry.state });
      }
      entry.state = "QUARANTINED";
      entry.reviewed_by = reviewer;
      if (note !== undefined) entry.review_note = note;
      delete entry.review_request;
      this.journal("quarantine.maintained", entry, { reviewer, denied: true, ...(note !== undefined ? { note } : {}) });
      await this.commit(entry);
      return copyEntry(entry);
    });
  }

  status(subject: Subject): QuarantineState {
    return this.liveEntry(subject)?.state ?? "NONE";
  }

  /** The live entry, if any. */
  current(subject: Subject): QuarantineEntry | undefined {
    const entry = this.liveEntry(subject);
    return entry ? copyEntry(entry) : undefined;
  }

  /** Every snapshot collected about the subject, oldest first. */
  evidence(subject: Subject): EvidenceSnapshot[] {
    return this.evidenceStore.forSubject(subject);
  }

  /** Every entry for the subject, closed ones included, oldest first. */
  history(subject: Subject): QuarantineEntry[] {
    const key = subjectKey(subject);
    return this.store
      .getAll()
      .filter((e) => subjectKey(e.subject) === key)
      .sort((a, b) => a.quarantined_at.localeCompare(b.quarantined_at))
      .map(copyEntry);
  }

  active(): QuarantineEntry[] {
    return [...this.live.values()]
      .flatMap((id) => {
        const entry = this.store.get(id);
        return entry ? [copyEntry(entry)] : [];
      })
      .sort((a, b) => a.quarantined_at.localeCompare(b.quarantined_at));
  }

  stats(): QuarantineStats {
    const stats: QuarantineStats = {
      total: 0,
      active: this.live.size,
      quarantined: 0,
      under_review: 0,
      released: 0,
      platform_failures: 0,
      by_reason: {},
    };
    for (const entry of this.store.getAll()) {
      stats.total++;
      if (entry.state === "QUARANTINED") stats.quarantined++;
      else if (entry.state === "UNDER_REVIEW") stats.under_review++;
      else if (entry.state === "RELEASED") stats.released++;
      stats.platform_failures += entry.platform_failures.length;
      stats.by_reason[entry.reason] = (stats.by_reason[entry.reason] ?? 0) + 1;
    }
    return stats;
  }

  private async onSignal(signal: Signal): Promise<void> {
    if (signal.confidence < this.threshold) return;
    const threatType = typeof signal.payload["threat_type"] === "string" ? signal.payload["threat_type"] : undefined;
    // An escalation is evidence of the threat it was raised for
    const origin =
      signal.type === "ESCALATION_REQUIRED" && typeof signal.payload["origin_signal_id"] === "string"
        ? signal.payload["origin_signal_id"]
        : signal.id;

    const outcome = await this.quarantine({
      subject: { kind: signal.subject.kind, value: signal.subject.value },
      reason: threatType !== undefined && isQuarantineReason(threatType) ? threatType : "manual",
      confidence: signal.confidence,
      evidence: {
        signal: {
          id: signal.id,
          type: signal.type,
          source: signal.source,
          severity: signal.severity,
          payload: signal.payload,
          created_at: signal.created_at,
          ...(signal.correlation_id !== undefined ? { correlation_id: signal.correlation_id } : {}),
        },
      },
      actor: signal.source,
      threatType,
      signalId: origin,
    });
    if (outcome.failures.length > 0) {
      this.logger.warn(`quarantine of ${subjectKey(signal.subject)} completed with ${outcome.failures.length} failed step(s)`);
    }
  }

  private async enter(request: QuarantineRequest): Promise<QuarantineOutcome> {
    const signalId = request.signalId ?? null;
    const existing = this.liveEntry(request.subject);

    if (existing) {
      if (signalId !== null && this.hasEvidenceFrom(existing, signalId)) {
        return { entry: copyEntry(existing), created: false, snapshot: null, failures: [] };
      }
      const snapshot = await this.evidenceStore.createSnapshot({
        subject: existing.subject,
        originating_signal_id: signalId,
        payload: request.evidence,
        actor: request.actor,
        action: "appended",
      });
      existing.evidence_refs.push(snapshot.id);
      this.journal("quarantine.evidence_added", existing, { snapshot_id: snapshot.id, signal_id: signalId, actor: request.actor });
      await this.commit(existing);
      return { entry: copyEntry(existing), created: false, snapshot, failures: [] };
    }

    const snapshot = await this.evidenceStore.createSnapshot({
      subject: request.subject,
      originating_signal_id: signalId,
      payload: request.evidence,
      actor: request.actor,
    });
    const entry: QuarantineEntry = {
      entry_id: uuid(),
      subject: { kind: request.subject.kind, value: request.subject.value },
      state: "QUARANTINED",
      reason: request.reason,
      ...(request.threatType !== undefined ? { threat_type: request.threatType } : {}),
      confidence: request.confidence,
      evidence_refs: [snapshot.id],
      quarantined_at: this.now(),
      quarantined_by: request.actor,
      platform_failures: [],
      review_count: 0,
    };
    this.store.set(entry);
    this.live.set(subjectKey(entry.subject), entry.entry_id);

    const failures = await this.isolate(entry);
    this.journal("quarantine.entered", entry, {
      reason: entry.reason,
      confidence: entry.confidence,
      actor: request.actor,
      snapshot_id: snapshot.id,
      failures: failures.map((f) => f.message),
    });
    await this.commit(entry);
    this.logger.info(`quarantined ${subjectKey(entry.subject)} (${entry.reason})`, { entry_id: entry.entry_id });
    return { entry: copyEntry(entry), created: true, snapshot, failures };
  }

  private async isolate(entry: QuarantineEntry): Promise<PlatformActionError[]> {
    const failures: PlatformActionError[] = [];
    const { kind, value } = entry.subject;
    const reason = `Quarantine: ${entry.reason}`;

    if (kind === "user") {
      const stripped = await this.attempt(entry, failures, "strip_roles", () => this.platform.stripRoles(value, reason));
      if (stripped.ok) entry.prior_roles = [...stripped.value];

      const roleId = this.isolationRoleId;
      if (roleId) {
        await this.attempt(entry, failures, "assign_isolation_role", () => this.platform.assignRole(value, roleId, reason));
      } else {
        this.recordFailure(entry, failures, new PlatformActionError("assign_isolation_role", "no isolation role configured"));
      }

      const channelId = this.isolationChannelId;
      if (channelId) {
        await this.attempt(entry, failures, "restrict_to_channel", () => this.platform.restrictToChannel(value, channelId, reason));
      } else {
        this.recordFailure(entry, failures, new PlatformActionError("restrict_to_channel", "no isolation channel configured"));
      }

      await this.attempt(entry, failures, "notify_subject", () =>
        this.platform.sendDirectMessage(value, `You have been quarantined pending review (${entry.reason}).`),
      );
    } else if (kind === "channel") {
      await this.attempt(entry, failures, "lock_channel", () => this.platform.lockChannel(value, reason));
    }
    return failures;
  }

  private async attempt<T>(
    entry: QuarantineEntry,
    failures: PlatformActionError[],
    step: string,
    action: () => Promise<T>,
  ): Promise<Attempt<T>> {
    try {
      return { ok: true, value: await callPlatform(step, action, this.platformTimeoutMs) };
    } catch (err) {
      this.recordFailure(entry, failures, err instanceof PlatformActionError ? err : new PlatformActionError(step, err));
      return { ok: false };
    }
  }

  private recordFailure(entry: QuarantineEntry, failures: PlatformActionError[], failure: PlatformActionError): void {
    failures.push(failure);
    entry.platform_failures.push({ step: failure.step, message: failure.message, at: this.now() });
    this.logger.warn(`quarantine step failed for ${subjectKey(entry.subject)}: ${failure.message}`);
    this.journal("quarantine.action_failed", entry, { step: failure.step, error: failure.message });
  }

  private markUnderReview(entry: QuarantineEntry, requester: string, reason?: string): void {
    entry.state = "UNDER_REVIEW";
    entry.review_request = {
      requested_by: requester,
      ...(reason !== undefined ? { reason } : {}),
      requested_at: this.now(),
    };
    entry.review_count++;
    this.journal("quarantine.review_requested", entry, { requested_by: requester, ...(reason !== undefined ? { reason } : {}) });
  }

  private hasEvidenceFrom(entry: QuarantineEntry, signalId: string): boolean {
    return entry.evidence_refs.some((ref) => this.evidenceStore.get(ref)?.originating_signal_id === signalId);
  }

  private requireLive(subject: Subject): QuarantineEntry {
    const entry = this.liveEntry(subject);
    if (!entry) throw new NotFoundError(`No live quarantine for ${subjectKey(subject)}`);
    return entry;
  }

  private liveEntry(subject: Subject): QuarantineEntry | undefined {
    const id = this.live.get(subjectKey(subject));
    return id === undefined ? undefined : this.store.get(id);
  }

  /** Stores the entry and persists the table; a failed save is journalled, not thrown. */
  private async commit(entry: QuarantineEntry): Promise<void> {
    this.store.set(entry);
    try {
      await this.store.save();
    } catch (err) {
      this.logger.error("failed to persist quarantine entries", { error: errorMessage(err) });
      this.audit?.record("quarantine", subjectKey(entry.subject), "store.save_failed", {
        entry_id: entry.entry_id,
        error: errorMessage(err),
      });
    }
  }

  private journal(type: JournalEventType, entry: QuarantineEntry, payload: Record<string, unknown>): void {
    this.audit?.record("quarantine", subjectKey(entry.subject), type, { entry_id: entry.entry_id, state: entry.state, ...payload });
  }

  private now(): string {
    return new Date(this.clock.now()).toISOString();
  }
}
