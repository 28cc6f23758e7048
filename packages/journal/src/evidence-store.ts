import { v4 as uuid } from "uuid";
import type { Clock, CustodyEvent, EvidenceSnapshot, JournalEvent, Subject } from "@wardline/schemas";
import { NotFoundError, deepFreeze, isEvidenceSnapshot, subjectKey, systemClock } from "@wardline/schemas";
import type { AuditStore } from "./audit-store.js";

export interface SnapshotInput {
  subject: Subject;
  originating_signal_id: string | null;
  payload: Record<string, unknown>;
  actor: string;
  /** First custody action. Default: "captured" */
  action?: string;
}

function isCustodyEvent(value: unknown): value is CustodyEvent {
  if (typeof value !== "object" || value === null) return false;
  return (
    "actor" in value && typeof value.actor === "string" &&
    "action" in value && typeof value.action === "string" &&
    "timestamp" in value && typeof value.timestamp === "string"
  );
}

/**
 * Immutable evidence snapshots kept on the "evidence" journal stream.
 * Snapshots are never edited; custody events are appended as their own
 * journal entries and folded into the snapshot when it is read.
 */
export class EvidenceStore {
  private snapshots = new Map<string, EvidenceSnapshot>();
  private bySubject = new Map<string, string[]>();
  private audit: AuditStore;
  private clock: Clock;

  constructor(audit: AuditStore, options?: { clock?: Clock }) {
    this.audit = audit;
    this.clock = options?.clock ?? systemClock;
  }

  /** Rebuilds the in-memory index from the evidence stream. */
  async init(): Promise<void> {
    this.snapshots.clear();
    this.bySubject.clear();
    for (const event of await this.audit.readStream("evidence")) {
      this.apply(event);
    }
  }

  async createSnapshot(input: SnapshotInput): Promise<EvidenceSnapshot> {
    const now = new Date(this.clock.now()).toISOString();
    const snapshot: EvidenceSnapshot = {
      id: uuid(),
      subject: { kind: input.subject.kind, value: input.subject.value },
      originating_signal_id: input.originating_signal_id,
      payload: structuredClone(input.payload),
      chain_of_custody: [{ actor: input.actor, action: input.action ?? "captured", timestamp: now }],
      created_at: now,
    };
    const event = await this.audit.emit("evidence", subjectKey(input.subject), "evidence.snapshot_created", {
      snapshot,
    });
    this.apply(event);
    return this.get(snapshot.id) ?? deepFreeze(snapshot);
  }

  async recordCustody(snapshotId: string, actor: string, action: string): Promise<EvidenceSnapshot> {
    const snapshot = this.snapshots.get(snapshotId);
    if (!snapshot) throw new NotFoundError(`Evidence snapshot not found: ${snapshotId}`);
    const custody: CustodyEvent = { actor, action, timestamp: new Date(this.clock.now()).toISOString() };
    const event = await this.audit.emit("evidence", subjectKey(snapshot.subject), "evidence.custody_recorded", {
      snapshot_id: snapshotId,
      custody,
    });
    this.apply(event);
    return this.snapshots.get(snapshotId) ?? snapshot;
  }

  get(id: string): EvidenceSnapshot | undefined {
    return this.snapshots.get(id);
  }

  /** Snapshots for a subject, oldest first. */
  forSubject(subject: Subject): EvidenceSnapshot[] {
    const ids = this.bySubject.get(subjectKey(subject)) ?? [];
    return ids.flatMap((id) => {
      const snapshot = this.snapshots.get(id);
      return snapshot ? [snapshot] : [];
    });
  }

  get size(): number {
    return this.snapshots.size;
  }

  private apply(event: JournalEvent): void {
    if (event.type === "evidence.snapshot_created") {
      const snapshot = event.payload["snapshot"];
      if (!isEvidenceSnapshot(snapshot)) return;
      this.snapshots.set(snapshot.id, deepFreeze(snapshot));
      const key = subjectKey(snapshot.subject);
      const ids = this.bySubject.get(key);
      if (ids) ids.push(snapshot.id);
      else this.bySubject.set(key, [snapshot.id]);
    } else if (event.type === "evidence.custody_recorded") {
      const id = event.payload["snapshot_id"];
      const custody = event.payload["custody"];
      if (typeof id !== "string" || !isCustodyEvent(custody)) return;
      const current = this.snapshots.get(id);
      if (!current) return;
      this.snapshots.set(id, deepFreeze({ ...current, chain_of_custody: [...current.chain_of_custody, custody] }));
    }
  }
}
