import type { AuditStore } from "@wardline/journal";
import type {
  Clock,
  JournalEventType,
  Logger,
  OverflowPolicy,
  Severity,
  Signal,
  SignalDraft,
  SignalHandler,
  SignalType,
} from "@wardline/schemas";
import {
  ConflictError,
  OverflowError,
  assertValidSignal,
  createSignal,
  deepFreeze,
  errorMessage,
  silentLogger,
  subjectKey,
  systemClock,
} from "@wardline/schemas";
import { Inbox } from "./inbox.js";
import type { InboxStats } from "./inbox.js";

export interface SignalBusOptions {
  /** Per-subscriber inbox size. Default: 1000 */
  inboxCapacity?: number;
  /** Default: "block" */
  overflowPolicy?: OverflowPolicy;
  /** Signals repeating a payload.dedup_key inside this window are suppressed. 0 disables. Default: 300000 */
  dedupWindowMs?: number;
  /** Published signals kept for recent(). Default: 10000 */
  historySize?: number;
  clock?: Clock;
  logger?: Logger;
  audit?: AuditStore;
}

export interface SubscribeOptions {
  name?: string;
  capacity?: number;
  policy?: OverflowPolicy;
}

export interface PublishReceipt {
  signal_id: string;
  delivered_to: number;
  suppressed: boolean;
}

export type OverflowListener = (error: OverflowError, dropped: Signal) => void;

export interface SignalBusStats {
  published: number;
  by_type: Partial<Record<SignalType, number>>;
  by_severity: Partial<Record<Severity, number>>;
  delivered: number;
  failed: number;
  overflow: number;
  suppressed: number;
  closed: boolean;
  subscribers: InboxStats[];
}

/**
 * In-process publish/subscribe bus. Every subscriber owns a bounded
 * inbox drained on its own async path, so a slow or failing handler
 * never holds up the publisher or the other subscribers.
 */
export class SignalBus {
  private inboxes = new Set<Inbox>();
  private overflowListeners: OverflowListener[] = [];
  private dedupSeen = new Map<string, number>();
  private history: Signal[] = [];
  private capacity: number;
  private policy: OverflowPolicy;
  private dedupWindowMs: number;
  private historySize: number;
  private clock: Clock;
  private logger: Logger;
  private audit: AuditStore | undefined;
  private closed = false;
  private subscriberSeq = 0;
  private published = 0;
  private byType: Partial<Record<SignalType, number>> = {};
  private bySeverity: Partial<Record<Severity, number>> = {};
  private overflowCount = 0;
  private suppressedCount = 0;
  private retired = { delivered: 0, failed: 0 };

  constructor(options: SignalBusOptions = {}) {
    this.capacity = options.inboxCapacity ?? 1000;
    this.policy = options.overflowPolicy ?? "block";
    this.dedupWindowMs = options.dedupWindowMs ?? 300_000;
    this.historySize = options.historySize ?? 10_000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.audit = options.audit;
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new RangeError(`inboxCapacity must be a positive integer, got ${this.capacity}`);
    }
  }

  subscribe(type: SignalType | "*", handler: SignalHandler, options?: SubscribeOptions): () => void {
    const capacity = options?.capacity ?? this.capacity;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${capacity}`);
    }
    const inbox = new Inbox({
      name: options?.name ?? `subscriber-${++this.subscriberSeq}`,
      type,
      handler,
      capacity,
      policy: options?.policy ?? this.policy,
      onFailure: (box, signal, error) => this.handleFailure(box, signal, error),
      logger: this.logger,
    });
    this.inboxes.add(inbox);
    this.logger.debug(`subscribed ${inbox.name} to ${type}`);
    return () => {
      // Already queued signals are still delivered
      if (this.inboxes.delete(inbox)) {
        const stats = inbox.stats();
        void inbox.idle().then(() => {
          const final = inbox.stats();
          this.retired.delivered += final.delivered;
          this.retired.failed += final.failed;
        });
        this.logger.debug(`unsubscribed ${inbox.name}`, { depth: stats.depth });
      }
    };
  }

  /**
   * Validates the signal and fans it out. Malformed signals and a closed
   * bus throw synchronously; the returned promise settles once every
   * target inbox has admitted the signal.
   */
  publish(signal: Signal): Promise<PublishReceipt> {
    if (this.closed) {
      throw new ConflictError("Signal bus is closed", "CONFLICT", { signal_id: signal.id });
    }
    assertValidSignal(signal);
    const frozen = Object.isFrozen(signal) ? signal : deepFreeze(structuredClone(signal));

    if (this.isDuplicate(frozen)) {
      this.suppressedCount++;
      this.logger.debug(`suppressed duplicate ${frozen.type}`, { signal_id: frozen.id });
      return Promise.resolve({ signal_id: frozen.id, delivered_to: 0, suppressed: true });
    }

    this.record(frozen);

    const admissions: Promise<void>[] = [];
    let targets = 0;
    for (const inbox of this.inboxes) {
      if (inbox.type !== "*" && inbox.type !== frozen.type) continue;
      targets++;
      const { dropped, admitted } = inbox.offer(frozen);
      if (dropped) this.handleOverflow(inbox, dropped);
      admissions.push(admitted);
    }

    return Promise.all(admissions).then(() => ({ signal_id: frozen.id, delivered_to: targets, suppressed: false }));
  }

  /** Stamps a draft into a signal and publishes it. */
  publishDraft(draft: SignalDraft, source?: string): Promise<PublishReceipt> {
    return this.publish(createSignal(draft, { clock: this.clock, source }));
  }

  onOverflow(listener: OverflowListener): () => void {
    this.overflowListeners.push(listener);
    return () => {
      this.overflowListeners = this.overflowListeners.filter((l) => l !== listener);
    };
  }

  /** Resolves once every inbox is empty and idle and audit writes have landed. */
  async drain(): Promise<void> {
    do {
      await Promise.all([...this.inboxes].map((inbox) => inbox.idle()));
      await this.audit?.flush();
    } while ([...this.inboxes].some((inbox) => !inbox.isIdle()));
  }

  /**
   * Stops accepting signals and discards whatever is still queued.
   * Resolves with the number of signals that were never delivered.
   */
  async close(): Promise<number> {
    if (this.closed) return 0;
    this.closed = true;
    let undelivered = 0;
    for (const inbox of this.inboxes) {
      undelivered += inbox.stop();
    }
    await Promise.all([...this.inboxes].map((inbox) => inbox.idle()));
    if (undelivered > 0) {
      this.logger.warn(`bus closed with ${undelivered} undelivered signal(s)`);
    }
    this.journal("bus", "bus.closed", { undelivered, subscribers: this.inboxes.size });
    await this.audit?.flush();
    return undelivered;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Most recent first. */
  recent(type?: SignalType, limit = 50): Signal[] {
    const out: Signal[] = [];
    for (let i = this.history.length - 1; i >= 0 && out.length < limit; i--) {
      const signal = this.history[i];
      if (signal && (type === undefined || signal.type === type)) out.push(signal);
    }
    return out;
  }

  stats(): SignalBusStats {
    const subscribers = [...this.inboxes].map((inbox) => inbox.stats());
    return {
      published: this.published,
      by_type: { ...this.byType },
      by_severity: { ...this.bySeverity },
      delivered: this.retired.delivered + subscribers.reduce((n, s) => n + s.delivered, 0),
      failed: this.retired.failed + subscribers.reduce((n, s) => n + s.failed, 0),
      overflow: this.overflowCount,
      suppressed: this.suppressedCount,
      closed: this.closed,
      subscribers,
    };
  }

  private isDuplicate(signal: Signal): boolean {
    const key = signal.payload["dedup_key"];
    if (this.dedupWindowMs <= 0 || typeof key !== "string") return false;
    const now = this.clock.now();
    for (const [k, seenAt] of this.dedupSeen) {
      if (now - seenAt >= this.dedupWindowMs) this.dedupSeen.delete(k);
    }
    const scoped = `${signal.type}|${key}`;
    if (this.dedupSeen.has(scoped)) return true;
    this.dedupSeen.set(scoped, now);
    return false;
  }

  private record(signal: Signal): void {
    this.published++;
    this.byType[signal.type] = (this.byType[signal.type] ?? 0) + 1;
    this.bySeverity[signal.severity] = (this.bySeverity[signal.severity] ?? 0) + 1;
    this.history.push(signal);
    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }
  }

  private handleOverflow(inbox: Inbox, dropped: Signal): void {
    this.overflowCount++;
    const error = new OverflowError(inbox.name, dropped.id, inbox.capacity);
    this.logger.warn(error.message);
    for (const listener of this.overflowListeners) {
      try {
        listener(error, dropped);
      } catch (err) {
        this.logger.warn("overflow listener threw", { error: errorMessage(err) });
      }
    }
    this.journal(subjectKey(dropped.subject), "bus.signal_dropped", {
      subscriber: inbox.name,
      signal_id: dropped.id,
      signal_type: dropped.type,
      capacity: inbox.capacity,
    });
  }

  private handleFailure(inbox: Inbox, signal: Signal, error: unknown): void {
    const message = errorMessage(error);
    this.logger.error(`subscriber ${inbox.name} failed on ${signal.type}`, { signal_id: signal.id, error: message });
    this.journal(subjectKey(signal.subject), "bus.subscriber_failed", {
      subscriber: inbox.name,
      signal_id: signal.id,
      signal_type: signal.type,
      error: message,
    });
  }

  private journal(subject: string, type: JournalEventType, payload: Record<string, unknown>): void {
    this.audit?.record("bus", subject, type, payload);
  }
}
