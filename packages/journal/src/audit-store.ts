import { join } from "node:path";
import type { Clock, JournalEvent, JournalEventType, JournalStream, Logger } from "@wardline/schemas";
import { JOURNAL_STREAMS, silentLogger, systemClock } from "@wardline/schemas";
import { Journal } from "./journal.js";
import type { IntegrityReport, JournalListener } from "./journal.js";

export interface AuditStoreOptions {
  fsync?: boolean;
  lock?: boolean;
  redact?: boolean;
  recovery?: "truncate" | "strict";
  clock?: Clock;
  logger?: Logger;
}

/**
 * The audit trail: one hash-chained journal per stream under a common
 * directory. Each responder appends to its own stream, so appends from
 * different responders never queue behind each other.
 */
export class AuditStore {
  private journals: Map<JournalStream, Journal>;
  private pending = new Set<Promise<unknown>>();

  constructor(dir: string, options: AuditStoreOptions = {}) {
    const logger = options.logger ?? silentLogger;
    this.journals = new Map<JournalStream, Journal>(
      JOURNAL_STREAMS.map((stream): [JournalStream, Journal] => [
        stream,
        new Journal(join(dir, `${stream}.jsonl`), {
          stream,
          fsync: options.fsync,
          lock: options.lock,
          redact: options.redact,
          recovery: options.recovery,
          clock: options.clock ?? systemClock,
          logger,
        }),
      ]),
    );
  }

  async init(): Promise<void> {
    for (const journal of this.journals.values()) {
      await journal.init();
    }
  }

  journal(stream: JournalStream): Journal {
    const journal = this.journals.get(stream);
    if (!journal) throw new Error(`Unknown journal stream: ${stream}`);
    return journal;
  }

  emit(stream: JournalStream, subject: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent> {
    return this.journal(stream).emit(subject, type, payload);
  }

  tryEmit(stream: JournalStream, subject: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent | null> {
    return this.journal(stream).tryEmit(subject, type, payload);
  }

  /**
   * Fire-and-forget append for callers on a synchronous path. Failures
   * are logged by tryEmit; flush() waits for everything recorded so far.
   */
  record(stream: JournalStream, subject: string, type: JournalEventType, payload: Record<string, unknown>): void {
    const write = this.tryEmit(stream, subject, type, payload);
    this.pending.add(write);
    void write.finally(() => this.pending.delete(write));
  }

  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /** Subscribes to appends on every stream. */
  on(listener: JournalListener): () => void {
    const offs = [...this.journals.values()].map((j) => j.on(listener));
    return () => {
      for (const off of offs) off();
    };
  }

  /** Everything recorded about one subject, across streams, oldest first. */
  readSubject(subject: string): JournalEvent[] {
    const events = [...this.journals.values()].flatMap((j) => j.readSubject(subject));
    return events.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  }

  readStream(stream: JournalStream, options?: { limit?: number }): Promise<JournalEvent[]> {
    return this.journal(stream).readAll(options);
  }

  async verify(): Promise<Array<IntegrityReport & { stream: JournalStream }>> {
    return Promise.all(
      [...this.journals].map(async ([stream, journal]) => ({ stream, ...(await journal.verifyIntegrity()) })),
    );
  }

  async checkHealth(): Promise<{ writable: boolean }> {
    const results = await Promise.all([...this.journals.values()].map((j) => j.checkHealth()));
    return { writable: results.every((r) => r.writable) };
  }

  async close(): Promise<void> {
    await this.flush();
    for (const journal of this.journals.values()) {
      await journal.close();
    }
  }
}
