import { createHash } from "node:crypto";
import { appendFile, readFile, mkdir, writeFile, rename, access, constants, open, unlink } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname } from "node:path";
import { v4 as uuid } from "uuid";
import type { Clock, JournalEvent, JournalEventType, JournalStream, Logger } from "@wardline/schemas";
import { isJournalEvent, silentLogger, systemClock, validateJournalEventData } from "@wardline/schemas";
import { redactPayload } from "./redact.js";

export interface JournalOptions {
  stream: JournalStream;
  fsync?: boolean;
  redact?: boolean;
  /** If true, acquire an advisory lockfile to prevent multi-process corruption. Default: true */
  lock?: boolean;
  /** Maximum number of subjects to keep in the in-memory index (LRU eviction). Default: 10000 */
  maxSubjectsIndexed?: number;
  /** How to handle corruption on init. "truncate" (default) auto-repairs; "strict" throws. */
  recovery?: "truncate" | "strict";
  clock?: Clock;
  logger?: Logger;
}

export type JournalListener = (event: JournalEvent) => void;

export interface IntegrityReport {
  valid: boolean;
  brokenAt?: number;
  events: number;
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function parseLine(line: string): JournalEvent | null {
  try {
    const data: unknown = JSON.parse(line);
    return isJournalEvent(data) ? data : null;
  } catch {
    return null;
  }
}

/**
 * Append-only, hash-chained event log for one stream. Every line carries
 * the SHA-256 of the previous line, so any edit to history is detectable.
 */
export class Journal {
  readonly stream: JournalStream;
  private filePath: string;
  private lastHash: string | undefined;
  private listeners: JournalListener[] = [];
  private writeLock: Promise<void> = Promise.resolve();
  private subjectIndex = new Map<string, JournalEvent[]>();
  private subjectAccessOrder: string[] = [];
  private maxSubjectsIndexed: number;
  private nextSeq = 0;
  private fsync: boolean;
  private redact: boolean;
  private lockEnabled: boolean;
  private lockPath: string;
  private locked = false;
  private recovery: "truncate" | "strict";
  private clock: Clock;
  private logger: Logger;

  constructor(filePath: string, options: JournalOptions) {
    this.filePath = filePath;
    this.stream = options.stream;
    this.fsync = options.fsync ?? true;
    this.redact = options.redact ?? true;
    this.lockEnabled = options.lock ?? true;
    this.lockPath = `${filePath}.lock`;
    this.maxSubjectsIndexed = options.maxSubjectsIndexed ?? 10000;
    this.recovery = options.recovery ?? "truncate";
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  async init(): Promise<void> {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (this.lockEnabled) {
      await this.acquireLock();
    }
    if (!existsSync(this.filePath)) return;

    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);

    // A crash mid-append leaves a partial last line
    const last = lines[lines.length - 1];
    if (last !== undefined && parseLine(last) === null) {
      lines.pop();
      await writeFile(this.filePath, lines.length > 0 ? lines.join("\n") + "\n" : "", "utf-8");
      this.logger.warn(`Journal ${this.stream}: truncated incomplete last line from crash`);
    }

    let maxSeq = -1;
    let prevHash: string | undefined;
    const tempIndex = new Map<string, JournalEvent[]>();
    try {
      for (let i = 0; i < lines.length; i++) {
        const line = lines[i] ?? "";
        const event = parseLine(line);
        if (event === null || (i > 0 && event.hash_prev !== prevHash)) {
          if (this.recovery === "strict") {
            throw new Error(`Journal integrity violation at event ${i} (seq=${event?.seq ?? "?"}): hash chain broken`);
          }
          this.logger.error(`Journal ${this.stream}: recovered from corruption at event ${i}, truncated ${lines.length - i} events`);
          const tmpPath = `${this.filePath}.tmp`;
          const validLines = lines.slice(0, i);
          await writeFile(tmpPath, validLines.length > 0 ? validLines.join("\n") + "\n" : "", "utf-8");
          await rename(tmpPath, this.filePath);
          break;
        }
        prevHash = this.hash(line);
        const bucket = tempIndex.get(event.subject);
        if (bucket) bucket.push(event);
        else tempIndex.set(event.subject, [event]);
        if (event.seq !== undefined && event.seq > maxSeq) maxSeq = event.seq;
      }
    } catch (err) {
      this.subjectIndex.clear();
      this.lastHash = undefined;
      this.nextSeq = 0;
      throw err;
    }
    for (const [subject, events] of tempIndex) {
      this.trackSubjectAccess(subject);
      this.subjectIndex.set(subject, events);
    }
    this.evictSubjectsIfNeeded();
    this.nextSeq = maxSeq + 1;
    this.lastHash = prevHash;
  }

  on(listener: JournalListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  async emit(subject: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent> {
    let releaseLock!: () => void;
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      const redacted = this.redact ? redactPayload(payload) : payload;
      const seq = this.nextSeq; // committed only after the write lands

      const event: JournalEvent = {
        event_id: uuid(),
        timestamp: new Date(this.clock.now()).toISOString(),
        stream: this.stream,
        subject,
        type,
        payload: redacted,
        ...(this.lastHash !== undefined ? { hash_prev: this.lastHash } : {}),
        seq,
      };

      const validation = validateJournalEventData(event);
      if (!validation.valid) {
        throw new Error(`Invalid journal event: ${validation.errors.join(", ")}`);
      }

      const line = JSON.stringify(event);
      const lineHash = this.hash(line);

      if (this.fsync) {
        const fh = await open(this.filePath, "a");
        try {
          await fh.write(line + "\n", undefined, "utf-8");
          await fh.sync();
        } finally {
          await fh.close();
        }
      } else {
        await appendFile(this.filePath, line + "\n", "utf-8");
      }

      this.nextSeq = seq + 1;
      this.lastHash = lineHash;

      const bucket = this.subjectIndex.get(subject);
      if (bucket) bucket.push(event);
      else this.subjectIndex.set(subject, [event]);
      this.trackSubjectAccess(subject);
      this.evictSubjectsIfNeeded();

      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.logger.warn(`Journal ${this.stream}: listener threw`, { error: String(err) });
        }
      }

      return event;
    } finally {
      releaseLock();
    }
  }

  /** Like emit, but logs and returns null instead of throwing. */
  async tryEmit(subject: string, type: JournalEventType, payload: Record<string, unknown>): Promise<JournalEvent | null> {
    try {
      return await this.emit(subject, type, payload);
    } catch (err) {
      this.logger.error(`Journal ${this.stream}: failed to append ${type}`, { subject, error: String(err) });
      return null;
    }
  }

  async readAll(options?: { limit?: number }): Promise<JournalEvent[]> {
    if (!existsSync(this.filePath)) return [];
    const content = await readFile(this.filePath, "utf-8");
    const events: JournalEvent[] = [];
    for (const line of content.trim().split("\n").filter(Boolean)) {
      const event = parseLine(line);
      if (event) events.push(event);
    }
    if (options?.limit !== undefined && options.limit < events.length) {
      return events.slice(events.length - options.limit);
    }
    return events;
  }

  readSubject(subject: string, options?: { offset?: number; limit?: number }): JournalEvent[] {
    const events = this.subjectIndex.get(subject) ?? [];
    if (events.length > 0) {
      this.trackSubjectAccess(subject);
    }
    if (!options) return [...events];
    const start = options.offset ?? 0;
    const end = options.limit !== undefined ? start + options.limit : undefined;
    return events.slice(start, end);
  }

  getSubjectEventCount(subject: string): number {
    return (this.subjectIndex.get(subject) ?? []).length;
  }

  get eventCount(): number {
    return this.nextSeq;
  }

  async verifyIntegrity(): Promise<IntegrityReport> {
    if (!existsSync(this.filePath)) return { valid: true, events: 0 };
    const content = await readFile(this.filePath, "utf-8");
    const lines = content.trim().split("\n").filter(Boolean);
    let prevHash: string | undefined;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? "";
      const event = parseLine(line);
      if (event === null || (i > 0 && event.hash_prev !== prevHash)) {
        return { valid: false, brokenAt: i, events: lines.length };
      }
      prevHash = this.hash(line);
    }
    return { valid: true, events: lines.length };
  }

  async checkHealth(): Promise<{ writable: boolean }> {
    try {
      await access(existsSync(this.filePath) ? this.filePath : dirname(this.filePath), constants.W_OK);
      return { writable: true };
    } catch {
      return { writable: false };
    }
  }

  /** Waits for pending writes and releases the lockfile. */
  async close(): Promise<void> {
    await this.writeLock;
    if (this.lockEnabled && this.locked) {
      await this.releaseLock();
    }
  }

  getFilePath(): string {
    return this.filePath;
  }

  private hash(data: string): string {
    return createHash("sha256").update(data).digest("hex");
  }

  private async acquireLock(): Promise<void> {
    try {
      const fh = await open(this.lockPath, "wx");
      await fh.write(String(process.pid), undefined, "utf-8");
      await fh.close();
      this.locked = true;
    } catch (err: unknown) {
      if (errnoCode(err) !== "EEXIST") throw err;

      let pid: number;
      try {
        pid = parseInt((await readFile(this.lockPath, "utf-8")).trim(), 10);
      } catch {
        await this.removeStaleLock();
        return this.acquireLock();
      }
      if (isNaN(pid)) {
        await this.removeStaleLock();
        return this.acquireLock();
      }

      try {
        process.kill(pid, 0);
      } catch (killErr: unknown) {
        if (errnoCode(killErr) === "ESRCH") {
          await this.removeStaleLock();
          return this.acquireLock();
        }
        throw killErr;
      }
      throw new Error(`Journal is locked by process ${pid} (lockfile: ${this.lockPath})`);
    }
  }

  private async releaseLock(): Promise<void> {
    await this.removeStaleLock();
    this.locked = false;
  }

  private async removeStaleLock(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") throw err;
    }
  }

  private trackSubjectAccess(subject: string): void {
    const idx = this.subjectAccessOrder.indexOf(subject);
    if (idx !== -1) {
      this.subjectAccessOrder.splice(idx, 1);
    }
    this.subjectAccessOrder.push(subject);
  }

  private evictSubjectsIfNeeded(): void {
    while (this.subjectIndex.size > this.maxSubjectsIndexed) {
      const oldest = this.subjectAccessOrder.shift();
      if (oldest === undefined) break;
      this.subjectIndex.delete(oldest);
    }
  }
}
