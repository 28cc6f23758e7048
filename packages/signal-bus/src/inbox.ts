import type { Logger, OverflowPolicy, Signal, SignalHandler, SignalType } from "@wardline/schemas";

export type InboxFailureHandler = (inbox: Inbox, signal: Signal, error: unknown) => void;

interface BlockedOffer {
  signal: Signal;
  admit: () => void;
}

export interface InboxOptions {
  name: string;
  type: SignalType | "*";
  handler: SignalHandler;
  capacity: number;
  policy: OverflowPolicy;
  onFailure: InboxFailureHandler;
  logger: Logger;
}

export interface InboxStats {
  name: string;
  type: SignalType | "*";
  policy: OverflowPolicy;
  capacity: number;
  depth: number;
  blocked: number;
  delivered: number;
  failed: number;
  dropped: number;
}

/**
 * One subscriber's bounded queue and the async loop that drains it.
 * Signals reach the handler in the order they were offered.
 */
export class Inbox {
  readonly name: string;
  readonly type: SignalType | "*";
  readonly capacity: number;
  readonly policy: OverflowPolicy;
  private handler: SignalHandler;
  private onFailure: InboxFailureHandler;
  private logger: Logger;
  private queue: Signal[] = [];
  private blocked: BlockedOffer[] = [];
  private running = false;
  private stopped = false;
  private idleWaiters: Array<() => void> = [];
  private delivered = 0;
  private failed = 0;
  private dropped = 0;

  constructor(options: InboxOptions) {
    this.name = options.name;
    this.type = options.type;
    this.handler = options.handler;
    this.capacity = options.capacity;
    this.policy = options.policy;
    this.onFailure = options.onFailure;
    this.logger = options.logger;
  }

  /**
   * Queues a signal. Under "drop-oldest" a full inbox evicts its oldest
   * signal, which is returned. Under "block" the promise settles once the
   * signal has been admitted.
   */
  offer(signal: Signal): { dropped: Signal | null; admitted: Promise<void> } {
    if (this.stopped) return { dropped: signal, admitted: Promise.resolve() };

    if (this.policy === "drop-oldest") {
      let evicted: Signal | null = null;
      if (this.queue.length >= this.capacity) {
        evicted = this.queue.shift() ?? null;
        this.dropped++;
      }
      this.queue.push(signal);
      this.pump();
      return { dropped: evicted, admitted: Promise.resolve() };
    }

    if (this.queue.length < this.capacity && this.blocked.length === 0) {
      this.queue.push(signal);
      this.pump();
      return { dropped: null, admitted: Promise.resolve() };
    }
    const admitted = new Promise<void>((resolve) => {
      this.blocked.push({ signal, admit: resolve });
    });
    return { dropped: null, admitted };
  }

  /** Resolves once nothing is queued, blocked or being handled. */
  idle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stops delivery. Queued and blocked signals are discarded and their
   * count returned; a handler already running finishes.
   */
  stop(): number {
    this.stopped = true;
    const discarded = this.queue.length + this.blocked.length;
    this.queue = [];
    for (const offer of this.blocked) offer.admit();
    this.blocked = [];
    this.notifyIdle();
    return discarded;
  }

  get depth(): number {
    return this.queue.length + this.blocked.length;
  }

  stats(): InboxStats {
    return {
      name: this.name,
      type: this.type,
      policy: this.policy,
      capacity: this.capacity,
      depth: this.queue.length,
      blocked: this.blocked.length,
      delivered: this.delivered,
      failed: this.failed,
      dropped: this.dropped,
    };
  }

  private pump(): void {
    if (this.running) return;
    this.running = true;
    // Start on a fresh microtask so handlers never run inside publish()
    queueMicrotask(() => {
      this.run().catch((err: unknown) => {
        this.running = false;
        this.logger.error(`Inbox ${this.name}: drain loop aborted`, { error: String(err) });
        if (this.queue.length > 0) this.pump();
        else this.notifyIdle();
      });
    });
  }

  private async run(): Promise<void> {
    while (!this.stopped) {
      const signal = this.queue.shift();
      if (signal === undefined) break;
      this.admitBlocked();
      try {
        await this.handler(signal);
        this.delivered++;
      } catch (err) {
        this.failed++;
        this.onFailure(this, signal, err);
      }
    }
    this.running = false;
    this.notifyIdle();
  }

  private admitBlocked(): void {
    while (this.queue.length < this.capacity) {
      const next = this.blocked.shift();
      if (!next) break;
      this.queue.push(next.signal);
      next.admit();
    }
  }

  /** No signal queued, blocked or being handled. */
  isIdle(): boolean {
    return !this.running && this.queue.length === 0 && this.blocked.length === 0;
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
