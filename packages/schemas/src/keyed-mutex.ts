/**
 * Per-key mutual exclusion. Callers holding different keys never wait on
 * each other; callers on the same key run one at a time in arrival order.
 */
export class KeyedMutex {
  private locks = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<() => void> {
    while (this.locks.has(key)) {
      await this.locks.get(key);
    }
    let release!: () => void;
    this.locks.set(key, new Promise<void>((r) => { release = r; }));
    return () => {
      this.locks.delete(key);
      release();
    };
  }

  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key);
  }

  get size(): number {
    return this.locks.size;
  }
}
