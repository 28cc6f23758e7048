import { readFile, mkdir, open, rename } from "node:fs/promises";
import { dirname } from "node:path";

/** Durable key-value table contract shared by the responders. */
export interface KeyValueStore<T> {
  load(): Promise<void>;
  save(): Promise<void>;
  get(key: string): T | undefined;
  set(value: T): void;
  delete(key: string): boolean;
  has(key: string): boolean;
  getAll(): T[];
  readonly size: number;
}

export interface JsonlStoreOptions<T> {
  keyOf: (value: T) => string;
  /** Lines that fail the guard are skipped on load. */
  guard: (data: unknown) => data is T;
}

/**
 * A table held in memory and persisted as one JSON document per line.
 * save() rewrites the whole file through a temp file + fsync + rename,
 * serialised behind a write lock.
 */
export class JsonlStore<T> implements KeyValueStore<T> {
  private records = new Map<string, T>();
  private filePath: string;
  private keyOf: (value: T) => string;
  private guard: (data: unknown) => data is T;
  private writeLock: Promise<void> = Promise.resolve();
  private skipped = 0;

  constructor(filePath: string, options: JsonlStoreOptions<T>) {
    this.filePath = filePath;
    this.keyOf = options.keyOf;
    this.guard = options.guard;
  }

  async load(): Promise<void> {
    this.records.clear();
    this.skipped = 0;
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err: unknown) {
      // A table that was never saved starts empty
      if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return;
      throw err;
    }
    for (const line of content.split("\n")) {
      if (line.trim().length === 0) continue;
      try {
        const data: unknown = JSON.parse(line);
        if (this.guard(data)) {
          this.records.set(this.keyOf(data), data);
        } else {
          this.skipped++;
        }
      } catch {
        // Skip corrupted lines rather than losing the table
        this.skipped++;
      }
    }
  }

  async save(): Promise<void> {
    let releaseLock!: () => void;
    const acquired = new Promise<void>((resolve) => { releaseLock = resolve; });
    const prev = this.writeLock;
    this.writeLock = acquired;
    await prev;

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      const entries = [...this.records.values()];
      const content = entries.map((e) => JSON.stringify(e)).join("\n") + (entries.length > 0 ? "\n" : "");
      const tmpPath = this.filePath + ".tmp";
      const fh = await open(tmpPath, "w");
      try {
        await fh.writeFile(content, "utf-8");
        await fh.sync();
      } finally {
        await fh.close();
      }
      await rename(tmpPath, this.filePath);
    } finally {
      releaseLock();
    }
  }

  get(key: string): T | undefined {
    return this.records.get(key);
  }

  set(value: T): void {
    this.records.set(this.keyOf(value), value);
  }

  delete(key: string): boolean {
    return this.records.delete(key);
  }

  has(key: string): boolean {
    return this.records.has(key);
  }

  getAll(): T[] {
    return [...this.records.values()];
  }

  get size(): number {
    return this.records.size;
  }

  /** Lines dropped by the last load. */
  get skippedOnLoad(): number {
    return this.skipped;
  }

  getFilePath(): string {
    return this.filePath;
  }
}
