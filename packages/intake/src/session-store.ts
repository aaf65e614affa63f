/* eslint-disable @typescript-eslint/require-await */

/**
 * Per-submitter staging storage. Async so a persistent backend can stand in
 * for the in-memory one.
 */
export interface SessionStore<T> {
  get(submitter: string): Promise<T | null>;
  /** Replaces whatever the submitter had staged. */
  put(submitter: string, value: T): Promise<void>;
  /** Returns true when something was removed. */
  delete(submitter: string): Promise<boolean>;
}

export interface InMemorySessionStoreOptions {
  /** Entries older than this are dropped on access. No expiry when unset. */
  ttlMs?: number;
  /** Milliseconds since epoch; defaults to Date.now. */
  clock?: () => number;
}

interface Entry<T> {
  value: T;
  storedAt: number;
}

export class InMemorySessionStore<T> implements SessionStore<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly ttlMs: number | undefined;
  private readonly clock: () => number;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs;
    this.clock = options.clock ?? Date.now;
  }

  private isExpired(entry: Entry<T>): boolean {
    return this.ttlMs !== undefined && this.clock() - entry.storedAt > this.ttlMs;
  }

  async get(submitter: string): Promise<T | null> {
    const entry = this.entries.get(submitter);
    if (entry === undefined) return null;
    if (this.isExpired(entry)) {
      this.entries.delete(submitter);
      return null;
    }
    return entry.value;
  }

  async put(submitter: string, value: T): Promise<void> {
    this.entries.set(submitter, { value, storedAt: this.clock() });
  }

  async delete(submitter: string): Promise<boolean> {
    return this.entries.delete(submitter);
  }

  get size(): number {
    return this.entries.size;
  }
}
