import { ValueEntry } from "./valueEntry";

export type Clock = () => number;

export interface EntrySnapshot {
  key: string;
  value: string;
  expiresAt: number | null;
}

export class Database {
  /**
   * Stores keys & values
   * Enforces TTL lazily on read, eagerly on sweep
   *
   * Every method is synchronous, so each one runs as a single
   * critical section on the event loop.
   */
  private keyspace = new Map<string, ValueEntry>();
  private readonly now: Clock;
  private isClosed = false;

  constructor(clock: Clock = Date.now) {
    this.now = clock;
  }

  /**
   * Returns value or null
   * Must delete expired keys
   */
  get(key: string): string | null {
    const entry = this.keyspace.get(key);
    if (!entry) return null;
    // lazy expiry check
    if (entry.isExpired(this.now())) {
      this.keyspace.delete(key);
      return null;
    }
    return entry.value;
  }

  /**
   * Overwrites existing key and its TTL
   */
  set(key: string, value: string, ttlMs?: number): void {
    const now = this.now();
    const expiresAt = ttlMs === undefined ? null : now + ttlMs;
    const existing = this.keyspace.get(key);
    const entry = existing && !existing.isExpired(now)
      ? existing.cloneWithValue(value, expiresAt, now)
      : new ValueEntry(value, expiresAt, now);
    this.keyspace.set(key, entry);
  }

  /**
   * Removes key, expired or not
   */
  delete(key: string): boolean {
    return this.keyspace.delete(key);
  }

  /**
   * Removes every entry with expiresAt <= now.
   * Expiry is evaluated against the live map while removing.
   */
  sweep(now: number = this.now()): number {
    let removed = 0;
    for (const [key, entry] of this.keyspace) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) {
        this.keyspace.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Physical entry count, including expired entries not yet swept
   */
  get size(): number {
    return this.keyspace.size;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Drops every key and marks the store unusable.
   * Called when the owning database is dropped.
   */
  close(): void {
    this.keyspace.clear();
    this.isClosed = true;
  }

  /**
   * Live entries only
   */
  toSnapshot(): EntrySnapshot[] {
    const now = this.now();
    const entries: EntrySnapshot[] = [];
    for (const [key, entry] of this.keyspace) {
      if (entry.isExpired(now)) continue;
      entries.push({ key, value: entry.value, expiresAt: entry.expiresAt });
    }
    return entries;
  }

  static fromSnapshot(entries: readonly EntrySnapshot[], clock: Clock = Date.now): Database {
    const database = new Database(clock);
    const now = clock();
    for (const snapshot of entries) {
      const entry = new ValueEntry(snapshot.value, snapshot.expiresAt, now);
      if (entry.isExpired(now)) continue;
      database.keyspace.set(snapshot.key, entry);
    }
    return database;
  }
}
