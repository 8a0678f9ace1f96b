import { DEFAULT_BCRYPT_ROUNDS } from "../configs";
import { AlreadyExistsError, NotFoundError, UnauthorizedError } from "../commands/errors";
import { MemorySnapshotStore } from "../persistence/memorySnapshotStore";
import type { DatabaseSnapshot, SnapshotStore } from "../persistence/snapshot";
import { getLogger, type Logger } from "../utils/logger";
import { Mutex } from "../utils/mutex";
import { hashCredentials, verifyCredentials } from "./credentials";
import type { Credentials, StoredCredentials } from "./credentials";
import { Database, type Clock } from "./database";

export interface DatabaseRecord {
  readonly name: string;
  readonly credentials: StoredCredentials | null;
  readonly database: Database;
}

/**
 * Handle a session keeps after a successful create/use
 */
export interface SessionGrant {
  readonly name: string;
  readonly database: Database;
  // true when credentials were checked to obtain this grant
  readonly requiresAuth: boolean;
}

export interface EngineOptions {
  snapshots?: SnapshotStore;
  bcryptRounds?: number;
  clock?: Clock;
  logger?: Logger;
}

export class Engine {
  /**
   * Owns all named databases
   * Coordinates auth & persistence
   * Single source of truth
   */
  private databases = new Map<string, DatabaseRecord>();
  // create/drop/select/restore await hashing and disk I/O
  private readonly structure = new Mutex();
  private readonly snapshots: SnapshotStore;
  private readonly bcryptRounds: number;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(options: EngineOptions = {}) {
    this.snapshots = options.snapshots ?? new MemorySnapshotStore();
    this.bcryptRounds = options.bcryptRounds ?? DEFAULT_BCRYPT_ROUNDS;
    this.clock = options.clock ?? Date.now;
    this.log = options.logger ?? getLogger("engine");
  }

  /**
   * Creates an empty database.
   * Fails if the name is live or persisted.
   */
  async create(name: string, credentials?: Credentials): Promise<SessionGrant> {
    return this.structure.runExclusive(async () => {
      if (this.databases.has(name) || (await this.snapshots.exists(name))) {
        throw new AlreadyExistsError(name);
      }

      const record: DatabaseRecord = {
        name,
        credentials: credentials ? await hashCredentials(credentials, this.bcryptRounds) : null,
        database: new Database(this.clock),
      };
      // persisted first: a failed write leaves the registry untouched
      await this.snapshots.save(this.toSnapshot(record));
      this.databases.set(name, record);

      this.log.info({ database: name, auth: record.credentials !== null }, "database created");
      return this.grantFor(record);
    });
  }

  /**
   * Resolves and authenticates a database for a session.
   * Loads it from its snapshot when not in memory.
   */
  async select(name: string, credentials?: Credentials): Promise<SessionGrant> {
    return this.structure.runExclusive(async () => {
      const record = await this.authorize(name, credentials);
      return this.grantFor(record);
    });
  }

  /**
   * Removes a database and all its keys.
   * Credentials are checked on every drop.
   */
  async drop(name: string, credentials?: Credentials): Promise<void> {
    await this.structure.runExclusive(async () => {
      const record = await this.authorize(name, credentials);
      // unregistered before the file goes, so no flush can write it back
      this.databases.delete(name);
      try {
        await this.snapshots.remove(name);
      } catch (error) {
        this.databases.set(name, record);
        throw error;
      }
      record.database.close();
      this.log.info({ database: name }, "database dropped");
    });
  }

  /**
   * Loads every persisted database not already in memory.
   * Returns the names loaded.
   */
  async restore(): Promise<string[]> {
    return this.structure.runExclusive(async () => {
      const loaded: string[] = [];
      for (const name of await this.snapshots.list()) {
        if (this.databases.has(name)) continue;
        const record = await this.loadRecord(name);
        if (record) loaded.push(name);
      }
      if (loaded.length > 0) {
        this.log.info({ databases: loaded }, "restored databases from snapshots");
      }
      return loaded;
    });
  }

  /**
   * Writes the current contents of a live database.
   * Failures are logged; the in-memory state stays authoritative.
   */
  async flush(name: string): Promise<boolean> {
    const record = this.databases.get(name);
    if (!record || record.database.closed) return false;
    try {
      await this.snapshots.save(this.toSnapshot(record));
      return true;
    } catch (error) {
      this.log.error({ err: error, database: name }, "failed to persist database");
      return false;
    }
  }

  /**
   * Returns a live database by name.
   * Must throw if it is unknown.
   */
  getDatabase(name: string): Database {
    const record = this.databases.get(name);
    if (!record) throw new NotFoundError(name);
    return record.database;
  }

  has(name: string): boolean {
    return this.databases.has(name);
  }

  /**
   * Point-in-time copy of the registry, for the sweeper
   */
  list(): DatabaseRecord[] {
    return Array.from(this.databases.values());
  }

  private async authorize(name: string, credentials?: Credentials): Promise<DatabaseRecord> {
    const record = this.databases.get(name) ?? (await this.loadRecord(name));
    if (!record) throw new NotFoundError(name);
    if (!(await verifyCredentials(record.credentials, credentials))) {
      throw new UnauthorizedError(name);
    }
    return record;
  }

  /**
   * Caller must hold the structure lock
   */
  private async loadRecord(name: string): Promise<DatabaseRecord | null> {
    const snapshot = await this.snapshots.load(name);
    if (!snapshot) return null;
    const record: DatabaseRecord = {
      name,
      credentials: snapshot.credentials,
      database: Database.fromSnapshot(snapshot.entries, this.clock),
    };
    this.databases.set(name, record);
    this.log.debug({ database: name, keys: record.database.size }, "database loaded from snapshot");
    return record;
  }

  private grantFor(record: DatabaseRecord): SessionGrant {
    return {
      name: record.name,
      database: record.database,
      requiresAuth: record.credentials !== null,
    };
  }

  private toSnapshot(record: DatabaseRecord): DatabaseSnapshot {
    return {
      name: record.name,
      credentials: record.credentials,
      entries: record.database.toSnapshot(),
    };
  }
}
