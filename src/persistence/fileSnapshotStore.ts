import fs from "node:fs/promises";
import path from "node:path";
import { getLogger, type Logger } from "../utils/logger";
import { KeyedMutex } from "../utils/mutex";
import { DATABASE_NAME_PATTERN, DatabaseSnapshotSchema } from "./snapshot";
import type { DatabaseSnapshot, SnapshotStore } from "./snapshot";

const EXTENSION = ".json";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * One pretty-printed JSON file per database: <directory>/<name>.json
 */
export class FileSnapshotStore implements SnapshotStore {
  private readonly directory: string;
  private readonly fileLocks = new KeyedMutex();
  private readonly log: Logger;
  private dirReady = false;

  constructor(directory: string, logger: Logger = getLogger("persistence")) {
    this.directory = path.resolve(directory);
    this.log = logger;
  }

  private filePath(name: string): string {
    if (!DATABASE_NAME_PATTERN.test(name)) {
      throw new Error(`Invalid database name for snapshot: '${name}'`);
    }
    return path.join(this.directory, `${name}${EXTENSION}`);
  }

  private async ensureDirectory(): Promise<void> {
    if (this.dirReady) return;
    await fs.mkdir(this.directory, { recursive: true });
    this.dirReady = true;
  }

  async exists(name: string): Promise<boolean> {
    try {
      await fs.access(this.filePath(name));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  /**
   * Returns null for a missing or unreadable snapshot.
   * Unreadable files are logged and left in place.
   */
  async load(name: string): Promise<DatabaseSnapshot | null> {
    const file = this.filePath(name);
    return this.fileLocks.runExclusive(file, async () => {
      let raw: string;
      try {
        raw = await fs.readFile(file, "utf-8");
      } catch (error) {
        if (isMissingFile(error)) return null;
        throw error;
      }

      let json: unknown;
      try {
        json = JSON.parse(raw);
      } catch (error) {
        this.log.error({ err: error, file }, "snapshot is not valid JSON");
        return null;
      }

      const result = DatabaseSnapshotSchema.safeParse(json);
      if (!result.success || result.data.name !== name) {
        this.log.error({ file, issues: result.error?.issues }, "snapshot failed validation");
        return null;
      }
      return result.data;
    });
  }

  /**
   * Writes to a temp file then renames, so readers never see a partial file
   */
  async save(snapshot: DatabaseSnapshot): Promise<void> {
    const file = this.filePath(snapshot.name);
    await this.fileLocks.runExclusive(file, async () => {
      await this.ensureDirectory();
      const tmp = `${file}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(snapshot, null, 2), "utf-8");
      await fs.rename(tmp, file);
    });
  }

  async remove(name: string): Promise<void> {
    const file = this.filePath(name);
    await this.fileLocks.runExclusive(file, async () => {
      await fs.rm(file, { force: true });
    });
  }

  async list(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    return files
      .filter((file) => file.endsWith(EXTENSION))
      .map((file) => file.slice(0, -EXTENSION.length))
      .filter((name) => DATABASE_NAME_PATTERN.test(name))
      .sort();
  }
}
