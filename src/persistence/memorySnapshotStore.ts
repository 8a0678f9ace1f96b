import { DatabaseSnapshotSchema } from "./snapshot";
import type { DatabaseSnapshot, SnapshotStore } from "./snapshot";

/**
 * Keeps snapshots in process memory.
 * Used when persistence is switched off.
 */
export class MemorySnapshotStore implements SnapshotStore {
  private snapshots = new Map<string, string>();

  async exists(name: string): Promise<boolean> {
    return this.snapshots.has(name);
  }

  async load(name: string): Promise<DatabaseSnapshot | null> {
    const raw = this.snapshots.get(name);
    if (raw === undefined) return null;
    return DatabaseSnapshotSchema.parse(JSON.parse(raw));
  }

  async save(snapshot: DatabaseSnapshot): Promise<void> {
    // stored serialized so callers can't mutate what was saved
    this.snapshots.set(snapshot.name, JSON.stringify(snapshot));
  }

  async remove(name: string): Promise<void> {
    this.snapshots.delete(name);
  }

  async list(): Promise<string[]> {
    return Array.from(this.snapshots.keys()).sort();
  }
}
