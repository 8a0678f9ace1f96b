import { z } from "zod";

export const DATABASE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export const DatabaseSnapshotSchema = z.object({
  name: z.string().regex(DATABASE_NAME_PATTERN),
  credentials: z
    .object({
      username: z.string(),
      passwordHash: z.string(),
    })
    .nullable(),
  // keys are arbitrary strings, "__proto__" included
  entries: z.array(
    z.object({
      key: z.string(),
      value: z.string(),
      expiresAt: z.number().int().nullable(),
    })
  ),
});

export type DatabaseSnapshot = z.infer<typeof DatabaseSnapshotSchema>;

/**
 * Load/flush hook for the registry.
 * Implementations own the on-disk (or in-memory) layout.
 */
export interface SnapshotStore {
  exists(name: string): Promise<boolean>;
  load(name: string): Promise<DatabaseSnapshot | null>;
  save(snapshot: DatabaseSnapshot): Promise<void>;
  remove(name: string): Promise<void>;
  list(): Promise<string[]>;
}
