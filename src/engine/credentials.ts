import bcrypt from "bcrypt";
import { DEFAULT_BCRYPT_ROUNDS } from "../configs";

export interface Credentials {
  username: string;
  password: string;
}

/**
 * What a database record keeps: the password only as a bcrypt hash
 */
export interface StoredCredentials {
  username: string;
  passwordHash: string;
}

export async function hashCredentials(
  credentials: Credentials,
  rounds: number = DEFAULT_BCRYPT_ROUNDS
): Promise<StoredCredentials> {
  const passwordHash = await bcrypt.hash(credentials.password, rounds);
  return { username: credentials.username, passwordHash };
}

/**
 * No stored credentials: open database, anything passes.
 * Otherwise both username and password must match exactly.
 */
export async function verifyCredentials(
  stored: StoredCredentials | null,
  supplied: Credentials | undefined
): Promise<boolean> {
  if (!stored) return true;
  if (!supplied) return false;
  // hash comparison runs whatever the username
  const passwordMatches = await bcrypt.compare(supplied.password, stored.passwordHash);
  return passwordMatches && supplied.username === stored.username;
}
