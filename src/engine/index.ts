export { Engine } from "./engine";
export type { DatabaseRecord, EngineOptions, SessionGrant } from "./engine";
export { Database } from "./database";
export type { Clock, EntrySnapshot } from "./database";
export { ValueEntry } from "./valueEntry";
export { ExpirySweeper } from "./sweeper";
export type { SweeperOptions } from "./sweeper";
export type { Credentials, StoredCredentials } from "./credentials";
