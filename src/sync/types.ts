import { z } from "zod";
import type { RemoteConfig } from "../config/types.js";
import type { SyncConflictError } from "../errors.js";

export const SyncStatusSchema = z.enum(["uninitialized", "synced", "unreachable"]);

/** What the state file keeps between runs. */
export const SyncRecordSchema = z.object({
  remoteUrl: z.string().nullable().default(null),
  status: SyncStatusSchema.default("uninitialized"),
  lastSyncedRevision: z.string().nullable().default(null),
  lastSyncedAt: z.string().nullable().default(null),
  lastError: z.string().nullable().default(null),
});

export type SyncStatus = z.infer<typeof SyncStatusSchema>;
export type SyncRecord = z.infer<typeof SyncRecordSchema>;

export interface SyncState {
  remote: RemoteConfig;
  status: SyncStatus;
  lastSyncedRevision: string | null;
  lastSyncedAt: string | null;
  lastError: string | null;
  /** Absolute directory holding the remote-synced copies. */
  sharedDir: string;
  /** Absolute directory of local overrides; sync never writes here. */
  overrideDir: string;
}

export interface SyncSummary {
  revision: string;
  added: string[];
  updated: string[];
  removed: string[];
  unchanged: string[];
  warnings: SyncConflictError[];
}

export interface RemoteTree {
  revision: string;
  /** Identifier to file content. */
  files: Map<string, string>;
}

export interface RemoteSource {
  readonly description: string;
  fetchTree(): Promise<RemoteTree>;
}
