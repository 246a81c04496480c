import { mkdir, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { RemoteConfig } from "../config/types.js";
import type { RemoteSource, RemoteTree, SyncState, SyncSummary } from "./types.js";
import { withLock, LockTimeoutError, type LockOptions } from "./lock.js";
import { SyncConflictError, SyncUnavailableError } from "../errors.js";
import { isNotFound, readRuleTree } from "../util/files.js";
import { createLogger } from "../util/logger.js";

const log = createLogger("sync");

export interface SyncCoordinatorOptions {
  remoteFor: (remote: RemoteConfig) => RemoteSource;
  extensions: readonly string[];
  lock: LockOptions;
  /** Called after every state transition. */
  persist?: (state: SyncState) => Promise<void>;
}

export function lockPathFor(sharedDir: string): string {
  return `${sharedDir.replace(/[\\/]+$/, "")}.lock`;
}

/**
 * Pull-only reconciliation of a project's shared rule directory against its
 * remote. The override directory is read for shadowing warnings and never
 * written.
 */
export class SyncCoordinator {
  constructor(private opts: SyncCoordinatorOptions) {}

  async sync(state: SyncState): Promise<SyncSummary> {
    const lockPath = lockPathFor(state.sharedDir);
    try {
      return await withLock(lockPath, this.opts.lock, () => this.reconcile(state));
    } catch (e) {
      if (e instanceof LockTimeoutError) {
        const error = new SyncUnavailableError(state.remote.url, `another sync holds ${lockPath}`, e);
        await this.markUnreachable(state, error);
        throw error;
      }
      throw e;
    }
  }

  private async reconcile(state: SyncState): Promise<SyncSummary> {
    const source = this.opts.remoteFor(state.remote);
    log.info("Syncing rules", { remote: source.description, sharedDir: state.sharedDir });

    let tree: RemoteTree;
    try {
      tree = await source.fetchTree();
    } catch (e) {
      const error =
        e instanceof SyncUnavailableError ? e : new SyncUnavailableError(source.description, String(e), e);
      await this.markUnreachable(state, error);
      throw error;
    }

    let local: Map<string, string>;
    let overrides: Map<string, string>;
    try {
      local = await this.readDir(state.sharedDir);
      overrides = await this.readDir(state.overrideDir);
    } catch (e) {
      throw await this.localFailure(state, source, "cannot read local rules", e);
    }

    const added: string[] = [];
    const updated: string[] = [];
    const removed: string[] = [];
    const unchanged: string[] = [];

    for (const [id, content] of tree.files) {
      const current = local.get(id);
      if (current === undefined) {
        added.push(id);
      } else if (current !== content) {
        updated.push(id);
      } else {
        unchanged.push(id);
      }
    }
    for (const id of local.keys()) {
      if (!tree.files.has(id)) removed.push(id);
    }

    try {
      for (const id of [...added, ...updated]) {
        const target = join(state.sharedDir, id);
        await mkdir(dirname(target), { recursive: true });
        await writeFile(target, tree.files.get(id) ?? "", "utf-8");
      }
      for (const id of removed) {
        await rm(join(state.sharedDir, id), { force: true });
      }
    } catch (e) {
      throw await this.localFailure(state, source, `cannot update ${state.sharedDir}`, e);
    }

    const changed = new Set([...added, ...updated]);
    const warnings: SyncConflictError[] = [];
    for (const [id, content] of tree.files) {
      const override = overrides.get(id);
      if (override === undefined || override === content) continue;
      const warning = new SyncConflictError(id, changed.has(id));
      log.warn("Local override shadows remote rule", { identifier: id, remoteChanged: warning.remoteChanged });
      warnings.push(warning);
    }

    state.status = "synced";
    state.lastSyncedRevision = tree.revision;
    state.lastSyncedAt = new Date().toISOString();
    state.lastError = null;
    await this.opts.persist?.(state);

    const summary: SyncSummary = {
      revision: tree.revision,
      added: added.sort(),
      updated: updated.sort(),
      removed: removed.sort(),
      unchanged: unchanged.sort(),
      warnings,
    };
    log.info("Sync complete", {
      revision: tree.revision,
      added: added.length,
      updated: updated.length,
      removed: removed.length,
      unchanged: unchanged.length,
    });
    return summary;
  }

  private async readDir(dir: string): Promise<Map<string, string>> {
    try {
      return await readRuleTree(dir, this.opts.extensions);
    } catch (e) {
      if (isNotFound(e)) return new Map();
      throw e;
    }
  }

  private async localFailure(
    state: SyncState,
    source: RemoteSource,
    what: string,
    cause: unknown,
  ): Promise<SyncUnavailableError> {
    const reason = `${what}: ${cause instanceof Error ? cause.message : String(cause)}`;
    const error = new SyncUnavailableError(source.description, reason, cause);
    await this.markUnreachable(state, error);
    return error;
  }

  private async markUnreachable(state: SyncState, error: SyncUnavailableError): Promise<void> {
    state.status = "unreachable";
    state.lastError = error.message;
    log.error("Sync failed", { remote: error.remote, error: error.message });
    await this.opts.persist?.(state);
  }
}
