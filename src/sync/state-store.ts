import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { SyncRecordSchema, type SyncRecord, type SyncState } from "./types.js";
import { ConfigError } from "../errors.js";
import { isNotFound } from "../util/files.js";
import { createLogger } from "../util/logger.js";

const log = createLogger("state-store");

export class SyncStateStore {
  constructor(private filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /** A missing file means the project has never synced. */
  async load(): Promise<SyncRecord> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (e) {
      if (isNotFound(e)) {
        log.debug("No sync state yet", { filePath: this.filePath });
        return SyncRecordSchema.parse({});
      }
      throw e;
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(raw);
    } catch (e) {
      throw new ConfigError(this.filePath, `unparseable sync state: ${String(e)}`, e);
    }
    const result = SyncRecordSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw new ConfigError(this.filePath, result.error.issues.map((i) => i.message).join("; "), result.error);
    }
    return result.data;
  }

  async save(state: SyncState): Promise<void> {
    const record: SyncRecord = {
      remoteUrl: state.remote.url,
      status: state.status,
      lastSyncedRevision: state.lastSyncedRevision,
      lastSyncedAt: state.lastSyncedAt,
      lastError: state.lastError,
    };
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, stringifyYaml(record));
    log.info("Saved sync state", { status: state.status, revision: state.lastSyncedRevision });
  }
}
