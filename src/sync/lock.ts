import { mkdir, open, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { hasErrorCode } from "../util/files.js";
import { createLogger } from "../util/logger.js";

const log = createLogger("lock");

export interface LockOptions {
  /** How long to wait for a held lock; 0 fails at once. */
  timeoutMs: number;
  /** A lock file older than this is treated as left behind by a dead process. */
  staleMs: number;
  pollMs?: number;
}

export class LockTimeoutError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number,
  ) {
    super(`Lock ${lockPath} still held after ${timeoutMs}ms`);
    this.name = "LockTimeoutError";
  }
}

async function tryCreate(lockPath: string): Promise<boolean> {
  try {
    const handle = await open(lockPath, "wx");
    try {
      await handle.writeFile(`${process.pid} ${new Date().toISOString()}\n`);
    } catch (e) {
      await rm(lockPath, { force: true });
      throw e;
    } finally {
      await handle.close();
    }
    return true;
  } catch (e) {
    if (hasErrorCode(e, "EEXIST")) return false;
    throw e;
  }
}

async function isStale(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const st = await stat(lockPath);
    return Date.now() - st.mtimeMs > staleMs;
  } catch (e) {
    // Released between our create attempt and the stat.
    if (hasErrorCode(e, "ENOENT")) return false;
    throw e;
  }
}

export async function acquireLock(lockPath: string, opts: LockOptions): Promise<void> {
  await mkdir(dirname(lockPath), { recursive: true });
  const deadline = Date.now() + opts.timeoutMs;
  const pollMs = opts.pollMs ?? 100;

  for (;;) {
    if (await tryCreate(lockPath)) {
      log.debug("Lock acquired", { lockPath });
      return;
    }
    if (await isStale(lockPath, opts.staleMs)) {
      log.warn("Removing stale lock", { lockPath });
      await rm(lockPath, { force: true });
      continue;
    }
    if (Date.now() >= deadline) {
      throw new LockTimeoutError(lockPath, opts.timeoutMs);
    }
    await sleep(pollMs);
  }
}

export async function releaseLock(lockPath: string): Promise<void> {
  await rm(lockPath, { force: true });
  log.debug("Lock released", { lockPath });
}

/** Runs `fn` while holding the lock file at `lockPath`; the lock is released however `fn` ends. */
export async function withLock<T>(lockPath: string, opts: LockOptions, fn: () => Promise<T>): Promise<T> {
  await acquireLock(lockPath, opts);
  try {
    return await fn();
  } finally {
    await releaseLock(lockPath);
  }
}
