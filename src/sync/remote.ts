import { execFile } from "node:child_process";
import { createHash } from "node:crypto";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import type { RemoteConfig } from "../config/types.js";
import type { RemoteSource, RemoteTree } from "./types.js";
import { SyncUnavailableError } from "../errors.js";
import { readRuleTree } from "../util/files.js";
import { createLogger } from "../util/logger.js";

const log = createLogger("remote");

export interface RemoteSourceOptions {
  extensions: readonly string[];
  /** Base for relative directory remotes. */
  cwd?: string;
}

/** Content hash over the sorted tree, used as the revision of plain directories. */
export function treeRevision(files: Map<string, string>): string {
  const hash = createHash("sha256");
  for (const id of [...files.keys()].sort()) {
    hash.update(id);
    hash.update("\0");
    hash.update(files.get(id) ?? "");
    hash.update("\0");
  }
  return `sha256:${hash.digest("hex").slice(0, 16)}`;
}

export class DirectoryRemoteSource implements RemoteSource {
  readonly description: string;
  private root: string;

  constructor(
    dir: string,
    private subPath: string,
    private extensions: readonly string[],
  ) {
    this.root = join(dir, subPath);
    this.description = dir;
  }

  async fetchTree(): Promise<RemoteTree> {
    let files: Map<string, string>;
    try {
      files = await readRuleTree(this.root, this.extensions);
    } catch (e) {
      log.warn("Directory remote unreadable", { root: this.root, error: String(e) });
      throw new SyncUnavailableError(this.description, `cannot read ${this.root}`, e);
    }
    const revision = treeRevision(files);
    log.debug("Fetched directory remote", { root: this.root, files: files.size, revision });
    return { revision, files };
  }
}

function runGit(args: string[], opts: { cwd?: string; timeoutMs: number }): Promise<string> {
  return new Promise((ok, fail) => {
    execFile(
      "git",
      args,
      {
        cwd: opts.cwd,
        timeout: opts.timeoutMs,
        encoding: "utf-8",
        env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
      },
      (error, stdout, stderr) => {
        if (error) {
          fail(new Error(`git ${args[0]} failed: ${stderr.trim() || error.message}`, { cause: error }));
          return;
        }
        ok(stdout);
      },
    );
  });
}

/**
 * Shallow-clones `url` at `ref` (a branch or tag) into a temporary directory
 * and reads the rule files from it.
 */
export class GitRemoteSource implements RemoteSource {
  readonly description: string;

  constructor(
    private url: string,
    private ref: string | undefined,
    private subPath: string,
    private extensions: readonly string[],
    private timeoutMs: number,
  ) {
    this.description = ref ? `${url}#${ref}` : url;
  }

  async fetchTree(): Promise<RemoteTree> {
    const checkout = await mkdtemp(join(tmpdir(), "ruleshare-"));
    try {
      const branch = this.ref ? ["--branch", this.ref] : [];
      await runGit(["clone", "--quiet", "--depth", "1", ...branch, "--", this.url, checkout], {
        timeoutMs: this.timeoutMs,
      });
      const revision = (await runGit(["rev-parse", "HEAD"], { cwd: checkout, timeoutMs: this.timeoutMs })).trim();
      const files = await readRuleTree(join(checkout, this.subPath), this.extensions);
      log.debug("Fetched git remote", { url: this.url, ref: this.ref, revision, files: files.size });
      return { revision, files };
    } catch (e) {
      log.warn("Git remote unavailable", { url: this.url, error: String(e) });
      throw new SyncUnavailableError(this.description, e instanceof Error ? e.message : String(e), e);
    } finally {
      await rm(checkout, { recursive: true, force: true });
    }
  }
}

export function createRemoteSource(remote: RemoteConfig, opts: RemoteSourceOptions): RemoteSource {
  if (remote.kind === "directory") {
    const dir = isAbsolute(remote.url) ? remote.url : resolve(opts.cwd ?? process.cwd(), remote.url);
    return new DirectoryRemoteSource(dir, remote.path, opts.extensions);
  }
  return new GitRemoteSource(remote.url, remote.ref, remote.path, opts.extensions, remote.timeoutMs);
}
