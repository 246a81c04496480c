import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { isAbsolute, join, relative, resolve } from "node:path";
import { stringify as stringifyYaml } from "yaml";
import { CONFIG_FILE, loadProjectConfig, parseProjectConfig } from "./config/loader.js";
import type { ProjectConfig, RemoteConfig } from "./config/types.js";
import type { RuleDocument } from "./document/types.js";
import { normalizePath } from "./document/scope.js";
import { ConfigError, type MalformedDocumentError } from "./errors.js";
import { PriorityResolver, type ResolvedRule, type RuleConflict } from "./resolver/resolver.js";
import { loadRuleDirectory } from "./store/loader.js";
import { RuleStore } from "./store/rule-store.js";
import { SyncCoordinator } from "./sync/coordinator.js";
import { createRemoteSource } from "./sync/remote.js";
import { SyncStateStore } from "./sync/state-store.js";
import type { RemoteSource, SyncState, SyncSummary } from "./sync/types.js";
import { createLogger, setLogLevel } from "./util/logger.js";

const log = createLogger("project");

export interface RuleProjectOptions {
  root: string;
  config: ProjectConfig;
  /** Replaces the git/directory remote, e.g. in tests. */
  remoteFor?: (remote: RemoteConfig) => RemoteSource;
}

export interface LoadReport {
  shared: string[];
  local: string[];
  malformed: MalformedDocumentError[];
}

function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

export class RuleProject {
  readonly root: string;
  readonly config: ProjectConfig;
  readonly store: RuleStore;
  readonly resolver: PriorityResolver;
  readonly sharedDir: string;
  readonly overrideDir: string;
  private stateStore: SyncStateStore;
  private coordinator: SyncCoordinator;
  private report: LoadReport | null = null;

  constructor(opts: RuleProjectOptions) {
    this.root = resolve(opts.root);
    this.config = opts.config;
    this.sharedDir = resolve(this.root, opts.config.sharedDir);
    this.overrideDir = resolve(this.root, opts.config.overrideDir);
    if (isWithin(this.sharedDir, this.overrideDir) || isWithin(this.overrideDir, this.sharedDir)) {
      throw new ConfigError(join(this.root, CONFIG_FILE), "sharedDir and overrideDir must not contain each other");
    }

    this.store = new RuleStore({ strict: opts.config.strict });
    this.resolver = new PriorityResolver(this.store, {
      exclusiveCategories: opts.config.exclusiveCategories,
    });
    this.stateStore = new SyncStateStore(resolve(this.root, opts.config.stateFile));

    const remoteFor =
      opts.remoteFor ??
      ((remote: RemoteConfig) => createRemoteSource(remote, { extensions: opts.config.extensions, cwd: this.root }));
    this.coordinator = new SyncCoordinator({
      remoteFor,
      extensions: opts.config.extensions,
      lock: opts.config.lock,
      persist: (state) => this.stateStore.save(state),
    });
  }

  /** Reads `.ruleshare.yaml` (or `configPath`) and applies its log level. */
  static open(root: string, configPath?: string): RuleProject {
    const config = loadProjectConfig(configPath ? resolve(root, configPath) : join(root, CONFIG_FILE));
    setLogLevel(config.logLevel);
    return new RuleProject({ root, config });
  }

  async state(): Promise<SyncState> {
    const record = await this.stateStore.load();
    const state: SyncState = {
      remote: this.config.remote,
      status: record.status,
      lastSyncedRevision: record.lastSyncedRevision,
      lastSyncedAt: record.lastSyncedAt,
      lastError: record.lastError,
      sharedDir: this.sharedDir,
      overrideDir: this.overrideDir,
    };
    if (record.remoteUrl !== null && record.remoteUrl !== this.config.remote.url) {
      log.info("Remote changed since last sync", { from: record.remoteUrl, to: this.config.remote.url });
      state.status = "uninitialized";
      state.lastSyncedRevision = null;
      state.lastSyncedAt = null;
    }
    return state;
  }

  async saveState(state: SyncState): Promise<void> {
    await this.stateStore.save(state);
  }

  async sync(): Promise<SyncSummary> {
    const state = await this.state();
    const summary = await this.coordinator.sync(state);
    this.report = null;
    return summary;
  }

  /** Re-reads both rule directories into the store. */
  async load(): Promise<LoadReport> {
    this.store.clear();
    const common = { extensions: this.config.extensions, defaultPriority: this.config.defaultPriority };
    const shared = await loadRuleDirectory(this.store, this.sharedDir, { ...common, source: "remote" });
    const local = await loadRuleDirectory(this.store, this.overrideDir, { ...common, source: "local" });
    this.report = {
      shared: shared.loaded,
      local: local.loaded,
      malformed: [...shared.malformed, ...local.malformed],
    };
    return this.report;
  }

  private async ready(): Promise<void> {
    const report = this.report ?? (await this.load());
    if (report.malformed.length > 0) throw report.malformed[0];
  }

  async list(filePath?: string): Promise<RuleDocument[]> {
    await this.ready();
    return [...this.store.list(filePath === undefined ? undefined : this.relativePath(filePath))];
  }

  async resolve(filePath: string): Promise<ResolvedRule[]> {
    await this.ready();
    return this.resolver.resolve(this.relativePath(filePath));
  }

  async conflicts(): Promise<RuleConflict[]> {
    await this.ready();
    return this.resolver.conflicts();
  }

  private relativePath(filePath: string): string {
    return normalizePath(isAbsolute(filePath) ? relative(this.root, filePath) : filePath);
  }
}

export interface InitOptions {
  remote: Pick<RemoteConfig, "kind" | "url"> & Partial<Pick<RemoteConfig, "ref" | "path">>;
  force?: boolean;
}

/** Writes a starter `.ruleshare.yaml` and creates the override directory. */
export async function initProject(root: string, opts: InitOptions): Promise<string> {
  const configPath = join(resolve(root), CONFIG_FILE);
  if (existsSync(configPath) && !opts.force) {
    throw new ConfigError(configPath, "already exists (use --force to overwrite)");
  }

  const remote: Record<string, string> = { kind: opts.remote.kind, url: opts.remote.url };
  if (opts.remote.ref) remote.ref = opts.remote.ref;
  if (opts.remote.path) remote.path = opts.remote.path;

  const config = {
    remote,
    sharedDir: ".rules/shared",
    overrideDir: ".rules/local",
    exclusiveCategories: [],
  };
  const raw = stringifyYaml(config);
  await writeFile(configPath, raw, "utf-8");
  await mkdir(join(resolve(root), config.overrideDir), { recursive: true });

  const project = new RuleProject({ root, config: parseProjectConfig(raw, configPath) });
  await project.saveState(await project.state());
  log.info("Initialized project", { configPath, remote: opts.remote.url });
  return configPath;
}
