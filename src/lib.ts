export { RuleProject, initProject, type RuleProjectOptions, type LoadReport, type InitOptions } from "./project.js";
export { RuleStore, compareDocuments, type RuleStoreOptions, type AddOptions } from "./store/rule-store.js";
export { loadRuleDirectory, type LoadDirectoryOptions, type LoadDirectoryResult } from "./store/loader.js";
export { PriorityResolver, type ResolvedRule, type ResolverOptions, type RuleConflict } from "./resolver/resolver.js";
export { SyncCoordinator, lockPathFor, type SyncCoordinatorOptions } from "./sync/coordinator.js";
export { DirectoryRemoteSource, GitRemoteSource, createRemoteSource, treeRevision } from "./sync/remote.js";
export { SyncStateStore } from "./sync/state-store.js";
export { withLock, LockTimeoutError, type LockOptions } from "./sync/lock.js";
export type { SyncState, SyncStatus, SyncSummary, RemoteSource, RemoteTree } from "./sync/types.js";
export { parseRuleDocument, priorityPrefix, splitHeader, DEFAULT_PRIORITY } from "./document/parser.js";
export { scopeMatches, scopesOverlap } from "./document/scope.js";
export type { RuleDocument, RuleScope, RuleSource, RuleHeader } from "./document/types.js";
export { loadProjectConfig, parseProjectConfig, CONFIG_FILE } from "./config/loader.js";
export type { ProjectConfig, RemoteConfig, LockConfig } from "./config/types.js";
export {
  RuleShareError,
  DuplicateIdentifierError,
  RuleConflictError,
  SyncUnavailableError,
  SyncConflictError,
  MalformedDocumentError,
  ConfigError,
  describeError,
  isRuleShareError,
  type ErrorKind,
} from "./errors.js";
export { createLogger, setLogLevel, type LogLevel, type Logger } from "./util/logger.js";
