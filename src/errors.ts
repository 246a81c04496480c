export type ErrorKind =
  | "DuplicateIdentifierKind"
  | "RuleConflictKind"
  | "SyncUnavailableKind"
  | "SyncConflictKind"
  | "MalformedDocumentKind"
  | "ConfigKind";

export abstract class RuleShareError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    message: string,
    public readonly identifiers: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Only an unreachable remote is expected to clear up on a later attempt. */
  get isRetryable(): boolean {
    return this.kind === "SyncUnavailableKind";
  }
}

export class DuplicateIdentifierError extends RuleShareError {
  readonly kind = "DuplicateIdentifierKind";

  constructor(identifier: string, source: string) {
    super(`Rule "${identifier}" is already present in the ${source} layer`, [identifier]);
  }
}

export class RuleConflictError extends RuleShareError {
  readonly kind = "RuleConflictKind";

  constructor(
    public readonly category: string,
    identifiers: [string, string],
    public readonly path?: string,
  ) {
    const where = path ? ` for "${path}"` : "";
    super(
      `Rules "${identifiers[0]}" and "${identifiers[1]}" both apply${where} in exclusive category "${category}"`,
      identifiers,
    );
  }
}

export class SyncUnavailableError extends RuleShareError {
  readonly kind = "SyncUnavailableKind";

  constructor(
    public readonly remote: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Remote ${remote} is unavailable: ${reason}`, [], { cause });
  }
}

/** Reported as a warning: a local override hides a remote copy that differs from it. */
export class SyncConflictError extends RuleShareError {
  readonly kind = "SyncConflictKind";

  constructor(
    identifier: string,
    public readonly remoteChanged: boolean,
  ) {
    const detail = remoteChanged ? "remote copy changed in this sync" : "contents differ";
    super(`Local override "${identifier}" shadows the remote rule (${detail})`, [identifier]);
  }
}

export class MalformedDocumentError extends RuleShareError {
  readonly kind = "MalformedDocumentKind";

  constructor(identifier: string, reason: string, cause?: unknown) {
    super(`Malformed rule document "${identifier}": ${reason}`, [identifier], { cause });
  }
}

export class ConfigError extends RuleShareError {
  readonly kind = "ConfigKind";

  constructor(
    public readonly filePath: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Invalid configuration in ${filePath}: ${reason}`, [], { cause });
  }
}

export function isRuleShareError(e: unknown): e is RuleShareError {
  return e instanceof RuleShareError;
}

/** One line for terminal output: kind, message and the offending identifiers. */
export function describeError(e: unknown): string {
  if (isRuleShareError(e)) {
    const ids = e.identifiers.length > 0 ? ` [${e.identifiers.join(", ")}]` : "";
    return `${e.kind}: ${e.message}${ids}`;
  }
  return e instanceof Error ? e.message : String(e);
}
