import type { RuleDocument, RuleSource } from "../document/types.js";
import { normalizePath, scopeMatches } from "../document/scope.js";
import { DuplicateIdentifierError } from "../errors.js";
import { createLogger } from "../util/logger.js";

const log = createLogger("rule-store");

interface Slot {
  local?: RuleDocument;
  remote?: RuleDocument;
}

export interface RuleStoreOptions {
  /** Reject a second document for the same identifier and source unless `replace` is given. */
  strict?: boolean;
}

export interface AddOptions {
  replace?: boolean;
}

export function compareDocuments(a: RuleDocument, b: RuleDocument): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.identifier < b.identifier) return -1;
  if (a.identifier > b.identifier) return 1;
  return 0;
}

/**
 * Rule documents keyed by identifier, with one layer per source. A local
 * override hides the remote document of the same identifier whatever their
 * priorities.
 */
export class RuleStore {
  private slots = new Map<string, Slot>();
  private readonly strict: boolean;

  constructor(opts: RuleStoreOptions = {}) {
    this.strict = opts.strict ?? false;
  }

  add(document: RuleDocument, opts: AddOptions = {}): void {
    const slot = this.slots.get(document.identifier) ?? {};
    const existing = slot[document.source];
    if (existing && this.strict && !opts.replace) {
      throw new DuplicateIdentifierError(document.identifier, document.source);
    }
    slot[document.source] = document;
    this.slots.set(document.identifier, slot);
    log.debug(existing ? "Rule replaced" : "Rule added", {
      identifier: document.identifier,
      source: document.source,
    });
  }

  /** Removing an absent identifier is a no-op. */
  remove(identifier: string, source?: RuleSource): void {
    const slot = this.slots.get(identifier);
    if (!slot) return;
    if (source) {
      delete slot[source];
    }
    if (!source || (!slot.local && !slot.remote)) {
      this.slots.delete(identifier);
    }
    log.debug("Rule removed", { identifier, source: source ?? "all" });
  }

  get(identifier: string): RuleDocument | undefined {
    const slot = this.slots.get(identifier);
    return slot ? (slot.local ?? slot.remote) : undefined;
  }

  has(identifier: string, source?: RuleSource): boolean {
    const slot = this.slots.get(identifier);
    if (!slot) return false;
    return source ? slot[source] !== undefined : true;
  }

  /**
   * Effective documents whose scope matches `scopeFilter` (all of them when
   * omitted), by priority then identifier. Each iteration re-reads the store.
   */
  list(scopeFilter?: string): Iterable<RuleDocument> {
    const path = scopeFilter === undefined ? undefined : normalizePath(scopeFilter);
    const slots = this.slots;
    return {
      *[Symbol.iterator]() {
        const matching: RuleDocument[] = [];
        for (const slot of slots.values()) {
          const doc = slot.local ?? slot.remote;
          if (!doc) continue;
          if (path === undefined || scopeMatches(doc.scope, path)) matching.push(doc);
        }
        matching.sort(compareDocuments);
        yield* matching;
      },
    };
  }

  /** Remote documents hidden by a local override of the same identifier. */
  shadowed(): RuleDocument[] {
    const hidden: RuleDocument[] = [];
    for (const slot of this.slots.values()) {
      if (slot.local && slot.remote) hidden.push(slot.remote);
    }
    return hidden.sort(compareDocuments);
  }

  clear(): void {
    this.slots.clear();
  }

  get size(): number {
    return this.slots.size;
  }
}
