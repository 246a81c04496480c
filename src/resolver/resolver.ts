import type { RuleStore } from "../store/rule-store.js";
import type { RuleDocument, RuleSource } from "../document/types.js";
import { scopesOverlap } from "../document/scope.js";
import { RuleConflictError } from "../errors.js";
import { createLogger } from "../util/logger.js";

const log = createLogger("resolver");

export interface ResolvedRule {
  identifier: string;
  body: string;
  priority: number;
  source: RuleSource;
}

export interface ResolverOptions {
  /** Categories of which at most one rule may apply to a given file. */
  exclusiveCategories?: readonly string[];
}

export interface RuleConflict {
  category: string;
  documents: [RuleDocument, RuleDocument];
}

export class PriorityResolver {
  private exclusive: Set<string>;

  constructor(
    private store: RuleStore,
    opts: ResolverOptions = {},
  ) {
    this.exclusive = new Set(opts.exclusiveCategories ?? []);
  }

  /**
   * Rule bodies that apply to `filePath`, in load order. Local overrides have
   * already replaced remote documents of the same identifier in the store.
   */
  resolve(filePath: string): ResolvedRule[] {
    const applicable = [...this.store.list(filePath)];

    const seen = new Map<string, RuleDocument>();
    for (const doc of applicable) {
      if (!doc.category || !this.exclusive.has(doc.category)) continue;
      const first = seen.get(doc.category);
      if (first) {
        log.warn("Exclusive rules collide", {
          path: filePath,
          category: doc.category,
          rules: [first.identifier, doc.identifier],
        });
        throw new RuleConflictError(doc.category, [first.identifier, doc.identifier], filePath);
      }
      seen.set(doc.category, doc);
    }

    log.debug("Resolved rules", { path: filePath, count: applicable.length });
    return applicable.map((doc) => ({
      identifier: doc.identifier,
      body: doc.body,
      priority: doc.priority,
      source: doc.source,
    }));
  }

  /** Every pair of exclusive-category documents whose scopes can apply to the same file. */
  conflicts(): RuleConflict[] {
    const byCategory = new Map<string, RuleDocument[]>();
    for (const doc of this.store.list()) {
      if (!doc.category || !this.exclusive.has(doc.category)) continue;
      const group = byCategory.get(doc.category) ?? [];
      group.push(doc);
      byCategory.set(doc.category, group);
    }

    const found: RuleConflict[] = [];
    for (const [category, docs] of byCategory) {
      for (let i = 0; i < docs.length; i++) {
        for (let j = i + 1; j < docs.length; j++) {
          if (scopesOverlap(docs[i].scope, docs[j].scope)) {
            found.push({ category, documents: [docs[i], docs[j]] });
          }
        }
      }
    }
    return found;
  }
}
