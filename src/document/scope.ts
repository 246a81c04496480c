import micromatch from "micromatch";
import type { RuleScope } from "./types.js";

const MATCH_OPTIONS = { basename: true, dot: true };

export function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, "/").replace(/^(?:\.\/)+/, "");
}

export function isManual(scope: RuleScope): boolean {
  return !scope.alwaysApply && scope.globs.length === 0;
}

export function scopeMatches(scope: RuleScope, filePath: string): boolean {
  if (scope.alwaysApply) return true;
  if (scope.globs.length === 0) return false;
  return micromatch.isMatch(normalizePath(filePath), scope.globs, MATCH_OPTIONS);
}

/**
 * Approximate overlap between two scopes. Globs are compared against each
 * other as if one were a path, so `src/*.css` overlaps `*.css` but two
 * unrelated wildcards such as `a*` and `*b` are not detected.
 */
export function scopesOverlap(a: RuleScope, b: RuleScope): boolean {
  if (isManual(a) || isManual(b)) return false;
  if (a.alwaysApply || b.alwaysApply) return true;
  return a.globs.some((p) =>
    b.globs.some(
      (q) => p === q || micromatch.isMatch(p, q, MATCH_OPTIONS) || micromatch.isMatch(q, p, MATCH_OPTIONS),
    ),
  );
}
