import { z } from "zod";

const SEMVER = /^\d+\.\d+\.\d+(?:-[0-9A-Za-z.-]+)?(?:\+[0-9A-Za-z.-]+)?$/;

/** Splits on commas outside `{...}`, so "*.{ts,tsx}, *.md" gives two globs. */
export function splitGlobList(value: string): string[] {
  const globs: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === "{") depth++;
    else if (ch === "}" && depth > 0) depth--;
    else if (ch === "," && depth === 0) {
      globs.push(value.slice(start, i));
      start = i + 1;
    }
  }
  globs.push(value.slice(start));
  return globs;
}

// "*.ts, *.tsx" and ["*.ts", "*.tsx"] are both seen in the wild.
const GlobsSchema = z
  .union([z.string(), z.array(z.string())])
  .nullish()
  .transform((value) => {
    if (value == null) return [];
    const list = Array.isArray(value) ? value : splitGlobList(value);
    return list.map((g) => g.trim()).filter((g) => g.length > 0);
  });

export const RuleHeaderSchema = z.object({
  description: z
    .string()
    .nullish()
    .transform((d) => d ?? ""),
  globs: GlobsSchema,
  alwaysApply: z
    .boolean()
    .nullish()
    .transform((v) => v ?? false),
  category: z
    .string()
    .min(1)
    .nullish()
    .transform((c) => c ?? undefined),
  version: z
    .union([z.string(), z.number()])
    .nullish()
    .transform((v) => (v == null ? "0.0.0" : String(v)))
    .pipe(z.string().regex(SEMVER, "expected a semantic version")),
  priority: z
    .number()
    .int()
    .nullish()
    .transform((p) => p ?? undefined),
});

export type RuleHeader = z.infer<typeof RuleHeaderSchema>;

export type RuleSource = "local" | "remote";

export interface RuleScope {
  globs: string[];
  alwaysApply: boolean;
}

export interface RuleDocument {
  /** Path relative to the rule directory, with forward slashes. */
  identifier: string;
  priority: number;
  scope: RuleScope;
  description: string;
  category?: string;
  version: string;
  body: string;
  source: RuleSource;
  /** Absolute path when loaded from disk. */
  path?: string;
}
