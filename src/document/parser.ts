import { posix } from "node:path";
import { parse as parseYaml } from "yaml";
import type { ZodError } from "zod";
import { RuleHeaderSchema, type RuleDocument, type RuleSource } from "./types.js";
import { MalformedDocumentError } from "../errors.js";

export const DEFAULT_PRIORITY = 1000;

const HEADER_BLOCK = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)/;
const PRIORITY_PREFIX = /^(\d+)[-_.]/;
// `globs: *.css` and `- *.css` read as YAML aliases unless quoted.
const BARE_GLOB_VALUE = /^(globs:[ \t]*)([*{].*)$/gm;
const BARE_GLOB_ITEM = /^([ \t]*-[ \t]+)([*{].*)$/gm;

export interface ParseOptions {
  source: RuleSource;
  defaultPriority?: number;
  path?: string;
}

/** Leading number of the file name, e.g. 100 for "css/100-tailwind.mdc". */
export function priorityPrefix(identifier: string): number | undefined {
  const match = PRIORITY_PREFIX.exec(posix.basename(identifier));
  return match ? Number.parseInt(match[1], 10) : undefined;
}

export function splitHeader(raw: string): { header: string; body: string } | null {
  const text = raw.startsWith("\uFEFF") ? raw.slice(1) : raw;
  const match = HEADER_BLOCK.exec(text);
  if (!match) return null;
  return { header: match[1] ?? "", body: text.slice(match[0].length) };
}

function quote(value: string): string {
  return JSON.stringify(value.trim());
}

export function quoteBareGlobs(header: string): string {
  return header
    .replace(BARE_GLOB_VALUE, (_m, key: string, value: string) => key + quote(value))
    .replace(BARE_GLOB_ITEM, (_m, dash: string, value: string) => dash + quote(value));
}

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "header"}: ${issue.message}`).join("; ");
}

/**
 * Parse a rule file: a `---` YAML header followed by a body that is kept
 * byte for byte.
 */
export function parseRuleDocument(identifier: string, raw: string, opts: ParseOptions): RuleDocument {
  const parts = splitHeader(raw);
  if (!parts) {
    throw new MalformedDocumentError(identifier, "missing --- header block");
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(quoteBareGlobs(parts.header));
  } catch (e) {
    throw new MalformedDocumentError(identifier, `unparseable header: ${String(e)}`, e);
  }
  if (parsed == null) parsed = {};
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new MalformedDocumentError(identifier, "header is not a key/value mapping");
  }

  const result = RuleHeaderSchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedDocumentError(identifier, formatIssues(result.error), result.error);
  }
  const header = result.data;

  return {
    identifier,
    priority: priorityPrefix(identifier) ?? header.priority ?? opts.defaultPriority ?? DEFAULT_PRIORITY,
    scope: { globs: header.globs, alwaysApply: header.alwaysApply },
    description: header.description,
    category: header.category,
    version: header.version,
    body: parts.body,
    source: opts.source,
    path: opts.path,
  };
}
