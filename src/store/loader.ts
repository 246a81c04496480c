import { join } from "node:path";
import type { RuleStore } from "./rule-store.js";
import type { RuleSource } from "../document/types.js";
import { parseRuleDocument } from "../document/parser.js";
import { MalformedDocumentError } from "../errors.js";
import { isNotFound, readRuleTree } from "../util/files.js";
import { createLogger } from "../util/logger.js";

const log = createLogger("rule-loader");

export interface LoadDirectoryOptions {
  source: RuleSource;
  extensions: readonly string[];
  defaultPriority?: number;
}

export interface LoadDirectoryResult {
  loaded: string[];
  malformed: MalformedDocumentError[];
}

/**
 * Parse every rule file under `dir` into `store`. A missing directory loads
 * nothing; malformed files are returned rather than added.
 */
export async function loadRuleDirectory(
  store: RuleStore,
  dir: string,
  opts: LoadDirectoryOptions,
): Promise<LoadDirectoryResult> {
  let files: Map<string, string>;
  try {
    files = await readRuleTree(dir, opts.extensions);
  } catch (e) {
    if (isNotFound(e)) {
      log.debug("Rule directory missing", { dir, source: opts.source });
      return { loaded: [], malformed: [] };
    }
    throw e;
  }

  const loaded: string[] = [];
  const malformed: MalformedDocumentError[] = [];
  for (const [identifier, raw] of files) {
    try {
      const doc = parseRuleDocument(identifier, raw, {
        source: opts.source,
        defaultPriority: opts.defaultPriority,
        path: join(dir, identifier),
      });
      store.add(doc);
      loaded.push(identifier);
    } catch (e) {
      if (!(e instanceof MalformedDocumentError)) throw e;
      log.error("Skipping malformed rule", { dir, identifier, error: e.message });
      malformed.push(e);
    }
  }

  log.info("Loaded rule directory", { dir, source: opts.source, count: loaded.length });
  return { loaded, malformed };
}
