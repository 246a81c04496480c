import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { RuleDocument } from "../document/types.js";

export function makeDoc(overrides: Partial<RuleDocument> & Pick<RuleDocument, "identifier">): RuleDocument {
  return {
    priority: 100,
    scope: { globs: [], alwaysApply: true },
    description: "",
    version: "0.0.0",
    body: `body of ${overrides.identifier}`,
    source: "remote",
    ...overrides,
  };
}

export function ruleFile(header: Record<string, string>, body: string): string {
  const lines = Object.entries(header).map(([key, value]) => `${key}: ${value}`);
  return ["---", ...lines, "---", body].join("\n");
}

export function makeTempDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "ruleshare-test-"));
  return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}
