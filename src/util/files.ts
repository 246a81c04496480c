import { readdir, readFile } from "node:fs/promises";
import { join, posix } from "node:path";

export const DEFAULT_EXTENSIONS = [".md", ".mdc", ".rule"];

export function hasRuleExtension(name: string, extensions: readonly string[]): boolean {
  return extensions.some((ext) => name.endsWith(ext));
}

/**
 * Identifier (posix path relative to `root`) to content for every rule file
 * under `root`. Hidden entries such as `.git` are skipped. Throws when `root`
 * cannot be read.
 */
export async function readRuleTree(root: string, extensions: readonly string[]): Promise<Map<string, string>> {
  const files = new Map<string, string>();

  async function walk(dir: string, prefix: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;
      const identifier = prefix ? posix.join(prefix, entry.name) : entry.name;
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath, identifier);
      } else if (entry.isFile() && hasRuleExtension(entry.name, extensions)) {
        files.set(identifier, await readFile(fullPath, "utf-8"));
      }
    }
  }

  await walk(root, "");
  return files;
}

export function hasErrorCode(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

export function isNotFound(e: unknown): boolean {
  return hasErrorCode(e, "ENOENT");
}
