import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { loadRuleDirectory } from "./loader.js";
import { RuleStore } from "./rule-store.js";
import { DEFAULT_EXTENSIONS } from "../util/files.js";
import { makeTempDir, ruleFile } from "../test/fixtures.js";

describe("loadRuleDirectory", () => {
  let dir: string;
  let cleanup: () => void;
  let store: RuleStore;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
    store = new RuleStore();
  });

  afterEach(() => cleanup());

  it("loads rule files recursively and skips other files", async () => {
    writeFileSync(join(dir, "100-base.md"), ruleFile({ alwaysApply: "true" }, "Base."));
    mkdirSync(join(dir, "css"));
    writeFileSync(join(dir, "css", "200-tailwind.mdc"), ruleFile({ globs: '"*.css"' }, "Tailwind."));
    writeFileSync(join(dir, "README.txt"), "not a rule");

    const result = await loadRuleDirectory(store, dir, { source: "remote", extensions: DEFAULT_EXTENSIONS });

    expect(result.loaded.sort()).toEqual(["100-base.md", "css/200-tailwind.mdc"]);
    expect(result.malformed).toEqual([]);
    const tailwind = store.get("css/200-tailwind.mdc");
    expect(tailwind?.priority).toBe(200);
    expect(tailwind?.source).toBe("remote");
    expect(tailwind?.body).toBe("Tailwind.");
    expect(tailwind?.path).toBe(join(dir, "css/200-tailwind.mdc"));
  });

  it("reports malformed files without adding them", async () => {
    writeFileSync(join(dir, "100-ok.md"), ruleFile({ alwaysApply: "true" }, "Fine."));
    writeFileSync(join(dir, "200-broken.md"), "no header here");

    const result = await loadRuleDirectory(store, dir, { source: "local", extensions: DEFAULT_EXTENSIONS });

    expect(result.loaded).toEqual(["100-ok.md"]);
    expect(result.malformed.map((e) => e.identifiers)).toEqual([["200-broken.md"]]);
    expect(store.has("200-broken.md")).toBe(false);
  });

  it("loads nothing from a missing directory", async () => {
    const result = await loadRuleDirectory(store, join(dir, "nope"), {
      source: "local",
      extensions: DEFAULT_EXTENSIONS,
    });
    expect(result).toEqual({ loaded: [], malformed: [] });
    expect(store.size).toBe(0);
  });

  it("applies the default priority to unprefixed files", async () => {
    writeFileSync(join(dir, "general.md"), ruleFile({ alwaysApply: "true" }, "General."));
    await loadRuleDirectory(store, dir, { source: "local", extensions: DEFAULT_EXTENSIONS, defaultPriority: 42 });
    expect(store.get("general.md")?.priority).toBe(42);
  });
});
