import { describe, it, expect } from "vitest";
import { isManual, normalizePath, scopeMatches, scopesOverlap } from "./scope.js";

const css = { globs: ["*.css"], alwaysApply: false };
const always = { globs: [], alwaysApply: true };
const manual = { globs: [], alwaysApply: false };

describe("normalizePath", () => {
  it("uses forward slashes and drops a leading ./", () => {
    expect(normalizePath("./src\\app.css")).toBe("src/app.css");
  });
});

describe("scopeMatches", () => {
  it("matches slash-free globs against the basename", () => {
    expect(scopeMatches(css, "app.css")).toBe(true);
    expect(scopeMatches(css, "src/styles/app.css")).toBe(true);
    expect(scopeMatches(css, "app.scss")).toBe(false);
  });

  it("matches globs with slashes against the whole path", () => {
    const src = { globs: ["src/**/*.ts"], alwaysApply: false };
    expect(scopeMatches(src, "src/a/b.ts")).toBe(true);
    expect(scopeMatches(src, "lib/b.ts")).toBe(false);
  });

  it("matches brace alternatives", () => {
    const ts = { globs: ["**/*.{ts,tsx}"], alwaysApply: false };
    expect(scopeMatches(ts, "src/app.tsx")).toBe(true);
    expect(scopeMatches(ts, "src/app.ts")).toBe(true);
    expect(scopeMatches(ts, "src/app.js")).toBe(false);
  });

  it("applies always-apply scopes everywhere and manual scopes nowhere", () => {
    expect(scopeMatches(always, "anything/at/all.txt")).toBe(true);
    expect(scopeMatches(manual, "app.css")).toBe(false);
    expect(isManual(manual)).toBe(true);
    expect(isManual(css)).toBe(false);
  });
});

describe("scopesOverlap", () => {
  it("detects globs that cover each other", () => {
    expect(scopesOverlap(css, { globs: ["src/*.css"], alwaysApply: false })).toBe(true);
    expect(scopesOverlap(css, { globs: ["*.css"], alwaysApply: false })).toBe(true);
  });

  it("reports disjoint globs as separate", () => {
    expect(scopesOverlap(css, { globs: ["*.ts"], alwaysApply: false })).toBe(false);
  });

  it("treats always-apply as overlapping anything but manual", () => {
    expect(scopesOverlap(always, css)).toBe(true);
    expect(scopesOverlap(always, manual)).toBe(false);
  });
});
