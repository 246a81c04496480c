import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { createLogger, formatEntry, getLogLevel, isLogLevel, setLogLevel } from "./logger.js";

describe("logger", () => {
  let stderr: MockInstance<typeof console.error>;
  const initial = getLogLevel();

  beforeEach(() => {
    stderr = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    stderr.mockRestore();
    setLogLevel(initial);
  });

  it("formats level, component and data", () => {
    const line = formatEntry("warn", "store", "Shadowed", { id: "a.md" });
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN\] \[store\] Shadowed \{"id":"a\.md"\}$/);
  });

  it("leaves out empty data", () => {
    expect(formatEntry("info", "cli", "Hello", {})).toMatch(/\[INFO\] \[cli\] Hello$/);
  });

  it("drops entries below the current level", () => {
    setLogLevel("warn");
    const log = createLogger("test");
    log.info("quiet");
    log.warn("loud");
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0]?.[0])).toContain("[WARN] [test] loud");
  });

  it("emits nothing when silent", () => {
    setLogLevel("silent");
    createLogger("test").error("nope");
    expect(stderr).not.toHaveBeenCalled();
  });

  it("recognizes level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
