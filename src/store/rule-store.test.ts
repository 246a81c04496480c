import { describe, it, expect, beforeEach } from "vitest";
import { RuleStore } from "./rule-store.js";
import { DuplicateIdentifierError } from "../errors.js";
import { makeDoc } from "../test/fixtures.js";

function ids(docs: Iterable<{ identifier: string }>): string[] {
  return [...docs].map((d) => d.identifier);
}

describe("RuleStore", () => {
  let store: RuleStore;

  beforeEach(() => {
    store = new RuleStore();
  });

  describe("add()", () => {
    it("inserts and replaces by identifier", () => {
      store.add(makeDoc({ identifier: "100-a.rule", body: "first" }));
      store.add(makeDoc({ identifier: "100-a.rule", body: "second" }));
      expect(store.size).toBe(1);
      expect(store.get("100-a.rule")?.body).toBe("second");
    });

    it("rejects a collision in strict mode", () => {
      const strict = new RuleStore({ strict: true });
      strict.add(makeDoc({ identifier: "100-a.rule" }));
      expect(() => strict.add(makeDoc({ identifier: "100-a.rule" }))).toThrow(DuplicateIdentifierError);
    });

    it("allows an explicit replace in strict mode", () => {
      const strict = new RuleStore({ strict: true });
      strict.add(makeDoc({ identifier: "100-a.rule", body: "old" }));
      strict.add(makeDoc({ identifier: "100-a.rule", body: "new" }), { replace: true });
      expect(strict.get("100-a.rule")?.body).toBe("new");
    });

    it("keeps a local and a remote document of the same identifier even in strict mode", () => {
      const strict = new RuleStore({ strict: true });
      strict.add(makeDoc({ identifier: "100-a.rule", source: "remote" }));
      strict.add(makeDoc({ identifier: "100-a.rule", source: "local" }));
      expect(strict.has("100-a.rule", "remote")).toBe(true);
      expect(strict.has("100-a.rule", "local")).toBe(true);
    });
  });

  describe("remove()", () => {
    it("is a no-op for an unknown identifier", () => {
      store.add(makeDoc({ identifier: "100-a.rule" }));
      expect(() => store.remove("missing.rule")).not.toThrow();
      expect(store.size).toBe(1);
    });

    it("removes a single layer when given a source", () => {
      store.add(makeDoc({ identifier: "100-a.rule", source: "remote", body: "remote" }));
      store.add(makeDoc({ identifier: "100-a.rule", source: "local", body: "local" }));
      store.remove("100-a.rule", "local");
      expect(store.get("100-a.rule")?.body).toBe("remote");
      store.remove("100-a.rule", "remote");
      expect(store.has("100-a.rule")).toBe(false);
      expect(store.size).toBe(0);
    });
  });

  describe("list()", () => {
    it("orders by priority, then identifier", () => {
      store.add(makeDoc({ identifier: "300-c.rule", priority: 300 }));
      store.add(makeDoc({ identifier: "100-b.rule", priority: 100 }));
      store.add(makeDoc({ identifier: "100-a.rule", priority: 100 }));
      expect(ids(store.list())).toEqual(["100-a.rule", "100-b.rule", "300-c.rule"]);
    });

    it("filters by scope", () => {
      store.add(makeDoc({ identifier: "css.rule", scope: { globs: ["*.css"], alwaysApply: false } }));
      store.add(makeDoc({ identifier: "ts.rule", scope: { globs: ["*.ts"], alwaysApply: false } }));
      store.add(makeDoc({ identifier: "manual.rule", scope: { globs: [], alwaysApply: false } }));
      expect(ids(store.list("src/app.css"))).toEqual(["css.rule"]);
      expect(ids(store.list())).toEqual(["css.rule", "manual.rule", "ts.rule"]);
    });

    it("yields the local override in place of the remote document", () => {
      store.add(makeDoc({ identifier: "100-a.rule", source: "remote", priority: 100, body: "remote" }));
      store.add(makeDoc({ identifier: "100-a.rule", source: "local", priority: 900, body: "local" }));
      const docs = [...store.list()];
      expect(docs).toHaveLength(1);
      expect(docs[0]?.body).toBe("local");
      expect(ids(store.shadowed())).toEqual(["100-a.rule"]);
    });

    it("is restartable and reflects later changes", () => {
      const listing = store.list();
      expect(ids(listing)).toEqual([]);
      store.add(makeDoc({ identifier: "100-a.rule" }));
      expect(ids(listing)).toEqual(["100-a.rule"]);
      expect(ids(listing)).toEqual(["100-a.rule"]);
    });
  });
});
