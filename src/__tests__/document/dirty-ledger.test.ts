import { describe, expect, it } from "vitest";
import { createDirtyLedger } from "../../document/dirty-ledger.js";

const createFixture = () => {
  const values = new Map<string, unknown>();
  const tracked = new Set(["name", "tags", "seen"]);
  const ledger = createDirtyLedger(
    (name) => values.get(name) ?? null,
    (name) => tracked.has(name),
  );
  return { values, tracked, ledger };
};

describe("createDirtyLedger()", () => {
  it("keeps the value from before the first write", () => {
    const { values, ledger } = createFixture();
    ledger.record("name", "a");
    values.set("name", "b");
    ledger.record("name", "b");
    values.set("name", "c");
    expect(ledger.changeFor("name")).toEqual(["a", "c"]);
    expect(ledger.wasValue("name")).toBe("a");
  });

  it("compares dates, sets and maps by content", () => {
    const { values, ledger } = createFixture();
    ledger.record("seen", new Date(1000));
    values.set("seen", new Date(1000));
    ledger.record("tags", new Set(["x"]));
    values.set("tags", new Set(["x"]));
    ledger.record("name", new Map([["k", [1]]]));
    values.set("name", new Map([["k", [1]]]));
    expect(ledger.changedFields().size).toBe(0);
  });

  it("drops the entry when marked clean at the current value", () => {
    const { values, ledger } = createFixture();
    ledger.record("name", "a");
    values.set("name", "b");
    ledger.markClean("name", "b");
    expect(ledger.changeFor("name")).toBeUndefined();
  });

  it("keeps a different clean value as the new baseline", () => {
    const { values, ledger } = createFixture();
    values.set("name", "b");
    ledger.markClean("name", "a");
    expect(ledger.changeFor("name")).toEqual(["a", "b"]);
  });

  it("ignores fields that are no longer tracked", () => {
    const { values, tracked, ledger } = createFixture();
    ledger.record("name", "a");
    values.set("name", "b");
    tracked.delete("name");
    expect(ledger.changedFields().size).toBe(0);
    expect(ledger.changeFor("name")).toBeUndefined();
  });

  it("forgets everything on markAllClean()", () => {
    const { values, ledger } = createFixture();
    ledger.record("name", "a");
    values.set("name", "b");
    ledger.markAllClean();
    expect(ledger.changedFields().size).toBe(0);
    expect(ledger.wasValue("name")).toBe("b");
  });
});
