import { describe, it, expect } from "vitest";
import { WarningCollector } from "../src/index.js";

describe("WarningCollector", () => {
  it("keeps messages in order", () => {
    const w = new WarningCollector();
    w.add("first");
    w.add("second");
    expect(w.toArray()).toEqual(["first", "second"]);
    expect(w.size).toBe(2);
  });

  it("counts messages past the limit", () => {
    const w = new WarningCollector(2);
    for (const m of ["a", "b", "c", "d"]) w.add(m);
    expect(w.size).toBe(4);
    expect(w.toArray()).toEqual(["a", "b", "... and 2 more warnings"]);
  });

  it("returns a copy", () => {
    const w = new WarningCollector();
    w.add("a");
    w.toArray().push("b");
    expect(w.toArray()).toEqual(["a"]);
  });
});
