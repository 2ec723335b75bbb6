import { describe, it, expect } from "vitest";
import { createModel, subsetModelByChains } from "../src/index.js";

const model = createModel({
  positions: [0, 0, 0, 1, 0, 0, 2, 0, 0, 3, 0, 0],
  attributes: [0, 1, 0, 1],
  chainIndex: [0, 0, 1, 1],
  lines: [0, 1, 1, 2, 2, 3],
  chains: [{ id: "A" }, { id: "B" }],
});

describe("subsetModelByChains", () => {
  it("keeps the vertices and primitives of the listed chains", () => {
    const sub = subsetModelByChains(model, ["B"]);
    expect(sub.vertices.count).toBe(2);
    expect(Array.from(sub.vertices.positions)).toEqual([2, 0, 0, 3, 0, 0]);
    expect(Array.from(sub.vertices.attributes ?? [])).toEqual([0, 1]);
    expect(Array.from(sub.vertices.chainIndex ?? [])).toEqual([0, 0]);
    expect(Array.from(sub.lines)).toEqual([0, 1]);
    expect(sub.tables?.chains).toEqual([{ id: "B" }]);
  });

  it("drops primitives that straddle a removed chain", () => {
    const sub = subsetModelByChains(model, ["a"]);
    expect(Array.from(sub.lines)).toEqual([0, 1]);
    expect(sub.bbox).toEqual({ min: [0, 0, 0], max: [1, 0, 0] });
  });

  it("returns models without chain data unchanged", () => {
    const plain = createModel({ positions: [0, 0, 0] });
    expect(subsetModelByChains(plain, ["A"])).toBe(plain);
  });
});
