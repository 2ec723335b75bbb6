import { describe, it, expect } from "vitest";
import { createModel, emptyModel } from "mol-mesh";
import { createCamera, createViewport, occupiedCells, renderFrame } from "../src/index.js";

const model = createModel({
  positions: [-1, -1, 0, 1, -1, 0, 0, 1, 0, -1.5, 1, -0.5, 1.5, -1, 0.5],
  attributes: [0, 0.25, 0.5, 0.75, 1],
  lines: [3, 4],
  triangles: [0, 1, 2],
});
const camera = createCamera({ yaw: 0.3, pitch: 0.2, distance: 4 });

describe("renderFrame", () => {
  it("is idempotent", () => {
    const viewport = createViewport(30, 12, "braille");
    expect(renderFrame(model, camera, viewport)).toEqual(renderFrame(model, camera, viewport));
  });

  it("renders nothing for an empty model", () => {
    for (const mode of ["braille", "block", "quadrant"] as const) {
      const frame = renderFrame(emptyModel(), createCamera(), createViewport(20, 10, mode));
      expect(frame.cells).toHaveLength(200);
      expect(occupiedCells(frame)).toBe(0);
    }
  });

  it("changes colors but not glyphs when the gradient changes", () => {
    const viewport = createViewport(30, 12, "braille");
    const warm = renderFrame(model, camera, viewport, { gradient: "coolwarm" });
    const green = renderFrame(model, camera, viewport, { gradient: "greens" });
    expect(green.cells.map((c) => c.glyph)).toEqual(warm.cells.map((c) => c.glyph));
    expect(green.cells.map((c) => c.color)).not.toEqual(warm.cells.map((c) => c.color));
    expect(occupiedCells(warm)).toBeGreaterThan(0);
  });

  it("survives a zero-sized viewport", () => {
    const frame = renderFrame(model, camera, createViewport(0, 0, "braille"));
    expect(frame.cells).toEqual([]);
  });
});
