import { describe, it, expect } from "vitest";
import { createModel } from "mol-mesh";
import { createCamera, createViewport, projectModel, subcellOf } from "../src/index.js";

const cube = createModel({
  positions: [-1, -1, -1, 1, -1, -1, -1, 1, -1, 1, 1, -1, -1, -1, 1, 1, -1, 1, -1, 1, 1, 1, 1, 1],
});

describe("createViewport", () => {
  it("sizes the sub-cell grid per glyph mode", () => {
    expect(createViewport(10, 5, "braille")).toMatchObject({ cellW: 2, cellH: 4, width: 20, height: 20 });
    expect(createViewport(10, 5, "block")).toMatchObject({ cellW: 2, cellH: 2, width: 20, height: 10 });
    expect(createViewport(10, 5, "quadrant")).toMatchObject({ width: 20, height: 10 });
  });
});

describe("projectModel", () => {
  it("maps the camera target to the viewport center", () => {
    const model = createModel({ positions: [-1, -1, -1, 0, 0, 0, 1, 1, 1] });
    const p = projectModel(model, createCamera({ distance: 5 }), createViewport(10, 5, "braille"));
    expect(p.sx[1]).toBeCloseTo(10, 5);
    expect(p.sy[1]).toBeCloseTo(10, 5);
    expect(p.depth[1]).toBeCloseTo(5, 5);
    expect(p.inFront[1]).toBe(1);
  });

  it("flags vertices behind the near plane", () => {
    const model = createModel({ positions: [0, 0, 0, 0, 0, 10] });
    const p = projectModel(model, createCamera({ distance: 5 }), createViewport(10, 5, "braille"));
    expect(Array.from(p.inFront)).toEqual([1, 0]);
  });

  it("keeps a framed model inside the viewport for any orbit", () => {
    const viewport = createViewport(40, 20, "braille");
    const diagonal = Math.hypot(2, 2, 2);
    for (const yaw of [-3, -1.5, 0, 0.3, 1.2, 3.1]) {
      for (const pitch of [-2, -0.7, 0, 0.2, 1.5]) {
        const cam = createCamera({ yaw, pitch, distance: diagonal * 1.2, minDistance: 0.05 * diagonal, maxDistance: 10 * diagonal });
        const p = projectModel(cube, cam, viewport);
        for (let i = 0; i < p.count; i++) {
          expect(p.inFront[i]).toBe(1);
          const cell = subcellOf(p.sx[i], p.sy[i], viewport);
          expect(cell).not.toBeNull();
          if (cell) {
            expect(cell.x).toBeGreaterThanOrEqual(0);
            expect(cell.x).toBeLessThan(viewport.width);
            expect(cell.y).toBeGreaterThanOrEqual(0);
            expect(cell.y).toBeLessThan(viewport.height);
          }
        }
      }
    }
  });
});

describe("subcellOf", () => {
  const viewport = createViewport(10, 5, "braille");

  it("includes the lower edge and excludes the upper edge", () => {
    expect(subcellOf(0, 0, viewport)).toEqual({ x: 0, y: 0 });
    expect(subcellOf(19.99, 19.99, viewport)).toEqual({ x: 19, y: 19 });
    expect(subcellOf(20, 0, viewport)).toBeNull();
    expect(subcellOf(0, 20, viewport)).toBeNull();
    expect(subcellOf(-0.01, 0, viewport)).toBeNull();
  });
});
