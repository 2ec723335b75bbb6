import { Vector3 } from "three";
import type { Model } from "mol-mesh";
import type { Camera } from "./camera.js";
import { viewMatrix } from "./camera.js";
import type { GlyphMode, Viewport } from "./types.js";

const CELL_SIZE: Record<GlyphMode, { cellW: number; cellH: number }> = {
  braille: { cellW: 2, cellH: 4 },
  block: { cellW: 2, cellH: 2 },
  quadrant: { cellW: 2, cellH: 2 },
};

export function createViewport(cols: number, rows: number, mode: GlyphMode): Viewport {
  const { cellW, cellH } = CELL_SIZE[mode];
  const c = Math.max(0, Math.floor(cols));
  const r = Math.max(0, Math.floor(rows));
  return { cols: c, rows: r, mode, cellW, cellH, width: c * cellW, height: r * cellH };
}

export interface ProjectOptions {
  fov?: number; // horizontal, radians
  near?: number;
}

export interface Projection {
  focal: number;
  // Terminal cells are about twice as tall as wide; 2×2 modes get tall sub-cells.
  yScale: number;
  near: number;
  width: number;
  height: number;
}

export interface ProjectedVertices {
  count: number;
  sx: Float32Array;
  sy: Float32Array;
  depth: Float32Array;
  // Camera-space x/y after pan, kept for near-plane clipping.
  cx: Float32Array;
  cy: Float32Array;
  inFront: Uint8Array;
  projection: Projection;
}

export function createProjection(viewport: Viewport, opts: ProjectOptions = {}): Projection {
  const { fov = 1.7, near = 0.1 } = opts;
  return {
    focal: viewport.width / 2 / Math.tan(fov / 2),
    yScale: viewport.cellH / (2 * viewport.cellW),
    near,
    width: viewport.width,
    height: viewport.height,
  };
}

/** Perspective divide of a camera-space point; `depth` must be positive. */
export function toScreen(x: number, y: number, depth: number, p: Projection): [number, number] {
  return [p.width / 2 + (p.focal * x) / depth, p.height / 2 - (p.focal * p.yScale * y) / depth];
}

export function projectModel(model: Model, camera: Camera, viewport: Viewport, opts: ProjectOptions = {}): ProjectedVertices {
  const projection = createProjection(viewport, opts);
  const n = model.vertices.count;
  const pos = model.vertices.positions;
  const out: ProjectedVertices = {
    count: n,
    sx: new Float32Array(n),
    sy: new Float32Array(n),
    depth: new Float32Array(n),
    cx: new Float32Array(n),
    cy: new Float32Array(n),
    inFront: new Uint8Array(n),
    projection,
  };

  const view = viewMatrix(camera);
  const v = new Vector3();
  for (let i = 0; i < n; i++) {
    v.set(pos[i * 3], pos[i * 3 + 1], pos[i * 3 + 2]).applyMatrix4(view);
    const x = v.x - camera.pan.x;
    const y = v.y - camera.pan.y;
    const depth = -v.z;
    out.cx[i] = x;
    out.cy[i] = y;
    out.depth[i] = depth;
    if (depth < projection.near) continue;
    out.inFront[i] = 1;
    const [sx, sy] = toScreen(x, y, depth, projection);
    out.sx[i] = sx;
    out.sy[i] = sy;
  }
  return out;
}

/** Integer sub-cell under a screen position, or null outside `[0, width) × [0, height)`. */
export function subcellOf(sx: number, sy: number, viewport: Viewport): { x: number; y: number } | null {
  const x = Math.floor(sx);
  const y = Math.floor(sy);
  if (!(x >= 0 && x < viewport.width && y >= 0 && y < viewport.height)) return null;
  return { x, y };
}
