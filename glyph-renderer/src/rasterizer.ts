import { forEachPrimitive, type Model } from "mol-mesh";
import type { ProjectedVertices } from "./projector.js";
import { toScreen } from "./projector.js";
import type { Viewport } from "./types.js";

export interface SubcellBuffer {
  width: number;
  height: number;
  depth: Float32Array; // +Infinity where nothing was drawn
  attribute: Float32Array;
  owner: Int32Array; // primitive id, -1 where empty
  hasAttribute: boolean;
}

export interface RasterizeOptions {
  // Draw triangle outlines instead of filling them.
  wireframe?: boolean;
}

export function createSubcellBuffer(viewport: Viewport, hasAttribute = false): SubcellBuffer {
  const size = viewport.width * viewport.height;
  return {
    width: viewport.width,
    height: viewport.height,
    depth: new Float32Array(size).fill(Infinity),
    attribute: new Float32Array(size),
    owner: new Int32Array(size).fill(-1),
    hasAttribute,
  };
}

export function clearSubcellBuffer(buf: SubcellBuffer): void {
  buf.depth.fill(Infinity);
  buf.attribute.fill(0);
  buf.owner.fill(-1);
}

export function occupiedCount(buf: SubcellBuffer): number {
  let n = 0;
  for (let i = 0; i < buf.owner.length; i++) if (buf.owner[i] >= 0) n++;
  return n;
}

interface Band {
  y0: number;
  y1: number;
}

// Nearest wins; equal depths go to the lower primitive id so submission order never matters.
function plot(buf: SubcellBuffer, band: Band, x: number, y: number, depth: number, attr: number, id: number): void {
  if (x < 0 || x >= buf.width || y < band.y0 || y >= band.y1) return;
  const i = y * buf.width + x;
  const d = Math.fround(depth);
  const stored = buf.depth[i];
  if (d < stored || (d === stored && id < buf.owner[i])) {
    buf.depth[i] = d;
    buf.attribute[i] = attr;
    buf.owner[i] = id;
  }
}

type ScreenVertex = { x: number; y: number; depth: number; attr: number };

// Liang–Barsky against [0, width] × [0, height]; returns the clipped parameter range or null.
function clipSegment(a: ScreenVertex, b: ScreenVertex, width: number, height: number): [number, number] | null {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  let t0 = 0;
  let t1 = 1;
  const edges: Array<[number, number]> = [
    [-dx, a.x],
    [dx, width - a.x],
    [-dy, a.y],
    [dy, height - a.y],
  ];
  for (const [p, q] of edges) {
    if (p === 0) {
      if (q < 0) return null;
      continue;
    }
    const r = q / p;
    if (p < 0) {
      if (r > t1) return null;
      if (r > t0) t0 = r;
    } else {
      if (r < t0) return null;
      if (r < t1) t1 = r;
    }
  }
  return [t0, t1];
}

function lerpVertex(a: ScreenVertex, b: ScreenVertex, t: number): ScreenVertex {
  return {
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t,
    depth: a.depth + (b.depth - a.depth) * t,
    attr: a.attr + (b.attr - a.attr) * t,
  };
}

function drawLine(
  buf: SubcellBuffer,
  band: Band,
  proj: ProjectedVertices,
  attrs: Float32Array | undefined,
  ia: number,
  ib: number,
  id: number,
): void {
  const near = proj.projection.near;
  let da = proj.depth[ia];
  let db = proj.depth[ib];
  if (da < near && db < near) return;

  // Near-plane clip in camera space, then project the surviving endpoints.
  let ax = proj.cx[ia], ay = proj.cy[ia], aAttr = attrs ? attrs[ia] : 0;
  let bx = proj.cx[ib], by = proj.cy[ib], bAttr = attrs ? attrs[ib] : 0;
  if (da < near) {
    const t = (near - da) / (db - da);
    ax += (bx - ax) * t; ay += (by - ay) * t; aAttr += (bAttr - aAttr) * t; da = near;
  } else if (db < near) {
    const t = (near - db) / (da - db);
    bx += (ax - bx) * t; by += (ay - by) * t; bAttr += (aAttr - bAttr) * t; db = near;
  }
  const [asx, asy] = toScreen(ax, ay, da, proj.projection);
  const [bsx, bsy] = toScreen(bx, by, db, proj.projection);
  const a: ScreenVertex = { x: asx, y: asy, depth: da, attr: aAttr };
  const b: ScreenVertex = { x: bsx, y: bsy, depth: db, attr: bAttr };

  const range = clipSegment(a, b, buf.width, buf.height);
  if (!range) return;
  const p0 = lerpVertex(a, b, range[0]);
  const p1 = lerpVertex(a, b, range[1]);

  if (!Number.isFinite(p0.x + p0.y + p1.x + p1.y)) return;

  // Bresenham between the clipped endpoints; cells past the far edge are rejected by plot().
  let x0 = Math.floor(p0.x), y0 = Math.floor(p0.y);
  const x1 = Math.floor(p1.x), y1 = Math.floor(p1.y);
  const dx = Math.abs(x1 - x0), sx = x0 < x1 ? 1 : -1;
  const dy = -Math.abs(y1 - y0), sy = y0 < y1 ? 1 : -1;
  const steps = Math.max(1, Math.max(dx, -dy));
  let err = dx + dy;
  for (let step = 0; ; step++) {
    const t = Math.min(1, step / steps);
    plot(buf, band, x0, y0, p0.depth + (p1.depth - p0.depth) * t, p0.attr + (p1.attr - p0.attr) * t, id);
    if (x0 === x1 && y0 === y1) break;
    const e2 = 2 * err;
    if (e2 >= dy) { err += dy; x0 += sx; }
    if (e2 <= dx) { err += dx; y0 += sy; }
  }
}

function edge(ax: number, ay: number, bx: number, by: number, px: number, py: number): number {
  return (bx - ax) * (py - ay) - (by - ay) * (px - ax);
}

// Camera-space x/y before the perspective divide.
type CameraVertex = { x: number; y: number; depth: number; attr: number };

// One Sutherland–Hodgman pass against depth = near: 0, 3 or 4 vertices come out.
function clipNear(poly: readonly CameraVertex[], near: number): CameraVertex[] {
  const out: CameraVertex[] = [];
  for (let i = 0; i < poly.length; i++) {
    const a = poly[i];
    const b = poly[(i + 1) % poly.length];
    const aIn = a.depth >= near;
    if (aIn) out.push(a);
    if (aIn !== b.depth >= near) {
      const t = (near - a.depth) / (b.depth - a.depth);
      out.push({ x: a.x + (b.x - a.x) * t, y: a.y + (b.y - a.y) * t, depth: near, attr: a.attr + (b.attr - a.attr) * t });
    }
  }
  return out;
}

function fillTriangle(
  buf: SubcellBuffer,
  band: Band,
  proj: ProjectedVertices,
  attrs: Float32Array | undefined,
  ia: number,
  ib: number,
  ic: number,
  id: number,
): void {
  const vertex = (i: number) => ({ depth: proj.depth[i], attr: attrs ? attrs[i] : 0 });
  if (proj.inFront[ia] && proj.inFront[ib] && proj.inFront[ic]) {
    const screen = (i: number): ScreenVertex => ({ x: proj.sx[i], y: proj.sy[i], ...vertex(i) });
    fillScreenTriangle(buf, band, screen(ia), screen(ib), screen(ic), id);
    return;
  }

  // Straddles the near plane: clip in camera space, project, fan-fill the 3 or 4 corners.
  const camera = (i: number): CameraVertex => ({ x: proj.cx[i], y: proj.cy[i], ...vertex(i) });
  const clipped = clipNear([camera(ia), camera(ib), camera(ic)], proj.projection.near);
  const corners = clipped.map((v): ScreenVertex => {
    const [x, y] = toScreen(v.x, v.y, v.depth, proj.projection);
    return { x, y, depth: v.depth, attr: v.attr };
  });
  for (let k = 1; k + 1 < corners.length; k++) {
    fillScreenTriangle(buf, band, corners[0], corners[k], corners[k + 1], id);
  }
}

function fillScreenTriangle(buf: SubcellBuffer, band: Band, a: ScreenVertex, b: ScreenVertex, c: ScreenVertex, id: number): void {
  const ax = a.x, ay = a.y;
  const bx = b.x, by = b.y;
  const cx = c.x, cy = c.y;
  const area = edge(ax, ay, bx, by, cx, cy);
  if (area === 0 || !Number.isFinite(area)) return;

  const minX = Math.max(0, Math.floor(Math.min(ax, bx, cx)));
  const maxX = Math.min(buf.width - 1, Math.ceil(Math.max(ax, bx, cx)));
  const minY = Math.max(band.y0, Math.floor(Math.min(ay, by, cy)));
  const maxY = Math.min(band.y1 - 1, Math.ceil(Math.max(ay, by, cy)));
  const da = a.depth, db = b.depth, dc = c.depth;
  const ta = a.attr, tb = b.attr, tc = c.attr;
  const sign = area > 0 ? 1 : -1;

  for (let y = minY; y <= maxY; y++) {
    const py = y + 0.5;
    for (let x = minX; x <= maxX; x++) {
      const px = x + 0.5;
      const w0 = edge(bx, by, cx, cy, px, py) * sign;
      const w1 = edge(cx, cy, ax, ay, px, py) * sign;
      const w2 = edge(ax, ay, bx, by, px, py) * sign;
      if (w0 < 0 || w1 < 0 || w2 < 0) continue;
      const l0 = w0 / (area * sign), l1 = w1 / (area * sign), l2 = w2 / (area * sign);
      plot(buf, band, x, y, l0 * da + l1 * db + l2 * dc, l0 * ta + l1 * tb + l2 * tc, id);
    }
  }
}

/**
 * Rasterizes into sub-cell rows `[rowStart, rowEnd)` only. Primitives are clipped against the
 * whole viewport, so a frame drawn band by band equals the frame drawn at once.
 */
export function rasterizeRegion(
  buf: SubcellBuffer,
  model: Model,
  projected: ProjectedVertices,
  rowStart: number,
  rowEnd: number,
  opts: RasterizeOptions = {},
): SubcellBuffer {
  const band: Band = { y0: Math.max(0, rowStart), y1: Math.min(buf.height, rowEnd) };
  if (band.y0 >= band.y1 || buf.width === 0) return buf;
  const attrs = model.vertices.attributes;

  forEachPrimitive(model, (p) => {
    switch (p.kind) {
      case "point": {
        if (!projected.inFront[p.a]) return;
        const x = Math.floor(projected.sx[p.a]);
        const y = Math.floor(projected.sy[p.a]);
        plot(buf, band, x, y, projected.depth[p.a], attrs ? attrs[p.a] : 0, p.id);
        return;
      }
      case "line":
        drawLine(buf, band, projected, attrs, p.a, p.b, p.id);
        return;
      case "triangle":
        if (opts.wireframe) {
          drawLine(buf, band, projected, attrs, p.a, p.b, p.id);
          drawLine(buf, band, projected, attrs, p.b, p.c, p.id);
          drawLine(buf, band, projected, attrs, p.c, p.a, p.id);
        } else {
          fillTriangle(buf, band, projected, attrs, p.a, p.b, p.c, p.id);
        }
        return;
    }
  });
  return buf;
}

export function rasterize(model: Model, projected: ProjectedVertices, viewport: Viewport, opts: RasterizeOptions = {}): SubcellBuffer {
  const buf = createSubcellBuffer(viewport, model.vertices.attributes != null);
  return rasterizeRegion(buf, model, projected, 0, viewport.height, opts);
}
