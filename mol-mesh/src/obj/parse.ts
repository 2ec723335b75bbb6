import type { Model } from "../types/model.js";
import { createModel } from "../model/createModel.js";
import { MeshParseError } from "../utils/errors.js";
import { WarningCollector } from "../utils/warnings.js";
import { forEachLine, parseFloatSafe, parseIntSafe } from "../utils/text.js";

export interface ObjParseOptions {
  // 'triangles' => fan-triangulate polygons into filled faces; 'edges' => wireframe of polygon edges
  primitives?: "triangles" | "edges";
  // Edges shorter than this (model units) are dropped in 'edges' mode
  minEdgeLength?: number;
  // Upper bound on edge count in 'edges' mode; larger meshes are decimated evenly
  maxEdges?: number;
  source?: string;
}

const DEDUP_SCALE = 1000;

function resolveIndex(token: string, vertexCount: number): number | null {
  const head = token.split("/")[0] ?? "";
  const k = parseIntSafe(head);
  if (k == null || k === 0) return null;
  return k > 0 ? k - 1 : vertexCount + k;
}

export function parseObjToModel(objText: string, options: ObjParseOptions = {}): Model {
  const { primitives = "edges", minEdgeLength = 0.1, maxEdges = 50000, source } = options;
  const W = new WarningCollector();

  const text = objText.replace(/\\\r?\n/g, " ");
  const positions: number[] = [];
  const faces: number[][] = [];
  const polylines: number[][] = [];

  forEachLine(text, (line, lineNum) => {
    const tokens = line.split(/\s+/).filter((s) => s.length > 0);
    const rec = tokens[0];
    if (rec === "v") {
      if (tokens.length < 4) { W.add(`Line ${lineNum}: vertex with fewer than 3 coordinates`); return; }
      const x = parseFloatSafe(tokens[1] ?? "");
      const y = parseFloatSafe(tokens[2] ?? "");
      const z = parseFloatSafe(tokens[3] ?? "");
      if (x == null || y == null || z == null) throw new MeshParseError("invalid vertex coordinate", lineNum);
      positions.push(x, y, z);
      return;
    }
    if (rec === "f" || rec === "fo" || rec === "l") {
      const vertexCount = positions.length / 3;
      const idx: number[] = [];
      for (let t = 1; t < tokens.length; t++) {
        const i = resolveIndex(tokens[t] ?? "", vertexCount);
        if (i == null) W.add(`Line ${lineNum}: unreadable vertex reference '${tokens[t]}'`);
        else idx.push(i);
      }
      if (idx.length < 2) return;
      if (rec === "l") polylines.push(idx);
      else faces.push(idx);
    }
  });

  const count = positions.length / 3;
  if (count === 0) throw new MeshParseError("No vertices found in OBJ");

  const inRange = (poly: number[]) => {
    const ok = poly.every((i) => i >= 0 && i < count);
    if (!ok) W.add(`Dropped primitive referencing a missing vertex (${poly.join(",")})`);
    return ok;
  };
  const validFaces = faces.filter(inRange);
  const validPolylines = polylines.filter(inRange);

  // Normalized rank over the referenced index range; cartoon exports emit vertices N->C.
  let minIdx = Infinity, maxIdx = -Infinity;
  for (const poly of [...validFaces, ...validPolylines]) {
    for (const i of poly) { if (i < minIdx) minIdx = i; if (i > maxIdx) maxIdx = i; }
  }
  if (!Number.isFinite(minIdx)) { minIdx = 0; maxIdx = count - 1; }
  const range = maxIdx > minIdx ? maxIdx - minIdx : 1;
  const attributes = new Float32Array(count);
  for (let i = 0; i < count; i++) attributes[i] = Math.min(1, Math.max(0, (i - minIdx) / range));

  const lines: number[] = [];
  for (const poly of validPolylines) {
    for (let j = 0; j < poly.length - 1; j++) lines.push(poly[j], poly[j + 1]);
  }

  const triangles: number[] = [];
  if (primitives === "triangles") {
    for (const f of validFaces) {
      if (f.length === 2) { lines.push(f[0], f[1]); continue; }
      for (let j = 1; j < f.length - 1; j++) triangles.push(f[0], f[j], f[j + 1]);
    }
  } else {
    const edges = collectEdges(validFaces, positions, minEdgeLength);
    const step = edges.length > maxEdges ? Math.ceil(edges.length / maxEdges) : 1;
    if (step > 1) W.add(`Decimated ${edges.length} edges by ${step}`);
    for (let e = 0; e < edges.length; e += step) lines.push(edges[e][0], edges[e][1]);
  }

  return createModel({
    positions,
    attributes,
    lines,
    triangles,
    metadata: { source, format: "obj", warnings: W.toArray() },
  });
}

function collectEdges(faces: number[][], positions: number[], minEdgeLength: number): Array<[number, number]> {
  const q = (i: number) =>
    `${Math.round(positions[i * 3] * DEDUP_SCALE)},${Math.round(positions[i * 3 + 1] * DEDUP_SCALE)},${Math.round(positions[i * 3 + 2] * DEDUP_SCALE)}`;
  const seen = new Set<string>();
  const out: Array<[number, number]> = [];
  const minLen2 = minEdgeLength * minEdgeLength;
  for (const f of faces) {
    const n = f.length;
    const edgeCount = n === 2 ? 1 : n;
    for (let j = 0; j < edgeCount; j++) {
      const a = f[j], b = f[(j + 1) % n];
      const ka = q(a), kb = q(b);
      const key = ka < kb ? `${ka}|${kb}` : `${kb}|${ka}`;
      if (seen.has(key)) continue;
      seen.add(key);
      const dx = positions[b * 3] - positions[a * 3];
      const dy = positions[b * 3 + 1] - positions[a * 3 + 1];
      const dz = positions[b * 3 + 2] - positions[a * 3 + 2];
      if (dx * dx + dy * dy + dz * dz < minLen2) continue;
      out.push([a, b]);
    }
  }
  return out;
}
