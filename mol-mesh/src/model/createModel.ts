import type { Model, ModelBounds, Primitive, Vec3Tuple } from "../types/model.js";
import { MeshParseError } from "../utils/errors.js";

export interface ModelInput {
  positions: Float32Array | number[];
  attributes?: Float32Array | number[];
  chainIndex?: Uint32Array | number[];
  points?: Uint32Array | number[];
  lines?: Uint32Array | number[];
  triangles?: Uint32Array | number[];
  chains?: { id: string }[];
  metadata?: Model["metadata"];
}

function checkIndices(name: string, indices: Uint32Array, arity: number, vertexCount: number): void {
  if (indices.length % arity !== 0) {
    throw new MeshParseError(`${name} index buffer length ${indices.length} is not a multiple of ${arity}`);
  }
  for (let i = 0; i < indices.length; i++) {
    if (indices[i] >= vertexCount) {
      throw new MeshParseError(`${name} index ${indices[i]} out of range (vertex count ${vertexCount})`);
    }
  }
}

/**
 * Build a Model from loose arrays, validating every primitive index against the
 * vertex count and computing the bounding box.
 */
export function createModel(input: ModelInput): Model {
  const positions = input.positions instanceof Float32Array ? input.positions : new Float32Array(input.positions);
  if (positions.length % 3 !== 0) throw new MeshParseError(`positions length ${positions.length} is not a multiple of 3`);
  const count = positions.length / 3;

  const attributes = input.attributes == null
    ? undefined
    : input.attributes instanceof Float32Array ? input.attributes : new Float32Array(input.attributes);
  if (attributes && attributes.length !== count) {
    throw new MeshParseError(`attributes length ${attributes.length} does not match vertex count ${count}`);
  }
  const chainIndex = input.chainIndex == null
    ? undefined
    : input.chainIndex instanceof Uint32Array ? input.chainIndex : new Uint32Array(input.chainIndex);

  const toIndices = (arr: Uint32Array | number[] | undefined) =>
    arr == null ? new Uint32Array(0) : arr instanceof Uint32Array ? arr : new Uint32Array(arr);
  const points = toIndices(input.points);
  const lines = toIndices(input.lines);
  const triangles = toIndices(input.triangles);
  checkIndices("point", points, 1, count);
  checkIndices("line", lines, 2, count);
  checkIndices("triangle", triangles, 3, count);

  let minX = Infinity, minY = Infinity, minZ = Infinity;
  let maxX = -Infinity, maxY = -Infinity, maxZ = -Infinity;
  for (let i = 0; i < count; i++) {
    const x = positions[i * 3], y = positions[i * 3 + 1], z = positions[i * 3 + 2];
    if (x < minX) minX = x; if (y < minY) minY = y; if (z < minZ) minZ = z;
    if (x > maxX) maxX = x; if (y > maxY) maxY = y; if (z > maxZ) maxZ = z;
  }

  return {
    vertices: { count, positions, attributes, chainIndex },
    points,
    lines,
    triangles,
    tables: input.chains ? { chains: input.chains } : undefined,
    bbox: count > 0 ? { min: [minX, minY, minZ], max: [maxX, maxY, maxZ] } : undefined,
    metadata: input.metadata,
  };
}

export function emptyModel(): Model {
  return createModel({ positions: [] });
}

export function isEmptyModel(model: Model): boolean {
  return model.vertices.count === 0;
}

export function primitiveCount(model: Model): number {
  return model.points.length + model.lines.length / 2 + model.triangles.length / 3;
}

/** Visits every primitive as a tagged variant, in id order. */
export function forEachPrimitive(model: Model, visit: (p: Primitive) => void): void {
  let id = 0;
  const { points, lines, triangles } = model;
  for (let i = 0; i < points.length; i++) visit({ kind: "point", id: id++, a: points[i] });
  for (let i = 0; i < lines.length; i += 2) visit({ kind: "line", id: id++, a: lines[i], b: lines[i + 1] });
  for (let i = 0; i < triangles.length; i += 3) {
    visit({ kind: "triangle", id: id++, a: triangles[i], b: triangles[i + 1], c: triangles[i + 2] });
  }
}

export function modelBounds(model: Model): ModelBounds {
  if (!model.bbox) {
    return { min: [0, 0, 0], max: [0, 0, 0], center: [0, 0, 0], diagonal: 0 };
  }
  const { min, max } = model.bbox;
  const center: Vec3Tuple = [(min[0] + max[0]) / 2, (min[1] + max[1]) / 2, (min[2] + max[2]) / 2];
  const diagonal = Math.hypot(max[0] - min[0], max[1] - min[1], max[2] - min[2]);
  return { min: [...min], max: [...max], center, diagonal };
}
