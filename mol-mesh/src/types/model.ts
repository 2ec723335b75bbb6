export type Vec3Tuple = [number, number, number];

export type PrimitiveKind = "point" | "line" | "triangle";

/**
 * A single drawable primitive. `id` is stable for the lifetime of the model:
 * points come first, then lines, then triangles.
 */
export type Primitive =
  | { kind: "point"; id: number; a: number }
  | { kind: "line"; id: number; a: number; b: number }
  | { kind: "triangle"; id: number; a: number; b: number; c: number };

export interface Model {
  vertices: {
    count: number;
    positions: Float32Array; // length = count * 3
    attributes?: Float32Array; // length = count, normalized [0, 1] (e.g. N->C rank)
    chainIndex?: Uint32Array; // maps vertex -> chain table index
  };
  points: Uint32Array; // one vertex index per point
  lines: Uint32Array; // pairs
  triangles: Uint32Array; // triples
  tables?: {
    chains?: { id: string }[];
  };
  bbox?: { min: Vec3Tuple; max: Vec3Tuple };
  metadata?: {
    source?: string;
    format?: "obj" | "pdb";
    warnings?: string[];
  };
}

export interface ModelBounds {
  min: Vec3Tuple;
  max: Vec3Tuple;
  center: Vec3Tuple;
  diagonal: number;
}
