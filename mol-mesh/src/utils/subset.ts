import type { Model } from "../types/model.js";
import { createModel } from "../model/createModel.js";

/**
 * Keeps the vertices of the listed chains (by chain id, case-insensitive) and the
 * primitives whose vertices all survive, remapping indices and the chain table.
 * Models without chain information are returned unchanged.
 */
export function subsetModelByChains(model: Model, chainIds: string[]): Model {
  const chainsOld = model.tables?.chains;
  const atomChain = model.vertices.chainIndex;
  if (!chainsOld || !atomChain) return model;

  const wanted = new Set(chainIds.map((c) => c.toUpperCase()));
  const chainOldToNew = new Map<number, number>();
  const chainsNew: { id: string }[] = [];
  for (let i = 0; i < chainsOld.length; i++) {
    if (wanted.has(chainsOld[i].id.toUpperCase())) {
      chainOldToNew.set(i, chainsNew.length);
      chainsNew.push({ id: chainsOld[i].id });
    }
  }

  const countOld = model.vertices.count;
  const vertexOldToNew = new Int32Array(countOld).fill(-1);
  let countNew = 0;
  for (let vi = 0; vi < countOld; vi++) {
    if (chainOldToNew.has(atomChain[vi])) vertexOldToNew[vi] = countNew++;
  }

  const posOld = model.vertices.positions;
  const attrOld = model.vertices.attributes;
  const positions = new Float32Array(countNew * 3);
  const attributes = attrOld ? new Float32Array(countNew) : undefined;
  const chainIndex = new Uint32Array(countNew);
  for (let vi = 0; vi < countOld; vi++) {
    const idx = vertexOldToNew[vi];
    if (idx < 0) continue;
    positions[idx * 3] = posOld[vi * 3];
    positions[idx * 3 + 1] = posOld[vi * 3 + 1];
    positions[idx * 3 + 2] = posOld[vi * 3 + 2];
    if (attributes && attrOld) attributes[idx] = attrOld[vi];
    chainIndex[idx] = chainOldToNew.get(atomChain[vi]) ?? 0;
  }

  const remap = (indices: Uint32Array, arity: number): number[] => {
    const out: number[] = [];
    for (let i = 0; i < indices.length; i += arity) {
      const mapped: number[] = [];
      for (let k = 0; k < arity; k++) mapped.push(vertexOldToNew[indices[i + k]]);
      if (mapped.every((m) => m >= 0)) out.push(...mapped);
    }
    return out;
  };

  return createModel({
    positions,
    attributes,
    chainIndex,
    points: remap(model.points, 1),
    lines: remap(model.lines, 2),
    triangles: remap(model.triangles, 3),
    chains: chainsNew,
    metadata: model.metadata,
  });
}
