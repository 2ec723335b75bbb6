import type { Model } from "../types/model.js";
import { createModel } from "../model/createModel.js";
import { MeshParseError } from "../utils/errors.js";
import { WarningCollector } from "../utils/warnings.js";
import { subsetModelByChains } from "../utils/subset.js";
import { forEachLine, parseFloatSafe, parseIntSafe, slice } from "../utils/text.js";

interface AtomRecord {
  name: string;
  altLoc: string;
  resName: string;
  chainID: string;
  resSeq: number;
  iCode: string;
  segment: number; // per-chain ordinal, advanced by TER
  x: number;
  y: number;
  z: number;
  occupancy: number | null;
}

export interface PdbParseOptions {
  // Select which MODEL to parse (1-based). Defaults to the first MODEL in the file.
  modelSelection?: number;
  // Keep only these chain ids (applied while loading; the renderer never filters).
  chains?: string[];
  // Consecutive trace points further apart than this (Å) are not joined.
  maxGap?: number;
  source?: string;
}

const PREFERRED_NAMES = new Set(["CA", "P"]);

/**
 * Parse PDB text into a backbone trace Model: one vertex per residue (CA or P,
 * else the first atom seen) joined by lines within each chain segment. The vertex
 * attribute is the residue rank along its chain, normalized to [0, 1].
 */
export function parsePdbToModel(pdbText: string, options: PdbParseOptions = {}): Model {
  const { modelSelection, chains: chainFilter, maxGap = 8.0, source } = options;
  const W = new WarningCollector();

  const atoms: AtomRecord[] = [];
  const segmentByChain = new Map<string, number>();
  let currentModel: number | null = null;
  let effectiveModelSelection: number | undefined = undefined;
  let seenModelRecords = false;
  let modelCount = 0;

  const inSelectedModel = () => {
    if (!seenModelRecords) return true;
    return currentModel !== null && currentModel === effectiveModelSelection;
  };

  forEachLine(pdbText, (line, lineNum) => {
    if (line.length < 6) return;
    const rec = slice(line, 0, 6).toUpperCase();
    if (rec.startsWith("MODEL")) {
      seenModelRecords = true;
      modelCount++;
      const m = parseIntSafe(slice(line, 10, 14)) ?? modelCount;
      currentModel = m;
      if (effectiveModelSelection === undefined) effectiveModelSelection = modelSelection ?? m;
      return;
    }
    if (rec.startsWith("ENDMDL")) { currentModel = null; return; }

    if (rec.startsWith("ATOM  ")) {
      if (!inSelectedModel()) return;
      const chainID = slice(line, 21, 22).trim() || " ";
      const x = parseFloatSafe(slice(line, 30, 38));
      const y = parseFloatSafe(slice(line, 38, 46));
      const z = parseFloatSafe(slice(line, 46, 54));
      if (x == null || y == null || z == null) { W.add(`Line ${lineNum}: missing coordinates in ATOM`); return; }
      atoms.push({
        name: slice(line, 12, 16).trim().toUpperCase(),
        altLoc: slice(line, 16, 17).trim(),
        resName: slice(line, 17, 20).trim(),
        chainID,
        resSeq: parseIntSafe(slice(line, 22, 26)) ?? 0,
        iCode: slice(line, 26, 27).trim(),
        segment: segmentByChain.get(chainID) ?? 0,
        x, y, z,
        occupancy: parseFloatSafe(slice(line, 54, 60)),
      });
      return;
    }

    if (rec.startsWith("TER")) {
      if (!inSelectedModel()) return;
      const last = atoms[atoms.length - 1];
      const tChain = slice(line, 21, 22).trim() || last?.chainID || " ";
      segmentByChain.set(tChain, (segmentByChain.get(tChain) ?? 0) + 1);
    }
  });

  if (atoms.length === 0) throw new MeshParseError("No ATOM records found in PDB");

  const finalAtoms = resolveAltLocs(atoms, W);

  // Representative atom per residue, in order of first appearance.
  const residueOrder: string[] = [];
  const repByResidue = new Map<string, AtomRecord>();
  for (const a of finalAtoms) {
    const key = `${a.chainID}|${a.segment}|${a.resSeq}|${a.iCode}|${a.resName}`;
    const prev = repByResidue.get(key);
    if (!prev) {
      residueOrder.push(key);
      repByResidue.set(key, a);
    } else if (!PREFERRED_NAMES.has(prev.name) && PREFERRED_NAMES.has(a.name)) {
      repByResidue.set(key, a);
    }
  }

  const chainIdToIndex = new Map<string, number>();
  const chains: { id: string }[] = [];
  const residuesByChain = new Map<number, AtomRecord[]>();
  for (const key of residueOrder) {
    const a = repByResidue.get(key);
    if (!a) continue;
    let ci = chainIdToIndex.get(a.chainID);
    if (ci == null) {
      ci = chains.length;
      chainIdToIndex.set(a.chainID, ci);
      chains.push({ id: a.chainID });
      residuesByChain.set(ci, []);
    }
    residuesByChain.get(ci)?.push(a);
  }

  const positions: number[] = [];
  const attributes: number[] = [];
  const chainIndex: number[] = [];
  const lines: number[] = [];
  const maxGap2 = maxGap * maxGap;
  for (const [ci, residues] of residuesByChain) {
    const span = residues.length > 1 ? residues.length - 1 : 1;
    for (let r = 0; r < residues.length; r++) {
      const a = residues[r];
      const vi = positions.length / 3;
      positions.push(a.x, a.y, a.z);
      attributes.push(r / span);
      chainIndex.push(ci);
      if (r === 0) continue;
      const p = residues[r - 1];
      if (p.segment !== a.segment) continue;
      const dx = a.x - p.x, dy = a.y - p.y, dz = a.z - p.z;
      if (dx * dx + dy * dy + dz * dz > maxGap2) { W.add(`Chain ${a.chainID}: gap before residue ${a.resSeq}`); continue; }
      lines.push(vi - 1, vi);
    }
  }

  const model = createModel({
    positions,
    attributes,
    chainIndex,
    lines,
    chains,
    metadata: { source, format: "pdb", warnings: W.toArray() },
  });

  if (!chainFilter || chainFilter.length === 0) return model;
  const subset = subsetModelByChains(model, chainFilter);
  if (subset.vertices.count === 0) {
    throw new MeshParseError(`No residues for chain ${chainFilter.join(",")} (available: ${chains.map((c) => c.id).join(",")})`);
  }
  return subset;
}

function resolveAltLocs(atoms: AtomRecord[], W: WarningCollector): AtomRecord[] {
  const bestByKey = new Map<string, AtomRecord>();
  const order: string[] = [];
  for (const a of atoms) {
    const k = `${a.chainID}|${a.segment}|${a.resSeq}|${a.iCode}|${a.resName}|${a.name}`;
    const prev = bestByKey.get(k);
    if (!prev) {
      order.push(k);
      bestByKey.set(k, a);
    } else if ((a.occupancy ?? 1.0) > (prev.occupancy ?? 1.0)) {
      bestByKey.set(k, a);
    }
  }
  const out: AtomRecord[] = [];
  for (const k of order) {
    const a = bestByKey.get(k);
    if (a) out.push(a);
  }
  const dropped = atoms.length - out.length;
  if (dropped > 0) W.add(`AltLoc resolution: kept highest-occupancy sites, dropped ${dropped} atoms`);
  return out;
}
