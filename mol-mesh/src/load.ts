import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { Model } from "./types/model.js";
import { parseObjToModel, type ObjParseOptions } from "./obj/parse.js";
import { parsePdbToModel } from "./pdb/parse.js";
import { ModelUnavailableError } from "./utils/errors.js";
import { checkPymol, exportCartoon, pymolExecutable } from "./cartoon/pymol.js";
import { runCommand, type CommandRunner } from "./cartoon/exec.js";
import { downloadPdb } from "./rcsb/download.js";
import { isPdbId, type Fetcher } from "./rcsb/client.js";

export interface LoadOptions {
  chain?: string;
  primitives?: ObjParseOptions["primitives"];
  cacheDir?: string;
  runner?: CommandRunner;
  fetch?: Fetcher;
  pymol?: string;
  // Progress messages for the loading stage; stderr by default.
  log?: (message: string) => void;
}

export type InputKind = "obj" | "structure" | "pdbId";

export function classifyInput(input: string): InputKind {
  const lower = input.toLowerCase();
  if (lower.endsWith(".obj")) return "obj";
  if (lower.endsWith(".pdb") || lower.endsWith(".cif") || input.includes("/") || input.includes("\\")) return "structure";
  if (isPdbId(input)) return "pdbId";
  throw new Error(`Not a model file or PDB ID: ${input}`);
}

/**
 * Resolves a CLI input to a Model. Structures go through a PyMOL cartoon export
 * when PyMOL is available; otherwise `.pdb` files and PDB IDs fall back to the
 * backbone trace. Every failure surfaces as ModelUnavailableError.
 */
export async function loadModel(input: string, options: LoadOptions = {}): Promise<Model> {
  try {
    return await resolveModel(input, options);
  } catch (err) {
    throw new ModelUnavailableError(input, err);
  }
}

async function resolveModel(input: string, options: LoadOptions): Promise<Model> {
  const { chain, primitives, cacheDir, runner = runCommand, fetch: fetcher, pymol = pymolExecutable() } = options;
  const log = options.log ?? ((message: string) => console.error(message));
  const chains = chain ? [chain] : undefined;

  const readObj = async (path: string) =>
    parseObjToModel(await readFile(path, "utf8"), { primitives, source: basename(path) });
  const readPdb = async (path: string) =>
    parsePdbToModel(await readFile(path, "utf8"), { chains, source: basename(path) });

  const kind = classifyInput(input);
  if (kind === "obj") {
    log(`Loading ${input}...`);
    if (chain) log(`Ignoring chain ${chain}: OBJ files carry no chain information`);
    return readObj(input);
  }

  const tool = await checkPymol(runner, pymol);
  if (kind === "structure") {
    if (tool.ok) {
      log("Generating cartoon with PyMOL...");
      return readObj(await exportCartoon({ kind: "file", path: input }, { chain, cacheDir, runner, pymol }));
    }
    if (!input.toLowerCase().endsWith(".pdb")) throw new Error(tool.error);
    log(`${tool.error}; drawing the backbone trace instead`);
    return readPdb(input);
  }

  const pdbId = input.toUpperCase();
  if (tool.ok) {
    log(`Fetching ${pdbId} and generating cartoon with PyMOL...`);
    return readObj(await exportCartoon({ kind: "remote", pdbId }, { chain, cacheDir, runner, pymol }));
  }
  log(`${tool.error}; downloading ${pdbId}.pdb for a backbone trace`);
  return readPdb(await downloadPdb(pdbId, { cacheDir, fetch: fetcher }));
}
