import { realpath, rm, writeFile } from "node:fs/promises";
import { basename, extname, join } from "node:path";
import { ensureCacheDir, fileExists } from "../cache/cache.js";
import { CommandError, runCommand, type CommandRunner } from "./exec.js";

export type CartoonSource =
  | { kind: "remote"; pdbId: string }
  | { kind: "file"; path: string };

export interface CartoonExportOptions {
  chain?: string;
  cacheDir?: string;
  runner?: CommandRunner;
  // Executable name or path; TERMOL_PYMOL overrides the default.
  pymol?: string;
}

export type ToolCheck = { ok: true } | { ok: false; error: string };

export function pymolExecutable(env: NodeJS.ProcessEnv = process.env): string {
  return env.TERMOL_PYMOL || "pymol";
}

export async function checkPymol(runner: CommandRunner = runCommand, pymol: string = pymolExecutable()): Promise<ToolCheck> {
  try {
    await runner("which", [pymol]);
    return { ok: true };
  } catch (err) {
    if (err instanceof CommandError) return { ok: false, error: `PyMOL not found (${pymol}). Install PyMOL or set TERMOL_PYMOL` };
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

export function cartoonFileName(source: CartoonSource, chain?: string): string {
  const suffix = chain ? `_${chain.toUpperCase()}` : "";
  if (source.kind === "remote") return `${source.pdbId.toUpperCase()}${suffix}.obj`;
  const stem = basename(source.path, extname(source.path));
  return `local_${stem}${suffix}.obj`;
}

/** PyMOL command script that renders `source` as a cartoon and saves it to `objPath`. */
export function buildPymolScript(source: CartoonSource, objPath: string, opts: { chain?: string; fetchDir?: string } = {}): string {
  const lines: string[] = [];
  if (source.kind === "remote") {
    lines.push(`set fetch_path, ${opts.fetchDir ?? "."}`);
    lines.push(`fetch ${source.pdbId.toUpperCase()}, async=0`);
  } else {
    lines.push(`load ${source.path}`);
  }
  if (opts.chain) {
    lines.push(`select sel, chain ${opts.chain.toUpperCase()}`, "hide everything", "show cartoon, sel");
  } else {
    lines.push("hide everything", "show cartoon");
  }
  lines.push("set cartoon_sampling, 3", `save ${objPath}`, "quit");
  return lines.join("\n") + "\n";
}

/**
 * Produces a cartoon OBJ for a PDB ID or a local structure file and returns its
 * path. Remote exports are reused from the cache when present.
 */
export async function exportCartoon(source: CartoonSource, options: CartoonExportOptions = {}): Promise<string> {
  const { chain, runner = runCommand, pymol = pymolExecutable() } = options;
  const dir = await ensureCacheDir(options.cacheDir);

  const resolved: CartoonSource = source.kind === "file" ? { kind: "file", path: await realpath(source.path) } : source;
  const objPath = join(dir, cartoonFileName(resolved, chain));
  if (resolved.kind === "remote" && (await fileExists(objPath))) return objPath;

  const check = await checkPymol(runner, pymol);
  if (!check.ok) throw new Error(check.error);

  const scriptPath = join(dir, "pymol_script.pml");
  await writeFile(scriptPath, buildPymolScript(resolved, objPath, { chain, fetchDir: dir }), "utf8");
  try {
    await runner(pymol, ["-cq", scriptPath]);
  } catch (err) {
    if (err instanceof CommandError) throw new Error(`PyMOL failed: ${err.stderr.trim() || err.message}`, { cause: err });
    throw err;
  } finally {
    await rm(scriptPath, { force: true });
  }

  if (!(await fileExists(objPath))) {
    throw new Error(resolved.kind === "remote" ? "PyMOL did not create OBJ file. Check PDB ID." : "PyMOL did not create OBJ file.");
  }
  return objPath;
}
