import { access, mkdir, readdir, rm, stat } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

export interface CacheInfo {
  dir: string;
  files: number;
  bytes: number;
}

export function cacheDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.TERMOL_CACHE_DIR) return env.TERMOL_CACHE_DIR;
  const base = env.XDG_CACHE_HOME || join(env.HOME || homedir(), ".cache");
  return join(base, "termol");
}

export async function fileExists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false,
  );
}

export async function ensureCacheDir(dir: string = cacheDir()): Promise<string> {
  await mkdir(dir, { recursive: true });
  return dir;
}

export async function cacheInfo(dir: string = cacheDir()): Promise<CacheInfo> {
  await ensureCacheDir(dir);
  let files = 0;
  let bytes = 0;
  for (const ent of await readdir(dir, { withFileTypes: true })) {
    if (!ent.isFile()) continue;
    files++;
    bytes += (await stat(join(dir, ent.name))).size;
  }
  return { dir, files, bytes };
}

/** Removes regular files from the cache directory; returns how many were removed. */
export async function cacheClear(dir: string = cacheDir()): Promise<number> {
  await ensureCacheDir(dir);
  let removed = 0;
  for (const ent of await readdir(dir, { withFileTypes: true })) {
    if (!ent.isFile()) continue;
    await rm(join(dir, ent.name));
    removed++;
  }
  return removed;
}
