import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { ensureCacheDir, fileExists } from "../cache/cache.js";
import { DOWNLOAD_URL, fetchOk, type Fetcher } from "./client.js";

export interface DownloadOptions {
  cacheDir?: string;
  fetch?: Fetcher;
}

/** Downloads `<ID>.pdb` into the cache, reusing a file already there. Returns its path. */
export async function downloadPdb(pdbId: string, options: DownloadOptions = {}): Promise<string> {
  const { fetch: fetcher = fetch } = options;
  const dir = await ensureCacheDir(options.cacheDir);
  const id = pdbId.toUpperCase();
  const path = join(dir, `${id}.pdb`);
  if (await fileExists(path)) return path;
  const res = await fetchOk(fetcher, `${DOWNLOAD_URL}/${id}.pdb`);
  await writeFile(path, await res.text(), "utf8");
  return path;
}
