export type Fetcher = (url: string, init?: RequestInit) => Promise<Response>;

export const SEARCH_URL = "https://search.rcsb.org/rcsbsearch/v2/query";
export const ENTRY_URL = "https://data.rcsb.org/rest/v1/core/entry";
export const DOWNLOAD_URL = "https://files.rcsb.org/download";

const PDB_ID = /^[0-9][A-Za-z0-9]{3}$/;

export function isPdbId(input: string): boolean {
  return PDB_ID.test(input);
}

export async function fetchOk(fetcher: Fetcher, url: string, init?: RequestInit): Promise<Response> {
  const res = await fetcher(url, init);
  if (!res.ok) throw new Error(`${init?.method ?? "GET"} ${url} failed with HTTP ${res.status}`);
  return res;
}
