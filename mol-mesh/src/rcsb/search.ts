import { ENTRY_URL, SEARCH_URL, fetchOk, type Fetcher } from "./client.js";

export interface PdbSearchResult {
  pdbId: string;
  title: string;
}

export type SearchOutcome = { ok: true; results: PdbSearchResult[] } | { ok: false; error: string };

export interface SearchOptions {
  fetch?: Fetcher;
  rows?: number;
}

function searchBody(query: string, rows: number) {
  return {
    query: { type: "terminal", service: "full_text", parameters: { value: query } },
    return_type: "entry",
    request_options: { paginate: { start: 0, rows }, results_content_type: ["experimental"] },
  };
}

function readIdentifiers(body: unknown): string[] {
  if (typeof body !== "object" || body === null || !("result_set" in body)) return [];
  const set = body.result_set;
  if (!Array.isArray(set)) return [];
  const ids: string[] = [];
  for (const entry of set) {
    if (typeof entry !== "object" || entry === null || !("identifier" in entry)) continue;
    const id = entry.identifier;
    if (typeof id === "string" && /^[A-Za-z0-9]{4}$/.test(id)) ids.push(id);
  }
  return ids;
}

function readTitle(body: unknown): string {
  if (typeof body !== "object" || body === null || !("struct" in body)) return "";
  const struct = body.struct;
  if (typeof struct !== "object" || struct === null || !("title" in struct)) return "";
  return typeof struct.title === "string" ? struct.title : "";
}

export async function fetchEntryTitle(pdbId: string, fetcher: Fetcher = fetch): Promise<string> {
  const res = await fetchOk(fetcher, `${ENTRY_URL}/${pdbId}`);
  return readTitle(await res.json());
}

/**
 * Full-text search against RCSB. Titles are looked up per entry; a failed
 * lookup leaves that title empty rather than failing the search.
 */
export async function searchPdb(query: string, options: SearchOptions = {}): Promise<SearchOutcome> {
  const { fetch: fetcher = fetch, rows = 10 } = options;
  let ids: string[];
  try {
    const res = await fetchOk(fetcher, SEARCH_URL, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(searchBody(query, rows)),
    });
    // RCSB answers 204 with an empty body when nothing matches
    ids = res.status === 204 ? [] : readIdentifiers(await res.json());
  } catch (err) {
    return { ok: false, error: `Search request failed: ${err instanceof Error ? err.message : String(err)}` };
  }

  const results = await Promise.all(
    ids.slice(0, rows).map(async (pdbId): Promise<PdbSearchResult> => {
      const title = await fetchEntryTitle(pdbId, fetcher).catch(() => "");
      return { pdbId, title };
    }),
  );
  return { ok: true, results };
}
