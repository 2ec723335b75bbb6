import { describe, it, expect } from "vitest";
import { searchPdb, isPdbId, type Fetcher } from "../src/index.js";

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });

describe("searchPdb", () => {
  it("returns identifiers with their titles", async () => {
    const requests: { url: string; init?: RequestInit }[] = [];
    const fetcher: Fetcher = async (url, init) => {
      requests.push({ url, init });
      if (url.startsWith("https://search.rcsb.org")) {
        return json({ result_set: [{ identifier: "1CRN", score: 1 }, { identifier: "4HHB", score: 0.9 }, { identifier: "not-an-id" }] });
      }
      if (url.endsWith("/1CRN")) return json({ struct: { title: "TEST PROTEIN ONE" } });
      return json({ message: "unavailable" }, 500);
    };

    const outcome = await searchPdb("test protein", { fetch: fetcher });
    expect(outcome).toEqual({
      ok: true,
      results: [
        { pdbId: "1CRN", title: "TEST PROTEIN ONE" },
        { pdbId: "4HHB", title: "" },
      ],
    });

    const search = requests[0];
    expect(search?.url).toBe("https://search.rcsb.org/rcsbsearch/v2/query");
    expect(search?.init?.method).toBe("POST");
    const body: unknown = typeof search?.init?.body === "string" ? JSON.parse(search.init.body) : null;
    expect(body).toMatchObject({
      query: { type: "terminal", service: "full_text", parameters: { value: "test protein" } },
      return_type: "entry",
      request_options: { paginate: { start: 0, rows: 10 } },
    });
    expect(requests.map((r) => r.url).slice(1).sort()).toEqual([
      "https://data.rcsb.org/rest/v1/core/entry/1CRN",
      "https://data.rcsb.org/rest/v1/core/entry/4HHB",
    ]);
  });

  it("treats an empty answer as no results", async () => {
    const fetcher: Fetcher = async () => new Response(null, { status: 204 });
    expect(await searchPdb("nothing", { fetch: fetcher })).toEqual({ ok: true, results: [] });
  });

  it("reports a failed request", async () => {
    const fetcher: Fetcher = async () => {
      throw new Error("offline");
    };
    expect(await searchPdb("anything", { fetch: fetcher })).toEqual({ ok: false, error: "Search request failed: offline" });
  });

  it("reports an HTTP error", async () => {
    const fetcher: Fetcher = async () => json({}, 400);
    expect(await searchPdb("anything", { fetch: fetcher })).toEqual({
      ok: false,
      error: "Search request failed: POST https://search.rcsb.org/rcsbsearch/v2/query failed with HTTP 400",
    });
  });
});

describe("isPdbId", () => {
  it("accepts four-character identifiers starting with a digit", () => {
    expect(isPdbId("1crn")).toBe(true);
    expect(isPdbId("4HHB")).toBe(true);
    expect(isPdbId("crn1")).toBe(false);
    expect(isPdbId("1crn.pdb")).toBe(false);
  });
});
