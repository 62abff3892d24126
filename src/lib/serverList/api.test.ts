// @vitest-environment node
import { afterEach, beforeEach, describe, expect, test, vi, type MockInstance } from "vitest";
import { buildFirstPageUrl, fetchServerListing, type FetchLike } from "./api";

const BASE = "https://listing.test/servers";

function entry(name: string, country: string) {
  return {
    attributes: {
      name,
      players: 80,
      maxPlayers: 100,
      country,
      details: { map: "Sumari", gameMode: "AAS" },
    },
  };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function page(names: Array<[string, string]>, next: string | null) {
  return { data: names.map(([name, country]) => entry(name, country)), links: { next } };
}

function scriptedFetch(steps: Array<() => Promise<Response>>) {
  const calls: string[] = [];
  const fetchImpl: FetchLike = (input) => {
    calls.push(input);
    const step = steps[calls.length - 1];
    if (!step) return Promise.reject(new Error(`unexpected request ${input}`));
    return step();
  };
  return { fetchImpl, calls };
}

let warn: MockInstance<typeof console.warn>;

beforeEach(() => {
  warn = vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("buildFirstPageUrl", () => {
  test("carries the fixed filters and the player range", () => {
    const url = new URL(buildFirstPageUrl({ min: 60, max: 100 }, BASE));

    expect(`${url.origin}${url.pathname}`).toBe(BASE);
    expect(url.searchParams.get("filter[game]")).toBe("squad");
    expect(url.searchParams.get("filter[status]")).toBe("online");
    expect(url.searchParams.get("page[size]")).toBe("100");
    expect(url.searchParams.get("sort")).toBe("-players");
    expect(url.searchParams.get("filter[players][min]")).toBe("60");
    expect(url.searchParams.get("filter[players][max]")).toBe("100");
  });

  test("targets the BattleMetrics listing by default", () => {
    expect(buildFirstPageUrl({ min: 0, max: 10 }).startsWith("https://api.battlemetrics.com/servers?")).toBe(true);
  });
});

describe("fetchServerListing", () => {
  test("follows the cursor and keeps EU servers only", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      async () => jsonResponse(page([["A", "DE"], ["B", "US"]], `${BASE}?page=2`)),
      async () => jsonResponse(page([["C", "FR"]], null)),
    ]);

    const servers = await fetchServerListing({ min: 60, max: 100 }, { fetchImpl, baseUrl: BASE });

    expect(servers.map((s) => s.name)).toEqual(["A", "C"]);
    expect(calls).toEqual([buildFirstPageUrl({ min: 60, max: 100 }, BASE), `${BASE}?page=2`]);
    expect(warn).not.toHaveBeenCalled();
  });

  test("keeps the first three pages when the fourth request fails", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      async () => jsonResponse(page([["P1-DE", "DE"], ["P1-US", "US"]], `${BASE}?page=2`)),
      async () => jsonResponse(page([["P2-PL", "PL"]], `${BASE}?page=3`)),
      async () => jsonResponse(page([["P3-GB", "GB"], ["P3-CA", "CA"]], `${BASE}?page=4`)),
      async () => {
        throw new TypeError("fetch failed");
      },
    ]);

    const servers = await fetchServerListing({ min: 0, max: 100 }, { fetchImpl, baseUrl: BASE });

    expect(servers.map((s) => s.name)).toEqual(["P1-DE", "P2-PL", "P3-GB"]);
    expect(calls).toHaveLength(4);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("[ServerList] Pagination stopped", {
      page: 4,
      status: 0,
      code: "NETWORK_ERROR",
      message: "fetch failed",
      kept: 3,
    });
  });

  test("stops on a non-success status", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      async () => jsonResponse(page([["A", "DE"]], `${BASE}?page=2`)),
      async () => jsonResponse({ errors: [{ status: "429" }] }, 429),
    ]);

    const servers = await fetchServerListing({ min: 0, max: 100 }, { fetchImpl, baseUrl: BASE });

    expect(servers.map((s) => s.name)).toEqual(["A"]);
    expect(calls).toHaveLength(2);
    expect(warn.mock.calls[0][1]).toMatchObject({ page: 2, status: 429, code: "HTTP_ERROR" });
  });

  test("stops on a malformed payload", async () => {
    const { fetchImpl } = scriptedFetch([
      async () => jsonResponse(page([["A", "DE"]], `${BASE}?page=2`)),
      async () => jsonResponse({ data: "not-a-list" }),
    ]);

    const servers = await fetchServerListing({ min: 0, max: 100 }, { fetchImpl, baseUrl: BASE });

    expect(servers.map((s) => s.name)).toEqual(["A"]);
    expect(warn.mock.calls[0][1]).toMatchObject({ page: 2, code: "MALFORMED_PAYLOAD" });
  });

  test("stops on a body that is not JSON", async () => {
    const { fetchImpl } = scriptedFetch([
      async () => new Response("<html>maintenance</html>", { status: 200 }),
    ]);

    const servers = await fetchServerListing({ min: 0, max: 100 }, { fetchImpl, baseUrl: BASE });

    expect(servers).toEqual([]);
    expect(warn.mock.calls[0][1]).toMatchObject({ page: 1, code: "MALFORMED_PAYLOAD", kept: 0 });
  });

  test("never requests more than five pages", async () => {
    let n = 0;
    const fetchImpl = vi.fn<FetchLike>(async () => {
      n++;
      return jsonResponse(page([[`S${n}`, "NL"]], `${BASE}?page=${n + 1}`));
    });

    const servers = await fetchServerListing({ min: 0, max: 100 }, { fetchImpl, baseUrl: BASE });

    expect(fetchImpl).toHaveBeenCalledTimes(5);
    expect(servers.map((s) => s.name)).toEqual(["S1", "S2", "S3", "S4", "S5"]);
  });

  test("an empty cursor ends pagination", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      async () => jsonResponse(page([["A", "SE"]], "")),
    ]);

    await fetchServerListing({ min: 0, max: 100 }, { fetchImpl, baseUrl: BASE });
    expect(calls).toHaveLength(1);
  });

  test("times out a hanging page", async () => {
    const fetchImpl: FetchLike = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });

    const servers = await fetchServerListing({ min: 0, max: 100 }, { fetchImpl, baseUrl: BASE, timeoutMs: 5 });

    expect(servers).toEqual([]);
    expect(warn.mock.calls[0][1]).toMatchObject({ page: 1, status: 408, code: "TIMEOUT" });
  });
});
