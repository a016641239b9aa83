import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ShipgaugeError } from "../../src/errors.js";
import { decodeBody, ThrottledFetcher } from "../../src/http/fetcher.js";
import { fetchAll } from "../../src/http/paginator.js";
import { FakeApi, FakeClock } from "../helpers/fake-api.js";
import { silentLogger } from "../helpers/fixtures.js";

const offsetPage = z.object({ total: z.number(), values: z.array(z.number()) });
const cursorPage = z.object({ values: z.array(z.number()), hasNextPage: z.boolean() });

/** K pages of size P holding 0..K*P-1, answering startAt/maxResults queries. */
function offsetApi(pages: number, size: number): FakeApi {
  const total = pages * size;
  return new FakeApi().on("GET", "/search", (req) => {
    const startAt = Number(req.url.searchParams.get("startAt"));
    const max = Number(req.url.searchParams.get("maxResults"));
    const values = Array.from({ length: Math.max(0, Math.min(max, total - startAt)) }, (_, i) => startAt + i);
    return { body: { total, values } };
  });
}

function fetcherFor(api: FakeApi, requestDelayMs = 0): ThrottledFetcher {
  return new ThrottledFetcher({
    logger: silentLogger(),
    requestDelayMs,
    clock: new FakeClock(),
    fetchFn: api.fetch,
  });
}

function offsetQuery(fetcher: ThrottledFetcher, pageSize: number) {
  return {
    style: "offset" as const,
    pageSize,
    requestPage: async (offset: number, limit: number) => {
      const url = "https://api.test/search";
      const response = await fetcher.request({
        method: "GET",
        url,
        params: { startAt: offset, maxResults: limit },
      });
      const page = decodeBody(offsetPage, response, url);
      return { items: page.values, total: page.total };
    },
  };
}

describe("fetchAll (offset)", () => {
  it("returns all K pages in order with exactly K requests", async () => {
    const api = offsetApi(4, 25);

    const items = await fetchAll(offsetQuery(fetcherFor(api), 25));

    expect(items).toEqual(Array.from({ length: 100 }, (_, i) => i));
    expect(api.requests).toHaveLength(4);
    expect(api.requests.map((r) => r.url.searchParams.get("startAt"))).toEqual(["0", "25", "50", "75"]);
  });

  it("stops after a short last page", async () => {
    const api = new FakeApi().sequence("GET", "/search", [
      { body: { total: 130, values: Array.from({ length: 100 }, (_, i) => i) } },
      { body: { total: 130, values: Array.from({ length: 30 }, (_, i) => 100 + i) } },
    ]);

    const items = await fetchAll(offsetQuery(fetcherFor(api), 100));

    expect(items).toHaveLength(130);
    expect(api.requests).toHaveLength(2);
  });

  it("issues a single request for an empty result", async () => {
    const api = offsetApi(0, 10);

    expect(await fetchAll(offsetQuery(fetcherFor(api), 10))).toEqual([]);
    expect(api.requests).toHaveLength(1);
  });

  it("stops on an empty page even when the total claims more", async () => {
    const api = new FakeApi().sequence("GET", "/search", [
      { body: { total: 50, values: [1, 2] } },
      { body: { total: 50, values: [] } },
    ]);

    expect(await fetchAll(offsetQuery(fetcherFor(api), 2))).toEqual([1, 2]);
    expect(api.requests).toHaveLength(2);
  });

  it("defers to the fetcher's throttle between pages", async () => {
    const api = offsetApi(3, 10);
    const clock = new FakeClock();
    const fetcher = new ThrottledFetcher({
      logger: silentLogger(),
      requestDelayMs: 3000,
      clock,
      fetchFn: api.fetch,
    });

    await fetchAll(offsetQuery(fetcher, 10));

    expect(clock.sleeps).toEqual([3000, 3000]);
  });

  it("rejects the whole fetch when a page fails", async () => {
    const api = new FakeApi().sequence("GET", "/search", [
      { body: { total: 30, values: [1, 2, 3, 4, 5, 6, 7, 8, 9, 10] } },
      { status: 500, body: "boom" },
    ]);

    await expect(fetchAll(offsetQuery(fetcherFor(api), 10))).rejects.toMatchObject({ status: 500 });
  });

  it("rejects a non-positive page size", async () => {
    const err = await fetchAll({
      style: "offset",
      pageSize: 0,
      requestPage: async () => ({ items: [], total: 0 }),
    }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ShipgaugeError);
    expect(err).toMatchObject({ code: "INVALID_PAGE_SIZE" });
  });
});

describe("fetchAll (cursor)", () => {
  it("follows hasNextPage with exactly K requests", async () => {
    const api = new FakeApi().on("POST", "/events", (req) => {
      const page = z.object({ page: z.number() }).parse(req.body).page;
      return { body: { values: [page * 10, page * 10 + 1], hasNextPage: page < 3 } };
    });
    const fetcher = fetcherFor(api);

    const items = await fetchAll<number>({
      style: "cursor",
      requestPage: async (cursor) => {
        const page = cursor === undefined ? 1 : Number(cursor);
        const url = "https://api.test/events";
        const response = await fetcher.request({ method: "POST", url, body: { page } });
        const data = decodeBody(cursorPage, response, url);
        return { items: data.values, hasNextPage: data.hasNextPage, nextCursor: String(page + 1) };
      },
    });

    expect(items).toEqual([10, 11, 20, 21, 30, 31]);
    expect(api.requests).toHaveLength(3);
  });

  it("stops immediately when the first page says there is no next page", async () => {
    let calls = 0;
    const items = await fetchAll<string>({
      style: "cursor",
      requestPage: async () => {
        calls++;
        return { items: ["only"], hasNextPage: false };
      },
    });

    expect(items).toEqual(["only"]);
    expect(calls).toBe(1);
  });

  it("refuses to loop when the cursor does not advance", async () => {
    const err = await fetchAll<string>({
      style: "cursor",
      requestPage: async () => ({ items: ["x"], hasNextPage: true, nextCursor: "same" }),
    }).catch((e: unknown) => e);

    expect(err).toMatchObject({ code: "PAGINATION_STALLED" });
  });

  it("stops a query that keeps announcing pages past its limit", async () => {
    let requests = 0;
    const err = await fetchAll<number>({
      style: "cursor",
      maxPages: 3,
      requestPage: async (cursor) => {
        requests++;
        const page = cursor === undefined ? 1 : Number(cursor);
        return { items: [page], hasNextPage: true, nextCursor: String(page + 1) };
      },
    }).catch((e: unknown) => e);

    expect(err).toMatchObject({ code: "PAGINATION_LIMIT" });
    expect(requests).toBe(3);
  });
});
