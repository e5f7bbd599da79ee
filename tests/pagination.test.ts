import { describe, it, expect } from "vitest";
import {
  fetchPaginated,
  findPageData,
  paginationArgument,
} from "../src/graphql/pagination.js";
import { QueryEngine } from "../src/graphql/QueryEngine.js";
import type { JsonValue } from "../src/types/index.js";
import { createRecordingTransport, makePage } from "./helpers/fakes.js";

const page = makePage(0, 2, "c1", true);

describe("findPageData", () => {
  it("finds a page at depth 1", () => {
    const result = findPageData({ refs: page });
    expect(result.items).toEqual([{ id: 0 }, { id: 1 }]);
    expect(result.pageInfo).toEqual({ endCursor: "c1", hasNextPage: true });
  });

  it("finds a page at depth 2 next to sibling keys", () => {
    const result = findPageData({
      data: {
        rateLimit: { remaining: 4999 },
        repository: { name: "demo", refs: page },
      },
    });
    expect(result.items).toHaveLength(2);
    expect(result.pageInfo.endCursor).toBe("c1");
  });

  it("finds a page at depth 3 under a union-like field with several siblings", () => {
    const result = findPageData({
      repository: {
        ref: {
          name: "main",
          target: {
            oid: "abc",
            history: makePage(5, 1, null, false),
          },
        },
      },
    });
    expect(result).toEqual({
      items: [{ id: 5 }],
      pageInfo: { endCursor: null, hasNextPage: false },
    });
  });

  it("searches inside arrays", () => {
    const result = findPageData({ data: { search: [{ skip: true }, page] } });
    expect(result.pageInfo.hasNextPage).toBe(true);
  });

  it("returns the first match in key order", () => {
    const result = findPageData({
      first: makePage(0, 1, "a", true),
      second: makePage(10, 1, "b", true),
    });
    expect(result.items).toEqual([{ id: 0 }]);
  });

  it("requires both the item list and the page info", () => {
    expect(findPageData({ nodes: [1], pageInfo: [] }).items).toEqual([]);
    expect(findPageData({ nodes: "x", pageInfo: {} }).items).toEqual([]);
  });

  it("returns an empty last page when nothing matches", () => {
    expect(findPageData({ data: { viewer: { login: "octo" } } })).toEqual({
      items: [],
      pageInfo: { endCursor: null, hasNextPage: false },
    });
    expect(findPageData(null)).toEqual({
      items: [],
      pageInfo: { endCursor: null, hasNextPage: false },
    });
  });

  it("stops descending past the depth limit", () => {
    let deep: JsonValue = makePage(0, 1, "z", true);
    for (let i = 0; i < 100; i++) deep = { next: deep };
    expect(findPageData(deep).pageInfo.hasNextPage).toBe(false);
  });
});

describe("paginationArgument", () => {
  it("renders the first and subsequent page arguments", () => {
    expect(paginationArgument()).toBe("first: 100");
    expect(paginationArgument("Y3Vyc29yOjE=")).toBe(
      'first: 100, after: "Y3Vyc29yOjE="'
    );
  });
});

describe("fetchPaginated", () => {
  const template =
    '{ repository(owner: "$owner", name: "$name") { refs($pagination) { nodes { name } pageInfo { endCursor hasNextPage } } } }';

  function queryTextOf(body: string | undefined): string {
    const parsed: { query: string } = JSON.parse(body ?? "{}");
    return parsed.query;
  }

  function createEngine(
    handler: Parameters<typeof createRecordingTransport>[0]
  ) {
    const recorder = createRecordingTransport(handler);
    const engine = new QueryEngine({
      endpoint: "https://graphql.test/graphql",
      token: "test-token",
      queries: { branches: template },
      transport: recorder.transport,
    });
    return { engine, calls: recorder.calls };
  }

  it("concatenates every page in cursor order", async () => {
    const { engine, calls } = createEngine((request) => {
      const query = queryTextOf(request.body);
      if (query.includes('after: "cursor-2"')) {
        return { status: 200, body: { data: { repository: { refs: makePage(200, 37, "cursor-3", false) } } } };
      }
      if (query.includes('after: "cursor-1"')) {
        return { status: 200, body: { data: { repository: { refs: makePage(100, 100, "cursor-2", true) } } } };
      }
      return { status: 200, body: { data: { repository: { refs: makePage(0, 100, "cursor-1", true) } } } };
    });

    const items = await fetchPaginated(engine, "branches", { owner: "octo", name: "demo" });

    expect(items).toHaveLength(237);
    expect(items[0]).toEqual({ id: 0 });
    expect(items[100]).toEqual({ id: 100 });
    expect(items[236]).toEqual({ id: 236 });
    expect(calls).toHaveLength(3);
    expect(queryTextOf(calls[0].body)).toContain("refs(first: 100)");
    expect(queryTextOf(calls[1].body)).toContain('refs(first: 100, after: "cursor-1")');
    expect(queryTextOf(calls[2].body)).toContain('refs(first: 100, after: "cursor-2")');
  });

  it("returns an empty list when the response has no page", async () => {
    const { engine } = createEngine(() => ({
      status: 200,
      body: { data: { repository: null } },
    }));
    expect(await fetchPaginated(engine, "branches", { owner: "o", name: "n" })).toEqual([]);
  });

  it("aborts the whole call when a later page fails", async () => {
    const { engine } = createEngine((_request, index) =>
      index === 0
        ? { status: 200, body: { data: { refs: makePage(0, 100, "cursor-1", true) } } }
        : { status: 500, body: "oops" }
    );
    await expect(
      fetchPaginated(engine, "branches", { owner: "o", name: "n" })
    ).rejects.toMatchObject({ code: "E_REMOTE_STATUS", status: 500 });
  });

  it("fails when a page promises more data without a cursor", async () => {
    const { engine, calls } = createEngine(() => ({
      status: 200,
      body: { data: { refs: makePage(0, 3, null, true) } },
    }));
    await expect(
      fetchPaginated(engine, "branches", { owner: "o", name: "n" })
    ).rejects.toMatchObject({ code: "E_PAGINATION" });
    expect(calls).toHaveLength(1);
  });
});
