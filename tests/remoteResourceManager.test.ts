import { describe, it, expect } from "vitest";
import { createRemoteResourceManager } from "../src/manager/createRemoteResourceManager.js";
import type { HttpTransport } from "../src/http/http.types.js";
import {
  createHangingTransport,
  createRecordingTransport,
  createScriptedTransport,
  makePage,
} from "./helpers/fakes.js";

const queries = {
  viewer: '{ user(login: "$username") { name } }',
  branches:
    '{ repository(owner: "$owner", name: "$name") { refs($pagination) { nodes { name } pageInfo { endCursor hasNextPage } } } }',
  hide: 'mutation { minimizeComment(input: {subjectId: "$id"}) { clientMutationId } }',
};

function createManager(transport: HttpTransport) {
  return createRemoteResourceManager({
    graphql: { endpoint: "https://graphql.test/graphql", token: "test-token" },
    queries,
    transport,
    logger: false,
  });
}

describe("RemoteResourceManager", () => {
  describe("getGraphQL", () => {
    it("serves identical calls from the cache regardless of parameter order", async () => {
      const { transport, calls } = createScriptedTransport([
        { status: 200, body: { data: { user: { name: "Octo" } } } },
      ]);
      const manager = createManager(transport);

      const first = await manager.getGraphQL("viewer", { username: "octo", extra: 1 });
      const second = await manager.getGraphQL("viewer", { extra: 1, username: "octo" });

      expect(first).toEqual({ data: { user: { name: "Octo" } } });
      expect(second).toEqual(first);
      expect(calls).toHaveLength(1);
    });

    it("keeps separate entries for different parameter values", async () => {
      const { transport, calls } = createScriptedTransport([
        { status: 200, body: { data: {} } },
      ]);
      const manager = createManager(transport);

      await manager.getGraphQL("viewer", { username: "octo" });
      await manager.getGraphQL("viewer", { username: "cat" });

      expect(calls).toHaveLength(2);
      const graphqlKeys = manager
        .getCache()
        .keys()
        .filter((k) => k.startsWith("graphql:viewer:"));
      expect(graphqlKeys).toHaveLength(2);
    });

    it("flattens paginated queries", async () => {
      const { transport } = createRecordingTransport((request) =>
        (request.body ?? "").includes("after:")
          ? { status: 200, body: { data: { repository: { refs: makePage(100, 5, "c2", false) } } } }
          : { status: 200, body: { data: { repository: { refs: makePage(0, 100, "c1", true) } } } }
      );
      const manager = createManager(transport);

      const items = await manager.getGraphQL("branches", { owner: "octo", name: "demo" });
      expect(Array.isArray(items) ? items.length : -1).toBe(105);
    });

    it("shares one request between concurrent identical calls", async () => {
      const { transport, calls } = createScriptedTransport([
        { status: 200, body: { data: { ok: true } } },
      ]);
      const manager = createManager(transport);

      const [a, b] = await Promise.all([
        manager.getGraphQL("viewer", { username: "octo" }),
        manager.getGraphQL("viewer", { username: "octo" }),
      ]);
      expect(a).toEqual(b);
      expect(calls).toHaveLength(1);
    });

    it("does not cache failures", async () => {
      const { transport, calls } = createScriptedTransport([
        { status: 404, body: "not found" },
        { status: 200, body: { data: { ok: true } } },
      ]);
      const manager = createManager(transport);

      await expect(manager.getGraphQL("viewer", { username: "octo" })).rejects.toMatchObject({
        code: "E_REMOTE_STATUS",
        status: 404,
      });
      expect(await manager.getGraphQL("viewer", { username: "octo" })).toEqual({
        data: { ok: true },
      });
      expect(calls).toHaveLength(2);
    });

    it("rejects unknown query names", async () => {
      const manager = createManager(createScriptedTransport([{ status: 200 }]).transport);
      await expect(manager.getGraphQL("nope")).rejects.toMatchObject({
        code: "E_UNKNOWN_QUERY",
      });
    });
  });

  it("sends executeGraphQL calls every time", async () => {
    const { transport, calls } = createScriptedTransport([
      { status: 200, body: { data: { minimizeComment: { clientMutationId: null } } } },
    ]);
    const manager = createManager(transport);

    await manager.executeGraphQL("hide", { id: "IC_1" });
    await manager.executeGraphQL("hide", { id: "IC_1" });
    expect(calls).toHaveLength(2);
  });

  it("keeps plain resources and queries with the same name apart", async () => {
    const { transport } = createRecordingTransport((request) =>
      request.method === "GET"
        ? { status: 200, body: { source: "plain" } }
        : { status: 200, body: { source: "graphql" } }
    );
    const manager = createManager(transport);

    manager.startAll({ viewer: "https://providers.test/viewer" });
    expect(await manager.getGraphQL("viewer", { username: "octo" })).toEqual({
      source: "graphql",
    });
    expect(await manager.getRemoteJson("viewer")).toEqual({ source: "plain" });
  });

  it("lists configured queries", () => {
    const manager = createManager(createScriptedTransport([{ status: 200 }]).transport);
    expect(manager.listQueries()).toEqual(["viewer", "branches", "hide"]);
  });

  describe("drainAll", () => {
    it("cancels outstanding fetches and keeps settled results", async () => {
      const hanging = createHangingTransport();
      const transport: HttpTransport = (request, signal) =>
        request.url.endsWith("/slow")
          ? hanging.transport(request, signal)
          : Promise.resolve({ status: 200, body: '{"ready":true}', url: request.url });
      const manager = createManager(transport);

      manager.startAll({
        slow: "https://providers.test/slow",
        fast: "https://providers.test/fast",
      });
      expect(await manager.getRemoteJson("fast")).toEqual({ ready: true });

      await expect(manager.drainAll()).resolves.toBeUndefined();

      expect(hanging.signals).toHaveLength(1);
      expect(hanging.signals[0].aborted).toBe(true);
      const cache = manager.getCache();
      expect(cache.state("resource:fast")).toBe("settled");
      expect(cache.peek("resource:fast")).toEqual({
        kind: "response",
        response: {
          status: 200,
          body: '{"ready":true}',
          url: "https://providers.test/fast",
        },
      });
    });

    it("is available as close", async () => {
      const hanging = createHangingTransport();
      const manager = createManager(hanging.transport);
      manager.startAll({ slow: "https://providers.test/slow" });

      await expect(manager.close()).resolves.toBeUndefined();
      await expect(manager.getRemoteJson("slow")).rejects.toMatchObject({
        code: "E_CANCELLED",
      });
    });
  });

  describe("options", () => {
    it("rejects an invalid endpoint", () => {
      expect(() =>
        createRemoteResourceManager({
          graphql: { endpoint: "nowhere", token: "test-token" },
          logger: false,
        })
      ).toThrow(/Invalid remote resource manager options/);
    });

    it("rejects an empty token", () => {
      expect(() =>
        createRemoteResourceManager({
          graphql: { endpoint: "https://graphql.test/graphql", token: "" },
          logger: false,
        })
      ).toThrow(/graphql\.token must be a non-empty string/);
    });

    it("rejects a non-positive timeout", () => {
      expect(() =>
        createRemoteResourceManager({
          graphql: { endpoint: "https://graphql.test/graphql", token: "test-token" },
          timeoutMs: 0,
          logger: false,
        })
      ).toThrow(/timeoutMs/);
    });
  });
});
