import { RemoteResourceError } from "../errors/RemoteResourceError.js";
import type { JsonObject, JsonValue, QueryParams } from "../types/index.js";
import {
  ITEMS_FIELD,
  MAX_PAGE_SEARCH_DEPTH,
  PAGE_INFO_FIELD,
  PAGE_SIZE,
  PAGINATION_PLACEHOLDER,
} from "./constants.js";
import type { PageData, PageInfo } from "./graphql.types.js";
import type { QueryEngine } from "./QueryEngine.js";

function emptyPage(): PageData {
  return { items: [], pageInfo: { endCursor: null, hasNextPage: false } };
}

/**
 * Locates the paginated list inside a GraphQL response.
 *
 * Paginated fields sit at different depths depending on the query
 * (`repository.refs`, `user.repositoriesContributedTo`, or a commit
 * `history` under an inline fragment), and intermediate objects may have
 * several keys. The search therefore walks every object and array child,
 * depth first in key order, and returns the first object that carries both
 * an item list and a page-info object.
 *
 * @returns The items and page info, or an empty last page when nothing matches
 */
export function findPageData(response: JsonValue): PageData {
  return searchPage(response, 0, new WeakSet<object>()) ?? emptyPage();
}

function searchPage(
  node: JsonValue,
  depth: number,
  visited: WeakSet<object>
): PageData | null {
  if (depth > MAX_PAGE_SEARCH_DEPTH) return null;
  if (typeof node !== "object" || node === null) return null;
  if (visited.has(node)) return null;
  visited.add(node);

  if (Array.isArray(node)) {
    for (const child of node) {
      const found = searchPage(child, depth + 1, visited);
      if (found) return found;
    }
    return null;
  }

  const page = asPage(node);
  if (page) return page;

  for (const child of Object.values(node)) {
    const found = searchPage(child, depth + 1, visited);
    if (found) return found;
  }
  return null;
}

function asPage(node: JsonObject): PageData | null {
  const items = node[ITEMS_FIELD];
  const info = node[PAGE_INFO_FIELD];
  if (!Array.isArray(items)) return null;
  if (typeof info !== "object" || info === null || Array.isArray(info)) {
    return null;
  }
  const pageInfo: PageInfo = {
    endCursor: typeof info.endCursor === "string" ? info.endCursor : null,
    hasNextPage: info.hasNextPage === true,
  };
  return { items, pageInfo };
}

export function paginationArgument(after?: string): string {
  if (after === undefined) return `first: ${PAGE_SIZE}`;
  return `first: ${PAGE_SIZE}, after: ${JSON.stringify(after)}`;
}

/**
 * Runs paginated query `name` until the last page and returns every item in
 * page order. Any failing page aborts the whole call.
 *
 * @throws {RemoteResourceError} E_PAGINATION when a page claims more data but has no cursor
 */
export async function fetchPaginated(
  engine: QueryEngine,
  name: string,
  params: QueryParams,
  signal?: AbortSignal
): Promise<JsonValue[]> {
  const first = await engine.query(
    name,
    { ...params, [PAGINATION_PLACEHOLDER]: paginationArgument() },
    signal
  );
  let { items, pageInfo } = findPageData(first);
  const collected: JsonValue[] = [...items];

  while (pageInfo.hasNextPage) {
    if (pageInfo.endCursor === null) {
      throw new RemoteResourceError(
        `Query '${name}' reported another page without an end cursor`,
        "E_PAGINATION",
        { target: name, details: { itemsFetched: collected.length } }
      );
    }
    const next = await engine.query(
      name,
      { ...params, [PAGINATION_PLACEHOLDER]: paginationArgument(pageInfo.endCursor) },
      signal
    );
    ({ items, pageInfo } = findPageData(next));
    collected.push(...items);
  }
  return collected;
}
