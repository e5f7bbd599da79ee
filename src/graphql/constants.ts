/** Items requested per page of a paginated query. */
export const PAGE_SIZE = 100;

/** Immediate retries after an HTTP 502, on top of the first attempt. */
export const MAX_BAD_GATEWAY_RETRIES = 10;

/** Placeholder that marks a query template as paginated. */
export const PAGINATION_PLACEHOLDER = "pagination";

/** Guard against unbounded traversal of pathological responses. */
export const MAX_PAGE_SEARCH_DEPTH = 64;

export const ITEMS_FIELD = "nodes";
export const PAGE_INFO_FIELD = "pageInfo";
