import type { HttpTransport } from "../http/http.types.js";

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue =
  | JsonPrimitive
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Values substituted into a query template. Keys are placeholder names
 * without the leading `$`.
 */
export type QueryParams = Record<string, string | number | boolean>;

/**
 * Named GraphQL query templates. A template that contains a
 * `$pagination` placeholder is treated as paginated.
 */
export type QueryCatalog = Record<string, string>;

/**
 * Turns the raw body of a plain resource into data.
 */
export type BodyConverter<T> = (body: string) => T;

export type RemoteResourceErrorCode =
  | "E_VALIDATION"
  | "E_UNKNOWN_RESOURCE"
  | "E_UNKNOWN_QUERY"
  | "E_TEMPLATE"
  | "E_REMOTE_STATUS"
  | "E_TRANSIENT_EXHAUSTED"
  | "E_NETWORK"
  | "E_TIMEOUT"
  | "E_CANCELLED"
  | "E_DECODE"
  | "E_PAGINATION";

export interface ResourceLogger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

/**
 * Options for `createRemoteResourceManager`.
 *
 * @example
 * ```typescript
 * const manager = createRemoteResourceManager({
 *   graphql: {
 *     endpoint: "https://api.github.com/graphql",
 *     token: process.env.GH_TOKEN ?? "",
 *   },
 *   queries: githubQueries,
 *   timeoutMs: 60_000,
 * });
 * ```
 */
export type CreateRemoteResourceManagerOptions = {
  graphql: {
    /** Single POST endpoint every query is sent to. */
    endpoint: string;
    /** Bearer credential sent in the `Authorization` header. */
    token: string;
  };
  /**
   * Named query templates available to `getGraphQL` and `executeGraphQL`.
   * @default {}
   */
  queries?: QueryCatalog;
  /**
   * Connect/read timeout applied uniformly to every request.
   * Ignored when a custom `transport` is supplied.
   * @default 60000
   */
  timeoutMs?: number;
  /**
   * Replaces the default fetch-based transport (tests, proxies).
   */
  transport?: HttpTransport;
  /**
   * Receives progress and warning messages. `false` silences output.
   * @default console
   */
  logger?: ResourceLogger | false;
};
