// Public API: the manager factory, its building blocks and shared types

export { createRemoteResourceManager } from "./manager/createRemoteResourceManager.js";
export { RemoteResourceManager } from "./core/RemoteResourceManager.js";

// Building blocks, for callers that wire their own engine
export { ResourceCache } from "./cache/ResourceCache.js";
export { PendingOperation } from "./cache/PendingOperation.js";
export { PlainResourceFetcher } from "./fetcher/PlainResourceFetcher.js";
export { QueryEngine } from "./graphql/QueryEngine.js";
export { findPageData, fetchPaginated } from "./graphql/pagination.js";
export { fingerprint, canonicalize } from "./graphql/fingerprint.js";
export { renderTemplate, templateHasPlaceholder } from "./graphql/templates.js";
export { createFetchTransport } from "./http/createFetchTransport.js";

// Errors
export {
  RemoteResourceError,
  isRemoteResourceError,
} from "./errors/RemoteResourceError.js";

// Configuration and standard resources
export { loadEnvironment } from "./config/environment.js";
export type { Environment } from "./config/environment.js";
export { githubQueries } from "./queries/githubQueries.js";
export type { GithubQueryName } from "./queries/githubQueries.js";
export {
  buildProfileResources,
  startProfileResources,
} from "./queries/profileResources.js";

export type {
  BodyConverter,
  CreateRemoteResourceManagerOptions,
  JsonObject,
  JsonValue,
  QueryCatalog,
  QueryParams,
  RemoteResourceErrorCode,
  ResourceLogger,
} from "./types/index.js";
export type { CachedResource, CacheEntry } from "./cache/cache.types.js";
export type { PageData, PageInfo } from "./graphql/graphql.types.js";
export type {
  HttpRequest,
  HttpTransport,
  RawResponse,
} from "./http/http.types.js";
