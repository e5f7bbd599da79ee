import type { CachedResource } from "../cache/cache.types.js";
import { ResourceCache } from "../cache/ResourceCache.js";
import { RemoteResourceManager } from "../core/RemoteResourceManager.js";
import { PlainResourceFetcher } from "../fetcher/PlainResourceFetcher.js";
import { QueryEngine } from "../graphql/QueryEngine.js";
import { createFetchTransport } from "../http/createFetchTransport.js";
import { resolveLogger } from "../logging/logger.js";
import type { CreateRemoteResourceManagerOptions } from "../types/index.js";
import { ManagerOptionsValidator } from "./manager.utils.js";

/**
 * Builds a manager with its own cache, transport, fetcher and query engine.
 * Each call returns an isolated instance.
 */
export function createRemoteResourceManager(
  options: CreateRemoteResourceManagerOptions
): RemoteResourceManager {
  ManagerOptionsValidator.validate(options);

  const logger = resolveLogger(options.logger);
  const transport =
    options.transport ?? createFetchTransport({ timeoutMs: options.timeoutMs });
  const cache = new ResourceCache<CachedResource>({ logger });

  const fetcher = new PlainResourceFetcher({ cache, transport, logger });
  const engine = new QueryEngine({
    endpoint: options.graphql.endpoint,
    token: options.graphql.token,
    queries: options.queries ?? {},
    transport,
    logger,
  });

  return new RemoteResourceManager({ cache, fetcher, engine, logger });
}
