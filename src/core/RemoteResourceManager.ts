import type { CachedResource } from "../cache/cache.types.js";
import { PendingOperation } from "../cache/PendingOperation.js";
import type { ResourceCache } from "../cache/ResourceCache.js";
import { RemoteResourceError } from "../errors/RemoteResourceError.js";
import type { PlainResourceFetcher } from "../fetcher/PlainResourceFetcher.js";
import { fingerprint } from "../graphql/fingerprint.js";
import { fetchPaginated } from "../graphql/pagination.js";
import type { QueryEngine } from "../graphql/QueryEngine.js";
import type {
  BodyConverter,
  JsonValue,
  QueryParams,
  ResourceLogger,
} from "../types/index.js";

export interface RemoteResourceManagerOptions {
  cache: ResourceCache<CachedResource>;
  fetcher: PlainResourceFetcher;
  engine: QueryEngine;
  logger: ResourceLogger;
}

/**
 * Single entry point for report code: plain resources started up front,
 * GraphQL queries memoized by fingerprint, and a drain for shutdown. Every
 * component shares the one cache handed in at construction.
 */
export class RemoteResourceManager {
  private readonly cache: ResourceCache<CachedResource>;
  private readonly fetcher: PlainResourceFetcher;
  private readonly engine: QueryEngine;
  private readonly logger: ResourceLogger;

  constructor(options: RemoteResourceManagerOptions) {
    this.cache = options.cache;
    this.fetcher = options.fetcher;
    this.engine = options.engine;
    this.logger = options.logger;
  }

  /**
   * Starts GET requests for every named URL without awaiting them.
   */
  public startAll(resources: Record<string, string>): void {
    this.fetcher.startAll(resources);
  }

  public async getRemoteJson(name: string): Promise<JsonValue | null> {
    return this.fetcher.getJson(name);
  }

  public async getRemoteYaml(name: string): Promise<JsonValue | null> {
    return this.fetcher.getYaml(name);
  }

  public async getRemote<T>(
    name: string,
    converter: BodyConverter<T>
  ): Promise<T | null> {
    return this.fetcher.resolve(name, converter);
  }

  /**
   * Runs query `name` at most once per distinct parameter set.
   *
   * Paginated templates return the flattened item list; others return the
   * response body. Concurrent identical calls share one request. A failed
   * call is not cached, so calling again retries.
   */
  public async getGraphQL(
    name: string,
    params: QueryParams = {}
  ): Promise<JsonValue> {
    const key = fingerprint(name, params);
    if (this.cache.has(key)) {
      this.logger.debug(`Query '${name}' loaded from cache`);
    } else {
      const paginated = this.engine.isPaginated(name);
      this.logger.info(`Making a GraphQL query named '${name}'...`);
      this.cache.register(
        key,
        new PendingOperation<CachedResource>(async (signal) => {
          const data = paginated
            ? await fetchPaginated(this.engine, name, params, signal)
            : await this.engine.query(name, params, signal);
          return { kind: "data", data };
        })
      );
    }

    let cached: CachedResource;
    try {
      cached = await this.cache.settle(key);
    } catch (error) {
      if (this.cache.state(key) === "pending") this.cache.delete(key);
      throw error;
    }
    if (cached.kind !== "data") {
      throw new RemoteResourceError(
        `Cache entry '${key}' does not hold GraphQL data`,
        "E_UNKNOWN_RESOURCE",
        { target: key }
      );
    }
    return cached.data;
  }

  /**
   * Sends query `name` without consulting or filling the cache
   * (mutations, or reads that must be fresh).
   */
  public async executeGraphQL(
    name: string,
    params: QueryParams = {}
  ): Promise<JsonValue> {
    return this.engine.query(name, params);
  }

  public listQueries(): string[] {
    return this.engine.listQueries();
  }

  /**
   * Cancels and awaits every outstanding fetch. Never throws.
   */
  public async drainAll(): Promise<void> {
    await this.cache.drainAll();
  }

  public async close(): Promise<void> {
    await this.drainAll();
  }

  public getCache(): ResourceCache<CachedResource> {
    return this.cache;
  }
}
