import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { CachedResource } from "../cache/cache.types.js";
import { resourceKey } from "../cache/keys.js";
import { PendingOperation } from "../cache/PendingOperation.js";
import type { ResourceCache } from "../cache/ResourceCache.js";
import { RemoteResourceError } from "../errors/RemoteResourceError.js";
import type { HttpTransport, RawResponse } from "../http/http.types.js";
import { parseJsonBody } from "../http/http.utils.js";
import { silentLogger } from "../logging/logger.js";
import type {
  BodyConverter,
  JsonValue,
  ResourceLogger,
} from "../types/index.js";
import { formatZodError } from "../config/config.utils.js";

export interface PlainResourceFetcherOptions {
  cache: ResourceCache<CachedResource>;
  transport: HttpTransport;
  logger?: ResourceLogger;
}

/**
 * Names must be non-empty; every value must be an absolute URL.
 */
export const resourceMapSchema = z.record(
  z.string().min(1),
  z.string().url()
);

/**
 * Fetches plain GET resources (JSON or YAML documents). Requests are started
 * by `startAll` and resolved on demand, so independent providers are queried
 * concurrently before any result is needed.
 */
export class PlainResourceFetcher {
  private readonly cache: ResourceCache<CachedResource>;
  private readonly transport: HttpTransport;
  private readonly logger: ResourceLogger;

  constructor(options: PlainResourceFetcherOptions) {
    this.cache = options.cache;
    this.transport = options.transport;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Starts a GET for every entry immediately and registers each as pending.
   * A failure in one fetch does not affect the others.
   * @throws {RemoteResourceError} E_VALIDATION when a name or URL is invalid
   */
  public startAll(resources: Record<string, string>): void {
    const parsed = resourceMapSchema.safeParse(resources);
    if (!parsed.success) {
      throw new RemoteResourceError(
        `Invalid remote resources:\n${formatZodError(parsed.error)}`,
        "E_VALIDATION"
      );
    }
    for (const [name, url] of Object.entries(parsed.data)) {
      this.start(name, url);
    }
  }

  /**
   * Starts a single GET and registers it under `name`. Calling this for an
   * existing name replaces the previous entry, which is the way to retry.
   */
  public start(name: string, url: string): void {
    const operation = new PendingOperation<CachedResource>(async (signal) => {
      const response = await this.transport({ method: "GET", url }, signal);
      return { kind: "response", response };
    });
    this.cache.register(resourceKey(name), operation);
  }

  /**
   * Resolves `name` and converts its body.
   * Returns `null` when the provider answered 201/202 (accepted, no data yet).
   * @throws {RemoteResourceError} E_REMOTE_STATUS for any other non-200 status
   */
  public async resolve<T>(
    name: string,
    converter: BodyConverter<T>
  ): Promise<T | null> {
    this.logger.info(`Making a remote API query named '${name}'...`);
    const cached = await this.cache.settle(resourceKey(name));
    if (cached.kind !== "response") {
      throw new RemoteResourceError(
        `Resource '${name}' does not hold an HTTP response`,
        "E_UNKNOWN_RESOURCE",
        { target: name }
      );
    }
    return this.interpret(name, cached.response, converter);
  }

  public async getJson(name: string): Promise<JsonValue | null> {
    return this.resolve(name, (body) => parseJsonBody(body, name));
  }

  public async getYaml(name: string): Promise<JsonValue | null> {
    return this.resolve<JsonValue>(name, (body) => {
      try {
        return parseYaml(body);
      } catch (error) {
        throw new RemoteResourceError(
          `Response from '${name}' is not valid YAML`,
          "E_DECODE",
          { target: name, body, cause: error }
        );
      }
    });
  }

  private interpret<T>(
    name: string,
    response: RawResponse,
    converter: BodyConverter<T>
  ): T | null {
    if (response.status === 200) {
      return converter(response.body);
    }
    if (response.status === 201 || response.status === 202) {
      this.logger.warn(
        `Query '${name}' returned ${response.status} status code`
      );
      return null;
    }
    throw RemoteResourceError.fromStatus(
      response.url,
      response.status,
      response.body
    );
  }
}
