import { RemoteResourceError } from "../errors/RemoteResourceError.js";
import type { HttpRequest, HttpTransport } from "../http/http.types.js";
import { parseJsonBody } from "../http/http.utils.js";
import { silentLogger } from "../logging/logger.js";
import type {
  JsonValue,
  QueryCatalog,
  QueryParams,
  ResourceLogger,
} from "../types/index.js";
import { MAX_BAD_GATEWAY_RETRIES, PAGINATION_PLACEHOLDER } from "./constants.js";
import type { QueryEngineOptions } from "./graphql.types.js";
import { renderTemplate, templateHasPlaceholder } from "./templates.js";

/**
 * Runs named query templates against a single GraphQL endpoint.
 */
export class QueryEngine {
  private readonly endpoint: string;
  private readonly token: string;
  private readonly queries: QueryCatalog;
  private readonly transport: HttpTransport;
  private readonly logger: ResourceLogger;

  constructor(options: QueryEngineOptions) {
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.queries = { ...options.queries };
    this.transport = options.transport;
    this.logger = options.logger ?? silentLogger;
  }

  public listQueries(): string[] {
    return Object.keys(this.queries);
  }

  public hasQuery(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.queries, name);
  }

  /**
   * @throws {RemoteResourceError} E_UNKNOWN_QUERY
   */
  public getTemplate(name: string): string {
    if (!this.hasQuery(name)) {
      throw new RemoteResourceError(
        `Query '${name}' is not defined. Available queries: ${this.listQueries().join(", ")}`,
        "E_UNKNOWN_QUERY",
        { target: name }
      );
    }
    return this.queries[name];
  }

  public isPaginated(name: string): boolean {
    return templateHasPlaceholder(this.getTemplate(name), PAGINATION_PLACEHOLDER);
  }

  /**
   * Renders and sends query `name`, returning the parsed JSON body.
   *
   * A 502 is retried immediately with the identical request, at most
   * `MAX_BAD_GATEWAY_RETRIES` times. Other statuses and network errors are
   * not retried.
   *
   * @throws {RemoteResourceError} E_TRANSIENT_EXHAUSTED when every attempt returned 502
   * @throws {RemoteResourceError} E_REMOTE_STATUS for any other non-200 status
   */
  public async query(
    name: string,
    params: QueryParams,
    signal: AbortSignal = new AbortController().signal
  ): Promise<JsonValue> {
    const text = renderTemplate(this.getTemplate(name), params, name);
    const request: HttpRequest = {
      method: "POST",
      url: this.endpoint,
      headers: {
        Authorization: `Bearer ${this.token}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify({ query: text }),
    };

    for (let retriesLeft = MAX_BAD_GATEWAY_RETRIES; ; retriesLeft--) {
      const res = await this.transport(request, signal);
      if (res.status === 200) {
        const data = parseJsonBody(res.body, name);
        this.warnOnGraphQLErrors(name, data);
        return data;
      }
      if (res.status === 502 && retriesLeft > 0) {
        this.logger.debug(
          `Query '${name}' returned 502, retrying (${retriesLeft} left)`
        );
        continue;
      }
      throw RemoteResourceError.fromStatus(
        name,
        res.status,
        res.body,
        res.status === 502 ? "E_TRANSIENT_EXHAUSTED" : "E_REMOTE_STATUS"
      );
    }
  }

  private warnOnGraphQLErrors(name: string, data: JsonValue): void {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      return;
    }
    const errors = data.errors;
    if (Array.isArray(errors) && errors.length > 0) {
      this.logger.warn(`Query '${name}' returned GraphQL errors:`, errors);
    }
  }
}
