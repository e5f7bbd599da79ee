export type HttpMethod = "GET" | "POST";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** Serialized request body (POST only). */
  body?: string;
}

/**
 * A fully read response. The body is kept as text so it can be decoded by
 * whichever converter the consumer asks for, and quoted in error messages.
 */
export interface RawResponse {
  status: number;
  body: string;
  /** Target URL, used in error messages. */
  url: string;
}

/**
 * Sends one request. Implementations must reject when `signal` aborts.
 */
export type HttpTransport = (
  request: HttpRequest,
  signal: AbortSignal
) => Promise<RawResponse>;

export type FetchLike = (
  input: string,
  init: {
    method: string;
    headers?: Record<string, string>;
    body?: string;
    signal: AbortSignal;
  }
) => Promise<{ status: number; url: string; text: () => Promise<string> }>;

export interface FetchTransportOptions {
  /**
   * Connect/read timeout applied to every request.
   * @default 60000
   */
  timeoutMs?: number;
  /**
   * Fetch implementation. Defaults to the global `fetch`.
   */
  fetch?: FetchLike;
}
