import type {
  FetchLike,
  FetchTransportOptions,
  HttpTransport,
} from "./http.types.js";
import { DEFAULT_TIMEOUT_MS, toTransportError } from "./http.utils.js";

/**
 * Creates the default transport on top of `fetch`.
 *
 * Each request gets its own abort controller that fires either when the
 * caller's signal aborts (drain at shutdown) or when `timeoutMs` elapses.
 * All failures are reported as `RemoteResourceError`s.
 *
 * @example
 * ```typescript
 * const transport = createFetchTransport({ timeoutMs: 30_000 });
 * const res = await transport({ method: "GET", url }, new AbortController().signal);
 * ```
 */
export function createFetchTransport(
  options: FetchTransportOptions = {}
): HttpTransport {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl: FetchLike = options.fetch ?? globalThis.fetch;

  return async (request, signal) => {
    if (signal.aborted) {
      throw toTransportError(signal.reason, request.url, "cancelled", timeoutMs);
    }
    const controller = new AbortController();
    let reason: "timeout" | "cancelled" | null = null;

    const onAbort = () => {
      reason = "cancelled";
      controller.abort(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    const timer = setTimeout(() => {
      reason = "timeout";
      controller.abort();
    }, timeoutMs);

    try {
      const res = await fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });
      const body = await res.text();
      return { status: res.status, body, url: request.url };
    } catch (error) {
      throw toTransportError(error, request.url, reason, timeoutMs);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener("abort", onAbort);
    }
  };
}
