import {
  isRemoteResourceError,
  RemoteResourceError,
} from "../errors/RemoteResourceError.js";
import type { JsonValue } from "../types/index.js";

export const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Parses a response body as JSON.
 * @throws {RemoteResourceError} E_DECODE when the body is not valid JSON
 */
export function parseJsonBody(body: string, target: string): JsonValue {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new RemoteResourceError(
      `Response from '${target}' is not valid JSON`,
      "E_DECODE",
      { target, body, cause: error }
    );
  }
}

/**
 * Classifies an error thrown while sending a request.
 * The caller decides which abort reason means cancellation and which means timeout.
 */
export function toTransportError(
  error: unknown,
  url: string,
  reason: "timeout" | "cancelled" | null,
  timeoutMs: number
): RemoteResourceError {
  if (isRemoteResourceError(error)) return error;
  if (reason === "timeout") {
    return new RemoteResourceError(
      `Request to '${url}' timed out after ${timeoutMs}ms`,
      "E_TIMEOUT",
      { target: url, cause: error }
    );
  }
  if (reason === "cancelled") {
    return new RemoteResourceError(
      `Request to '${url}' was cancelled`,
      "E_CANCELLED",
      { target: url, cause: error }
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new RemoteResourceError(
    `Request to '${url}' failed: ${message}`,
    "E_NETWORK",
    { target: url, cause: error }
  );
}
