import type { RemoteResourceErrorCode } from "../types/index.js";

const MAX_MESSAGE_BODY_LENGTH = 2000;

/**
 * Shortens a body for inclusion in error messages.
 */
export function truncateBody(
  body: string,
  max = MAX_MESSAGE_BODY_LENGTH
): string {
  return body.length > max ? `${body.slice(0, max)}...` : body;
}

export interface RemoteResourceErrorInit {
  /** URL or query name the failure belongs to. */
  target?: string;
  status?: number;
  body?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class RemoteResourceError extends Error {
  public readonly code: RemoteResourceErrorCode;
  public readonly target?: string;
  public readonly status?: number;
  public readonly body?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: RemoteResourceErrorCode,
    init: RemoteResourceErrorInit = {}
  ) {
    super(message, init.cause !== undefined ? { cause: init.cause } : undefined);
    this.name = "RemoteResourceError";
    this.code = code;
    this.target = init.target;
    this.status = init.status;
    this.body = init.body;
    this.details = init.details;
  }

  /**
   * Builds the error raised for a response whose status is neither success
   * nor "not ready yet". The message quotes a shortened body; `body` keeps
   * all of it.
   */
  static fromStatus(
    target: string,
    status: number,
    body: string,
    code: RemoteResourceErrorCode = "E_REMOTE_STATUS"
  ): RemoteResourceError {
    return new RemoteResourceError(
      `Query '${target}' failed to run by returning code of ${status}: ${truncateBody(body)}`,
      code,
      { target, status, body }
    );
  }
}

export function isRemoteResourceError(
  error: unknown,
  code?: RemoteResourceErrorCode
): error is RemoteResourceError {
  return (
    error instanceof RemoteResourceError &&
    (code === undefined || error.code === code)
  );
}
