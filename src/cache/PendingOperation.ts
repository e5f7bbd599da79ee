/**
 * An operation that is started at construction time and awaited later.
 *
 * Separating "start" from "await" is what lets callers fire many requests
 * up front and resolve them one by one afterwards. The outcome is observed
 * internally, so a failure that nobody ever awaits does not surface as an
 * unhandled rejection.
 *
 * @example
 * ```typescript
 * const op = new PendingOperation((signal) => transport(request, signal));
 * // ... later
 * const response = await op.promise;
 * ```
 */
export class PendingOperation<T> {
  public readonly promise: Promise<T>;
  private readonly controller = new AbortController();
  private done = false;
  private failure: unknown = undefined;

  constructor(start: (signal: AbortSignal) => Promise<T>) {
    this.promise = start(this.controller.signal);
    this.promise.then(
      () => {
        this.done = true;
      },
      (error: unknown) => {
        this.done = true;
        this.failure = error;
      }
    );
  }

  public isDone(): boolean {
    return this.done;
  }

  /**
   * The rejection reason once the operation has failed, otherwise undefined.
   */
  public getFailure(): unknown {
    return this.failure;
  }

  /**
   * Aborts the underlying operation. No-op once it has completed.
   */
  public cancel(reason?: unknown): void {
    if (this.done) return;
    this.controller.abort(reason);
  }
}
