import { RemoteResourceError } from "../errors/RemoteResourceError.js";
import { silentLogger } from "../logging/logger.js";
import type { ResourceLogger } from "../types/index.js";
import type {
  CacheEntry,
  CacheEntryState,
  ResourceCacheOptions,
} from "./cache.types.js";
import type { PendingOperation } from "./PendingOperation.js";

/**
 * Process-scoped map from resource key to either an in-flight operation or
 * its settled value. Entries are never evicted during a run.
 *
 * A pending entry becomes settled exactly once: the first `settle` that
 * sees the operation complete swaps the entry in place, and every later
 * caller reads the stored value without touching the network.
 */
export class ResourceCache<T> {
  private readonly storage = new Map<string, CacheEntry<T>>();
  private readonly logger: ResourceLogger;

  constructor(options: ResourceCacheOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  public getEntryCount(): number {
    return this.storage.size;
  }

  public has(key: string): boolean {
    return this.storage.has(key);
  }

  public keys(): string[] {
    return Array.from(this.storage.keys());
  }

  public state(key: string): CacheEntryState | undefined {
    return this.storage.get(key)?.state;
  }

  /**
   * Returns the settled value for `key` without awaiting anything.
   */
  public peek(key: string): T | undefined {
    const entry = this.storage.get(key);
    return entry?.state === "settled" ? entry.value : undefined;
  }

  /**
   * Records an already-started operation. Last writer wins.
   */
  public register(key: string, operation: PendingOperation<T>): void {
    if (this.storage.has(key)) {
      this.logger.warn(`Resource '${key}' was registered again, replacing it`);
    }
    this.storage.set(key, { state: "pending", operation });
  }

  public set(key: string, value: T): void {
    this.storage.set(key, { state: "settled", value });
  }

  public delete(key: string): boolean {
    return this.storage.delete(key);
  }

  /**
   * Resolves `key` to its value, awaiting the pending operation the first
   * time. A failed operation stays registered and rethrows its error on
   * every call until the key is registered again.
   * @throws {RemoteResourceError} E_UNKNOWN_RESOURCE when nothing is registered under `key`
   */
  public async settle(key: string): Promise<T> {
    const entry = this.storage.get(key);
    if (!entry) {
      throw new RemoteResourceError(
        `Resource '${key}' was never registered`,
        "E_UNKNOWN_RESOURCE",
        { target: key }
      );
    }
    if (entry.state === "settled") {
      this.logger.debug(`Resource '${key}' loaded from cache`);
      return entry.value;
    }

    const value = await entry.operation.promise;
    // Another caller may have settled or replaced the entry meanwhile
    if (this.storage.get(key) === entry) {
      this.storage.set(key, { state: "settled", value });
      this.logger.debug(`Resource '${key}' finished, result saved`);
    }
    return value;
  }

  /**
   * Cancels every operation still in flight and waits for all pending
   * entries to finish. Errors raised while draining are discarded so
   * shutdown cannot fail because of a straggling fetch.
   */
  public async drainAll(): Promise<void> {
    const pending: Array<[string, PendingOperation<T>]> = [];
    for (const [key, entry] of this.storage.entries()) {
      if (entry.state === "pending") pending.push([key, entry.operation]);
    }

    for (const [, operation] of pending) {
      if (!operation.isDone()) {
        operation.cancel(
          new RemoteResourceError("Operation cancelled during drain", "E_CANCELLED")
        );
      }
    }

    await Promise.all(
      pending.map(async ([key, operation]) => {
        try {
          await operation.promise;
        } catch (err) {
          this.logger.debug(`Discarded error while draining '${key}':`, err);
        }
      })
    );
  }
}
