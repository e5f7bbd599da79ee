import type { RawResponse } from "../http/http.types.js";
import type { JsonValue, ResourceLogger } from "../types/index.js";
import type { PendingOperation } from "./PendingOperation.js";

export interface ResourceCacheOptions {
  logger?: ResourceLogger;
}

export interface PendingEntry<T> {
  state: "pending";
  operation: PendingOperation<T>;
}

export interface SettledEntry<T> {
  state: "settled";
  value: T;
}

export type CacheEntry<T> = PendingEntry<T> | SettledEntry<T>;

export type CacheEntryState = CacheEntry<unknown>["state"];

/**
 * What the engine stores per key. Plain resources keep the raw response so
 * each consumer can pick its own converter; GraphQL results are stored as
 * decoded data.
 */
export type CachedResource =
  | { kind: "response"; response: RawResponse }
  | { kind: "data"; data: JsonValue };
