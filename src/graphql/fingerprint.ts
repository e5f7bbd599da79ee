import { createHash } from "node:crypto";
import { GRAPHQL_KEY_PREFIX } from "../cache/keys.js";
import type { QueryParams } from "../types/index.js";

/**
 * Serializes `value` as JSON with object keys sorted at every depth, so two
 * objects with the same entries always produce the same string.
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value !== "object" || value === null) return value;
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(Reflect.get(value, key));
  }
  return sorted;
}

/**
 * Cache key for a GraphQL call: the query name plus a hash of its
 * canonicalized parameters.
 *
 * @example
 * ```typescript
 * fingerprint("repo_branch_list", { owner: "octo", name: "demo" });
 * // "graphql:repo_branch_list:3f1c..."
 * ```
 */
export function fingerprint(queryName: string, params: QueryParams): string {
  const digest = createHash("sha256").update(canonicalize(params)).digest("hex");
  return `${GRAPHQL_KEY_PREFIX}${queryName}:${digest}`;
}
