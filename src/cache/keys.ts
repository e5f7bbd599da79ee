/**
 * Cache keys are namespaced by resource kind so a plain resource and a
 * GraphQL query can never overwrite each other.
 */
export const RESOURCE_KEY_PREFIX = "resource:";
export const GRAPHQL_KEY_PREFIX = "graphql:";

export function resourceKey(name: string): string {
  return `${RESOURCE_KEY_PREFIX}${name}`;
}
