import { z } from "zod";
import { RemoteResourceError } from "../errors/RemoteResourceError.js";
import { formatZodError } from "./config.utils.js";

export const DEFAULT_GITHUB_GRAPHQL_URL = "https://api.github.com/graphql";
export const DEFAULT_WAKATIME_BASE_URL = "https://wakatime.com/api/v1";

/**
 * Environment variables the engine reads. Unknown variables are ignored,
 * since the whole process environment is passed in.
 */
export const environmentSchema = z.object({
  GH_TOKEN: z.string().min(1, "GH_TOKEN is required"),
  WAKATIME_API_KEY: z.string().min(1, "WAKATIME_API_KEY is required"),
  GITHUB_GRAPHQL_URL: z.string().url().default(DEFAULT_GITHUB_GRAPHQL_URL),
  WAKATIME_BASE_URL: z.string().url().default(DEFAULT_WAKATIME_BASE_URL),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * Reads credentials and endpoints from `env`.
 * @throws {RemoteResourceError} E_VALIDATION listing every invalid variable
 */
export function loadEnvironment(
  env: Record<string, string | undefined> = process.env
): Environment {
  const parsed = environmentSchema.safeParse(env);
  if (!parsed.success) {
    throw new RemoteResourceError(
      `Invalid environment:\n${formatZodError(parsed.error)}`,
      "E_VALIDATION"
    );
  }
  return parsed.data;
}
