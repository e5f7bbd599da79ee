import { z } from "zod";
import { formatZodError } from "../config/config.utils.js";
import { DEFAULT_WAKATIME_BASE_URL } from "../config/environment.js";
import type { RemoteResourceManager } from "../core/RemoteResourceManager.js";
import { RemoteResourceError } from "../errors/RemoteResourceError.js";

export const LINGUIST_LANGUAGES_URL =
  "https://cdn.jsdelivr.net/gh/github/linguist@master/lib/linguist/languages.yml";
export const GITHUB_CONTRIBUTIONS_BASE_URL =
  "https://github-contributions.vercel.app/api/v1";

export const profileResourcesSchema = z
  .object({
    userLogin: z.string().min(1),
    wakatimeApiKey: z.string().min(1),
    wakatimeBaseUrl: z.string().url().default(DEFAULT_WAKATIME_BASE_URL),
  })
  .strict();

export type ProfileResourcesInput = z.input<typeof profileResourcesSchema>;

/**
 * URLs of the plain resources every profile report needs:
 * `linguist` (YAML), `waka_latest`, `waka_all` and `github_stats` (JSON).
 */
export function buildProfileResources(
  input: ProfileResourcesInput
): Record<string, string> {
  const parsed = profileResourcesSchema.safeParse(input);
  if (!parsed.success) {
    throw new RemoteResourceError(
      `Invalid profile resource settings:\n${formatZodError(parsed.error)}`,
      "E_VALIDATION"
    );
  }
  const { userLogin, wakatimeApiKey, wakatimeBaseUrl } = parsed.data;
  const waka = wakatimeBaseUrl.replace(/\/+$/, "");
  const apiKey = encodeURIComponent(wakatimeApiKey);
  return {
    linguist: LINGUIST_LANGUAGES_URL,
    waka_latest: `${waka}/users/current/stats/last_7_days?api_key=${apiKey}`,
    waka_all: `${waka}/users/current/all_time_since_today?api_key=${apiKey}`,
    github_stats: `${GITHUB_CONTRIBUTIONS_BASE_URL}/${encodeURIComponent(userLogin)}`,
  };
}

/**
 * Starts every standard profile resource on `manager` so they download in
 * the background while the report is assembled.
 */
export function startProfileResources(
  manager: RemoteResourceManager,
  input: ProfileResourcesInput
): void {
  manager.startAll(buildProfileResources(input));
}
