// Run with: npx --yes tsx examples/basic.ts
import { createRemoteResourceManager } from "../src/manager/createRemoteResourceManager.js";
import { loadEnvironment } from "../src/config/environment.js";
import { githubQueries } from "../src/queries/githubQueries.js";
import { startProfileResources } from "../src/queries/profileResources.js";

const env = loadEnvironment();
const login = process.argv[2] ?? "octocat";

const manager = createRemoteResourceManager({
  graphql: { endpoint: env.GITHUB_GRAPHQL_URL, token: env.GH_TOKEN },
  queries: githubQueries,
  timeoutMs: env.REQUEST_TIMEOUT_MS,
});

// Plain resources start downloading now, in the background
startProfileResources(manager, {
  userLogin: login,
  wakatimeApiKey: env.WAKATIME_API_KEY,
  wakatimeBaseUrl: env.WAKATIME_BASE_URL,
});

try {
  const repositories = await manager.getGraphQL("user_repository_list", {
    username: login,
  });
  const count = Array.isArray(repositories) ? repositories.length : 0;
  console.log(`${login} owns or collaborates on ${count} repositories`);

  const languages = await manager.getRemoteYaml("linguist");
  if (languages && typeof languages === "object" && !Array.isArray(languages)) {
    console.log(`linguist knows ${Object.keys(languages).length} languages`);
  }

  const weekly = await manager.getRemoteJson("waka_latest");
  console.log(weekly === null ? "WakaTime stats are not ready yet" : "WakaTime stats loaded");
} finally {
  await manager.close();
}
