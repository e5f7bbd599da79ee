import type { QueryCatalog } from "../types/index.js";

/**
 * GitHub GraphQL templates used by the profile report. Templates containing
 * `$pagination` are fetched page by page and flattened.
 */
export const githubQueries = {
  repos_contributed_to: `
{
    user(login: "$username") {
        repositoriesContributedTo(orderBy: {field: CREATED_AT, direction: DESC}, $pagination, includeUserRepositories: true) {
            nodes {
                primaryLanguage { name }
                name
                owner { login }
                isPrivate
                isFork
            }
            pageInfo { endCursor hasNextPage }
        }
    }
}`,
  user_repository_list: `
{
    user(login: "$username") {
        repositories(orderBy: {field: CREATED_AT, direction: DESC}, $pagination, affiliations: [OWNER, COLLABORATOR], isFork: false) {
            nodes {
                primaryLanguage { name }
                name
                owner { login }
                isPrivate
            }
            pageInfo { endCursor hasNextPage }
        }
    }
}`,
  repo_branch_list: `
{
    repository(owner: "$owner", name: "$name") {
        refs(refPrefix: "refs/heads/", orderBy: {direction: DESC, field: TAG_COMMIT_DATE}, $pagination) {
            nodes { name }
            pageInfo { endCursor hasNextPage }
        }
    }
}`,
  repo_commit_list: `
{
    repository(owner: "$owner", name: "$name") {
        ref(qualifiedName: "refs/heads/$branch") {
            target {
                ... on Commit {
                    history(author: { id: "$id" }, $pagination) {
                        nodes {
                            ... on Commit { additions deletions committedDate oid }
                        }
                        pageInfo { endCursor hasNextPage }
                    }
                }
            }
        }
    }
}`,
  hide_outdated_comment: `
mutation {
    minimizeComment(input: {classifier: OUTDATED, subjectId: "$id"}) {
        clientMutationId
    }
}`,
} satisfies QueryCatalog;

export type GithubQueryName = keyof typeof githubQueries;
