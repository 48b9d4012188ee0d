export type GitHubRepositoryRef = {
  host: string;
  owner: string;
  repo: string;
};

const DEFAULT_GITHUB_HOST = "github.com";

export const githubHostForApi = (apiBaseUrl: string): string => {
  try {
    const host = new URL(apiBaseUrl).host.toLowerCase();
    return host === "api.github.com" ? DEFAULT_GITHUB_HOST : host;
  } catch {
    return DEFAULT_GITHUB_HOST;
  }
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Accepts scp-style (`git@host:owner/repo.git`), ssh:// and http(s):// remotes,
 * with or without credentials and the `.git` suffix.
 */
export const parseGitHubRemote = (
  remoteUrl: string,
  host: string = DEFAULT_GITHUB_HOST,
): GitHubRepositoryRef | null => {
  const pattern = new RegExp(
    `(?:^|[@/])${escapeRegExp(host)}(?::\\d+)?[:/]([^/\\s]+)/([^/\\s]+?)(?:\\.git)?/?$`,
    "i",
  );
  const match = remoteUrl.trim().match(pattern);
  const owner = match?.[1];
  const repo = match?.[2];
  if (owner === undefined || repo === undefined || repo.length === 0) {
    return null;
  }

  return { host: host.toLowerCase(), owner, repo };
};

export const buildPullRequestSearchQuery = (identity: string, ref: GitHubRepositoryRef): string =>
  `author:${identity} repo:${ref.owner}/${ref.repo} is:pr`;

export const buildManualSearchUrl = (identity: string, ref: GitHubRepositoryRef): string =>
  `https://${ref.host}/${ref.owner}/${ref.repo}/pulls?${new URLSearchParams({ q: `is:pr author:${identity}` }).toString()}`;
