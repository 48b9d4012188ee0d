import { buildPullRequestSearchQuery, parseGitHubRemote } from "../domain/github-remote.js";
import {
  resolved,
  unavailable,
  type PullRequestCountContext,
  type PullRequestCountResolution,
  type PullRequestCountSource,
} from "../domain/types.js";
import { fetchJsonWithRetry } from "./fetch-json-with-retry.js";

export type GitHubApiSourceOptions = {
  apiBaseUrl: string;
  token: string | null;
  timeoutMs: number;
  retries: number;
  retryBaseDelayMs: number;
  fetchImpl?: typeof fetch;
};

const readTotalCount = (payload: unknown): number | null => {
  if (typeof payload !== "object" || payload === null || !("total_count" in payload)) {
    return null;
  }

  const totalCount = payload.total_count;
  if (typeof totalCount !== "number" || !Number.isInteger(totalCount) || totalCount < 0) {
    return null;
  }

  return totalCount;
};

const describeHttpFailure = (status: number | null, reason: string, hasToken: boolean): string => {
  switch (status) {
    case 401:
      return "GitHub API authentication failed; check GITHUB_TOKEN";
    case 403:
      return hasToken
        ? "GitHub API rate limit exceeded or insufficient permissions"
        : "GitHub API rate limit exceeded; set GITHUB_TOKEN";
    case 422:
      return "GitHub API rejected the search query (unknown user or repository?)";
    default:
      return `GitHub API request failed: ${reason}`;
  }
};

export class GitHubApiSource implements PullRequestCountSource {
  readonly id = "github_api";

  constructor(private readonly options: GitHubApiSourceOptions) {}

  searchUrl(context: PullRequestCountContext): string | null {
    const ref = context.remoteUrl === null ? null : parseGitHubRemote(context.remoteUrl, context.githubHost);
    if (ref === null) {
      return null;
    }

    const base = this.options.apiBaseUrl.replace(/\/+$/, "");
    const search = new URLSearchParams({ q: buildPullRequestSearchQuery(context.identity, ref) });
    return `${base}/search/issues?${search.toString()}`;
  }

  async tryResolve(context: PullRequestCountContext): Promise<PullRequestCountResolution> {
    const url = this.searchUrl(context);
    if (url === null) {
      return unavailable(
        context.remoteUrl === null
          ? "repository has no origin remote"
          : `origin remote is not hosted on ${context.githubHost}`,
      );
    }

    const headers: Record<string, string> = {
      accept: "application/vnd.github+json",
      "user-agent": "authorscope",
    };
    if (this.options.token !== null) {
      headers["authorization"] = `Bearer ${this.options.token}`;
    }

    const result = await fetchJsonWithRetry(url, {
      retries: this.options.retries,
      baseDelayMs: this.options.retryBaseDelayMs,
      timeoutMs: this.options.timeoutMs,
      headers,
      ...(this.options.fetchImpl === undefined ? {} : { fetchImpl: this.options.fetchImpl }),
    });

    if (!result.ok) {
      return unavailable(describeHttpFailure(result.status, result.reason, this.options.token !== null));
    }

    const totalCount = readTotalCount(result.payload);
    return totalCount === null ? unavailable("GitHub API returned a malformed search response") : resolved(totalCount);
  }
}
