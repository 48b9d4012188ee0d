import type { PullRequestSourceId } from "@authorscope/core";

export type PullRequestCountResolution =
  | { status: "resolved"; count: number }
  | { status: "unavailable"; reason: string };

export type PullRequestCountContext = {
  identity: string;
  repositoryRoot: string;
  remoteUrl: string | null;
  githubHost: string;
};

export interface PullRequestCountSource {
  readonly id: PullRequestSourceId;
  tryResolve(context: PullRequestCountContext): Promise<PullRequestCountResolution>;
}

export type PullRequestCountConfig = {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  retries: number;
  retryBaseDelayMs: number;
  cliListLimit: number;
  gitlabPageSize: number;
};

export const DEFAULT_PULL_REQUEST_CONFIG: PullRequestCountConfig = {
  apiBaseUrl: "https://api.github.com",
  requestTimeoutMs: 10_000,
  retries: 2,
  retryBaseDelayMs: 500,
  cliListLimit: 1000,
  // glab returns one page of merge requests; GitLab caps a page at 100.
  gitlabPageSize: 100,
};

export const resolved = (count: number): PullRequestCountResolution => ({ status: "resolved", count });

export const unavailable = (reason: string): PullRequestCountResolution => ({
  status: "unavailable",
  reason,
});
