import type { PullRequestSummary } from "@authorscope/core";
import {
  countPullRequests,
  type PullRequestCountProgressEvent,
} from "./application/count-pull-requests.js";
import { githubHostForApi } from "./domain/github-remote.js";
import {
  DEFAULT_PULL_REQUEST_CONFIG,
  type PullRequestCountConfig,
  type PullRequestCountSource,
} from "./domain/types.js";
import { GitHubCliSource, GitLabCliSource } from "./infrastructure/cli-sources.js";
import { ExecCommandRunner, type CommandRunner } from "./infrastructure/command-runner.js";
import { GitHubApiSource } from "./infrastructure/github-api-source.js";

export type { PullRequestCountProgressEvent } from "./application/count-pull-requests.js";
export {
  DEFAULT_PULL_REQUEST_CONFIG,
  type PullRequestCountConfig,
  type PullRequestCountContext,
  type PullRequestCountResolution,
  type PullRequestCountSource,
} from "./domain/types.js";
export { countPullRequests } from "./application/count-pull-requests.js";

export type CountPullRequestsInput = {
  identity: string;
  repositoryRoot: string;
  remoteUrl: string | null;
};

export type PullRequestLookupOptions = {
  token: string | null;
  disabled: boolean;
  config?: Partial<PullRequestCountConfig>;
};

export const createDefaultPullRequestSources = (
  config: PullRequestCountConfig,
  token: string | null,
  runner: CommandRunner = new ExecCommandRunner(),
): readonly PullRequestCountSource[] => {
  return [
    new GitHubCliSource(runner, { timeoutMs: config.requestTimeoutMs, listLimit: config.cliListLimit }),
    new GitLabCliSource(runner, { timeoutMs: config.requestTimeoutMs, listLimit: config.gitlabPageSize }),
    new GitHubApiSource({
      apiBaseUrl: config.apiBaseUrl,
      token,
      timeoutMs: config.requestTimeoutMs,
      retries: config.retries,
      retryBaseDelayMs: config.retryBaseDelayMs,
    }),
  ];
};

export const countPullRequestsFromEnvironment = async (
  input: CountPullRequestsInput,
  options: PullRequestLookupOptions,
  onProgress?: (event: PullRequestCountProgressEvent) => void,
): Promise<PullRequestSummary> => {
  const config: PullRequestCountConfig = { ...DEFAULT_PULL_REQUEST_CONFIG, ...options.config };
  const sources = options.disabled ? [] : createDefaultPullRequestSources(config, options.token);

  return countPullRequests(
    { ...input, githubHost: githubHostForApi(config.apiBaseUrl) },
    sources,
    onProgress,
  );
};
