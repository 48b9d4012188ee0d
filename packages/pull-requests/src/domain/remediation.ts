import { buildManualSearchUrl, parseGitHubRemote } from "./github-remote.js";
import type { PullRequestCountContext } from "./types.js";

export const buildRemediationHints = (context: PullRequestCountContext): string[] => {
  const hints = [
    "Install and authenticate the GitHub CLI: gh auth login",
    "Set the GITHUB_TOKEN environment variable to a token with read access to the repository",
  ];

  const ref = context.remoteUrl === null ? null : parseGitHubRemote(context.remoteUrl, context.githubHost);
  if (ref !== null) {
    hints.push(`Check manually at: ${buildManualSearchUrl(context.identity, ref)}`);
  }

  return hints;
};
