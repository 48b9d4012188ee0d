import { parseLogLevel, type LogLevel } from "./logger.js";

export type RuntimeEnvironment = {
  githubToken: string | null;
  githubApiUrl: string | null;
  pullRequestsDisabled: boolean;
  logLevel: LogLevel;
};

type EnvironmentVariables = Readonly<Record<string, string | undefined>>;

const nonEmpty = (value: string | undefined): string | null => {
  const trimmed = value?.trim() ?? "";
  return trimmed.length === 0 ? null : trimmed;
};

export const readRuntimeEnvironment = (env: EnvironmentVariables): RuntimeEnvironment => ({
  githubToken: nonEmpty(env["GITHUB_TOKEN"]),
  githubApiUrl: nonEmpty(env["GITHUB_API_URL"]),
  pullRequestsDisabled: nonEmpty(env["AUTHORSCOPE_PULL_REQUESTS"])?.toLowerCase() === "none",
  logLevel: parseLogLevel(nonEmpty(env["AUTHORSCOPE_LOG_LEVEL"]) ?? undefined),
});
