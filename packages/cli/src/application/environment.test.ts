import { describe, expect, it } from "vitest";
import { readRuntimeEnvironment } from "./environment.js";

describe("readRuntimeEnvironment", () => {
  it("uses defaults for an empty environment", () => {
    expect(readRuntimeEnvironment({})).toEqual({
      githubToken: null,
      githubApiUrl: null,
      pullRequestsDisabled: false,
      logLevel: "info",
    });
  });

  it("reads tokens, api overrides and the pull request switch", () => {
    expect(
      readRuntimeEnvironment({
        GITHUB_TOKEN: " test-secret ",
        GITHUB_API_URL: "https://ghe.example.test/api/v3",
        AUTHORSCOPE_PULL_REQUESTS: "NONE",
        AUTHORSCOPE_LOG_LEVEL: "debug",
      }),
    ).toEqual({
      githubToken: "test-secret",
      githubApiUrl: "https://ghe.example.test/api/v3",
      pullRequestsDisabled: true,
      logLevel: "debug",
    });
  });

  it("ignores blank values and unknown log levels", () => {
    expect(
      readRuntimeEnvironment({ GITHUB_TOKEN: "  ", AUTHORSCOPE_LOG_LEVEL: "verbose" }),
    ).toMatchObject({ githubToken: null, logLevel: "info" });
  });
});
