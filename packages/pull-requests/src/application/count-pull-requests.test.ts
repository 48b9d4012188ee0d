import type { PullRequestSourceId } from "@authorscope/core";
import { describe, expect, it } from "vitest";
import type {
  PullRequestCountContext,
  PullRequestCountResolution,
  PullRequestCountSource,
} from "../domain/types.js";
import { countPullRequests, type PullRequestCountProgressEvent } from "./count-pull-requests.js";

class FixedSource implements PullRequestCountSource {
  calls = 0;

  constructor(
    readonly id: PullRequestSourceId,
    private readonly resolution: PullRequestCountResolution | Error,
  ) {}

  async tryResolve(_context: PullRequestCountContext): Promise<PullRequestCountResolution> {
    this.calls += 1;
    if (this.resolution instanceof Error) {
      throw this.resolution;
    }

    return this.resolution;
  }
}

const context: PullRequestCountContext = {
  identity: "jdoe",
  repositoryRoot: "/repo",
  remoteUrl: "git@github.com:acme/widgets.git",
  githubHost: "github.com",
};

describe("countPullRequests", () => {
  it("falls through unavailable sources to the first definite count", async () => {
    const events: PullRequestCountProgressEvent[] = [];
    const summary = await countPullRequests(
      context,
      [
        new FixedSource("github_cli", { status: "unavailable", reason: "gh is not installed" }),
        new FixedSource("gitlab_cli", { status: "unavailable", reason: "glab is not installed" }),
        new FixedSource("github_api", { status: "resolved", count: 7 }),
      ],
      (event) => events.push(event),
    );

    expect(summary).toEqual({ identity: "jdoe", count: 7, source: "github_api", remediation: [] });
    expect(events).toEqual([
      { stage: "source_started", source: "github_cli" },
      { stage: "source_unavailable", source: "github_cli", reason: "gh is not installed" },
      { stage: "source_started", source: "gitlab_cli" },
      { stage: "source_unavailable", source: "gitlab_cli", reason: "glab is not installed" },
      { stage: "source_started", source: "github_api" },
      { stage: "source_resolved", source: "github_api", count: 7 },
    ]);
  });

  it("treats a zero count as final", async () => {
    const fallback = new FixedSource("github_api", { status: "resolved", count: 12 });
    const summary = await countPullRequests(context, [
      new FixedSource("github_cli", { status: "resolved", count: 0 }),
      fallback,
    ]);

    expect(summary.count).toBe(0);
    expect(summary.source).toBe("github_cli");
    expect(fallback.calls).toBe(0);
  });

  it("turns a throwing source into an unavailable step", async () => {
    const events: PullRequestCountProgressEvent[] = [];
    const summary = await countPullRequests(
      context,
      [
        new FixedSource("github_cli", new Error("boom")),
        new FixedSource("github_api", { status: "resolved", count: 2 }),
      ],
      (event) => events.push(event),
    );

    expect(summary.count).toBe(2);
    expect(events[1]).toEqual({
      stage: "source_unavailable",
      source: "github_cli",
      reason: "unexpected failure: boom",
    });
  });

  it("reports unknown with remediation hints when no source answers", async () => {
    const summary = await countPullRequests(context, [
      new FixedSource("github_cli", { status: "unavailable", reason: "gh is not installed" }),
      new FixedSource("github_api", { status: "unavailable", reason: "GitHub API request failed: request timed out" }),
    ]);

    expect(summary).toEqual({
      identity: "jdoe",
      count: "unknown",
      source: null,
      remediation: [
        "Install and authenticate the GitHub CLI: gh auth login",
        "Set the GITHUB_TOKEN environment variable to a token with read access to the repository",
        "Check manually at: https://github.com/acme/widgets/pulls?q=is%3Apr+author%3Ajdoe",
      ],
    });
  });

  it("omits the manual link when the remote is not on GitHub", async () => {
    const summary = await countPullRequests({ ...context, remoteUrl: "https://gitlab.com/acme/widgets.git" }, []);

    expect(summary.count).toBe("unknown");
    expect(summary.remediation).toHaveLength(2);
  });
});
