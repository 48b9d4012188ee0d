import { describe, expect, it } from "vitest";
import type { PullRequestCountContext } from "../domain/types.js";
import { countJsonArray, GitHubCliSource, GitLabCliSource } from "./cli-sources.js";
import {
  CommandExecutionError,
  type CommandRunner,
  type CommandRunOptions,
} from "./command-runner.js";

type Call = {
  command: string;
  args: readonly string[];
  options: CommandRunOptions;
};

class ScriptedRunner implements CommandRunner {
  readonly calls: Call[] = [];

  constructor(private readonly respond: (command: string, args: readonly string[]) => string) {}

  run(command: string, args: readonly string[], options: CommandRunOptions): string {
    this.calls.push({ command, args, options });
    return this.respond(command, args);
  }
}

const context: PullRequestCountContext = {
  identity: "jdoe",
  repositoryRoot: "/repo",
  remoteUrl: "git@github.com:acme/widgets.git",
  githubHost: "github.com",
};

const options = { timeoutMs: 5000, listLimit: 1000 };

describe("GitHubCliSource", () => {
  it("counts pull requests of every state once authenticated", async () => {
    const runner = new ScriptedRunner((_command, args) =>
      args[0] === "auth" ? "Logged in to github.com" : '[{"number":1},{"number":4},{"number":9}]',
    );

    const resolution = await new GitHubCliSource(runner, options).tryResolve(context);

    expect(resolution).toEqual({ status: "resolved", count: 3 });
    expect(runner.calls.map((call) => [call.command, ...call.args])).toEqual([
      ["gh", "auth", "status"],
      ["gh", "pr", "list", "--author", "jdoe", "--state", "all", "--limit", "1000", "--json", "number"],
    ]);
    expect(runner.calls[0]?.options).toEqual({ cwd: "/repo", timeoutMs: 5000 });
  });

  it("resolves an empty list to zero", async () => {
    const runner = new ScriptedRunner(() => "[]");
    expect(await new GitHubCliSource(runner, options).tryResolve(context)).toEqual({
      status: "resolved",
      count: 0,
    });
  });

  it("skips when gh is not authenticated", async () => {
    const runner = new ScriptedRunner((command, args) => {
      throw new CommandExecutionError("You are not logged into any GitHub hosts", command, args, "failed");
    });

    const resolution = await new GitHubCliSource(runner, options).tryResolve(context);

    expect(resolution).toEqual({
      status: "unavailable",
      reason: "gh is not authenticated; run 'gh auth login'",
    });
    expect(runner.calls).toHaveLength(1);
  });

  it("skips when gh is not installed", async () => {
    const runner = new ScriptedRunner((command, args) => {
      throw new CommandExecutionError("spawnSync gh ENOENT", command, args, "not_found");
    });

    expect(await new GitHubCliSource(runner, options).tryResolve(context)).toEqual({
      status: "unavailable",
      reason: "gh is not installed",
    });
  });

  it("falls through when the list fills the requested limit", async () => {
    const runner = new ScriptedRunner((_command, args) => (args[0] === "auth" ? "" : "[{},{},{}]"));

    expect(await new GitHubCliSource(runner, { timeoutMs: 5000, listLimit: 3 }).tryResolve(context)).toEqual({
      status: "unavailable",
      reason: "gh result truncated at 3",
    });
  });

  it("rejects output that is not a JSON array", async () => {
    const runner = new ScriptedRunner((_command, args) => (args[0] === "auth" ? "" : "head: illegal line count"));

    expect(await new GitHubCliSource(runner, options).tryResolve(context)).toEqual({
      status: "unavailable",
      reason: "gh returned malformed JSON",
    });
  });
});

describe("GitLabCliSource", () => {
  it("counts merge requests across states", async () => {
    const runner = new ScriptedRunner(() => '[{"iid":1},{"iid":2}]');

    const resolution = await new GitLabCliSource(runner, { timeoutMs: 5000, listLimit: 100 }).tryResolve(context);

    expect(resolution).toEqual({ status: "resolved", count: 2 });
    expect(runner.calls[0]?.args).toEqual([
      "mr",
      "list",
      "--author",
      "jdoe",
      "--all",
      "--per-page",
      "100",
      "--output",
      "json",
    ]);
  });

  it("falls through when a full page comes back", async () => {
    const runner = new ScriptedRunner(() => JSON.stringify(Array.from({ length: 100 }, (_, iid) => ({ iid }))));

    expect(await new GitLabCliSource(runner, { timeoutMs: 5000, listLimit: 100 }).tryResolve(context)).toEqual({
      status: "unavailable",
      reason: "glab result truncated at 100",
    });
  });

  it("reports the first line of a failure", async () => {
    const runner = new ScriptedRunner((command, args) => {
      throw new CommandExecutionError("Command failed: glab mr list\nnot a gitlab repository", command, args, "failed");
    });

    expect(await new GitLabCliSource(runner, options).tryResolve(context)).toEqual({
      status: "unavailable",
      reason: "glab failed: Command failed: glab mr list",
    });
  });
});

describe("countJsonArray", () => {
  it("counts only JSON arrays", () => {
    expect(countJsonArray("[1,2]")).toBe(2);
    expect(countJsonArray('{"total": 2}')).toBeNull();
    expect(countJsonArray("")).toBeNull();
  });
});
