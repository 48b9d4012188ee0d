import type { PullRequestSourceId } from "@authorscope/core";
import {
  resolved,
  unavailable,
  type PullRequestCountContext,
  type PullRequestCountResolution,
  type PullRequestCountSource,
} from "../domain/types.js";
import { CommandExecutionError, type CommandRunner } from "./command-runner.js";

const firstLine = (message: string): string => message.split("\n")[0]?.trim() ?? message;

const describeFailure = (tool: string, error: unknown): string => {
  if (error instanceof CommandExecutionError) {
    switch (error.kind) {
      case "not_found":
        return `${tool} is not installed`;
      case "timed_out":
        return `${tool} timed out`;
      case "failed":
        return `${tool} failed: ${firstLine(error.message)}`;
    }
  }

  throw error;
};

export const countJsonArray = (raw: string): number | null => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  return Array.isArray(parsed) ? parsed.length : null;
};

type CliSourceOptions = {
  timeoutMs: number;
  listLimit: number;
};

abstract class CliPullRequestSource implements PullRequestCountSource {
  abstract readonly id: PullRequestSourceId;
  protected abstract readonly tool: string;

  constructor(
    protected readonly runner: CommandRunner,
    protected readonly options: CliSourceOptions,
  ) {}

  protected exec(args: readonly string[], context: PullRequestCountContext): string {
    return this.runner.run(this.tool, args, {
      cwd: context.repositoryRoot,
      timeoutMs: this.options.timeoutMs,
    });
  }

  protected countFromList(args: readonly string[], context: PullRequestCountContext): PullRequestCountResolution {
    let output: string;
    try {
      output = this.exec(args, context);
    } catch (error) {
      return unavailable(describeFailure(this.tool, error));
    }

    const count = countJsonArray(output);
    if (count === null) {
      return unavailable(`${this.tool} returned malformed JSON`);
    }

    // A full page may hide further results; let a later source report the exact total.
    if (count >= this.options.listLimit) {
      return unavailable(`${this.tool} result truncated at ${this.options.listLimit}`);
    }

    return resolved(count);
  }

  abstract tryResolve(context: PullRequestCountContext): Promise<PullRequestCountResolution>;
}

export class GitHubCliSource extends CliPullRequestSource {
  readonly id = "github_cli";
  protected readonly tool = "gh";

  async tryResolve(context: PullRequestCountContext): Promise<PullRequestCountResolution> {
    try {
      this.exec(["auth", "status"], context);
    } catch (error) {
      if (error instanceof CommandExecutionError && error.kind === "failed") {
        return unavailable("gh is not authenticated; run 'gh auth login'");
      }

      return unavailable(describeFailure(this.tool, error));
    }

    return this.countFromList(
      [
        "pr",
        "list",
        "--author",
        context.identity,
        "--state",
        "all",
        "--limit",
        String(this.options.listLimit),
        "--json",
        "number",
      ],
      context,
    );
  }
}

export class GitLabCliSource extends CliPullRequestSource {
  readonly id = "gitlab_cli";
  protected readonly tool = "glab";

  async tryResolve(context: PullRequestCountContext): Promise<PullRequestCountResolution> {
    return this.countFromList(
      [
        "mr",
        "list",
        "--author",
        context.identity,
        "--all",
        "--per-page",
        String(this.options.listLimit),
        "--output",
        "json",
      ],
      context,
    );
  }
}
