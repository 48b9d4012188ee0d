import { execFileSync } from "node:child_process";

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number | null;

  constructor(message: string, args: readonly string[], exitCode: number | null) {
    super(message);
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = exitCode;
  }
}

export interface GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string;
}

const readExitStatus = (error: unknown): number | null => {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status = error.status;
    return typeof status === "number" ? status : null;
  }

  return null;
};

export class ExecGitCommandClient implements GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string {
    try {
      return execFileSync("git", ["-C", repositoryPath, "-c", "core.quotepath=false", ...args], {
        encoding: "utf8",
        maxBuffer: 1024 * 1024 * 64,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown git execution error";
      throw new GitCommandError(message, args, readExitStatus(error));
    }
  }
}
