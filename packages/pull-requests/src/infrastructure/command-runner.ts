import { execFileSync } from "node:child_process";

export type CommandFailureKind = "not_found" | "timed_out" | "failed";

export class CommandExecutionError extends Error {
  readonly command: string;
  readonly args: readonly string[];
  readonly kind: CommandFailureKind;

  constructor(message: string, command: string, args: readonly string[], kind: CommandFailureKind) {
    super(message);
    this.name = "CommandExecutionError";
    this.command = command;
    this.args = args;
    this.kind = kind;
  }
}

export type CommandRunOptions = {
  cwd: string;
  timeoutMs: number;
};

export interface CommandRunner {
  run(command: string, args: readonly string[], options: CommandRunOptions): string;
}

const classifyFailure = (error: unknown): CommandFailureKind => {
  if (typeof error !== "object" || error === null) {
    return "failed";
  }

  if ("code" in error && error.code === "ENOENT") {
    return "not_found";
  }

  if ("signal" in error && error.signal === "SIGTERM") {
    return "timed_out";
  }

  return "failed";
};

export class ExecCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandRunOptions): string {
    try {
      return execFileSync(command, [...args], {
        cwd: options.cwd,
        encoding: "utf8",
        timeout: options.timeoutMs,
        maxBuffer: 1024 * 1024 * 16,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : `Unknown ${command} execution error`;
      throw new CommandExecutionError(message, command, args, classifyFailure(error));
    }
  }
}
