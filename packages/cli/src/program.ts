import { Command, Option } from "commander";
import { AuthorscopeError, UsageError } from "@authorscope/core";
import { REPORT_FORMATS, type ReportFormat } from "@authorscope/reporter";
import type { RuntimeEnvironment } from "./application/environment.js";
import { createStderrLogger, LOG_LEVELS, type LogLevel } from "./application/logger.js";
import { runReportCommand } from "./application/run-report-command.js";

export const createProgram = (environment: RuntimeEnvironment, version: string): Command => {
  const program = new Command();

  program
    .name("authorscope")
    .description("Per-author contribution statistics for a Git repository")
    .version(version)
    .argument("<author>", "author name or email, matched the way git log --author matches")
    .argument("[repository]", "path inside the repository to analyze (defaults to the current directory)")
    .option("--start-date <date>", "only count commits on or after this day (YYYY-MM-DD)")
    .option("--end-date <date>", "only count commits on or before this day (YYYY-MM-DD)")
    .option("--github-username <login>", "identity used for the pull request count")
    .addOption(
      new Option("--format <format>", "report format: text or json")
        .choices(REPORT_FORMATS)
        .default("text"),
    )
    .option("--output <path>", "write the report to a file instead of stdout")
    .addOption(
      new Option(
        "--log-level <level>",
        "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
      )
        .choices(LOG_LEVELS)
        .default(environment.logLevel),
    )
    .showHelpAfterError()
    .action(
      async (
        author: string,
        repository: string | undefined,
        options: {
          startDate?: string;
          endDate?: string;
          githubUsername?: string;
          format: ReportFormat;
          output?: string;
          logLevel: LogLevel;
        },
      ) => {
        const logger = createStderrLogger(options.logLevel);
        try {
          const result = await runReportCommand(
            author,
            repository,
            {
              format: options.format,
              ...(options.startDate === undefined ? {} : { startDate: options.startDate }),
              ...(options.endDate === undefined ? {} : { endDate: options.endDate }),
              ...(options.githubUsername === undefined ? {} : { githubUsername: options.githubUsername }),
              ...(options.output === undefined ? {} : { outputPath: options.output }),
            },
            environment,
            logger,
          );

          if (result.writtenTo === null) {
            process.stdout.write(`${result.rendered}\n`);
          }
        } catch (error) {
          if (error instanceof UsageError) {
            program.error(`error: ${error.message}`, { exitCode: error.exitCode, code: error.code });
          }

          if (error instanceof AuthorscopeError) {
            process.stderr.write(`error: ${error.message}\n`);
            process.exitCode = error.exitCode;
            return;
          }

          throw error;
        }
      },
    );

  return program;
};

/** Drops a leading `--` that npm and tsx forward in front of the real arguments. */
export const normalizeArgv = (argv: readonly string[]): string[] => {
  const [executablePath = "", scriptPath = "", first, ...rest] = argv;
  return first === "--" ? [executablePath, scriptPath, ...rest] : [...argv];
};

// The author is required, so a bare invocation is a usage error: help goes to stderr, exit 1.
export const runCli = async (program: Command, argv: readonly string[]): Promise<void> => {
  const normalized = normalizeArgv(argv);
  if (normalized.length <= 2) {
    program.help({ error: true });
  }

  await program.parseAsync(normalized);
};
