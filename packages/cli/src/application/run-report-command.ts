import {
  createAuthorQuery,
  resolveTargetPath,
  UsageError,
  type ContributionMetrics,
  type ContributionReport,
  type PullRequestSummary,
} from "@authorscope/core";
import {
  analyzeAuthorContributionsFromGit,
  createDateWindow,
  createGitHistoryReader,
  locateRepositoryRoot,
  type AnalyzeAuthorContributionsInput,
  type ContributionAnalysisProgressEvent,
} from "@authorscope/git-history";
import {
  countPullRequestsFromEnvironment,
  type CountPullRequestsInput,
  type PullRequestCountProgressEvent,
  type PullRequestLookupOptions,
} from "@authorscope/pull-requests";
import {
  createReport,
  formatReport,
  writeReportFile,
  type ReportFormat,
} from "@authorscope/reporter";
import type { RuntimeEnvironment } from "./environment.js";
import { createSilentLogger, type Logger } from "./logger.js";

export type ReportCommandOptions = {
  startDate?: string;
  endDate?: string;
  githubUsername?: string;
  format: ReportFormat;
  outputPath?: string;
};

export type ReportCommandResult = {
  report: ContributionReport;
  rendered: string;
  writtenTo: string | null;
};

/** Seams to git, the PR sources and the filesystem; tests swap them for in-memory versions. */
export type ReportCommandServices = {
  cwd: string;
  now: () => Date;
  locateRepositoryRoot: (startPath: string) => string;
  analyzeContributions: (
    repositoryRoot: string,
    input: AnalyzeAuthorContributionsInput,
    onProgress: (event: ContributionAnalysisProgressEvent) => void,
  ) => ContributionMetrics;
  readOriginUrl: (repositoryRoot: string) => string | null;
  countPullRequests: (
    input: CountPullRequestsInput,
    options: PullRequestLookupOptions,
    onProgress: (event: PullRequestCountProgressEvent) => void,
  ) => Promise<PullRequestSummary>;
  writeReport: (outputPath: string, rendered: string) => Promise<string>;
};

export const createDefaultServices = (): ReportCommandServices => ({
  cwd: process.cwd(),
  now: () => new Date(),
  locateRepositoryRoot,
  analyzeContributions: analyzeAuthorContributionsFromGit,
  readOriginUrl: (repositoryRoot) => createGitHistoryReader(repositoryRoot).remoteUrl("origin"),
  countPullRequests: countPullRequestsFromEnvironment,
  writeReport: writeReportFile,
});

const createContributionProgressReporter =
  (logger: Logger) =>
  (event: ContributionAnalysisProgressEvent): void => {
    switch (event.stage) {
      case "checking_author":
        logger.debug("history: checking for commits by author");
        break;
      case "collecting_history":
        logger.info("history: collecting author history");
        break;
      case "history":
        switch (event.event.stage) {
          case "commits_loaded":
            logger.info(`history: ${event.event.commits} commits across all refs`);
            break;
          case "branch_scanned":
            logger.debug(`history: ${event.event.branch} has ${event.event.commits} commits`);
            break;
          case "branches_scanned":
            logger.info(`history: scanned ${event.event.branches} remote branches`);
            break;
          case "recent_commits_counted":
            logger.debug(`history: ${event.event.commits} commits in the recent window`);
            break;
          case "changed_files_listed":
            logger.info(`history: ${event.event.files} files touched`);
            break;
          case "line_counts_loaded":
            logger.debug(
              `history: counted lines in ${event.event.presentFiles} files (${event.event.missingFiles} no longer present)`,
            );
            break;
          case "file_stats_loaded":
            logger.debug(`history: loaded change stats for ${event.event.files} files`);
            break;
        }
        break;
      case "computing_metrics":
        logger.debug("metrics: aggregating");
        break;
      case "analysis_completed":
        logger.info(`metrics: completed (${event.totalCommits} commits)`);
        break;
    }
  };

const createPullRequestProgressReporter =
  (logger: Logger) =>
  (event: PullRequestCountProgressEvent): void => {
    switch (event.stage) {
      case "source_started":
        logger.debug(`pull requests: trying ${event.source}`);
        break;
      case "source_unavailable":
        logger.info(`pull requests: ${event.source} unavailable (${event.reason})`);
        break;
      case "source_resolved":
        logger.info(`pull requests: ${event.count} found via ${event.source}`);
        break;
      case "count_unknown":
        logger.warn("pull requests: count unknown");
        for (const hint of event.remediation) {
          logger.warn(`pull requests: ${hint}`);
        }
        break;
    }
  };

export const runReportCommand = async (
  author: string,
  inputPath: string | undefined,
  options: ReportCommandOptions,
  environment: Omit<RuntimeEnvironment, "logLevel">,
  logger: Logger = createSilentLogger(),
  services: ReportCommandServices = createDefaultServices(),
): Promise<ReportCommandResult> => {
  const trimmedAuthor = author.trim();
  if (trimmedAuthor.length === 0) {
    throw new UsageError("author must not be empty");
  }

  const target = resolveTargetPath(inputPath, services.cwd);
  logger.debug(`locating repository from ${target.absolutePath}`);
  const repositoryRoot = services.locateRepositoryRoot(target.absolutePath);
  logger.info(`repository: ${repositoryRoot}`);

  const window = createDateWindow({
    startDate: options.startDate ?? null,
    endDate: options.endDate ?? null,
  });
  const githubUsername = options.githubUsername?.trim();
  const query = createAuthorQuery({
    author: trimmedAuthor,
    window,
    ...(githubUsername === undefined || githubUsername.length === 0
      ? {}
      : { pullRequestIdentity: githubUsername }),
  });

  const now = services.now();
  const metrics = services.analyzeContributions(
    repositoryRoot,
    { query, now },
    createContributionProgressReporter(logger),
  );

  const remoteUrl = services.readOriginUrl(repositoryRoot);
  if (remoteUrl === null) {
    logger.debug("pull requests: repository has no origin remote");
  }

  if (environment.pullRequestsDisabled) {
    logger.info("pull requests: lookup disabled by AUTHORSCOPE_PULL_REQUESTS=none");
  }

  const pullRequests = await services.countPullRequests(
    {
      identity: query.pullRequestIdentity ?? query.author,
      repositoryRoot,
      remoteUrl,
    },
    {
      token: environment.githubToken,
      disabled: environment.pullRequestsDisabled,
      ...(environment.githubApiUrl === null ? {} : { config: { apiBaseUrl: environment.githubApiUrl } }),
    },
    createPullRequestProgressReporter(logger),
  );

  const report = createReport({
    author: query.author,
    repositoryRoot,
    dateWindow: query.window,
    pullRequests,
    metrics,
    generatedAt: now.toISOString(),
  });
  const rendered = formatReport(report, options.format);

  if (options.outputPath === undefined) {
    return { report, rendered, writtenTo: null };
  }

  const writtenTo = await services.writeReport(options.outputPath, rendered);
  logger.info(`report written: ${writtenTo}`);
  return { report, rendered, writtenTo };
};
