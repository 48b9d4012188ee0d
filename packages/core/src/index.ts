import { resolve } from "node:path";

export {
  AuthorscopeError,
  HistoryUnavailableError,
  NoCommitsForAuthorError,
  NotARepositoryError,
  UsageError,
  type AuthorscopeErrorCode,
} from "./errors.js";

export type DateWindow = {
  startDate: string | null;
  endDate: string | null;
};

export type AuthorQuery = {
  readonly author: string;
  readonly window: DateWindow;
  readonly pullRequestIdentity: string | null;
};

export type CommitRecord = {
  hash: string;
  authorDate: string;
  branchNames: readonly string[];
};

export type FileChangeStat = {
  filePath: string;
  additions: number;
  deletions: number;
};

export const CALENDAR_WEEK = [
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
  "Sunday",
] as const;

export type Weekday = (typeof CALENDAR_WEEK)[number];

export type WeekdayActivity = {
  weekday: Weekday;
  commits: number;
};

export type FileLineCount = {
  filePath: string;
  lines: number;
};

export type ContributionMetrics = {
  totalCommits: number;
  uniqueCommits: number;
  recentCommits30d: number;
  activityScore: number;
  branchBreakdown: Readonly<Record<string, number>>;
  filesModified: number;
  totalLoc: number;
  linesAdded: number;
  linesDeleted: number;
  netLines: number;
  locByExtension: Readonly<Record<string, number>>;
  largestFiles: readonly FileLineCount[];
  firstCommitDate: string | null;
  lastCommitDate: string | null;
  daysActive: number | null;
  yearlyBreakdown: Readonly<Record<string, number>>;
  monthlyBreakdown: Readonly<Record<string, number>>;
  weekdayBreakdown: Readonly<Partial<Record<Weekday, number>>>;
  mostActiveWeekday: WeekdayActivity | null;
};

export type PullRequestSourceId = "github_cli" | "gitlab_cli" | "github_api";

export type PullRequestCount = number | "unknown";

export type PullRequestSummary = {
  identity: string;
  count: PullRequestCount;
  source: PullRequestSourceId | null;
  remediation: readonly string[];
};

export const REPORT_SCHEMA_VERSION = "authorscope.report.v1" as const;

export type ReportSchemaVersion = typeof REPORT_SCHEMA_VERSION;

export type ContributionReport = {
  schemaVersion: ReportSchemaVersion;
  author: string;
  repository: {
    name: string;
    rootPath: string;
  };
  generatedAt: string;
  dateWindow: DateWindow;
  pullRequests: PullRequestSummary;
  metrics: ContributionMetrics;
};

export type TargetPath = {
  absolutePath: string;
};

export const resolveTargetPath = (inputPath: string | undefined, cwd: string): TargetPath => ({
  absolutePath: resolve(cwd, inputPath ?? "."),
});

export const createAuthorQuery = (input: {
  author: string;
  window?: DateWindow;
  pullRequestIdentity?: string;
}): AuthorQuery =>
  Object.freeze({
    author: input.author,
    window: Object.freeze({ ...(input.window ?? { startDate: null, endDate: null }) }),
    pullRequestIdentity: input.pullRequestIdentity ?? null,
  });
