import {
  CALENDAR_WEEK,
  REPORT_SCHEMA_VERSION,
  type ContributionMetrics,
  type ContributionReport,
  type DateWindow,
  type FileLineCount,
  type PullRequestSourceId,
  type PullRequestSummary,
  type Weekday,
  type WeekdayActivity,
} from "@authorscope/core";

type JsonObject = Readonly<Record<string, unknown>>;

const PULL_REQUEST_SOURCES: readonly PullRequestSourceId[] = ["github_cli", "gitlab_cli", "github_api"];

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isInteger = (value: unknown): value is number => typeof value === "number" && Number.isInteger(value);

const isCount = (value: unknown): value is number => isInteger(value) && value >= 0;

const isWeekday = (value: unknown): value is Weekday => CALENDAR_WEEK.some((weekday) => weekday === value);

const isSourceId = (value: unknown): value is PullRequestSourceId =>
  PULL_REQUEST_SOURCES.some((source) => source === value);

const fail = (field: string): never => {
  throw new Error(`invalid_report_${field}`);
};

const readObject = (value: unknown, field: string): JsonObject => (isObject(value) ? value : fail(field));

const readString = (value: unknown, field: string): string => (typeof value === "string" ? value : fail(field));

const readNullableString = (value: unknown, field: string): string | null =>
  value === null ? null : readString(value, field);

const readCount = (value: unknown, field: string): number => (isCount(value) ? value : fail(field));

const readCountRecord = (value: unknown, field: string): Record<string, number> => {
  const counts: Record<string, number> = {};
  for (const [key, count] of Object.entries(readObject(value, field))) {
    counts[key] = readCount(count, field);
  }

  return counts;
};

const readDateWindow = (value: unknown): DateWindow => {
  const window = readObject(value, "date_window");
  return {
    startDate: readNullableString(window["startDate"], "date_window"),
    endDate: readNullableString(window["endDate"], "date_window"),
  };
};

const readPullRequests = (value: unknown): PullRequestSummary => {
  const pullRequests = readObject(value, "pull_requests");
  const count = pullRequests["count"];
  const source = pullRequests["source"];
  const remediation = pullRequests["remediation"];

  if (count !== "unknown" && !isCount(count)) {
    return fail("pull_requests");
  }
  if (source !== null && !isSourceId(source)) {
    return fail("pull_requests");
  }
  if (!Array.isArray(remediation)) {
    return fail("pull_requests");
  }

  return {
    identity: readString(pullRequests["identity"], "pull_requests"),
    count,
    source,
    remediation: remediation.map((hint: unknown) => readString(hint, "pull_requests")),
  };
};

const readLargestFiles = (value: unknown): FileLineCount[] => {
  if (!Array.isArray(value)) {
    return fail("metrics");
  }

  return value.map((entry: unknown) => {
    const file = readObject(entry, "metrics");
    return {
      filePath: readString(file["filePath"], "metrics"),
      lines: readCount(file["lines"], "metrics"),
    };
  });
};

const readWeekdayBreakdown = (value: unknown): Partial<Record<Weekday, number>> => {
  const raw = readObject(value, "metrics");
  const breakdown: Partial<Record<Weekday, number>> = {};
  for (const [key, count] of Object.entries(raw)) {
    if (!isWeekday(key)) {
      return fail("metrics");
    }
    breakdown[key] = readCount(count, "metrics");
  }

  return breakdown;
};

const readMostActiveWeekday = (value: unknown): WeekdayActivity | null => {
  if (value === null) {
    return null;
  }

  const activity = readObject(value, "metrics");
  const weekday = activity["weekday"];
  return {
    weekday: isWeekday(weekday) ? weekday : fail("metrics"),
    commits: readCount(activity["commits"], "metrics"),
  };
};

const readMetrics = (value: unknown): ContributionMetrics => {
  const metrics = readObject(value, "metrics");
  const netLines = metrics["netLines"];
  const daysActive = metrics["daysActive"];

  return {
    totalCommits: readCount(metrics["totalCommits"], "metrics"),
    uniqueCommits: readCount(metrics["uniqueCommits"], "metrics"),
    recentCommits30d: readCount(metrics["recentCommits30d"], "metrics"),
    activityScore: readCount(metrics["activityScore"], "metrics"),
    branchBreakdown: readCountRecord(metrics["branchBreakdown"], "metrics"),
    filesModified: readCount(metrics["filesModified"], "metrics"),
    totalLoc: readCount(metrics["totalLoc"], "metrics"),
    linesAdded: readCount(metrics["linesAdded"], "metrics"),
    linesDeleted: readCount(metrics["linesDeleted"], "metrics"),
    netLines: isInteger(netLines) ? netLines : fail("metrics"),
    locByExtension: readCountRecord(metrics["locByExtension"], "metrics"),
    largestFiles: readLargestFiles(metrics["largestFiles"]),
    firstCommitDate: readNullableString(metrics["firstCommitDate"], "metrics"),
    lastCommitDate: readNullableString(metrics["lastCommitDate"], "metrics"),
    daysActive: daysActive === null ? null : readCount(daysActive, "metrics"),
    yearlyBreakdown: readCountRecord(metrics["yearlyBreakdown"], "metrics"),
    monthlyBreakdown: readCountRecord(metrics["monthlyBreakdown"], "metrics"),
    weekdayBreakdown: readWeekdayBreakdown(metrics["weekdayBreakdown"]),
    mostActiveWeekday: readMostActiveWeekday(metrics["mostActiveWeekday"]),
  };
};

/** Reads a report previously written with `formatReport(report, "json")`. */
export const parseReport = (raw: string): ContributionReport => {
  const parsed: unknown = JSON.parse(raw);
  const report = readObject(parsed, "document");
  if (report["schemaVersion"] !== REPORT_SCHEMA_VERSION) {
    throw new Error("unsupported_report_schema");
  }

  const repository = readObject(report["repository"], "repository");

  return {
    schemaVersion: REPORT_SCHEMA_VERSION,
    author: readString(report["author"], "author"),
    repository: {
      name: readString(repository["name"], "repository"),
      rootPath: readString(repository["rootPath"], "repository"),
    },
    generatedAt: readString(report["generatedAt"], "generated_at"),
    dateWindow: readDateWindow(report["dateWindow"]),
    pullRequests: readPullRequests(report["pullRequests"]),
    metrics: readMetrics(report["metrics"]),
  };
};
