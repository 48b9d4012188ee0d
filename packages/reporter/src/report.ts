import { basename } from "node:path";
import {
  REPORT_SCHEMA_VERSION,
  type ContributionMetrics,
  type ContributionReport,
  type DateWindow,
  type PullRequestSummary,
} from "@authorscope/core";

export type CreateReportInput = {
  author: string;
  repositoryRoot: string;
  dateWindow: DateWindow;
  pullRequests: PullRequestSummary;
  metrics: ContributionMetrics;
  generatedAt?: string;
};

const freezeDeep = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      freezeDeep(nested);
    }
    Object.freeze(value);
  }

  return value;
};

/**
 * Assembles the report for one author. The result and everything it references
 * are frozen, so renderers never observe a partially updated report.
 */
export const createReport = (input: CreateReportInput): ContributionReport =>
  freezeDeep({
    schemaVersion: REPORT_SCHEMA_VERSION,
    author: input.author,
    repository: {
      name: basename(input.repositoryRoot) || input.repositoryRoot,
      rootPath: input.repositoryRoot,
    },
    generatedAt: input.generatedAt ?? new Date().toISOString(),
    dateWindow: { startDate: input.dateWindow.startDate, endDate: input.dateWindow.endDate },
    pullRequests: {
      identity: input.pullRequests.identity,
      count: input.pullRequests.count,
      source: input.pullRequests.source,
      remediation: [...input.pullRequests.remediation],
    },
    metrics: structuredClone(input.metrics),
  });
