import {
  NoCommitsForAuthorError,
  type AuthorQuery,
  type ContributionMetrics,
} from "@authorscope/core";
import { computeContributionMetrics } from "../domain/contribution-metrics.js";
import { isWindowApplied } from "../domain/date-filter.js";
import {
  DEFAULT_CONTRIBUTION_CONFIG,
  type ContributionComputationConfig,
} from "../domain/history-types.js";
import {
  collectAuthorHistory,
  type HistoryCollectionProgressEvent,
} from "./collect-author-history.js";
import type { HistoryReader, WorkingTree } from "./history-reader.js";

export type AnalyzeAuthorContributionsInput = {
  query: AuthorQuery;
  now?: Date;
  config?: Partial<ContributionComputationConfig>;
};

export type ContributionAnalysisProgressEvent =
  | { stage: "checking_author" }
  | { stage: "collecting_history" }
  | { stage: "history"; event: HistoryCollectionProgressEvent }
  | { stage: "computing_metrics" }
  | { stage: "analysis_completed"; totalCommits: number };

const createEffectiveConfig = (
  overrides: Partial<ContributionComputationConfig> | undefined,
): ContributionComputationConfig => ({
  ...DEFAULT_CONTRIBUTION_CONFIG,
  ...overrides,
});

/**
 * Aggregates one author's contribution metrics. Fails with `NoCommitsForAuthorError`
 * before any aggregation when the author has no commit inside the date window.
 */
export const analyzeAuthorContributions = (
  input: AnalyzeAuthorContributionsInput,
  reader: HistoryReader,
  workingTree: WorkingTree,
  onProgress?: (event: ContributionAnalysisProgressEvent) => void,
): ContributionMetrics => {
  const config = createEffectiveConfig(input.config);

  onProgress?.({ stage: "checking_author" });
  if (!reader.hasCommits(input.query)) {
    throw new NoCommitsForAuthorError(input.query.author, isWindowApplied(input.query.window));
  }

  onProgress?.({ stage: "collecting_history" });
  const history = collectAuthorHistory(
    input.query,
    reader,
    workingTree,
    { now: input.now ?? new Date(), days: config.recentWindowDays },
    (event) => onProgress?.({ stage: "history", event }),
  );

  onProgress?.({ stage: "computing_metrics" });
  const metrics = computeContributionMetrics(history, config);
  onProgress?.({ stage: "analysis_completed", totalCommits: metrics.totalCommits });
  return metrics;
};
