import type { ContributionMetrics } from "@authorscope/core";
import {
  analyzeAuthorContributions,
  type AnalyzeAuthorContributionsInput,
  type ContributionAnalysisProgressEvent,
} from "./application/analyze-author-contributions.js";
import type { HistoryReader } from "./application/history-reader.js";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliHistoryReader } from "./infrastructure/git-history-reader.js";
import { FsWorkingTree } from "./infrastructure/working-tree.js";

export type {
  AnalyzeAuthorContributionsInput,
  ContributionAnalysisProgressEvent,
} from "./application/analyze-author-contributions.js";
export type { HistoryCollectionProgressEvent } from "./application/collect-author-history.js";
export type { HistoryReader, RecentWindow, WorkingTree } from "./application/history-reader.js";
export {
  DEFAULT_CONTRIBUTION_CONFIG,
  type ContributionComputationConfig,
} from "./domain/history-types.js";
export { createDateWindow, isWindowApplied } from "./domain/date-filter.js";
export { locateRepositoryRoot } from "./infrastructure/repository-locator.js";

export const createGitHistoryReader = (repositoryRoot: string): HistoryReader =>
  new GitCliHistoryReader(new ExecGitCommandClient(), repositoryRoot);

export const analyzeAuthorContributionsFromGit = (
  repositoryRoot: string,
  input: AnalyzeAuthorContributionsInput,
  onProgress?: (event: ContributionAnalysisProgressEvent) => void,
): ContributionMetrics =>
  analyzeAuthorContributions(
    input,
    createGitHistoryReader(repositoryRoot),
    new FsWorkingTree(repositoryRoot),
    onProgress,
  );
