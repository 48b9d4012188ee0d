import type { CommitRecord, FileChangeStat, FileLineCount } from "@authorscope/core";

export type GitLogEntry = {
  hash: string;
  authorDate: string;
  fileChanges: readonly FileChangeStat[];
};

export type AuthorHistory = {
  commits: readonly CommitRecord[];
  branchCommitCounts: Readonly<Record<string, number>>;
  recentCommitCount: number;
  changedFiles: readonly string[];
  fileChangeStats: readonly FileChangeStat[];
  currentLineCounts: readonly FileLineCount[];
};

export type ContributionComputationConfig = {
  recentWindowDays: number;
  commitWeight: number;
  recentCommitWeight: number;
  largestFilesLimit: number;
};

export const DEFAULT_CONTRIBUTION_CONFIG: ContributionComputationConfig = {
  recentWindowDays: 30,
  commitWeight: 10,
  recentCommitWeight: 50,
  largestFilesLimit: 10,
};
