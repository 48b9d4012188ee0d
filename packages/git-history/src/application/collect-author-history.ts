import type { AuthorQuery, CommitRecord, FileLineCount } from "@authorscope/core";
import type { AuthorHistory } from "../domain/history-types.js";
import type { HistoryReader, RecentWindow, WorkingTree } from "./history-reader.js";

export type HistoryCollectionProgressEvent =
  | { stage: "commits_loaded"; commits: number }
  | { stage: "branch_scanned"; branch: string; commits: number }
  | { stage: "branches_scanned"; branches: number }
  | { stage: "recent_commits_counted"; commits: number }
  | { stage: "changed_files_listed"; files: number }
  | { stage: "line_counts_loaded"; presentFiles: number; missingFiles: number }
  | { stage: "file_stats_loaded"; files: number };

const REMOTE_PREFIX = "origin/";

export const toBranchDisplayName = (remoteBranch: string): string =>
  remoteBranch.startsWith(REMOTE_PREFIX) ? remoteBranch.slice(REMOTE_PREFIX.length) : remoteBranch;

const attachBranchNames = (
  commits: readonly CommitRecord[],
  branchesByHash: ReadonlyMap<string, readonly string[]>,
): readonly CommitRecord[] =>
  commits.map((commit) => ({
    ...commit,
    branchNames: branchesByHash.get(commit.hash) ?? [],
  }));

export const collectAuthorHistory = (
  query: AuthorQuery,
  reader: HistoryReader,
  workingTree: WorkingTree,
  recentWindow: RecentWindow,
  onProgress?: (event: HistoryCollectionProgressEvent) => void,
): AuthorHistory => {
  const rawCommits = reader.allCommits(query);
  onProgress?.({ stage: "commits_loaded", commits: rawCommits.length });

  const branchCommitCounts: Record<string, number> = {};
  const branchesByHash = new Map<string, string[]>();
  const remoteBranches = reader.remoteBranches();
  for (const remoteBranch of remoteBranches) {
    const hashes = reader.commitsOnBranch(remoteBranch, query);
    const displayName = toBranchDisplayName(remoteBranch);
    branchCommitCounts[displayName] = (branchCommitCounts[displayName] ?? 0) + hashes.length;
    for (const hash of hashes) {
      const names = branchesByHash.get(hash) ?? [];
      if (!names.includes(displayName)) {
        names.push(displayName);
      }
      branchesByHash.set(hash, names);
    }
    onProgress?.({ stage: "branch_scanned", branch: displayName, commits: hashes.length });
  }
  onProgress?.({ stage: "branches_scanned", branches: remoteBranches.length });

  const recentCommitCount = reader.recentCommits(query, recentWindow);
  onProgress?.({ stage: "recent_commits_counted", commits: recentCommitCount });

  const changedFiles = reader.changedFiles(query);
  onProgress?.({ stage: "changed_files_listed", files: changedFiles.length });

  const currentLineCounts: FileLineCount[] = [];
  for (const filePath of changedFiles) {
    const lines = workingTree.countLines(filePath);
    if (lines !== null) {
      currentLineCounts.push({ filePath, lines });
    }
  }
  onProgress?.({
    stage: "line_counts_loaded",
    presentFiles: currentLineCounts.length,
    missingFiles: changedFiles.length - currentLineCounts.length,
  });

  const fileChangeStats = reader.fileChangeStats(query);
  onProgress?.({ stage: "file_stats_loaded", files: fileChangeStats.length });

  return {
    commits: attachBranchNames(rawCommits, branchesByHash),
    branchCommitCounts,
    recentCommitCount,
    changedFiles,
    fileChangeStats,
    currentLineCounts,
  };
};
