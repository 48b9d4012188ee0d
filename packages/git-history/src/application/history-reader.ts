import type { AuthorQuery, CommitRecord, FileChangeStat } from "@authorscope/core";

export type RecentWindow = {
  now: Date;
  days: number;
};

/**
 * Read-only queries against the commit history of one repository, always scoped
 * to an author and the query's date window.
 */
export interface HistoryReader {
  hasCommits(query: AuthorQuery): boolean;
  allCommits(query: AuthorQuery): readonly CommitRecord[];
  remoteBranches(): readonly string[];
  commitsOnBranch(branch: string, query: AuthorQuery): readonly string[];
  recentCommits(query: AuthorQuery, window: RecentWindow): number;
  changedFiles(query: AuthorQuery): readonly string[];
  fileChangeStats(query: AuthorQuery): readonly FileChangeStat[];
  remoteUrl(remoteName: string): string | null;
}

export interface WorkingTree {
  countLines(filePath: string): number | null;
}
