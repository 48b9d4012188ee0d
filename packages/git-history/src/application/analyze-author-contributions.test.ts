import {
  createAuthorQuery,
  NoCommitsForAuthorError,
  type AuthorQuery,
  type CommitRecord,
  type FileChangeStat,
} from "@authorscope/core";
import { describe, expect, it } from "vitest";
import { isWithinWindow, resolveRecentSince } from "../domain/date-filter.js";
import { analyzeAuthorContributions, type ContributionAnalysisProgressEvent } from "./analyze-author-contributions.js";
import type { HistoryReader, RecentWindow, WorkingTree } from "./history-reader.js";

type FakeCommit = {
  hash: string;
  author: string;
  authorDate: string;
  branches: readonly string[];
  files: readonly FileChangeStat[];
};

class InMemoryHistoryReader implements HistoryReader {
  constructor(private readonly commits: readonly FakeCommit[]) {}

  private matching(query: AuthorQuery): FakeCommit[] {
    return this.commits.filter(
      (commit) => commit.author === query.author && isWithinWindow(query.window, commit.authorDate),
    );
  }

  hasCommits(query: AuthorQuery): boolean {
    return this.matching(query).length > 0;
  }

  allCommits(query: AuthorQuery): readonly CommitRecord[] {
    return this.matching(query).map((commit) => ({
      hash: commit.hash,
      authorDate: commit.authorDate,
      branchNames: [],
    }));
  }

  remoteBranches(): readonly string[] {
    return [...new Set(this.commits.flatMap((commit) => commit.branches))].sort();
  }

  commitsOnBranch(branch: string, query: AuthorQuery): readonly string[] {
    return this.matching(query)
      .filter((commit) => commit.branches.includes(branch))
      .map((commit) => commit.hash);
  }

  recentCommits(query: AuthorQuery, window: RecentWindow): number {
    const since = resolveRecentSince(query.window, window.now, window.days).getTime();
    return this.matching(query).filter((commit) => Date.parse(commit.authorDate) >= since).length;
  }

  changedFiles(query: AuthorQuery): readonly string[] {
    return [...new Set(this.matching(query).flatMap((commit) => commit.files.map((file) => file.filePath)))].sort();
  }

  fileChangeStats(query: AuthorQuery): readonly FileChangeStat[] {
    return this.matching(query).flatMap((commit) => commit.files);
  }

  remoteUrl(_remoteName: string): string | null {
    return null;
  }
}

class MapWorkingTree implements WorkingTree {
  constructor(private readonly lines: Readonly<Record<string, number>>) {}

  countLines(filePath: string): number | null {
    return this.lines[filePath] ?? null;
  }
}

const J_HISTORY: readonly FakeCommit[] = [
  {
    hash: "c1",
    author: "J",
    authorDate: "2024-01-01T10:00:00+00:00",
    branches: ["origin/main"],
    files: [{ filePath: "src/a.ts", additions: 10, deletions: 2 }],
  },
  {
    hash: "c2",
    author: "J",
    authorDate: "2024-01-15T10:00:00+00:00",
    branches: ["origin/main", "origin/feature/login"],
    files: [{ filePath: "src/b.ts", additions: 5, deletions: 0 }],
  },
  {
    hash: "c3",
    author: "J",
    authorDate: "2024-02-01T10:00:00+00:00",
    branches: ["origin/main"],
    files: [{ filePath: "src/a.ts", additions: 0, deletions: 3 }],
  },
  {
    hash: "k1",
    author: "K",
    authorDate: "2024-01-20T10:00:00+00:00",
    branches: ["origin/release"],
    files: [{ filePath: "src/c.ts", additions: 50, deletions: 0 }],
  },
];

const workingTree = new MapWorkingTree({ "src/a.ts": 30, "src/b.ts": 12 });
const now = new Date("2026-10-19T12:00:00.000Z");

describe("analyzeAuthorContributions", () => {
  it("aggregates the full history of one author", () => {
    const metrics = analyzeAuthorContributions(
      { query: createAuthorQuery({ author: "J" }), now },
      new InMemoryHistoryReader(J_HISTORY),
      workingTree,
    );

    expect(metrics).toMatchObject({
      totalCommits: 3,
      uniqueCommits: 3,
      recentCommits30d: 0,
      activityScore: 30,
      filesModified: 2,
      totalLoc: 42,
      linesAdded: 15,
      linesDeleted: 5,
      netLines: 10,
      firstCommitDate: "2024-01-01",
      lastCommitDate: "2024-02-01",
      daysActive: 31,
      branchBreakdown: { "feature/login": 1, main: 3 },
    });
  });

  it("scopes every aggregate to the date window", () => {
    const metrics = analyzeAuthorContributions(
      {
        query: createAuthorQuery({
          author: "J",
          window: { startDate: "2024-01-10", endDate: "2024-01-20" },
        }),
        now,
      },
      new InMemoryHistoryReader(J_HISTORY),
      workingTree,
    );

    expect(metrics.totalCommits).toBe(1);
    expect(metrics.linesAdded).toBe(5);
    expect(metrics.firstCommitDate).toBe("2024-01-15");
    expect(metrics.daysActive).toBeNull();
    expect(metrics.branchBreakdown).toEqual({ "feature/login": 1, main: 1 });
  });

  it("counts recent commits against the current date, not the window end", () => {
    const recentHistory: FakeCommit[] = [
      ...J_HISTORY,
      {
        hash: "c4",
        author: "J",
        authorDate: "2026-10-10T09:00:00+00:00",
        branches: ["origin/main"],
        files: [{ filePath: "src/a.ts", additions: 1, deletions: 0 }],
      },
    ];

    const unbounded = analyzeAuthorContributions(
      { query: createAuthorQuery({ author: "J" }), now },
      new InMemoryHistoryReader(recentHistory),
      workingTree,
    );
    expect(unbounded.recentCommits30d).toBe(1);
    expect(unbounded.activityScore).toBe(4 * 10 + 1 * 50);

    const pastYear = analyzeAuthorContributions(
      {
        query: createAuthorQuery({
          author: "J",
          window: { startDate: "2024-01-01", endDate: "2024-12-31" },
        }),
        now,
      },
      new InMemoryHistoryReader(recentHistory),
      workingTree,
    );
    expect(pastYear.recentCommits30d).toBe(0);
  });

  it("fails before aggregating when the author has no matching commits", () => {
    const events: ContributionAnalysisProgressEvent[] = [];
    const run = (): void => {
      analyzeAuthorContributions(
        {
          query: createAuthorQuery({
            author: "J",
            window: { startDate: "2025-01-01", endDate: null },
          }),
          now,
        },
        new InMemoryHistoryReader(J_HISTORY),
        workingTree,
        (event) => events.push(event),
      );
    };

    expect(run).toThrow(NoCommitsForAuthorError);
    expect(run).toThrow("No commits found for author 'J' in the specified date range");
    expect(events.map((event) => event.stage)).toEqual(["checking_author", "checking_author"]);
  });

  it("reports progress through each collection stage", () => {
    const events: ContributionAnalysisProgressEvent[] = [];
    analyzeAuthorContributions(
      { query: createAuthorQuery({ author: "K" }), now },
      new InMemoryHistoryReader(J_HISTORY),
      workingTree,
      (event) => events.push(event),
    );

    expect(events).toEqual([
      { stage: "checking_author" },
      { stage: "collecting_history" },
      { stage: "history", event: { stage: "commits_loaded", commits: 1 } },
      { stage: "history", event: { stage: "branch_scanned", branch: "feature/login", commits: 0 } },
      { stage: "history", event: { stage: "branch_scanned", branch: "main", commits: 0 } },
      { stage: "history", event: { stage: "branch_scanned", branch: "release", commits: 1 } },
      { stage: "history", event: { stage: "branches_scanned", branches: 3 } },
      { stage: "history", event: { stage: "recent_commits_counted", commits: 0 } },
      { stage: "history", event: { stage: "changed_files_listed", files: 1 } },
      { stage: "history", event: { stage: "line_counts_loaded", presentFiles: 0, missingFiles: 1 } },
      { stage: "history", event: { stage: "file_stats_loaded", files: 1 } },
      { stage: "computing_metrics" },
      { stage: "analysis_completed", totalCommits: 1 },
    ]);
  });
});
