import {
  HistoryUnavailableError,
  type AuthorQuery,
  type CommitRecord,
  type FileChangeStat,
} from "@authorscope/core";
import { isWithinWindow, resolveRecentSince } from "../domain/date-filter.js";
import { COMMIT_HEADER_FORMAT } from "../domain/git-log-format.js";
import type { GitLogEntry } from "../domain/history-types.js";
import type { HistoryReader, RecentWindow } from "../application/history-reader.js";
import { parseGitLog, parseRemoteBranches, sumFileChanges } from "../parsing/git-log-parser.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";

const authorArgs = (query: AuthorQuery): string[] => [`--author=${query.author}`];

/**
 * The date window is applied to author dates in process, never through
 * `--since`/`--until`, which filter on committer dates.
 */
export class GitCliHistoryReader implements HistoryReader {
  private readonly authorLogs = new Map<string, readonly GitLogEntry[]>();

  constructor(
    private readonly gitClient: GitCommandClient,
    private readonly repositoryPath: string,
  ) {}

  private run(args: readonly string[]): string {
    try {
      return this.gitClient.run(this.repositoryPath, args);
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new HistoryUnavailableError(error.message, error.args);
      }

      throw error;
    }
  }

  // One `git log --all --numstat` per author serves every windowed query.
  private authorLog(query: AuthorQuery): readonly GitLogEntry[] {
    const cached = this.authorLogs.get(query.author);
    if (cached !== undefined) {
      return cached;
    }

    const entries = parseGitLog(
      this.run([
        "log",
        "--all",
        ...authorArgs(query),
        `--pretty=format:${COMMIT_HEADER_FORMAT}`,
        "--numstat",
      ]),
    );
    this.authorLogs.set(query.author, entries);
    return entries;
  }

  private entriesInWindow(query: AuthorQuery): readonly GitLogEntry[] {
    return this.authorLog(query).filter((entry) => isWithinWindow(query.window, entry.authorDate));
  }

  hasCommits(query: AuthorQuery): boolean {
    return this.entriesInWindow(query).length > 0;
  }

  allCommits(query: AuthorQuery): readonly CommitRecord[] {
    return this.entriesInWindow(query).map((entry) => ({
      hash: entry.hash,
      authorDate: entry.authorDate,
      branchNames: [],
    }));
  }

  remoteBranches(): readonly string[] {
    const output = this.run([
      "for-each-ref",
      "--format=%(refname:short)%09%(symref)",
      "refs/remotes",
    ]);
    return parseRemoteBranches(output);
  }

  commitsOnBranch(branch: string, query: AuthorQuery): readonly string[] {
    const output = this.run([
      "log",
      ...authorArgs(query),
      `--pretty=format:${COMMIT_HEADER_FORMAT}`,
      branch,
      "--",
    ]);
    return parseGitLog(output)
      .filter((entry) => isWithinWindow(query.window, entry.authorDate))
      .map((entry) => entry.hash);
  }

  recentCommits(query: AuthorQuery, window: RecentWindow): number {
    const since = resolveRecentSince(query.window, window.now, window.days).getTime();
    return this.entriesInWindow(query).filter((entry) => Date.parse(entry.authorDate) >= since).length;
  }

  changedFiles(query: AuthorQuery): readonly string[] {
    return this.fileChangeStats(query).map((stat) => stat.filePath);
  }

  fileChangeStats(query: AuthorQuery): readonly FileChangeStat[] {
    return sumFileChanges(this.entriesInWindow(query).flatMap((entry) => entry.fileChanges));
  }

  remoteUrl(remoteName: string): string | null {
    try {
      const url = this.gitClient.run(this.repositoryPath, ["config", "--get", `remote.${remoteName}.url`]).trim();
      return url.length > 0 ? url : null;
    } catch (error) {
      // `git config --get` exits with 1 when the key is missing.
      if (error instanceof GitCommandError) {
        if (error.exitCode === 1) {
          return null;
        }

        throw new HistoryUnavailableError(error.message, error.args);
      }

      throw error;
    }
  }
}
