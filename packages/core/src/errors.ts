export type AuthorscopeErrorCode =
  | "not_a_repository"
  | "no_commits_for_author"
  | "history_unavailable"
  | "usage_error";

export class AuthorscopeError extends Error {
  readonly code: AuthorscopeErrorCode;
  readonly exitCode = 1;

  constructor(code: AuthorscopeErrorCode, message: string) {
    super(message);
    this.name = "AuthorscopeError";
    this.code = code;
  }
}

export class NotARepositoryError extends AuthorscopeError {
  readonly startPath: string;

  constructor(startPath: string) {
    super(
      "not_a_repository",
      `Not a Git repository (or any parent up to the filesystem root): ${startPath}`,
    );
    this.name = "NotARepositoryError";
    this.startPath = startPath;
  }
}

export class NoCommitsForAuthorError extends AuthorscopeError {
  readonly author: string;
  readonly windowApplied: boolean;

  constructor(author: string, windowApplied: boolean) {
    super(
      "no_commits_for_author",
      windowApplied
        ? `No commits found for author '${author}' in the specified date range`
        : `No commits found for author '${author}' in this repository`,
    );
    this.name = "NoCommitsForAuthorError";
    this.author = author;
    this.windowApplied = windowApplied;
  }
}

export class HistoryUnavailableError extends AuthorscopeError {
  readonly args: readonly string[];

  constructor(message: string, args: readonly string[]) {
    super("history_unavailable", `Git history unavailable: ${message}`);
    this.name = "HistoryUnavailableError";
    this.args = args;
  }
}

export class UsageError extends AuthorscopeError {
  constructor(message: string) {
    super("usage_error", message);
    this.name = "UsageError";
  }
}
