import { existsSync, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { NotARepositoryError } from "@authorscope/core";

const GIT_METADATA_ENTRY = ".git";

const isDirectory = (path: string): boolean => {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
};

/**
 * Walks from `startPath` up to the filesystem root and returns the first directory
 * holding git metadata. `.git` may be a directory or, for worktrees and submodules,
 * a file.
 */
export const locateRepositoryRoot = (startPath: string): string => {
  const absoluteStart = resolve(startPath);
  if (!isDirectory(absoluteStart)) {
    throw new NotARepositoryError(absoluteStart);
  }

  let current = absoluteStart;
  for (;;) {
    if (existsSync(join(current, GIT_METADATA_ENTRY))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) {
      throw new NotARepositoryError(absoluteStart);
    }

    current = parent;
  }
};
