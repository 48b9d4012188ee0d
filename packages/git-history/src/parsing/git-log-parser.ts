import { COMMIT_FIELD_SEPARATOR, COMMIT_RECORD_SEPARATOR } from "../domain/git-log-format.js";
import type { GitLogEntry } from "../domain/history-types.js";
import type { FileChangeStat } from "@authorscope/core";

const parseInteger = (value: string): number | null => {
  if (value.length === 0) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    return null;
  }

  return parsed;
};

// git prints "-" for binary files; anything that is not a non-negative integer counts as zero.
const parseLineCount = (value: string): number => {
  const parsed = parseInteger(value.trim());
  if (parsed === null || parsed < 0) {
    return 0;
  }

  return parsed;
};

export const parseRenamedPath = (pathSpec: string): string => {
  if (!pathSpec.includes(" => ")) {
    return pathSpec;
  }

  const braceRenameMatch = pathSpec.match(/^(.*)\{(.*) => (.*)\}(.*)$/);
  if (braceRenameMatch !== null) {
    const [, prefix = "", , renamedTo = "", suffix = ""] = braceRenameMatch;
    return `${prefix}${renamedTo}${suffix}`.replace(/\/{2,}/g, "/");
  }

  const parts = pathSpec.split(" => ");
  const finalPart = parts[parts.length - 1];
  return finalPart ?? pathSpec;
};

export const parseNumstatLine = (line: string): FileChangeStat | null => {
  const parts = line.split("\t");
  if (parts.length < 3) {
    return null;
  }

  const additionsRaw = parts[0];
  const deletionsRaw = parts[1];
  const pathRaw = parts.slice(2).join("\t");

  if (additionsRaw === undefined || deletionsRaw === undefined || pathRaw.length === 0) {
    return null;
  }

  return {
    filePath: parseRenamedPath(pathRaw),
    additions: parseLineCount(additionsRaw),
    deletions: parseLineCount(deletionsRaw),
  };
};

const splitLines = (raw: string): string[] =>
  raw
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);

export const parseGitLog = (rawLog: string): readonly GitLogEntry[] => {
  const records = rawLog
    .split(COMMIT_RECORD_SEPARATOR)
    .map((record) => record.trim())
    .filter((record) => record.length > 0);

  const entries: GitLogEntry[] = [];

  for (const record of records) {
    const lines = splitLines(record);
    if (lines.length === 0) {
      continue;
    }

    const headerParts = lines[0]?.split(COMMIT_FIELD_SEPARATOR) ?? [];
    if (headerParts.length !== 2) {
      continue;
    }

    const [hash, authorDate] = headerParts;
    if (hash === undefined || authorDate === undefined || hash.length === 0) {
      continue;
    }

    const fileChanges: FileChangeStat[] = [];
    for (const line of lines.slice(1)) {
      const parsedLine = parseNumstatLine(line);
      if (parsedLine !== null) {
        fileChanges.push(parsedLine);
      }
    }

    entries.push({ hash, authorDate, fileChanges });
  }

  return entries;
};

/** Parses `for-each-ref --format=%(refname:short)%09%(symref)` output, skipping symbolic refs. */
export const parseRemoteBranches = (rawRefs: string): readonly string[] => {
  const branches: string[] = [];
  for (const line of splitLines(rawRefs)) {
    const [refName = "", symref = ""] = line.split("\t");
    const name = refName.trim();
    if (name.length === 0 || symref.trim().length > 0) {
      continue;
    }

    branches.push(name);
  }

  return branches;
};

export const sumFileChanges = (stats: readonly FileChangeStat[]): readonly FileChangeStat[] => {
  const byPath = new Map<string, { additions: number; deletions: number }>();
  for (const stat of stats) {
    const current = byPath.get(stat.filePath) ?? { additions: 0, deletions: 0 };
    current.additions += stat.additions;
    current.deletions += stat.deletions;
    byPath.set(stat.filePath, current);
  }

  return [...byPath.entries()]
    .map(([filePath, totals]) => ({ filePath, ...totals }))
    .sort((a, b) => a.filePath.localeCompare(b.filePath));
};
