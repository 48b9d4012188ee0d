import { posix } from "node:path";
import {
  CALENDAR_WEEK,
  type ContributionMetrics,
  type FileLineCount,
  type Weekday,
  type WeekdayActivity,
} from "@authorscope/core";
import { calendarDateOf, ONE_DAY_MS, toDayNumber } from "./date-filter.js";
import type { AuthorHistory, ContributionComputationConfig } from "./history-types.js";

// Indexed by Date#getUTCDay().
const WEEKDAYS_BY_UTC_DAY: readonly Weekday[] = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

const clampCount = (value: number): number =>
  Number.isFinite(value) && value > 0 ? Math.trunc(value) : 0;

const increment = (counts: Map<string, number>, key: string): void => {
  counts.set(key, (counts.get(key) ?? 0) + 1);
};

const toSortedRecord = (counts: ReadonlyMap<string, number>): Record<string, number> =>
  Object.fromEntries([...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));

export const weekdayOf = (isoDate: string): Weekday | null => {
  const dayNumber = toDayNumber(isoDate);
  if (dayNumber === null) {
    return null;
  }

  return WEEKDAYS_BY_UTC_DAY[new Date(dayNumber * ONE_DAY_MS).getUTCDay()] ?? null;
};

export const computeActivityScore = (
  totalCommits: number,
  recentCommits: number,
  config: Pick<ContributionComputationConfig, "commitWeight" | "recentCommitWeight">,
): number => totalCommits * config.commitWeight + recentCommits * config.recentCommitWeight;

type TemporalBreakdown = Pick<
  ContributionMetrics,
  | "firstCommitDate"
  | "lastCommitDate"
  | "daysActive"
  | "yearlyBreakdown"
  | "monthlyBreakdown"
  | "weekdayBreakdown"
  | "mostActiveWeekday"
>;

// Ties go to the earlier day in the calendar week.
const pickMostActiveWeekday = (
  counts: ReadonlyMap<Weekday, number>,
): WeekdayActivity | null => {
  let best: WeekdayActivity | null = null;
  for (const weekday of CALENDAR_WEEK) {
    const commits = counts.get(weekday) ?? 0;
    if (commits > 0 && (best === null || commits > best.commits)) {
      best = { weekday, commits };
    }
  }

  return best;
};

export const computeTemporalBreakdown = (authorDates: readonly string[]): TemporalBreakdown => {
  const dates = authorDates
    .map((value) => calendarDateOf(value))
    .filter((value): value is string => value !== null);

  const years = new Map<string, number>();
  const months = new Map<string, number>();
  const weekdays = new Map<Weekday, number>();
  for (const date of dates) {
    const year = date.slice(0, 4);
    if (year !== "0000") {
      increment(years, year);
    }

    increment(months, date.slice(0, 7));
    const weekday = weekdayOf(date);
    if (weekday !== null) {
      weekdays.set(weekday, (weekdays.get(weekday) ?? 0) + 1);
    }
  }

  const sorted = [...dates].sort();
  const firstCommitDate = sorted[0] ?? null;
  const lastCommitDate = sorted[sorted.length - 1] ?? null;

  let daysActive: number | null = null;
  if (firstCommitDate !== null && lastCommitDate !== null && new Set(sorted).size >= 2) {
    const first = toDayNumber(firstCommitDate);
    const last = toDayNumber(lastCommitDate);
    daysActive = first === null || last === null ? null : last - first;
  }

  const weekdayBreakdown: Partial<Record<Weekday, number>> = {};
  for (const weekday of CALENDAR_WEEK) {
    const commits = weekdays.get(weekday);
    if (commits !== undefined) {
      weekdayBreakdown[weekday] = commits;
    }
  }

  return {
    firstCommitDate,
    lastCommitDate,
    daysActive,
    yearlyBreakdown: toSortedRecord(years),
    monthlyBreakdown: toSortedRecord(months),
    weekdayBreakdown,
    mostActiveWeekday: pickMostActiveWeekday(weekdays),
  };
};

const compareBySizeThenPath = (a: FileLineCount, b: FileLineCount): number =>
  b.lines - a.lines || a.filePath.localeCompare(b.filePath);

export const computeContributionMetrics = (
  history: AuthorHistory,
  config: ContributionComputationConfig,
): ContributionMetrics => {
  const totalCommits = history.commits.length;
  const uniqueCommits = new Set(history.commits.map((commit) => commit.hash)).size;
  const recentCommits30d = clampCount(history.recentCommitCount);

  const branchBreakdown = toSortedRecord(
    new Map(Object.entries(history.branchCommitCounts).filter(([, count]) => count > 0)),
  );

  let linesAdded = 0;
  let linesDeleted = 0;
  for (const stat of history.fileChangeStats) {
    linesAdded += clampCount(stat.additions);
    linesDeleted += clampCount(stat.deletions);
  }

  const presentFiles = history.currentLineCounts.filter((file) => file.lines >= 0);
  let totalLoc = 0;
  const extensionTotals = new Map<string, number>();
  for (const file of presentFiles) {
    totalLoc += file.lines;
    const extension = posix.extname(file.filePath);
    extensionTotals.set(extension, (extensionTotals.get(extension) ?? 0) + file.lines);
  }

  const locByExtension = Object.fromEntries(
    [...extensionTotals.entries()].sort(([extA, a], [extB, b]) => b - a || extA.localeCompare(extB)),
  );
  const largestFiles = [...presentFiles].sort(compareBySizeThenPath).slice(0, config.largestFilesLimit);

  return {
    totalCommits,
    uniqueCommits,
    recentCommits30d,
    activityScore: computeActivityScore(totalCommits, recentCommits30d, config),
    branchBreakdown,
    filesModified: history.changedFiles.length,
    totalLoc,
    linesAdded,
    linesDeleted,
    netLines: linesAdded - linesDeleted,
    locByExtension,
    largestFiles,
    ...computeTemporalBreakdown(history.commits.map((commit) => commit.authorDate)),
  };
};
