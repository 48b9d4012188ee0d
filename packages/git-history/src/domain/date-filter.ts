import { UsageError, type DateWindow } from "@authorscope/core";

export const ONE_DAY_MS = 24 * 60 * 60 * 1000;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

type CalendarDate = {
  year: number;
  month: number;
  day: number;
};

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not.
const utcTimeOf = (date: CalendarDate): number => {
  const instant = new Date(0);
  instant.setUTCFullYear(date.year, date.month - 1, date.day);
  return instant.getTime();
};

const parseCalendarDate = (value: string): CalendarDate | null => {
  const match = value.match(ISO_DATE_PATTERN);
  if (match === null) {
    return null;
  }

  const year = Number.parseInt(match[1] ?? "", 10);
  const month = Number.parseInt(match[2] ?? "", 10);
  const day = Number.parseInt(match[3] ?? "", 10);
  const normalized = new Date(utcTimeOf({ year, month, day }));
  if (
    normalized.getUTCFullYear() !== year ||
    normalized.getUTCMonth() !== month - 1 ||
    normalized.getUTCDate() !== day
  ) {
    return null;
  }

  return { year, month, day };
};

export const isIsoCalendarDate = (value: string): boolean => parseCalendarDate(value) !== null;

const normalizeBound = (label: string, value: string | null | undefined): string | null => {
  if (value === undefined || value === null) {
    return null;
  }

  const trimmed = value.trim();
  if (!isIsoCalendarDate(trimmed)) {
    throw new UsageError(`${label} must be a calendar date in YYYY-MM-DD format (received '${value}')`);
  }

  return trimmed;
};

export const createDateWindow = (input: {
  startDate?: string | null;
  endDate?: string | null;
}): DateWindow => {
  const startDate = normalizeBound("--start-date", input.startDate);
  const endDate = normalizeBound("--end-date", input.endDate);

  if (startDate !== null && endDate !== null && startDate > endDate) {
    throw new UsageError(`--start-date ${startDate} is after --end-date ${endDate}`);
  }

  return { startDate, endDate };
};

export const isWindowApplied = (window: DateWindow): boolean =>
  window.startDate !== null || window.endDate !== null;

const localMidnight = (isoDate: string): Date | null => {
  const parsed = parseCalendarDate(isoDate);
  if (parsed === null) {
    return null;
  }

  return new Date(parsed.year, parsed.month - 1, parsed.day);
};

/**
 * Lower bound of the "recent activity" query: the trailing window ending at `now`,
 * narrowed further by the date window's start when that start is later.
 */
export const resolveRecentSince = (window: DateWindow, now: Date, windowDays: number): Date => {
  const trailingStart = new Date(now.getTime() - windowDays * ONE_DAY_MS);
  const windowStart = window.startDate === null ? null : localMidnight(window.startDate);
  if (windowStart !== null && windowStart.getTime() > trailingStart.getTime()) {
    return windowStart;
  }

  return trailingStart;
};

export const calendarDateOf = (isoTimestamp: string): string | null => {
  const candidate = isoTimestamp.slice(0, 10);
  return isIsoCalendarDate(candidate) ? candidate : null;
};

/** Inclusive whole-day bounds, compared against the calendar date in the timestamp's own offset. */
export const isWithinWindow = (window: DateWindow, isoTimestamp: string): boolean => {
  const date = calendarDateOf(isoTimestamp);
  if (date === null) {
    return false;
  }

  if (window.startDate !== null && date < window.startDate) {
    return false;
  }

  if (window.endDate !== null && date > window.endDate) {
    return false;
  }

  return true;
};

export const toDayNumber = (isoDate: string): number | null => {
  const parsed = parseCalendarDate(isoDate);
  if (parsed === null) {
    return null;
  }

  return Math.round(utcTimeOf(parsed) / ONE_DAY_MS);
};
