import {
  addDays,
  addMonths,
  addQuarters,
  addWeeks,
  addYears,
  differenceInCalendarDays,
  format,
  getISOWeekYear,
  startOfDay,
  startOfMonth,
  startOfQuarter,
  startOfWeek,
  startOfYear,
  subMonths,
  subWeeks,
  subYears
} from "date-fns";
import { z } from "zod";
import { GRANULARITIES, type DateWindow, type Granularity } from "@/src/features/insights/types";

const WEEK_OPTIONS = { weekStartsOn: 1 } as const;
const WEEK_LOOKBACK = 52;
const MONTH_LOOKBACK = 12;
const YEAR_LOOKBACK = 3;

export const granularitySchema = z.enum(GRANULARITIES);

export type PeriodSlot = {
  key: string;
  label: string;
  start: Date;
  end: Date;
};

/**
 * Window a granularity covers. The end is exclusive (start of tomorrow);
 * without a first transaction date the all-time window is empty.
 */
export function resolveGranularityWindow(
  granularity: Granularity,
  now: Date,
  firstTransactionDate: Date | null
): DateWindow {
  const end = startOfDay(addDays(now, 1));

  switch (granularity) {
    case "week":
      return { start: subWeeks(startOfWeek(now, WEEK_OPTIONS), WEEK_LOOKBACK), end };
    case "month":
      return { start: startOfMonth(firstTransactionDate ?? subMonths(now, MONTH_LOOKBACK)), end };
    case "quarter":
      return { start: startOfQuarter(firstTransactionDate ?? subMonths(now, MONTH_LOOKBACK)), end };
    case "year":
      return { start: startOfYear(firstTransactionDate ?? subYears(now, YEAR_LOOKBACK)), end };
    case "allTime":
      return { start: firstTransactionDate ? startOfDay(firstTransactionDate) : end, end };
  }
}

export function periodStartFor(granularity: Granularity, date: Date, window: DateWindow): Date {
  switch (granularity) {
    case "week":
      return startOfWeek(date, WEEK_OPTIONS);
    case "month":
      return startOfMonth(date);
    case "quarter":
      return startOfQuarter(date);
    case "year":
      return startOfYear(date);
    case "allTime":
      return window.start;
  }
}

function nextPeriodStart(granularity: Exclude<Granularity, "allTime">, start: Date): Date {
  switch (granularity) {
    case "week":
      return addWeeks(start, 1);
    case "month":
      return addMonths(start, 1);
    case "quarter":
      return addQuarters(start, 1);
    case "year":
      return addYears(start, 1);
  }
}

export function bucketKeyFor(granularity: Granularity, date: Date): string {
  switch (granularity) {
    case "week":
      return format(date, "RRRR-'W'II");
    case "month":
      return format(date, "yyyy-MM");
    case "quarter":
      return format(date, "yyyy-'Q'Q");
    case "year":
      return format(date, "yyyy");
    case "allTime":
      return "all";
  }
}

export function bucketLabelFor(granularity: Granularity, start: Date, now: Date): string {
  switch (granularity) {
    case "week":
      return getISOWeekYear(start) === getISOWeekYear(now) ? format(start, "d MMM") : format(start, "d MMM ''yy");
    case "month":
      return format(start, "MMM yyyy");
    case "quarter":
      return format(start, "'Q'Q yyyy");
    case "year":
      return format(start, "yyyy");
    case "allTime":
      return "All time";
  }
}

export function comparisonLabelFor(granularity: Granularity): string {
  switch (granularity) {
    case "week":
      return "vs previous week";
    case "month":
      return "vs previous month";
    case "quarter":
      return "vs previous quarter";
    case "year":
      return "vs previous year";
    case "allTime":
      return "all time";
  }
}

/** Every calendar period of the window, in order, with no gaps. */
export function enumeratePeriods(granularity: Granularity, window: DateWindow, now: Date): PeriodSlot[] {
  if (window.start.getTime() >= window.end.getTime()) {
    return [];
  }

  if (granularity === "allTime") {
    return [
      {
        key: bucketKeyFor(granularity, window.start),
        label: bucketLabelFor(granularity, window.start, now),
        start: window.start,
        end: window.end
      }
    ];
  }

  const slots: PeriodSlot[] = [];
  let cursor = periodStartFor(granularity, window.start, window);
  while (cursor.getTime() < window.end.getTime()) {
    const end = nextPeriodStart(granularity, cursor);
    slots.push({
      key: bucketKeyFor(granularity, cursor),
      label: bucketLabelFor(granularity, cursor, now),
      start: cursor,
      end
    });
    cursor = end;
  }
  return slots;
}

export function currentAndPreviousKeys(
  granularity: Granularity,
  now: Date
): { currentKey: string; previousKey: string | null } {
  if (granularity === "allTime") {
    return { currentKey: bucketKeyFor(granularity, now), previousKey: null };
  }

  const currentStart = periodStartFor(granularity, now, { start: now, end: now });
  const previousStart = periodStartFor(granularity, addDays(currentStart, -1), { start: now, end: now });
  return {
    currentKey: bucketKeyFor(granularity, currentStart),
    previousKey: bucketKeyFor(granularity, previousStart)
  };
}

export function daysInPeriod(start: Date, end: Date): number {
  return Math.max(1, differenceInCalendarDays(end, start));
}
