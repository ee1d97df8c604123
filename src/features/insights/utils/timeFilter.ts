import {
  addDays,
  addMonths,
  addWeeks,
  addYears,
  format,
  startOfDay,
  startOfMonth,
  startOfWeek,
  startOfYear,
  subDays,
  subMonths,
  subYears
} from "date-fns";
import { z } from "zod";
import { parseDateKey } from "@/lib/finance/date-keys";
import type { DateWindow } from "@/src/features/insights/types";

export const TIME_FILTER_PRESETS = [
  "today",
  "yesterday",
  "thisWeek",
  "last30Days",
  "thisMonth",
  "lastMonth",
  "thisYear",
  "lastYear",
  "allTime",
  "custom"
] as const;

export type TimeFilterPreset = (typeof TIME_FILTER_PRESETS)[number];

export const timeFilterSchema = z
  .object({
    preset: z.enum(TIME_FILTER_PRESETS),
    from: z.string().optional(),
    to: z.string().optional()
  })
  .superRefine((value, context) => {
    if (value.preset !== "custom") return;

    const from = value.from ? parseDateKey(value.from) : null;
    const to = value.to ? parseDateKey(value.to) : null;
    if (!from) {
      context.addIssue({ code: z.ZodIssueCode.custom, path: ["from"], message: "Invalid start date" });
    }
    if (!to) {
      context.addIssue({ code: z.ZodIssueCode.custom, path: ["to"], message: "Invalid end date" });
    }
    if (from && to && from.getTime() > to.getTime()) {
      context.addIssue({ code: z.ZodIssueCode.custom, path: ["to"], message: "End date is before start date" });
    }
  });

export type TimeFilter = z.infer<typeof timeFilterSchema>;

export type ResolvedTimeFilter = DateWindow & {
  preset: TimeFilterPreset;
  label: string;
};

const WEEK_OPTIONS = { weekStartsOn: 1 } as const;
const ALL_TIME_START = new Date(0);
const ALL_TIME_END = new Date(8.64e15);

function windowOf(preset: TimeFilterPreset, label: string, start: Date, end: Date): ResolvedTimeFilter {
  return { preset, label, start, end };
}

/** Resolves a preset to a `[start, end)` window around the reference date. */
export function resolveTimeFilter(filter: TimeFilter, referenceDate: Date = new Date()): ResolvedTimeFilter {
  const today = startOfDay(referenceDate);

  switch (filter.preset) {
    case "today":
      return windowOf("today", "Today", today, addDays(today, 1));
    case "yesterday":
      return windowOf("yesterday", "Yesterday", subDays(today, 1), today);
    case "thisWeek": {
      const start = startOfWeek(today, WEEK_OPTIONS);
      return windowOf("thisWeek", "This week", start, addWeeks(start, 1));
    }
    case "last30Days":
      return windowOf("last30Days", "Last 30 days", subDays(today, 30), addDays(today, 1));
    case "thisMonth": {
      const start = startOfMonth(today);
      return windowOf("thisMonth", "This month", start, addMonths(start, 1));
    }
    case "lastMonth": {
      const start = startOfMonth(subMonths(today, 1));
      return windowOf("lastMonth", "Last month", start, addMonths(start, 1));
    }
    case "thisYear": {
      const start = startOfYear(today);
      return windowOf("thisYear", "This year", start, addYears(start, 1));
    }
    case "lastYear": {
      const start = startOfYear(subYears(today, 1));
      return windowOf("lastYear", "Last year", start, addYears(start, 1));
    }
    case "allTime":
      return windowOf("allTime", "All time", ALL_TIME_START, ALL_TIME_END);
    case "custom": {
      const from = filter.from ? parseDateKey(filter.from) : null;
      const to = filter.to ? parseDateKey(filter.to) : null;
      if (!from || !to) {
        return windowOf("custom", "Custom range", today, addDays(today, 1));
      }
      return windowOf(
        "custom",
        `${format(from, "d MMM yyyy")} - ${format(to, "d MMM yyyy")}`,
        from,
        addDays(to, 1)
      );
    }
  }
}

/**
 * Month used as "current" when comparing months: the window's last month for
 * windows that end in the past, otherwise the reference date's month.
 */
export function comparisonReferenceDate(resolved: ResolvedTimeFilter, referenceDate: Date): Date {
  const lastDay = subDays(resolved.end, 1);
  return lastDay.getTime() < referenceDate.getTime() ? lastDay : referenceDate;
}
