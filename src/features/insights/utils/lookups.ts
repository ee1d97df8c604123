import { addMonths, startOfMonth, subMonths } from "date-fns";
import { seriesMonthlyAmount } from "@/lib/finance/currency";
import type { MonthlyAggregate, RecurringSeriesDTO } from "@/lib/types";
import type { Granularity, InsightsGeneratorContext, PeriodBucket } from "@/src/features/insights/types";

export function findBucket(buckets: PeriodBucket[], key: string | null): PeriodBucket | null {
  if (key === null) return null;
  return buckets.find((bucket) => bucket.key === key) ?? null;
}

export function totalBalance(context: InsightsGeneratorContext): number {
  return context.accounts.reduce((sum, account) => sum + context.balanceFor(account.id), 0);
}

/** Monthly aggregates of the `count` calendar months ending with the anchor's month, oldest first. */
export function lastMonthlyAggregates(
  context: InsightsGeneratorContext,
  count: number,
  anchor: Date = context.now
): MonthlyAggregate[] {
  const from = startOfMonth(subMonths(anchor, count - 1));
  const to = startOfMonth(addMonths(anchor, 1));
  return context.aggregates
    .fetchMonthlyAggregates(from, to, context.baseCurrency)
    .filter((record) => {
      const monthStart = new Date(record.year, record.month - 1, 1).getTime();
      return monthStart >= from.getTime() && monthStart < to.getTime();
    })
    .sort((left, right) => left.year - right.year || left.month - right.month);
}

export function monthlyAggregateFor(context: InsightsGeneratorContext, date: Date): MonthlyAggregate | null {
  const year = date.getFullYear();
  const month = date.getMonth() + 1;
  return lastMonthlyAggregates(context, 1, date).find((record) => record.year === year && record.month === month) ?? null;
}

function isIncomeSeries(context: InsightsGeneratorContext, series: RecurringSeriesDTO): boolean {
  return context.categories.some((category) => category.name === series.category && category.type === "income");
}

function activeSeries(context: InsightsGeneratorContext): RecurringSeriesDTO[] {
  return context.recurringSeries.filter((series) => series.isActive);
}

export function activeExpenseSeries(context: InsightsGeneratorContext): RecurringSeriesDTO[] {
  return activeSeries(context).filter((series) => !isIncomeSeries(context, series));
}

export function monthlyEquivalentOf(context: InsightsGeneratorContext, series: RecurringSeriesDTO): number {
  return seriesMonthlyAmount(series, context.baseCurrency, context.convert, context.logger);
}

/** Monthly recurring income minus monthly recurring expenses. */
export function monthlyRecurringNet(context: InsightsGeneratorContext): number {
  return activeSeries(context).reduce((net, series) => {
    const monthly = monthlyEquivalentOf(context, series);
    return isIncomeSeries(context, series) ? net + monthly : net - monthly;
  }, 0);
}

export function monthlyRecurringExpenses(context: InsightsGeneratorContext): number {
  return activeExpenseSeries(context).reduce((sum, series) => sum + monthlyEquivalentOf(context, series), 0);
}

const PERIOD_MULTIPLIERS: Record<Granularity, number> = {
  week: 7 / 30,
  month: 1,
  quarter: 3,
  year: 12,
  allTime: 1
};

const PERIOD_UNITS: Record<Granularity, string> = {
  week: "per week",
  month: "per month",
  quarter: "per quarter",
  year: "per year",
  allTime: "per month"
};

export function periodMultiplier(granularity: Granularity): number {
  return PERIOD_MULTIPLIERS[granularity];
}

export function periodUnit(granularity: Granularity): string {
  return PERIOD_UNITS[granularity];
}
