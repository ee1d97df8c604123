import { differenceInCalendarDays, startOfMonth } from "date-fns";
import { absAmountCents, fromAmountCents } from "@/lib/finance/cents";
import type {
  BreakdownItem,
  DateWindow,
  Insight,
  InsightsGeneratorContext,
  PeriodBucket,
  PreparedTransaction
} from "@/src/features/insights/types";
import { daysInPeriod } from "@/src/features/insights/utils/granularity";
import { findBucket } from "@/src/features/insights/utils/lookups";
import { toPercentChange, toTrendDirection } from "@/src/features/insights/utils/stats";

const TOP_CATEGORY_WARNING_SHARE = 50;
const CHANGE_WARNING_PERCENT = 20;
const CHANGE_POSITIVE_PERCENT = -10;

function isMonthAligned(range: DateWindow): boolean {
  return (
    range.start.getTime() === startOfMonth(range.start).getTime() &&
    range.end.getTime() === startOfMonth(range.end).getTime()
  );
}

function categoryTotals(
  context: InsightsGeneratorContext,
  expenses: PreparedTransaction[],
  range: DateWindow
): Array<{ name: string; total: number }> {
  const totalsCents = new Map<string, number>();

  // Category aggregates are monthly; ranges not aligned to months read the transactions.
  const aggregateRecords = isMonthAligned(range)
    ? context.aggregates.fetchCategoryAggregates(range.start, range.end, context.baseCurrency)
    : [];

  if (aggregateRecords.length > 0) {
    for (const record of aggregateRecords) {
      totalsCents.set(record.categoryName, (totalsCents.get(record.categoryName) ?? 0) + absAmountCents(record.totalExpenses));
    }
  } else {
    for (const expense of expenses) {
      totalsCents.set(expense.category, (totalsCents.get(expense.category) ?? 0) + absAmountCents(expense.amount));
    }
  }

  return [...totalsCents.entries()]
    .map(([name, cents]) => ({ name, total: fromAmountCents(cents) }))
    .sort((left, right) => right.total - left.total || left.name.localeCompare(right.name));
}

function buildTopCategory(context: InsightsGeneratorContext, expenses: PreparedTransaction[]): Insight | null {
  const currentBucket = context.mode === "granularity" ? findBucket(context.buckets, context.currentBucketKey) : null;
  const range: DateWindow = currentBucket
    ? { start: currentBucket.periodStart, end: currentBucket.periodEnd }
    : context.window;
  const rangeExpenses = expenses.filter(
    (expense) => expense.timestamp >= range.start.getTime() && expense.timestamp < range.end.getTime()
  );
  const totalExpenses = currentBucket ? currentBucket.expenses : context.summary.totalExpenses;

  const sorted = categoryTotals(context, rangeExpenses, range);
  const top = sorted[0];
  if (!top) {
    return null;
  }

  const shareOf = (amount: number) => (totalExpenses > 0 ? (amount / totalExpenses) * 100 : 0);
  const percentage = shareOf(top.total);
  const items: BreakdownItem[] = sorted.map((item) => ({
    name: item.name,
    amount: item.total,
    percentage: shareOf(item.total)
  }));

  return {
    id: `top_spending_${top.name}`,
    type: "topSpendingCategory",
    title: "Top spending category",
    subtitle: top.name,
    metric: {
      value: top.total,
      formattedValue: context.formatters.currency(top.total, context.baseCurrency),
      currency: context.baseCurrency
    },
    trend: {
      direction: "down",
      changePercent: percentage,
      comparisonPeriod: `${percentage.toFixed(0)}% of total`
    },
    severity: percentage > TOP_CATEGORY_WARNING_SHARE ? "warning" : "neutral",
    category: "spending",
    detailData: { kind: "categoryBreakdown", items }
  };
}

function buildSpendingChange(context: InsightsGeneratorContext): Insight | null {
  if (context.granularity === "allTime") {
    return null;
  }

  const currentBucket = findBucket(context.buckets, context.currentBucketKey);
  const previousBucket = findBucket(context.buckets, context.previousBucketKey);
  if (!previousBucket || previousBucket.expenses <= 0) {
    return null;
  }

  const current = currentBucket?.expenses ?? 0;
  const changePercent = toPercentChange(current, previousBucket.expenses);
  if (changePercent === null) {
    return null;
  }

  return {
    id: "mom_spending",
    type: "monthOverMonthChange",
    title: "Spending change",
    subtitle: context.comparisonLabel,
    metric: {
      value: current,
      formattedValue: context.formatters.currency(current, context.baseCurrency),
      currency: context.baseCurrency
    },
    trend: {
      direction: toTrendDirection(changePercent),
      changePercent,
      changeAbsolute: current - previousBucket.expenses,
      comparisonPeriod: context.comparisonLabel
    },
    severity:
      changePercent > CHANGE_WARNING_PERCENT
        ? "warning"
        : changePercent < CHANGE_POSITIVE_PERCENT
          ? "positive"
          : "neutral",
    category: "spending",
    detailData: { kind: "periodPoints", points: currentBucket ? [previousBucket, currentBucket] : [previousBucket] }
  };
}

function buildAverageDailyForBuckets(context: InsightsGeneratorContext): Insight {
  const currentBucket = findBucket(context.buckets, context.currentBucketKey);
  const previousBucket = findBucket(context.buckets, context.previousBucketKey);
  const currentDays = currentBucket ? daysInPeriod(currentBucket.periodStart, currentBucket.periodEnd) : 1;
  const previousDays = previousBucket ? daysInPeriod(previousBucket.periodStart, previousBucket.periodEnd) : 1;
  const currentAverage = (currentBucket?.expenses ?? 0) / currentDays;
  const previousAverage = (previousBucket?.expenses ?? 0) / previousDays;
  const changePercent = toPercentChange(currentAverage, previousAverage);

  return {
    id: "avg_daily",
    type: "averageDailySpending",
    title: "Average daily spending",
    subtitle: currentBucket?.label ?? "",
    metric: {
      value: currentAverage,
      formattedValue: context.formatters.currency(currentAverage, context.baseCurrency),
      currency: context.baseCurrency
    },
    trend:
      changePercent !== null && previousAverage > 0
        ? {
            direction: toTrendDirection(changePercent),
            changePercent,
            changeAbsolute: currentAverage - previousAverage,
            comparisonPeriod: context.comparisonLabel
          }
        : undefined,
    severity: "neutral",
    category: "spending",
    detailData: {
      kind: "periodPoints",
      points: [previousBucket, currentBucket].filter((bucket): bucket is PeriodBucket => bucket !== null)
    }
  };
}

function buildAverageDailyForWindow(context: InsightsGeneratorContext): Insight {
  const end = context.window.end.getTime() < context.referenceDate.getTime() ? context.window.end : context.referenceDate;
  const days = Math.max(1, differenceInCalendarDays(end, context.window.start));
  const average = context.summary.totalExpenses / days;

  return {
    id: "avg_daily",
    type: "averageDailySpending",
    title: "Average daily spending",
    subtitle: `${days} days`,
    metric: {
      value: average,
      formattedValue: context.formatters.currency(average, context.baseCurrency),
      currency: context.baseCurrency
    },
    severity: "neutral",
    category: "spending"
  };
}

/** Top category, period-over-period change and average daily spending. */
export function generateSpendingInsights(context: InsightsGeneratorContext): Insight[] {
  const expenses = context.windowTransactions.filter((transaction) => transaction.type === "expense");
  if (expenses.length === 0) {
    context.logger.debug("spending_skipped", { reason: "no_expenses" });
    return [];
  }

  const insights: Insight[] = [];
  const topCategory = buildTopCategory(context, expenses);
  if (topCategory) insights.push(topCategory);

  const change = buildSpendingChange(context);
  if (change) insights.push(change);

  insights.push(
    context.mode === "granularity"
      ? buildAverageDailyForBuckets(context)
      : buildAverageDailyForWindow(context)
  );
  return insights;
}
