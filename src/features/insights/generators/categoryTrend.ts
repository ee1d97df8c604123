import { startOfMonth, subMonths } from "date-fns";
import type { CategoryAggregateRecord } from "@/lib/types";
import type { Insight, InsightsGeneratorContext } from "@/src/features/insights/types";

const HISTORY_MONTHS = 6;
const MIN_RECORDS = 4;
const MIN_CATEGORY_RECORDS = 3;
const MIN_STREAK = 2;

function risingStreak(sorted: CategoryAggregateRecord[]): number {
  let streak = 0;
  for (let index = sorted.length - 1; index > 0; index -= 1) {
    if (sorted[index].totalExpenses > sorted[index - 1].totalExpenses) {
      streak += 1;
    } else {
      break;
    }
  }
  return streak;
}

/** Expense category that has risen for the most consecutive months. */
export function generateCategoryTrend(context: InsightsGeneratorContext): Insight[] {
  const from = subMonths(startOfMonth(context.now), HISTORY_MONTHS);
  const records = context.aggregates.fetchCategoryAggregates(from, context.now, context.baseCurrency);
  if (records.length < MIN_RECORDS) {
    return [];
  }

  const byCategory = new Map<string, CategoryAggregateRecord[]>();
  for (const record of records) {
    byCategory.set(record.categoryName, [...(byCategory.get(record.categoryName) ?? []), record]);
  }

  let best: { category: string; streak: number; latest: number; changePercent: number } | null = null;
  for (const [category, categoryRecords] of byCategory) {
    if (categoryRecords.length < MIN_CATEGORY_RECORDS) continue;
    const sorted = [...categoryRecords].sort((left, right) => left.year - right.year || left.month - right.month);
    const streak = risingStreak(sorted);
    if (streak < MIN_STREAK || streak <= (best?.streak ?? 1)) continue;

    const latest = sorted[sorted.length - 1].totalExpenses;
    const previous = sorted[sorted.length - 2].totalExpenses;
    best = {
      category,
      streak,
      latest,
      changePercent: previous > 0 ? ((latest - previous) / previous) * 100 : 0
    };
  }

  if (!best) {
    return [];
  }

  return [
    {
      id: `category_trend_${best.category}`,
      type: "categoryTrend",
      title: "Rising category",
      subtitle: `${best.category}: rising for ${best.streak + 1} months`,
      metric: {
        value: best.latest,
        formattedValue: context.formatters.currency(best.latest, context.baseCurrency),
        currency: context.baseCurrency
      },
      trend: {
        direction: "up",
        changePercent: best.changePercent,
        comparisonPeriod: "vs previous month"
      },
      severity: "warning",
      category: "spending"
    }
  ];
}
