import { startOfMonth, subMonths } from "date-fns";
import type { Insight, InsightsGeneratorContext } from "@/src/features/insights/types";

const HISTORY_MONTHS = 3;
const SPIKE_MULTIPLIER = 1.5;
const CRITICAL_MULTIPLIER = 2;
const MIN_HISTORICAL_AVERAGE = 100;

/** Category whose spending this month exceeds 1.5x its average over the previous months. */
export function generateSpendingSpike(context: InsightsGeneratorContext): Insight[] {
  const from = subMonths(startOfMonth(context.now), HISTORY_MONTHS);
  const records = context.aggregates.fetchCategoryAggregates(from, context.now, context.baseCurrency);
  if (records.length === 0) {
    return [];
  }

  const currentYear = context.now.getFullYear();
  const currentMonth = context.now.getMonth() + 1;
  const byCategory = new Map<string, typeof records>();
  for (const record of records) {
    byCategory.set(record.categoryName, [...(byCategory.get(record.categoryName) ?? []), record]);
  }

  let spike: { category: string; amount: number; multiplier: number } | null = null;
  for (const [category, categoryRecords] of byCategory) {
    const current = categoryRecords.find((record) => record.year === currentYear && record.month === currentMonth);
    const historical = categoryRecords.filter((record) => !(record.year === currentYear && record.month === currentMonth));
    if (!current || current.totalExpenses <= 0 || historical.length === 0) continue;

    const historicalAverage = historical.reduce((sum, record) => sum + record.totalExpenses, 0) / historical.length;
    if (historicalAverage <= MIN_HISTORICAL_AVERAGE) continue;

    const multiplier = current.totalExpenses / historicalAverage;
    if (multiplier > (spike?.multiplier ?? SPIKE_MULTIPLIER)) {
      spike = { category, amount: current.totalExpenses, multiplier };
    }
  }

  if (!spike) {
    return [];
  }

  context.logger.debug("spending_spike", { category: spike.category, multiplier: Number(spike.multiplier.toFixed(2)) });
  return [
    {
      id: "spending_spike",
      type: "spendingSpike",
      title: "Spending spike",
      subtitle: spike.category,
      metric: {
        value: spike.amount,
        formattedValue: context.formatters.currency(spike.amount, context.baseCurrency),
        currency: context.baseCurrency
      },
      trend: {
        direction: "up",
        changePercent: (spike.multiplier - 1) * 100,
        comparisonPeriod: "vs average"
      },
      severity: spike.multiplier > CRITICAL_MULTIPLIER ? "critical" : "warning",
      category: "spending"
    }
  ];
}
