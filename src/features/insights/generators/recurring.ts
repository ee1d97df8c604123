import type { Insight, InsightsGeneratorContext } from "@/src/features/insights/types";
import { activeExpenseSeries, monthlyEquivalentOf, periodMultiplier, periodUnit } from "@/src/features/insights/utils/lookups";

/** Cost of the active recurring expenses, scaled to the selected granularity. */
export function generateRecurringInsights(context: InsightsGeneratorContext): Insight[] {
  const series = activeExpenseSeries(context);
  if (series.length === 0) {
    return [];
  }

  const items = series
    .map((item) => ({
      id: item.id,
      name: item.description.trim().length > 0 ? item.description : item.category,
      category: item.category,
      monthlyAmount: monthlyEquivalentOf(context, item),
      frequency: item.frequency
    }))
    .sort((left, right) => right.monthlyAmount - left.monthlyAmount);

  const totalMonthly = items.reduce((sum, item) => sum + item.monthlyAmount, 0);
  const periodTotal = totalMonthly * periodMultiplier(context.granularity);

  return [
    {
      id: "total_recurring",
      type: "totalRecurringCost",
      title: "Recurring costs",
      subtitle: `${series.length} active`,
      metric: {
        value: periodTotal,
        formattedValue: context.formatters.currency(periodTotal, context.baseCurrency),
        currency: context.baseCurrency,
        unit: periodUnit(context.granularity)
      },
      severity: periodTotal > 0 ? "neutral" : "positive",
      category: "recurring",
      detailData: { kind: "recurringList", items }
    }
  ];
}
