import { subMonths } from "date-fns";
import { parseDateKey } from "@/lib/finance/date-keys";
import type { Insight, InsightsGeneratorContext, InsightSeverity } from "@/src/features/insights/types";
import { activeExpenseSeries, monthlyEquivalentOf } from "@/src/features/insights/utils/lookups";

const LOOKBACK_MONTHS = 3;
const MIN_CHANGE_PERCENT = 5;
const SEVERITY_PERCENT = 10;

/** Monthly recurring cost now against the series that already existed three months ago. */
export function generateSubscriptionGrowth(context: InsightsGeneratorContext): Insight[] {
  const series = activeExpenseSeries(context);
  if (series.length < 2) {
    return [];
  }

  const threeMonthsAgo = subMonths(context.now, LOOKBACK_MONTHS).getTime();
  const currentTotal = series.reduce((sum, item) => sum + monthlyEquivalentOf(context, item), 0);
  const previousTotal = series
    .filter((item) => {
      const start = parseDateKey(item.startDate);
      return start !== null && start.getTime() < threeMonthsAgo;
    })
    .reduce((sum, item) => sum + monthlyEquivalentOf(context, item), 0);

  if (previousTotal <= 0 || currentTotal <= 0) {
    return [];
  }

  const changePercent = ((currentTotal - previousTotal) / previousTotal) * 100;
  if (Math.abs(changePercent) <= MIN_CHANGE_PERCENT) {
    return [];
  }

  const severity: InsightSeverity =
    changePercent > SEVERITY_PERCENT ? "warning" : changePercent < -SEVERITY_PERCENT ? "positive" : "neutral";

  return [
    {
      id: "subscription_growth",
      type: "subscriptionGrowth",
      title: "Subscription growth",
      subtitle: "vs 3 months ago",
      metric: {
        value: currentTotal,
        formattedValue: context.formatters.currency(currentTotal, context.baseCurrency),
        currency: context.baseCurrency,
        unit: "per month"
      },
      trend: {
        direction: changePercent > 0 ? "up" : "down",
        changePercent,
        changeAbsolute: currentTotal - previousTotal,
        comparisonPeriod: "vs 3 months ago"
      },
      severity,
      category: "recurring"
    }
  ];
}
