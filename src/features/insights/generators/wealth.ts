import { withCumulativeBalance } from "@/src/features/insights/periodAggregator";
import type { Insight, InsightsGeneratorContext } from "@/src/features/insights/types";
import { findBucket, totalBalance } from "@/src/features/insights/utils/lookups";
import { toPercentChange } from "@/src/features/insights/utils/stats";

const MIN_GROWTH_PERCENT = 1;

export function generateWealthInsights(context: InsightsGeneratorContext): Insight[] {
  if (context.accounts.length === 0) {
    return [];
  }

  const totalWealth = totalBalance(context);
  const currentNetFlow = findBucket(context.buckets, context.currentBucketKey)?.netFlow ?? 0;
  const previousNetFlow = findBucket(context.buckets, context.previousBucketKey)?.netFlow ?? 0;
  const changePercent = toPercentChange(currentNetFlow, previousNetFlow);
  const direction = currentNetFlow > 0 ? "up" : currentNetFlow < 0 ? "down" : "flat";

  const insights: Insight[] = [
    {
      id: "total_wealth",
      type: "totalWealth",
      title: "Total wealth",
      subtitle: "All accounts",
      metric: {
        value: totalWealth,
        formattedValue: context.formatters.currency(totalWealth, context.baseCurrency),
        currency: context.baseCurrency
      },
      trend: {
        direction,
        changePercent: changePercent ?? undefined,
        changeAbsolute: currentNetFlow,
        comparisonPeriod: context.comparisonLabel
      },
      severity: totalWealth >= 0 ? "positive" : "critical",
      category: "wealth",
      detailData: {
        kind: "accountList",
        items: context.accounts
          .map((account) => ({
            id: account.id,
            name: account.name,
            balance: context.balanceFor(account.id),
            daysSinceLastTransaction: 0
          }))
          .sort((left, right) => right.balance - left.balance)
      }
    }
  ];

  if (changePercent !== null && Math.abs(changePercent) > MIN_GROWTH_PERCENT) {
    insights.push({
      id: "wealth_growth",
      type: "wealthGrowth",
      title: "Wealth growth",
      subtitle: context.comparisonLabel,
      metric: {
        value: currentNetFlow,
        formattedValue: context.formatters.currency(currentNetFlow, context.baseCurrency),
        currency: context.baseCurrency
      },
      trend: {
        direction,
        changePercent,
        comparisonPeriod: context.comparisonLabel
      },
      severity: currentNetFlow > 0 ? "positive" : "warning",
      category: "wealth",
      detailData: { kind: "periodPoints", points: withCumulativeBalance(context.buckets, totalWealth) }
    });
  }

  return insights;
}
