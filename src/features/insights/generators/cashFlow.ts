import type { Insight, InsightsGeneratorContext, PeriodBucket } from "@/src/features/insights/types";
import { monthlyRecurringNet, periodMultiplier, periodUnit, totalBalance } from "@/src/features/insights/utils/lookups";
import { average } from "@/src/features/insights/utils/stats";

function pickBest(buckets: PeriodBucket[]): PeriodBucket {
  return buckets.reduce((best, bucket) => (bucket.netFlow > best.netFlow ? bucket : best));
}

function pickWorst(buckets: PeriodBucket[]): PeriodBucket {
  return buckets.reduce((worst, bucket) => (bucket.netFlow < worst.netFlow ? bucket : worst));
}

function signed(context: InsightsGeneratorContext, value: number): string {
  const formatted = context.formatters.currency(value, context.baseCurrency);
  return value >= 0 ? `+${formatted}` : formatted;
}

/** Net flow of the latest period, best and worst periods, and the recurring-based projection. */
export function generateCashFlowInsights(context: InsightsGeneratorContext): Insight[] {
  const { buckets } = context;
  if (buckets.length < 2) {
    return [];
  }

  const insights: Insight[] = [];
  const latest = buckets.find((bucket) => bucket.key === context.currentBucketKey) ?? buckets[buckets.length - 1];
  const averageNetFlow = average(buckets.map((bucket) => bucket.netFlow));

  insights.push({
    id: "net_cashflow",
    type: "netCashFlow",
    title: "Net cash flow",
    subtitle: latest.label,
    metric: {
      value: latest.netFlow,
      formattedValue: context.formatters.currency(latest.netFlow, context.baseCurrency),
      currency: context.baseCurrency
    },
    trend: {
      direction: latest.netFlow > averageNetFlow ? "up" : latest.netFlow < averageNetFlow ? "down" : "flat",
      changeAbsolute: latest.netFlow - averageNetFlow,
      comparisonPeriod: "vs average"
    },
    severity: latest.netFlow > 0 ? "positive" : latest.netFlow < 0 ? "critical" : "neutral",
    category: "cashFlow",
    detailData: { kind: "periodPoints", points: buckets }
  });

  const best = pickBest(buckets);
  insights.push({
    id: "best_month",
    type: "bestMonth",
    title: "Best period",
    subtitle: best.label,
    metric: {
      value: best.netFlow,
      formattedValue: context.formatters.currency(best.netFlow, context.baseCurrency),
      currency: context.baseCurrency
    },
    severity: "positive",
    category: "cashFlow",
    detailData: { kind: "periodPoints", points: buckets }
  });

  const worst = pickWorst(buckets);
  if (worst.netFlow < 0 && worst.key !== best.key) {
    insights.push({
      id: "worst_month",
      type: "worstMonth",
      title: "Worst period",
      subtitle: worst.label,
      metric: {
        value: worst.netFlow,
        formattedValue: context.formatters.currency(worst.netFlow, context.baseCurrency),
        currency: context.baseCurrency
      },
      severity: "warning",
      category: "cashFlow",
      detailData: { kind: "periodPoints", points: buckets }
    });
  }

  const currentBalance = totalBalance(context);
  const periodRecurringNet = monthlyRecurringNet(context) * periodMultiplier(context.granularity);
  const projectedBalance = currentBalance + periodRecurringNet;
  const unit = periodUnit(context.granularity);

  insights.push({
    id: "projected_balance",
    type: "projectedBalance",
    title: "Projected balance",
    subtitle: unit,
    metric: {
      value: periodRecurringNet,
      formattedValue: signed(context, periodRecurringNet),
      currency: context.baseCurrency,
      unit
    },
    trend: {
      direction: periodRecurringNet >= 0 ? "up" : "down",
      changePercent: currentBalance > 0 ? (periodRecurringNet / currentBalance) * 100 : undefined,
      changeAbsolute: periodRecurringNet,
      comparisonPeriod: `Current balance: ${context.formatters.currency(currentBalance, context.baseCurrency)}`
    },
    severity: projectedBalance >= 0 ? "positive" : "critical",
    category: "cashFlow"
  });

  return insights;
}
