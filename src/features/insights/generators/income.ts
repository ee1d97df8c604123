import type { Insight, InsightsGeneratorContext, InsightSeverity } from "@/src/features/insights/types";
import { findBucket } from "@/src/features/insights/utils/lookups";
import { toPercentChange, toTrendDirection } from "@/src/features/insights/utils/stats";

const GROWTH_POSITIVE_PERCENT = 10;
const GROWTH_WARNING_PERCENT = -10;
const RATIO_POSITIVE = 1.5;
const RATIO_NEUTRAL = 1;

function buildIncomeGrowth(context: InsightsGeneratorContext): Insight | null {
  if (context.granularity === "allTime") {
    return null;
  }

  const currentBucket = findBucket(context.buckets, context.currentBucketKey);
  const previousBucket = findBucket(context.buckets, context.previousBucketKey);
  if (!previousBucket || previousBucket.income <= 0) {
    return null;
  }

  const current = currentBucket?.income ?? 0;
  const changePercent = toPercentChange(current, previousBucket.income);
  if (changePercent === null) {
    return null;
  }

  const severity: InsightSeverity =
    changePercent > GROWTH_POSITIVE_PERCENT ? "positive" : changePercent < GROWTH_WARNING_PERCENT ? "warning" : "neutral";

  return {
    id: "income_growth",
    type: "incomeGrowth",
    title: "Income growth",
    subtitle: context.comparisonLabel,
    metric: {
      value: current,
      formattedValue: context.formatters.currency(current, context.baseCurrency),
      currency: context.baseCurrency
    },
    trend: {
      direction: toTrendDirection(changePercent),
      changePercent,
      changeAbsolute: current - previousBucket.income,
      comparisonPeriod: context.comparisonLabel
    },
    severity,
    category: "income",
    detailData: { kind: "periodPoints", points: currentBucket ? [previousBucket, currentBucket] : [previousBucket] }
  };
}

function buildIncomeVsExpenses(context: InsightsGeneratorContext): Insight | null {
  const { summary } = context;
  if (summary.totalExpenses <= 0) {
    return null;
  }

  const ratio = summary.totalIncome / summary.totalExpenses;
  return {
    id: "income_vs_expense",
    type: "incomeVsExpenses",
    title: "Income vs expenses",
    subtitle: "Ratio",
    metric: {
      value: ratio,
      formattedValue: context.formatters.ratio(ratio)
    },
    trend: {
      direction: ratio >= RATIO_NEUTRAL ? "up" : "down",
      changeAbsolute: summary.netFlow,
      comparisonPeriod: context.formatters.currency(summary.netFlow, context.baseCurrency)
    },
    severity: ratio >= RATIO_POSITIVE ? "positive" : ratio >= RATIO_NEUTRAL ? "neutral" : "critical",
    category: "income",
    detailData: context.buckets.length > 0 ? { kind: "periodPoints", points: context.buckets } : undefined
  };
}

export function generateIncomeInsights(context: InsightsGeneratorContext): Insight[] {
  const hasIncome = context.windowTransactions.some((transaction) => transaction.type === "income");
  if (!hasIncome) {
    return [];
  }

  return [buildIncomeGrowth(context), buildIncomeVsExpenses(context)].filter(
    (insight): insight is Insight => insight !== null
  );
}
