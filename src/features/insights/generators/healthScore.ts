import { addMonths, startOfMonth } from "date-fns";
import type {
  FinancialHealthScore,
  HealthGrade,
  Insight,
  InsightsGeneratorContext,
  InsightSeverity
} from "@/src/features/insights/types";
import { findBucket, lastMonthlyAggregates, monthlyRecurringExpenses, totalBalance } from "@/src/features/insights/utils/lookups";
import { average, clamp } from "@/src/features/insights/utils/stats";

const WEIGHTS = {
  savingsRate: 0.3,
  budgetAdherence: 0.25,
  recurringRatio: 0.2,
  emergencyFund: 0.15,
  cashFlow: 0.1
} as const;

const TARGET_SAVINGS_RATE = 20;
const TARGET_FUND_MONTHS = 6;
const NEUTRAL_BUDGET_SCORE = 50;

function toGrade(score: number): HealthGrade {
  if (score >= 80) return "Excellent";
  if (score >= 60) return "Good";
  if (score >= 40) return "Fair";
  return "Needs Attention";
}

const GRADE_SEVERITY: Record<HealthGrade, InsightSeverity> = {
  Excellent: "positive",
  Good: "neutral",
  Fair: "warning",
  "Needs Attention": "critical"
};

function budgetAdherenceScore(context: InsightsGeneratorContext): number {
  const budgeted = context.categories.filter((category) => (category.budgetAmount ?? 0) > 0);
  if (budgeted.length === 0) {
    return NEUTRAL_BUDGET_SCORE;
  }

  const monthStart = startOfMonth(context.now);
  const records = context.aggregates.fetchCategoryAggregates(
    monthStart,
    startOfMonth(addMonths(context.now, 1)),
    context.baseCurrency
  );
  const onBudget = budgeted.filter((category) => {
    const spent = records
      .filter(
        (record) =>
          record.categoryName === category.name &&
          record.year === monthStart.getFullYear() &&
          record.month === monthStart.getMonth() + 1
      )
      .reduce((sum, record) => sum + record.totalExpenses, 0);
    return spent <= (category.budgetAmount ?? 0);
  });
  return Math.round((onBudget.length / budgeted.length) * 100);
}

function latestNetFlow(context: InsightsGeneratorContext): number {
  const current = findBucket(context.buckets, context.currentBucketKey);
  if (current) return current.netFlow;
  const last = context.buckets[context.buckets.length - 1];
  return last ? last.netFlow : context.summary.netFlow;
}

/**
 * Weighted 0-100 score from savings rate, budget adherence, recurring load,
 * emergency fund coverage and the latest net flow. `null` without income.
 */
export function computeHealthScore(context: InsightsGeneratorContext): FinancialHealthScore | null {
  const { totalIncome, totalExpenses } = context.summary;
  if (totalIncome <= 0) {
    return null;
  }

  const savingsRate = ((totalIncome - totalExpenses) / totalIncome) * 100;
  const savingsRateScore = clamp(Math.round(Math.min((savingsRate / TARGET_SAVINGS_RATE) * 100, 100)), 0, 100);
  const budgetScore = clamp(budgetAdherenceScore(context), 0, 100);

  const recurringCost = monthlyRecurringExpenses(context);
  const recurringRatioScore = clamp(Math.round(Math.max(0, (1 - recurringCost / Math.max(totalIncome, 1)) * 100)), 0, 100);

  const lastThree = lastMonthlyAggregates(context, 3);
  const averageExpenses =
    lastThree.length === 0 ? totalExpenses / 12 : average(lastThree.map((record) => record.totalExpenses));
  const monthsCovered = averageExpenses > 0 ? totalBalance(context) / averageExpenses : 0;
  const emergencyFundScore = clamp(Math.round(Math.min((monthsCovered / TARGET_FUND_MONTHS) * 100, 100)), 0, 100);

  const cashFlowScore = latestNetFlow(context) > 0 ? 100 : 0;

  const score = Math.round(
    savingsRateScore * WEIGHTS.savingsRate +
      budgetScore * WEIGHTS.budgetAdherence +
      recurringRatioScore * WEIGHTS.recurringRatio +
      emergencyFundScore * WEIGHTS.emergencyFund +
      cashFlowScore * WEIGHTS.cashFlow
  );

  return {
    score,
    grade: toGrade(score),
    savingsRateScore,
    budgetAdherenceScore: budgetScore,
    recurringRatioScore,
    emergencyFundScore,
    cashFlowScore
  };
}

export function generateHealthScoreInsights(context: InsightsGeneratorContext): Insight[] {
  const healthScore = computeHealthScore(context);
  if (!healthScore) {
    return [];
  }

  return [
    {
      id: "financial_health",
      type: "financialHealthScore",
      title: "Financial health",
      subtitle: healthScore.grade,
      metric: { value: healthScore.score, formattedValue: String(healthScore.score), unit: "/ 100" },
      severity: GRADE_SEVERITY[healthScore.grade],
      category: "health",
      detailData: { kind: "healthScore", score: healthScore }
    }
  ];
}
