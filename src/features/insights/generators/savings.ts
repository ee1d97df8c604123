import type { Insight, InsightsGeneratorContext, InsightSeverity } from "@/src/features/insights/types";
import { lastMonthlyAggregates, totalBalance } from "@/src/features/insights/utils/lookups";
import { average } from "@/src/features/insights/utils/stats";

const RATE_POSITIVE = 20;
const RATE_WARNING = 10;
const FUND_POSITIVE_MONTHS = 3;
const FUND_WARNING_MONTHS = 1;
const MOMENTUM_MONTHS = 4;
const MIN_MOMENTUM_DELTA = 1;
const MOMENTUM_SEVERITY_DELTA = 2;

export function savingsRatePercent(income: number, expenses: number): number {
  if (income <= 0) return 0;
  return ((income - expenses) / income) * 100;
}

function buildSavingsRate(context: InsightsGeneratorContext): Insight | null {
  const { totalIncome, totalExpenses } = context.summary;
  if (totalIncome <= 0) {
    return null;
  }

  const rate = savingsRatePercent(totalIncome, totalExpenses);
  const severity: InsightSeverity = rate > RATE_POSITIVE ? "positive" : rate >= RATE_WARNING ? "warning" : "critical";

  return {
    id: "savings_rate",
    type: "savingsRate",
    title: "Savings rate",
    subtitle: context.formatters.currency(Math.max(0, totalIncome - totalExpenses), context.baseCurrency),
    metric: { value: rate, formattedValue: context.formatters.percent(rate) },
    severity,
    category: "savings"
  };
}

function buildEmergencyFund(context: InsightsGeneratorContext): Insight | null {
  const balance = totalBalance(context);
  if (balance <= 0) {
    return null;
  }

  const records = lastMonthlyAggregates(context, 3);
  if (records.length === 0) {
    return null;
  }

  const averageExpenses = average(records.map((record) => record.totalExpenses));
  if (averageExpenses <= 0) {
    return null;
  }

  const monthsCovered = balance / averageExpenses;
  const severity: InsightSeverity =
    monthsCovered >= FUND_POSITIVE_MONTHS ? "positive" : monthsCovered >= FUND_WARNING_MONTHS ? "warning" : "critical";

  return {
    id: "emergency_fund",
    type: "emergencyFund",
    title: "Emergency fund",
    subtitle: `${Math.floor(monthsCovered)} months of expenses covered`,
    metric: { value: monthsCovered, formattedValue: monthsCovered.toFixed(1), unit: "months" },
    severity,
    category: "savings"
  };
}

function buildSavingsMomentum(context: InsightsGeneratorContext): Insight | null {
  const records = lastMonthlyAggregates(context, MOMENTUM_MONTHS);
  if (records.length < 2) {
    return null;
  }

  const rates = records.map((record) => savingsRatePercent(record.totalIncome, record.totalExpenses));
  const currentRate = rates[rates.length - 1];
  const delta = currentRate - average(rates.slice(0, -1));
  if (Math.abs(delta) <= MIN_MOMENTUM_DELTA) {
    return null;
  }

  return {
    id: "savings_momentum",
    type: "savingsMomentum",
    title: "Savings momentum",
    subtitle: "vs previous 3 months",
    metric: { value: currentRate, formattedValue: context.formatters.percent(currentRate) },
    trend: {
      direction: delta > 0 ? "up" : "down",
      changePercent: delta,
      comparisonPeriod: "vs previous 3 months"
    },
    severity: delta > MOMENTUM_SEVERITY_DELTA ? "positive" : delta < -MOMENTUM_SEVERITY_DELTA ? "warning" : "neutral",
    category: "savings"
  };
}

export function generateSavingsInsights(context: InsightsGeneratorContext): Insight[] {
  return [buildSavingsRate(context), buildEmergencyFund(context), buildSavingsMomentum(context)].filter(
    (insight): insight is Insight => insight !== null
  );
}
