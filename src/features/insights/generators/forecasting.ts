import { format, getDaysInMonth, subDays, subMonths, subYears } from "date-fns";
import { absAmountCents, fromAmountCents } from "@/lib/finance/cents";
import { parseDateKey } from "@/lib/finance/date-keys";
import type { BreakdownItem, Insight, InsightsGeneratorContext, InsightSeverity } from "@/src/features/insights/types";
import {
  activeExpenseSeries,
  lastMonthlyAggregates,
  monthlyAggregateFor,
  monthlyEquivalentOf,
  totalBalance
} from "@/src/features/insights/utils/lookups";
import { average } from "@/src/features/insights/utils/stats";

const FORECAST_LOOKBACK_DAYS = 30;
const RUNWAY_POSITIVE_MONTHS = 3;
const RUNWAY_WARNING_MONTHS = 1;
const MIN_YOY_DELTA = 3;
const YOY_POSITIVE_DELTA = -10;
const YOY_WARNING_DELTA = 15;
const SEASONALITY_YEARS = 5;
const SEASONALITY_MIN_RECORDS = 12;
const SEASONALITY_MIN_MONTHS = 6;
const SEASONALITY_MIN_PEAK = 10;
const VELOCITY_MIN_DAY = 3;
const VELOCITY_MIN_CHANGE = 0.1;
const VELOCITY_WARNING_RATIO = 1.3;
const VELOCITY_POSITIVE_RATIO = 0.8;

function buildSpendingForecast(context: InsightsGeneratorContext): Insight {
  const { now } = context;
  const lookbackStart = subDays(now, FORECAST_LOOKBACK_DAYS).getTime();
  let last30Cents = 0;
  for (const transaction of context.allTransactions) {
    if (transaction.type !== "expense") continue;
    if (transaction.timestamp < lookbackStart || transaction.timestamp > now.getTime()) continue;
    last30Cents += absAmountCents(transaction.amount);
  }
  const averageDaily = fromAmountCents(last30Cents) / FORECAST_LOOKBACK_DAYS;

  const totalDays = getDaysInMonth(now);
  const daysRemaining = totalDays - now.getDate();
  const recurringExpenses = activeExpenseSeries(context)
    .filter((series) => {
      const start = parseDateKey(series.startDate);
      return start !== null && start.getTime() <= now.getTime();
    })
    .reduce((sum, series) => sum + monthlyEquivalentOf(context, series), 0);

  const currentMonth = monthlyAggregateFor(context, now);
  const spentSoFar = currentMonth?.totalExpenses ?? 0;
  const pendingRecurring = Math.max(0, (recurringExpenses / totalDays) * daysRemaining);
  const forecast = spentSoFar + averageDaily * daysRemaining + pendingRecurring;
  const monthlyIncome = currentMonth?.totalIncome ?? 0;

  const severity: InsightSeverity = monthlyIncome > 0 ? (forecast > monthlyIncome ? "warning" : "positive") : "neutral";
  return {
    id: "spending_forecast",
    type: "spendingForecast",
    title: "Spending forecast",
    subtitle: `${daysRemaining} days remaining`,
    metric: {
      value: forecast,
      formattedValue: context.formatters.currency(forecast, context.baseCurrency),
      currency: context.baseCurrency
    },
    severity,
    category: "forecasting"
  };
}

function buildBalanceRunway(context: InsightsGeneratorContext): Insight | null {
  const balance = totalBalance(context);
  if (balance <= 0) {
    return null;
  }

  const records = lastMonthlyAggregates(context, 3);
  if (records.length === 0) {
    return null;
  }

  const averageNetFlow = average(records.map((record) => record.netFlow));
  if (averageNetFlow > 0) {
    const formatted = context.formatters.currency(averageNetFlow, context.baseCurrency);
    return {
      id: "balance_runway",
      type: "balanceRunway",
      title: "Balance runway",
      subtitle: `${formatted} per month`,
      metric: { value: averageNetFlow, formattedValue: `+${formatted}`, currency: context.baseCurrency, unit: "per month" },
      severity: "positive",
      category: "forecasting"
    };
  }

  const runway = averageNetFlow === 0 ? Number.POSITIVE_INFINITY : balance / Math.abs(averageNetFlow);
  if (!Number.isFinite(runway)) {
    return null;
  }

  const severity: InsightSeverity =
    runway >= RUNWAY_POSITIVE_MONTHS ? "positive" : runway >= RUNWAY_WARNING_MONTHS ? "warning" : "critical";
  return {
    id: "balance_runway",
    type: "balanceRunway",
    title: "Balance runway",
    subtitle: `${runway.toFixed(1)} months at the current pace`,
    metric: { value: runway, formattedValue: runway.toFixed(1), unit: "months" },
    severity,
    category: "forecasting"
  };
}

function buildYearOverYear(context: InsightsGeneratorContext): Insight | null {
  const thisMonth = monthlyAggregateFor(context, context.now);
  const lastYear = monthlyAggregateFor(context, subYears(context.now, 1));
  if (!thisMonth || !lastYear || lastYear.totalExpenses <= 0) {
    return null;
  }

  const delta = ((thisMonth.totalExpenses - lastYear.totalExpenses) / lastYear.totalExpenses) * 100;
  if (Math.abs(delta) <= MIN_YOY_DELTA) {
    return null;
  }

  return {
    id: "year_over_year",
    type: "yearOverYear",
    title: "Year over year",
    subtitle: format(context.now, "MMM yyyy"),
    metric: {
      value: thisMonth.totalExpenses,
      formattedValue: context.formatters.currency(thisMonth.totalExpenses, context.baseCurrency),
      currency: context.baseCurrency
    },
    trend: {
      direction: delta > 0 ? "up" : "down",
      changePercent: delta,
      changeAbsolute: thisMonth.totalExpenses - lastYear.totalExpenses,
      comparisonPeriod: "vs same month last year"
    },
    severity: delta <= YOY_POSITIVE_DELTA ? "positive" : delta >= YOY_WARNING_DELTA ? "warning" : "neutral",
    category: "forecasting"
  };
}

function buildIncomeSeasonality(context: InsightsGeneratorContext): Insight | null {
  const records = context.aggregates.fetchMonthlyAggregates(
    subYears(context.now, SEASONALITY_YEARS),
    context.now,
    context.baseCurrency
  );
  if (records.length < SEASONALITY_MIN_RECORDS) {
    return null;
  }

  const incomeByMonth = new Map<number, number[]>();
  for (const record of records) {
    if (record.totalIncome <= 0) continue;
    incomeByMonth.set(record.month, [...(incomeByMonth.get(record.month) ?? []), record.totalIncome]);
  }
  if (incomeByMonth.size < SEASONALITY_MIN_MONTHS) {
    return null;
  }

  const averages = [...incomeByMonth.entries()]
    .map(([month, incomes]) => ({ month, average: average(incomes) }))
    .sort((left, right) => left.month - right.month);
  const overall = average(averages.map((item) => item.average));
  if (overall <= 0) {
    return null;
  }

  const peak = averages.reduce((best, item) => (item.average > best.average ? item : best));
  const peakPercent = ((peak.average - overall) / overall) * 100;
  if (peakPercent <= SEASONALITY_MIN_PEAK) {
    return null;
  }

  return {
    id: "income_seasonality",
    type: "incomeSeasonality",
    title: "Income seasonality",
    subtitle: format(new Date(2000, peak.month - 1, 1), "MMMM"),
    metric: { value: peakPercent, formattedValue: `+${peakPercent.toFixed(0)}%` },
    severity: "neutral",
    category: "forecasting"
  };
}

function buildSpendingVelocity(context: InsightsGeneratorContext): Insight | null {
  const dayOfMonth = context.now.getDate();
  if (dayOfMonth <= VELOCITY_MIN_DAY) {
    return null;
  }

  const previousMonthDate = subMonths(context.now, 1);
  const thisMonth = monthlyAggregateFor(context, context.now);
  const lastMonth = monthlyAggregateFor(context, previousMonthDate);
  if (!thisMonth || thisMonth.totalExpenses <= 0 || !lastMonth || lastMonth.totalExpenses <= 0) {
    return null;
  }

  const currentDailyRate = thisMonth.totalExpenses / dayOfMonth;
  const lastMonthDailyRate = lastMonth.totalExpenses / getDaysInMonth(previousMonthDate);
  const ratio = currentDailyRate / lastMonthDailyRate;
  if (Math.abs(ratio - 1) <= VELOCITY_MIN_CHANGE) {
    return null;
  }

  const changePercent = (ratio - 1) * 100;
  return {
    id: "spending_velocity",
    type: "spendingVelocity",
    title: "Spending velocity",
    subtitle: `${changePercent > 0 ? "+" : ""}${changePercent.toFixed(0)}%`,
    metric: { value: ratio, formattedValue: context.formatters.ratio(ratio) },
    trend: {
      direction: ratio > 1 ? "up" : "down",
      changePercent,
      changeAbsolute: currentDailyRate - lastMonthDailyRate,
      comparisonPeriod: "vs previous month"
    },
    severity: ratio > VELOCITY_WARNING_RATIO ? "warning" : ratio < VELOCITY_POSITIVE_RATIO ? "positive" : "neutral",
    category: "forecasting"
  };
}

function buildIncomeSourceBreakdown(context: InsightsGeneratorContext): Insight | null {
  const incomeCategories = context.categories.filter((category) => category.type === "income");
  if (incomeCategories.length < 2) {
    return null;
  }

  const totalsCents = new Map<string, number>();
  let totalCents = 0;
  for (const transaction of context.windowTransactions) {
    if (transaction.type !== "income") continue;
    const cents = absAmountCents(transaction.amount);
    totalsCents.set(transaction.category, (totalsCents.get(transaction.category) ?? 0) + cents);
    totalCents += cents;
  }
  if (totalCents <= 0) {
    return null;
  }

  const items: BreakdownItem[] = [...totalsCents.entries()]
    .map(([name, cents]) => ({ name, amount: fromAmountCents(cents), percentage: (cents / totalCents) * 100 }))
    .sort((left, right) => right.amount - left.amount || left.name.localeCompare(right.name));
  const top = items[0];

  return {
    id: "income_source_breakdown",
    type: "incomeSourceBreakdown",
    title: "Income sources",
    subtitle: top.name,
    metric: { value: top.percentage, formattedValue: `${top.percentage.toFixed(0)}%` },
    severity: "neutral",
    category: "income",
    detailData: { kind: "categoryBreakdown", items }
  };
}

export function generateForecastingInsights(context: InsightsGeneratorContext): Insight[] {
  return [
    buildSpendingForecast(context),
    buildBalanceRunway(context),
    buildYearOverYear(context),
    buildIncomeSeasonality(context),
    buildSpendingVelocity(context),
    buildIncomeSourceBreakdown(context)
  ].filter((insight): insight is Insight => insight !== null);
}
