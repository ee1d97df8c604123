import { differenceInCalendarDays, getDaysInMonth, getDaysInYear, startOfMonth, startOfWeek, startOfYear } from "date-fns";
import { absAmountCents, fromAmountCents } from "@/lib/finance/cents";
import type { BudgetPeriod, CategoryDTO } from "@/lib/types";
import type { Insight, InsightsGeneratorContext } from "@/src/features/insights/types";

const UNDERUTILIZED_PERCENT = 80;

type BudgetItem = {
  category: string;
  budget: number;
  spent: number;
  percentage: number;
  projected: number;
  isOverBudget: boolean;
};

function budgetPeriodStart(period: BudgetPeriod, now: Date): Date {
  switch (period) {
    case "weekly":
      return startOfWeek(now, { weekStartsOn: 1 });
    case "monthly":
      return startOfMonth(now);
    case "yearly":
      return startOfYear(now);
  }
}

function budgetPeriodDays(period: BudgetPeriod, now: Date): number {
  switch (period) {
    case "weekly":
      return 7;
    case "monthly":
      return getDaysInMonth(now);
    case "yearly":
      return getDaysInYear(now);
  }
}

function toBudgetItem(context: InsightsGeneratorContext, category: CategoryDTO, budget: number): BudgetItem {
  const period = category.budgetPeriod ?? "monthly";
  const start = budgetPeriodStart(period, context.now);
  const startTime = start.getTime();
  const nowTime = context.now.getTime();

  let spentCents = 0;
  for (const transaction of context.allTransactions) {
    if (transaction.type !== "expense" || transaction.category !== category.name) continue;
    if (transaction.timestamp < startTime || transaction.timestamp > nowTime) continue;
    spentCents += absAmountCents(transaction.amount);
  }

  const spent = fromAmountCents(spentCents);
  const daysElapsed = Math.max(1, differenceInCalendarDays(context.now, start));
  const totalDays = budgetPeriodDays(period, context.now);

  return {
    category: category.name,
    budget,
    spent,
    percentage: (spent / budget) * 100,
    projected: (spent / daysElapsed) * totalDays,
    isOverBudget: spent > budget
  };
}

function toDetail(items: BudgetItem[]) {
  return {
    kind: "budgetProgress" as const,
    items: items.map(({ category, budget, spent, percentage, projected }) => ({ category, budget, spent, percentage, projected }))
  };
}

/** Over-budget, projected-overspend and under-used budgets for the current budget periods. */
export function generateBudgetInsights(context: InsightsGeneratorContext): Insight[] {
  const items: BudgetItem[] = [];
  for (const category of context.categories) {
    if (category.type !== "expense") continue;
    const budget = category.budgetAmount ?? 0;
    if (budget <= 0) continue;
    items.push(toBudgetItem(context, category, budget));
  }

  if (items.length === 0) {
    return [];
  }

  const over = items.filter((item) => item.isOverBudget);
  const projectedOver = items.filter((item) => !item.isOverBudget && item.projected > item.budget);
  const under = items.filter(
    (item) =>
      !item.isOverBudget &&
      item.projected <= item.budget &&
      item.percentage > 0 &&
      item.percentage < UNDERUTILIZED_PERCENT
  );

  const insights: Insight[] = [];
  if (over.length > 0) {
    insights.push({
      id: "budget_over",
      type: "budgetOverspend",
      title: "Over budget",
      subtitle: `${over.length} categories over budget`,
      metric: { value: over.length, formattedValue: String(over.length), unit: "categories" },
      severity: "critical",
      category: "budget",
      detailData: toDetail([...items].sort((left, right) => right.percentage - left.percentage))
    });
  }

  if (projectedOver.length > 0) {
    insights.push({
      id: "budget_projected_over",
      type: "projectedOverspend",
      title: "Projected overspend",
      subtitle: `${projectedOver.length} categories at risk`,
      metric: { value: projectedOver.length, formattedValue: String(projectedOver.length), unit: "categories" },
      severity: "warning",
      category: "budget",
      detailData: toDetail(
        [...projectedOver].sort((left, right) => right.projected / right.budget - left.projected / left.budget)
      )
    });
  }

  if (under.length > 0) {
    insights.push({
      id: "budget_under",
      type: "budgetUnderutilized",
      title: "Under budget",
      subtitle: `${under.length} categories under budget`,
      metric: { value: under.length, formattedValue: String(under.length), unit: "categories" },
      severity: "positive",
      category: "budget",
      detailData: toDetail([...under].sort((left, right) => left.percentage - right.percentage))
    });
  }

  return insights;
}
