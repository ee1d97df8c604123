import assert from "node:assert/strict";
import test from "node:test";
import { computeHealthScore, generateHealthScoreInsights } from "@/src/features/insights/generators/healthScore";
import {
  getInsight,
  makeAccount,
  makeCategory,
  makeGranularityContext,
  makeSeries,
  makeTransaction
} from "./helpers/insights-fixtures";

const transactions = ["2026-01", "2026-02", "2026-03", "2026-04"].flatMap((month, index) => [
  makeTransaction({ date: `${month}-01`, amount: 4000, type: "income", category: "Salary" }),
  makeTransaction({ date: month === "2026-04" ? "2026-04-03" : `${month}-10`, amount: [3000, 3200, 3400, 2000][index] })
]);

const fixture = {
  transactions,
  accounts: [makeAccount("acc-main", 9000)],
  categories: [
    makeCategory("Salary", "income"),
    makeCategory("Groceries", "expense", { budgetAmount: 1500, budgetPeriod: "monthly" }),
    makeCategory("Rent", "expense", { budgetAmount: 1000, budgetPeriod: "monthly" })
  ],
  recurringSeries: [makeSeries({ id: "gym", amount: 800, category: "Fitness" })]
};

test("health score weighs each component", () => {
  const score = computeHealthScore(makeGranularityContext(fixture));

  assert.deepEqual(score, {
    score: 79,
    grade: "Good",
    savingsRateScore: 100,
    budgetAdherenceScore: 50,
    recurringRatioScore: 95,
    emergencyFundScore: 52,
    cashFlowScore: 100
  });
});

test("health score insight carries the grade and breakdown", () => {
  const insight = getInsight(generateHealthScoreInsights(makeGranularityContext(fixture)), "financial_health");

  assert.equal(insight.type, "financialHealthScore");
  assert.equal(insight.subtitle, "Good");
  assert.equal(insight.metric.formattedValue, "79");
  assert.equal(insight.metric.unit, "/ 100");
  assert.equal(insight.severity, "neutral");
  assert.equal(insight.category, "health");
  assert.equal(insight.detailData?.kind, "healthScore");
});

test("budgets are neutral when none are set", () => {
  const score = computeHealthScore(makeGranularityContext({ ...fixture, categories: [] }));
  assert.equal(score?.budgetAdherenceScore, 50);
});

test("health score needs income", () => {
  const context = makeGranularityContext({
    transactions: [makeTransaction({ date: "2026-04-03", amount: 120 })],
    accounts: [makeAccount("acc-main", 500)]
  });

  assert.equal(computeHealthScore(context), null);
  assert.deepEqual(generateHealthScoreInsights(context), []);
});
