import assert from "node:assert/strict";
import test from "node:test";
import { generateCategoryTrend } from "@/src/features/insights/generators/categoryTrend";
import { generateSpendingInsights } from "@/src/features/insights/generators/spending";
import { generateSpendingSpike } from "@/src/features/insights/generators/spendingSpike";
import {
  assertClose,
  getInsight,
  insightIds,
  makeGranularityContext,
  makeTransaction
} from "./helpers/insights-fixtures";

const marchAndApril = [
  makeTransaction({ date: "2026-03-10", amount: 200, category: "Groceries" }),
  makeTransaction({ date: "2026-03-20", amount: 100, category: "Dining" }),
  makeTransaction({ date: "2026-04-02", amount: 300, category: "Groceries" }),
  makeTransaction({ date: "2026-04-05", amount: 100, category: "Dining" }),
  makeTransaction({ date: "2026-04-10", amount: 2000, type: "income", category: "Salary" })
];

test("spending insights compare the current month with the previous one", () => {
  const insights = generateSpendingInsights(makeGranularityContext({ transactions: marchAndApril }));

  assert.deepEqual(insightIds(insights), ["top_spending_Groceries", "mom_spending", "avg_daily"]);

  const top = getInsight(insights, "top_spending_Groceries");
  assert.equal(top.metric.value, 300);
  assert.equal(top.severity, "warning");
  assert.deepEqual(top.detailData, {
    kind: "categoryBreakdown",
    items: [
      { name: "Groceries", amount: 300, percentage: 75 },
      { name: "Dining", amount: 100, percentage: 25 }
    ]
  });

  const change = getInsight(insights, "mom_spending");
  assert.equal(change.metric.value, 400);
  assert.equal(change.severity, "warning");
  assert.equal(change.trend?.direction, "up");
  assert.equal(change.trend?.changeAbsolute, 100);
  assertClose(change.trend?.changePercent ?? 0, 100 / 3);
});

test("average daily spending divides by the days of each bucket", () => {
  const insights = generateSpendingInsights(makeGranularityContext({ transactions: marchAndApril }));
  const daily = getInsight(insights, "avg_daily");

  assert.equal(daily.subtitle, "Apr 2026");
  assertClose(daily.metric.value, 400 / 30);
  assertClose(daily.trend?.changePercent ?? 0, ((400 / 30 - 300 / 31) / (300 / 31)) * 100);
});

test("all-time spending has no period comparison", () => {
  const insights = generateSpendingInsights(
    makeGranularityContext({ transactions: marchAndApril, granularity: "allTime" })
  );

  assert.deepEqual(insightIds(insights), ["top_spending_Groceries", "avg_daily"]);
  assert.equal(getInsight(insights, "top_spending_Groceries").metric.value, 500);

  const daily = getInsight(insights, "avg_daily");
  assertClose(daily.metric.value, 700 / 37);
  assert.equal(daily.trend, undefined);
});

test("spending insights are empty without expenses", () => {
  const context = makeGranularityContext({
    transactions: [makeTransaction({ date: "2026-04-10", amount: 2000, type: "income", category: "Salary" })]
  });
  assert.deepEqual(generateSpendingInsights(context), []);
});

function spikeHistory(aprilDining: number) {
  return [
    makeTransaction({ date: "2026-01-08", amount: 150, category: "Dining" }),
    makeTransaction({ date: "2026-02-08", amount: 150, category: "Dining" }),
    makeTransaction({ date: "2026-03-08", amount: 150, category: "Dining" }),
    makeTransaction({ date: "2026-04-08", amount: aprilDining, category: "Dining" }),
    makeTransaction({ date: "2026-01-09", amount: 50, category: "Groceries" }),
    makeTransaction({ date: "2026-04-09", amount: 120, category: "Groceries" })
  ];
}

test("spending spike flags a category far above its recent average", () => {
  const critical = generateSpendingSpike(makeGranularityContext({ transactions: spikeHistory(400) }));
  assert.equal(critical.length, 1);
  assert.equal(critical[0].id, "spending_spike");
  assert.equal(critical[0].subtitle, "Dining");
  assert.equal(critical[0].metric.value, 400);
  assert.equal(critical[0].severity, "critical");

  const warning = generateSpendingSpike(makeGranularityContext({ transactions: spikeHistory(250) }));
  assert.equal(warning[0].severity, "warning");
  assertClose(warning[0].trend?.changePercent ?? 0, (250 / 150 - 1) * 100);
});

test("spending spike ignores small increases and low averages", () => {
  assert.deepEqual(generateSpendingSpike(makeGranularityContext({ transactions: spikeHistory(200) })), []);
});

test("category trend reports the longest rising streak", () => {
  const transactions = [
    ["2026-01-03", 100],
    ["2026-02-03", 120],
    ["2026-03-03", 150],
    ["2026-04-03", 160]
  ].flatMap(([date, amount]) => [
    makeTransaction({ date: String(date), amount: Number(amount), category: "Utilities" }),
    makeTransaction({ date: String(date), amount: 1000, category: "Rent" })
  ]);

  const insights = generateCategoryTrend(makeGranularityContext({ transactions }));

  assert.equal(insights.length, 1);
  assert.equal(insights[0].id, "category_trend_Utilities");
  assert.equal(insights[0].subtitle, "Utilities: rising for 4 months");
  assert.equal(insights[0].metric.value, 160);
  assertClose(insights[0].trend?.changePercent ?? 0, (10 / 150) * 100);
});

test("category trend needs enough history", () => {
  const transactions = [
    makeTransaction({ date: "2026-03-03", amount: 10, category: "Utilities" }),
    makeTransaction({ date: "2026-04-03", amount: 20, category: "Utilities" })
  ];
  assert.deepEqual(generateCategoryTrend(makeGranularityContext({ transactions })), []);
});
