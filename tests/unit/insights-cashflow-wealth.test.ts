import assert from "node:assert/strict";
import test from "node:test";
import { generateAccountDormancy } from "@/src/features/insights/generators/accountDormancy";
import { generateCashFlowInsights } from "@/src/features/insights/generators/cashFlow";
import { generateWealthInsights } from "@/src/features/insights/generators/wealth";
import {
  assertClose,
  getInsight,
  insightIds,
  makeAccount,
  makeCategory,
  makeGranularityContext,
  makeSeries,
  makeTransaction
} from "./helpers/insights-fixtures";

const transactions = [
  makeTransaction({ date: "2026-01-05", amount: 1000, type: "income", category: "Salary" }),
  makeTransaction({ date: "2026-01-20", amount: 400 }),
  makeTransaction({ date: "2026-02-05", amount: 1000, type: "income", category: "Salary" }),
  makeTransaction({ date: "2026-02-20", amount: 1300, accountId: "acc-old" }),
  makeTransaction({ date: "2026-02-21", amount: 20, accountId: "acc-empty" }),
  makeTransaction({ date: "2026-03-05", amount: 1000, type: "income", category: "Salary" }),
  makeTransaction({ date: "2026-03-20", amount: 780 }),
  makeTransaction({ date: "2026-04-05", amount: 1000, type: "income", category: "Salary" }),
  makeTransaction({ date: "2026-04-06", amount: 500 })
];

const accounts = [makeAccount("acc-old", 800, "Old savings"), makeAccount("acc-main", 5000, "Checking"), makeAccount("acc-empty", 0)];

const fixture = {
  transactions,
  accounts,
  categories: [makeCategory("Salary", "income")],
  recurringSeries: [
    makeSeries({ id: "netflix", amount: 15 }),
    makeSeries({ id: "salary", amount: 3000, category: "Salary", kind: "generic" })
  ]
};

test("cash flow insights cover the latest, best and worst periods", () => {
  const insights = generateCashFlowInsights(makeGranularityContext(fixture));

  assert.deepEqual(insightIds(insights), ["net_cashflow", "best_month", "worst_month", "projected_balance"]);

  const net = getInsight(insights, "net_cashflow");
  assert.equal(net.subtitle, "Apr 2026");
  assert.equal(net.metric.value, 500);
  assert.equal(net.severity, "positive");
  assert.equal(net.trend?.direction, "up");
  assert.equal(net.trend?.changeAbsolute, 250);

  assert.equal(getInsight(insights, "best_month").subtitle, "Jan 2026");
  const worst = getInsight(insights, "worst_month");
  assert.equal(worst.subtitle, "Feb 2026");
  assert.equal(worst.metric.value, -320);
});

test("projected balance adds the recurring net to the current balance", () => {
  const projected = getInsight(generateCashFlowInsights(makeGranularityContext(fixture)), "projected_balance");

  assert.equal(projected.metric.value, 2985);
  assert.equal(projected.metric.formattedValue, "+$2,985.00");
  assert.equal(projected.metric.unit, "per month");
  assert.equal(projected.severity, "positive");
  assert.equal(projected.trend?.comparisonPeriod, "Current balance: $5,800.00");
});

test("cash flow needs at least two periods", () => {
  const context = makeGranularityContext({
    transactions: [makeTransaction({ date: "2026-04-06", amount: 500 })]
  });
  assert.deepEqual(generateCashFlowInsights(context), []);
});

test("wealth insights total the balances and track growth of the net flow", () => {
  const insights = generateWealthInsights(makeGranularityContext(fixture));

  assert.deepEqual(insightIds(insights), ["total_wealth", "wealth_growth"]);

  const total = getInsight(insights, "total_wealth");
  assert.equal(total.metric.value, 5800);
  assert.equal(total.severity, "positive");
  if (total.detailData?.kind === "accountList") {
    assert.deepEqual(
      total.detailData.items.map((item) => item.id),
      ["acc-main", "acc-old", "acc-empty"]
    );
  }

  const growth = getInsight(insights, "wealth_growth");
  assert.equal(growth.metric.value, 500);
  assertClose(growth.trend?.changePercent ?? 0, (280 / 220) * 100);
  assert.equal(growth.severity, "positive");
  assert.equal(growth.detailData?.kind, "periodPoints");
  if (growth.detailData?.kind === "periodPoints") {
    assert.deepEqual(
      growth.detailData.points.map((point) => point.cumulativeBalance),
      [5400, 5080, 5300, 5800]
    );
  }
});

test("wealth insights need accounts", () => {
  assert.deepEqual(generateWealthInsights(makeGranularityContext({ transactions })), []);
});

test("account dormancy lists funded accounts idle for more than thirty days", () => {
  const [insight] = generateAccountDormancy(makeGranularityContext(fixture));

  assert.equal(insight.id, "account_dormancy");
  assert.equal(insight.metric.value, 1);
  assert.deepEqual(insight.detailData, {
    kind: "accountList",
    items: [{ id: "acc-old", name: "Old savings", balance: 800, daysSinceLastTransaction: 54 }]
  });
});
