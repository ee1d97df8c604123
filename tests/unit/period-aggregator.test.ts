import assert from "node:assert/strict";
import test from "node:test";
import { createInMemoryAggregateReader, emptyAggregateReader } from "@/lib/finance/monthly-aggregates";
import { silentLogger } from "@/lib/logger";
import { aggregatePeriods, withCumulativeBalance } from "@/src/features/insights/periodAggregator";
import { prepareTransactions } from "@/src/features/insights/prepareTransactions";
import type { Granularity, PeriodBucket } from "@/src/features/insights/types";
import { makeTransaction, NOW, sameCurrencyOnly } from "./helpers/insights-fixtures";

function totalsOf(buckets: PeriodBucket[]) {
  return buckets.map((bucket) => ({ key: bucket.key, income: bucket.income, expenses: bucket.expenses }));
}

const history = [
  makeTransaction({ date: "2024-03-10", amount: 1200, type: "income", category: "Salary" }),
  makeTransaction({ date: "2024-03-12", amount: -45.5, category: "Groceries" }),
  makeTransaction({ date: "2024-11-02", amount: 300.25, category: "Travel" }),
  makeTransaction({ date: "2025-06-30", amount: 2000, type: "income", category: "Salary" }),
  makeTransaction({ date: "2025-07-01", amount: 80.1, category: "Groceries" }),
  makeTransaction({ date: "2025-07-01", amount: 500, type: "transfer", category: "Savings" }),
  makeTransaction({ date: "2026-01-15", amount: 99.99, category: "Utilities" }),
  makeTransaction({ date: "2026-04-14", amount: 1500, type: "income", category: "Salary" })
];

test("aggregatePeriods buckets a fixed window without gaps", () => {
  const transactions = prepareTransactions(
    [makeTransaction({ date: "2026-02-15", amount: 100 })],
    "USD",
    sameCurrencyOnly,
    silentLogger
  );

  const result = aggregatePeriods({
    transactions,
    granularity: "month",
    baseCurrency: "USD",
    now: NOW,
    window: { start: new Date(2026, 0, 1), end: new Date(2026, 3, 1) }
  });

  assert.equal(result.source, "transactions");
  assert.deepEqual(
    result.buckets.map((bucket) => [bucket.key, bucket.expenses, bucket.income, bucket.netFlow]),
    [
      ["2026-01", 0, 0, 0],
      ["2026-02", 100, 0, -100],
      ["2026-03", 0, 0, 0]
    ]
  );
});

test("aggregatePeriods starts the default window at the first transaction", () => {
  const transactions = prepareTransactions(
    [
      makeTransaction({ date: "2025-11-20", amount: 0.1 }),
      makeTransaction({ date: "2025-11-21", amount: 0.2 }),
      makeTransaction({ date: "2026-04-02", amount: 250, type: "income" })
    ],
    "USD",
    sameCurrencyOnly,
    silentLogger
  );

  const result = aggregatePeriods({ transactions, granularity: "month", baseCurrency: "USD", now: NOW });

  assert.deepEqual(
    result.buckets.map((bucket) => bucket.key),
    ["2025-11", "2025-12", "2026-01", "2026-02", "2026-03", "2026-04"]
  );
  assert.equal(result.buckets[0].expenses, 0.3);
  assert.equal(result.buckets[5].income, 250);
  assert.equal(result.buckets[5].label, "Apr 2026");
});

test("aggregatePeriods returns no buckets without transactions or a window", () => {
  const result = aggregatePeriods({ transactions: [], granularity: "quarter", baseCurrency: "USD", now: NOW });
  assert.deepEqual(result.buckets, []);
});

test("aggregatePeriods skips transfers and transactions outside the window", () => {
  const transactions = prepareTransactions(
    [
      makeTransaction({ date: "2026-03-05", amount: 40, type: "transfer" }),
      makeTransaction({ date: "2026-03-06", amount: 60 }),
      makeTransaction({ date: "2026-04-01", amount: 70 })
    ],
    "USD",
    sameCurrencyOnly,
    silentLogger
  );

  const result = aggregatePeriods({
    transactions,
    granularity: "month",
    baseCurrency: "USD",
    now: NOW,
    window: { start: new Date(2026, 2, 1), end: new Date(2026, 3, 1) }
  });

  assert.deepEqual(totalsOf(result.buckets), [{ key: "2026-03", income: 0, expenses: 60 }]);
});

const fastPathGranularities: Granularity[] = ["year", "allTime"];

for (const granularity of fastPathGranularities) {
  test(`aggregatePeriods fast and slow paths agree for ${granularity}`, () => {
    const prepared = prepareTransactions(history, "USD", sameCurrencyOnly, silentLogger);
    const aggregates = createInMemoryAggregateReader(() => history, sameCurrencyOnly, silentLogger, () => NOW);

    const fast = aggregatePeriods({ transactions: prepared, granularity, baseCurrency: "USD", now: NOW, aggregates });
    const slow = aggregatePeriods({ transactions: prepared, granularity, baseCurrency: "USD", now: NOW });

    assert.equal(fast.source, "aggregates");
    assert.equal(slow.source, "transactions");
    assert.deepEqual(totalsOf(fast.buckets), totalsOf(slow.buckets));
  });
}

test("aggregatePeriods fast and slow paths both leave out transactions dated after today", () => {
  const withFutureDate = [
    makeTransaction({ date: "2025-05-10", amount: 100 }),
    makeTransaction({ date: "2026-04-28", amount: 50 })
  ];
  const prepared = prepareTransactions(withFutureDate, "USD", sameCurrencyOnly, silentLogger);
  const aggregates = createInMemoryAggregateReader(() => withFutureDate, sameCurrencyOnly, silentLogger, () => NOW);

  const fast = aggregatePeriods({ transactions: prepared, granularity: "year", baseCurrency: "USD", now: NOW, aggregates });
  const slow = aggregatePeriods({ transactions: prepared, granularity: "year", baseCurrency: "USD", now: NOW });

  assert.equal(fast.source, "aggregates");
  assert.deepEqual(totalsOf(fast.buckets), [
    { key: "2025", income: 0, expenses: 100 },
    { key: "2026", income: 0, expenses: 0 }
  ]);
  assert.deepEqual(totalsOf(slow.buckets), totalsOf(fast.buckets));
});

test("aggregatePeriods year buckets hold the yearly totals", () => {
  const prepared = prepareTransactions(history, "USD", sameCurrencyOnly, silentLogger);
  const aggregates = createInMemoryAggregateReader(() => history, sameCurrencyOnly, silentLogger, () => NOW);

  const result = aggregatePeriods({ transactions: prepared, granularity: "year", baseCurrency: "USD", now: NOW, aggregates });

  assert.deepEqual(totalsOf(result.buckets), [
    { key: "2024", income: 1200, expenses: 345.75 },
    { key: "2025", income: 2000, expenses: 80.1 },
    { key: "2026", income: 1500, expenses: 99.99 }
  ]);
});

test("aggregatePeriods falls back to scanning when aggregates are not ready", () => {
  const prepared = prepareTransactions(history, "USD", sameCurrencyOnly, silentLogger);

  const result = aggregatePeriods({
    transactions: prepared,
    granularity: "allTime",
    baseCurrency: "USD",
    now: NOW,
    aggregates: emptyAggregateReader
  });

  assert.equal(result.source, "transactions");
  assert.deepEqual(totalsOf(result.buckets), [{ key: "all", income: 4700, expenses: 525.84 }]);
});

test("withCumulativeBalance ends at the current wealth", () => {
  const prepared = prepareTransactions(
    [
      makeTransaction({ date: "2026-02-10", amount: 100, type: "income" }),
      makeTransaction({ date: "2026-03-10", amount: 50 }),
      makeTransaction({ date: "2026-04-10", amount: 25, type: "income" })
    ],
    "USD",
    sameCurrencyOnly,
    silentLogger
  );
  const { buckets } = aggregatePeriods({
    transactions: prepared,
    granularity: "month",
    baseCurrency: "USD",
    now: NOW,
    window: { start: new Date(2026, 1, 1), end: new Date(2026, 4, 1) }
  });

  assert.deepEqual(
    withCumulativeBalance(buckets, 1000).map((bucket) => bucket.cumulativeBalance),
    [1025, 975, 1000]
  );
});
