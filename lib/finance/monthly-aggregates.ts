import { addDays, startOfDay, startOfMonth } from "date-fns";
import { addFlowCents, emptyFlowCents, fromAmountCents, absAmountCents, type FlowTotalsCents } from "@/lib/finance/cents";
import { resolveAmountInCurrency } from "@/lib/finance/currency";
import { parseDateKey } from "@/lib/finance/date-keys";
import { silentLogger, type InsightsLogger } from "@/lib/logger";
import type {
  AggregateReader,
  CategoryAggregateRecord,
  CurrencyConverter,
  MonthlyAggregate,
  TransactionDTO
} from "@/lib/types";

type MonthBucket = FlowTotalsCents & {
  year: number;
  month: number;
  transactionCount: number;
};

type CategoryBucket = {
  categoryName: string;
  year: number;
  month: number;
  expenseCents: number;
  transactionCount: number;
};

export type AggregateSnapshot = {
  monthly: MonthlyAggregate[];
  categories: CategoryAggregateRecord[];
};

function compareYearMonth(left: { year: number; month: number }, right: { year: number; month: number }): number {
  return left.year - right.year || left.month - right.month;
}

/**
 * Rebuilds monthly and per-category aggregates for one currency from the raw
 * transaction list. Transfers are not counted, nor are transactions dated on
 * or after `cutoff`.
 */
export function buildMonthlyAggregates(
  transactions: TransactionDTO[],
  baseCurrency: string,
  convert: CurrencyConverter,
  logger: InsightsLogger = silentLogger,
  cutoff?: Date
): AggregateSnapshot {
  const months = new Map<string, MonthBucket>();
  const categories = new Map<string, CategoryBucket>();

  for (const transaction of transactions) {
    if (transaction.type === "transfer") continue;
    const date = parseDateKey(transaction.date);
    if (!date) continue;
    if (cutoff && date.getTime() >= cutoff.getTime()) continue;

    const year = date.getFullYear();
    const month = date.getMonth() + 1;
    const monthKey = `${year}-${month}`;
    const amount = resolveAmountInCurrency(transaction, baseCurrency, convert, logger);

    const bucket = months.get(monthKey) ?? { year, month, transactionCount: 0, ...emptyFlowCents() };
    addFlowCents(bucket, transaction.type, amount);
    bucket.transactionCount += 1;
    months.set(monthKey, bucket);

    if (transaction.type !== "expense") continue;
    const categoryKey = `${monthKey}|${transaction.category}`;
    const categoryBucket = categories.get(categoryKey) ?? {
      categoryName: transaction.category,
      year,
      month,
      expenseCents: 0,
      transactionCount: 0
    };
    categoryBucket.expenseCents += absAmountCents(amount);
    categoryBucket.transactionCount += 1;
    categories.set(categoryKey, categoryBucket);
  }

  const monthly = [...months.values()].sort(compareYearMonth).map<MonthlyAggregate>((bucket) => ({
    year: bucket.year,
    month: bucket.month,
    totalIncome: fromAmountCents(bucket.incomeCents),
    totalExpenses: fromAmountCents(bucket.expenseCents),
    netFlow: fromAmountCents(bucket.incomeCents - bucket.expenseCents),
    transactionCount: bucket.transactionCount,
    currency: baseCurrency
  }));

  const categoryRecords = [...categories.values()]
    .sort((left, right) => compareYearMonth(left, right) || left.categoryName.localeCompare(right.categoryName))
    .map<CategoryAggregateRecord>((bucket) => ({
      categoryName: bucket.categoryName,
      year: bucket.year,
      month: bucket.month,
      totalExpenses: fromAmountCents(bucket.expenseCents),
      transactionCount: bucket.transactionCount,
      currency: baseCurrency
    }));

  return { monthly, categories: categoryRecords };
}

function isMonthInRange(year: number, month: number, from: Date, to: Date): boolean {
  const monthStart = new Date(year, month - 1, 1).getTime();
  return monthStart >= startOfMonth(from).getTime() && monthStart < to.getTime();
}

/**
 * Aggregate reader over snapshots rebuilt on demand from a transaction source.
 * Snapshots are memoised per currency until `refresh()` is called and stop at
 * the end of the day `now()` returns when they are built.
 */
export function createInMemoryAggregateReader(
  listTransactions: () => TransactionDTO[],
  convert: CurrencyConverter,
  logger: InsightsLogger = silentLogger,
  now: () => Date = () => new Date()
): AggregateReader & { refresh: () => void } {
  const snapshots = new Map<string, AggregateSnapshot>();

  const snapshotFor = (currency: string): AggregateSnapshot => {
    const existing = snapshots.get(currency);
    if (existing) return existing;
    const cutoff = startOfDay(addDays(now(), 1));
    const built = buildMonthlyAggregates(listTransactions(), currency, convert, logger, cutoff);
    snapshots.set(currency, built);
    return built;
  };

  return {
    fetchMonthlyAggregates: (from, to, currency) =>
      snapshotFor(currency).monthly.filter((record) => isMonthInRange(record.year, record.month, from, to)),
    fetchCategoryAggregates: (from, to, currency) =>
      snapshotFor(currency).categories.filter((record) => isMonthInRange(record.year, record.month, from, to)),
    refresh: () => snapshots.clear()
  };
}

export const emptyAggregateReader: AggregateReader = {
  fetchMonthlyAggregates: () => [],
  fetchCategoryAggregates: () => []
};
