import { addFlowCents, emptyFlowCents, fromAmountCents, round2, toAmountCents, type FlowTotalsCents } from "@/lib/finance/cents";
import { silentLogger, type InsightsLogger } from "@/lib/logger";
import type { AggregateReader } from "@/lib/types";
import { firstTransactionDate as findFirstTransactionDate } from "@/src/features/insights/prepareTransactions";
import type { DateWindow, Granularity, PeriodBucket, PreparedTransaction } from "@/src/features/insights/types";
import {
  bucketKeyFor,
  enumeratePeriods,
  periodStartFor,
  resolveGranularityWindow,
  type PeriodSlot
} from "@/src/features/insights/utils/granularity";

export type AggregatePeriodsInput = {
  transactions: PreparedTransaction[];
  granularity: Granularity;
  baseCurrency: string;
  now: Date;
  /** `undefined` scans the transactions for it; `null` means there is none. */
  firstTransactionDate?: Date | null;
  /** Overrides the granularity's default window. */
  window?: DateWindow;
  aggregates?: AggregateReader;
  logger?: InsightsLogger;
};

export type PeriodAggregationSource = "aggregates" | "transactions";

export type PeriodAggregation = {
  buckets: PeriodBucket[];
  window: DateWindow;
  source: PeriodAggregationSource;
};

const FAST_PATH_GRANULARITIES: ReadonlySet<Granularity> = new Set<Granularity>(["year", "allTime"]);

function toBuckets(
  granularity: Granularity,
  slots: PeriodSlot[],
  totals: Map<string, FlowTotalsCents>
): PeriodBucket[] {
  return slots.map((slot) => {
    const slotTotals = totals.get(slot.key) ?? emptyFlowCents();
    return {
      key: slot.key,
      granularity,
      periodStart: slot.start,
      periodEnd: slot.end,
      label: slot.label,
      income: fromAmountCents(slotTotals.incomeCents),
      expenses: fromAmountCents(slotTotals.expenseCents),
      netFlow: fromAmountCents(slotTotals.incomeCents - slotTotals.expenseCents)
    };
  });
}

function foldMonthlyAggregates(
  input: AggregatePeriodsInput,
  aggregates: AggregateReader,
  window: DateWindow,
  slots: PeriodSlot[]
): Map<string, FlowTotalsCents> | null {
  const records = aggregates.fetchMonthlyAggregates(window.start, window.end, input.baseCurrency);
  if (records.length === 0) {
    return null;
  }

  const totals = new Map<string, FlowTotalsCents>(slots.map((slot) => [slot.key, emptyFlowCents()]));
  for (const record of records) {
    const monthStart = new Date(record.year, record.month - 1, 1);
    const key = bucketKeyFor(input.granularity, periodStartFor(input.granularity, monthStart, window));
    const bucket = totals.get(key);
    if (!bucket) continue;
    bucket.incomeCents += Math.abs(toAmountCents(record.totalIncome));
    bucket.expenseCents += Math.abs(toAmountCents(record.totalExpenses));
  }
  return totals;
}

function scanTransactions(
  input: AggregatePeriodsInput,
  window: DateWindow,
  slots: PeriodSlot[]
): Map<string, FlowTotalsCents> {
  const totals = new Map<string, FlowTotalsCents>(slots.map((slot) => [slot.key, emptyFlowCents()]));
  const start = window.start.getTime();
  const end = window.end.getTime();

  for (const transaction of input.transactions) {
    if (transaction.timestamp < start || transaction.timestamp >= end) continue;
    const key = bucketKeyFor(input.granularity, periodStartFor(input.granularity, transaction.date, window));
    const bucket = totals.get(key);
    if (!bucket) continue;
    addFlowCents(bucket, transaction.type, transaction.amount);
  }
  return totals;
}

/**
 * Buckets income and expenses per calendar period. Year and all-time views
 * read monthly aggregates when the reader has any for the window, since the
 * raw transaction list may only hold recent history; otherwise every
 * transaction is scanned once.
 */
export function aggregatePeriods(input: AggregatePeriodsInput): PeriodAggregation {
  const logger = input.logger ?? silentLogger;
  const firstDate =
    input.firstTransactionDate === undefined
      ? findFirstTransactionDate(input.transactions)
      : input.firstTransactionDate;
  const window = input.window ?? resolveGranularityWindow(input.granularity, input.now, firstDate);

  if (!input.window && firstDate === null && input.transactions.length === 0) {
    return { buckets: [], window, source: "transactions" };
  }

  const slots = enumeratePeriods(input.granularity, window, input.now);
  if (slots.length === 0) {
    return { buckets: [], window, source: "transactions" };
  }

  if (input.aggregates && FAST_PATH_GRANULARITIES.has(input.granularity)) {
    const folded = foldMonthlyAggregates(input, input.aggregates, window, slots);
    if (folded) {
      logger.debug("period_aggregation", { granularity: input.granularity, source: "aggregates", buckets: slots.length });
      return { buckets: toBuckets(input.granularity, slots, folded), window, source: "aggregates" };
    }
  }

  const scanned = scanTransactions(input, window, slots);
  logger.debug("period_aggregation", { granularity: input.granularity, source: "transactions", buckets: slots.length });
  return { buckets: toBuckets(input.granularity, slots, scanned), window, source: "transactions" };
}

/**
 * Back-fills a running balance so that the last bucket ends at the current
 * wealth.
 */
export function withCumulativeBalance(buckets: PeriodBucket[], currentWealth: number): PeriodBucket[] {
  const totalNetFlow = buckets.reduce((sum, bucket) => sum + bucket.netFlow, 0);
  let running = currentWealth - totalNetFlow;
  return buckets.map((bucket) => {
    running += bucket.netFlow;
    return { ...bucket, cumulativeBalance: round2(running) };
  });
}
