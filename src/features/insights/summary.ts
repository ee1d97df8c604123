import { addDays, startOfDay } from "date-fns";
import { addFlowCents, emptyFlowCents, toFlowTotals } from "@/lib/finance/cents";
import type { PeriodSummary, PreparedTransaction } from "@/src/features/insights/types";

/**
 * Income and expense totals of exactly the slice passed in. Not cached:
 * a shared summary cache would leak totals between different windows.
 * Transactions dated after today are skipped.
 */
export function summarizePeriod(transactions: PreparedTransaction[], now: Date): PeriodSummary {
  const cutoff = startOfDay(addDays(now, 1)).getTime();
  const totals = emptyFlowCents();

  for (const transaction of transactions) {
    if (transaction.timestamp >= cutoff) continue;
    addFlowCents(totals, transaction.type, transaction.amount);
  }

  const flow = toFlowTotals(totals);
  return {
    totalIncome: flow.income,
    totalExpenses: flow.expenses,
    netFlow: flow.netFlow
  };
}
