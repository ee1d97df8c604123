import { format } from "date-fns";
import { round2 } from "@/lib/finance/cents";
import { resolveAmountInCurrency } from "@/lib/finance/currency";
import { parseDateKey } from "@/lib/finance/date-keys";
import type { InsightsLogger } from "@/lib/logger";
import type { CurrencyConverter, TransactionDTO } from "@/lib/types";
import type { DateWindow, PreparedTransaction } from "@/src/features/insights/types";

function normalizeCategoryName(categoryName: string | null | undefined): string {
  const trimmed = categoryName?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : "Uncategorized";
}

/**
 * Parses dates and resolves every amount into the base currency once, so the
 * aggregator and the generators never convert again. Unparseable dates are
 * dropped; the result is sorted by date.
 */
export function prepareTransactions(
  transactions: TransactionDTO[],
  baseCurrency: string,
  convert: CurrencyConverter,
  logger: InsightsLogger
): PreparedTransaction[] {
  return transactions
    .map<PreparedTransaction | null>((transaction) => {
      const date = parseDateKey(transaction.date);
      if (!date) {
        logger.debug("transaction_date_invalid", { transactionId: transaction.id, date: transaction.date });
        return null;
      }

      const amount = resolveAmountInCurrency(transaction, baseCurrency, convert, logger);
      return {
        transaction,
        id: transaction.id,
        date,
        timestamp: date.getTime(),
        monthKey: format(date, "yyyy-MM"),
        amount: round2(Math.abs(Number.isFinite(amount) ? amount : 0)),
        type: transaction.type,
        category: normalizeCategoryName(transaction.category),
        accountId: transaction.accountId
      };
    })
    .filter((item): item is PreparedTransaction => item !== null)
    .sort((left, right) => left.timestamp - right.timestamp);
}

export function filterByWindow(transactions: PreparedTransaction[], window: DateWindow): PreparedTransaction[] {
  const start = window.start.getTime();
  const end = window.end.getTime();
  return transactions.filter((transaction) => transaction.timestamp >= start && transaction.timestamp < end);
}

export function firstTransactionDate(transactions: PreparedTransaction[]): Date | null {
  let first: PreparedTransaction | null = null;
  for (const transaction of transactions) {
    if (!first || transaction.timestamp < first.timestamp) {
      first = transaction;
    }
  }
  return first ? first.date : null;
}
