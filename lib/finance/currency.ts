import type { InsightsLogger } from "@/lib/logger";
import type { CurrencyConverter, RecurringFrequency, RecurringSeriesDTO, TransactionDTO } from "@/lib/types";

const MONTHLY_FACTORS: Record<RecurringFrequency, number> = {
  daily: 30,
  weekly: 4.33,
  monthly: 1,
  yearly: 1 / 12
};

export function normalizeCurrencyCode(code?: string | null): string | undefined {
  const normalized = (code ?? "").trim().toUpperCase();
  if (!/^[A-Z]{3}$/.test(normalized)) return undefined;
  return normalized;
}

/**
 * Amount of a transaction in the base currency: the stored converted amount
 * first, then a live conversion, then the raw amount (logged).
 */
export function resolveAmountInCurrency(
  transaction: Pick<TransactionDTO, "id" | "amount" | "currency" | "convertedAmount">,
  baseCurrency: string,
  convert: CurrencyConverter,
  logger: InsightsLogger
): number {
  if (transaction.currency === baseCurrency) {
    return transaction.amount;
  }

  if (transaction.convertedAmount !== null && transaction.convertedAmount !== undefined) {
    return transaction.convertedAmount;
  }

  const converted = convert(transaction.amount, transaction.currency, baseCurrency);
  if (converted !== null) {
    return converted;
  }

  logger.warn("currency_conversion_missing", {
    transactionId: transaction.id,
    from: transaction.currency,
    to: baseCurrency
  });
  return transaction.amount;
}

export function toMonthlyEquivalent(amount: number, frequency: RecurringFrequency): number {
  return amount * MONTHLY_FACTORS[frequency];
}

export function seriesMonthlyAmount(
  series: Pick<RecurringSeriesDTO, "id" | "amount" | "currency" | "frequency">,
  baseCurrency: string,
  convert: CurrencyConverter,
  logger: InsightsLogger
): number {
  let amount = series.amount;
  if (series.currency !== baseCurrency) {
    const converted = convert(series.amount, series.currency, baseCurrency);
    if (converted === null) {
      logger.warn("currency_conversion_missing", {
        seriesId: series.id,
        from: series.currency,
        to: baseCurrency
      });
    } else {
      amount = converted;
    }
  }
  return toMonthlyEquivalent(amount, series.frequency);
}

/**
 * Converter over a static table of rates expressed as units of `pivot` per
 * one unit of each currency.
 */
export function createRateTableConverter(ratesToPivot: Record<string, number>, pivot = "USD"): CurrencyConverter {
  const rateOf = (code: string): number | null => {
    if (code === pivot) return 1;
    const rate = ratesToPivot[code];
    return rate !== undefined && Number.isFinite(rate) && rate > 0 ? rate : null;
  };

  return (amount, from, to) => {
    if (from === to) return amount;
    const fromRate = rateOf(from);
    const toRate = rateOf(to);
    if (fromRate === null || toRate === null) return null;
    return (amount * fromRate) / toRate;
  };
}
