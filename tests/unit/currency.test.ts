import assert from "node:assert/strict";
import test from "node:test";
import {
  createRateTableConverter,
  normalizeCurrencyCode,
  resolveAmountInCurrency,
  seriesMonthlyAmount,
  toMonthlyEquivalent
} from "@/lib/finance/currency";
import { silentLogger } from "@/lib/logger";
import { assertClose, createRecordingLogger, sameCurrencyOnly } from "./helpers/insights-fixtures";

const rates = createRateTableConverter({ EUR: 1.25, BRL: 0.25 });

test("normalizeCurrencyCode accepts three-letter codes only", () => {
  assert.equal(normalizeCurrencyCode(" usd "), "USD");
  assert.equal(normalizeCurrencyCode("us"), undefined);
  assert.equal(normalizeCurrencyCode(null), undefined);
});

test("createRateTableConverter converts through the pivot currency", () => {
  assert.equal(rates(100, "EUR", "BRL"), 500);
  assert.equal(rates(8, "USD", "EUR"), 6.4);
  assert.equal(rates(42, "JPY", "JPY"), 42);
  assert.equal(rates(10, "JPY", "USD"), null);
});

test("resolveAmountInCurrency prefers the stored converted amount", () => {
  const transaction = { id: "t1", amount: 100, currency: "EUR", convertedAmount: 111.5 };
  assert.equal(resolveAmountInCurrency(transaction, "USD", rates, silentLogger), 111.5);
  assert.equal(resolveAmountInCurrency({ ...transaction, convertedAmount: null }, "USD", rates, silentLogger), 125);
  assert.equal(resolveAmountInCurrency({ ...transaction, currency: "USD" }, "USD", rates, silentLogger), 100);
});

test("resolveAmountInCurrency falls back to the raw amount and logs the gap", () => {
  const { entries, logger } = createRecordingLogger();
  const amount = resolveAmountInCurrency(
    { id: "t2", amount: 70, currency: "GBP", convertedAmount: undefined },
    "USD",
    sameCurrencyOnly,
    logger
  );

  assert.equal(amount, 70);
  assert.deepEqual(entries, [
    { level: "warn", event: "currency_conversion_missing", payload: { transactionId: "t2", from: "GBP", to: "USD" } }
  ]);
});

test("toMonthlyEquivalent normalises each frequency", () => {
  assert.equal(toMonthlyEquivalent(2, "daily"), 60);
  assertClose(toMonthlyEquivalent(10, "weekly"), 43.3);
  assert.equal(toMonthlyEquivalent(15, "monthly"), 15);
  assertClose(toMonthlyEquivalent(120, "yearly"), 10);
});

test("seriesMonthlyAmount converts before normalising", () => {
  const series = { id: "s1", amount: 20, currency: "EUR", frequency: "monthly" as const };
  assert.equal(seriesMonthlyAmount(series, "USD", rates, silentLogger), 25);
  assert.equal(seriesMonthlyAmount({ ...series, currency: "CHF" }, "USD", rates, silentLogger), 20);
});
