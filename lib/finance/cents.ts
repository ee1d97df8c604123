import type { TransactionType } from "@/lib/types";

export type FlowTotalsCents = {
  incomeCents: number;
  expenseCents: number;
};

export type FlowTotals = {
  income: number;
  expenses: number;
  netFlow: number;
};

export function toAmountCents(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.round(value * 100);
}

export function fromAmountCents(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Number((value / 100).toFixed(2));
}

export function absAmountCents(value: number): number {
  return Math.abs(toAmountCents(value));
}

export function round2(value: number): number {
  return Number(value.toFixed(2));
}

export function emptyFlowCents(): FlowTotalsCents {
  return { incomeCents: 0, expenseCents: 0 };
}

/** Adds one transaction's absolute amount to the running totals; transfers are ignored. */
export function addFlowCents(totals: FlowTotalsCents, type: TransactionType, amount: number): void {
  const absoluteCents = absAmountCents(amount);
  if (absoluteCents <= 0) return;

  if (type === "income") {
    totals.incomeCents += absoluteCents;
    return;
  }

  if (type === "expense") {
    totals.expenseCents += absoluteCents;
  }
}

export function toFlowTotals(totals: FlowTotalsCents): FlowTotals {
  return {
    income: fromAmountCents(totals.incomeCents),
    expenses: fromAmountCents(totals.expenseCents),
    netFlow: fromAmountCents(totals.incomeCents - totals.expenseCents)
  };
}
