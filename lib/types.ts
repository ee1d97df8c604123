export type TransactionType = "income" | "expense" | "transfer";

export type AccountDTO = {
  id: string;
  name: string;
  currency: string;
  balance: number;
};

export type BudgetPeriod = "weekly" | "monthly" | "yearly";

export type CategoryDTO = {
  id: string;
  name: string;
  type: "income" | "expense";
  budgetAmount?: number | null;
  budgetPeriod?: BudgetPeriod | null;
  budgetStartDate?: string | null;
};

export type TransactionDTO = {
  id: string;
  accountId: string;
  date: string;
  description?: string;
  amount: number;
  currency: string;
  convertedAmount?: number | null;
  type: TransactionType;
  category: string;
  subcategory?: string | null;
  recurringSeriesId?: string | null;
};

export type RecurringFrequency = "daily" | "weekly" | "monthly" | "yearly";

export type RecurringSeriesDTO = {
  id: string;
  description: string;
  category: string;
  amount: number;
  currency: string;
  frequency: RecurringFrequency;
  kind: "subscription" | "generic";
  isActive: boolean;
  startDate: string;
};

export type MonthlyAggregate = {
  year: number;
  month: number;
  totalIncome: number;
  totalExpenses: number;
  netFlow: number;
  transactionCount: number;
  currency: string;
};

export type CategoryAggregateRecord = {
  categoryName: string;
  year: number;
  month: number;
  totalExpenses: number;
  transactionCount: number;
  currency: string;
};

export interface TransactionStore {
  listTransactions(): TransactionDTO[];
  listAccounts(): AccountDTO[];
  listCategories(): CategoryDTO[];
  listRecurringSeries(): RecurringSeriesDTO[];
}

/**
 * Read side of the persisted monthly/category aggregates.
 * An empty result means the aggregates are not ready yet.
 */
export interface AggregateReader {
  fetchMonthlyAggregates(from: Date, to: Date, currency: string): MonthlyAggregate[];
  fetchCategoryAggregates(from: Date, to: Date, currency: string): CategoryAggregateRecord[];
}

export type CurrencyConverter = (amount: number, from: string, to: string) => number | null;
