import type { AccountDTO, CategoryDTO, RecurringSeriesDTO, TransactionDTO, TransactionStore } from "@/lib/types";

export type TransactionStoreSnapshot = {
  transactions?: TransactionDTO[];
  accounts?: AccountDTO[];
  categories?: CategoryDTO[];
  recurringSeries?: RecurringSeriesDTO[];
};

export class InMemoryTransactionStore implements TransactionStore {
  private transactions: TransactionDTO[];
  private accounts: AccountDTO[];
  private categories: CategoryDTO[];
  private recurringSeries: RecurringSeriesDTO[];

  constructor(snapshot: TransactionStoreSnapshot = {}) {
    this.transactions = [...(snapshot.transactions ?? [])];
    this.accounts = [...(snapshot.accounts ?? [])];
    this.categories = [...(snapshot.categories ?? [])];
    this.recurringSeries = [...(snapshot.recurringSeries ?? [])];
  }

  listTransactions(): TransactionDTO[] {
    return this.transactions;
  }

  listAccounts(): AccountDTO[] {
    return this.accounts;
  }

  listCategories(): CategoryDTO[] {
    return this.categories;
  }

  listRecurringSeries(): RecurringSeriesDTO[] {
    return this.recurringSeries;
  }

  addTransaction(transaction: TransactionDTO): void {
    this.transactions = [...this.transactions, transaction];
  }

  replace(snapshot: TransactionStoreSnapshot): void {
    this.transactions = [...(snapshot.transactions ?? this.transactions)];
    this.accounts = [...(snapshot.accounts ?? this.accounts)];
    this.categories = [...(snapshot.categories ?? this.categories)];
    this.recurringSeries = [...(snapshot.recurringSeries ?? this.recurringSeries)];
  }
}
