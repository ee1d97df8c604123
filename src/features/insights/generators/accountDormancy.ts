import { differenceInCalendarDays, subDays } from "date-fns";
import type { Insight, InsightsGeneratorContext } from "@/src/features/insights/types";

const DORMANT_AFTER_DAYS = 30;

/** Accounts holding money with no transaction in the last 30 days. */
export function generateAccountDormancy(context: InsightsGeneratorContext): Insight[] {
  const lastActivity = new Map<string, Date>();
  for (const transaction of context.allTransactions) {
    const existing = lastActivity.get(transaction.accountId);
    if (!existing || transaction.timestamp > existing.getTime()) {
      lastActivity.set(transaction.accountId, transaction.date);
    }
  }

  const cutoff = subDays(context.now, DORMANT_AFTER_DAYS).getTime();
  const dormant = context.accounts.flatMap((account) => {
    const balance = context.balanceFor(account.id);
    const last = lastActivity.get(account.id);
    if (balance <= 0 || !last || last.getTime() >= cutoff) {
      return [];
    }
    return [
      {
        id: account.id,
        name: account.name,
        balance,
        daysSinceLastTransaction: differenceInCalendarDays(context.now, last)
      }
    ];
  });

  if (dormant.length === 0) {
    return [];
  }

  return [
    {
      id: "account_dormancy",
      type: "accountDormancy",
      title: "Dormant accounts",
      subtitle: `${dormant.length} accounts without activity`,
      metric: { value: dormant.length, formattedValue: String(dormant.length) },
      severity: "neutral",
      category: "wealth",
      detailData: { kind: "accountList", items: dormant }
    }
  ];
}
