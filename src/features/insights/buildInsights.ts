import type { InsightsLogger } from "@/lib/logger";
import type { ProfileStep } from "@/lib/profiling";
import type {
  AccountDTO,
  AggregateReader,
  CategoryDTO,
  CurrencyConverter,
  RecurringSeriesDTO
} from "@/lib/types";
import { generateAccountDormancy } from "@/src/features/insights/generators/accountDormancy";
import { generateBudgetInsights } from "@/src/features/insights/generators/budget";
import { generateCashFlowInsights } from "@/src/features/insights/generators/cashFlow";
import { generateCategoryTrend } from "@/src/features/insights/generators/categoryTrend";
import { generateDuplicateSubscriptions } from "@/src/features/insights/generators/duplicateSubscriptions";
import { generateForecastingInsights } from "@/src/features/insights/generators/forecasting";
import { generateHealthScoreInsights } from "@/src/features/insights/generators/healthScore";
import { generateIncomeInsights } from "@/src/features/insights/generators/income";
import { generateRecurringInsights } from "@/src/features/insights/generators/recurring";
import { generateSavingsInsights } from "@/src/features/insights/generators/savings";
import { generateSpendingInsights } from "@/src/features/insights/generators/spending";
import { generateSpendingSpike } from "@/src/features/insights/generators/spendingSpike";
import { generateSubscriptionGrowth } from "@/src/features/insights/generators/subscriptionGrowth";
import { generateWealthInsights } from "@/src/features/insights/generators/wealth";
import { filterByWindow } from "@/src/features/insights/prepareTransactions";
import { summarizePeriod } from "@/src/features/insights/summary";
import type {
  DateWindow,
  Granularity,
  Insight,
  InsightGenerator,
  InsightsGeneratorContext,
  InsightsRequestMode,
  PeriodBucket,
  PreparedTransaction
} from "@/src/features/insights/types";
import type { InsightFormatters } from "@/src/utils/format";

type NamedGenerator = {
  name: string;
  generate: InsightGenerator;
};

/** Fixed run order; later generators may rely on the same buckets as earlier ones. */
export const INSIGHT_GENERATORS: readonly NamedGenerator[] = [
  { name: "spending", generate: generateSpendingInsights },
  { name: "income", generate: generateIncomeInsights },
  { name: "budget", generate: generateBudgetInsights },
  { name: "recurring", generate: generateRecurringInsights },
  { name: "cashFlow", generate: generateCashFlowInsights },
  { name: "wealth", generate: generateWealthInsights },
  { name: "spendingSpike", generate: generateSpendingSpike },
  { name: "categoryTrend", generate: generateCategoryTrend },
  { name: "subscriptionGrowth", generate: generateSubscriptionGrowth },
  { name: "savings", generate: generateSavingsInsights },
  { name: "forecasting", generate: generateForecastingInsights },
  { name: "duplicateSubscriptions", generate: generateDuplicateSubscriptions },
  { name: "accountDormancy", generate: generateAccountDormancy },
  { name: "healthScore", generate: generateHealthScoreInsights }
];

export type BuildInsightsContextInput = {
  mode: InsightsRequestMode;
  granularity: Granularity;
  comparisonLabel: string;
  baseCurrency: string;
  now: Date;
  referenceDate?: Date;
  window: DateWindow;
  transactions: PreparedTransaction[];
  buckets: PeriodBucket[];
  currentBucketKey: string;
  previousBucketKey: string | null;
  accounts: AccountDTO[];
  categories: CategoryDTO[];
  recurringSeries: RecurringSeriesDTO[];
  balanceFor?: (accountId: string) => number;
  aggregates: AggregateReader;
  convert: CurrencyConverter;
  formatters: InsightFormatters;
  logger: InsightsLogger;
};

export function buildInsightsContext(input: BuildInsightsContextInput): InsightsGeneratorContext {
  const windowTransactions = filterByWindow(input.transactions, input.window);
  const balances = new Map(input.accounts.map((account) => [account.id, account.balance]));

  return {
    mode: input.mode,
    granularity: input.granularity,
    comparisonLabel: input.comparisonLabel,
    baseCurrency: input.baseCurrency,
    now: input.now,
    referenceDate: input.referenceDate ?? input.now,
    window: input.window,
    windowTransactions,
    allTransactions: input.transactions,
    summary: summarizePeriod(windowTransactions, input.now),
    buckets: input.buckets,
    currentBucketKey: input.currentBucketKey,
    previousBucketKey: input.previousBucketKey,
    accounts: input.accounts,
    categories: input.categories,
    recurringSeries: input.recurringSeries,
    balanceFor: input.balanceFor ?? ((accountId) => balances.get(accountId) ?? 0),
    aggregates: input.aggregates,
    convert: input.convert,
    formatters: input.formatters,
    logger: input.logger
  };
}

/** Runs every generator in order and concatenates their output. */
export function runInsightGenerators(
  context: InsightsGeneratorContext,
  step: ProfileStep = (_name, run) => run()
): Insight[] {
  const insights: Insight[] = [];
  for (const generator of INSIGHT_GENERATORS) {
    const produced = step(generator.name, () => generator.generate(context));
    insights.push(...produced);
  }
  context.logger.debug("insights_generated", {
    mode: context.mode,
    granularity: context.granularity,
    count: insights.length
  });
  return insights;
}
