import type { InsightsLogger } from "@/lib/logger";
import type {
  AccountDTO,
  AggregateReader,
  CategoryDTO,
  CurrencyConverter,
  RecurringFrequency,
  RecurringSeriesDTO,
  TransactionDTO,
  TransactionType
} from "@/lib/types";
import type { InsightFormatters } from "@/src/utils/format";

export const GRANULARITIES = ["week", "month", "quarter", "year", "allTime"] as const;

export type Granularity = (typeof GRANULARITIES)[number];

export type DateWindow = {
  start: Date;
  end: Date;
};

export type PeriodBucket = {
  key: string;
  granularity: Granularity;
  periodStart: Date;
  periodEnd: Date;
  label: string;
  income: number;
  expenses: number;
  netFlow: number;
  cumulativeBalance?: number;
};

export type PeriodSummary = {
  totalIncome: number;
  totalExpenses: number;
  netFlow: number;
};

export type InsightSeverity = "positive" | "neutral" | "warning" | "critical";

export type InsightCategory =
  | "spending"
  | "income"
  | "budget"
  | "recurring"
  | "cashFlow"
  | "wealth"
  | "savings"
  | "forecasting"
  | "health";

export type InsightType =
  | "topSpendingCategory"
  | "monthOverMonthChange"
  | "averageDailySpending"
  | "spendingSpike"
  | "categoryTrend"
  | "incomeGrowth"
  | "incomeVsExpenses"
  | "incomeSourceBreakdown"
  | "budgetOverspend"
  | "projectedOverspend"
  | "budgetUnderutilized"
  | "totalRecurringCost"
  | "subscriptionGrowth"
  | "duplicateSubscriptions"
  | "netCashFlow"
  | "bestMonth"
  | "worstMonth"
  | "projectedBalance"
  | "totalWealth"
  | "wealthGrowth"
  | "accountDormancy"
  | "savingsRate"
  | "emergencyFund"
  | "savingsMomentum"
  | "spendingForecast"
  | "balanceRunway"
  | "yearOverYear"
  | "incomeSeasonality"
  | "spendingVelocity"
  | "financialHealthScore";

export type TrendDirection = "up" | "down" | "flat";

export type InsightMetric = {
  value: number;
  formattedValue: string;
  currency?: string;
  unit?: string;
};

export type InsightTrend = {
  direction: TrendDirection;
  changePercent?: number;
  changeAbsolute?: number;
  comparisonPeriod: string;
};

export type BreakdownItem = {
  name: string;
  amount: number;
  percentage: number;
};

export type InsightDetailData =
  | { kind: "periodPoints"; points: PeriodBucket[] }
  | { kind: "categoryBreakdown"; items: BreakdownItem[] }
  | {
      kind: "budgetProgress";
      items: Array<{ category: string; budget: number; spent: number; percentage: number; projected: number }>;
    }
  | {
      kind: "recurringList";
      items: Array<{ id: string; name: string; category: string; monthlyAmount: number; frequency: RecurringFrequency }>;
    }
  | { kind: "accountList"; items: Array<{ id: string; name: string; balance: number; daysSinceLastTransaction: number }> }
  | { kind: "healthScore"; score: FinancialHealthScore };

export type Insight = {
  id: string;
  type: InsightType;
  title: string;
  subtitle: string;
  metric: InsightMetric;
  trend?: InsightTrend;
  severity: InsightSeverity;
  category: InsightCategory;
  detailData?: InsightDetailData;
};

export type HealthGrade = "Excellent" | "Good" | "Fair" | "Needs Attention";

export type FinancialHealthScore = {
  score: number;
  grade: HealthGrade;
  savingsRateScore: number;
  budgetAdherenceScore: number;
  recurringRatioScore: number;
  emergencyFundScore: number;
  cashFlowScore: number;
};

export type PreparedTransaction = {
  transaction: TransactionDTO;
  id: string;
  date: Date;
  timestamp: number;
  monthKey: string;
  /** Absolute amount in the base currency. */
  amount: number;
  type: TransactionType;
  category: string;
  accountId: string;
};

export type InsightsRequestMode = "granularity" | "timeFilter";

export type InsightsGeneratorContext = {
  mode: InsightsRequestMode;
  granularity: Granularity;
  comparisonLabel: string;
  baseCurrency: string;
  now: Date;
  /** Date the current bucket is taken from; `now` unless the window lies in the past. */
  referenceDate: Date;
  window: DateWindow;
  windowTransactions: PreparedTransaction[];
  allTransactions: PreparedTransaction[];
  summary: PeriodSummary;
  buckets: PeriodBucket[];
  currentBucketKey: string;
  previousBucketKey: string | null;
  accounts: AccountDTO[];
  categories: CategoryDTO[];
  recurringSeries: RecurringSeriesDTO[];
  balanceFor: (accountId: string) => number;
  aggregates: AggregateReader;
  convert: CurrencyConverter;
  formatters: InsightFormatters;
  logger: InsightsLogger;
};

export type InsightGenerator = (context: InsightsGeneratorContext) => Insight[];

export type InsightsResult = {
  insights: Insight[];
  buckets: PeriodBucket[];
};
