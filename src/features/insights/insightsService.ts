import { addDays, addMonths, startOfDay, startOfMonth, subMonths } from "date-fns";
import { ResultCache } from "@/lib/cache";
import { buildGranularityCacheKey, buildTimeFilterCacheKey, invalidateInsightsForCurrency } from "@/lib/cache-keys";
import { loadInsightsConfig, type InsightsConfig } from "@/lib/config";
import { normalizeCurrencyCode } from "@/lib/finance/currency";
import { createInMemoryAggregateReader } from "@/lib/finance/monthly-aggregates";
import { createConsoleLogger, type InsightsLogger } from "@/lib/logger";
import { withComputeProfiling, type ProfileStep } from "@/lib/profiling";
import type {
  AccountDTO,
  AggregateReader,
  CategoryDTO,
  CurrencyConverter,
  RecurringSeriesDTO,
  TransactionStore
} from "@/lib/types";
import { buildInsightsContext, runInsightGenerators } from "@/src/features/insights/buildInsights";
import { computeHealthScore } from "@/src/features/insights/generators/healthScore";
import { aggregatePeriods } from "@/src/features/insights/periodAggregator";
import { firstTransactionDate, prepareTransactions } from "@/src/features/insights/prepareTransactions";
import type {
  DateWindow,
  FinancialHealthScore,
  Granularity,
  Insight,
  InsightsGeneratorContext,
  InsightsResult,
  PreparedTransaction
} from "@/src/features/insights/types";
import {
  comparisonLabelFor,
  currentAndPreviousKeys,
  granularitySchema
} from "@/src/features/insights/utils/granularity";
import {
  comparisonReferenceDate,
  resolveTimeFilter,
  timeFilterSchema,
  type ResolvedTimeFilter,
  type TimeFilter
} from "@/src/features/insights/utils/timeFilter";
import { createInsightFormatters, type InsightFormatters } from "@/src/utils/format";

export type CachedInsights = Insight[] | InsightsResult;

export type InsightsRequestErrorCode = "INVALID_CURRENCY" | "INVALID_GRANULARITY" | "INVALID_TIME_FILTER";

export class InsightsRequestError extends Error {
  readonly code: InsightsRequestErrorCode;

  constructor(code: InsightsRequestErrorCode, message: string) {
    super(message);
    this.name = "InsightsRequestError";
    this.code = code;
  }
}

export type InsightsServiceOptions = {
  store: TransactionStore;
  convert: CurrencyConverter;
  /** Defaults to aggregates rebuilt in memory from the store. */
  aggregates?: AggregateReader;
  cache?: ResultCache<CachedInsights>;
  logger?: InsightsLogger;
  profileLogger?: InsightsLogger;
  formatters?: InsightFormatters;
  now?: () => Date;
  config?: InsightsConfig;
};

type StoreSnapshot = {
  transactions: PreparedTransaction[];
  firstTransactionDate: Date | null;
  accounts: AccountDTO[];
  categories: CategoryDTO[];
  recurringSeries: RecurringSeriesDTO[];
};

const DEFAULT_TREND_MONTHS = 6;
const LONG_TREND_MONTHS = 12;
const DEFAULT_HEALTH_FILTER: TimeFilter = { preset: "thisYear" };

function trendMonthsFor(resolved: ResolvedTimeFilter): number {
  return resolved.preset === "lastYear" || resolved.preset === "allTime" ? LONG_TREND_MONTHS : DEFAULT_TREND_MONTHS;
}

function toIssueMessage(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");
}

/** Freezes every nested object and array; `Date` values stay mutable. */
function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== "object" || value instanceof Date || Object.isFrozen(value)) {
    return value;
  }
  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

/**
 * Computes insight sets per time filter or granularity and keeps the results
 * in a bounded LRU cache. A result is stored only after every generator ran,
 * frozen, and later hits return that same object.
 */
export class InsightsService {
  private readonly store: TransactionStore;
  private readonly convert: CurrencyConverter;
  private readonly aggregates: AggregateReader;
  private readonly refreshAggregates: (() => void) | null;
  private readonly cache: ResultCache<CachedInsights>;
  private readonly logger: InsightsLogger;
  private readonly profileLogger: InsightsLogger;
  private readonly formatters: InsightFormatters;
  private readonly now: () => Date;
  private readonly config: InsightsConfig;

  constructor(options: InsightsServiceOptions) {
    this.config = options.config ?? loadInsightsConfig();
    this.store = options.store;
    this.convert = options.convert;
    this.logger = options.logger ?? createConsoleLogger({ debug: this.config.debug });
    this.profileLogger = options.profileLogger ?? createConsoleLogger({ tag: "INSIGHTS-PROFILE" });
    this.formatters = options.formatters ?? createInsightFormatters({ locale: this.config.locale });
    this.now = options.now ?? (() => new Date());
    this.cache =
      options.cache ?? new ResultCache<CachedInsights>({ capacity: this.config.cacheCapacity, ttlMs: this.config.cacheTtlMs });

    if (options.aggregates) {
      this.aggregates = options.aggregates;
      this.refreshAggregates = null;
    } else {
      const reader = createInMemoryAggregateReader(
        () => this.store.listTransactions(),
        this.convert,
        this.logger,
        this.now
      );
      this.aggregates = reader;
      this.refreshAggregates = reader.refresh;
    }
  }

  generateAllInsights(filter: TimeFilter, baseCurrency: string): Insight[];
  generateAllInsights(granularity: Granularity, baseCurrency: string): InsightsResult;
  generateAllInsights(request: TimeFilter | Granularity, baseCurrency: string): Insight[] | InsightsResult {
    if (typeof request === "string") {
      return this.generateForGranularity(request, baseCurrency);
    }
    return this.generateForTimeFilter(request, baseCurrency);
  }

  generateForTimeFilter(filter: TimeFilter, baseCurrency: string): Insight[] {
    const currency = this.parseCurrency(baseCurrency);
    const parsedFilter = this.parseTimeFilter(filter);
    const now = this.now();
    const resolved = resolveTimeFilter(parsedFilter, now);
    const key = buildTimeFilterCacheKey(
      resolved.preset,
      currency,
      resolved.start,
      resolved.preset === "custom" ? resolved.end : undefined
    );

    const cached = this.cache.get(key);
    if (cached && Array.isArray(cached)) {
      this.logger.debug("cache_hit", { key });
      return cached;
    }

    this.logger.debug("cache_miss", { key });
    const insights = withComputeProfiling(
      this.profileLogger,
      "timeFilter",
      this.config.profiling,
      (step) => {
        const snapshot = step("load", () => this.loadSnapshot(currency));
        const context = step("context", () => this.timeFilterContext(resolved, currency, snapshot, now));
        return runInsightGenerators(context, step);
      },
      { preset: resolved.preset, currency }
    );

    this.cache.set(key, deepFreeze(insights));
    return insights;
  }

  generateForGranularity(granularity: Granularity, baseCurrency: string): InsightsResult {
    const currency = this.parseCurrency(baseCurrency);
    const parsedGranularity = this.parseGranularity(granularity);
    const key = buildGranularityCacheKey(parsedGranularity, currency);

    const cached = this.cache.get(key);
    if (cached && !Array.isArray(cached)) {
      this.logger.debug("cache_hit", { key });
      return cached;
    }

    this.logger.debug("cache_miss", { key });
    const result = withComputeProfiling(
      this.profileLogger,
      "granularity",
      this.config.profiling,
      (step) => {
        const snapshot = step("load", () => this.loadSnapshot(currency));
        return this.computeGranularity(parsedGranularity, currency, snapshot, step);
      },
      { granularity: parsedGranularity, currency }
    );

    this.cache.set(key, deepFreeze(result));
    return result;
  }

  /** Every granularity from one store snapshot; cached entries are reused. */
  computeAllGranularities(baseCurrency: string): Record<Granularity, InsightsResult> {
    const currency = this.parseCurrency(baseCurrency);
    let snapshot: StoreSnapshot | null = null;

    const resolve = (granularity: Granularity): InsightsResult => {
      const key = buildGranularityCacheKey(granularity, currency);
      const cached = this.cache.get(key);
      if (cached && !Array.isArray(cached)) {
        return cached;
      }

      const loaded = snapshot ?? this.loadSnapshot(currency);
      snapshot = loaded;
      const result = withComputeProfiling(
        this.profileLogger,
        "granularity",
        this.config.profiling,
        (step) => this.computeGranularity(granularity, currency, loaded, step),
        { granularity, currency, batch: true }
      );
      this.cache.set(key, deepFreeze(result));
      return result;
    };

    return {
      week: resolve("week"),
      month: resolve("month"),
      quarter: resolve("quarter"),
      year: resolve("year"),
      allTime: resolve("allTime")
    };
  }

  /** `null` when the filtered window holds no income. Not cached. */
  computeHealthScore(baseCurrency: string, filter: TimeFilter = DEFAULT_HEALTH_FILTER): FinancialHealthScore | null {
    const currency = this.parseCurrency(baseCurrency);
    const now = this.now();
    const resolved = resolveTimeFilter(this.parseTimeFilter(filter), now);
    const context = this.timeFilterContext(resolved, currency, this.loadSnapshot(currency), now);
    return computeHealthScore(context);
  }

  invalidateCache(): void {
    this.cache.invalidateAll();
    this.refreshAggregates?.();
    this.logger.info("cache_invalidated", { scope: "all" });
  }

  invalidateCurrency(baseCurrency: string): number {
    const currency = this.parseCurrency(baseCurrency);
    const removed = invalidateInsightsForCurrency(this.cache, currency);
    this.refreshAggregates?.();
    this.logger.info("cache_invalidated", { scope: "currency", currency, removed });
    return removed;
  }

  private computeGranularity(
    granularity: Granularity,
    currency: string,
    snapshot: StoreSnapshot,
    step: ProfileStep
  ): InsightsResult {
    const now = this.now();
    const aggregation = step("aggregate", () =>
      aggregatePeriods({
        transactions: snapshot.transactions,
        granularity,
        baseCurrency: currency,
        now,
        firstTransactionDate: snapshot.firstTransactionDate,
        aggregates: this.aggregates,
        logger: this.logger
      })
    );
    const keys = currentAndPreviousKeys(granularity, now);

    const context = buildInsightsContext({
      mode: "granularity",
      granularity,
      comparisonLabel: comparisonLabelFor(granularity),
      baseCurrency: currency,
      now,
      window: aggregation.window,
      transactions: snapshot.transactions,
      buckets: aggregation.buckets,
      currentBucketKey: keys.currentKey,
      previousBucketKey: keys.previousKey,
      accounts: snapshot.accounts,
      categories: snapshot.categories,
      recurringSeries: snapshot.recurringSeries,
      aggregates: this.aggregates,
      convert: this.convert,
      formatters: this.formatters,
      logger: this.logger
    });

    return { insights: runInsightGenerators(context, step), buckets: aggregation.buckets };
  }

  private timeFilterContext(
    resolved: ResolvedTimeFilter,
    currency: string,
    snapshot: StoreSnapshot,
    now: Date
  ): InsightsGeneratorContext {
    const window: DateWindow =
      resolved.preset === "allTime"
        ? {
            start: startOfDay(snapshot.firstTransactionDate ?? now),
            end: startOfDay(addDays(now, 1))
          }
        : { start: resolved.start, end: resolved.end };
    const referenceDate = comparisonReferenceDate(resolved, now);
    const trendWindow: DateWindow = {
      start: startOfMonth(subMonths(referenceDate, trendMonthsFor(resolved) - 1)),
      end: startOfMonth(addMonths(referenceDate, 1))
    };

    const aggregation = aggregatePeriods({
      transactions: snapshot.transactions,
      granularity: "month",
      baseCurrency: currency,
      now,
      firstTransactionDate: snapshot.firstTransactionDate,
      window: trendWindow,
      aggregates: this.aggregates,
      logger: this.logger
    });
    const keys = currentAndPreviousKeys("month", referenceDate);

    return buildInsightsContext({
      mode: "timeFilter",
      granularity: "month",
      comparisonLabel: comparisonLabelFor("month"),
      baseCurrency: currency,
      now,
      referenceDate,
      window,
      transactions: snapshot.transactions,
      buckets: aggregation.buckets,
      currentBucketKey: keys.currentKey,
      previousBucketKey: keys.previousKey,
      accounts: snapshot.accounts,
      categories: snapshot.categories,
      recurringSeries: snapshot.recurringSeries,
      aggregates: this.aggregates,
      convert: this.convert,
      formatters: this.formatters,
      logger: this.logger
    });
  }

  /** Rollups are rebuilt with every snapshot so both bucketing paths read the same data. */
  private loadSnapshot(currency: string): StoreSnapshot {
    this.refreshAggregates?.();
    const transactions = prepareTransactions(this.store.listTransactions(), currency, this.convert, this.logger);
    return {
      transactions,
      firstTransactionDate: firstTransactionDate(transactions),
      accounts: this.store.listAccounts(),
      categories: this.store.listCategories(),
      recurringSeries: this.store.listRecurringSeries()
    };
  }

  private parseCurrency(baseCurrency: string): string {
    const currency = normalizeCurrencyCode(baseCurrency);
    if (!currency) {
      throw new InsightsRequestError("INVALID_CURRENCY", `Invalid base currency: ${baseCurrency}`);
    }
    return currency;
  }

  private parseGranularity(granularity: string): Granularity {
    const parsed = granularitySchema.safeParse(granularity);
    if (!parsed.success) {
      throw new InsightsRequestError("INVALID_GRANULARITY", `Invalid granularity: ${toIssueMessage(parsed.error.issues)}`);
    }
    return parsed.data;
  }

  private parseTimeFilter(filter: TimeFilter): TimeFilter {
    const parsed = timeFilterSchema.safeParse(filter);
    if (!parsed.success) {
      throw new InsightsRequestError("INVALID_TIME_FILTER", `Invalid time filter: ${toIssueMessage(parsed.error.issues)}`);
    }
    return parsed.data;
  }
}
