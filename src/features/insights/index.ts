export { ResultCache, DEFAULT_CACHE_CAPACITY, DEFAULT_CACHE_TTL_MS } from "@/lib/cache";
export { loadInsightsConfig, type InsightsConfig } from "@/lib/config";
export { createRateTableConverter } from "@/lib/finance/currency";
export { createInMemoryAggregateReader } from "@/lib/finance/monthly-aggregates";
export { InMemoryTransactionStore } from "@/lib/in-memory-store";
export { createConsoleLogger, silentLogger, type InsightsLogger } from "@/lib/logger";
export type * from "@/lib/types";
export { aggregatePeriods, withCumulativeBalance } from "@/src/features/insights/periodAggregator";
export { InsightsRequestError, InsightsService, type InsightsServiceOptions } from "@/src/features/insights/insightsService";
export type * from "@/src/features/insights/types";
export { TIME_FILTER_PRESETS, resolveTimeFilter, type TimeFilter } from "@/src/features/insights/utils/timeFilter";
export { createInsightFormatters } from "@/src/utils/format";
