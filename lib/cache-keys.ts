import type { ResultCache } from "@/lib/cache";

const INSIGHTS_PREFIX = "insights:";

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/** Custom ranges also carry their end, since two ranges may share a start. */
export function buildTimeFilterCacheKey(
  preset: string,
  baseCurrency: string,
  windowStart: Date,
  windowEnd?: Date
): string {
  const key = `${INSIGHTS_PREFIX}filter:${preset}:${baseCurrency}:${toEpochSeconds(windowStart)}`;
  return windowEnd ? `${key}:${toEpochSeconds(windowEnd)}` : key;
}

export function buildGranularityCacheKey(granularity: string, baseCurrency: string): string {
  return `${INSIGHTS_PREFIX}granularity:${granularity}:${baseCurrency}`;
}

export function invalidateInsightsForCurrency<T>(cache: ResultCache<T>, baseCurrency: string): number {
  return cache.invalidate((key) => {
    if (!key.startsWith(INSIGHTS_PREFIX)) return false;
    const segments = key.split(":");
    return segments[3] === baseCurrency;
  });
}
