import { z } from "zod";
import { DEFAULT_CACHE_CAPACITY, DEFAULT_CACHE_TTL_MS } from "@/lib/cache";

const emptyToUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => {
    if (typeof value === "string" && value.trim().length === 0) return undefined;
    return value;
  }, schema);

const booleanFlag = emptyToUndefined(
  z
    .string()
    .optional()
    .transform((value) => value === "1" || value?.toLowerCase() === "true")
);

const InsightsEnvSchema = z.object({
  INSIGHTS_CACHE_CAPACITY: emptyToUndefined(z.coerce.number().int().min(1).default(DEFAULT_CACHE_CAPACITY)),
  INSIGHTS_CACHE_TTL_MS: emptyToUndefined(z.coerce.number().int().min(0).default(DEFAULT_CACHE_TTL_MS)),
  INSIGHTS_LOCALE: emptyToUndefined(z.string().min(2).default("en-US")),
  INSIGHTS_DEBUG: booleanFlag,
  INSIGHTS_PROFILING: booleanFlag
});

export type InsightsConfig = {
  cacheCapacity: number;
  cacheTtlMs: number;
  locale: string;
  debug: boolean;
  profiling: boolean;
};

export function loadInsightsConfig(env: Record<string, string | undefined> = process.env): InsightsConfig {
  const parsed = InsightsEnvSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid insights configuration: ${message}`);
  }

  return {
    cacheCapacity: parsed.data.INSIGHTS_CACHE_CAPACITY,
    cacheTtlMs: parsed.data.INSIGHTS_CACHE_TTL_MS,
    locale: parsed.data.INSIGHTS_LOCALE,
    debug: parsed.data.INSIGHTS_DEBUG,
    profiling: parsed.data.INSIGHTS_PROFILING
  };
}
