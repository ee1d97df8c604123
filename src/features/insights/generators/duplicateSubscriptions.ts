import type { RecurringSeriesDTO } from "@/lib/types";
import type { Insight, InsightsGeneratorContext } from "@/src/features/insights/types";
import { monthlyEquivalentOf } from "@/src/features/insights/utils/lookups";

const SIMILAR_COST_RATIO = 0.15;

function buildInsight(context: InsightsGeneratorContext, subtitle: string, cost: number): Insight {
  return {
    id: "duplicate_subscriptions",
    type: "duplicateSubscriptions",
    title: "Possible duplicate subscriptions",
    subtitle,
    metric: {
      value: cost,
      formattedValue: context.formatters.currency(cost, context.baseCurrency),
      currency: context.baseCurrency
    },
    severity: "warning",
    category: "recurring"
  };
}

/**
 * Subscriptions sharing a category, or failing that, two subscriptions whose
 * monthly costs are within 15% of each other.
 */
export function generateDuplicateSubscriptions(context: InsightsGeneratorContext): Insight[] {
  const subscriptions = context.recurringSeries.filter((series) => series.isActive && series.kind === "subscription");
  if (subscriptions.length < 2) {
    return [];
  }

  const byCategory = new Map<string, RecurringSeriesDTO[]>();
  for (const subscription of subscriptions) {
    byCategory.set(subscription.category, [...(byCategory.get(subscription.category) ?? []), subscription]);
  }
  const duplicates = [...byCategory.values()].filter((group) => group.length >= 2).flat();

  if (duplicates.length > 0) {
    const cost = duplicates.reduce((sum, series) => sum + monthlyEquivalentOf(context, series), 0);
    return [buildInsight(context, `${duplicates.length} subscriptions in the same category`, cost)];
  }

  const costs = subscriptions.map((series) => monthlyEquivalentOf(context, series)).sort((left, right) => left - right);
  const hasSimilarCost = costs.some((cost, index) => {
    const next = costs[index + 1];
    return next !== undefined && cost > 0 && Math.abs(cost - next) / cost < SIMILAR_COST_RATIO;
  });
  if (!hasSimilarCost) {
    return [];
  }

  const cost = costs.slice(1).reduce((sum, value) => sum + value, 0);
  return [buildInsight(context, "Subscriptions with similar cost", cost)];
}
