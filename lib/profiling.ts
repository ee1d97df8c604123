import { performance } from "node:perf_hooks";
import type { InsightsLogger, LogPayload } from "@/lib/logger";

type ComputeProfile = {
  label: string;
  startedAtMs: number;
  steps: Array<{ step: string; durationMs: number }>;
};

export type ProfileStep = <T>(step: string, run: () => T) => T;

function round(value: number): number {
  return Number(value.toFixed(2));
}

/**
 * Runs a synchronous compute pass. When profiling is enabled, logs one
 * `compute_profile` event with the total and per-step durations.
 */
export function withComputeProfiling<T>(
  logger: InsightsLogger,
  label: string,
  enabled: boolean,
  run: (step: ProfileStep) => T,
  extra: LogPayload = {}
): T {
  if (!enabled) {
    return run((_step, inner) => inner());
  }

  const profile: ComputeProfile = {
    label,
    startedAtMs: performance.now(),
    steps: []
  };

  const step: ProfileStep = (name, inner) => {
    const stepStartedAt = performance.now();
    try {
      return inner();
    } finally {
      profile.steps.push({ step: name, durationMs: round(performance.now() - stepStartedAt) });
    }
  };

  let errorName: string | null = null;
  try {
    return run(step);
  } catch (error) {
    errorName = error instanceof Error ? error.name : "unknown_error";
    throw error;
  } finally {
    logger.info("compute_profile", {
      label: profile.label,
      totalMs: round(performance.now() - profile.startedAtMs),
      steps: profile.steps,
      error: errorName,
      ...extra
    });
  }
}
