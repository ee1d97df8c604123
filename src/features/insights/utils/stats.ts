import type { TrendDirection } from "@/src/features/insights/types";

const TREND_DEADBAND_PERCENT = 2;

export function average(values: number[]): number {
  const filtered = values.filter((value) => Number.isFinite(value));
  if (filtered.length === 0) return 0;
  return filtered.reduce((sum, value) => sum + value, 0) / filtered.length;
}

export function toPercentChange(current: number, previous: number): number | null {
  if (!Number.isFinite(current) || !Number.isFinite(previous) || previous === 0) {
    return null;
  }

  return ((current - previous) / Math.abs(previous)) * 100;
}

export function toTrendDirection(changePercent: number): TrendDirection {
  if (changePercent > TREND_DEADBAND_PERCENT) return "up";
  if (changePercent < -TREND_DEADBAND_PERCENT) return "down";
  return "flat";
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
