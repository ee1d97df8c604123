import assert from "node:assert/strict";
import test from "node:test";
import {
  currentAndPreviousKeys,
  daysInPeriod,
  enumeratePeriods,
  granularitySchema,
  resolveGranularityWindow
} from "@/src/features/insights/utils/granularity";
import { assertSameDate, NOW } from "./helpers/insights-fixtures";

test("resolveGranularityWindow starts at the first transaction's period", () => {
  const month = resolveGranularityWindow("month", NOW, new Date(2025, 10, 20));
  assertSameDate(month.start, new Date(2025, 10, 1));
  assertSameDate(month.end, new Date(2026, 3, 16));

  const year = resolveGranularityWindow("year", NOW, new Date(2024, 6, 9));
  assertSameDate(year.start, new Date(2024, 0, 1));
});

test("resolveGranularityWindow falls back to a lookback without transactions", () => {
  assertSameDate(resolveGranularityWindow("month", NOW, null).start, new Date(2025, 3, 1));
  assertSameDate(resolveGranularityWindow("week", NOW, null).start, new Date(2025, 3, 14));
  assertSameDate(resolveGranularityWindow("year", NOW, null).start, new Date(2023, 0, 1));

  const allTime = resolveGranularityWindow("allTime", NOW, null);
  assert.equal(allTime.start.getTime(), allTime.end.getTime());
});

test("enumeratePeriods covers every month of the window once", () => {
  const slots = enumeratePeriods("month", { start: new Date(2026, 0, 1), end: new Date(2026, 3, 1) }, NOW);

  assert.deepEqual(
    slots.map((slot) => [slot.key, slot.label]),
    [
      ["2026-01", "Jan 2026"],
      ["2026-02", "Feb 2026"],
      ["2026-03", "Mar 2026"]
    ]
  );
  assertSameDate(slots[1].start, new Date(2026, 1, 1));
  assertSameDate(slots[1].end, new Date(2026, 2, 1));
});

test("enumeratePeriods keys weeks by ISO week year", () => {
  const slots = enumeratePeriods("week", { start: new Date(2025, 11, 29), end: new Date(2026, 0, 12) }, NOW);

  assert.deepEqual(
    slots.map((slot) => [slot.key, slot.label]),
    [
      ["2026-W01", "29 Dec"],
      ["2026-W02", "5 Jan"]
    ]
  );
});

test("enumeratePeriods walks quarters from the start of the first quarter", () => {
  const slots = enumeratePeriods("quarter", { start: new Date(2025, 10, 1), end: new Date(2026, 3, 16) }, NOW);
  assert.deepEqual(
    slots.map((slot) => slot.key),
    ["2025-Q4", "2026-Q1", "2026-Q2"]
  );
  assert.equal(slots[0].label, "Q4 2025");
});

test("enumeratePeriods returns one all-time slot and nothing for empty windows", () => {
  const window = { start: new Date(2025, 4, 2), end: new Date(2026, 3, 16) };
  const allTime = enumeratePeriods("allTime", window, NOW);
  assert.equal(allTime.length, 1);
  assert.equal(allTime[0].key, "all");
  assert.equal(allTime[0].label, "All time");

  assert.deepEqual(enumeratePeriods("month", { start: window.end, end: window.end }, NOW), []);
});

test("currentAndPreviousKeys names the periods around now", () => {
  assert.deepEqual(currentAndPreviousKeys("week", NOW), { currentKey: "2026-W16", previousKey: "2026-W15" });
  assert.deepEqual(currentAndPreviousKeys("month", NOW), { currentKey: "2026-04", previousKey: "2026-03" });
  assert.deepEqual(currentAndPreviousKeys("quarter", NOW), { currentKey: "2026-Q2", previousKey: "2026-Q1" });
  assert.deepEqual(currentAndPreviousKeys("year", NOW), { currentKey: "2026", previousKey: "2025" });
  assert.deepEqual(currentAndPreviousKeys("allTime", NOW), { currentKey: "all", previousKey: null });
});

test("daysInPeriod counts calendar days and granularitySchema rejects unknown values", () => {
  assert.equal(daysInPeriod(new Date(2026, 1, 1), new Date(2026, 2, 1)), 28);
  assert.equal(daysInPeriod(new Date(2026, 1, 1), new Date(2026, 1, 1)), 1);
  assert.equal(granularitySchema.safeParse("decade").success, false);
});
