import type { PricePoint } from "./types.js";
import { parseIsoDate } from "../../decisions/utils.js";

export type SanitizeReport = {
  points: PricePoint[];
  droppedInvalid: number;
  collapsedDuplicates: number;
};

function isUsable(point: PricePoint): boolean {
  return (
    parseIsoDate(point.date) !== null &&
    Number.isFinite(point.close) &&
    point.close > 0 &&
    Number.isFinite(point.open) &&
    Number.isFinite(point.high) &&
    Number.isFinite(point.low) &&
    Number.isFinite(point.volume)
  );
}

/**
 * Orders a raw series by date and collapses rows sharing a date, keeping the one seen last.
 * Rows with an unparseable date or a non-positive close are dropped.
 */
export function sanitizePriceSeries(raw: PricePoint[]): SanitizeReport {
  const byDate = new Map<string, PricePoint>();
  let droppedInvalid = 0;
  let collapsedDuplicates = 0;
  for (const point of raw) {
    if (!isUsable(point)) {
      droppedInvalid += 1;
      continue;
    }
    if (byDate.has(point.date)) {
      collapsedDuplicates += 1;
    }
    byDate.set(point.date, point);
  }
  const points = [...byDate.values()].sort(
    (a, b) => (parseIsoDate(a.date) ?? 0) - (parseIsoDate(b.date) ?? 0),
  );
  return { points, droppedInvalid, collapsedDuplicates };
}
