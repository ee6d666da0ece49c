import { describe, expect, it } from "vitest";
import type { PricePoint } from "./types.js";
import { sanitizePriceSeries } from "./sanitize.js";

function point(date: string, close: number): PricePoint {
  return { date, open: close, high: close, low: close, close, volume: 0 };
}

describe("sanitizePriceSeries", () => {
  it("sorts by date ascending", () => {
    const report = sanitizePriceSeries([
      point("2024-02-03", 3),
      point("2024-02-01", 1),
      point("2024-02-02", 2),
    ]);
    expect(report.points.map((p) => p.close)).toEqual([1, 2, 3]);
    expect(report.droppedInvalid).toBe(0);
    expect(report.collapsedDuplicates).toBe(0);
  });

  it("keeps the last row for a repeated date", () => {
    const report = sanitizePriceSeries([
      point("2024-02-01", 1),
      point("2024-02-02", 2),
      point("2024-02-01", 1.5),
    ]);
    expect(report.points.map((p) => [p.date, p.close])).toEqual([
      ["2024-02-01", 1.5],
      ["2024-02-02", 2],
    ]);
    expect(report.collapsedDuplicates).toBe(1);
  });

  it("drops rows without a usable date or close", () => {
    const report = sanitizePriceSeries([
      point("not-a-date", 10),
      point("2024-02-01", 0),
      point("2024-02-02", Number.NaN),
      { ...point("2024-02-03", 12), open: Number.NaN },
      point("2024-02-04", 14),
    ]);
    expect(report.points).toEqual([point("2024-02-04", 14)]);
    expect(report.droppedInvalid).toBe(4);
  });
});
