import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadPriceSeries, parsePriceCsv } from "./csv.js";

describe("parsePriceCsv", () => {
  it("reads headers case-insensitively and strips thousands separators", () => {
    const rows = parsePriceCsv(
      [
        "Date,Open,High,Low,Close,Volume",
        '2024-01-02,"21,700.5","21,800","21,650.25","21,750.75",1200',
        "2024-01-03 00:00:00+05:30,21750,21900,21700,21880,",
      ].join("\n"),
    );
    expect(rows).toEqual([
      {
        date: "2024-01-02",
        open: 21700.5,
        high: 21800,
        low: 21650.25,
        close: 21750.75,
        volume: 1200,
      },
      { date: "2024-01-03", open: 21750, high: 21900, low: 21700, close: 21880, volume: 0 },
    ]);
  });

  it("marks a missing close as NaN", () => {
    const rows = parsePriceCsv(["date,open,high,low,close", "2024-01-04,1,2,0.5,"].join("\n"));
    expect(rows[0]?.close).toBeNaN();
  });
});

describe("loadPriceSeries", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "macro-reversion-prices-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("returns a sorted series without duplicates", async () => {
    const file = path.join(dir, "prices.csv");
    await fs.writeFile(
      file,
      [
        "Date,Open,High,Low,Close,Volume",
        "2024-01-03,102,103,101,102.5,900",
        "2024-01-02,100,101,99,100.5,800",
        "2024-01-03,102,104,101,103.5,950",
        "",
      ].join("\n"),
    );
    const series = await loadPriceSeries(file);
    expect(series.map((p) => [p.date, p.close])).toEqual([
      ["2024-01-02", 100.5],
      ["2024-01-03", 103.5],
    ]);
  });

  it("rejects an empty file", async () => {
    const file = path.join(dir, "empty.csv");
    await fs.writeFile(file, "\n");
    await expect(loadPriceSeries(file)).rejects.toThrow(`price file is empty: ${file}`);
  });
});
