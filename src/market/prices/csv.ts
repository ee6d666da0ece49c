import fs from "node:fs/promises";
import { parse } from "csv-parse/sync";
import type { PricePoint } from "./types.js";
import { createSubsystemLogger } from "../../logging/logger.js";
import { sanitizePriceSeries } from "./sanitize.js";

const log = createSubsystemLogger("prices");

type CsvRecord = Record<string, string>;

function coerceNumber(value: string | undefined): number {
  if (value === undefined || !value.trim()) {
    return Number.NaN;
  }
  return Number.parseFloat(value.replaceAll(",", ""));
}

// index feeds often leave volume blank
function coerceVolume(value: string | undefined): number {
  const volume = coerceNumber(value);
  return Number.isFinite(volume) ? volume : 0;
}

function normalizeDate(value: string | undefined): string {
  const trimmed = value?.trim() ?? "";
  // "2024-01-05 00:00:00+05:30" and "2024-01-05T00:00:00Z" both reduce to the day
  const match = /^(\d{4}-\d{2}-\d{2})/.exec(trimmed);
  return match ? match[1] : trimmed;
}

function normalizeHeaders(header: string[]): string[] {
  return header.map((column) => column.trim().toLowerCase());
}

function isCsvRecord(value: unknown): value is CsvRecord {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function parsePriceCsv(raw: string): PricePoint[] {
  const rows: unknown = parse(raw, {
    columns: normalizeHeaders,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  if (!Array.isArray(rows)) {
    return [];
  }
  return rows.filter(isCsvRecord).map((record) => ({
    date: normalizeDate(record.date),
    open: coerceNumber(record.open),
    high: coerceNumber(record.high),
    low: coerceNumber(record.low),
    close: coerceNumber(record.close),
    volume: coerceVolume(record.volume),
  }));
}

/** Reads a daily OHLCV csv (Date,Open,High,Low,Close,Volume) into a clean ascending series. */
export async function loadPriceSeries(filePath: string): Promise<PricePoint[]> {
  const raw = await fs.readFile(filePath, "utf-8");
  if (!raw.trim()) {
    throw new Error(`price file is empty: ${filePath}`);
  }
  const report = sanitizePriceSeries(parsePriceCsv(raw));
  if (report.droppedInvalid > 0 || report.collapsedDuplicates > 0) {
    log.warn("price series sanitized", {
      file: filePath,
      droppedInvalid: report.droppedInvalid,
      collapsedDuplicates: report.collapsedDuplicates,
    });
  }
  log.debug(`loaded ${report.points.length} price rows`, { file: filePath });
  return report.points;
}
