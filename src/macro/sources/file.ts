import type { AutoFactorName } from "../factors.js";
import type { QuoteSource } from "./types.js";
import { readNdjsonFile } from "../../decisions/ndjson.js";
import { parseIsoDate } from "../../decisions/utils.js";
import { createSubsystemLogger } from "../../logging/logger.js";
import { isAutoFactorName } from "../factors.js";

const log = createSubsystemLogger("quotes");

export type QuoteRecord = {
  factor: AutoFactorName;
  date: string;
  close: number;
};

export function toQuoteRecord(value: unknown): QuoteRecord | null {
  if (!value || typeof value !== "object") {
    return null;
  }
  const factor = "factor" in value ? value.factor : undefined;
  const date = "date" in value ? value.date : undefined;
  const close = "close" in value ? value.close : undefined;
  if (typeof factor !== "string" || !isAutoFactorName(factor)) {
    return null;
  }
  if (typeof date !== "string" || parseIsoDate(date) === null) {
    return null;
  }
  if (typeof close !== "number" || !Number.isFinite(close)) {
    return null;
  }
  return { factor, date, close };
}

/** Closes for one factor, ascending by date, later lines winning on a repeated date. */
export function closesForFactor(records: QuoteRecord[], factor: AutoFactorName): number[] {
  const byDate = new Map<string, QuoteRecord>();
  for (const record of records) {
    if (record.factor === factor) {
      byDate.set(record.date, record);
    }
  }
  return [...byDate.values()]
    .sort((a, b) => (parseIsoDate(a.date) ?? 0) - (parseIsoDate(b.date) ?? 0))
    .map((record) => record.close);
}

/**
 * Quote source over an NDJSON file of `{ factor, date, close }` lines written by whatever
 * collects the quotes. The file is read once, on first use.
 */
export function createFileQuoteSource(filePath: string): QuoteSource {
  let loaded: Promise<QuoteRecord[]> | null = null;
  const load = async (): Promise<QuoteRecord[]> => {
    const result = await readNdjsonFile(filePath, toQuoteRecord);
    if (result.skippedLines.length > 0) {
      log.warn("skipped unreadable quote lines", {
        file: filePath,
        lines: result.skippedLines,
      });
    }
    return result.entries;
  };
  return {
    name: `file:${filePath}`,
    async fetchCloses({ factor }) {
      loaded ??= load();
      const closes = closesForFactor(await loaded, factor);
      return closes.length > 0 ? closes : null;
    },
  };
}
