import { setTimeout as delay } from "node:timers/promises";
import type { AutoFactorName } from "./factors.js";
import type { QuoteSource } from "./sources/types.js";
import { round } from "../decisions/utils.js";
import { AUTO_FACTOR_NAMES } from "./factors.js";

export type FactorReading = {
  ok: true;
  factor: AutoFactorName;
  /** Latest close vs the prior session, in percent, unrounded. */
  changePct: number;
  level: number;
  source: string;
};

export type FactorReadingFailure = {
  ok: false;
  factor: AutoFactorName;
  error: string;
  source: string;
};

export type FactorReadingResult = FactorReading | FactorReadingFailure;

export function computeChangePct(closes: number[]): number | null {
  if (closes.length < 2) {
    return null;
  }
  const latest = closes[closes.length - 1];
  const previous = closes[closes.length - 2];
  if (!Number.isFinite(latest) || !Number.isFinite(previous) || previous <= 0) {
    return null;
  }
  // unrounded: the factor bands compare against it
  return ((latest - previous) / previous) * 100;
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  try {
    return await Promise.race([
      work,
      delay(timeoutMs, undefined, { signal: controller.signal }).then(() => {
        throw new Error(`timed out after ${timeoutMs}ms`);
      }),
    ]);
  } finally {
    controller.abort();
  }
}

/** Never rejects: every failure comes back as an `ok: false` result for that factor. */
export async function fetchFactorReading(
  source: QuoteSource,
  factor: AutoFactorName,
  timeoutMs: number,
): Promise<FactorReadingResult> {
  const fail = (error: string): FactorReadingFailure => ({
    ok: false,
    factor,
    error,
    source: source.name,
  });
  let closes: number[] | null;
  try {
    closes = await withTimeout(source.fetchCloses({ factor, timeoutMs }), timeoutMs);
  } catch (err) {
    return fail(err instanceof Error ? err.message : String(err));
  }
  if (!closes) {
    return fail("no quotes available");
  }
  const changePct = computeChangePct(closes);
  if (changePct === null) {
    return fail(`need two valid closes, got ${closes.length}`);
  }
  return {
    ok: true,
    factor,
    changePct,
    level: round(closes[closes.length - 1]),
    source: source.name,
  };
}

export async function collectAutoReadings(
  source: QuoteSource,
  timeoutMs: number,
): Promise<FactorReadingResult[]> {
  return await Promise.all(
    AUTO_FACTOR_NAMES.map((factor) => fetchFactorReading(source, factor, timeoutMs)),
  );
}
