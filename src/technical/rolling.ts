import type { PricePoint } from "../market/prices/types.js";
import { InvalidInputError } from "../errors.js";

export type DefinedWindowedStat = {
  defined: true;
  date: string;
  close: number;
  rollingMean: number;
  rollingStd: number;
  zscore: number;
  deviation: number;
  deviationPct: number;
};

/** Warm-up point (fewer than `lookback` closes) or a flat window. */
export type UndefinedWindowedStat = {
  defined: false;
  date: string | null;
  close: number | null;
  rollingMean: null;
  rollingStd: null;
  zscore: null;
  deviation: null;
  deviationPct: null;
};

export type WindowedStat = DefinedWindowedStat | UndefinedWindowedStat;

export function undefinedStat(point?: PricePoint): UndefinedWindowedStat {
  return {
    defined: false,
    date: point?.date ?? null,
    close: point?.close ?? null,
    rollingMean: null,
    rollingStd: null,
    zscore: null,
    deviation: null,
    deviationPct: null,
  };
}

export function assertLookback(lookback: number): void {
  if (!Number.isInteger(lookback) || lookback < 2) {
    throw new InvalidInputError(`lookback must be an integer >= 2 (got ${lookback})`);
  }
}

function windowStat(point: PricePoint, window: number[]): WindowedStat {
  let sum = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const value of window) {
    sum += value;
    min = Math.min(min, value);
    max = Math.max(max, value);
  }
  // equal closes can still leave rounding noise in the variance
  if (min === max) {
    return undefinedStat(point);
  }
  const mean = sum / window.length;
  let squares = 0;
  for (const value of window) {
    squares += (value - mean) ** 2;
  }
  const std = Math.sqrt(squares / (window.length - 1));
  if (!(std > 0)) {
    return undefinedStat(point);
  }
  const deviation = point.close - mean;
  return {
    defined: true,
    date: point.date,
    close: point.close,
    rollingMean: mean,
    rollingStd: std,
    zscore: deviation / std,
    deviation,
    deviationPct: (deviation / mean) * 100,
  };
}

/**
 * One stat per input point over the trailing `lookback` closes, using the sample (N-1)
 * standard deviation. The first `lookback - 1` entries are undefined.
 */
export function computeRollingStats(prices: PricePoint[], lookback: number): WindowedStat[] {
  assertLookback(lookback);
  const closes = prices.map((point) => point.close);
  return prices.map((point, index) => {
    if (index + 1 < lookback) {
      return undefinedStat(point);
    }
    return windowStat(point, closes.slice(index - lookback + 1, index + 1));
  });
}

export function latestWindowedStat(stats: WindowedStat[]): WindowedStat {
  return stats.at(-1) ?? undefinedStat();
}
