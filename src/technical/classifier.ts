import type { StrategyConfig } from "../config/types.strategy.js";
import type { SubsystemLogger } from "../logging/logger.js";
import type { WindowedStat } from "./rolling.js";
import { InvalidInputError } from "../errors.js";
import { round } from "../decisions/utils.js";

export type TechnicalSignalKind = "BUY" | "SELL" | "NEUTRAL" | "NO_DATA";

export type DirectionalTechnicalSignal = {
  kind: "BUY" | "SELL" | "NEUTRAL";
  zscore: number;
  currentPrice: number;
  meanPrice: number;
  deviation: number;
  deviationPct: number;
  reason: string;
};

export type NoDataTechnicalSignal = {
  kind: "NO_DATA";
  zscore: null;
  currentPrice: null;
  meanPrice: null;
  deviation: null;
  deviationPct: null;
  reason: string;
};

export type TechnicalSignal = DirectionalTechnicalSignal | NoDataTechnicalSignal;

export const DEFAULT_ZSCORE_THRESHOLD = 2;

export const NO_DATA_SIGNAL: NoDataTechnicalSignal = {
  kind: "NO_DATA",
  zscore: null,
  currentPrice: null,
  meanPrice: null,
  deviation: null,
  deviationPct: null,
  reason: "insufficient data",
};

/**
 * The classifier takes one symmetric magnitude, read from the buy threshold. A sell
 * threshold of a different magnitude is ignored with a warning.
 */
export function resolveZScoreThreshold(
  trading: StrategyConfig["trading"],
  log?: SubsystemLogger,
): number {
  const magnitude = Math.abs(trading.zscoreBuyThreshold);
  if (Math.abs(trading.zscoreSellThreshold) !== magnitude) {
    log?.warn("asymmetric z-score thresholds; using buy threshold magnitude", {
      buy: trading.zscoreBuyThreshold,
      sell: trading.zscoreSellThreshold,
      threshold: magnitude,
    });
  }
  return magnitude;
}

export function classifyTechnicalSignal(
  stat: WindowedStat,
  threshold = DEFAULT_ZSCORE_THRESHOLD,
): TechnicalSignal {
  if (!Number.isFinite(threshold) || threshold <= 0) {
    throw new InvalidInputError(`z-score threshold must be > 0 (got ${threshold})`);
  }
  if (!stat.defined) {
    return NO_DATA_SIGNAL;
  }
  const { zscore, deviationPct } = stat;
  let kind: DirectionalTechnicalSignal["kind"];
  let reason: string;
  if (zscore < -threshold) {
    kind = "BUY";
    reason = `Price is oversold (Z-score: ${zscore.toFixed(2)}). Price ${Math.abs(deviationPct).toFixed(2)}% below mean.`;
  } else if (zscore > threshold) {
    kind = "SELL";
    reason = `Price is overbought (Z-score: ${zscore.toFixed(2)}). Price ${deviationPct.toFixed(2)}% above mean.`;
  } else {
    kind = "NEUTRAL";
    reason = `Price is near equilibrium (Z-score: ${zscore.toFixed(2)}).`;
  }
  return {
    kind,
    zscore: round(zscore),
    currentPrice: round(stat.close),
    meanPrice: round(stat.rollingMean),
    deviation: round(stat.deviation),
    deviationPct: round(deviationPct),
    reason,
  };
}
