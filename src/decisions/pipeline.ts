import type { StrategyConfig } from "../config/types.strategy.js";
import type { SubsystemLogger } from "../logging/logger.js";
import type { PricePoint } from "../market/prices/types.js";
import type { MacroScorer, MacroSentiment } from "../macro/scorer.js";
import type { TechnicalSignal } from "../technical/classifier.js";
import type { WindowedStat } from "../technical/rolling.js";
import type { TradeOrder, TradingDecision } from "./types.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { classifyTechnicalSignal, resolveZScoreThreshold } from "../technical/classifier.js";
import { computeRollingStats, latestWindowedStat } from "../technical/rolling.js";
import { decideTrade } from "./matrix.js";
import { buildTradeOrder } from "./order.js";
import { EMPTY_RISK_METRICS, calculateTradeRiskMetrics } from "./risk.js";

export type PipelineResult = {
  stats: WindowedStat[];
  technical: TechnicalSignal;
  macro: MacroSentiment;
  decision: TradingDecision;
  order: TradeOrder | null;
};

export function analyzeTechnical(
  prices: PricePoint[],
  config: StrategyConfig,
  log?: SubsystemLogger,
): { stats: WindowedStat[]; technical: TechnicalSignal } {
  const stats = computeRollingStats(prices, config.trading.lookbackPeriod);
  const threshold = resolveZScoreThreshold(config.trading, log);
  return { stats, technical: classifyTechnicalSignal(latestWindowedStat(stats), threshold) };
}

/**
 * One run, stages in order: rolling stats, classification, macro sentiment, decision
 * matrix, risk, order. The scorer must already hold this run's factor values.
 */
export function runDecisionPipeline(params: {
  prices: PricePoint[];
  scorer: MacroScorer;
  config: StrategyConfig;
  log?: SubsystemLogger;
}): PipelineResult {
  const log = params.log ?? createSubsystemLogger("pipeline");
  const { config } = params;
  const { stats, technical } = analyzeTechnical(params.prices, config, log);
  if (technical.kind === "NO_DATA") {
    log.warn("no technical signal; need a non-flat window", {
      points: params.prices.length,
      lookback: config.trading.lookbackPeriod,
    });
  }
  const macro = params.scorer.sentiment();
  const matrix = decideTrade({ technical, macro, allocation: config.allocation });

  const decision: TradingDecision =
    matrix.action === "NO_TRADE"
      ? { ...matrix, technicalInput: technical, macroInput: macro, riskMetrics: EMPTY_RISK_METRICS }
      : {
          ...matrix,
          technicalInput: technical,
          macroInput: macro,
          riskMetrics: calculateTradeRiskMetrics({
            action: matrix.action,
            currentPrice: technical.currentPrice,
            allocationPct: matrix.allocationPct,
            capitalBase: config.trading.capitalBase,
            stopLossPct: config.risk.stopLossPct,
          }),
        };

  const order = buildTradeOrder(decision, { symbol: config.symbol, exitTime: config.risk.exitTime });
  if (order && order.quantity === 0) {
    log.warn("order quantity is 0; allocation is below one unit at entry price", {
      capitalAllocated: decision.riskMetrics.capitalAllocated,
      entryPrice: order.entryPrice,
    });
  }
  log.debug("decision ready", { action: decision.action, confidence: decision.confidence });
  return { stats, technical, macro, decision, order };
}
