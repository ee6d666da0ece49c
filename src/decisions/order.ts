import type { OrderConfig } from "../config/types.strategy.js";
import type { TradeOrder, TradingDecision } from "./types.js";

/**
 * Turns a decision into a market order. NO_TRADE yields null. A zero quantity is still
 * returned so the caller decides whether to drop it; see {@link isActionableOrder}.
 */
export function buildTradeOrder(decision: TradingDecision, config: OrderConfig): TradeOrder | null {
  if (decision.action === "NO_TRADE") {
    return null;
  }
  const risk = decision.riskMetrics;
  const quantity =
    risk.entryPrice > 0 ? Math.max(0, Math.floor(risk.capitalAllocated / risk.entryPrice)) : 0;
  return {
    symbol: config.symbol,
    action: decision.action,
    orderType: "MARKET",
    quantity,
    entryPrice: risk.entryPrice,
    stopLoss: risk.stopLoss,
    target: risk.target,
    exitTime: config.exitTime,
    confidence: decision.confidence,
    technicalZscore: decision.technicalInput.zscore,
    macroScore: decision.macroInput.score,
  };
}

export function isActionableOrder(order: TradeOrder | null): order is TradeOrder {
  return order !== null && order.quantity > 0;
}
