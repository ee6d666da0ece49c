import type {
  EmptyRiskMetrics,
  RiskMetrics,
  TradeAction,
  TradeDirection,
  TradeRiskMetrics,
} from "./types.js";
import { InvalidInputError } from "../errors.js";
import { round } from "./utils.js";

/** Target sits twice as far from entry as the stop. */
export const REWARD_MULTIPLE = 2;

export const EMPTY_RISK_METRICS: EmptyRiskMetrics = Object.freeze({
  entryPrice: null,
  stopLoss: null,
  target: null,
  capitalAllocated: 0,
  capitalAtRisk: 0,
  riskRewardRatio: null,
});

export type RiskParams = {
  currentPrice: number | null;
  allocationPct: number;
  capitalBase: number;
  stopLossPct: number;
};

function requirePositive(label: string, value: number | null): number {
  if (value === null || !Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(`${label} must be a positive number (got ${value})`);
  }
  return value;
}

export function calculateTradeRiskMetrics(
  params: RiskParams & { action: TradeDirection },
): TradeRiskMetrics {
  const price = requirePositive("current price", params.currentPrice);
  const capitalBase = requirePositive("capital base", params.capitalBase);
  const stopLossPct = requirePositive("stop-loss pct", params.stopLossPct);
  if (!Number.isFinite(params.allocationPct) || params.allocationPct < 0 || params.allocationPct > 100) {
    throw new InvalidInputError(`allocation pct must be within [0, 100] (got ${params.allocationPct})`);
  }
  const stopFraction = stopLossPct / 100;
  const direction = params.action === "BUY" ? 1 : -1;
  const stopLoss = price * (1 - direction * stopFraction);
  const target = price * (1 + direction * REWARD_MULTIPLE * stopFraction);
  const capitalAllocated = (params.allocationPct / 100) * capitalBase;
  return {
    entryPrice: round(price),
    stopLoss: round(stopLoss),
    target: round(target),
    capitalAllocated: round(capitalAllocated),
    capitalAtRisk: round(capitalAllocated * stopFraction),
    riskRewardRatio: "1:2",
  };
}

export function calculateRiskMetrics(params: RiskParams & { action: TradeAction }): RiskMetrics {
  if (params.action === "NO_TRADE") {
    return EMPTY_RISK_METRICS;
  }
  return calculateTradeRiskMetrics({ ...params, action: params.action });
}
