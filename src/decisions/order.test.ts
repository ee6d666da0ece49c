import { describe, expect, it, vi } from "vitest";
import type { MacroSentiment } from "../macro/scorer.js";
import type { DirectionalTechnicalSignal } from "../technical/classifier.js";
import type { DirectionalTradingDecision, NoTradeDecision } from "./types.js";
import { MacroScorer } from "../macro/scorer.js";
import { NO_DATA_SIGNAL } from "../technical/classifier.js";
import { buildTradeOrder, isActionableOrder } from "./order.js";
import { EMPTY_RISK_METRICS, calculateTradeRiskMetrics } from "./risk.js";

const orderConfig = { symbol: "NIFTY50", exitTime: "15:15" };

function neutralMacro(): MacroSentiment {
  const scorer = new MacroScorer(
    {
      weights: { policyRate: 3, capitalFlow: 2, globalIndex: 2, fxRate: 1, volatilityIndex: 2 },
      thresholds: { bullish: 3, bearish: -3 },
    },
    { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  );
  return scorer.sentiment();
}

function buySignal(price: number): DirectionalTechnicalSignal {
  return {
    kind: "BUY",
    zscore: -2.41,
    currentPrice: price,
    meanPrice: price * 1.03,
    deviation: -price * 0.03,
    deviationPct: -2.91,
    reason: "test",
  };
}

function buyDecision(price: number, capitalBase: number): DirectionalTradingDecision {
  return {
    action: "BUY",
    confidence: "MEDIUM",
    allocationPct: 50,
    reasoning: [],
    technicalInput: buySignal(price),
    macroInput: neutralMacro(),
    riskMetrics: calculateTradeRiskMetrics({
      action: "BUY",
      currentPrice: price,
      allocationPct: 50,
      capitalBase,
      stopLossPct: 1,
    }),
  };
}

describe("buildTradeOrder", () => {
  it("returns null for NO_TRADE", () => {
    const decision: NoTradeDecision = {
      action: "NO_TRADE",
      confidence: "NONE",
      allocationPct: 0,
      reasoning: ["No trade opportunity identified"],
      technicalInput: NO_DATA_SIGNAL,
      macroInput: neutralMacro(),
      riskMetrics: EMPTY_RISK_METRICS,
    };
    expect(buildTradeOrder(decision, orderConfig)).toBeNull();
  });

  it("sizes a market order in whole units", () => {
    const order = buildTradeOrder(buyDecision(2450, 100_000), orderConfig);
    expect(order).toEqual({
      symbol: "NIFTY50",
      action: "BUY",
      orderType: "MARKET",
      quantity: 20,
      entryPrice: 2450,
      stopLoss: 2425.5,
      target: 2499,
      exitTime: "15:15",
      confidence: "MEDIUM",
      technicalZscore: -2.41,
      macroScore: 0,
    });
    expect(isActionableOrder(order)).toBe(true);
  });

  it("keeps an order whose allocation cannot buy one unit", () => {
    const order = buildTradeOrder(buyDecision(30_000, 10_000), orderConfig);
    expect(order?.quantity).toBe(0);
    expect(order?.entryPrice).toBe(30_000);
    expect(isActionableOrder(order)).toBe(false);
  });
});

describe("isActionableOrder", () => {
  it("rejects a missing order", () => {
    expect(isActionableOrder(null)).toBe(false);
  });
});
