import { describe, expect, it, vi } from "vitest";
import type { TradeOrder } from "../decisions/types.js";
import { MacroScorer } from "../macro/scorer.js";
import { NO_DATA_SIGNAL } from "../technical/classifier.js";
import {
  formatMacroSummary,
  formatMoney,
  formatTechnicalSummary,
  formatTradeOrder,
} from "./format.js";

const RULE = "=".repeat(60);

describe("formatMoney", () => {
  it("groups thousands with two decimals", () => {
    expect(formatMoney(24912.5)).toBe("24,912.50");
    expect(formatMoney(-680.4)).toBe("-680.40");
    expect(formatMoney(null)).toBe("n/a");
  });
});

describe("formatTechnicalSummary", () => {
  it("prints price, mean and z-score for a directional signal", () => {
    const lines = formatTechnicalSummary(
      {
        kind: "BUY",
        zscore: -2.31,
        currentPrice: 24900,
        meanPrice: 25580.4,
        deviation: -680.4,
        deviationPct: -2.66,
        reason: "Price is oversold (Z-score: -2.31). Price 2.66% below mean.",
      },
      20,
    );
    expect(lines).toEqual([
      RULE,
      "TECHNICAL ANALYSIS (Mean Reversion)",
      RULE,
      "Signal: BUY",
      "Current Price: 24,900.00",
      "Mean Price (20-day): 25,580.40",
      "Deviation: -680.40 (-2.66%)",
      "Z-Score: -2.31",
      "Reason: Price is oversold (Z-score: -2.31). Price 2.66% below mean.",
    ]);
  });

  it("prints only the reason without data", () => {
    expect(formatTechnicalSummary(NO_DATA_SIGNAL, 20).slice(3)).toEqual([
      "Signal: NO_DATA",
      "Reason: insufficient data",
    ]);
  });
});

describe("formatMacroSummary", () => {
  it("lists every factor and each unavailable reading", () => {
    const scorer = new MacroScorer(
      {
        weights: { policyRate: 3, capitalFlow: 2, globalIndex: 2, fxRate: 1, volatilityIndex: 2 },
        thresholds: { bullish: 3, bearish: -3 },
      },
      { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
    );
    scorer.setPolicyRate(6.25, 6.5);
    scorer.setCapitalFlow(1500);
    scorer.setVolatilityIndexChange(7.2, 18.4);
    scorer.applyReading({
      ok: false,
      factor: "fxRate",
      error: "timed out after 5000ms",
      source: "file:quotes.ndjson",
    });
    expect(formatMacroSummary(scorer.sentiment()).slice(3)).toEqual([
      "Overall Sentiment: NEUTRAL",
      "Macro Score: 3",
      "Policy rate: 6.25 | Positive | +3",
      "Capital flow: 1500 | Positive | +2",
      "Global index: n/a | Neutral | 0",
      "FX rate: n/a | Neutral | 0",
      "Volatility index: 18.4 | Negative | -2",
      "Unavailable: FX rate (timed out after 5000ms)",
    ]);
  });
});

describe("formatTradeOrder", () => {
  it("explains a missing order", () => {
    expect(formatTradeOrder(null)).toEqual(["No order: no trade today."]);
  });

  it("prints the order fields", () => {
    const order: TradeOrder = {
      symbol: "NIFTY50",
      action: "SELL",
      orderType: "MARKET",
      quantity: 3,
      entryPrice: 25100,
      stopLoss: 25351,
      target: 24598,
      exitTime: "15:15",
      confidence: "LOW",
      technicalZscore: 2.2,
      macroScore: 4,
    };
    expect(formatTradeOrder(order).slice(3)).toEqual([
      "Symbol: NIFTY50",
      "Action: SELL (MARKET)",
      "Quantity: 3",
      "Entry: 25,100.00",
      "Stop Loss: 25,351.00",
      "Target: 24,598.00",
      "Exit Time: 15:15",
    ]);
  });
});
