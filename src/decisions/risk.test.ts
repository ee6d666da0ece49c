import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../errors.js";
import { EMPTY_RISK_METRICS, calculateRiskMetrics } from "./risk.js";

describe("calculateRiskMetrics", () => {
  it("puts the stop below and the target above a buy", () => {
    const risk = calculateRiskMetrics({
      action: "BUY",
      currentPrice: 100,
      allocationPct: 80,
      capitalBase: 100_000,
      stopLossPct: 1,
    });
    expect(risk).toEqual({
      entryPrice: 100,
      stopLoss: 99,
      target: 102,
      capitalAllocated: 80_000,
      capitalAtRisk: 800,
      riskRewardRatio: "1:2",
    });
  });

  it("mirrors stop and target for a sell", () => {
    const risk = calculateRiskMetrics({
      action: "SELL",
      currentPrice: 24900,
      allocationPct: 25,
      capitalBase: 100_000,
      stopLossPct: 1.5,
    });
    expect(risk.stopLoss).toBe(25273.5);
    expect(risk.target).toBe(24153);
    expect(risk.capitalAllocated).toBe(25_000);
    expect(risk.capitalAtRisk).toBe(375);
  });

  it("returns empty metrics for NO_TRADE without needing a price", () => {
    const risk = calculateRiskMetrics({
      action: "NO_TRADE",
      currentPrice: null,
      allocationPct: 0,
      capitalBase: 100_000,
      stopLossPct: 1,
    });
    expect(risk).toEqual(EMPTY_RISK_METRICS);
    expect(risk.capitalAllocated).toBe(0);
  });

  it("rejects a non-positive price or capital base", () => {
    const base = { action: "BUY" as const, allocationPct: 50, stopLossPct: 1 };
    expect(() => calculateRiskMetrics({ ...base, currentPrice: 0, capitalBase: 1000 })).toThrow(
      InvalidInputError,
    );
    expect(() => calculateRiskMetrics({ ...base, currentPrice: null, capitalBase: 1000 })).toThrow(
      "current price must be a positive number (got null)",
    );
    expect(() => calculateRiskMetrics({ ...base, currentPrice: 100, capitalBase: -5 })).toThrow(
      "capital base must be a positive number (got -5)",
    );
  });

  it("rejects a non-positive stop-loss and an out of range allocation", () => {
    expect(() =>
      calculateRiskMetrics({
        action: "SELL",
        currentPrice: 100,
        allocationPct: 50,
        capitalBase: 1000,
        stopLossPct: 0,
      }),
    ).toThrow(InvalidInputError);
    expect(() =>
      calculateRiskMetrics({
        action: "SELL",
        currentPrice: 100,
        allocationPct: 120,
        capitalBase: 1000,
        stopLossPct: 1,
      }),
    ).toThrow(InvalidInputError);
  });
});
