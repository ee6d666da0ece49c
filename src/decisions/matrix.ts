import type { AllocationTiers } from "../config/types.strategy.js";
import type { MacroCategory, MacroSentiment } from "../macro/scorer.js";
import type { TechnicalSignal } from "../technical/classifier.js";
import type { MatrixDecision, TradeConfidence, TradeDirection } from "./types.js";

const TIER_MATRIX: Record<TradeDirection, Record<MacroCategory, TradeConfidence>> = {
  BUY: { BULLISH: "HIGH", NEUTRAL: "MEDIUM", BEARISH: "LOW" },
  SELL: { BEARISH: "HIGH", NEUTRAL: "MEDIUM", BULLISH: "LOW" },
};

const MACRO_BASIS: Record<TradeDirection, Record<MacroCategory, string>> = {
  BUY: {
    BULLISH: "Strong bullish sentiment",
    NEUTRAL: "Neutral sentiment",
    BEARISH: "Bearish sentiment",
  },
  SELL: {
    BEARISH: "Strong bearish sentiment",
    NEUTRAL: "Neutral sentiment",
    BULLISH: "Bullish sentiment",
  },
};

const AGREEMENT: Record<TradeConfidence, string> = {
  HIGH: "Both signals aligned - HIGH confidence trade",
  MEDIUM: "Mixed signals - MEDIUM confidence trade",
  LOW: "Conflicting signals - LOW confidence trade",
};

export function allocationForTier(tier: TradeConfidence, allocation: AllocationTiers): number {
  switch (tier) {
    case "HIGH":
      return allocation.high;
    case "MEDIUM":
      return allocation.medium;
    case "LOW":
      return allocation.low;
  }
}

/**
 * Fuses the technical signal with macro sentiment. NEUTRAL and NO_DATA never trade,
 * whatever the macro state.
 */
export function decideTrade(params: {
  technical: TechnicalSignal;
  macro: Pick<MacroSentiment, "category" | "score">;
  allocation: AllocationTiers;
}): MatrixDecision {
  const { technical, macro } = params;
  if (technical.kind === "NEUTRAL" || technical.kind === "NO_DATA") {
    const basis =
      technical.kind === "NEUTRAL"
        ? "Technical: Price near equilibrium - no clear signal"
        : "Technical: Insufficient data - no signal";
    return {
      action: "NO_TRADE",
      confidence: "NONE",
      allocationPct: 0,
      reasoning: [basis, "No trade opportunity identified"],
    };
  }
  const action: TradeDirection = technical.kind;
  const tier = TIER_MATRIX[action][macro.category];
  const condition = action === "BUY" ? "oversold" : "overbought";
  return {
    action,
    confidence: tier,
    allocationPct: allocationForTier(tier, params.allocation),
    reasoning: [
      `Technical: Price ${condition} (Z-score: ${technical.zscore.toFixed(2)})`,
      `Macro: ${MACRO_BASIS[action][macro.category]} (Score: ${macro.score})`,
      AGREEMENT[tier],
    ],
  };
}
