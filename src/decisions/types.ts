import type { MacroSentiment } from "../macro/scorer.js";
import type { TechnicalSignal } from "../technical/classifier.js";

export type TradeAction = "BUY" | "SELL" | "NO_TRADE";
export type TradeDirection = Exclude<TradeAction, "NO_TRADE">;

export type ConfidenceTier = "HIGH" | "MEDIUM" | "LOW" | "NONE";
export type TradeConfidence = Exclude<ConfidenceTier, "NONE">;

export type RiskRewardRatio = "1:2";

export type TradeRiskMetrics = {
  entryPrice: number;
  stopLoss: number;
  target: number;
  capitalAllocated: number;
  capitalAtRisk: number;
  riskRewardRatio: RiskRewardRatio;
};

export type EmptyRiskMetrics = {
  entryPrice: null;
  stopLoss: null;
  target: null;
  capitalAllocated: 0;
  capitalAtRisk: 0;
  riskRewardRatio: null;
};

export type RiskMetrics = TradeRiskMetrics | EmptyRiskMetrics;

export type DirectionalMatrixDecision = {
  action: TradeDirection;
  confidence: TradeConfidence;
  allocationPct: number;
  reasoning: string[];
};

export type NoTradeMatrixDecision = {
  action: "NO_TRADE";
  confidence: "NONE";
  allocationPct: 0;
  reasoning: string[];
};

export type MatrixDecision = DirectionalMatrixDecision | NoTradeMatrixDecision;

type DecisionInputs = {
  technicalInput: TechnicalSignal;
  macroInput: MacroSentiment;
};

export type DirectionalTradingDecision = DirectionalMatrixDecision &
  DecisionInputs & { riskMetrics: TradeRiskMetrics };

export type NoTradeDecision = NoTradeMatrixDecision &
  DecisionInputs & { riskMetrics: EmptyRiskMetrics };

export type TradingDecision = DirectionalTradingDecision | NoTradeDecision;

export type TradeOrder = {
  symbol: string;
  action: TradeDirection;
  orderType: "MARKET";
  /** Whole units; 0 when the allocation cannot buy a single unit. */
  quantity: number;
  entryPrice: number;
  stopLoss: number;
  target: number;
  exitTime: string;
  confidence: TradeConfidence;
  technicalZscore: number | null;
  macroScore: number;
};
