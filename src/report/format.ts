import type { TradeOrder, TradingDecision } from "../decisions/types.js";
import type { MacroFactorName } from "../macro/factors.js";
import type { MacroSentiment } from "../macro/scorer.js";
import type { TechnicalSignal } from "../technical/classifier.js";
import { formatSigned } from "../decisions/utils.js";
import { MACRO_FACTOR_NAMES } from "../macro/factors.js";

const RULE = "=".repeat(60);

const FACTOR_LABELS: Record<MacroFactorName, string> = {
  policyRate: "Policy rate",
  capitalFlow: "Capital flow",
  globalIndex: "Global index",
  fxRate: "FX rate",
  volatilityIndex: "Volatility index",
};

export function formatMoney(value: number | null): string {
  if (value === null) {
    return "n/a";
  }
  return value.toLocaleString("en-US", { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

function heading(title: string): string[] {
  return [RULE, title, RULE];
}

export function formatTechnicalSummary(signal: TechnicalSignal, lookback: number): string[] {
  const lines = [...heading("TECHNICAL ANALYSIS (Mean Reversion)"), `Signal: ${signal.kind}`];
  if (signal.kind === "NO_DATA") {
    lines.push(`Reason: ${signal.reason}`);
    return lines;
  }
  lines.push(
    `Current Price: ${formatMoney(signal.currentPrice)}`,
    `Mean Price (${lookback}-day): ${formatMoney(signal.meanPrice)}`,
    `Deviation: ${formatMoney(signal.deviation)} (${signal.deviationPct.toFixed(2)}%)`,
    `Z-Score: ${signal.zscore.toFixed(2)}`,
    `Reason: ${signal.reason}`,
  );
  return lines;
}

export function formatMacroSummary(sentiment: MacroSentiment): string[] {
  const lines = [
    ...heading("MACRO SENTIMENT"),
    `Overall Sentiment: ${sentiment.category}`,
    `Macro Score: ${sentiment.score}`,
  ];
  for (const name of MACRO_FACTOR_NAMES) {
    const entry = sentiment.breakdown[name];
    const value = entry.rawValue === null ? "n/a" : String(entry.rawValue);
    lines.push(
      `${FACTOR_LABELS[name]}: ${value} | ${entry.polarity} | ${formatSigned(entry.contribution, 0)}`,
    );
  }
  for (const failure of sentiment.failures) {
    lines.push(`Unavailable: ${FACTOR_LABELS[failure.factor]} (${failure.error})`);
  }
  return lines;
}

export function formatDecisionSummary(decision: TradingDecision): string[] {
  const lines = [
    ...heading("TRADING DECISION"),
    `Action: ${decision.action}`,
    `Capital Allocation: ${decision.allocationPct}%`,
    `Confidence: ${decision.confidence}`,
    ...decision.reasoning.map((line) => `- ${line}`),
  ];
  if (decision.action === "NO_TRADE") {
    return lines;
  }
  const risk = decision.riskMetrics;
  lines.push(
    `Entry Price: ${formatMoney(risk.entryPrice)}`,
    `Stop Loss: ${formatMoney(risk.stopLoss)}`,
    `Target: ${formatMoney(risk.target)}`,
    `Capital Allocated: ${formatMoney(risk.capitalAllocated)}`,
    `Capital at Risk: ${formatMoney(risk.capitalAtRisk)}`,
    `Risk:Reward: ${risk.riskRewardRatio}`,
  );
  return lines;
}

export function formatTradeOrder(order: TradeOrder | null): string[] {
  if (!order) {
    return ["No order: no trade today."];
  }
  return [
    ...heading("TRADE ORDER"),
    `Symbol: ${order.symbol}`,
    `Action: ${order.action} (${order.orderType})`,
    `Quantity: ${order.quantity}`,
    `Entry: ${formatMoney(order.entryPrice)}`,
    `Stop Loss: ${formatMoney(order.stopLoss)}`,
    `Target: ${formatMoney(order.target)}`,
    `Exit Time: ${order.exitTime}`,
  ];
}
