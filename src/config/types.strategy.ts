import type { MacroFactorName } from "../macro/factors.js";

export type TradingSection = {
  lookbackPeriod?: number;
  zscoreBuyThreshold?: number;
  zscoreSellThreshold?: number;
  capitalBase?: number;
};

export type MacroWeights = Record<MacroFactorName, number>;

export type MacroThresholds = {
  bullish: number;
  bearish: number;
};

export type MacroSection = {
  weights?: Partial<MacroWeights>;
  thresholds?: Partial<MacroThresholds>;
};

export type AllocationTiers = {
  high: number;
  medium: number;
  low: number;
};

export type RiskSection = {
  stopLossPct?: number;
  exitTime?: string;
};

export type MacroFetchSection = {
  timeoutMs?: number;
};

/** Shape of strategy.yaml; every key is optional and falls back to a default. */
export type StrategyConfigFile = {
  symbol?: string;
  trading?: TradingSection;
  macro?: MacroSection;
  allocation?: Partial<AllocationTiers>;
  risk?: RiskSection;
  macroFetch?: MacroFetchSection;
};

export type MacroConfig = {
  weights: MacroWeights;
  thresholds: MacroThresholds;
};

export type OrderConfig = {
  symbol: string;
  exitTime: string;
};

/** Fully resolved config. Built once per run and passed to each stage. */
export type StrategyConfig = {
  symbol: string;
  trading: {
    lookbackPeriod: number;
    zscoreBuyThreshold: number;
    zscoreSellThreshold: number;
    capitalBase: number;
  };
  macro: MacroConfig;
  allocation: AllocationTiers;
  risk: {
    stopLossPct: number;
    exitTime: string;
  };
  macroFetch: {
    timeoutMs: number;
  };
};
