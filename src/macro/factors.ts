export const MACRO_FACTOR_NAMES = [
  "policyRate",
  "capitalFlow",
  "globalIndex",
  "fxRate",
  "volatilityIndex",
] as const;

export type MacroFactorName = (typeof MACRO_FACTOR_NAMES)[number];

/** Factors read from market quotes rather than entered by hand. */
export const AUTO_FACTOR_NAMES = ["globalIndex", "fxRate", "volatilityIndex"] as const;

export type AutoFactorName = (typeof AUTO_FACTOR_NAMES)[number];

export type DirectionalChange = -1 | 0 | 1;

export type FactorPolarity = "Positive" | "Neutral" | "Negative";

export const CAPITAL_FLOW_BAND = 1000;

type AutoFactorBand = {
  bandPct: number;
  /** false when a rising quote is bearish (weaker currency, more fear). */
  risingIsBullish: boolean;
};

export const AUTO_FACTOR_BANDS: Record<AutoFactorName, AutoFactorBand> = {
  globalIndex: { bandPct: 0.5, risingIsBullish: true },
  fxRate: { bandPct: 0.3, risingIsBullish: false },
  volatilityIndex: { bandPct: 5, risingIsBullish: false },
};

export function isAutoFactorName(value: string): value is AutoFactorName {
  return AUTO_FACTOR_NAMES.some((name) => name === value);
}

export function policyRateChange(current: number, previous?: number | null): DirectionalChange {
  if (previous === undefined || previous === null) {
    return 0;
  }
  if (current < previous) {
    return 1;
  }
  if (current > previous) {
    return -1;
  }
  return 0;
}

export function capitalFlowChange(netFlow: number): DirectionalChange {
  if (netFlow > CAPITAL_FLOW_BAND) {
    return 1;
  }
  if (netFlow < -CAPITAL_FLOW_BAND) {
    return -1;
  }
  return 0;
}

export function autoFactorChange(factor: AutoFactorName, changePct: number): DirectionalChange {
  const band = AUTO_FACTOR_BANDS[factor];
  let direction: DirectionalChange = 0;
  if (changePct > band.bandPct) {
    direction = 1;
  } else if (changePct < -band.bandPct) {
    direction = -1;
  }
  if (band.risingIsBullish || direction === 0) {
    return direction;
  }
  return direction === 1 ? -1 : 1;
}

export function polarityOf(change: DirectionalChange): FactorPolarity {
  if (change === 1) {
    return "Positive";
  }
  if (change === -1) {
    return "Negative";
  }
  return "Neutral";
}
