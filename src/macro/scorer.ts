import type { MacroConfig, MacroThresholds, MacroWeights } from "../config/types.strategy.js";
import type { SubsystemLogger } from "../logging/logger.js";
import type { AutoFactorName, DirectionalChange, FactorPolarity, MacroFactorName } from "./factors.js";
import type { FactorReadingFailure, FactorReadingResult } from "./readings.js";
import { ConfigurationViolationError, InvalidInputError } from "../errors.js";
import { round } from "../decisions/utils.js";
import { createSubsystemLogger } from "../logging/logger.js";
import {
  MACRO_FACTOR_NAMES,
  autoFactorChange,
  capitalFlowChange,
  polarityOf,
  policyRateChange,
} from "./factors.js";

export type MacroCategory = "BULLISH" | "NEUTRAL" | "BEARISH";

export type FactorSource = "unset" | "manual" | "fetched" | "fetch-failed";

export type MacroFactorSlot = {
  name: MacroFactorName;
  rawValue: number | null;
  change: DirectionalChange;
  weight: number;
  source: FactorSource;
};

export type FactorBreakdown = {
  rawValue: number | null;
  polarity: FactorPolarity;
  contribution: number;
};

export type MacroSentiment = Readonly<{
  category: MacroCategory;
  score: number;
  breakdown: Readonly<Record<MacroFactorName, Readonly<FactorBreakdown>>>;
  failures: readonly FactorReadingFailure[];
}>;

type SlotState = Omit<MacroFactorSlot, "name" | "weight">;

function emptySlots(): Record<MacroFactorName, SlotState> {
  const unset = (): SlotState => ({ rawValue: null, change: 0, source: "unset" });
  return {
    policyRate: unset(),
    capitalFlow: unset(),
    globalIndex: unset(),
    fxRate: unset(),
    volatilityIndex: unset(),
  };
}

function assertFinite(label: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(`${label} must be a finite number (got ${value})`);
  }
}

function validateMacroConfig(config: MacroConfig): void {
  const issues: string[] = [];
  for (const name of MACRO_FACTOR_NAMES) {
    if (!Number.isInteger(config.weights[name])) {
      issues.push(`macro.weights.${name}: must be an integer`);
    }
  }
  if (!Number.isInteger(config.thresholds.bullish) || !Number.isInteger(config.thresholds.bearish)) {
    issues.push("macro.thresholds: bullish and bearish must be integers");
  } else if (config.thresholds.bearish > config.thresholds.bullish) {
    issues.push("macro.thresholds: bearish must be <= bullish");
  }
  if (issues.length > 0) {
    throw new ConfigurationViolationError(issues);
  }
}

/**
 * Holds the five macro factor slots for one run. Weights and thresholds are fixed at
 * construction; factor values change only through the setters below.
 */
export class MacroScorer {
  private readonly weights: Readonly<MacroWeights>;
  private readonly thresholds: Readonly<MacroThresholds>;
  private readonly slots = emptySlots();
  private failed: FactorReadingFailure[] = [];
  private readonly log: SubsystemLogger;

  constructor(config: MacroConfig, log: SubsystemLogger = createSubsystemLogger("macro")) {
    validateMacroConfig(config);
    this.weights = Object.freeze({ ...config.weights });
    this.thresholds = Object.freeze({ ...config.thresholds });
    this.log = log;
  }

  /** Rate cut is bullish, hike bearish; without a previous rate the factor is neutral. */
  setPolicyRate(current: number, previous?: number | null): void {
    assertFinite("policy rate", current);
    if (previous !== undefined && previous !== null) {
      assertFinite("previous policy rate", previous);
    }
    this.slots.policyRate = {
      rawValue: current,
      change: policyRateChange(current, previous),
      source: "manual",
    };
  }

  setCapitalFlow(netFlow: number): void {
    assertFinite("capital flow", netFlow);
    this.slots.capitalFlow = {
      rawValue: netFlow,
      change: capitalFlowChange(netFlow),
      source: "manual",
    };
  }

  setGlobalIndexChange(changePct: number): void {
    this.setAutoFactor("globalIndex", changePct, round(changePct), "manual");
  }

  setFxRateChange(changePct: number, level?: number): void {
    this.setAutoFactor("fxRate", changePct, level ?? round(changePct), "manual");
  }

  setVolatilityIndexChange(changePct: number, level?: number): void {
    this.setAutoFactor("volatilityIndex", changePct, level ?? round(changePct), "manual");
  }

  /**
   * Applies a fetched reading. A failed reading leaves the factor neutral and is kept in
   * {@link failures}; it never throws.
   */
  applyReading(result: FactorReadingResult): void {
    if (!result.ok) {
      this.slots[result.factor] = { rawValue: null, change: 0, source: "fetch-failed" };
      this.clearFailure(result.factor);
      this.failed.push(result);
      this.log.warn(`could not read ${result.factor}; treating as neutral`, {
        source: result.source,
        error: result.error,
      });
      return;
    }
    // the index factor reports its move, the others their latest level
    const rawValue = result.factor === "globalIndex" ? round(result.changePct) : result.level;
    this.setAutoFactor(result.factor, result.changePct, rawValue, "fetched");
  }

  applyReadings(results: FactorReadingResult[]): void {
    for (const result of results) {
      this.applyReading(result);
    }
  }

  factor(name: MacroFactorName): MacroFactorSlot {
    return { name, weight: this.weights[name], ...this.slots[name] };
  }

  failures(): FactorReadingFailure[] {
    return [...this.failed];
  }

  score(): number {
    let score = 0;
    for (const name of MACRO_FACTOR_NAMES) {
      score += this.contribution(name);
    }
    return score;
  }

  sentiment(): MacroSentiment {
    const score = this.score();
    const entry = (name: MacroFactorName): Readonly<FactorBreakdown> =>
      Object.freeze({
        rawValue: this.slots[name].rawValue,
        polarity: polarityOf(this.slots[name].change),
        contribution: this.contribution(name),
      });
    const breakdown: Record<MacroFactorName, Readonly<FactorBreakdown>> = {
      policyRate: entry("policyRate"),
      capitalFlow: entry("capitalFlow"),
      globalIndex: entry("globalIndex"),
      fxRate: entry("fxRate"),
      volatilityIndex: entry("volatilityIndex"),
    };
    return Object.freeze({
      category: this.categorize(score),
      score,
      breakdown: Object.freeze(breakdown),
      failures: Object.freeze(this.failures()),
    });
  }

  private categorize(score: number): MacroCategory {
    if (score > this.thresholds.bullish) {
      return "BULLISH";
    }
    if (score < this.thresholds.bearish) {
      return "BEARISH";
    }
    return "NEUTRAL";
  }

  /** A factor set after a failed read is no longer unavailable. */
  private clearFailure(factor: MacroFactorName): void {
    this.failed = this.failed.filter((failure) => failure.factor !== factor);
  }

  private contribution(name: MacroFactorName): number {
    const change = this.slots[name].change;
    return change === 0 ? 0 : change * this.weights[name];
  }

  private setAutoFactor(
    factor: AutoFactorName,
    changePct: number,
    rawValue: number,
    source: FactorSource,
  ): void {
    assertFinite(`${factor} change`, changePct);
    this.clearFailure(factor);
    this.slots[factor] = {
      rawValue,
      change: autoFactorChange(factor, changePct),
      source,
    };
  }
}
