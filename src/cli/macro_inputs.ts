import type { SubsystemLogger } from "../logging/logger.js";
import type { MacroScorer } from "../macro/scorer.js";

export type ManualMacroInputs = {
  policyRate?: number;
  previousPolicyRate?: number;
  capitalFlow?: number;
};

/** Sets the manually supplied factors; absent ones stay neutral. */
export function applyManualMacroInputs(
  scorer: MacroScorer,
  inputs: ManualMacroInputs,
  log: SubsystemLogger,
): void {
  if (inputs.policyRate !== undefined) {
    scorer.setPolicyRate(inputs.policyRate, inputs.previousPolicyRate);
  } else if (inputs.previousPolicyRate !== undefined) {
    log.warn("--previous-policy-rate ignored without --policy-rate", {
      previousPolicyRate: inputs.previousPolicyRate,
    });
  }
  if (inputs.capitalFlow !== undefined) {
    scorer.setCapitalFlow(inputs.capitalFlow);
  }
}
