import { describe, expect, it, vi } from "vitest";
import type { SubsystemLogger } from "../logging/logger.js";
import { DEFAULT_STRATEGY_CONFIG } from "../config/config.js";
import { MacroScorer } from "../macro/scorer.js";
import { applyManualMacroInputs } from "./macro_inputs.js";

function quietLogger(): SubsystemLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("applyManualMacroInputs", () => {
  it("sets the policy rate and capital flow", () => {
    const log = quietLogger();
    const scorer = new MacroScorer(DEFAULT_STRATEGY_CONFIG.macro, log);
    applyManualMacroInputs(
      scorer,
      { policyRate: 6.25, previousPolicyRate: 6.5, capitalFlow: -1200 },
      log,
    );
    expect(scorer.score()).toBe(1);
    expect(log.warn).not.toHaveBeenCalled();
  });

  it("warns about a previous rate without a current one", () => {
    const log = quietLogger();
    const scorer = new MacroScorer(DEFAULT_STRATEGY_CONFIG.macro, log);
    applyManualMacroInputs(scorer, { previousPolicyRate: 6.5 }, log);
    expect(scorer.factor("policyRate").source).toBe("unset");
    expect(log.warn).toHaveBeenCalledWith("--previous-policy-rate ignored without --policy-rate", {
      previousPolicyRate: 6.5,
    });
  });
});
