import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { StrategyConfig, StrategyConfigFile } from "./types.strategy.js";
import { ConfigurationViolationError } from "../errors.js";
import { StrategyConfigSchema } from "./zod-schema.strategy.js";

export const DEFAULT_CONFIG_FILENAME = "strategy.yaml";

export const DEFAULT_STRATEGY_CONFIG: StrategyConfig = {
  symbol: "NIFTY50",
  trading: {
    lookbackPeriod: 20,
    zscoreBuyThreshold: -2,
    zscoreSellThreshold: 2,
    capitalBase: 100_000,
  },
  macro: {
    weights: {
      policyRate: 3,
      capitalFlow: 2,
      globalIndex: 2,
      fxRate: 1,
      volatilityIndex: 2,
    },
    thresholds: { bullish: 3, bearish: -3 },
  },
  allocation: { high: 80, medium: 50, low: 25 },
  risk: { stopLossPct: 1, exitTime: "15:15" },
  macroFetch: { timeoutMs: 5000 },
};

export function resolveConfigPath(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const override = configPath?.trim() || env.MACRO_REVERSION_CONFIG?.trim();
  return path.resolve(override || DEFAULT_CONFIG_FILENAME);
}

function checkCrossFieldRules(cfg: StrategyConfig): string[] {
  const issues: string[] = [];
  if (cfg.macro.thresholds.bearish > cfg.macro.thresholds.bullish) {
    issues.push(
      `macro.thresholds: bearish (${cfg.macro.thresholds.bearish}) must be <= bullish (${cfg.macro.thresholds.bullish})`,
    );
  }
  if (cfg.allocation.high < cfg.allocation.medium) {
    issues.push(
      `allocation: high (${cfg.allocation.high}) must be >= medium (${cfg.allocation.medium})`,
    );
  }
  if (cfg.allocation.medium < cfg.allocation.low) {
    issues.push(
      `allocation: medium (${cfg.allocation.medium}) must be >= low (${cfg.allocation.low})`,
    );
  }
  return issues;
}

/**
 * Validates a parsed config document and fills in defaults. Throws
 * {@link ConfigurationViolationError} with every offending key.
 */
export function resolveStrategyConfig(raw: unknown): StrategyConfig {
  const parsed = StrategyConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationViolationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }
  const file: StrategyConfigFile = parsed.data;
  const defaults = DEFAULT_STRATEGY_CONFIG;
  const cfg: StrategyConfig = {
    symbol: file.symbol ?? defaults.symbol,
    trading: { ...defaults.trading, ...file.trading },
    macro: {
      weights: { ...defaults.macro.weights, ...file.macro?.weights },
      thresholds: { ...defaults.macro.thresholds, ...file.macro?.thresholds },
    },
    allocation: { ...defaults.allocation, ...file.allocation },
    risk: { ...defaults.risk, ...file.risk },
    macroFetch: { ...defaults.macroFetch, ...file.macroFetch },
  };
  const issues = checkCrossFieldRules(cfg);
  if (issues.length > 0) {
    throw new ConfigurationViolationError(issues);
  }
  return cfg;
}

export function loadConfig(
  params: { configPath?: string; env?: NodeJS.ProcessEnv } = {},
): StrategyConfig {
  const env = params.env ?? process.env;
  const filePath = resolveConfigPath(params.configPath, env);
  if (!fs.existsSync(filePath)) {
    // only the implicit ./strategy.yaml may be absent
    if (params.configPath?.trim() || env.MACRO_REVERSION_CONFIG?.trim()) {
      throw new ConfigurationViolationError([`config file not found: ${filePath}`]);
    }
    return resolveStrategyConfig({});
  }
  let document: unknown;
  try {
    document = parseYaml(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigurationViolationError([`${filePath}: ${String(err)}`]);
  }
  return resolveStrategyConfig(document);
}
