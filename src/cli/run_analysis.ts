#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { loadConfig } from "../config/config.js";
import { runDecisionPipeline } from "../decisions/pipeline.js";
import { createSubsystemLogger } from "../logging/logger.js";
import { collectAutoReadings } from "../macro/readings.js";
import { MacroScorer } from "../macro/scorer.js";
import { createFileQuoteSource } from "../macro/sources/file.js";
import { loadPriceSeries } from "../market/prices/csv.js";
import {
  formatDecisionSummary,
  formatMacroSummary,
  formatTechnicalSummary,
  formatTradeOrder,
} from "../report/format.js";
import { VERSION } from "../version.js";
import { applyManualMacroInputs } from "./macro_inputs.js";

const log = createSubsystemLogger("cli");

function parseNumberOption(value: string): number {
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`not a number: ${value}`);
  }
  return parsed;
}

async function main() {
  const program = new Command();
  program
    .name("macro-reversion")
    .version(VERSION)
    .description("Daily mean-reversion signal weighted by macro sentiment")
    .requiredOption("--prices <path>", "Daily OHLCV csv (Date,Open,High,Low,Close,Volume)")
    .option("--config <path>", "Strategy YAML (default: $MACRO_REVERSION_CONFIG or ./strategy.yaml)")
    .option("--policy-rate <rate>", "Current policy rate (%)", parseNumberOption)
    .option("--previous-policy-rate <rate>", "Previous policy rate (%)", parseNumberOption)
    .option("--capital-flow <amount>", "Net institutional flow, + inflow / - outflow", parseNumberOption)
    .option("--quotes <path>", "NDJSON of {factor,date,close} for the auto factors")
    .option("--json", "Print the result as JSON");

  program.parse(process.argv);
  const opts = program.opts<{
    prices: string;
    config?: string;
    policyRate?: number;
    previousPolicyRate?: number;
    capitalFlow?: number;
    quotes?: string;
    json?: boolean;
  }>();

  const cfg = loadConfig({ configPath: opts.config });
  const prices = await loadPriceSeries(opts.prices);

  const scorer = new MacroScorer(cfg.macro);
  applyManualMacroInputs(scorer, opts, log);
  if (opts.quotes) {
    const readings = await collectAutoReadings(
      createFileQuoteSource(opts.quotes),
      cfg.macroFetch.timeoutMs,
    );
    scorer.applyReadings(readings);
  } else {
    log.info("no --quotes given; global index, fx and volatility stay neutral");
  }

  const result = runDecisionPipeline({ prices, scorer, config: cfg });
  if (opts.json) {
    const { technical, macro, decision, order } = result;
    console.log(JSON.stringify({ technical, macro, decision, order }, null, 2));
    return;
  }
  const lines = [
    ...formatTechnicalSummary(result.technical, cfg.trading.lookbackPeriod),
    ...formatMacroSummary(result.macro),
    ...formatDecisionSummary(result.decision),
    ...formatTradeOrder(result.order),
  ];
  console.log(lines.join("\n"));
}

main().catch((err) => {
  log.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
