import { z } from "zod";

const IntegerWeightSchema = z.number().int("weights must be integers");

const MacroWeightsSchema = z
  .object({
    policyRate: IntegerWeightSchema.optional(),
    capitalFlow: IntegerWeightSchema.optional(),
    globalIndex: IntegerWeightSchema.optional(),
    fxRate: IntegerWeightSchema.optional(),
    volatilityIndex: IntegerWeightSchema.optional(),
  })
  .strict();

const MacroThresholdsSchema = z
  .object({
    bullish: z.number().int().optional(),
    bearish: z.number().int().optional(),
  })
  .strict();

const AllocationPctSchema = z.number().finite().min(0).max(100);

export const TradingSchema = z
  .object({
    lookbackPeriod: z.number().int().min(2).optional(),
    zscoreBuyThreshold: z.number().finite().negative().optional(),
    zscoreSellThreshold: z.number().finite().positive().optional(),
    capitalBase: z.number().finite().positive().optional(),
  })
  .strict()
  .optional();

export const MacroSchema = z
  .object({
    weights: MacroWeightsSchema.optional(),
    thresholds: MacroThresholdsSchema.optional(),
  })
  .strict()
  .optional();

export const AllocationSchema = z
  .object({
    high: AllocationPctSchema.optional(),
    medium: AllocationPctSchema.optional(),
    low: AllocationPctSchema.optional(),
  })
  .strict()
  .optional();

export const RiskSchema = z
  .object({
    stopLossPct: z.number().finite().positive().optional(),
    exitTime: z
      .string()
      .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "exitTime must be HH:MM")
      .optional(),
  })
  .strict()
  .optional();

export const MacroFetchSchema = z
  .object({
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict()
  .optional();

export const StrategyConfigSchema = z
  .object({
    symbol: z.string().trim().min(1).optional(),
    trading: TradingSchema,
    macro: MacroSchema,
    allocation: AllocationSchema,
    risk: RiskSchema,
    macroFetch: MacroFetchSchema,
  })
  .strict();
