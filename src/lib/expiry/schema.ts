import { z } from "zod";
import type { StrategyType } from "@/src/lib/types";

const STRATEGY_ALIASES: Record<string, StrategyType> = {
  csp: "CSP",
  cc: "CC",
  pcs: "PCS",
  ccs: "CCS",
  covered_call: "CC",
  credit_spread: "PCS"
};

// Strategies without a preset score with the default weights.
export const StrategySchema = z
  .string()
  .transform((value): StrategyType => STRATEGY_ALIASES[value.trim().toLowerCase()] ?? "DEFAULT");

export const ExpirationDescriptorSchema = z.object({
  date: z.string().optional(),
  days: z.number().optional(),
  type: z.string().optional(),
  daysToNextEarnings: z.number().int().nullable().optional(),
  volume: z.number().nonnegative().nullable().optional(),
  openInterest: z.number().nonnegative().nullable().optional()
});

export const RawExpirationSchema = z.union([z.string(), ExpirationDescriptorSchema]);

export const WeightOverrideSchema = z
  .object({
    thetaEfficiency: z.number(),
    gammaRisk: z.number(),
    liquidity: z.number(),
    eventBuffer: z.number()
  })
  .partial();

export const OptimizeRequestSchema = z.object({
  symbol: z.string().trim().min(1).optional(),
  candidates: z.array(RawExpirationSchema),
  volatility: z.number().positive().optional(),
  strategy: StrategySchema.default("CSP"),
  weights: WeightOverrideSchema.optional(),
  includeProcess: z.boolean().default(true)
});

export const BatchRequestSchema = z.object({
  candidatesBySymbol: z.record(z.string(), z.array(RawExpirationSchema)),
  volatilities: z.record(z.string(), z.number().positive()).optional(),
  strategy: StrategySchema.default("CSP"),
  weights: WeightOverrideSchema.optional()
});

export const describeIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
