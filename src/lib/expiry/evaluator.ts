import {
  bundledProfileProvider,
  resolveMarketProfile,
  type StockMarketProfileProvider
} from "@/src/lib/profile/provider";
import { calculateAdjustments, NEUTRAL_ADJUSTMENTS } from "@/src/lib/scoring/adjustments";
import {
  DEFAULT_SCORING_CURVES,
  DEFAULT_VOLATILITY,
  scoreEventBuffer,
  scoreGammaRisk,
  scoreLiquidity,
  scoreThetaEfficiency,
  type ScoringCurveConfig
} from "@/src/lib/scoring/curves";
import { DEFAULT_WEIGHTS } from "@/src/lib/scoring/weights";
import { addDays, formatDate } from "@/src/lib/expiry/normalize";
import type {
  AdjustmentFactors,
  EvaluationInput,
  ExpirationCandidate,
  ResolvedMarketProfile,
  WeightConfiguration
} from "@/src/lib/types";

export type EvaluationContext = {
  weights: WeightConfiguration;
  profileProvider: StockMarketProfileProvider;
  curves: ScoringCurveConfig;
  now: Date;
};

export const NOTABLE_THRESHOLDS = {
  thetaEfficiency: 90,
  gammaRisk: 80,
  liquidity: 85,
  eventBuffer: 90
} as const;

const HIGH_VOLATILITY_RATIO = 1.15;
const LOW_VOLATILITY_RATIO = 0.9;
const HIGH_BETA = 1.25;
const LOW_BETA = 0.85;

export const resolveEvaluationContext = (
  context: Partial<EvaluationContext> = {}
): EvaluationContext => ({
  weights: context.weights ?? DEFAULT_WEIGHTS,
  profileProvider: context.profileProvider ?? bundledProfileProvider,
  curves: context.curves ?? DEFAULT_SCORING_CURVES,
  now: context.now ?? new Date()
});

export const resolveAdjustments = (resolved: ResolvedMarketProfile): AdjustmentFactors =>
  resolved.source === "provider" ? calculateAdjustments(resolved.profile) : NEUTRAL_ADJUSTMENTS;

const profileNotes = (resolved: ResolvedMarketProfile) => {
  if (resolved.source !== "provider" || !resolved.symbol) return [];

  const notes: string[] = [];
  const { volatilityRatio, beta } = resolved.profile;
  if (volatilityRatio > HIGH_VOLATILITY_RATIO) {
    notes.push(`${resolved.symbol} high volatility (IV/HV ${volatilityRatio.toFixed(2)})`);
  } else if (volatilityRatio < LOW_VOLATILITY_RATIO) {
    notes.push(`${resolved.symbol} low volatility (IV/HV ${volatilityRatio.toFixed(2)})`);
  }
  if (beta > HIGH_BETA) {
    notes.push(`high beta (${beta.toFixed(2)}), gamma tolerance reduced`);
  } else if (beta < LOW_BETA) {
    notes.push(`low beta (${beta.toFixed(2)})`);
  }
  return notes;
};

export const evaluateExpiration = (
  input: EvaluationInput,
  context: Partial<EvaluationContext> = {}
): ExpirationCandidate => {
  const ctx = resolveEvaluationContext(context);
  const resolved = resolveMarketProfile(ctx.profileProvider, input.symbol);
  const adjustments = resolveAdjustments(resolved);

  const volatility = input.volatility ?? DEFAULT_VOLATILITY;
  const thetaEfficiency = scoreThetaEfficiency(input.days, adjustments.theta, ctx.curves);
  const gammaRisk = scoreGammaRisk(input.days, volatility, adjustments.gamma, ctx.curves);
  const liquidityScore = scoreLiquidity(
    input.expirationType,
    input.days,
    { volume: input.volume, openInterest: input.openInterest },
    adjustments.liquidity,
    ctx.curves
  );
  const eventBufferScore = scoreEventBuffer(
    input.days,
    input.daysToNextEarnings ?? null,
    adjustments.event,
    ctx.curves
  );

  const compositeScore =
    ctx.weights.thetaEfficiency * thetaEfficiency +
    ctx.weights.gammaRisk * gammaRisk +
    ctx.weights.liquidity * liquidityScore +
    ctx.weights.eventBuffer * eventBufferScore;

  const reasons = profileNotes(resolved);
  if (thetaEfficiency > NOTABLE_THRESHOLDS.thetaEfficiency) {
    reasons.push(`excellent theta efficiency (${thetaEfficiency.toFixed(0)}/100)`);
  }
  if (gammaRisk > NOTABLE_THRESHOLDS.gammaRisk) {
    reasons.push(`gamma risk contained (${gammaRisk.toFixed(0)}/100)`);
  }
  if (liquidityScore > NOTABLE_THRESHOLDS.liquidity) {
    reasons.push(`strong liquidity (${liquidityScore.toFixed(0)}/100)`);
  }
  if (eventBufferScore > NOTABLE_THRESHOLDS.eventBuffer) {
    reasons.push("clear of earnings");
  }
  if (reasons.length === 0) {
    reasons.push(`composite score ${compositeScore.toFixed(1)}/100`);
  }

  return {
    date: input.date ?? formatDate(addDays(ctx.now, input.days)),
    daysToExpiry: input.days,
    expirationType: input.expirationType,
    thetaEfficiency,
    gammaRisk,
    liquidityScore,
    eventBufferScore,
    compositeScore,
    selectionReason: reasons.join("; ")
  };
};
