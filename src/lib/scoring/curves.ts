import type { ExpirationType, PiecewiseCurve, ScreeningCriteria } from "@/src/lib/types";

export type LiquidityCurveConfig = {
  baseScores: Record<ExpirationType, number>;
  shortDatedDays: number;
  shortDatedMultiplier: number;
  longDatedDays: number;
  longDatedMultiplier: number;
  highTurnover: number;
  highTurnoverMultiplier: number;
  lowTurnover: number;
  lowTurnoverMultiplier: number;
};

export type EventBufferCurveConfig = {
  noEarningsScore: number;
  clearBeforeDays: number;
  clearBeforeScore: number;
  nearAfterDays: number;
  nearAfterScore: number;
  farAfterScore: number;
  overlapScore: number;
};

export type ScoringCurveConfig = {
  theta: PiecewiseCurve;
  gamma: PiecewiseCurve;
  gammaVolatilityFromDays: number;
  gammaVolatilityBaseline: number;
  gammaVolatilitySensitivity: number;
  liquidity: LiquidityCurveConfig;
  eventBuffer: EventBufferCurveConfig;
  /** Day thresholds the process report screens and explains candidates against. */
  screening: Omit<ScreeningCriteria, "weights">;
};

export type LiquidityActivity = {
  volume?: number | null;
  openInterest?: number | null;
};

export const DEFAULT_VOLATILITY = 0.3;

// Breakpoints are empirical tuning constants; override them per call through ScoringCurveConfig.
export const DEFAULT_SCORING_CURVES: ScoringCurveConfig = {
  theta: {
    shortDatedBelow: 7,
    shortDatedScore: 10,
    points: [
      [7, 30],
      [21, 60],
      [30, 95],
      [33, 100],
      [42, 100],
      [45, 95],
      [60, 70],
      [120, 40]
    ]
  },
  gamma: {
    shortDatedBelow: 7,
    shortDatedScore: 20,
    points: [
      [7, 20],
      [14, 40],
      [21, 60],
      [30, 80],
      [130, 100]
    ]
  },
  gammaVolatilityFromDays: 30,
  gammaVolatilityBaseline: DEFAULT_VOLATILITY,
  gammaVolatilitySensitivity: 20,
  liquidity: {
    baseScores: {
      monthly: 95,
      eom: 95,
      weekly: 85,
      eow: 85,
      quarterly: 75,
      eoq: 75,
      other: 60
    },
    shortDatedDays: 7,
    shortDatedMultiplier: 0.7,
    longDatedDays: 90,
    longDatedMultiplier: 0.8,
    highTurnover: 1,
    highTurnoverMultiplier: 1.1,
    lowTurnover: 0.1,
    lowTurnoverMultiplier: 0.8
  },
  eventBuffer: {
    noEarningsScore: 75,
    clearBeforeDays: 5,
    clearBeforeScore: 100,
    nearAfterDays: 10,
    nearAfterScore: 70,
    farAfterScore: 90,
    overlapScore: 30
  },
  // theta sits at 95 or above exactly on the optimal window
  screening: {
    optimalThetaWindow: { minDays: 30, maxDays: 45 },
    highGammaRiskDays: 21,
    maxEfficientDays: 60
  }
};

export const clampScore = (value: number) => Math.max(0, Math.min(100, value));

/**
 * Linear interpolation over a breakpoint table. Inputs below `shortDatedBelow` take the flat
 * short-dated score; inputs past the last breakpoint hold its value.
 */
export const interpolateCurve = (curve: PiecewiseCurve, days: number): number => {
  if (days < curve.shortDatedBelow || curve.points.length === 0) {
    return curve.shortDatedScore;
  }

  const [firstDays, firstScore] = curve.points[0];
  if (days <= firstDays) return firstScore;

  for (let index = 1; index < curve.points.length; index += 1) {
    const [toDays, toScore] = curve.points[index];
    if (days <= toDays) {
      const [fromDays, fromScore] = curve.points[index - 1];
      return fromScore + ((days - fromDays) * (toScore - fromScore)) / (toDays - fromDays);
    }
  }

  return curve.points[curve.points.length - 1][1];
};

export const scoreThetaEfficiency = (
  days: number,
  adjustmentFactor = 1,
  curves: ScoringCurveConfig = DEFAULT_SCORING_CURVES
) => clampScore(interpolateCurve(curves.theta, days) * adjustmentFactor);

/**
 * Higher is safer. Past the volatility horizon the base curve is shifted by how far the
 * volatility sits from its baseline, so elevated vol lowers the score for the same tenor.
 */
export const scoreGammaRisk = (
  days: number,
  volatility = DEFAULT_VOLATILITY,
  adjustmentFactor = 1,
  curves: ScoringCurveConfig = DEFAULT_SCORING_CURVES
) => {
  let base = interpolateCurve(curves.gamma, days);
  if (days >= curves.gammaVolatilityFromDays) {
    base += (curves.gammaVolatilityBaseline - volatility) * curves.gammaVolatilitySensitivity;
  }
  return clampScore(base * adjustmentFactor);
};

export const scoreLiquidity = (
  expirationType: ExpirationType,
  days: number,
  activity: LiquidityActivity = {},
  adjustmentFactor = 1,
  curves: ScoringCurveConfig = DEFAULT_SCORING_CURVES
) => {
  const config = curves.liquidity;
  let score = config.baseScores[expirationType];

  if (days < config.shortDatedDays) {
    score *= config.shortDatedMultiplier;
  } else if (days > config.longDatedDays) {
    score *= config.longDatedMultiplier;
  }

  const volume = activity.volume ?? null;
  const openInterest = activity.openInterest ?? null;
  if (volume !== null && openInterest !== null && openInterest > 0) {
    const turnover = volume / openInterest;
    if (turnover > config.highTurnover) {
      score = Math.min(100, score * config.highTurnoverMultiplier);
    } else if (turnover < config.lowTurnover) {
      score *= config.lowTurnoverMultiplier;
    }
  }

  return clampScore(score * adjustmentFactor);
};

export const scoreEventBuffer = (
  days: number,
  daysToNextEarnings: number | null = null,
  adjustmentFactor = 1,
  curves: ScoringCurveConfig = DEFAULT_SCORING_CURVES
) => {
  const config = curves.eventBuffer;
  if (daysToNextEarnings === null) {
    return clampScore(config.noEarningsScore * adjustmentFactor);
  }

  const daysPastEarnings = days - daysToNextEarnings;
  let score = config.overlapScore;
  if (-daysPastEarnings >= config.clearBeforeDays) {
    score = config.clearBeforeScore;
  } else if (daysPastEarnings > config.nearAfterDays) {
    score = config.farAfterScore;
  } else if (daysPastEarnings > config.clearBeforeDays) {
    score = config.nearAfterScore;
  }

  return clampScore(score * adjustmentFactor);
};
