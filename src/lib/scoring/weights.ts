import type {
  NormalizedWeights,
  StrategyFamily,
  StrategyType,
  WeightConfiguration,
  WeightKey
} from "@/src/lib/types";

export const WEIGHT_KEYS: readonly WeightKey[] = [
  "thetaEfficiency",
  "gammaRisk",
  "liquidity",
  "eventBuffer"
];

export const DEFAULT_WEIGHTS: WeightConfiguration = {
  thetaEfficiency: 0.35,
  gammaRisk: 0.25,
  liquidity: 0.25,
  eventBuffer: 0.15
};

export const STRATEGY_WEIGHT_PRESETS: Record<StrategyFamily, WeightConfiguration> = {
  CASH_SECURED_PUT: {
    thetaEfficiency: 0.4,
    gammaRisk: 0.2,
    liquidity: 0.3,
    eventBuffer: 0.1
  },
  COVERED_CALL: {
    thetaEfficiency: 0.3,
    gammaRisk: 0.35,
    liquidity: 0.25,
    eventBuffer: 0.1
  },
  CREDIT_SPREAD: {
    thetaEfficiency: 0.35,
    gammaRisk: 0.25,
    liquidity: 0.25,
    eventBuffer: 0.15
  },
  DEFAULT: DEFAULT_WEIGHTS
};

export const DEFAULT_WEIGHT_TOLERANCE = 0.001;

export const strategyFamily = (strategy: StrategyType): StrategyFamily => {
  if (strategy === "CSP") return "CASH_SECURED_PUT";
  if (strategy === "CC") return "COVERED_CALL";
  if (strategy === "PCS" || strategy === "CCS") return "CREDIT_SPREAD";
  return "DEFAULT";
};

export const weightsForStrategy = (strategy: StrategyType): WeightConfiguration => ({
  ...STRATEGY_WEIGHT_PRESETS[strategyFamily(strategy)]
});

const sumWeights = (weights: WeightConfiguration) =>
  WEIGHT_KEYS.reduce((total, key) => total + weights[key], 0);

/**
 * Rescales weights so they sum to 1. Negative entries are treated as 0, and a configuration
 * with nothing left to distribute falls back to the default weights.
 */
export const normalizeWeights = (
  raw: Partial<WeightConfiguration>,
  tolerance = DEFAULT_WEIGHT_TOLERANCE
): NormalizedWeights => {
  const warnings: string[] = [];
  const cleaned: WeightConfiguration = { ...DEFAULT_WEIGHTS };

  WEIGHT_KEYS.forEach((key) => {
    const value = raw[key] ?? 0;
    if (!Number.isFinite(value) || value < 0) {
      warnings.push(`Weight ${key}=${value} is not a non-negative number; using 0.`);
      cleaned[key] = 0;
      return;
    }
    cleaned[key] = value;
  });

  const originalSum = sumWeights(cleaned);
  if (originalSum <= 0) {
    warnings.push("Weights sum to 0; falling back to default weights.");
    return { weights: { ...DEFAULT_WEIGHTS }, originalSum, adjusted: true, warnings };
  }

  if (Math.abs(originalSum - 1) <= tolerance) {
    return { weights: cleaned, originalSum, adjusted: false, warnings };
  }

  warnings.push(`Weights summed to ${originalSum.toFixed(4)}; rescaled to 1.`);
  const weights = { ...cleaned };
  WEIGHT_KEYS.forEach((key) => {
    weights[key] = cleaned[key] / originalSum;
  });

  return { weights, originalSum, adjusted: true, warnings };
};
