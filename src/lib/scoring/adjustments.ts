import type { AdjustmentFactors, StockMarketProfile } from "@/src/lib/types";

type FactorBounds = {
  min: number;
  max: number;
};

export type AdjustmentConfig = {
  gammaVolatilitySensitivity: number;
  gammaBetaSensitivity: number;
  gammaBounds: FactorBounds;
  thetaMarketCapSensitivity: number;
  thetaLiquiditySensitivity: number;
  thetaBounds: FactorBounds;
  liquiditySensitivity: number;
  liquidityActivitySensitivity: number;
  liquidityBounds: FactorBounds;
};

export const NEUTRAL_ADJUSTMENTS: AdjustmentFactors = {
  gamma: 1,
  theta: 1,
  liquidity: 1,
  event: 1
};

export const DEFAULT_ADJUSTMENT_CONFIG: AdjustmentConfig = {
  gammaVolatilitySensitivity: -0.15,
  gammaBetaSensitivity: -0.1,
  gammaBounds: { min: 0.7, max: 1.3 },
  thetaMarketCapSensitivity: 0.15,
  thetaLiquiditySensitivity: 0.1,
  thetaBounds: { min: 0.8, max: 1.2 },
  liquiditySensitivity: 0.15,
  // profile activity is table activity doubled, so this is 0.15 per unit of table activity
  liquidityActivitySensitivity: 0.075,
  liquidityBounds: { min: 0.8, max: 1.3 }
};

const HIGH_VOLATILITY_RATIO = 1.15;
const HIGH_BETA = 1.25;
const LARGE_CAP_TIER = 1.5;
const HIGH_LIQUIDITY = 1.3;

const clamp = (value: number, bounds: FactorBounds) =>
  Math.max(bounds.min, Math.min(bounds.max, value));

// Each factor is a linear sensitivity around the neutral trait value of 1.0.
export const calculateAdjustments = (
  profile: StockMarketProfile,
  config: AdjustmentConfig = DEFAULT_ADJUSTMENT_CONFIG
): AdjustmentFactors => {
  const gamma =
    1 +
    (profile.volatilityRatio - 1) * config.gammaVolatilitySensitivity +
    (profile.beta - 1) * config.gammaBetaSensitivity;
  const theta =
    1 +
    (profile.marketCapTier - 1) * config.thetaMarketCapSensitivity +
    (profile.liquidity - 1) * config.thetaLiquiditySensitivity;
  const liquidity =
    1 +
    (profile.liquidity - 1) * config.liquiditySensitivity +
    (profile.optionsActivity - 1) * config.liquidityActivitySensitivity;

  return {
    gamma: clamp(gamma, config.gammaBounds),
    theta: clamp(theta, config.thetaBounds),
    liquidity: clamp(liquidity, config.liquidityBounds),
    event: 1
  };
};

const formatShift = (factor: number) => {
  const pct = Math.abs(1 - factor) * 100;
  return `${pct.toFixed(1)}%`;
};

export const describeAdjustments = (
  profile: StockMarketProfile,
  factors: AdjustmentFactors
): string[] => {
  const reasoning: string[] = [];

  if (profile.volatilityRatio > HIGH_VOLATILITY_RATIO) {
    reasoning.push(
      `High volatility (IV/HV ${profile.volatilityRatio.toFixed(2)}) lowers gamma scores by ${formatShift(
        factors.gamma
      )}.`
    );
  }
  if (profile.beta > HIGH_BETA) {
    reasoning.push(`High beta (${profile.beta.toFixed(2)}) makes gamma tolerance more conservative.`);
  }
  if (profile.marketCapTier >= LARGE_CAP_TIER) {
    reasoning.push(`Large-cap name raises theta efficiency scores by ${formatShift(factors.theta)}.`);
  }
  if (profile.liquidity >= HIGH_LIQUIDITY) {
    reasoning.push(`Deep underlying liquidity lifts liquidity scores by ${formatShift(factors.liquidity)}.`);
  }

  return reasoning;
};
