export type WeightConfiguration = {
  thetaEfficiency: number;
  gammaRisk: number;
  liquidity: number;
  eventBuffer: number;
};

export type WeightKey = keyof WeightConfiguration;

export type NormalizedWeights = {
  weights: WeightConfiguration;
  originalSum: number;
  adjusted: boolean;
  warnings: string[];
};

export type CurvePoint = readonly [days: number, score: number];

export type PiecewiseCurve = {
  shortDatedBelow: number;
  shortDatedScore: number;
  points: readonly CurvePoint[];
};
