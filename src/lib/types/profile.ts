export type StockMarketProfile = {
  volatilityRatio: number;
  beta: number;
  liquidity: number;
  marketCapTier: number;
  optionsActivity: number;
};

export type ProfileSource = "provider" | "neutral";

export type ResolvedMarketProfile = {
  symbol: string | null;
  profile: StockMarketProfile;
  source: ProfileSource;
};

export type AdjustmentFactors = {
  gamma: number;
  theta: number;
  liquidity: number;
  event: number;
};
