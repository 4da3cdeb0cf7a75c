import { z } from "zod";
import type { ResolvedMarketProfile, StockMarketProfile } from "@/src/lib/types";
import bundledProfiles from "./market-profiles.json";

export interface StockMarketProfileProvider {
  getProfile(symbol: string): Partial<StockMarketProfile> | null;
}

export const NEUTRAL_PROFILE: StockMarketProfile = {
  volatilityRatio: 1,
  beta: 1,
  liquidity: 1,
  marketCapTier: 1,
  optionsActivity: 1
};

const trait = z.number().positive().default(1);

/**
 * Tables record options activity on a 0-1 scale with 0.5 as a typical name. Profiles centre
 * every trait on 1.0, so table activity is divided by this midpoint when parsed.
 */
export const TABLE_ACTIVITY_MIDPOINT = 0.5;

const ProfileEntrySchema = z.object({
  group: z.string().optional(),
  volatilityRatio: trait,
  beta: trait,
  liquidity: trait,
  marketCapTier: trait,
  optionsActivity: z.number().positive().max(1).default(TABLE_ACTIVITY_MIDPOINT)
});

const ProfileTableSchema = z.record(z.string(), ProfileEntrySchema);

export type ProfileTable = Record<string, StockMarketProfile>;

export const parseProfileTable = (input: unknown): ProfileTable => {
  const parsed = ProfileTableSchema.parse(input);
  const table: ProfileTable = {};
  Object.entries(parsed).forEach(([symbol, entry]) => {
    table[symbol.toUpperCase()] = {
      volatilityRatio: entry.volatilityRatio,
      beta: entry.beta,
      liquidity: entry.liquidity,
      marketCapTier: entry.marketCapTier,
      optionsActivity: entry.optionsActivity / TABLE_ACTIVITY_MIDPOINT
    };
  });
  return table;
};

export class StaticProfileProvider implements StockMarketProfileProvider {
  private readonly table: ReadonlyMap<string, StockMarketProfile>;

  constructor(table: ProfileTable) {
    this.table = new Map(
      Object.entries(table).map(([symbol, profile]) => [symbol.toUpperCase(), { ...profile }])
    );
  }

  getProfile(symbol: string) {
    return this.table.get(symbol.trim().toUpperCase()) ?? null;
  }

  get symbols() {
    return Array.from(this.table.keys());
  }
}

export const bundledProfileProvider = new StaticProfileProvider(parseProfileTable(bundledProfiles));

const normalizeSymbol = (symbol?: string | null) => {
  const trimmed = symbol?.trim().toUpperCase() ?? "";
  return trimmed.length > 0 ? trimmed : null;
};

const fillTraits = (partial: Partial<StockMarketProfile>): StockMarketProfile => ({
  volatilityRatio: partial.volatilityRatio ?? NEUTRAL_PROFILE.volatilityRatio,
  beta: partial.beta ?? NEUTRAL_PROFILE.beta,
  liquidity: partial.liquidity ?? NEUTRAL_PROFILE.liquidity,
  marketCapTier: partial.marketCapTier ?? NEUTRAL_PROFILE.marketCapTier,
  optionsActivity: partial.optionsActivity ?? NEUTRAL_PROFILE.optionsActivity
});

// Unknown or missing symbols are not an error: they score against the neutral baseline.
export const resolveMarketProfile = (
  provider: StockMarketProfileProvider,
  symbol?: string | null
): ResolvedMarketProfile => {
  const normalized = normalizeSymbol(symbol);
  if (!normalized) {
    return { symbol: null, profile: { ...NEUTRAL_PROFILE }, source: "neutral" };
  }

  const found = provider.getProfile(normalized);
  if (!found) {
    return { symbol: normalized, profile: { ...NEUTRAL_PROFILE }, source: "neutral" };
  }

  return { symbol: normalized, profile: fillTraits(found), source: "provider" };
};
