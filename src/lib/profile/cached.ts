import { MemoryCache } from "@/src/lib/cache/memory";
import type { StockMarketProfile } from "@/src/lib/types";
import type { StockMarketProfileProvider } from "@/src/lib/profile/provider";

type CachedLookup = {
  profile: Partial<StockMarketProfile> | null;
};

/**
 * Memoizes lookups from a slower provider. Misses are cached too, so an unknown symbol is
 * only looked up once per TTL window.
 */
export class CachedProfileProvider implements StockMarketProfileProvider {
  private readonly cache: MemoryCache<CachedLookup>;

  constructor(
    private readonly source: StockMarketProfileProvider,
    ttlMs: number,
    now?: () => number
  ) {
    this.cache = new MemoryCache<CachedLookup>(ttlMs, now);
  }

  getProfile(symbol: string) {
    const key = symbol.trim().toUpperCase();
    return this.cache.getOrLoad(key, () => ({ profile: this.source.getProfile(key) })).profile;
  }

  invalidate() {
    this.cache.clear();
  }
}

export const withProfileCache = (
  source: StockMarketProfileProvider,
  ttlMs: number
): StockMarketProfileProvider => (ttlMs > 0 ? new CachedProfileProvider(source, ttlMs) : source);
