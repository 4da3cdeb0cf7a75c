import { describe, expect, it, vi } from "vitest";
import type { StockMarketProfile } from "@/src/lib/types";
import { CachedProfileProvider } from "../cached";

describe("CachedProfileProvider", () => {
  it("caches hits and misses until the TTL passes", () => {
    let clock = 0;
    const getProfile = vi.fn((symbol: string): Partial<StockMarketProfile> | null =>
      symbol === "ABC" ? { beta: 1.5 } : null
    );
    const provider = new CachedProfileProvider({ getProfile }, 1000, () => clock);

    expect(provider.getProfile("abc")).toEqual({ beta: 1.5 });
    expect(provider.getProfile("ABC")).toEqual({ beta: 1.5 });
    expect(provider.getProfile("XYZ")).toBeNull();
    expect(provider.getProfile("xyz")).toBeNull();
    expect(getProfile).toHaveBeenCalledTimes(2);

    clock = 1000;
    provider.getProfile("ABC");
    expect(getProfile).toHaveBeenCalledTimes(3);
  });

  it("reloads after invalidation", () => {
    const getProfile = vi.fn((): Partial<StockMarketProfile> | null => null);
    const provider = new CachedProfileProvider({ getProfile }, 60_000);

    provider.getProfile("ABC");
    provider.invalidate();
    provider.getProfile("ABC");
    expect(getProfile).toHaveBeenCalledTimes(2);
  });
});
