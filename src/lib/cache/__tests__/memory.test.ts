import { describe, expect, it, vi } from "vitest";
import { MemoryCache } from "../memory";

describe("MemoryCache", () => {
  it("expires entries after the TTL", () => {
    let clock = 0;
    const cache = new MemoryCache<number>(1000, () => clock);
    cache.set("a", 1);

    clock = 999;
    expect(cache.get("a")).toBe(1);

    clock = 1000;
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("loads once per key within the TTL", () => {
    const cache = new MemoryCache<string>(60_000);
    const loader = vi.fn(() => "value");

    expect(cache.getOrLoad("key", loader)).toBe("value");
    expect(cache.getOrLoad("key", loader)).toBe("value");
    expect(loader).toHaveBeenCalledTimes(1);

    cache.clear();
    cache.getOrLoad("key", loader);
    expect(loader).toHaveBeenCalledTimes(2);
  });
});
