import { describe, expect, it } from "vitest";
import type { ExpirationCandidate } from "@/src/lib/types";
import { buildBatchReport, buildRecommendation, improvementVsAverage } from "../report";

const makeCandidate = (overrides: Partial<ExpirationCandidate>): ExpirationCandidate => ({
  date: overrides.date ?? "2026-02-04",
  daysToExpiry: overrides.daysToExpiry ?? 30,
  expirationType: overrides.expirationType ?? "monthly",
  thetaEfficiency: overrides.thetaEfficiency ?? 95,
  gammaRisk: overrides.gammaRisk ?? 80,
  liquidityScore: overrides.liquidityScore ?? 95,
  eventBufferScore: overrides.eventBufferScore ?? 75,
  compositeScore: overrides.compositeScore ?? 90,
  selectionReason: overrides.selectionReason ?? "excellent theta efficiency (95/100)"
});

describe("buildRecommendation", () => {
  it("warns about short tenors", () => {
    expect(buildRecommendation(makeCandidate({ daysToExpiry: 14, liquidityScore: 90 }), "CSP")).toBe(
      "Short tenor: gamma risk is elevated, monitor delta closely. | " +
        "CSP: sell a strike slightly below spot, delta between -0.30 and -0.40. | " +
        "Liquidity is strong enough for larger orders."
    );
  });

  it("notes slower decay on long tenors", () => {
    expect(buildRecommendation(makeCandidate({ daysToExpiry: 60, liquidityScore: 70 }), "CC")).toBe(
      "Long tenor: theta decays more slowly, suited to steadier income. | " +
        "Covered call: sell a strike slightly above spot, delta between 0.30 and 0.40."
    );
  });

  it("suggests limit orders when liquidity is thin", () => {
    expect(buildRecommendation(makeCandidate({ daysToExpiry: 30, liquidityScore: 50 }), "PCS")).toBe(
      "Tenor sits in the 21-45 day band where theta and gamma balance well. | " +
        "Credit spread: place the short leg near 0.20-0.30 delta and size the width to max loss. | " +
        "Liquidity is thin; use limit orders and be patient on fills."
    );
  });
});

describe("improvementVsAverage", () => {
  it("compares the best score with the mean", () => {
    const ranked = [90, 70, 50].map((compositeScore) => makeCandidate({ compositeScore }));
    expect(improvementVsAverage(ranked)).toBe("28.6%");
  });

  it("is undefined without a positive mean", () => {
    expect(improvementVsAverage([])).toBeNull();
    expect(improvementVsAverage([makeCandidate({ compositeScore: 0 })])).toBeNull();
  });
});

describe("buildBatchReport", () => {
  it("lists each symbol's winner", () => {
    const lines = buildBatchReport({ SPY: makeCandidate({}) }).split("\n");

    expect(lines[0]).toBe("=".repeat(72));
    expect(lines[1]).toBe("Expiration optimization report");
    expect(lines.slice(4, 14)).toEqual([
      "[SPY]",
      "  Optimal expiration: 2026-02-04 (30 days)",
      "  Type: monthly",
      "  Composite score: 90.0/100",
      "  - Theta efficiency: 95.0/100",
      "  - Gamma risk control: 80.0/100",
      "  - Liquidity: 95.0/100",
      "  - Event buffer: 75.0/100",
      "  Reason: excellent theta efficiency (95/100)",
      ""
    ]);
    expect(lines[lines.length - 1]).toBe("=".repeat(72));
  });
});
