import { DEFAULT_SCREENING_CRITERIA } from "@/src/lib/explain/process";
import { strategyFamily } from "@/src/lib/scoring/weights";
import type { ExpirationCandidate, StrategyType } from "@/src/lib/types";

const STRONG_LIQUIDITY = 85;
const WEAK_LIQUIDITY = 60;
const RULE = "=".repeat(72);

const STRIKE_HINTS: Record<ReturnType<typeof strategyFamily>, string> = {
  CASH_SECURED_PUT: "CSP: sell a strike slightly below spot, delta between -0.30 and -0.40.",
  COVERED_CALL: "Covered call: sell a strike slightly above spot, delta between 0.30 and 0.40.",
  CREDIT_SPREAD: "Credit spread: place the short leg near 0.20-0.30 delta and size the width to max loss.",
  DEFAULT: "No strategy preset: pick strikes that fit the position's risk limits."
};

export const buildRecommendation = (winner: ExpirationCandidate, strategy: StrategyType) => {
  const { highGammaRiskDays, optimalThetaWindow } = DEFAULT_SCREENING_CRITERIA;
  const lines: string[] = [];

  if (winner.daysToExpiry < highGammaRiskDays) {
    lines.push("Short tenor: gamma risk is elevated, monitor delta closely.");
  } else if (winner.daysToExpiry > optimalThetaWindow.maxDays) {
    lines.push("Long tenor: theta decays more slowly, suited to steadier income.");
  } else {
    lines.push(
      `Tenor sits in the ${highGammaRiskDays}-${optimalThetaWindow.maxDays} day band where theta and gamma balance well.`
    );
  }

  lines.push(STRIKE_HINTS[strategyFamily(strategy)]);

  if (winner.liquidityScore > STRONG_LIQUIDITY) {
    lines.push("Liquidity is strong enough for larger orders.");
  } else if (winner.liquidityScore < WEAK_LIQUIDITY) {
    lines.push("Liquidity is thin; use limit orders and be patient on fills.");
  }

  return lines.join(" | ");
};

/** Percent by which the best composite beats the mean of all ranked candidates. */
export const improvementVsAverage = (ranked: ExpirationCandidate[]): string | null => {
  const [best] = ranked;
  if (!best) return null;
  const mean = ranked.reduce((total, candidate) => total + candidate.compositeScore, 0) / ranked.length;
  if (mean <= 0) return null;
  return `${(((best.compositeScore - mean) / mean) * 100).toFixed(1)}%`;
};

export const buildBatchReport = (winners: Record<string, ExpirationCandidate>) => {
  const lines = [RULE, "Expiration optimization report", RULE, ""];

  Object.entries(winners).forEach(([symbol, winner]) => {
    lines.push(
      `[${symbol}]`,
      `  Optimal expiration: ${winner.date} (${winner.daysToExpiry} days)`,
      `  Type: ${winner.expirationType}`,
      `  Composite score: ${winner.compositeScore.toFixed(1)}/100`,
      `  - Theta efficiency: ${winner.thetaEfficiency.toFixed(1)}/100`,
      `  - Gamma risk control: ${winner.gammaRisk.toFixed(1)}/100`,
      `  - Liquidity: ${winner.liquidityScore.toFixed(1)}/100`,
      `  - Event buffer: ${winner.eventBufferScore.toFixed(1)}/100`,
      `  Reason: ${winner.selectionReason}`,
      ""
    );
  });

  lines.push(RULE);
  return lines.join("\n");
};
