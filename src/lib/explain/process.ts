import { NOTABLE_THRESHOLDS } from "@/src/lib/expiry/evaluator";
import { DEFAULT_SCORING_CURVES } from "@/src/lib/scoring/curves";
import type {
  CandidateEvaluationRow,
  DroppedCandidate,
  ExpirationCandidate,
  MarketProfileAnalysis,
  OptimizationProcess,
  RejectionAnalysis,
  ScoringMethodology,
  ScreeningCriteria,
  SelectionDetails,
  StrategyType,
  WeightConfiguration
} from "@/src/lib/types";

export type ProcessInput = {
  ranked: ExpirationCandidate[];
  symbol: string | null;
  strategy: StrategyType;
  weights: WeightConfiguration;
  generatedAt: Date;
  dropped: DroppedCandidate[];
  marketProfile: MarketProfileAnalysis | null;
  criteria?: Partial<Omit<ScreeningCriteria, "weights">>;
};

export const DEFAULT_SCREENING_CRITERIA: Omit<ScreeningCriteria, "weights"> = DEFAULT_SCORING_CURVES.screening;

const MAX_REJECTIONS = 5;
const LARGE_SCORE_GAP = 10;
const SMALL_SCORE_GAP = 5;
const THETA_GAP = 15;
const LIQUIDITY_GAP = 20;

const round2 = (value: number) => Math.round(value * 100) / 100;

const formatPct = (value: number) => `${(value * 100).toFixed(0)}%`;

const inWindow = (days: number, criteria: Omit<ScreeningCriteria, "weights">) =>
  days >= criteria.optimalThetaWindow.minDays && days <= criteria.optimalThetaWindow.maxDays;

const buildEvaluationRows = (ranked: ExpirationCandidate[]): CandidateEvaluationRow[] =>
  ranked.map((candidate, index) => ({
    rank: index + 1,
    date: candidate.date,
    days: candidate.daysToExpiry,
    type: candidate.expirationType,
    thetaEfficiency: round2(candidate.thetaEfficiency),
    gammaRisk: round2(candidate.gammaRisk),
    liquidity: round2(candidate.liquidityScore),
    eventBuffer: round2(candidate.eventBufferScore),
    compositeScore: round2(candidate.compositeScore),
    isWinner: index === 0
  }));

const explainRejection = (
  candidate: ExpirationCandidate,
  winner: ExpirationCandidate,
  criteria: Omit<ScreeningCriteria, "weights">
): string => {
  const reasons: string[] = [];
  const { minDays, maxDays } = criteria.optimalThetaWindow;

  const scoreGap = winner.compositeScore - candidate.compositeScore;
  if (scoreGap > LARGE_SCORE_GAP) {
    reasons.push(`composite score ${scoreGap.toFixed(1)} points lower`);
  } else if (scoreGap > SMALL_SCORE_GAP) {
    reasons.push(`composite score slightly lower (${scoreGap.toFixed(1)} points)`);
  }

  const thetaGap = winner.thetaEfficiency - candidate.thetaEfficiency;
  if (thetaGap > THETA_GAP) {
    reasons.push(`theta efficiency gap ${thetaGap.toFixed(1)} points`);
  }

  if (candidate.daysToExpiry < criteria.highGammaRiskDays) {
    reasons.push(
      `gamma risk too high (${candidate.daysToExpiry}d < ${criteria.highGammaRiskDays}d threshold)`
    );
  }

  const liquidityGap = winner.liquidityScore - candidate.liquidityScore;
  if (liquidityGap > LIQUIDITY_GAP) {
    reasons.push(`liquidity markedly lower (${liquidityGap.toFixed(1)} points)`);
  }

  if (candidate.daysToExpiry < minDays) {
    reasons.push(`shorter than optimal window (${candidate.daysToExpiry}d < ${minDays}d)`);
  } else if (candidate.daysToExpiry > maxDays) {
    reasons.push(`longer than optimal window (${candidate.daysToExpiry}d > ${maxDays}d)`);
  }

  return reasons.length > 0 ? reasons.join("; ") : "marginally lower composite score";
};

const buildRejections = (
  ranked: ExpirationCandidate[],
  criteria: Omit<ScreeningCriteria, "weights">
): RejectionAnalysis[] => {
  const [winner, ...losers] = ranked;
  if (!winner) return [];
  return losers.slice(0, MAX_REJECTIONS).map((candidate) => ({
    date: candidate.date,
    days: candidate.daysToExpiry,
    compositeScore: round2(candidate.compositeScore),
    reason: explainRejection(candidate, winner, criteria)
  }));
};

const buildAdvantages = (
  winner: ExpirationCandidate,
  criteria: Omit<ScreeningCriteria, "weights">
): string[] => {
  const advantages: string[] = [];
  const { minDays, maxDays } = criteria.optimalThetaWindow;

  if (winner.thetaEfficiency > NOTABLE_THRESHOLDS.thetaEfficiency) {
    advantages.push(
      `Theta efficiency ${winner.thetaEfficiency.toFixed(1)}/100 maximizes time-decay capture.`
    );
  }
  if (winner.gammaRisk > NOTABLE_THRESHOLDS.gammaRisk) {
    advantages.push(`Gamma risk control ${winner.gammaRisk.toFixed(1)}/100 keeps delta stable.`);
  }
  if (winner.liquidityScore > NOTABLE_THRESHOLDS.liquidity) {
    advantages.push(
      `Liquidity ${winner.liquidityScore.toFixed(1)}/100 with active ${winner.expirationType} contracts.`
    );
  }
  if (inWindow(winner.daysToExpiry, criteria)) {
    advantages.push(`${winner.daysToExpiry} days sits inside the ${minDays}-${maxDays} day optimal window.`);
  }

  return advantages;
};

export const buildMethodology = (criteria: ScreeningCriteria): ScoringMethodology => {
  const { weights } = criteria;
  const { minDays, maxDays } = criteria.optimalThetaWindow;
  const composite = `Weighted sum: theta ${formatPct(weights.thetaEfficiency)} + gamma ${formatPct(
    weights.gammaRisk
  )} + liquidity ${formatPct(weights.liquidity)} + event buffer ${formatPct(weights.eventBuffer)}.`;

  const methodology = {
    thetaEfficiency: `Time decay accrues most favorably to a short option seller between ${minDays} and ${maxDays} days; shorter tenors carry more risk and longer ones tie up capital.`,
    gammaRisk: `Gamma accelerates inside ${criteria.highGammaRiskDays} days, making delta unstable; longer tenors score higher, less so when volatility is elevated.`,
    liquidity: `Monthly and weekly expirations trade most actively; very short and very long tenors are penalized. Efficiency falls off past ${criteria.maxEfficientDays} days.`,
    eventBuffer: "Expirations that settle before the next earnings report score highest; expiring into the report scores lowest.",
    composite
  };

  return {
    ...methodology,
    summary: [
      methodology.thetaEfficiency,
      methodology.gammaRisk,
      methodology.liquidity,
      methodology.eventBuffer,
      methodology.composite
    ].join(" ")
  };
};

export const describeMethodology = (
  weights: WeightConfiguration,
  criteria: Partial<Omit<ScreeningCriteria, "weights">> = {}
) => buildMethodology({ ...DEFAULT_SCREENING_CRITERIA, ...criteria, weights }).summary;

export const buildOptimizationProcess = (input: ProcessInput): OptimizationProcess => {
  const criteria: ScreeningCriteria = {
    ...DEFAULT_SCREENING_CRITERIA,
    ...(input.criteria ?? {}),
    weights: { ...input.weights }
  };
  const [winner] = input.ranked;
  if (!winner) {
    throw new Error("Cannot build an optimization process without ranked candidates.");
  }

  const selection: SelectionDetails = {
    date: winner.date,
    days: winner.daysToExpiry,
    type: winner.expirationType,
    compositeScore: round2(winner.compositeScore),
    selectionReason: winner.selectionReason,
    advantages: buildAdvantages(winner, criteria)
  };

  return {
    symbol: input.symbol,
    strategy: input.strategy,
    generatedAt: input.generatedAt.toISOString(),
    totalCandidates: input.ranked.length,
    droppedCandidates: input.dropped,
    screeningCriteria: criteria,
    evaluations: buildEvaluationRows(input.ranked),
    rejections: buildRejections(input.ranked, criteria),
    selection,
    methodology: buildMethodology(criteria),
    marketProfile: input.marketProfile
  };
};
