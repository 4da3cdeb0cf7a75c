import { loadOptimizerConfig } from "@/src/lib/config";
import { OptimizationError } from "@/src/lib/errors";
import { buildOptimizationProcess } from "@/src/lib/explain/process";
import {
  evaluateExpiration,
  resolveAdjustments,
  type EvaluationContext
} from "@/src/lib/expiry/evaluator";
import { normalizeCandidates } from "@/src/lib/expiry/normalize";
import { logger as rootLogger, type Logger } from "@/src/lib/logger";
import { withProfileCache } from "@/src/lib/profile/cached";
import {
  bundledProfileProvider,
  resolveMarketProfile,
  type StockMarketProfileProvider
} from "@/src/lib/profile/provider";
import { describeAdjustments } from "@/src/lib/scoring/adjustments";
import { DEFAULT_SCORING_CURVES, type ScoringCurveConfig } from "@/src/lib/scoring/curves";
import { normalizeWeights, weightsForStrategy } from "@/src/lib/scoring/weights";
import type {
  DroppedCandidate,
  ExpirationCandidate,
  MarketProfileAnalysis,
  OptimizationProcess,
  RawExpiration,
  StrategyType,
  WeightConfiguration
} from "@/src/lib/types";

export type ExpirationOptimizerOptions = {
  weights?: Partial<WeightConfiguration>;
  profileProvider?: StockMarketProfileProvider;
  profileCacheTtlMs?: number;
  curves?: ScoringCurveConfig;
  logger?: Logger;
  defaultVolatility?: number;
  maxCandidates?: number;
  weightTolerance?: number;
};

export type FindOptimalOptions = {
  symbol?: string | null;
  volatility?: number;
  strategy?: StrategyType;
  includeProcess?: boolean;
  weights?: Partial<WeightConfiguration>;
  now?: Date;
};

export type OptimizationOutcome = {
  winner: ExpirationCandidate;
  candidates: ExpirationCandidate[];
  dropped: DroppedCandidate[];
  weights: WeightConfiguration;
  process: OptimizationProcess | null;
};

export const DEFAULT_STRATEGY: StrategyType = "CSP";

export const normalizeSymbol = (symbol: string | null | undefined) => symbol?.trim().toUpperCase() || null;

const isUsableVolatility = (value: number | undefined): value is number =>
  value !== undefined && Number.isFinite(value) && value > 0;

// Array.prototype.sort is stable, so equal scores keep their input order.
export const rankCandidates = (candidates: ExpirationCandidate[]) =>
  [...candidates].sort((a, b) => b.compositeScore - a.compositeScore);

export class ExpirationOptimizer {
  private readonly explicitWeights: WeightConfiguration | null;
  private readonly profileProvider: StockMarketProfileProvider;
  private readonly curves: ScoringCurveConfig;
  private readonly log: Logger;
  readonly defaultVolatility: number;
  private readonly maxCandidates: number;
  private readonly weightTolerance: number;

  constructor(options: ExpirationOptimizerOptions = {}) {
    const config = loadOptimizerConfig();
    this.log = options.logger ?? rootLogger.child({ component: "expiry-optimizer" });
    // Only external providers are cached; the bundled table is already in memory.
    this.profileProvider = options.profileProvider
      ? withProfileCache(options.profileProvider, options.profileCacheTtlMs ?? config.profileCacheTtlMs)
      : bundledProfileProvider;
    this.curves = options.curves ?? DEFAULT_SCORING_CURVES;
    this.defaultVolatility = isUsableVolatility(options.defaultVolatility)
      ? options.defaultVolatility
      : config.defaultVolatility;
    this.maxCandidates = options.maxCandidates ?? config.maxCandidates;
    this.weightTolerance = options.weightTolerance ?? config.weightTolerance;
    this.explicitWeights = options.weights ? this.normalize(options.weights) : null;
  }

  private normalize(raw: Partial<WeightConfiguration>) {
    const result = normalizeWeights(raw, this.weightTolerance);
    result.warnings.forEach((warning) =>
      this.log.warn({ originalSum: result.originalSum, weights: result.weights }, warning)
    );
    return result.weights;
  }

  /**
   * Weight precedence: per-call weights, then weights given to the constructor, then the
   * preset for the strategy.
   */
  resolveWeights(strategy: StrategyType = DEFAULT_STRATEGY, override?: Partial<WeightConfiguration>) {
    if (override) return this.normalize(override);
    if (this.explicitWeights) return { ...this.explicitWeights };
    return weightsForStrategy(strategy);
  }

  private resolveVolatility(volatility: number | undefined, symbol: string | null) {
    if (volatility === undefined) return this.defaultVolatility;
    if (isUsableVolatility(volatility)) return volatility;
    this.log.warn(
      { symbol, volatility: String(volatility) },
      `Volatility ${volatility} is not a positive finite number; using ${this.defaultVolatility}.`
    );
    return this.defaultVolatility;
  }

  evaluationContext(weights: WeightConfiguration, now: Date): EvaluationContext {
    return {
      weights,
      profileProvider: this.profileProvider,
      curves: this.curves,
      now
    };
  }

  private analyzeProfile(symbol: string | null): MarketProfileAnalysis | null {
    const resolved = resolveMarketProfile(this.profileProvider, symbol);
    if (!resolved.symbol) return null;
    this.log.debug({ symbol: resolved.symbol, source: resolved.source }, "Resolved market profile");

    const adjustments = resolveAdjustments(resolved);
    return {
      profile: resolved.profile,
      adjustments,
      reasoning: resolved.source === "provider" ? describeAdjustments(resolved.profile, adjustments) : []
    };
  }

  findOptimal(candidates: RawExpiration[], options: FindOptimalOptions = {}): OptimizationOutcome {
    if (candidates.length > this.maxCandidates) {
      throw new OptimizationError(
        "CANDIDATE_LIMIT_EXCEEDED",
        `Received ${candidates.length} candidates; the limit is ${this.maxCandidates}.`
      );
    }

    const now = options.now ?? new Date();
    const strategy = options.strategy ?? DEFAULT_STRATEGY;
    const symbol = normalizeSymbol(options.symbol);
    const volatility = this.resolveVolatility(options.volatility, symbol);
    const weights = this.resolveWeights(strategy, options.weights);

    const { candidates: normalized, dropped } = normalizeCandidates(candidates, now);
    dropped.forEach((entry) =>
      this.log.warn({ symbol, code: entry.code, input: entry.input }, `Skipping candidate: ${entry.message}`)
    );

    if (normalized.length === 0) {
      const detail = candidates.length === 0 ? "no candidates supplied" : "every candidate was invalid";
      throw new OptimizationError(
        "EMPTY_CANDIDATE_SET",
        `No expiration candidates to evaluate${symbol ? ` for ${symbol}` : ""}: ${detail}.`
      );
    }

    const context = this.evaluationContext(weights, now);
    const evaluated = normalized.map((candidate) =>
      evaluateExpiration({ ...candidate, volatility, symbol }, context)
    );
    const ranked = rankCandidates(evaluated);
    const [winner] = ranked;

    this.log.info(
      {
        symbol,
        strategy,
        date: winner.date,
        days: winner.daysToExpiry,
        score: Number(winner.compositeScore.toFixed(2))
      },
      `Optimal expiration ${winner.date}: ${winner.selectionReason}`
    );

    const process = options.includeProcess
      ? buildOptimizationProcess({
          ranked,
          symbol,
          strategy,
          weights,
          generatedAt: now,
          dropped,
          marketProfile: this.analyzeProfile(symbol),
          criteria: this.curves.screening
        })
      : null;

    return { winner, candidates: ranked, dropped, weights, process };
  }
}
