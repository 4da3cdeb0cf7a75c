import { toFailureDetail, type FailureDetail } from "@/src/lib/errors";
import { logger } from "@/src/lib/logger";
import { normalizeSymbol, type ExpirationOptimizer } from "@/src/lib/expiry/optimizer";
import type {
  ExpirationCandidate,
  RawExpiration,
  StrategyType,
  WeightConfiguration
} from "@/src/lib/types";

export type BatchEntry =
  | { success: true; winner: ExpirationCandidate }
  | { success: false; error: FailureDetail };

export type BatchOptions = {
  strategy?: StrategyType;
  weights?: Partial<WeightConfiguration>;
  now?: Date;
};

const batchLogger = logger.child({ component: "expiry-batch" });

export const batchOptimize = (
  optimizer: ExpirationOptimizer,
  candidatesBySymbol: Record<string, RawExpiration[]>,
  volatilities: Record<string, number> = {},
  options: BatchOptions = {}
): Record<string, BatchEntry> => {
  const now = options.now ?? new Date();
  const results: Record<string, BatchEntry> = {};
  // keys match however the symbol is cased or padded, as findOptimal normalizes it
  const volatilityBySymbol = new Map(
    Object.entries(volatilities).map(([symbol, volatility]) => [normalizeSymbol(symbol), volatility])
  );

  Object.entries(candidatesBySymbol).forEach(([symbol, candidates]) => {
    try {
      const { winner } = optimizer.findOptimal(candidates, {
        symbol,
        volatility: volatilityBySymbol.get(normalizeSymbol(symbol)) ?? optimizer.defaultVolatility,
        strategy: options.strategy,
        weights: options.weights,
        includeProcess: false,
        now
      });
      results[symbol] = { success: true, winner };
    } catch (error) {
      const detail = toFailureDetail(error);
      batchLogger.warn({ symbol, code: detail.code }, detail.message);
      results[symbol] = { success: false, error: detail };
    }
  });

  return results;
};
