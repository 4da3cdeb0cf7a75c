export type { StrategyType, StrategyFamily } from "./strategy";
export type {
  DroppedCandidate,
  DroppedCandidateCode,
  EvaluationInput,
  ExpirationCandidate,
  ExpirationDescriptor,
  ExpirationType,
  RawExpiration
} from "./expiry";
export type {
  AdjustmentFactors,
  ProfileSource,
  ResolvedMarketProfile,
  StockMarketProfile
} from "./profile";
export type {
  CurvePoint,
  NormalizedWeights,
  PiecewiseCurve,
  WeightConfiguration,
  WeightKey
} from "./scoring";
export type {
  CandidateEvaluationRow,
  DayWindow,
  MarketProfileAnalysis,
  OptimizationProcess,
  RejectionAnalysis,
  ScoringMethodology,
  ScreeningCriteria,
  SelectionDetails
} from "./explain";
