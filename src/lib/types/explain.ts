import type {
  AdjustmentFactors,
  DroppedCandidate,
  ExpirationType,
  StockMarketProfile,
  StrategyType,
  WeightConfiguration
} from "@/src/lib/types";

export type DayWindow = {
  minDays: number;
  maxDays: number;
};

export type ScreeningCriteria = {
  weights: WeightConfiguration;
  optimalThetaWindow: DayWindow;
  highGammaRiskDays: number;
  maxEfficientDays: number;
};

export type CandidateEvaluationRow = {
  rank: number;
  date: string;
  days: number;
  type: ExpirationType;
  thetaEfficiency: number;
  gammaRisk: number;
  liquidity: number;
  eventBuffer: number;
  compositeScore: number;
  isWinner: boolean;
};

export type RejectionAnalysis = {
  date: string;
  days: number;
  compositeScore: number;
  reason: string;
};

export type SelectionDetails = {
  date: string;
  days: number;
  type: ExpirationType;
  compositeScore: number;
  selectionReason: string;
  advantages: string[];
};

export type ScoringMethodology = {
  thetaEfficiency: string;
  gammaRisk: string;
  liquidity: string;
  eventBuffer: string;
  composite: string;
  summary: string;
};

export type MarketProfileAnalysis = {
  profile: StockMarketProfile;
  adjustments: AdjustmentFactors;
  reasoning: string[];
};

export type OptimizationProcess = {
  symbol: string | null;
  strategy: StrategyType;
  generatedAt: string;
  totalCandidates: number;
  droppedCandidates: DroppedCandidate[];
  screeningCriteria: ScreeningCriteria;
  evaluations: CandidateEvaluationRow[];
  rejections: RejectionAnalysis[];
  selection: SelectionDetails;
  methodology: ScoringMethodology;
  marketProfile: MarketProfileAnalysis | null;
};
