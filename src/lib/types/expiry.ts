export type ExpirationType = "weekly" | "monthly" | "quarterly" | "eow" | "eom" | "eoq" | "other";

export type ExpirationDescriptor = {
  date?: string;
  days?: number;
  type?: string;
  daysToNextEarnings?: number | null;
  volume?: number | null;
  openInterest?: number | null;
};

export type RawExpiration = string | ExpirationDescriptor;

export type EvaluationInput = {
  days: number;
  expirationType: ExpirationType;
  date?: string;
  volatility?: number;
  daysToNextEarnings?: number | null;
  symbol?: string | null;
  volume?: number | null;
  openInterest?: number | null;
};

export type ExpirationCandidate = {
  date: string;
  daysToExpiry: number;
  expirationType: ExpirationType;
  thetaEfficiency: number;
  gammaRisk: number;
  liquidityScore: number;
  eventBufferScore: number;
  compositeScore: number;
  selectionReason: string;
};

export type DroppedCandidateCode =
  | "INVALID_DATE_FORMAT"
  | "INVALID_DAYS"
  | "EXPIRED"
  | "MISSING_EXPIRATION";

export type DroppedCandidate = {
  input: RawExpiration;
  code: DroppedCandidateCode;
  message: string;
};
