// DEFAULT covers any strategy without a dedicated preset.
export type StrategyType = "CSP" | "PCS" | "CCS" | "CC" | "DEFAULT";

export type StrategyFamily = "CASH_SECURED_PUT" | "COVERED_CALL" | "CREDIT_SPREAD" | "DEFAULT";
