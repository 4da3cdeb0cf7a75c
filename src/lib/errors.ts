export type OptimizationErrorCode = "EMPTY_CANDIDATE_SET" | "CANDIDATE_LIMIT_EXCEEDED";

export class OptimizationError extends Error {
  readonly code: OptimizationErrorCode;

  constructor(code: OptimizationErrorCode, message: string) {
    super(message);
    this.name = "OptimizationError";
    this.code = code;
  }
}

export type FailureDetail = {
  code: OptimizationErrorCode | "INVALID_REQUEST" | "INTERNAL_ERROR";
  message: string;
};

export const isOptimizationError = (error: unknown): error is OptimizationError =>
  error instanceof OptimizationError;

export const toFailureDetail = (error: unknown): FailureDetail => {
  if (isOptimizationError(error)) {
    return { code: error.code, message: error.message };
  }
  return {
    code: "INTERNAL_ERROR",
    message: error instanceof Error ? error.message : "Unexpected optimization failure."
  };
};
