/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "all_models_failed"
  | "source_not_found"
  | "cache_lookup_failed";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: "llm" | "cache" | "series" | "analysis";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Error side of a single sub-analysis; never aborts the surrounding extraction.
 */
export type AnalysisIssue = {
  code: "insufficient_data" | "source_not_found" | "computation_failed";
  message: string;
  required?: number;
  actual?: number;
};

export const insufficientData = (
  what: string,
  required: number,
  actual: number,
): AnalysisIssue => ({
  code: "insufficient_data",
  message: `${what} needs at least ${required} data points (got ${actual}).`,
  required,
  actual,
});

export const toErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
