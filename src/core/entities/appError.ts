/**
 * Distinguishes the three recoverable outcomes a chart request has to handle per symbol.
 */
export type AppBoundaryErrorCode = "not_found" | "no_data" | "no_peers";

/**
 * Narrows why a boundary call produced no usable value so diagnostics stay specific.
 */
export type AppBoundaryFailureReason =
  | "unknown_symbol"
  | "unknown_industry"
  | "config_invalid"
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "provider_error"
  | "transport_error"
  | "invalid_json"
  | "malformed_response"
  | "missing_taxonomy"
  | "missing_metric"
  | "empty_series";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: "identifiers" | "industries" | "filings" | "peers";
  code: AppBoundaryErrorCode;
  reason: AppBoundaryFailureReason;
  provider: string;
  message: string;
  symbol?: string;
  metricName?: string;
  httpStatus?: number;
  cause?: unknown;
};
