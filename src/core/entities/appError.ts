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
  | "validation_error"
  | "dimension_mismatch"
  | "storage_error";

export type AppBoundarySource =
  | "news"
  | "quote"
  | "llm"
  | "embedding"
  | "insights"
  | "history";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: AppBoundarySource;
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Builds the configuration failure every client reports before touching the network.
 */
export const missingCredentialError = (
  source: AppBoundarySource,
  provider: string,
  variable: string,
): AppBoundaryError => ({
  source,
  code: "config_invalid",
  provider,
  message: `${variable} environment variable is not set.`,
  retryable: false,
});
