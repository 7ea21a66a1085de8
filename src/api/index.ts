/**
 * REST API module for Kalshi.
 *
 * Exposes the signed, rate-limited request pipeline and a thin client of
 * endpoint wrappers built on it.
 *
 * @example
 * ```typescript
 * import { api, createCredential } from "kalshi-core-client";
 *
 * const pipeline = new api.RequestPipeline({ credential });
 * const status = await pipeline.execute("GET", "/trade-api/v2/exchange/status");
 * ```
 *
 * @module api
 */

// Client
export {
  KalshiApiClient,
  DEFAULT_RETRY_CONFIG,
  isRetryable,
} from "./client";
export type { KalshiApiClientConfig, RetryConfig } from "./client";

// Pipeline
export { RequestPipeline } from "./pipeline";
export type { ExecuteOptions, HttpMethod, RequestPipelineConfig } from "./pipeline";

// Error types
export { ApiError, describeBody } from "./error";
export type { ApiErrorVariant, ErrorResponse } from "./error";

// Validation utilities
export {
  validatePath,
  validateTicker,
  validateId,
  validateLimit,
  MAX_PAGINATION_LIMIT,
} from "./validation";

// All types
export * from "./types";
