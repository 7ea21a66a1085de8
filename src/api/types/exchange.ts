/**
 * Exchange-level types.
 */

/**
 * Response for GET /exchange/status.
 */
export interface ExchangeStatusResponse {
  exchange_active: boolean;
  trading_active: boolean;
  /** Estimated resume time when the exchange is inactive (RFC 3339) */
  exchange_estimated_resume_time?: string;
}
