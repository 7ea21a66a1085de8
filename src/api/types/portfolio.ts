/**
 * Portfolio types. Amounts are in cents.
 */

/**
 * Response for GET /portfolio/balance.
 */
export interface BalanceResponse {
  balance: number;
}

/**
 * Position in a single market.
 */
export interface MarketPosition {
  ticker: string;
  /** Positive for yes contracts, negative for no */
  position: number;
  market_exposure: number;
  realized_pnl: number;
  total_traded: number;
  resting_orders_count: number;
  fees_paid: number;
}

/**
 * Aggregate position across an event.
 */
export interface EventPosition {
  event_ticker: string;
  event_exposure: number;
  realized_pnl: number;
  total_cost: number;
  fees_paid: number;
}

/**
 * Query parameters for GET /portfolio/positions.
 */
export interface PositionsParams {
  cursor?: string;
  limit?: number;
  count_filter?: string;
  settlement_status?: "all" | "settled" | "unsettled";
  ticker?: string;
  event_ticker?: string;
}

/**
 * Response for GET /portfolio/positions.
 */
export interface PositionsResponse {
  market_positions: MarketPosition[];
  event_positions: EventPosition[];
  cursor?: string;
}
