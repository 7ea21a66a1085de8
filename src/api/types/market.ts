/**
 * Market types.
 */

/**
 * Market status values.
 */
export type MarketStatus =
  | "initialized"
  | "active"
  | "inactive"
  | "closed"
  | "determined"
  | "settled"
  | "finalized";

/**
 * A single binary market. Prices are in cents.
 */
export interface Market {
  ticker: string;
  event_ticker: string;
  title?: string;
  status: MarketStatus;
  yes_bid: number;
  yes_ask: number;
  no_bid: number;
  no_ask: number;
  last_price: number;
  volume: number;
  open_interest: number;
  /** RFC 3339 */
  close_time: string;
  result?: string;
}

/**
 * Response for GET /markets/{ticker}.
 */
export interface MarketResponse {
  market: Market;
}

/**
 * Query parameters for GET /markets.
 */
export interface MarketsParams {
  event_ticker?: string;
  series_ticker?: string;
  status?: string;
  tickers?: string;
  min_close_ts?: number;
  max_close_ts?: number;
  limit?: number;
  cursor?: string;
}

/**
 * Response for GET /markets.
 */
export interface MarketsResponse {
  markets: Market[];
  cursor?: string;
}

/**
 * Price level: [price in cents, quantity].
 */
export type OrderbookLevel = [number, number];

/**
 * Response for GET /markets/{ticker}/orderbook. A side is null when empty.
 */
export interface OrderbookResponse {
  orderbook: {
    yes: OrderbookLevel[] | null;
    no: OrderbookLevel[] | null;
  };
}
