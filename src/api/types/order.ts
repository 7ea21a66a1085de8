/**
 * Order types.
 */

export type OrderSide = "yes" | "no";
export type OrderAction = "buy" | "sell";
export type OrderType = "limit" | "market";
export type OrderStatus = "resting" | "canceled" | "executed" | "pending";

/**
 * Request for POST /portfolio/orders.
 *
 * Exactly one of `yes_price` / `no_price` is expected for limit orders.
 */
export interface CreateOrderRequest {
  ticker: string;
  client_order_id: string;
  side: OrderSide;
  action: OrderAction;
  count: number;
  type: OrderType;
  /** Cents */
  yes_price?: number;
  /** Cents */
  no_price?: number;
  /** Unix seconds; omitted means good-till-cancelled */
  expiration_ts?: number;
  /** Cents, market buys only */
  buy_max_cost?: number;
  post_only?: boolean;
  sell_position_floor?: number;
}

/**
 * An order as returned by the exchange.
 */
export interface Order {
  order_id: string;
  client_order_id?: string;
  user_id?: string;
  ticker: string;
  status: OrderStatus;
  side: OrderSide;
  action: OrderAction;
  type: OrderType;
  yes_price: number;
  no_price: number;
  remaining_count?: number;
  /** RFC 3339 */
  created_time?: string;
  expiration_time?: string | null;
}

/**
 * Response for order creation and lookup.
 */
export interface OrderResponse {
  order: Order;
}

/**
 * Query parameters for GET /portfolio/orders.
 */
export interface OrdersParams {
  ticker?: string;
  event_ticker?: string;
  min_ts?: number;
  max_ts?: number;
  status?: OrderStatus;
  limit?: number;
  cursor?: string;
}

/**
 * Response for GET /portfolio/orders.
 */
export interface OrdersResponse {
  orders: Order[];
  cursor?: string;
}

/**
 * Response for DELETE /portfolio/orders/{order_id}.
 */
export interface CancelOrderResponse {
  order: Order;
  reduced_by: number;
}

/**
 * Per-order error inside a batch response.
 */
export interface BatchOrderError {
  code: string;
  message: string;
}

/**
 * Response for POST /portfolio/orders/batched.
 */
export interface BatchCreateOrdersResponse {
  orders: Array<{
    order?: Order;
    error?: BatchOrderError;
  }>;
}

/**
 * Response for DELETE /portfolio/orders/batched.
 */
export interface BatchCancelOrdersResponse {
  orders: Array<{
    order_id: string;
    order?: Order;
    reduced_by?: number;
    error?: BatchOrderError;
  }>;
}
