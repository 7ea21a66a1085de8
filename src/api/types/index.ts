/**
 * Re-export all API types.
 */

export type { ExchangeStatusResponse } from "./exchange";

export type {
  MarketStatus,
  Market,
  MarketResponse,
  MarketsParams,
  MarketsResponse,
  OrderbookLevel,
  OrderbookResponse,
} from "./market";

export type {
  OrderSide,
  OrderAction,
  OrderType,
  OrderStatus,
  CreateOrderRequest,
  Order,
  OrderResponse,
  OrdersParams,
  OrdersResponse,
  CancelOrderResponse,
  BatchOrderError,
  BatchCreateOrdersResponse,
  BatchCancelOrdersResponse,
} from "./order";

export type {
  BalanceResponse,
  MarketPosition,
  EventPosition,
  PositionsParams,
  PositionsResponse,
} from "./portfolio";
