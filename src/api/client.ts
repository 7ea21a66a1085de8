/**
 * REST API client for Kalshi.
 *
 * Endpoint methods are thin wrappers over {@link RequestPipeline.execute}.
 */

import { API_PATH_PREFIX } from "../shared/constants";
import { defaultLogger, type Logger } from "../shared/logger";
import { jitteredDelay, sleep } from "../shared/utils";
import { ApiError } from "./error";
import {
  RequestPipeline,
  type ExecuteOptions,
  type HttpMethod,
  type RequestPipelineConfig,
} from "./pipeline";
import { validateId, validateLimit, validateTicker } from "./validation";
import type {
  ExchangeStatusResponse,
  BalanceResponse,
  PositionsParams,
  PositionsResponse,
  MarketResponse,
  MarketsParams,
  MarketsResponse,
  OrderbookResponse,
  CreateOrderRequest,
  OrderResponse,
  OrdersParams,
  OrdersResponse,
  CancelOrderResponse,
  BatchCreateOrdersResponse,
  BatchCancelOrdersResponse,
} from "./types";

/**
 * Configuration for retry behavior. Applies to GET requests only.
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 0 = disabled) */
  maxRetries: number;
  /** Initial delay in milliseconds (default: 100) */
  baseDelayMs: number;
  /** Maximum delay cap in milliseconds (default: 10000) */
  maxDelayMs: number;
}

/** Default retry configuration (disabled) */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 0,
  baseDelayMs: 100,
  maxDelayMs: 10000,
};

/**
 * Configuration for the Kalshi API client.
 */
export interface KalshiApiClientConfig extends RequestPipelineConfig {
  /** Retry configuration for idempotent reads */
  retry?: Partial<RetryConfig>;
}

/**
 * Check if error is retryable.
 */
export function isRetryable(error: unknown): boolean {
  if (!(error instanceof ApiError)) return false;
  if (error.variant === "Transport") return true;
  if (error.variant === "RateLimited") return true;
  if (error.variant === "ServerError") return true;
  return false;
}

/**
 * REST API client for the Kalshi exchange.
 *
 * @example
 * ```typescript
 * import { api, createCredential } from "kalshi-core-client";
 *
 * const client = new api.KalshiApiClient({
 *   credential: createCredential(keyId, pem),
 *   environment: "demo",
 * });
 *
 * const { balance } = await client.getBalance();
 * ```
 */
export class KalshiApiClient {
  readonly pipeline: RequestPipeline;
  private readonly retryConfig: RetryConfig;
  private readonly logger: Logger;

  constructor(config: KalshiApiClientConfig) {
    this.pipeline = new RequestPipeline(config);
    this.retryConfig = {
      ...DEFAULT_RETRY_CONFIG,
      ...config.retry,
    };
    this.logger = config.logger ?? defaultLogger;
  }

  // ============================================================================
  // PRIVATE HELPERS
  // ============================================================================

  /**
   * Send a request. Only GETs are retried; state-changing verbs fail on the
   * first error.
   */
  private async request<T>(
    method: HttpMethod,
    path: string,
    options: ExecuteOptions<T> = {}
  ): Promise<T> {
    const fullPath = `${API_PATH_PREFIX}${path}`;
    const maxRetries = method === "GET" ? this.retryConfig.maxRetries : 0;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.pipeline.execute<T>(method, fullPath, options);
      } catch (error) {
        if (!isRetryable(error) || attempt >= maxRetries) {
          throw error;
        }
        const delay = jitteredDelay(
          attempt + 1,
          this.retryConfig.baseDelayMs,
          this.retryConfig.maxDelayMs
        );
        this.logger.warn(
          `GET ${fullPath} failed (${error instanceof Error ? error.message : String(error)}), retrying in ${Math.round(delay)}ms`
        );
        await sleep(delay);
      }
    }
  }

  // ============================================================================
  // EXCHANGE
  // ============================================================================

  /**
   * Get exchange and trading status.
   */
  async getExchangeStatus(): Promise<ExchangeStatusResponse> {
    return this.request<ExchangeStatusResponse>("GET", "/exchange/status");
  }

  // ============================================================================
  // PORTFOLIO
  // ============================================================================

  /**
   * Get the account balance in cents.
   */
  async getBalance(): Promise<BalanceResponse> {
    return this.request<BalanceResponse>("GET", "/portfolio/balance");
  }

  /**
   * Get market and event positions.
   *
   * @throws {ApiError} If limit is out of bounds (1-1000)
   */
  async getPositions(params: PositionsParams = {}): Promise<PositionsResponse> {
    validateLimit(params.limit);
    return this.request<PositionsResponse>("GET", "/portfolio/positions", {
      query: params,
    });
  }

  // ============================================================================
  // MARKETS
  // ============================================================================

  /**
   * Get markets, optionally filtered.
   *
   * @throws {ApiError} If limit is out of bounds (1-1000)
   */
  async getMarkets(params: MarketsParams = {}): Promise<MarketsResponse> {
    validateLimit(params.limit);
    return this.request<MarketsResponse>("GET", "/markets", { query: params });
  }

  /**
   * Get a market by ticker.
   */
  async getMarket(ticker: string): Promise<MarketResponse> {
    validateTicker(ticker, "ticker");
    return this.request<MarketResponse>("GET", `/markets/${encodeURIComponent(ticker)}`);
  }

  /**
   * Get the orderbook of a market.
   *
   * @param depth - Number of levels per side (all levels when omitted)
   */
  async getMarketOrderbook(ticker: string, depth?: number): Promise<OrderbookResponse> {
    validateTicker(ticker, "ticker");
    return this.request<OrderbookResponse>(
      "GET",
      `/markets/${encodeURIComponent(ticker)}/orderbook`,
      { query: { depth } }
    );
  }

  // ============================================================================
  // ORDERS
  // ============================================================================

  /**
   * List orders.
   *
   * @throws {ApiError} If limit is out of bounds (1-1000)
   */
  async getOrders(params: OrdersParams = {}): Promise<OrdersResponse> {
    validateLimit(params.limit);
    return this.request<OrdersResponse>("GET", "/portfolio/orders", { query: params });
  }

  /**
   * Get a single order.
   */
  async getOrder(orderId: string): Promise<OrderResponse> {
    validateId(orderId, "orderId");
    return this.request<OrderResponse>(
      "GET",
      `/portfolio/orders/${encodeURIComponent(orderId)}`
    );
  }

  /**
   * Submit an order. Never retried.
   */
  async createOrder(request: CreateOrderRequest): Promise<OrderResponse> {
    validateTicker(request.ticker, "ticker");
    return this.request<OrderResponse>("POST", "/portfolio/orders", { body: request });
  }

  /**
   * Cancel an order. Never retried.
   */
  async cancelOrder(orderId: string): Promise<CancelOrderResponse> {
    validateId(orderId, "orderId");
    return this.request<CancelOrderResponse>(
      "DELETE",
      `/portfolio/orders/${encodeURIComponent(orderId)}`
    );
  }

  /**
   * Submit several orders in one request.
   */
  async createBatchedOrders(orders: CreateOrderRequest[]): Promise<BatchCreateOrdersResponse> {
    if (orders.length === 0) {
      throw ApiError.invalidParameter("orders cannot be empty");
    }
    for (const order of orders) {
      validateTicker(order.ticker, "ticker");
    }
    return this.request<BatchCreateOrdersResponse>("POST", "/portfolio/orders/batched", {
      body: { orders },
    });
  }

  /**
   * Cancel several orders in one request (DELETE with a JSON body).
   */
  async cancelBatchedOrders(ids: string[]): Promise<BatchCancelOrdersResponse> {
    if (ids.length === 0) {
      throw ApiError.invalidParameter("ids cannot be empty");
    }
    for (const id of ids) {
      validateId(id, "orderId");
    }
    return this.request<BatchCancelOrdersResponse>("DELETE", "/portfolio/orders/batched", {
      body: { ids },
    });
  }
}
