/**
 * Streaming client module for Kalshi.
 *
 * One long-lived, signed WebSocket connection multiplexing any number of
 * channel subscriptions. Subscriptions survive reconnects and are replayed
 * on every new socket.
 *
 * @example
 * ```typescript
 * import { websocket } from "kalshi-core-client";
 *
 * const client = new websocket.KalshiWebSocketClient({ credential });
 *
 * client.on((event) => {
 *   if (event.type === "Reconnecting") {
 *     console.log(`reconnect #${event.attempt} in ${event.delayMs}ms`);
 *   }
 * });
 * client.onError((error) => console.error(error.variant, error.message));
 *
 * await client.connect();
 * const id = client.subscribeOrderbook(["X"], (message) => console.log(message));
 * ```
 *
 * @module websocket
 */

// Client
export {
  KalshiWebSocketClient,
  DEFAULT_RECONNECT_CONFIG,
  TRANSITIONS,
  canTransition,
} from "./client";
export type {
  WebSocketConfig,
  ReconnectConfig,
  ConnectionState,
  EventCallback,
  ErrorCallback,
} from "./client";

// Transport
export { wsTransport } from "./transport";
export type { StreamSocket, StreamSocketHandlers, StreamTransport } from "./transport";

// Error types
export { WebSocketError } from "./error";
export type { WebSocketErrorVariant } from "./error";

// Types
export type {
  ChannelKind,
  SubscriptionRequest,
  SubscribeCommand,
  UnsubscribeCommand,
  WsCommand,
  ContractSide,
  BookLevel,
  TickerPayload,
  TickerV2Payload,
  TradePayload,
  OrderbookSnapshotPayload,
  OrderbookDeltaPayload,
  FillPayload,
  MarketPositionPayload,
  MarketLifecyclePayload,
  TickerMessage,
  TickerV2Message,
  TradeMessage,
  OrderbookSnapshotMessage,
  OrderbookDeltaMessage,
  FillMessage,
  MarketPositionMessage,
  MarketLifecycleMessage,
  DataMessage,
  SubscribedMessage,
  UnsubscribedMessage,
  OkMessage,
  ErrorMessage,
  ControlMessage,
  ServerMessage,
  StreamEvent,
} from "./types";

export {
  CHANNEL_KINDS,
  isChannelKind,
  createSubscribeCommand,
  createUnsubscribeCommand,
  channelOf,
  isDataMessage,
  parseServerMessage,
} from "./types";

// Subscription management
export { SubscriptionRegistry, intentToCommand, validateSubscription } from "./subscriptions";
export type { SubscriptionIntent } from "./subscriptions";

// Message routing
export { MessageRouter } from "./handlers";
export type { SubscriberCallback, RouteTarget, RouteOutcome } from "./handlers";
