/**
 * Message types for the Kalshi streaming protocol.
 *
 * Commands are `{ id, cmd, params }`. Server frames are
 * `{ type, id?, sid?, seq?, msg }`; `id` echoes a command id, `sid` is the
 * server's id for one channel subscription.
 */

import type { ConnectionState } from "./client";
import { WebSocketError } from "./error";

// ============================================================================
// CHANNELS
// ============================================================================

/**
 * Channel kinds a subscription can name.
 */
export type ChannelKind =
  | "ticker"
  | "ticker_v2"
  | "trade"
  | "orderbook_delta"
  | "fill"
  | "market_positions"
  | "market_lifecycle_v2";

export const CHANNEL_KINDS: readonly ChannelKind[] = [
  "ticker",
  "ticker_v2",
  "trade",
  "orderbook_delta",
  "fill",
  "market_positions",
  "market_lifecycle_v2",
];

export function isChannelKind(value: string): value is ChannelKind {
  return (CHANNEL_KINDS as readonly string[]).includes(value);
}

/**
 * What a caller asks to subscribe to.
 */
export interface SubscriptionRequest {
  channels: ChannelKind[];
  /** Restrict to these markets; all markets when omitted */
  marketTickers?: string[];
}

// ============================================================================
// REQUEST TYPES (Client → Server)
// ============================================================================

export interface SubscribeCommand {
  id: number;
  cmd: "subscribe";
  params: {
    channels: ChannelKind[];
    market_tickers?: string[];
  };
}

export interface UnsubscribeCommand {
  id: number;
  cmd: "unsubscribe";
  params: {
    sids: number[];
  };
}

export type WsCommand = SubscribeCommand | UnsubscribeCommand;

/**
 * Create a subscribe command.
 */
export function createSubscribeCommand(
  id: number,
  request: SubscriptionRequest
): SubscribeCommand {
  const params: SubscribeCommand["params"] = { channels: [...request.channels] };
  if (request.marketTickers && request.marketTickers.length > 0) {
    params.market_tickers = [...request.marketTickers];
  }
  return { id, cmd: "subscribe", params };
}

/**
 * Create an unsubscribe command.
 */
export function createUnsubscribeCommand(id: number, sids: number[]): UnsubscribeCommand {
  return { id, cmd: "unsubscribe", params: { sids: [...sids] } };
}

// ============================================================================
// PAYLOAD TYPES (Server → Client)
// ============================================================================

export type ContractSide = "yes" | "no";

export interface TickerPayload {
  market_ticker: string;
  /** Last traded price, cents */
  price: number;
  yes_bid: number;
  yes_ask: number;
  volume: number;
  open_interest: number;
  /** Unix seconds */
  ts: number;
}

export interface TickerV2Payload {
  market_ticker: string;
  price?: number;
  yes_bid?: number;
  yes_ask?: number;
  volume_delta?: number;
  open_interest_delta?: number;
  ts: number;
}

export interface TradePayload {
  market_ticker: string;
  trade_id?: string;
  yes_price: number;
  no_price: number;
  count: number;
  taker_side: ContractSide;
  ts: number;
}

/**
 * Price level: [price in cents, quantity].
 */
export type BookLevel = [number, number];

export interface OrderbookSnapshotPayload {
  market_ticker: string;
  yes: BookLevel[];
  no: BookLevel[];
}

export interface OrderbookDeltaPayload {
  market_ticker: string;
  price: number;
  delta: number;
  side: ContractSide;
}

export interface FillPayload {
  trade_id: string;
  order_id: string;
  market_ticker: string;
  is_taker: boolean;
  side: ContractSide;
  action: "buy" | "sell";
  yes_price: number;
  no_price: number;
  count: number;
  ts: number;
}

export interface MarketPositionPayload {
  market_ticker: string;
  position: number;
  position_cost?: number;
  realized_pnl?: number;
  fees_paid?: number;
  volume?: number;
}

export interface MarketLifecyclePayload {
  market_ticker: string;
  event_type: string;
  open_ts?: number;
  close_ts?: number;
  result?: string;
}

// ============================================================================
// SERVER MESSAGES
// ============================================================================

interface Envelope<T extends string, P> {
  type: T;
  id?: number;
  sid?: number;
  seq?: number;
  msg: P;
}

export type TickerMessage = Envelope<"ticker", TickerPayload>;
export type TickerV2Message = Envelope<"ticker_v2", TickerV2Payload>;
export type TradeMessage = Envelope<"trade", TradePayload>;
export type OrderbookSnapshotMessage = Envelope<"orderbook_snapshot", OrderbookSnapshotPayload>;
export type OrderbookDeltaMessage = Envelope<"orderbook_delta", OrderbookDeltaPayload>;
export type FillMessage = Envelope<"fill", FillPayload>;
export type MarketPositionMessage = Envelope<"market_position", MarketPositionPayload>;
export type MarketLifecycleMessage = Envelope<"market_lifecycle_v2", MarketLifecyclePayload>;

/**
 * Channel data frames.
 */
export type DataMessage =
  | TickerMessage
  | TickerV2Message
  | TradeMessage
  | OrderbookSnapshotMessage
  | OrderbookDeltaMessage
  | FillMessage
  | MarketPositionMessage
  | MarketLifecycleMessage;

export type SubscribedMessage = Envelope<"subscribed", { channel: string; sid: number }>;

export interface UnsubscribedMessage {
  type: "unsubscribed";
  id?: number;
  sid: number;
  seq?: number;
}

export interface OkMessage {
  type: "ok";
  id?: number;
  sids?: number[];
}

export type ErrorMessage = Envelope<"error", { code: number; msg: string }>;

export type ControlMessage = SubscribedMessage | UnsubscribedMessage | OkMessage | ErrorMessage;

export type ServerMessage = ControlMessage | DataMessage;

/**
 * Channel kind a data frame belongs to.
 */
export function channelOf(type: DataMessage["type"]): ChannelKind {
  switch (type) {
    case "orderbook_snapshot":
    case "orderbook_delta":
      return "orderbook_delta";
    case "market_position":
      return "market_positions";
    default:
      return type;
  }
}

export function isDataMessage(message: ServerMessage): message is DataMessage {
  switch (message.type) {
    case "subscribed":
    case "unsubscribed":
    case "ok":
    case "error":
      return false;
    default:
      return true;
  }
}

// ============================================================================
// CLIENT EVENTS
// ============================================================================

/**
 * Lifecycle events emitted by the streaming client.
 */
export type StreamEvent =
  | { type: "Connected" }
  | { type: "Disconnected"; reason: string }
  | { type: "Reconnecting"; attempt: number; delayMs: number }
  | { type: "StateChange"; from: ConnectionState; to: ConnectionState }
  | { type: "Closed" };

// ============================================================================
// PARSING
// ============================================================================

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(context: string, message: string): never {
  throw WebSocketError.messageParseError(`${context}: ${message}`);
}

function requireString(obj: Fields, key: string, context: string): string {
  const value = obj[key];
  if (typeof value !== "string") {
    fail(context, `"${key}" must be a string`);
  }
  return value;
}

function optionalString(obj: Fields, key: string, context: string): string | undefined {
  return obj[key] === undefined || obj[key] === null
    ? undefined
    : requireString(obj, key, context);
}

function requireNumber(obj: Fields, key: string, context: string): number {
  const value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    fail(context, `"${key}" must be a number`);
  }
  return value;
}

function optionalNumber(obj: Fields, key: string, context: string): number | undefined {
  return obj[key] === undefined || obj[key] === null
    ? undefined
    : requireNumber(obj, key, context);
}

function optionalInteger(obj: Fields, key: string, context: string): number | undefined {
  const value = optionalNumber(obj, key, context);
  if (value !== undefined && !Number.isInteger(value)) {
    fail(context, `"${key}" must be an integer`);
  }
  return value;
}

function requireBoolean(obj: Fields, key: string, context: string): boolean {
  const value = obj[key];
  if (typeof value !== "boolean") {
    fail(context, `"${key}" must be a boolean`);
  }
  return value;
}

function requireSide(obj: Fields, key: string, context: string): ContractSide {
  const value = requireString(obj, key, context);
  if (value !== "yes" && value !== "no") {
    fail(context, `"${key}" must be "yes" or "no"`);
  }
  return value;
}

function requireLevels(obj: Fields, key: string, context: string): BookLevel[] {
  const value = obj[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    fail(context, `"${key}" must be an array`);
  }
  return value.map((level: unknown): BookLevel => {
    if (
      !Array.isArray(level) ||
      level.length !== 2 ||
      typeof level[0] !== "number" ||
      typeof level[1] !== "number"
    ) {
      fail(context, `"${key}" levels must be [price, quantity] pairs`);
    }
    return [level[0], level[1]];
  });
}

function requireMsg(obj: Fields, context: string): Fields {
  const msg = obj.msg;
  if (!isRecord(msg)) {
    fail(context, `"msg" must be an object`);
  }
  return msg;
}

function parseTicker(msg: Fields): TickerPayload {
  const c = "ticker";
  return {
    market_ticker: requireString(msg, "market_ticker", c),
    price: requireNumber(msg, "price", c),
    yes_bid: requireNumber(msg, "yes_bid", c),
    yes_ask: requireNumber(msg, "yes_ask", c),
    volume: requireNumber(msg, "volume", c),
    open_interest: requireNumber(msg, "open_interest", c),
    ts: requireNumber(msg, "ts", c),
  };
}

function parseTickerV2(msg: Fields): TickerV2Payload {
  const c = "ticker_v2";
  return {
    market_ticker: requireString(msg, "market_ticker", c),
    price: optionalNumber(msg, "price", c),
    yes_bid: optionalNumber(msg, "yes_bid", c),
    yes_ask: optionalNumber(msg, "yes_ask", c),
    volume_delta: optionalNumber(msg, "volume_delta", c),
    open_interest_delta: optionalNumber(msg, "open_interest_delta", c),
    ts: requireNumber(msg, "ts", c),
  };
}

function parseTrade(msg: Fields): TradePayload {
  const c = "trade";
  return {
    market_ticker: requireString(msg, "market_ticker", c),
    trade_id: optionalString(msg, "trade_id", c),
    yes_price: requireNumber(msg, "yes_price", c),
    no_price: requireNumber(msg, "no_price", c),
    count: requireNumber(msg, "count", c),
    taker_side: requireSide(msg, "taker_side", c),
    ts: requireNumber(msg, "ts", c),
  };
}

function parseOrderbookSnapshot(msg: Fields): OrderbookSnapshotPayload {
  const c = "orderbook_snapshot";
  return {
    market_ticker: requireString(msg, "market_ticker", c),
    yes: requireLevels(msg, "yes", c),
    no: requireLevels(msg, "no", c),
  };
}

function parseOrderbookDelta(msg: Fields): OrderbookDeltaPayload {
  const c = "orderbook_delta";
  return {
    market_ticker: requireString(msg, "market_ticker", c),
    price: requireNumber(msg, "price", c),
    delta: requireNumber(msg, "delta", c),
    side: requireSide(msg, "side", c),
  };
}

function parseFill(msg: Fields): FillPayload {
  const c = "fill";
  const action = requireString(msg, "action", c);
  if (action !== "buy" && action !== "sell") {
    fail(c, `"action" must be "buy" or "sell"`);
  }
  return {
    trade_id: requireString(msg, "trade_id", c),
    order_id: requireString(msg, "order_id", c),
    market_ticker: requireString(msg, "market_ticker", c),
    is_taker: requireBoolean(msg, "is_taker", c),
    side: requireSide(msg, "side", c),
    action,
    yes_price: requireNumber(msg, "yes_price", c),
    no_price: requireNumber(msg, "no_price", c),
    count: requireNumber(msg, "count", c),
    ts: requireNumber(msg, "ts", c),
  };
}

function parseMarketPosition(msg: Fields): MarketPositionPayload {
  const c = "market_position";
  return {
    market_ticker: requireString(msg, "market_ticker", c),
    position: requireNumber(msg, "position", c),
    position_cost: optionalNumber(msg, "position_cost", c),
    realized_pnl: optionalNumber(msg, "realized_pnl", c),
    fees_paid: optionalNumber(msg, "fees_paid", c),
    volume: optionalNumber(msg, "volume", c),
  };
}

function parseMarketLifecycle(msg: Fields): MarketLifecyclePayload {
  const c = "market_lifecycle_v2";
  return {
    market_ticker: requireString(msg, "market_ticker", c),
    event_type: requireString(msg, "event_type", c),
    open_ts: optionalNumber(msg, "open_ts", c),
    close_ts: optionalNumber(msg, "close_ts", c),
    result: optionalString(msg, "result", c),
  };
}

/**
 * Parse and validate one server frame.
 *
 * @throws {WebSocketError} `MessageParseError` if the text is not JSON, the
 *   type is unknown, or a required field is missing or mistyped
 */
export function parseServerMessage(text: string): ServerMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw WebSocketError.messageParseError("invalid JSON");
  }
  if (!isRecord(raw)) {
    fail("frame", "expected a JSON object");
  }

  const type = requireString(raw, "type", "frame");
  const id = optionalInteger(raw, "id", type);
  const sid = optionalInteger(raw, "sid", type);
  const seq = optionalInteger(raw, "seq", type);
  const head = { id, sid, seq };

  switch (type) {
    case "subscribed": {
      const msg = requireMsg(raw, type);
      const channel = requireString(msg, "channel", type);
      const boundSid = optionalInteger(msg, "sid", type);
      if (boundSid === undefined) {
        fail(type, `"sid" is required`);
      }
      return { type: "subscribed", ...head, msg: { channel, sid: boundSid } };
    }
    case "unsubscribed": {
      if (sid === undefined) {
        fail(type, `"sid" is required`);
      }
      return { type: "unsubscribed", id, sid, seq };
    }
    case "ok": {
      const sids = raw.sids;
      if (sids !== undefined && (!Array.isArray(sids) || !sids.every(Number.isInteger))) {
        fail(type, `"sids" must be an array of integers`);
      }
      return { type: "ok", id, sids: Array.isArray(sids) ? sids.map(Number) : undefined };
    }
    case "error": {
      const msg = requireMsg(raw, type);
      return {
        type: "error",
        ...head,
        msg: {
          code: requireNumber(msg, "code", type),
          msg: optionalString(msg, "msg", type) ?? "",
        },
      };
    }
    case "ticker":
      return { type: "ticker", ...head, msg: parseTicker(requireMsg(raw, type)) };
    case "ticker_v2":
      return { type: "ticker_v2", ...head, msg: parseTickerV2(requireMsg(raw, type)) };
    case "trade":
      return { type: "trade", ...head, msg: parseTrade(requireMsg(raw, type)) };
    case "orderbook_snapshot":
      return { type: "orderbook_snapshot", ...head, msg: parseOrderbookSnapshot(requireMsg(raw, type)) };
    case "orderbook_delta":
      return { type: "orderbook_delta", ...head, msg: parseOrderbookDelta(requireMsg(raw, type)) };
    case "fill":
      return { type: "fill", ...head, msg: parseFill(requireMsg(raw, type)) };
    case "market_position":
      return { type: "market_position", ...head, msg: parseMarketPosition(requireMsg(raw, type)) };
    case "market_lifecycle_v2":
      return { type: "market_lifecycle_v2", ...head, msg: parseMarketLifecycle(requireMsg(raw, type)) };
    default:
      return fail("frame", `unknown message type "${type}"`);
  }
}
