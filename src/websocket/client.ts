/**
 * Streaming connection manager.
 *
 * Owns the socket lifecycle (connect, heartbeat, reconnect) for one logical
 * connection and replays the subscription registry after every reconnect.
 */

import { Signer, SigningError, type Credential } from "../auth";
import { ClockGuard } from "../shared/clock";
import { BASE_URLS, WS_PATH, type Environment } from "../shared/constants";
import { defaultLogger, type Logger } from "../shared/logger";
import { backoffDelay } from "../shared/utils";
import { WebSocketError } from "./error";
import { MessageRouter, type RouteTarget, type SubscriberCallback } from "./handlers";
import { SubscriptionRegistry, intentToCommand, type SubscriptionIntent } from "./subscriptions";
import { wsTransport, type StreamSocket, type StreamTransport } from "./transport";
import type {
  ChannelKind,
  ServerMessage,
  StreamEvent,
  SubscriptionRequest,
  WsCommand,
} from "./types";
import { createUnsubscribeCommand, parseServerMessage } from "./types";

/**
 * Reconnect and heartbeat settings.
 */
export interface ReconnectConfig {
  /**
   * Consecutive failed handshakes before giving up with
   * `ConnectionExhausted` (default: unlimited)
   */
  reconnectAttempts?: number;
  /** Base delay for exponential backoff (ms) */
  baseDelayMs?: number;
  /** Maximum delay for exponential backoff (ms) */
  maxDelayMs?: number;
  /** Interval between client ping frames (ms) */
  pingIntervalMs?: number;
  /** Reconnect when nothing arrives for this long (ms) */
  heartbeatTimeoutMs?: number;
}

/**
 * WebSocket client configuration.
 */
export interface WebSocketConfig extends ReconnectConfig {
  credential: Credential;
  /** Selects the URL (default: demo) */
  environment?: Environment;
  /** Overrides the environment's URL */
  url?: string;
  transport?: StreamTransport;
  clock?: ClockGuard;
  logger?: Logger;
}

/** Default reconnect and heartbeat settings */
export const DEFAULT_RECONNECT_CONFIG: Readonly<Required<ReconnectConfig>> = {
  reconnectAttempts: Number.POSITIVE_INFINITY,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  pingIntervalMs: 10000,
  heartbeatTimeoutMs: 30000,
};

/**
 * Connection state.
 */
export type ConnectionState =
  | "Disconnected"
  | "Connecting"
  | "Connected"
  | "Reconnecting"
  | "Closed";

/**
 * Allowed transitions. `Closed` is terminal.
 */
export const TRANSITIONS: Readonly<Record<ConnectionState, readonly ConnectionState[]>> = {
  Disconnected: ["Connecting", "Closed"],
  Connecting: ["Connected", "Reconnecting", "Closed"],
  Connected: ["Reconnecting", "Closed"],
  Reconnecting: ["Connecting", "Closed"],
  Closed: [],
};

export function canTransition(from: ConnectionState, to: ConnectionState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Lifecycle event callback type.
 */
export type EventCallback = (event: StreamEvent) => void;

/**
 * Error channel callback type.
 */
export type ErrorCallback = (error: WebSocketError) => void;

interface Waiter {
  resolve: () => void;
  reject: (error: WebSocketError) => void;
}

/**
 * Main streaming client for Kalshi.
 *
 * Subscriptions belong to the logical connection, not to a socket: they are
 * recorded before anything is sent, survive disconnects, and are re-sent in
 * insertion order on every new socket.
 *
 * @example
 * ```typescript
 * import { websocket } from "kalshi-core-client";
 *
 * const client = new websocket.KalshiWebSocketClient({ credential });
 * client.onError((error) => console.error(error.variant, error.message));
 * await client.connect();
 *
 * client.subscribe({ channels: ["ticker"], marketTickers: ["X"] }, (message) => {
 *   if (message.type === "ticker") {
 *     console.log(message.msg.market_ticker, message.msg.price);
 *   }
 * });
 * ```
 */
export class KalshiWebSocketClient {
  private readonly url: string;
  private readonly config: Required<ReconnectConfig>;
  private readonly signer: Signer;
  private readonly clock: ClockGuard;
  private readonly transport: StreamTransport;
  private readonly logger: Logger;

  private state: ConnectionState = "Disconnected";
  private socket: StreamSocket | null = null;
  /** Incremented per socket; events from older sockets are ignored */
  private generation = 0;
  private failedAttempts = 0;
  private readonly registry = new SubscriptionRegistry();
  private readonly router = new MessageRouter();
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private heartbeatTimer: ReturnType<typeof setTimeout> | null = null;
  private pingInterval: ReturnType<typeof setInterval> | null = null;
  private eventCallbacks: EventCallback[] = [];
  private errorCallbacks: ErrorCallback[] = [];
  private waiters: Waiter[] = [];

  constructor(config: WebSocketConfig) {
    this.signer = new Signer(config.credential);
    this.url = config.url || `${BASE_URLS[config.environment ?? "demo"].ws}${WS_PATH}`;
    this.config = {
      reconnectAttempts: config.reconnectAttempts ?? DEFAULT_RECONNECT_CONFIG.reconnectAttempts,
      baseDelayMs: config.baseDelayMs ?? DEFAULT_RECONNECT_CONFIG.baseDelayMs,
      maxDelayMs: config.maxDelayMs ?? DEFAULT_RECONNECT_CONFIG.maxDelayMs,
      pingIntervalMs: config.pingIntervalMs ?? DEFAULT_RECONNECT_CONFIG.pingIntervalMs,
      heartbeatTimeoutMs:
        config.heartbeatTimeoutMs ?? DEFAULT_RECONNECT_CONFIG.heartbeatTimeoutMs,
    };
    if (this.config.reconnectAttempts < 1) {
      throw new RangeError("reconnectAttempts must be at least 1");
    }
    this.clock = config.clock ?? new ClockGuard();
    this.transport = config.transport ?? wsTransport;
    this.logger = config.logger ?? defaultLogger;
  }

  // ============================================================================
  // CONNECTION
  // ============================================================================

  /**
   * Connect to the server. Resolves on the first successful handshake.
   *
   * @throws {WebSocketError} `ConnectionExhausted` if the attempt budget runs
   *   out first, `Closed` if the client is or becomes closed
   */
  async connect(): Promise<void> {
    if (this.state === "Closed") {
      throw WebSocketError.closed();
    }
    if (this.state === "Connected") {
      return;
    }

    const ready = new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
    if (this.state === "Disconnected") {
      this.startAttempt();
    }
    return ready;
  }

  /**
   * Close the connection for good: cancels reconnects, closes the socket and
   * clears every subscription. The client cannot be reconnected.
   */
  async close(): Promise<void> {
    this.shutdown(null);
  }

  private startAttempt(): void {
    this.openSocket().catch((e: unknown) => {
      this.shutdown(
        e instanceof WebSocketError
          ? e
          : WebSocketError.protocol(e instanceof Error ? e.message : String(e))
      );
    });
  }

  private async openSocket(): Promise<void> {
    this.transition("Connecting");
    if (this.isClosed()) {
      return;
    }
    const generation = ++this.generation;

    let headers: Record<string, string>;
    try {
      const context = this.signer.signRequest(this.clock.nowMs(), "GET", WS_PATH);
      headers = this.signer.headers(context);
    } catch (e) {
      if (e instanceof SigningError) {
        this.shutdown(WebSocketError.signingFailed(e.message));
        return;
      }
      throw e;
    }

    let socket: StreamSocket;
    try {
      socket = await this.transport(this.url, headers, {
        onMessage: (data) => this.handleMessage(generation, data),
        onActivity: () => this.handleActivity(generation),
        onClose: (code, reason) =>
          this.handleDrop(
            generation,
            `code: ${code}, reason: ${reason || "no reason"}`,
            WebSocketError.connectionClosed(code, reason)
          ),
        onError: (error) => this.handleSocketError(generation, error),
      });
    } catch (e) {
      if (this.state === "Closed" || generation !== this.generation) {
        return;
      }
      this.handleHandshakeFailure(e);
      return;
    }

    if (this.state === "Closed" || generation !== this.generation) {
      socket.close(1000, "Client closed");
      return;
    }

    this.socket = socket;
    this.failedAttempts = 0;
    this.transition("Connected");
    // Listeners run inside transition and emitEvent and may close the client
    if (!this.isConnected()) {
      return;
    }
    this.startHeartbeat(generation);
    this.emitEvent({ type: "Connected" });
    if (!this.isConnected()) {
      return;
    }
    this.replay();

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.resolve();
    }
  }

  private handleHandshakeFailure(e: unknown): void {
    this.failedAttempts++;
    const error =
      e instanceof WebSocketError
        ? e
        : WebSocketError.connectionFailed(e instanceof Error ? e.message : String(e));
    this.logger.warn(`Connection attempt ${this.failedAttempts} failed: ${error.message}`);
    this.emitError(error);
    if (this.isClosed()) {
      return;
    }

    if (this.failedAttempts >= this.config.reconnectAttempts) {
      this.shutdown(WebSocketError.connectionExhausted(this.failedAttempts));
      return;
    }
    this.scheduleReconnect();
  }

  /**
   * Socket went away while connected: keep the registry, forget the sids,
   * and start over.
   */
  private handleDrop(generation: number, reason: string, error: WebSocketError): void {
    if (generation !== this.generation || this.state !== "Connected") {
      return;
    }
    this.stopHeartbeat();
    const socket = this.socket;
    this.socket = null;
    this.generation++;
    this.router.resetSocket();

    if (socket) {
      try {
        socket.close(4000, "Reconnecting");
      } catch (e) {
        this.logger.debug("Error closing dropped socket:", e);
      }
    }

    this.logger.warn(`Stream disconnected (${reason})`);
    this.emitEvent({ type: "Disconnected", reason });
    this.emitError(error);
    if (this.isClosed()) {
      return;
    }
    this.scheduleReconnect();
  }

  private handleSocketError(generation: number, error: Error): void {
    if (generation !== this.generation) {
      return;
    }
    // The transport follows an error with a close, which triggers the reconnect
    this.logger.warn("WebSocket error:", error.message);
    this.emitError(WebSocketError.connectionFailed(error.message));
  }

  private scheduleReconnect(): void {
    this.transition("Reconnecting");
    if (this.isClosed()) {
      return;
    }
    const attempt = this.failedAttempts + 1;
    const delayMs = backoffDelay(attempt, this.config.baseDelayMs, this.config.maxDelayMs);
    this.emitEvent({ type: "Reconnecting", attempt, delayMs });
    if (this.isClosed()) {
      return;
    }

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.state === "Reconnecting") {
        this.startAttempt();
      }
    }, delayMs);
  }

  /**
   * Re-send every intent, in insertion order, with its original id.
   */
  private replay(): void {
    const intents = this.registry.snapshot();
    if (intents.length > 0) {
      this.logger.info(`Replaying ${intents.length} subscription(s)`);
    }
    for (const intent of intents) {
      this.send(intentToCommand(intent));
    }
  }

  private shutdown(fatal: WebSocketError | null): void {
    if (this.state === "Closed") {
      return;
    }
    this.transition("Closed");
    this.generation++;

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.stopHeartbeat();

    const socket = this.socket;
    this.socket = null;
    if (socket) {
      try {
        socket.close(1000, "Client closed");
      } catch (e) {
        this.logger.debug("Error closing socket:", e);
      }
    }

    this.registry.close();
    this.router.clear();

    if (fatal) {
      this.logger.error(`Stream closed: ${fatal.message}`);
      this.emitError(fatal);
    }
    this.emitEvent({ type: "Closed" });

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(fatal ?? WebSocketError.closed());
    }
  }

  private transition(to: ConnectionState): void {
    const from = this.state;
    if (!canTransition(from, to)) {
      throw WebSocketError.protocol(`illegal state transition ${from} -> ${to}`);
    }
    this.state = to;
    this.emitEvent({ type: "StateChange", from, to });
  }

  // ============================================================================
  // HEARTBEAT
  // ============================================================================

  private startHeartbeat(generation: number): void {
    this.stopHeartbeat();
    this.armHeartbeat(generation);
    this.pingInterval = setInterval(() => {
      try {
        this.socket?.ping();
      } catch (e) {
        this.logger.warn("Ping failed:", e instanceof Error ? e.message : String(e));
      }
    }, this.config.pingIntervalMs);
  }

  private armHeartbeat(generation: number): void {
    if (this.heartbeatTimer) {
      clearTimeout(this.heartbeatTimer);
    }
    const timeoutMs = this.config.heartbeatTimeoutMs;
    this.heartbeatTimer = setTimeout(() => {
      this.heartbeatTimer = null;
      this.handleDrop(generation, "heartbeat timeout", WebSocketError.heartbeatTimeout(timeoutMs));
    }, timeoutMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearTimeout(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }
  }

  private handleActivity(generation: number): void {
    if (generation === this.generation && this.state === "Connected") {
      this.armHeartbeat(generation);
    }
  }

  // ============================================================================
  // INBOUND
  // ============================================================================

  private handleMessage(generation: number, data: string): void {
    if (generation !== this.generation) {
      return;
    }
    this.handleActivity(generation);

    let message: ServerMessage;
    try {
      message = parseServerMessage(data);
    } catch (e) {
      const error =
        e instanceof WebSocketError
          ? e
          : WebSocketError.messageParseError(e instanceof Error ? e.message : String(e));
      this.logger.warn(`Dropping malformed frame: ${error.message}`);
      this.emitError(error);
      return;
    }

    const outcome = this.router.route(message);
    switch (outcome.kind) {
      case "deliver":
        for (const target of outcome.targets) {
          this.dispatch(target, message);
        }
        break;
      case "error":
        this.logger.warn(outcome.error.message);
        this.emitError(outcome.error);
        break;
      case "orphan":
        this.logger.debug(`Releasing sid ${outcome.sid} of a cancelled subscription`);
        this.sendUnsubscribe([outcome.sid]);
        break;
      case "ack":
        this.logger.debug(`Command ${String(outcome.commandId)} acknowledged`);
        break;
      case "unrouted":
        this.logger.warn(`Dropping ${message.type} frame: ${outcome.reason}`);
        break;
    }
  }

  /**
   * Hand a frame to a subscriber without waiting for it.
   */
  private dispatch(target: RouteTarget, message: ServerMessage): void {
    void Promise.resolve()
      .then(() => target.callback(message))
      .catch((e: unknown) => {
        this.emitError(
          WebSocketError.callbackFailed(
            target.correlationId,
            e instanceof Error ? e.message : String(e)
          )
        );
      });
  }

  // ============================================================================
  // OUTBOUND
  // ============================================================================

  private send(command: WsCommand): void {
    if (!this.socket || this.state !== "Connected") {
      throw WebSocketError.notConnected();
    }
    try {
      this.socket.send(JSON.stringify(command));
    } catch (e) {
      // Desired state lives in the registry; the next reconnect re-sends it
      this.logger.warn(
        `Failed to send ${command.cmd} ${command.id}:`,
        e instanceof Error ? e.message : String(e)
      );
    }
  }

  private sendUnsubscribe(sids: number[]): void {
    const commandId = this.registry.nextCommandId();
    this.router.expectAck(commandId);
    this.send(createUnsubscribeCommand(commandId, sids));
  }

  /**
   * Emit an event to all callbacks.
   */
  private emitEvent(event: StreamEvent): void {
    for (const callback of this.eventCallbacks) {
      try {
        callback(event);
      } catch (e) {
        this.logger.error("Event callback error:", e);
      }
    }
  }

  private emitError(error: WebSocketError): void {
    if (this.errorCallbacks.length === 0) {
      this.logger.error(`Unhandled stream error: ${error.message}`);
      return;
    }
    for (const callback of this.errorCallbacks) {
      try {
        callback(error);
      } catch (e) {
        this.logger.error("Error callback error:", e);
      }
    }
  }

  // ============================================================================
  // SUBSCRIBE METHODS
  // ============================================================================

  /**
   * Subscribe to channels. The intent is recorded first and sent right away
   * when connected; otherwise it goes out when the next connection opens.
   *
   * @returns The correlation id identifying this subscription
   * @throws {WebSocketError} If the client is closed or the request is invalid
   */
  subscribe(request: SubscriptionRequest, callback: SubscriberCallback): number {
    if (this.state === "Closed") {
      throw WebSocketError.closed();
    }
    const correlationId = this.registry.add(request);
    const intent = this.registry.get(correlationId);
    if (!intent) {
      throw WebSocketError.protocol(`intent ${correlationId} missing after add`);
    }
    this.router.register(correlationId, intent.channels, callback);

    if (this.state === "Connected") {
      this.send(intentToCommand(intent));
    }
    return correlationId;
  }

  /**
   * Subscribe to ticker updates, for all markets or the given ones.
   */
  subscribeTicker(callback: SubscriberCallback, marketTickers?: string[]): number {
    return this.subscribe({ channels: ["ticker"], marketTickers }, callback);
  }

  /**
   * Subscribe to orderbook snapshots and deltas.
   */
  subscribeOrderbook(marketTickers: string[], callback: SubscriberCallback): number {
    if (marketTickers.length === 0) {
      throw WebSocketError.invalidSubscription("orderbook subscriptions need market tickers");
    }
    return this.subscribe({ channels: ["orderbook_delta"], marketTickers }, callback);
  }

  /**
   * Subscribe to public trades.
   */
  subscribeTrades(callback: SubscriberCallback, marketTickers?: string[]): number {
    return this.subscribe({ channels: ["trade"], marketTickers }, callback);
  }

  /**
   * Subscribe to the account's fills.
   */
  subscribeFills(callback: SubscriberCallback): number {
    return this.subscribe({ channels: ["fill"] }, callback);
  }

  // ============================================================================
  // UNSUBSCRIBE METHODS
  // ============================================================================

  /**
   * Cancel a subscription. Calling it again for the same id does nothing.
   *
   * @returns Whether a subscription was removed
   */
  unsubscribe(correlationId: number): boolean {
    if (!this.registry.remove(correlationId)) {
      return false;
    }
    const sids = this.router.unregister(correlationId);
    if (this.state === "Connected" && sids.length > 0) {
      this.sendUnsubscribe(sids);
    }
    return true;
  }

  // ============================================================================
  // STATE ACCESS
  // ============================================================================

  /**
   * Current subscriptions in insertion order.
   */
  subscriptions(): SubscriptionIntent[] {
    return this.registry.snapshot();
  }

  /**
   * Channels of one subscription, if it exists.
   */
  channelsOf(correlationId: number): readonly ChannelKind[] | undefined {
    return this.registry.get(correlationId)?.channels;
  }

  /**
   * Check if connected.
   */
  isConnected(): boolean {
    return this.state === "Connected";
  }

  /**
   * Check if closed. A closed client cannot be reused.
   */
  isClosed(): boolean {
    return this.state === "Closed";
  }

  /**
   * Get the current connection state.
   */
  connectionState(): ConnectionState {
    return this.state;
  }

  /**
   * Get the WebSocket URL.
   */
  getUrl(): string {
    return this.url;
  }

  /**
   * Get the resolved reconnect configuration.
   */
  getConfig(): Readonly<Required<ReconnectConfig>> {
    return this.config;
  }

  // ============================================================================
  // EVENT HANDLING
  // ============================================================================

  /**
   * Register a lifecycle event callback.
   */
  on(callback: EventCallback): void {
    this.eventCallbacks.push(callback);
  }

  /**
   * Remove a lifecycle event callback.
   */
  off(callback: EventCallback): void {
    const index = this.eventCallbacks.indexOf(callback);
    if (index !== -1) {
      this.eventCallbacks.splice(index, 1);
    }
  }

  /**
   * Register an error callback. Errors never arrive on subscriber callbacks.
   */
  onError(callback: ErrorCallback): void {
    this.errorCallbacks.push(callback);
  }

  /**
   * Remove an error callback.
   */
  offError(callback: ErrorCallback): void {
    const index = this.errorCallbacks.indexOf(callback);
    if (index !== -1) {
      this.errorCallbacks.splice(index, 1);
    }
  }
}
