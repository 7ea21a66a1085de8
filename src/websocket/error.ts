/**
 * WebSocket error types for the streaming client.
 */

/**
 * WebSocket error variants.
 */
export type WebSocketErrorVariant =
  | "ConnectionFailed"
  | "ConnectionClosed"
  | "ConnectionExhausted"
  | "HeartbeatTimeout"
  | "MessageParseError"
  | "ServerError"
  | "SigningFailed"
  | "CallbackFailed"
  | "NotConnected"
  | "Closed"
  | "InvalidSubscription"
  | "Protocol";

/**
 * WebSocket error class.
 */
export class WebSocketError extends Error {
  readonly variant: WebSocketErrorVariant;
  readonly code?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    variant: WebSocketErrorVariant,
    message: string,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "WebSocketError";
    this.variant = variant;
    this.code = code;
    this.details = details;
  }

  /** Handshake failed */
  static connectionFailed(message: string): WebSocketError {
    return new WebSocketError("ConnectionFailed", `Connection failed: ${message}`);
  }

  /** Connection was closed by the peer */
  static connectionClosed(code: number, reason: string): WebSocketError {
    return new WebSocketError(
      "ConnectionClosed",
      `Connection closed: code ${code}, reason: ${reason || "no reason"}`,
      String(code)
    );
  }

  /** Reconnect budget spent. Fatal to the connection. */
  static connectionExhausted(attempts: number): WebSocketError {
    return new WebSocketError(
      "ConnectionExhausted",
      `Gave up after ${attempts} failed connection attempts`,
      undefined,
      { attempts }
    );
  }

  /** No inbound traffic within the heartbeat timeout */
  static heartbeatTimeout(timeoutMs: number): WebSocketError {
    return new WebSocketError(
      "HeartbeatTimeout",
      `No traffic from server for ${timeoutMs}ms`,
      undefined,
      { timeoutMs }
    );
  }

  /** Failed to parse message */
  static messageParseError(message: string): WebSocketError {
    return new WebSocketError("MessageParseError", `Failed to parse message: ${message}`);
  }

  /** Error frame from the server */
  static serverError(code: number, message: string, correlationId?: number): WebSocketError {
    return new WebSocketError(
      "ServerError",
      `Server error ${code}: ${message}`,
      String(code),
      correlationId === undefined ? undefined : { correlationId }
    );
  }

  /** Handshake headers could not be signed */
  static signingFailed(message: string): WebSocketError {
    return new WebSocketError("SigningFailed", `Signing failed: ${message}`);
  }

  /** Subscriber callback threw or rejected */
  static callbackFailed(correlationId: number, message: string): WebSocketError {
    return new WebSocketError(
      "CallbackFailed",
      `Subscriber ${correlationId} failed: ${message}`,
      undefined,
      { correlationId }
    );
  }

  /** Not connected */
  static notConnected(): WebSocketError {
    return new WebSocketError("NotConnected", "Not connected to server");
  }

  /** Client was closed and cannot be reused */
  static closed(): WebSocketError {
    return new WebSocketError("Closed", "Client is closed");
  }

  /** Subscription request is malformed */
  static invalidSubscription(message: string): WebSocketError {
    return new WebSocketError("InvalidSubscription", `Invalid subscription: ${message}`);
  }

  /** Protocol error */
  static protocol(message: string): WebSocketError {
    return new WebSocketError("Protocol", `Protocol error: ${message}`);
  }
}
