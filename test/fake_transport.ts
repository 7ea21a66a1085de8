/**
 * In-process stand-in for the `ws` transport.
 */

import type {
  StreamSocket,
  StreamSocketHandlers,
  StreamTransport,
} from "../src/websocket/transport";
import { WebSocketError } from "../src/websocket/error";

export class FakeSocket implements StreamSocket {
  readonly sent: string[] = [];
  pings = 0;
  closed: { code?: number; reason?: string } | null = null;

  constructor(
    readonly url: string,
    readonly headers: Record<string, string>,
    private readonly handlers: StreamSocketHandlers
  ) {}

  send(data: string): void {
    if (this.closed) {
      throw new Error("socket is closed");
    }
    this.sent.push(data);
  }

  ping(): void {
    this.pings++;
  }

  close(code?: number, reason?: string): void {
    this.closed = { code, reason };
  }

  /** Commands the client sent, decoded */
  commands(): Array<{ id: number; cmd: string; params: Record<string, unknown> }> {
    return this.sent.map((text) => JSON.parse(text));
  }

  /** Deliver a frame from the server */
  receive(frame: unknown): void {
    this.handlers.onMessage(typeof frame === "string" ? frame : JSON.stringify(frame));
  }

  pong(): void {
    this.handlers.onActivity();
  }

  error(message: string): void {
    this.handlers.onError(new Error(message));
  }

  /** Server closes the connection */
  drop(code = 1006, reason = ""): void {
    this.closed = { code, reason };
    this.handlers.onClose(code, reason);
  }
}

/**
 * Transport that opens {@link FakeSocket}s, or fails the next `failNext`
 * handshakes.
 */
export class FakeTransport {
  readonly sockets: FakeSocket[] = [];
  attempts = 0;
  failNext = 0;

  readonly transport: StreamTransport = async (url, headers, handlers) => {
    this.attempts++;
    if (this.failNext > 0) {
      this.failNext--;
      throw WebSocketError.connectionFailed("connect ECONNREFUSED");
    }
    const socket = new FakeSocket(url, headers, handlers);
    this.sockets.push(socket);
    return socket;
  };

  get last(): FakeSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) {
      throw new Error("no socket opened yet");
    }
    return socket;
  }
}

/**
 * Let queued promise callbacks run.
 */
export async function flushMicrotasks(): Promise<void> {
  for (let i = 0; i < 20; i++) {
    await Promise.resolve();
  }
}
