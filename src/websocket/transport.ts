/**
 * Socket transport for the streaming client.
 *
 * The connection manager only sees {@link StreamTransport}; the default
 * implementation wraps the `ws` package.
 */

import WebSocket from "ws";
import { WebSocketError } from "./error";

/**
 * An open socket.
 */
export interface StreamSocket {
  send(data: string): void;
  /** Send a protocol-level ping frame */
  ping(): void;
  close(code?: number, reason?: string): void;
}

/**
 * Callbacks a transport invokes for an open socket.
 */
export interface StreamSocketHandlers {
  onMessage(data: string): void;
  /** Ping or pong frame received */
  onActivity(): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

/**
 * Open a socket. Resolves once the handshake succeeds, rejects if it fails.
 */
export type StreamTransport = (
  url: string,
  headers: Record<string, string>,
  handlers: StreamSocketHandlers
) => Promise<StreamSocket>;

function rawToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

/**
 * Transport backed by the `ws` package.
 */
export const wsTransport: StreamTransport = (url, headers, handlers) =>
  new Promise((resolve, reject) => {
    let opened = false;
    let ws: WebSocket;
    try {
      ws = new WebSocket(url, { headers });
    } catch (e) {
      reject(WebSocketError.connectionFailed(e instanceof Error ? e.message : String(e)));
      return;
    }

    ws.on("open", () => {
      opened = true;
      resolve({
        send: (data) => ws.send(data),
        ping: () => ws.ping(),
        close: (code, reason) => ws.close(code, reason),
      });
    });

    ws.on("message", (data) => {
      handlers.onMessage(rawToString(data));
    });

    ws.on("ping", () => handlers.onActivity());
    ws.on("pong", () => handlers.onActivity());

    ws.on("error", (error) => {
      if (!opened) {
        reject(WebSocketError.connectionFailed(error.message));
        return;
      }
      handlers.onError(error);
    });

    ws.on("close", (code, reason) => {
      if (!opened) {
        reject(WebSocketError.connectionClosed(code, reason.toString()));
        return;
      }
      handlers.onClose(code, reason.toString());
    });
  });
