/**
 * Subscription registry for the streaming client.
 *
 * Holds the desired subscription state, independent of any socket. After
 * every reconnect the connection manager replays {@link SubscriptionRegistry.snapshot}.
 */

import { WebSocketError } from "./error";
import type { ChannelKind, SubscribeCommand, SubscriptionRequest } from "./types";
import { createSubscribeCommand, isChannelKind } from "./types";

/**
 * A subscription the caller wants to hold.
 */
export interface SubscriptionIntent {
  readonly correlationId: number;
  readonly channels: readonly ChannelKind[];
  readonly marketTickers?: readonly string[];
}

/**
 * Convert an intent to the subscribe command that (re)establishes it.
 * The command id is the intent's correlation id.
 */
export function intentToCommand(intent: SubscriptionIntent): SubscribeCommand {
  return createSubscribeCommand(intent.correlationId, {
    channels: [...intent.channels],
    marketTickers: intent.marketTickers ? [...intent.marketTickers] : undefined,
  });
}

/**
 * Validate a subscription request.
 * @throws {WebSocketError} If no channel is named or a channel is unknown
 */
export function validateSubscription(request: SubscriptionRequest): void {
  if (request.channels.length === 0) {
    throw WebSocketError.invalidSubscription("at least one channel is required");
  }
  for (const channel of request.channels) {
    if (!isChannelKind(channel)) {
      throw WebSocketError.invalidSubscription(`unknown channel "${String(channel)}"`);
    }
  }
  for (const ticker of request.marketTickers ?? []) {
    if (!ticker || /\s/.test(ticker)) {
      throw WebSocketError.invalidSubscription(`invalid market ticker "${ticker}"`);
    }
  }
}

/**
 * In-memory table of subscription intents keyed by correlation id.
 *
 * Ids come from one counter that starts at 1 and never goes back, so an id
 * is never reused while the registry lives. The same counter numbers other
 * outbound commands (unsubscribes) so every command id on the logical
 * connection is distinct.
 *
 * All methods are synchronous and therefore atomic on the event loop.
 */
export class SubscriptionRegistry {
  /** Map iteration order is insertion order */
  private intents: Map<number, SubscriptionIntent> = new Map();
  private nextId = 1;
  private closed = false;

  /**
   * Record an intent and return its correlation id.
   * @throws {WebSocketError} If the registry is closed or the request is invalid
   */
  add(request: SubscriptionRequest): number {
    this.assertOpen();
    validateSubscription(request);

    const correlationId = this.nextCommandId();
    const channels = Object.freeze(Array.from(new Set(request.channels)));
    const intent: SubscriptionIntent =
      request.marketTickers && request.marketTickers.length > 0
        ? Object.freeze({
            correlationId,
            channels,
            marketTickers: Object.freeze([...request.marketTickers]),
          })
        : Object.freeze({ correlationId, channels });
    this.intents.set(correlationId, intent);
    return correlationId;
  }

  /**
   * Remove an intent. Returns false when the id is not (or no longer) present.
   */
  remove(correlationId: number): boolean {
    return this.intents.delete(correlationId);
  }

  /**
   * Look up an intent.
   */
  get(correlationId: number): SubscriptionIntent | undefined {
    return this.intents.get(correlationId);
  }

  /**
   * Check if an intent is present.
   */
  has(correlationId: number): boolean {
    return this.intents.has(correlationId);
  }

  /**
   * All intents in insertion order.
   */
  snapshot(): SubscriptionIntent[] {
    return Array.from(this.intents.values());
  }

  /**
   * Allocate an id for an outbound command.
   * @throws {WebSocketError} If the registry is closed
   */
  nextCommandId(): number {
    this.assertOpen();
    return this.nextId++;
  }

  /**
   * Number of intents.
   */
  get size(): number {
    return this.intents.size;
  }

  /**
   * Whether {@link close} has been called.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Drop every intent and refuse further additions.
   */
  close(): void {
    this.intents.clear();
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw WebSocketError.closed();
    }
  }
}
