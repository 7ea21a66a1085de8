/**
 * Inbound message routing.
 *
 * Maps server frames back to the subscriber that caused them: by command id,
 * by server subscription id (`sid`), or by channel kind for frames that
 * carry neither.
 */

import { WebSocketError } from "./error";
import type { ChannelKind, DataMessage, ServerMessage } from "./types";
import { channelOf } from "./types";

/**
 * Callback receiving the frames routed to one subscription.
 */
export type SubscriberCallback = (message: ServerMessage) => void | Promise<void>;

/**
 * A subscriber selected for a frame.
 */
export interface RouteTarget {
  correlationId: number;
  callback: SubscriberCallback;
}

/**
 * What to do with a routed frame.
 */
export type RouteOutcome =
  | { kind: "deliver"; targets: RouteTarget[] }
  | { kind: "error"; error: WebSocketError }
  | { kind: "ack"; commandId?: number }
  | { kind: "orphan"; sid: number }
  | { kind: "unrouted"; reason: string };

interface Subscriber {
  channels: readonly ChannelKind[];
  callback: SubscriberCallback;
}

/**
 * Correlation table for one logical connection.
 *
 * Subscribers persist across sockets; `sid` bindings, pending command ids
 * and retired ids belong to the current socket and are dropped by
 * {@link MessageRouter.resetSocket}.
 */
export class MessageRouter {
  private subscribers: Map<number, Subscriber> = new Map();
  /** sid -> correlation id */
  private sids: Map<number, number> = new Map();
  /** Ids of non-subscribe commands awaiting acknowledgement */
  private pendingCommands: Set<number> = new Set();
  /** Subscriptions cancelled on this socket; late `subscribed` acks are orphans */
  private retired: Set<number> = new Set();

  /**
   * Register the callback for a correlation id.
   */
  register(
    correlationId: number,
    channels: readonly ChannelKind[],
    callback: SubscriberCallback
  ): void {
    this.subscribers.set(correlationId, { channels, callback });
  }

  /**
   * Forget a subscriber. Returns the sids it held on the current socket.
   */
  unregister(correlationId: number): number[] {
    if (!this.subscribers.delete(correlationId)) {
      return [];
    }
    this.retired.add(correlationId);
    const released: number[] = [];
    for (const [sid, owner] of this.sids) {
      if (owner === correlationId) {
        released.push(sid);
      }
    }
    for (const sid of released) {
      this.sids.delete(sid);
    }
    return released;
  }

  /**
   * Expect an acknowledgement for a non-subscribe command.
   */
  expectAck(commandId: number): void {
    this.pendingCommands.add(commandId);
  }

  /**
   * Decide where a frame goes. Updates sid bindings as a side effect.
   */
  route(message: ServerMessage): RouteOutcome {
    switch (message.type) {
      case "subscribed": {
        const id = message.id;
        if (id !== undefined && this.subscribers.has(id)) {
          this.sids.set(message.msg.sid, id);
          return { kind: "deliver", targets: this.targetsFor(id) };
        }
        if (id !== undefined && this.retired.has(id)) {
          return { kind: "orphan", sid: message.msg.sid };
        }
        return { kind: "unrouted", reason: `unknown correlation id ${String(id)}` };
      }
      case "unsubscribed": {
        this.sids.delete(message.sid);
        if (message.id !== undefined) {
          this.pendingCommands.delete(message.id);
        }
        return { kind: "ack", commandId: message.id };
      }
      case "ok": {
        const id = message.id;
        if (id !== undefined && this.pendingCommands.delete(id)) {
          return { kind: "ack", commandId: id };
        }
        if (id !== undefined && this.subscribers.has(id)) {
          return { kind: "deliver", targets: this.targetsFor(id) };
        }
        return { kind: "unrouted", reason: `unknown correlation id ${String(id)}` };
      }
      case "error": {
        const id = message.id;
        if (id !== undefined) {
          this.pendingCommands.delete(id);
        }
        const known = id !== undefined && (this.subscribers.has(id) || this.retired.has(id));
        return {
          kind: "error",
          error: WebSocketError.serverError(
            message.msg.code,
            message.msg.msg,
            known ? id : undefined
          ),
        };
      }
      default:
        return this.routeData(message);
    }
  }

  /**
   * Drop per-socket state. Subscribers stay registered.
   */
  resetSocket(): void {
    this.sids.clear();
    this.pendingCommands.clear();
    this.retired.clear();
  }

  /**
   * Drop everything.
   */
  clear(): void {
    this.resetSocket();
    this.subscribers.clear();
  }

  /**
   * Number of registered subscribers.
   */
  get size(): number {
    return this.subscribers.size;
  }

  private routeData(message: DataMessage): RouteOutcome {
    if (message.id !== undefined) {
      return this.subscribers.has(message.id)
        ? { kind: "deliver", targets: this.targetsFor(message.id) }
        : { kind: "unrouted", reason: `unknown correlation id ${message.id}` };
    }

    if (message.sid !== undefined) {
      const owner = this.sids.get(message.sid);
      return owner !== undefined && this.subscribers.has(owner)
        ? { kind: "deliver", targets: this.targetsFor(owner) }
        : { kind: "unrouted", reason: `unknown sid ${message.sid}` };
    }

    // No id and no sid: broadcast to the channel
    const channel = channelOf(message.type);
    const targets: RouteTarget[] = [];
    for (const [correlationId, subscriber] of this.subscribers) {
      if (subscriber.channels.includes(channel)) {
        targets.push({ correlationId, callback: subscriber.callback });
      }
    }
    return targets.length > 0
      ? { kind: "deliver", targets }
      : { kind: "unrouted", reason: `no subscriber for channel ${channel}` };
  }

  private targetsFor(correlationId: number): RouteTarget[] {
    const subscriber = this.subscribers.get(correlationId);
    return subscriber ? [{ correlationId, callback: subscriber.callback }] : [];
  }
}
