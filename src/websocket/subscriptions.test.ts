import { describe, it, expect, beforeEach } from "vitest";
import { WebSocketError } from "./error";
import { SubscriptionRegistry, intentToCommand, validateSubscription } from "./subscriptions";
import type { ChannelKind } from "./types";

describe("SubscriptionRegistry", () => {
  let registry: SubscriptionRegistry;

  beforeEach(() => {
    registry = new SubscriptionRegistry();
  });

  it("issues increasing ids starting at 1", () => {
    expect(registry.add({ channels: ["ticker"] })).toBe(1);
    expect(registry.add({ channels: ["trade"] })).toBe(2);
    expect(registry.nextCommandId()).toBe(3);
    expect(registry.add({ channels: ["fill"] })).toBe(4);
  });

  it("never reuses an id after removal", () => {
    const first = registry.add({ channels: ["ticker"] });
    registry.remove(first);
    expect(registry.add({ channels: ["ticker"] })).toBe(2);
  });

  it("snapshots in insertion order", () => {
    const a = registry.add({ channels: ["ticker"], marketTickers: ["A"] });
    const b = registry.add({ channels: ["trade"] });
    const c = registry.add({ channels: ["fill"] });
    registry.remove(b);
    const d = registry.add({ channels: ["trade"] });

    expect(registry.snapshot().map((intent) => intent.correlationId)).toEqual([a, c, d]);
    expect(registry.size).toBe(3);
  });

  it("returns false when removing twice", () => {
    const id = registry.add({ channels: ["ticker"] });
    expect(registry.remove(id)).toBe(true);
    expect(registry.remove(id)).toBe(false);
    expect(registry.has(id)).toBe(false);
  });

  it("stores frozen intents with duplicate channels collapsed", () => {
    const id = registry.add({ channels: ["ticker", "trade", "ticker"], marketTickers: ["X"] });
    const intent = registry.get(id);

    expect(intent).toEqual({ correlationId: id, channels: ["ticker", "trade"], marketTickers: ["X"] });
    expect(Object.isFrozen(intent)).toBe(true);
    expect(Object.isFrozen(intent?.channels)).toBe(true);
  });

  it("is unaffected by later changes to the request", () => {
    const tickers = ["X"];
    const id = registry.add({ channels: ["ticker"], marketTickers: tickers });
    tickers.push("Y");

    expect(registry.get(id)?.marketTickers).toEqual(["X"]);
  });

  it("refuses additions once closed", () => {
    registry.add({ channels: ["ticker"] });
    registry.close();

    expect(registry.isClosed).toBe(true);
    expect(registry.snapshot()).toEqual([]);
    expect(() => registry.add({ channels: ["ticker"] })).toThrow(WebSocketError);
    expect(() => registry.nextCommandId()).toThrow("Client is closed");
  });
});

describe("validateSubscription", () => {
  it("requires a channel", () => {
    expect(() => validateSubscription({ channels: [] })).toThrow(
      "Invalid subscription: at least one channel is required"
    );
  });

  it("rejects unknown channels", () => {
    const channels: ChannelKind[] = JSON.parse('["candles"]');
    expect(() => validateSubscription({ channels })).toThrow(
      'Invalid subscription: unknown channel "candles"'
    );
  });

  it("rejects blank tickers", () => {
    expect(() => validateSubscription({ channels: ["ticker"], marketTickers: [" "] })).toThrow(
      'Invalid subscription: invalid market ticker " "'
    );
  });
});

describe("intentToCommand", () => {
  it("uses the correlation id as the command id", () => {
    expect(
      intentToCommand({ correlationId: 7, channels: ["orderbook_delta"], marketTickers: ["X"] })
    ).toEqual({
      id: 7,
      cmd: "subscribe",
      params: { channels: ["orderbook_delta"], market_tickers: ["X"] },
    });
  });

  it("omits market tickers when there are none", () => {
    expect(intentToCommand({ correlationId: 1, channels: ["fill"] })).toEqual({
      id: 1,
      cmd: "subscribe",
      params: { channels: ["fill"] },
    });
  });
});
