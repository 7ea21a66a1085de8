/**
 * Exchange endpoints and protocol constants.
 */

/**
 * Exchange environment.
 */
export type Environment = "demo" | "prod";

/** Base URLs for each environment */
export const BASE_URLS: Readonly<Record<Environment, { http: string; ws: string }>> = {
  demo: {
    http: "https://demo-api.kalshi.co",
    ws: "wss://demo-api.kalshi.co",
  },
  prod: {
    http: "https://api.elections.kalshi.com",
    ws: "wss://api.elections.kalshi.com",
  },
};

/** Path prefix of every REST endpoint */
export const API_PATH_PREFIX = "/trade-api/v2";

/** Path of the streaming endpoint (also the path signed for the handshake) */
export const WS_PATH = "/trade-api/ws/v2";

/** Authentication header names */
export const HEADERS = {
  KEY: "KALSHI-ACCESS-KEY",
  TIMESTAMP: "KALSHI-ACCESS-TIMESTAMP",
  SIGNATURE: "KALSHI-ACCESS-SIGNATURE",
} as const;

/** Default minimum spacing between REST sends (ms) */
export const DEFAULT_MIN_INTERVAL_MS = 100;

/** Default request timeout (ms) */
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Parse an environment name.
 * @throws {Error} If the name is not a known environment
 */
export function parseEnvironment(value: string): Environment {
  const normalized = value.trim().toLowerCase();
  if (normalized === "demo" || normalized === "prod") {
    return normalized;
  }
  throw new Error(`Invalid environment: ${value}`);
}
