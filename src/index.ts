/**
 * Kalshi core client - signed REST pipeline and resilient streaming
 * subscriptions for the Kalshi exchange.
 *
 * This package provides two main modules:
 * - `api`: signed, rate-limited REST pipeline and endpoint wrappers
 * - `websocket`: streaming client with subscription replay on reconnect
 *
 * @example
 * ```typescript
 * import { api, websocket, loadCredentialFromDotenv, RateLimiter } from "kalshi-core-client";
 *
 * const credential = loadCredentialFromDotenv("demo");
 *
 * // One limiter per account, shared by every pipeline
 * const rateLimiter = new RateLimiter();
 * const rest = new api.KalshiApiClient({ credential, rateLimiter });
 * const { balance } = await rest.getBalance();
 *
 * const stream = new websocket.KalshiWebSocketClient({ credential });
 * await stream.connect();
 * stream.subscribeTicker((message) => console.log(message), ["X"]);
 * ```
 */

// ============================================================================
// MODULE EXPORTS
// ============================================================================

/**
 * Shared utilities, types, and constants.
 * Used by both the REST and streaming modules.
 */
export * from "./shared";

/**
 * REST API module.
 */
export * as api from "./api";

/**
 * Streaming module.
 */
export * as websocket from "./websocket";

// ============================================================================
// SIGNING AND CREDENTIALS
// ============================================================================

export {
  Signer,
  SigningError,
  createCredential,
  loadPrivateKey,
  canonicalMessage,
  stripQuery,
} from "./auth";
export type { Credential, SignedRequestContext, SigningErrorVariant } from "./auth";

export {
  credentialVariables,
  loadCredentialFromEnv,
  loadCredentialFromDotenv,
} from "./credentials";
