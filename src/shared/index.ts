/**
 * Shared utilities used by both the REST and streaming clients.
 */

export {
  BASE_URLS,
  API_PATH_PREFIX,
  WS_PATH,
  HEADERS,
  DEFAULT_MIN_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
  parseEnvironment,
} from "./constants";
export type { Environment } from "./constants";

export { ClockGuard } from "./clock";
export { RateLimiter } from "./rate_limiter";
export type { RateLimiterConfig } from "./rate_limiter";
export { sleep, backoffDelay, jitteredDelay, toQueryParams } from "./utils";
export { defaultLogger, silentLogger } from "./logger";
export type { Logger } from "./logger";
