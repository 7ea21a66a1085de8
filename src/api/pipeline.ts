/**
 * Signed, rate-limited request pipeline.
 *
 * Every REST call goes through {@link RequestPipeline.execute}:
 *
 * 1. wait for a rate-limiter permit
 * 2. take one timestamp
 * 3. sign `timestamp + METHOD + path`
 * 4. send with the key id, timestamp and signature headers
 * 5. decode the JSON body, or surface the classified error
 *
 * Nothing is retried here. Order placement must never be silently repeated,
 * so retry policy belongs to the caller.
 */

import { Signer, type Credential } from "../auth";
import { ClockGuard } from "../shared/clock";
import { BASE_URLS, DEFAULT_TIMEOUT_MS, type Environment } from "../shared/constants";
import { defaultLogger, type Logger } from "../shared/logger";
import { RateLimiter } from "../shared/rate_limiter";
import { toQueryParams } from "../shared/utils";
import { ApiError } from "./error";
import { validatePath } from "./validation";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * Options for a single request.
 */
export interface ExecuteOptions<T = unknown> {
  /** Query parameters; undefined and null values are dropped */
  query?: object;
  /** JSON body */
  body?: unknown;
  /**
   * Builds the JSON body from the request timestamp, so body timestamp
   * fields always equal the signed timestamp. Takes precedence over `body`.
   */
  bodyFor?: (timestampMs: number) => unknown;
  /**
   * Checks the decoded JSON and returns it as `T`. Without it the response
   * is returned unchecked. A throw becomes an `ApiError` `Deserialize`.
   */
  decode?: (value: unknown) => T;
}

/**
 * Pipeline configuration.
 */
export interface RequestPipelineConfig {
  credential: Credential;
  /** Selects the base URL (default: demo) */
  environment?: Environment;
  /** Overrides the environment's base URL */
  baseUrl?: string;
  /** Shared limiter; pass the same instance to every pipeline of an account */
  rateLimiter?: RateLimiter;
  clock?: ClockGuard;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Transport; defaults to the global fetch */
  fetch?: typeof fetch;
  logger?: Logger;
}

/**
 * Composes signer, clock and rate limiter into `execute`.
 */
export class RequestPipeline {
  readonly baseUrl: string;
  readonly rateLimiter: RateLimiter;
  private readonly signer: Signer;
  private readonly clock: ClockGuard;
  private readonly timeout: number;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(config: RequestPipelineConfig) {
    this.signer = new Signer(config.credential);
    this.baseUrl = config.baseUrl || BASE_URLS[config.environment ?? "demo"].http;
    this.clock = config.clock ?? new ClockGuard();
    this.rateLimiter = config.rateLimiter ?? new RateLimiter({ clock: this.clock });
    this.timeout = config.timeout || DEFAULT_TIMEOUT_MS;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = config.logger ?? defaultLogger;
  }

  /**
   * Send one signed request and decode its JSON response.
   *
   * `T` is not checked against the payload unless `options.decode` is given.
   *
   * @param path - Full request path, e.g. `/trade-api/v2/portfolio/balance`
   * @throws {ApiError} `Transport` when no response arrives, a status variant
   *   with `statusCode` and `body` on any non-2xx, `Deserialize` on bad JSON
   *   or a rejected `decode`
   * @throws {SigningError} If the key cannot sign
   */
  async execute<T>(
    method: HttpMethod,
    path: string,
    options: ExecuteOptions<T> = {}
  ): Promise<T> {
    validatePath(path);
    await this.rateLimiter.acquire();

    const timestampMs = this.clock.nowMs();
    const context = this.signer.signRequest(timestampMs, method, path);
    const body = options.bodyFor ? options.bodyFor(timestampMs) : options.body;

    const url = this.buildUrl(path, options.query);
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      ...this.signer.headers(context),
    };

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw ApiError.transport(`request timed out after ${this.timeout}ms`);
      }
      throw ApiError.transport(error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timeoutId);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw ApiError.transport(
        `failed to read response body: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (response.status < 200 || response.status > 299) {
      this.logger.debug(`${method} ${context.path} -> ${response.status}`);
      throw ApiError.fromStatus(response.status, text);
    }

    let value: unknown = {};
    if (text.length > 0) {
      try {
        value = JSON.parse(text);
      } catch (error) {
        throw ApiError.deserialize(error instanceof Error ? error.message : String(error));
      }
    }

    if (!options.decode) {
      return value as T;
    }
    try {
      return options.decode(value);
    } catch (error) {
      if (error instanceof ApiError) {
        throw error;
      }
      throw ApiError.deserialize(error instanceof Error ? error.message : String(error));
    }
  }

  private buildUrl(path: string, query?: object): string {
    let url = `${this.baseUrl}${path}`;
    if (query) {
      const params = toQueryParams(query);
      if (Object.keys(params).length > 0) {
        url += `${path.includes("?") ? "&" : "?"}${new URLSearchParams(params).toString()}`;
      }
    }
    return url;
  }
}
