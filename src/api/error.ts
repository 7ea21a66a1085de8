/**
 * API error types for the REST pipeline.
 */

/**
 * API error variants
 */
export type ApiErrorVariant =
  | "Transport"
  | "NotFound"
  | "BadRequest"
  | "Forbidden"
  | "Conflict"
  | "ServerError"
  | "Deserialize"
  | "InvalidParameter"
  | "UnexpectedStatus"
  | "RateLimited"
  | "Unauthorized";

/**
 * Error raised by the request pipeline and the REST client.
 *
 * Status variants carry the HTTP status code and the response body exactly
 * as the exchange sent it.
 */
export class ApiError extends Error {
  readonly variant: ApiErrorVariant;
  readonly statusCode?: number;
  readonly body?: string;

  constructor(variant: ApiErrorVariant, message: string, statusCode?: number, body?: string) {
    super(message);
    this.name = "ApiError";
    this.variant = variant;
    this.statusCode = statusCode;
    this.body = body;
  }

  /** Connection failure, DNS failure, or timeout. No response was received. */
  static transport(message: string): ApiError {
    return new ApiError("Transport", `Transport error: ${message}`);
  }

  /** Response body is not valid JSON */
  static deserialize(message: string): ApiError {
    return new ApiError("Deserialize", `Deserialization error: ${message}`);
  }

  /** Invalid parameter provided */
  static invalidParameter(message: string): ApiError {
    return new ApiError("InvalidParameter", `Invalid parameter: ${message}`);
  }

  /** Create from a non-2xx HTTP status and its raw body */
  static fromStatus(statusCode: number, body: string): ApiError {
    const detail = describeBody(body);
    switch (statusCode) {
      case 400:
        return new ApiError("BadRequest", `Bad request: ${detail}`, statusCode, body);
      case 401:
        return new ApiError("Unauthorized", `Unauthorized: ${detail}`, statusCode, body);
      case 403:
        return new ApiError("Forbidden", `Permission denied: ${detail}`, statusCode, body);
      case 404:
        return new ApiError("NotFound", `Not found: ${detail}`, statusCode, body);
      case 409:
        return new ApiError("Conflict", `Conflict: ${detail}`, statusCode, body);
      case 429:
        return new ApiError("RateLimited", `Rate limited: ${detail}`, statusCode, body);
      case 500:
      case 502:
      case 503:
      case 504:
        return new ApiError("ServerError", `Server error ${statusCode}: ${detail}`, statusCode, body);
      default:
        return new ApiError(
          "UnexpectedStatus",
          `Unexpected status ${statusCode}: ${detail}`,
          statusCode,
          body
        );
    }
  }

  /** True when the exchange answered with a non-2xx status */
  get isHttpError(): boolean {
    return this.statusCode !== undefined;
  }
}

/**
 * Error response format from the exchange.
 */
export interface ErrorResponse {
  error?: {
    code?: string;
    message?: string;
    details?: string;
  };
  message?: string;
}

/**
 * Best human-readable message for an error body; falls back to the raw text.
 */
export function describeBody(body: string): string {
  if (!body) {
    return "empty response body";
  }
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === "object" && parsed !== null) {
      const response = parsed as ErrorResponse;
      const message =
        response.error?.message || response.error?.details || response.message;
      if (message) {
        return response.error?.code ? `${response.error.code}: ${message}` : message;
      }
    }
  } catch {
    // not JSON; use the text as is
  }
  return body;
}
