/**
 * Input validation utilities for the REST client.
 */

import { ApiError } from "./error";

/** Maximum allowed pagination limit */
export const MAX_PAGINATION_LIMIT = 1000;

/**
 * Validate a request path: absolute, no whitespace.
 * @throws {ApiError} If the path is malformed
 */
export function validatePath(path: string): void {
  if (!path.startsWith("/")) {
    throw ApiError.invalidParameter(`path must start with "/", got "${path}"`);
  }
  if (/\s/.test(path)) {
    throw ApiError.invalidParameter("path cannot contain whitespace");
  }
}

/**
 * Validate a market, event or series ticker.
 * @throws {ApiError} If the ticker is empty or contains a path separator
 */
export function validateTicker(value: string, fieldName: string): void {
  if (!value || value.trim().length === 0) {
    throw ApiError.invalidParameter(`${fieldName} cannot be empty`);
  }
  if (/[\s/?#]/.test(value)) {
    throw ApiError.invalidParameter(`${fieldName} contains invalid characters`);
  }
}

/**
 * Validate an identifier used as a path segment (order id, order group id).
 * @throws {ApiError} If the id is empty
 */
export function validateId(value: string, fieldName: string): void {
  if (!value || value.trim().length === 0) {
    throw ApiError.invalidParameter(`${fieldName} cannot be empty`);
  }
}

/**
 * Validate pagination limit (1-1000).
 * @throws {ApiError} If the limit is out of bounds
 */
export function validateLimit(limit: number | undefined): void {
  if (
    limit !== undefined &&
    (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGINATION_LIMIT)
  ) {
    throw ApiError.invalidParameter(`Limit must be 1-${MAX_PAGINATION_LIMIT}`);
  }
}
