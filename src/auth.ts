/**
 * Request signing for Kalshi.
 *
 * Every REST request and the streaming handshake carry three headers:
 * the API key id, a millisecond timestamp, and an RSA-PSS signature over
 * `timestamp + METHOD + path`.
 *
 * # Signing Flow
 *
 * 1. Take one timestamp from the clock
 * 2. Strip the query string from the path
 * 3. Sign `String(timestampMs) + METHOD + path` with RSA-PSS / SHA-256
 *    (salt length = digest length)
 * 4. Base64-encode the signature into the headers
 */

import {
  constants,
  createPrivateKey,
  sign as cryptoSign,
  type KeyObject,
} from "node:crypto";
import { HEADERS } from "./shared/constants";

/**
 * Signing error variants.
 */
export type SigningErrorVariant =
  | "InvalidKey"
  | "WrongKeyType"
  | "SignFailed";

/**
 * Bad key material. Fatal; retrying cannot help.
 */
export class SigningError extends Error {
  readonly variant: SigningErrorVariant;

  constructor(variant: SigningErrorVariant, message: string) {
    super(message);
    this.name = "SigningError";
    this.variant = variant;
  }

  static invalidKey(message: string): SigningError {
    return new SigningError("InvalidKey", `Invalid key material: ${message}`);
  }

  static wrongKeyType(actual: string): SigningError {
    return new SigningError(
      "WrongKeyType",
      `Expected an RSA private key, got ${actual}`
    );
  }

  static signFailed(message: string): SigningError {
    return new SigningError("SignFailed", `RSA-PSS signing failed: ${message}`);
  }
}

/**
 * API key id plus the private key that signs for it.
 */
export interface Credential {
  keyId: string;
  privateKey: KeyObject;
}

/**
 * Everything needed to authenticate one request. Frozen on creation.
 */
export interface SignedRequestContext {
  readonly method: string;
  readonly path: string;
  readonly timestampMs: number;
  readonly signature: Buffer;
}

/**
 * Parse PEM (PKCS#1 or PKCS#8) into a private key object.
 *
 * @throws {SigningError} If the text is not a readable RSA private key
 */
export function loadPrivateKey(pem: string | Buffer): KeyObject {
  let key: KeyObject;
  try {
    key = createPrivateKey(pem);
  } catch (e) {
    throw SigningError.invalidKey(e instanceof Error ? e.message : String(e));
  }
  assertRsaPrivateKey(key);
  return key;
}

/**
 * Build a credential from a key id and PEM text.
 */
export function createCredential(keyId: string, pem: string | Buffer): Credential {
  if (!keyId) {
    throw SigningError.invalidKey("key id cannot be empty");
  }
  return { keyId, privateKey: loadPrivateKey(pem) };
}

function assertRsaPrivateKey(key: KeyObject): void {
  if (key.type !== "private") {
    throw SigningError.wrongKeyType(`${key.type} key`);
  }
  if (key.asymmetricKeyType !== "rsa") {
    throw SigningError.wrongKeyType(key.asymmetricKeyType ?? "unknown key type");
  }
}

/**
 * Remove the query string from a request path.
 */
export function stripQuery(path: string): string {
  const index = path.indexOf("?");
  return index === -1 ? path : path.slice(0, index);
}

/**
 * The exact string that gets signed.
 */
export function canonicalMessage(
  timestampMs: number,
  method: string,
  path: string
): string {
  if (!Number.isInteger(timestampMs) || timestampMs < 0) {
    throw SigningError.signFailed(`timestamp must be a non-negative integer, got ${timestampMs}`);
  }
  return `${timestampMs}${method.toUpperCase()}${stripQuery(path)}`;
}

/**
 * Signs requests with one credential. Holds no mutable state.
 */
export class Signer {
  private readonly credential: Credential;

  constructor(credential: Credential) {
    assertRsaPrivateKey(credential.privateKey);
    this.credential = credential;
  }

  get keyId(): string {
    return this.credential.keyId;
  }

  /**
   * Sign `timestampMs + METHOD + path`. PSS is randomized, so two calls with
   * the same input produce different (equally valid) signatures.
   *
   * @throws {SigningError} If the signing primitive fails
   */
  sign(timestampMs: number, method: string, path: string): Buffer {
    const message = canonicalMessage(timestampMs, method, path);
    try {
      return cryptoSign("sha256", Buffer.from(message, "utf8"), {
        key: this.credential.privateKey,
        padding: constants.RSA_PKCS1_PSS_PADDING,
        saltLength: constants.RSA_PSS_SALTLEN_DIGEST,
      });
    } catch (e) {
      throw SigningError.signFailed(e instanceof Error ? e.message : String(e));
    }
  }

  /**
   * Sign and capture the result as an immutable context.
   */
  signRequest(timestampMs: number, method: string, path: string): SignedRequestContext {
    const upper = method.toUpperCase();
    const bare = stripQuery(path);
    return Object.freeze({
      method: upper,
      path: bare,
      timestampMs,
      signature: this.sign(timestampMs, upper, bare),
    });
  }

  /**
   * Authentication headers for a signed context.
   */
  headers(context: SignedRequestContext): Record<string, string> {
    return {
      [HEADERS.KEY]: this.credential.keyId,
      [HEADERS.TIMESTAMP]: String(context.timestampMs),
      [HEADERS.SIGNATURE]: context.signature.toString("base64"),
    };
  }
}
