import { describe, it, expect } from "vitest";
import { constants, createPrivateKey, createPublicKey, verify } from "node:crypto";
import {
  Signer,
  SigningError,
  canonicalMessage,
  createCredential,
  loadPrivateKey,
  stripQuery,
} from "./auth";
import { HEADERS } from "./shared/constants";
import { TEST_KEY_ID, ecPrivateKeyPem, rsaKeyPair, testCredential } from "../test/keys";

function verifyPss(message: string, signature: Buffer, saltLength: number): boolean {
  return verify(
    "sha256",
    Buffer.from(message, "utf8"),
    {
      key: rsaKeyPair().publicKey,
      padding: constants.RSA_PKCS1_PSS_PADDING,
      saltLength,
    },
    signature
  );
}

function expectSigningError(fn: () => unknown, variant: SigningError["variant"]): SigningError {
  try {
    fn();
  } catch (e) {
    expect(e).toBeInstanceOf(SigningError);
    if (e instanceof SigningError) {
      expect(e.variant).toBe(variant);
      return e;
    }
  }
  throw new Error("expected a SigningError");
}

describe("canonicalMessage", () => {
  it("joins timestamp, uppercase method and path", () => {
    expect(canonicalMessage(1700000000000, "get", "/trade-api/v2/portfolio/balance")).toBe(
      "1700000000000GET/trade-api/v2/portfolio/balance"
    );
  });

  it("drops the query string", () => {
    expect(canonicalMessage(1, "GET", "/trade-api/v2/markets?limit=5&status=open")).toBe(
      "1GET/trade-api/v2/markets"
    );
  });

  it("rejects non-integer timestamps", () => {
    const error = expectSigningError(() => canonicalMessage(1.5, "GET", "/x"), "SignFailed");
    expect(error.message).toBe(
      "RSA-PSS signing failed: timestamp must be a non-negative integer, got 1.5"
    );
  });
});

describe("stripQuery", () => {
  it("leaves paths without a query alone", () => {
    expect(stripQuery("/trade-api/ws/v2")).toBe("/trade-api/ws/v2");
  });
});

describe("loadPrivateKey", () => {
  it("accepts an RSA private key", () => {
    expect(loadPrivateKey(rsaKeyPair().privateKey).asymmetricKeyType).toBe("rsa");
  });

  it("rejects unreadable text", () => {
    expectSigningError(() => loadPrivateKey("not a key"), "InvalidKey");
  });

  it("rejects a public key", () => {
    expectSigningError(() => loadPrivateKey(rsaKeyPair().publicKey), "InvalidKey");
  });

  it("rejects a non-RSA key", () => {
    const error = expectSigningError(() => loadPrivateKey(ecPrivateKeyPem()), "WrongKeyType");
    expect(error.message).toBe("Expected an RSA private key, got ec");
  });
});

describe("createCredential", () => {
  it("rejects an empty key id", () => {
    const error = expectSigningError(
      () => createCredential("", rsaKeyPair().privateKey),
      "InvalidKey"
    );
    expect(error.message).toBe("Invalid key material: key id cannot be empty");
  });
});

describe("Signer", () => {
  const signer = new Signer(testCredential());

  it("produces RSA-PSS SHA-256 signatures with digest-length salt", () => {
    const signature = signer.sign(1700000000000, "GET", "/trade-api/v2/portfolio/balance");
    const message = "1700000000000GET/trade-api/v2/portfolio/balance";

    expect(signature).toHaveLength(256);
    expect(verifyPss(message, signature, constants.RSA_PSS_SALTLEN_DIGEST)).toBe(true);
    expect(verifyPss(message, signature, 32)).toBe(true);
  });

  it("signature does not verify for another method or path", () => {
    const signature = signer.sign(1700000000000, "GET", "/trade-api/v2/portfolio/balance");

    expect(
      verifyPss("1700000000000POST/trade-api/v2/portfolio/balance", signature, 32)
    ).toBe(false);
    expect(verifyPss("1700000000000GET/trade-api/v2/markets", signature, 32)).toBe(false);
  });

  it("ignores the query string", () => {
    const signature = signer.sign(42, "GET", "/trade-api/v2/markets?limit=5");
    expect(verifyPss("42GET/trade-api/v2/markets", signature, 32)).toBe(true);
  });

  it("captures a frozen request context", () => {
    const context = signer.signRequest(7, "delete", "/trade-api/v2/portfolio/orders/abc?x=1");

    expect(Object.isFrozen(context)).toBe(true);
    expect(context.method).toBe("DELETE");
    expect(context.path).toBe("/trade-api/v2/portfolio/orders/abc");
    expect(context.timestampMs).toBe(7);
    expect(verifyPss("7DELETE/trade-api/v2/portfolio/orders/abc", context.signature, 32)).toBe(
      true
    );
  });

  it("builds the authentication headers", () => {
    const context = signer.signRequest(1700000000000, "GET", "/trade-api/ws/v2");
    const headers = signer.headers(context);

    expect(Object.keys(headers).sort()).toEqual(
      [HEADERS.KEY, HEADERS.SIGNATURE, HEADERS.TIMESTAMP].sort()
    );
    expect(headers[HEADERS.KEY]).toBe(TEST_KEY_ID);
    expect(headers[HEADERS.TIMESTAMP]).toBe("1700000000000");
    expect(
      verifyPss(
        "1700000000000GET/trade-api/ws/v2",
        Buffer.from(headers[HEADERS.SIGNATURE], "base64"),
        32
      )
    ).toBe(true);
  });

  it("refuses a credential holding a public key", () => {
    const error = expectSigningError(
      () =>
        new Signer({ keyId: TEST_KEY_ID, privateKey: createPublicKey(rsaKeyPair().publicKey) }),
      "WrongKeyType"
    );
    expect(error.message).toBe("Expected an RSA private key, got public key");
  });

  it("refuses a credential holding a non-RSA key", () => {
    expectSigningError(
      () => new Signer({ keyId: TEST_KEY_ID, privateKey: createPrivateKey(ecPrivateKeyPem()) }),
      "WrongKeyType"
    );
  });
});
