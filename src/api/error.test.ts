import { describe, it, expect } from "vitest";
import { ApiError, describeBody } from "./error";

describe("ApiError", () => {
  describe("fromStatus", () => {
    it.each([
      [400, "BadRequest"],
      [401, "Unauthorized"],
      [403, "Forbidden"],
      [404, "NotFound"],
      [409, "Conflict"],
      [429, "RateLimited"],
      [500, "ServerError"],
      [503, "ServerError"],
      [418, "UnexpectedStatus"],
    ] as const)("maps %i to %s", (status, variant) => {
      const error = ApiError.fromStatus(status, "");
      expect(error.variant).toBe(variant);
      expect(error.statusCode).toBe(status);
      expect(error.isHttpError).toBe(true);
    });

    it("keeps the body verbatim", () => {
      const body = '{"error":{"code":"insufficient_balance","message":"not enough funds"}}';
      const error = ApiError.fromStatus(400, body);

      expect(error.body).toBe(body);
      expect(error.message).toBe("Bad request: insufficient_balance: not enough funds");
    });

    it("falls back to the raw text for non-JSON bodies", () => {
      const error = ApiError.fromStatus(502, "<html>bad gateway</html>");
      expect(error.message).toBe("Server error 502: <html>bad gateway</html>");
      expect(error.body).toBe("<html>bad gateway</html>");
    });
  });

  it("creates transport errors without a status", () => {
    const error = ApiError.transport("socket hang up");
    expect(error.variant).toBe("Transport");
    expect(error.message).toBe("Transport error: socket hang up");
    expect(error.isHttpError).toBe(false);
  });

  it("is an Error", () => {
    const error = ApiError.invalidParameter("x");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ApiError");
    expect(error.message).toBe("Invalid parameter: x");
  });
});

describe("describeBody", () => {
  it("describes an empty body", () => {
    expect(describeBody("")).toBe("empty response body");
  });

  it("uses the top-level message", () => {
    expect(describeBody('{"message":"market closed"}')).toBe("market closed");
  });

  it("uses error details when there is no message", () => {
    expect(describeBody('{"error":{"details":"limit too high"}}')).toBe("limit too high");
  });

  it("returns JSON without a message unchanged", () => {
    expect(describeBody('{"ok":false}')).toBe('{"ok":false}');
  });
});
