import { describe, it, expect } from "vitest";
import {
  serializeHttp1Headers,
  validateHeaderName,
  validateMethod,
  validatePath,
} from "../../../src/utils/headers.js";

describe("Header Security Validation (CR/LF/NUL)", () => {
  describe("serializeHttp1Headers", () => {
    it("should serialize valid headers in the given order", () => {
      const result = serializeHttp1Headers([
        ["X-Sleep", "100"],
        ["X-Request", "4"],
      ]);
      expect(result).toBe("X-Sleep: 100\r\nX-Request: 4\r\n");
    });

    it("should keep repeated names", () => {
      const result = serializeHttp1Headers([
        ["Via", "a"],
        ["Via", "b"],
      ]);
      expect(result).toBe("Via: a\r\nVia: b\r\n");
    });

    it("should reject header name containing CR (\\r)", () => {
      expect(() => serializeHttp1Headers([["Bad\rName", "value"]])).toThrow(/Invalid header name/);
    });

    it("should reject header name containing LF (\\n)", () => {
      expect(() => serializeHttp1Headers([["Bad\nName", "value"]])).toThrow(/Invalid header name/);
    });

    it("should reject header value containing NUL (\\0)", () => {
      expect(() => serializeHttp1Headers([["X-Inject", "value\0hidden"]])).toThrow(
        /Invalid header.*CR\/LF\/NUL/,
      );
    });

    it("should reject CRLF injection attempt in value", () => {
      expect(() => serializeHttp1Headers([["X-Inject", "ok\r\nEvil-Header: pwned"]])).toThrow(
        /Invalid header.*CR\/LF\/NUL/,
      );
    });

    it("should handle an empty header list", () => {
      expect(serializeHttp1Headers([])).toBe("");
    });
  });

  describe("validateHeaderName", () => {
    it("should reject a name with a colon", () => {
      expect(() => validateHeaderName("X-Sleep:")).toThrow(/Invalid header name/);
    });
  });

  describe("validateMethod", () => {
    it("should accept GET", () => {
      expect(() => validateMethod("GET")).not.toThrow();
    });

    it("should reject a method with a space", () => {
      expect(() => validateMethod("GET /")).toThrow(/Invalid method/);
    });
  });

  describe("validatePath", () => {
    it("should reject CRLF in the path", () => {
      expect(() => validatePath("/\r\nX-Sleep: 1")).toThrow(/Invalid path/);
    });
  });
});
