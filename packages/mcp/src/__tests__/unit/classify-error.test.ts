import { describe, expect, it } from "vitest";
import { isClientErrorLike } from "../../transport/classify-error.js";

class HttpError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
  }
}

describe("isClientErrorLike", () => {
  it("returns false for null and undefined", () => {
    expect(isClientErrorLike(null)).toBe(false);
    expect(isClientErrorLike(undefined)).toBe(false);
  });

  describe("aggregates", () => {
    it("is true when any inner error is 4xx-like", () => {
      const error = new AggregateError([new Error("ECONNRESET"), new HttpError("nope", 404)]);
      expect(isClientErrorLike(error)).toBe(true);
    });

    it("is false when no inner error is", () => {
      const error = new AggregateError([new Error("ECONNRESET"), new HttpError("boom", 503)]);
      expect(isClientErrorLike(error)).toBe(false);
    });

    it("recurses into nested aggregates", () => {
      const inner = new AggregateError([new Error("401 Unauthorized")]);
      expect(isClientErrorLike(new AggregateError([inner]))).toBe(true);
    });

    it("survives cycles", () => {
      const error: { errors: unknown[] } = { errors: [] };
      error.errors.push(error);
      expect(isClientErrorLike(error)).toBe(false);
    });
  });

  describe("status fields", () => {
    it.each([400, 404, 499])("is true for status %i", (status) => {
      expect(isClientErrorLike(new HttpError("x", status))).toBe(true);
    });

    it.each([399, 500, 502])("is false for status %i", (status) => {
      expect(isClientErrorLike(new HttpError("x", status))).toBe(false);
    });

    it("trusts the status over a 4xx-looking message", () => {
      expect(isClientErrorLike(new HttpError("404 upstream", 503))).toBe(false);
    });

    it("accepts an HTTP-range numeric code", () => {
      expect(isClientErrorLike(Object.assign(new Error("x"), { code: 405 }))).toBe(true);
    });

    it("ignores JSON-RPC error codes", () => {
      expect(isClientErrorLike(Object.assign(new Error("boom"), { code: -32603 }))).toBe(false);
    });

    it.each(["status", "statusCode", "status_code"])("reads response.%s", (key) => {
      const error = Object.assign(new Error("x"), { response: { [key]: 406 } });
      expect(isClientErrorLike(error)).toBe(true);
    });

    it("is false for a 5xx response", () => {
      const error = Object.assign(new Error("x"), { response: { statusCode: 500 } });
      expect(isClientErrorLike(error)).toBe(false);
    });
  });

  describe("message text", () => {
    it.each([
      "HTTP 400",
      "Error POSTing to endpoint (HTTP 404): Not Found",
      "Method Not Allowed",
      "request was FORBIDDEN",
      "Request Timeout",
      "409 Conflict",
    ])("matches %s", (message) => {
      expect(isClientErrorLike(new Error(message))).toBe(true);
    });

    it.each(["fetch failed", "connect ECONNREFUSED 127.0.0.1:1", "HTTP 500"])(
      "does not match %s",
      (message) => {
        expect(isClientErrorLike(new Error(message))).toBe(false);
      },
    );

    it("classifies a thrown string", () => {
      expect(isClientErrorLike("401 unauthorized")).toBe(true);
    });
  });

  it("never throws on hostile getters", () => {
    const error = {
      get status(): number {
        throw new Error("getter exploded");
      },
      message: "not found",
    };
    expect(isClientErrorLike(error)).toBe(true);
  });
});
