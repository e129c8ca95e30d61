import { describe, expect, it } from "vitest";
import {
  getErrorMessage,
  InternalError,
  McpTransportError,
  toError,
  wrapError,
} from "../../index.js";

describe("wrapError", () => {
  it("passes toolmesh errors through", () => {
    const error = new McpTransportError("closed");
    expect(wrapError(error)).toBe(error);
  });

  it("wraps plain errors as InternalError with the original name", () => {
    const original = new TypeError("undefined is not a function");
    const wrapped = wrapError(original, "trace-9");

    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("undefined is not a function");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
    expect(wrapped.traceId).toBe("trace-9");
    expect(wrapped.cause).toBe(original);
  });

  it("wraps strings and unknown values", () => {
    expect(wrapError("plain text").message).toBe("plain text");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });
});

describe("getErrorMessage", () => {
  it("reads messages from errors and strings", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
    expect(getErrorMessage("text")).toBe("text");
    expect(getErrorMessage({ message: "not an error" })).toBe("An unknown error occurred");
  });
});

describe("toError", () => {
  it("returns errors unchanged", () => {
    const error = new Error("x");
    expect(toError(error)).toBe(error);
  });

  it("wraps other values", () => {
    const error = toError("went wrong");
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe("went wrong");
  });
});
