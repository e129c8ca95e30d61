import { describe, expect, it } from "vitest";
import { InternalError, McpConfigurationError, PACKAGE_NAME, ToolmeshError } from "../index.js";

describe("@toolmesh/errors", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@toolmesh/errors");
  });

  describe("ToolmeshError base class", () => {
    it("should create error with message", () => {
      const error = new InternalError("test error");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ToolmeshError);
      expect(error.message).toBe("test error");
      expect(error.name).toBe("InternalError");
    });

    it("should preserve stack trace", () => {
      const error = new InternalError("test error");
      expect(error.stack).toContain("InternalError");
    });

    it("should stamp a creation time", () => {
      const before = Date.now();
      const error = new McpConfigurationError("fs", "bad");
      expect(error.timestamp.getTime()).toBeGreaterThanOrEqual(before);
    });
  });
});
