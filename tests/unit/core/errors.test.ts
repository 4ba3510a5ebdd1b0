/**
 * Tests for ConfigurationError.
 * @module tests/unit/core/errors
 */

import { describe, it, expect } from "vitest";
import { ConfigurationError, templateNotFound } from "../../../src/errors.js";

describe("ConfigurationError", () => {
  it("should carry message, code and name", () => {
    const error = new ConfigurationError("bad count", "INVALID_COUNT");

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.message).toBe("bad count");
    expect(error.code).toBe("INVALID_COUNT");
    expect(error.name).toBe("ConfigurationError");
    expect(error.hint).toBeUndefined();
  });

  it("should keep hint and cause", () => {
    const cause = new Error("ENOENT");
    const error = new ConfigurationError("missing", "TEMPLATE_NOT_FOUND", {
      cause,
      hint: "create it",
    });

    expect(error.hint).toBe("create it");
    expect(error.cause).toBe(cause);
  });

  it("should identify itself with the type guard", () => {
    expect(
      ConfigurationError.isConfigurationError(
        new ConfigurationError("x", "INVALID_CONFIG"),
      ),
    ).toBe(true);
    expect(ConfigurationError.isConfigurationError(new Error("x"))).toBe(false);
    expect(ConfigurationError.isConfigurationError("x")).toBe(false);
  });

  it("should flag template errors", () => {
    expect(new ConfigurationError("x", "TEMPLATE_NOT_FOUND").isTemplateNotFound).toBe(true);
    expect(new ConfigurationError("x", "INVALID_COUNT").isTemplateNotFound).toBe(false);
  });
});

describe("templateNotFound()", () => {
  it("should name the missing path", () => {
    const error = templateNotFound(".agents/agent_prompt.md");

    expect(error.message).toBe("Template not found: .agents/agent_prompt.md");
    expect(error.code).toBe("TEMPLATE_NOT_FOUND");
    expect(error.hint).toBe(
      "Ensure .agents/agent_prompt.md exists or pass --template <path>",
    );
  });
});
