/**
 * Tests for raw argv helpers.
 * @module tests/unit/cli/utils/args
 */

import { describe, it, expect } from "vitest";
import { pathFlag, rawFlagValue } from "../../../../src/cli/utils/args.js";

describe("rawFlagValue()", () => {
  it("should read --flag value", () => {
    expect(rawFlagValue(["node", "cli", "--out-dir", "007"], "--out-dir")).toBe(
      "007",
    );
  });

  it("should read --flag=value", () => {
    expect(rawFlagValue(["--out-dir=1e3"], "--out-dir")).toBe("1e3");
  });

  it("should return the last occurrence", () => {
    expect(
      rawFlagValue(["--out-dir", "01", "--out-dir=02"], "--out-dir"),
    ).toBe("02");
  });

  it("should stop at --", () => {
    expect(rawFlagValue(["--", "--out-dir", "007"], "--out-dir")).toBeUndefined();
  });

  it("should not match a longer flag name", () => {
    expect(rawFlagValue(["--out-dirs", "x"], "--out-dir")).toBeUndefined();
  });
});

describe("pathFlag()", () => {
  it("should keep strings and undefined as they are", () => {
    expect(pathFlag("out", ["--out-dir", "out"], "--out-dir")).toBe("out");
    expect(pathFlag(undefined, [], "--out-dir")).toBeUndefined();
  });

  it("should restore numeric-looking paths from argv", () => {
    expect(pathFlag(7, ["--out-dir", "007"], "--out-dir")).toBe("007");
    expect(pathFlag(31, ["--template=0x1F"], "--template")).toBe("0x1F");
  });

  it("should fall back to the parsed number when argv lacks the flag", () => {
    expect(pathFlag(7, [], "--out-dir")).toBe("7");
  });
});
