import { describe, expect, it } from "vitest";
import { internalTokenMatches } from "../../plugins/internal-auth.js";

describe("internalTokenMatches", () => {
  it("accepts the configured token", () => {
    expect(internalTokenMatches("test-internal-token", "test-internal-token")).toBe(true);
  });

  it("rejects a different token of any length", () => {
    expect(internalTokenMatches("test-internal-token", "test-internal-tokeN")).toBe(false);
    expect(internalTokenMatches("test-internal-token", "short")).toBe(false);
  });

  it("rejects everything when no token is configured", () => {
    expect(internalTokenMatches(undefined, "anything")).toBe(false);
    expect(internalTokenMatches("test-internal-token", undefined)).toBe(false);
  });
});
