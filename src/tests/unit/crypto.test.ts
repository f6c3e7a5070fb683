import { describe, expect, it } from "vitest";
import { generateTemporarySecret, TEMPORARY_SECRET_LENGTH } from "../../libs/crypto.js";

describe("generateTemporarySecret", () => {
  it("creates a 16 character alphanumeric secret by default", () => {
    const secret = generateTemporarySecret();

    expect(TEMPORARY_SECRET_LENGTH).toBe(16);
    expect(secret).toMatch(/^[A-Za-z0-9]{16}$/);
  });

  it("honours a custom length", () => {
    expect(generateTemporarySecret(24)).toMatch(/^[A-Za-z0-9]{24}$/);
  });

  it("never repeats the previous secret over 10,000 draws", () => {
    let previous = generateTemporarySecret();
    let collisions = 0;

    for (let i = 0; i < 10_000; i++) {
      const next = generateTemporarySecret();
      if (next === previous) collisions += 1;
      previous = next;
    }

    expect(collisions).toBe(0);
  });

  it("rejects non-positive lengths", () => {
    expect(() => generateTemporarySecret(0)).toThrow(RangeError);
    expect(() => generateTemporarySecret(2.5)).toThrow(RangeError);
  });
});
