/**
 * Tests for the shared rounding arithmetic.
 */
import { describe, it, expect } from "vitest";
import { mulDiv, mulDivUp } from "../src/math.js";

describe("mulDiv", () => {
  it("rounds down", () => {
    expect(mulDiv(10n, 1n, 3n)).toBe(3n);
    expect(mulDiv(9n, 1n, 3n)).toBe(3n);
  });
});

describe("mulDivUp", () => {
  it("rounds up", () => {
    expect(mulDivUp(10n, 1n, 3n)).toBe(4n);
  });

  it("is exact when the division is exact", () => {
    expect(mulDivUp(9n, 1n, 3n)).toBe(3n);
  });

  it("is zero for a zero product", () => {
    expect(mulDivUp(0n, 7n, 3n)).toBe(0n);
    expect(mulDivUp(7n, 0n, 3n)).toBe(0n);
  });
});
