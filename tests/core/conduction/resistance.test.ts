/**
 * Tests for slab resistance/conductivity conversion
 */

import { describe, test, expect } from "vitest";
import { rToK, kToR } from "../../../src/core/conduction/resistance.ts";

describe("rToK", () => {
  test("per unit area by default", () => {
    expect(rToK(0.05, 0.025)).toBe(0.5);
  });

  test("divides by area", () => {
    // 0.1 / (2 * 0.1)
    expect(rToK(0.1, 0.1, 2)).toBe(0.5);
  });

  test("zero resistance gives infinite conductivity", () => {
    expect(rToK(0, 0.025)).toBe(Infinity);
  });
});

describe("kToR", () => {
  test("per unit area by default", () => {
    expect(kToR(0.5, 0.025)).toBe(0.05);
  });

  test("divides by area", () => {
    // 0.1 / (0.5 * 2)
    expect(kToR(0.5, 0.1, 2)).toBe(0.1);
  });

  test("zero area gives infinite resistance", () => {
    expect(kToR(0.5, 0.025, 0)).toBe(Infinity);
  });
});

describe("round trip", () => {
  const cases: Array<[number, number, number]> = [
    [0.05, 0.025, 1],
    [2.5, 0.2, 3.7],
    [1e-3, 0.01, 0.25],
    [12, 1.5, 40],
  ];

  test.each(cases)("kToR(rToK(%f, t, A)) returns R", (R, t, A) => {
    expect(kToR(rToK(R, t, A), t, A)).toBeCloseTo(R, 12);
  });
});
