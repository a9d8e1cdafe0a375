/**
 * Reference Value Tests
 *
 * Pins the documented worked values of each formula. R-value results
 * depend on the BTU definition at the last digits, so they are compared
 * to 15 decimal places.
 */

import { describe, test, expect } from "vitest";
import {
  rToK,
  kToR,
  kToThermalResistivity,
  thermalResistivityToK,
  rValueToK,
  kToRValue,
  rCylinder,
} from "../../src/index.ts";

describe("Reference values - resistance and resistivity", () => {
  test("rToK(R=0.05, t=0.025)", () => {
    expect(rToK(0.05, 0.025)).toBe(0.5);
  });

  test("kToR(k=0.5, t=0.025)", () => {
    expect(kToR(0.5, 0.025)).toBe(0.05);
  });

  test("kToThermalResistivity(0.25)", () => {
    expect(kToThermalResistivity(0.25)).toBe(4.0);
  });

  test("thermalResistivityToK(4)", () => {
    expect(thermalResistivityToK(4)).toBe(0.25);
  });
});

describe("Reference values - R-value", () => {
  test("rValueToK(0.12) in SI", () => {
    expect(rValueToK(0.12)).toBeCloseTo(0.2116666666666667, 15);
  });

  test("rValueToK(0.71) in Imperial units", () => {
    expect(rValueToK(0.71, false)).toBeCloseTo(0.20313787163983468, 15);
  });

  test("Imperial to SI ratio", () => {
    expect(rValueToK(1, false) / rValueToK(1)).toBeCloseTo(5.678263341113488, 13);
  });

  test("kToRValue inverts both examples", () => {
    expect(kToRValue(rValueToK(0.12))).toBeCloseTo(0.11999999999999998, 15);
    expect(kToRValue(rValueToK(0.71, false), false)).toBeCloseTo(0.7099999999999999, 15);
  });
});

describe("Reference values - cylinder", () => {
  test("rCylinder(Di=0.9, Do=1.0, k=20, L=10)", () => {
    expect(rCylinder(0.9, 1.0, 20, 10)).toBeCloseTo(8.38432343682705e-5, 18);
  });

  test("rCylinder with Do == Di is non-finite", () => {
    expect(Number.isFinite(rCylinder(1.0, 1.0, 20, 10))).toBe(false);
  });
});
