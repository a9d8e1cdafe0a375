/**
 * R-value conversions.
 *
 * An R-value is a resistivity quoted per inch of thickness, either in SI
 * units of m²·K/(W·inch) or in Imperial units of ft²·°F·h/(BTU·inch).
 *
 * References:
 *   VDI e.V., "VDI Heat Atlas," 2nd ed., Springer, 2010.
 *
 * Copyright (C) 2026, heat-conduction Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

import {
  BTU,
  DEGREE_FAHRENHEIT,
  FOOT,
  HOUR,
  INCH,
  imperialRValueFactor,
} from "../constants.ts";
import {
  kToThermalResistivity,
  thermalResistivityToK,
} from "./resistivity.ts";

/**
 * Thermal conductivity of a substance from its R-value.
 *
 * SI R-values are divided by 0.0254 (one inch); Imperial R-values are
 * multiplied by ~6.93347. The resulting resistivity is then inverted.
 *
 * @param rValue R-value, m²·K/(W·inch) or ft²·°F·h/(BTU·inch)
 * @param si Whether rValue is in SI units
 * @returns Thermal conductivity in W/(m·K)
 */
export function rValueToK(rValue: number, si: boolean = true): number {
  let r: number;
  if (si) {
    r = rValue / INCH;
  } else {
    // Applied term by term, in this order, not via imperialRValueFactor()
    r = (rValue * (FOOT * FOOT) * DEGREE_FAHRENHEIT * HOUR) / BTU / INCH;
  }
  return thermalResistivityToK(r);
}

/**
 * R-value of a substance from its thermal conductivity. Inverse of
 * {@link rValueToK}.
 *
 * @param k Thermal conductivity in W/(m·K)
 * @param si Whether to return the R-value in SI units
 */
export function kToRValue(k: number, si: boolean = true): number {
  const r = kToThermalResistivity(k);
  if (si) {
    return r * INCH;
  }
  return r / imperialRValueFactor();
}
