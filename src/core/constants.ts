/**
 * Unit constants used by the conduction formulas.
 *
 * All values are expressed in SI base units (m, s, kg, J, K).
 *
 * Copyright (C) 2026, heat-conduction Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

/** One inch in metres */
export const INCH = 0.0254;

/** One foot in metres */
export const FOOT = 0.3048;

/** One hour in seconds */
export const HOUR = 3600.0;

/** One avoirdupois pound in kilograms */
export const POUND = 0.45359237;

/** One gram in kilograms */
export const GRAM = 1e-3;

/** One International Table calorie in joules */
export const CALORIE_IT = 4.1868;

/**
 * Size of one degree Fahrenheit in kelvin.
 * This is a temperature increment, not an affine temperature conversion.
 */
export const DEGREE_FAHRENHEIT = 1 / 1.8;

/** One International Table BTU in joules (~1055.05585262) */
export const BTU = (POUND * DEGREE_FAHRENHEIT * CALORIE_IT) / GRAM;

/**
 * Multiplier from an Imperial R-value, ft²·°F·h/(BTU·inch), to thermal
 * resistivity in m·K/W. Approximately 6.93347.
 */
export function imperialRValueFactor(): number {
  return (FOOT * FOOT * DEGREE_FAHRENHEIT * HOUR) / BTU / INCH;
}
