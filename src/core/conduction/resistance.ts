/**
 * Conversion between thermal resistance and thermal conductivity of a
 * slab of known thickness.
 *
 * References:
 *   Bergman, T. L., Lavine, A. S., Incropera, F. P., DeWitt, D. P.,
 *       "Introduction to Heat Transfer," 6th ed., Wiley, 2011.
 *
 * Copyright (C) 2026, heat-conduction Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

/**
 * Thermal conductivity of a substance from its thickness and thermal
 * resistance: k = t / (R·A).
 *
 * Tabulated resistances are usually already divided by area, in which
 * case the default area of 1 m² applies.
 *
 * @param R Thermal resistance, K/W (or m²·K/W per unit area)
 * @param t Thickness used in the measurement of R, in metres
 * @param A Area, in m²
 * @returns Thermal conductivity in W/(m·K)
 */
export function rToK(R: number, t: number, A: number = 1.0): number {
  return t / (A * R);
}

/**
 * Thermal resistance of a substance from its thickness and thermal
 * conductivity: R = t / (k·A).
 *
 * @param k Thermal conductivity in W/(m·K)
 * @param t Thickness in metres
 * @param A Area, in m²
 * @returns Thermal resistance in K/W
 */
export function kToR(k: number, t: number, A: number = 1.0): number {
  return t / (k * A);
}
