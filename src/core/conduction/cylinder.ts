/**
 * Steady radial conduction through a cylindrical shell of constant
 * thermal conductivity.
 *
 *   (hA) = 2πLk / ln(Do/Di)
 *   R    = 1 / (hA) = ln(Do/Di) / (2πLk)
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
 * Thermal conductance (hA) of a cylindrical shell.
 *
 * Requires Do > Di > 0. Equal diameters give ln(1) = 0 and an infinite
 * conductance.
 *
 * @param Di Inner diameter in metres
 * @param Do Outer diameter in metres
 * @param k Thermal conductivity of the shell in W/(m·K)
 * @param L Length in metres
 * @returns Conductance in W/K
 */
export function cylinderConductance(
  Di: number,
  Do: number,
  k: number,
  L: number
): number {
  return (k * 2 * Math.PI * L) / Math.log(Do / Di);
}

/**
 * Thermal resistance of a cylindrical shell.
 *
 * Equal diameters have no wall to conduct through and return NaN.
 *
 * @param Di Inner diameter in metres
 * @param Do Outer diameter in metres
 * @param k Thermal conductivity of the shell in W/(m·K)
 * @param L Length in metres
 * @returns Thermal resistance in K/W
 */
export function rCylinder(Di: number, Do: number, k: number, L: number): number {
  if (Math.log(Do / Di) === 0) {
    return Number.NaN;
  }
  const hA = cylinderConductance(Di, Do, k, L);
  return 1.0 / hA;
}
