/**
 * Thermal resistivity, the reciprocal of thermal conductivity.
 *
 * Not to be confused with thermal resistance: resistivity is a material
 * property in m·K/W, mostly quoted for solids.
 *
 * Copyright (C) 2026, heat-conduction Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

/**
 * @param k Thermal conductivity in W/(m·K)
 * @returns Thermal resistivity in m·K/W
 */
export function kToThermalResistivity(k: number): number {
  return 1.0 / k;
}

/**
 * @param r Thermal resistivity in m·K/W
 * @returns Thermal conductivity in W/(m·K)
 */
export function thermalResistivityToK(r: number): number {
  return 1.0 / r;
}
