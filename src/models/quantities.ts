/**
 * Input shapes and validators for the conduction formulas.
 *
 * The formulas themselves never throw; invalid inputs come back as
 * Infinity or NaN. Callers that want to reject such inputs up front run
 * the matching validator, which returns a list of messages (empty when
 * the input is valid).
 *
 * Copyright (C) 2026, heat-conduction Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

// ============================================================================
// Slab - a flat layer of given thickness and area
// ============================================================================

export interface Slab {
  /** Thickness in metres */
  t: number;
  /** Area in m²; 1 when values are per unit area */
  A: number;
  /** Thermal resistance in K/W, when known */
  R?: number;
  /** Thermal conductivity in W/(m·K), when known */
  k?: number;
}

// ============================================================================
// CylinderGeometry - a cylindrical shell
// ============================================================================

export interface CylinderGeometry {
  /** Inner diameter in metres */
  Di: number;
  /** Outer diameter in metres */
  Do: number;
  /** Thermal conductivity in W/(m·K) */
  k: number;
  /** Length in metres */
  L: number;
}

function checkPositive(errors: string[], value: number, name: string): void {
  if (Number.isNaN(value)) {
    errors.push(`${name} must be specified.`);
  } else if (!Number.isFinite(value)) {
    errors.push(`${name} must be finite.`);
  } else if (value <= 0) {
    errors.push(`${name} must be positive.`);
  }
}

/**
 * Validate a thermal conductivity
 */
export function validateConductivity(k: number): string[] {
  const errors: string[] = [];
  checkPositive(errors, k, "Thermal conductivity");
  return errors;
}

/**
 * Validate an R-value (either unit system)
 */
export function validateRValue(rValue: number): string[] {
  const errors: string[] = [];
  checkPositive(errors, rValue, "R-value");
  return errors;
}

/**
 * Validate a slab before converting between its resistance and
 * conductivity
 */
export function validateSlab(slab: Slab): string[] {
  const errors: string[] = [];

  checkPositive(errors, slab.t, "Thickness");
  checkPositive(errors, slab.A, "Area");

  if (slab.R !== undefined) {
    checkPositive(errors, slab.R, "Thermal resistance");
  }
  if (slab.k !== undefined) {
    checkPositive(errors, slab.k, "Thermal conductivity");
  }

  return errors;
}

/**
 * Validate a cylindrical shell
 */
export function validateCylinder(cylinder: CylinderGeometry): string[] {
  const errors: string[] = [];

  checkPositive(errors, cylinder.Di, "Inner diameter");
  checkPositive(errors, cylinder.Do, "Outer diameter");

  // Only meaningful once both diameters are usable
  if (errors.length === 0 && cylinder.Do <= cylinder.Di) {
    errors.push("Outer diameter must be larger than inner diameter.");
  }

  checkPositive(errors, cylinder.k, "Thermal conductivity");
  checkPositive(errors, cylinder.L, "Length");

  return errors;
}
