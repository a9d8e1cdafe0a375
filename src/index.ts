/**
 * heat-conduction - Thermal conduction formulas
 *
 * Closed-form conversions between thermal conductivity, thermal
 * resistance, thermal resistivity and R-value, and the thermal
 * resistance of a cylindrical shell.
 *
 * Copyright (C) 2026, heat-conduction Contributors.
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 */

// Core exports
export * from "./core/index.ts";

// Model exports
export {
  type Slab,
  type CylinderGeometry,
  validateConductivity,
  validateRValue,
  validateSlab,
  validateCylinder,
} from "./models/index.ts";

// Version info
export const VERSION = "0.1.0";
