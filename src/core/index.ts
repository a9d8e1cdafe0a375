/**
 * Core functionality for heat-conduction
 *
 * Copyright (C) 2026, heat-conduction Contributors.
 * License: GPL-3.0
 */

// Unit constants
export * from "./constants.ts";

// Conduction formulas (resistance, resistivity, R-value, cylinder)
export * from "./conduction/index.ts";
