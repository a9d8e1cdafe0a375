/**
 * Input models for heat-conduction
 *
 * Copyright (C) 2026, heat-conduction Contributors.
 * License: GPL-3.0
 */

// Slab and cylinder inputs with their validators
export * from "./quantities.ts";
