/**
 * Conduction module.
 *
 * Closed-form conversions between conductivity, resistance, resistivity
 * and R-value, and the resistance of a cylindrical shell.
 */

export { rToK, kToR } from "./resistance.ts";
export {
  kToThermalResistivity,
  thermalResistivityToK,
} from "./resistivity.ts";
export { rValueToK, kToRValue } from "./r-value.ts";
export { cylinderConductance, rCylinder } from "./cylinder.ts";
