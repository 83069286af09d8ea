import type { FuelComposition, StoichiometryResult } from '../schema/CombustionInputV1';
import { combustionProducts } from '../equations/combustion';

/** Stage 3: flue-gas product masses per kg of as-received fuel. */
export function runStoichiometryModule(
  fuel: FuelComposition,
  excessAirPct: number,
): StoichiometryResult {
  const result = combustionProducts(
    fuel.carbonPct,
    fuel.hydrogenPct,
    fuel.oxygenPct,
    fuel.sulfurPct,
    fuel.moisturePct,
    fuel.ashPct,
    excessAirPct,
  );

  return {
    products: result.products,
    ashKgKg: result.ashKgKg,
    realAirWetKgKg: result.realAirKgKg,
    totalGasKgKg: result.totalGasKgKg,
  };
}
