import type { FuelComposition, FuelPropertiesResult } from '../schema/CombustionInputV1';
import { dulongHeatingValue, theoreticalAirFuelRatio } from '../equations/combustion';

/**
 * Stage 1: fuel properties.
 *
 * Wet-basis composition, Dulong PCS/PCI and the dry-basis air requirement
 * (theoretical and with the configured excess).
 */
export function runFuelPropertiesModule(
  fuel: FuelComposition,
  excessAirPct: number,
): FuelPropertiesResult {
  const moistureFactor = (100 - fuel.moisturePct) / 100;

  const heating = dulongHeatingValue(
    fuel.carbonPct,
    fuel.hydrogenPct,
    fuel.oxygenPct,
    fuel.sulfurPct,
    fuel.ashPct,
    fuel.moisturePct,
  );

  const theoreticalAirKgKg = theoreticalAirFuelRatio(
    fuel.carbonPct,
    fuel.hydrogenPct,
    fuel.oxygenPct,
    fuel.sulfurPct,
  );

  return {
    compositionWet: {
      carbonPct:   fuel.carbonPct   * moistureFactor,
      hydrogenPct: fuel.hydrogenPct * moistureFactor,
      oxygenPct:   fuel.oxygenPct   * moistureFactor,
      nitrogenPct: fuel.nitrogenPct * moistureFactor,
      sulfurPct:   fuel.sulfurPct   * moistureFactor,
      ashPct:      fuel.ashPct      * moistureFactor,
      waterPct:    fuel.moisturePct,
    },
    pcsKjKg: heating.pcsKjKg,
    pciKjKg: heating.pciKjKg,
    waterFromCombustion: heating.waterFromCombustion,
    theoreticalAirKgKg,
    realAirKgKg: theoreticalAirKgKg * (1 + excessAirPct / 100),
    heatingValueRenormalized: heating.renormalized,
  };
}
