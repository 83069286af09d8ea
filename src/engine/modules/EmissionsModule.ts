import type {
  EmissionsResult,
  ProductMasses,
  WetBasisComposition,
} from '../schema/CombustionInputV1';
import { FUEL_BULK_DENSITY_KG_M3 } from '../constants';

const CO2_PER_CARBON = 44 / 12;

/** Stage 8: emission factor and dry CO2 share of the flue gas. */
export function runEmissionsModule(
  compositionWet: WetBasisComposition,
  products: ProductMasses,
  pciKjKg: number,
): EmissionsResult {
  const dryGases = products.co2 + products.o2 + products.n2 + products.so2;

  return {
    co2EmissionFactorKgKg: (CO2_PER_CARBON * compositionWet.carbonPct) / 100,
    co2ConcentrationDryPct: dryGases > 0 ? (products.co2 / dryGases) * 100 : 0,
    volumetricHeatingValueKjM3: pciKjKg * FUEL_BULK_DENSITY_KG_M3,
  };
}
