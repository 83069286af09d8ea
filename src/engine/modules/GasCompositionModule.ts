import type { ProductMasses, VolumetricFractions } from '../schema/CombustionInputV1';
import { speciesMoles } from '../equations/combustion';

/**
 * Volumetric (molar) fractions of the five flue-gas species, in %.
 * All fractions are 0 when the mixture has no moles.
 */
export function runGasCompositionModule(products: ProductMasses): VolumetricFractions {
  const moles = speciesMoles(products);
  const totalMoles = moles.co2 + moles.h2o + moles.so2 + moles.o2 + moles.n2;

  if (totalMoles <= 0) {
    return { co2Pct: 0, h2oPct: 0, so2Pct: 0, o2Pct: 0, n2Pct: 0 };
  }

  return {
    co2Pct: (moles.co2 / totalMoles) * 100,
    h2oPct: (moles.h2o / totalMoles) * 100,
    so2Pct: (moles.so2 / totalMoles) * 100,
    o2Pct:  (moles.o2  / totalMoles) * 100,
    n2Pct:  (moles.n2  / totalMoles) * 100,
  };
}
