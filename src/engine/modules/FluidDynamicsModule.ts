import type { FluidDynamicsResult, ProductMasses } from '../schema/CombustionInputV1';
import { CONVERSION, KELVIN_OFFSET, REFRACTORY } from '../constants';
import { gasMixtureDensity } from '../equations/combustion';
import {
  colebrookFrictionFactor,
  darcyPressureDropPerMeter,
  reynoldsNumber,
} from '../equations/flow';

export interface FluidDynamicsInput {
  products: ProductMasses;
  gasMassFlowKgS: number;
  outletGasTempK: number;
  ambientTempC: number;
  atmosphericPressureKpa: number;
  ductDiameterIn: number;
}

/**
 * Stage 6: flue-gas flow through the duct.
 *
 * Gas properties are evaluated at the mean of outlet and ambient temperature
 * and at local atmospheric pressure.
 */
export function runFluidDynamicsModule(input: FluidDynamicsInput): FluidDynamicsResult {
  const meanTempK = (input.outletGasTempK + input.ambientTempC + KELVIN_OFFSET) / 2;
  const pressurePa = input.atmosphericPressureKpa * CONVERSION.kpaToPa;

  const gasDensityKgM3 = gasMixtureDensity(meanTempK, pressurePa, input.products);
  const volumetricFlowM3S = gasDensityKgM3 > 0 ? input.gasMassFlowKgS / gasDensityKgM3 : 0;

  const ductDiameterM = input.ductDiameterIn * CONVERSION.inchToM;
  const ductAreaM2 = (Math.PI * ductDiameterM ** 2) / 4;
  const gasVelocityMs = ductAreaM2 > 0 ? volumetricFlowM3S / ductAreaM2 : 0;

  const re = reynoldsNumber(gasVelocityMs, ductDiameterM, gasDensityKgM3);
  const friction = colebrookFrictionFactor(re, ductDiameterM, REFRACTORY.roughnessM);
  const pressureDropPaM =
    ductDiameterM > 0
      ? darcyPressureDropPerMeter(friction.value, gasDensityKgM3, gasVelocityMs, ductDiameterM)
      : 0;

  return {
    gasDensityKgM3,
    volumetricFlowM3S,
    ductDiameterM,
    ductAreaM2,
    gasVelocityMs,
    reynoldsNumber: re,
    friction,
    pressureDropPaM,
  };
}
