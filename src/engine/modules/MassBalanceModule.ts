import type { MassBalanceResult } from '../schema/CombustionInputV1';
import { CONVERSION } from '../constants';

/**
 * Stage 4: mass flows.
 * Gas mass flow = fuel flow × (1 + real air ratio).
 */
export function runMassBalanceModule(flowRateTph: number, realAirKgKg: number): MassBalanceResult {
  const fuelFlowKgS = (flowRateTph * CONVERSION.tonToKg) / CONVERSION.hourToSec;
  return {
    fuelFlowKgS,
    gasMassFlowKgS: fuelFlowKgS * (1 + realAirKgKg),
  };
}
