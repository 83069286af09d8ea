import type { HeatTransferResult } from '../schema/CombustionInputV1';
import { CONVECTION, KELVIN_OFFSET, REFRACTORY } from '../constants';

/**
 * Stage 7: heat loss through the refractory-lined duct wall.
 *
 * Three resistances in series per metre of duct (K·m/W):
 *   R_int  = 1 / (h_int·π·D)
 *   R_cond = ln((D/2 + t)/(D/2)) / (2π·k)
 *   R_ext  = 1 / (h_ext·π·(D + 2t))
 *
 * The loss is apportioned across the resistances to get the outer wall
 * temperature and the drop across the refractory. Insulation efficiency
 * compares against a bare duct losing h_ext·π·D·ΔT.
 *
 * A duct with no diameter has no wall: every quantity is 0 and the wall
 * sits at ambient.
 */
export function runHeatTransferModule(
  ductDiameterM: number,
  outletGasTempK: number,
  ambientTempC: number,
): HeatTransferResult {
  if (ductDiameterM <= 0) {
    return {
      internalConvectionResistance: 0,
      conductionResistance: 0,
      externalConvectionResistance: 0,
      thermalResistance: 0,
      heatTransferCoefficient: 0,
      heatLossPerMeterW: 0,
      externalWallTempC: ambientTempC,
      refractoryGradientC: 0,
      insulationEfficiencyPct: 0,
    };
  }

  const { thicknessM, thermalConductivity } = REFRACTORY;
  const radiusM = ductDiameterM / 2;

  const internalConvectionResistance = 1 / (CONVECTION.internalWm2K * Math.PI * ductDiameterM);
  const conductionResistance =
    Math.log((radiusM + thicknessM) / radiusM) / (2 * Math.PI * thermalConductivity);
  const externalConvectionResistance =
    1 / (CONVECTION.externalWm2K * Math.PI * (ductDiameterM + 2 * thicknessM));

  const thermalResistance =
    internalConvectionResistance + conductionResistance + externalConvectionResistance;
  const heatTransferCoefficient = 1 / thermalResistance;

  const deltaT = outletGasTempK - (ambientTempC + KELVIN_OFFSET);
  const heatLossPerMeterW = heatTransferCoefficient * deltaT;

  const bareDuctLossW = CONVECTION.externalWm2K * Math.PI * ductDiameterM * deltaT;
  const insulationEfficiencyPct =
    bareDuctLossW !== 0 ? ((bareDuctLossW - heatLossPerMeterW) / bareDuctLossW) * 100 : 0;

  return {
    internalConvectionResistance,
    conductionResistance,
    externalConvectionResistance,
    thermalResistance,
    heatTransferCoefficient,
    heatLossPerMeterW,
    externalWallTempC: ambientTempC + heatLossPerMeterW * externalConvectionResistance,
    refractoryGradientC: heatLossPerMeterW * conductionResistance,
    insulationEfficiencyPct,
  };
}
