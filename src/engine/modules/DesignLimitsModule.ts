import type { CombustionResultV1, DesignLimitFlag } from '../../contracts/CombustionResultV1';
import { DESIGN_LIMITS } from '../constants';
import type { DesignLimits } from '../constants';

/** A limit missed by more than this fraction is a fail rather than a warning. */
const FAIL_MARGIN = 0.25;

function severityAbove(value: number, limit: number): DesignLimitFlag['severity'] {
  return value > limit * (1 + FAIL_MARGIN) ? 'fail' : 'warn';
}

function severityBelow(value: number, limit: number): DesignLimitFlag['severity'] {
  return value < limit * (1 - FAIL_MARGIN) ? 'fail' : 'warn';
}

/**
 * Compares a pipeline result against the duct and furnace design limits.
 * Values exactly at a limit pass.
 */
export function runDesignLimitsModule(
  result: CombustionResultV1,
  limits: DesignLimits = DESIGN_LIMITS,
): DesignLimitFlag[] {
  const flags: DesignLimitFlag[] = [];

  if (result.gasVelocityMs > limits.maxVelocityMs) {
    flags.push({
      id: 'gas_velocity',
      severity: severityAbove(result.gasVelocityMs, limits.maxVelocityMs),
      title: 'Flue-gas velocity above design limit',
      detail:
        `Duct velocity ${result.gasVelocityMs.toFixed(1)} m/s exceeds ` +
        `${limits.maxVelocityMs} m/s. Expect erosion and high draft fan load.`,
      action: 'Increase the duct diameter or reduce the fuel flow rate.',
    });
  }

  if (result.pressureDropPaM > limits.maxPressureDropPaM) {
    flags.push({
      id: 'pressure_drop',
      severity: severityAbove(result.pressureDropPaM, limits.maxPressureDropPaM),
      title: 'Duct pressure drop above design limit',
      detail:
        `Pressure drop ${result.pressureDropPaM.toFixed(1)} Pa/m exceeds ` +
        `${limits.maxPressureDropPaM} Pa/m.`,
      action: 'Increase the duct diameter.',
    });
  }

  if (result.realEfficiencyPct < limits.minEfficiencyPct) {
    flags.push({
      id: 'furnace_efficiency',
      severity: severityBelow(result.realEfficiencyPct, limits.minEfficiencyPct),
      title: 'Furnace efficiency below design minimum',
      detail:
        `Efficiency ${result.realEfficiencyPct.toFixed(1)}% is below the ` +
        `${limits.minEfficiencyPct}% minimum.`,
      action: 'Review excess air and fuel moisture.',
    });
  }

  if (result.externalWallTempC > limits.maxExternalWallTempC) {
    flags.push({
      id: 'external_wall_temp',
      severity: severityAbove(result.externalWallTempC, limits.maxExternalWallTempC),
      title: 'External wall temperature above safe touch limit',
      detail:
        `Outer duct wall reaches ${result.externalWallTempC.toFixed(1)}°C, above ` +
        `${limits.maxExternalWallTempC}°C.`,
      action: 'Add insulation or increase refractory thickness.',
    });
  }

  return flags;
}
