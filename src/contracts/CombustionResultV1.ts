import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';
import type { FlowRegime } from '../engine/schema/CombustionInputV1';

export interface SolverStatusV1 {
  flameTemperatureConverged: boolean;
  flameTemperatureIterations: number;
  frictionFactorConverged: boolean;
  frictionFactorIterations: number;
}

/**
 * Flat, frozen result of one pipeline run.
 *
 * Units: energies MW, temperatures as labelled, product masses kg per kg of
 * as-received fuel, fractions %.
 */
export interface CombustionResultV1 {
  // fuel properties
  pcsKjKg: number;
  pciKjKg: number;
  heatingValueRenormalized: boolean;
  carbonWetPct: number;
  hydrogenWetPct: number;
  oxygenWetPct: number;
  nitrogenWetPct: number;
  sulfurWetPct: number;
  ashWetPct: number;
  waterWetPct: number;
  waterFromCombustion: number;

  // air properties
  atmosphericPressureKpa: number;
  airDensityKgM3: number;
  absoluteHumidityKgKg: number;
  airEnthalpyKjKg: number;

  // stoichiometry
  theoreticalAirKgKg: number;
  realAirKgKg: number;
  excessAirPct: number;

  // combustion products
  co2KgKg: number;
  h2oKgKg: number;
  so2KgKg: number;
  o2KgKg: number;
  n2KgKg: number;
  ashKgKg: number;
  totalGasKgKg: number;

  // volumetric fractions
  co2VolPct: number;
  h2oVolPct: number;
  so2VolPct: number;
  o2VolPct: number;
  n2VolPct: number;

  // energy
  totalEnergyMw: number;
  usefulEnergyMw: number;
  chimneyLossesMw: number;
  adiabaticFlameTempK: number;
  outletGasTempK: number;
  realEfficiencyPct: number;

  // fluid dynamics
  gasDensityKgM3: number;
  volumetricFlowM3S: number;
  ductDiameterM: number;
  ductAreaM2: number;
  gasVelocityMs: number;
  reynoldsNumber: number;
  frictionFactor: number;
  frictionRegime: FlowRegime;
  pressureDropPaM: number;

  // heat transfer
  thermalResistance: number;
  heatTransferCoefficient: number;
  heatLossPerMeterW: number;
  externalWallTempC: number;
  refractoryGradientC: number;
  insulationEfficiencyPct: number;

  // emissions
  co2EmissionFactorKgKg: number;
  co2ConcentrationDryPct: number;
  volumetricHeatingValueKjM3: number;

  // mass flows
  fuelFlowKgS: number;
  gasMassFlowKgS: number;

  solverStatus: SolverStatusV1;
}

export type DesignLimitId =
  | 'gas_velocity'
  | 'pressure_drop'
  | 'furnace_efficiency'
  | 'external_wall_temp';

export interface DesignLimitFlag {
  id: DesignLimitId;
  severity: 'warn' | 'fail';
  title: string;
  detail: string;
  action?: string;
}

export interface CombustionEngineOutputV1 {
  meta: {
    engineVersion: typeof ENGINE_VERSION;
    contractVersion: typeof CONTRACT_VERSION;
  };
  result: CombustionResultV1;
  designLimits: DesignLimitFlag[];
  warnings: string[];
}
