import type { SolverResult } from '../utils/solvers';

// ─── Inputs ───────────────────────────────────────────────────────────────────

/**
 * Ultimate analysis of the fuel.
 *
 * The six elemental/ash percentages are on a dry basis and are expected to sum
 * to 100 ± 0.5 (enforced by the boundary validator, not by the pipeline).
 * Moisture is on a total (as-received) basis.
 */
export interface FuelComposition {
  carbonPct: number;
  hydrogenPct: number;
  oxygenPct: number;
  nitrogenPct: number;
  sulfurPct: number;
  ashPct: number;
  moisturePct: number; // 0–60
}

export interface EnvironmentalConditions {
  altitudeM: number;           // m above sea level, 0–5000
  dryBulbTempC: number;        // °C, −20…50
  relativeHumidityPct: number; // %, 0–100
}

export interface OperatingParameters {
  flowRateTph: number;          // t/h of as-received biomass
  excessAirPct: number;         // % above stoichiometric
  furnaceEfficiencyPct: number; // %, 10–100
  reportedPciKjKg: number;      // kJ/kg, lab-reported lower heating value
  ductDiameterIn: number;       // in, internal diameter of the flue duct
}

export interface CombustionInputV1 {
  fuel: FuelComposition;
  environment: EnvironmentalConditions;
  operating: OperatingParameters;
}

// ─── Stage results ────────────────────────────────────────────────────────────

export interface WetBasisComposition {
  carbonPct: number;
  hydrogenPct: number;
  oxygenPct: number;
  nitrogenPct: number;
  sulfurPct: number;
  ashPct: number;
  waterPct: number;
}

export interface FuelPropertiesResult {
  compositionWet: WetBasisComposition;
  pcsKjKg: number;
  pciKjKg: number;
  waterFromCombustion: number; // 9H + moisture, % of fuel mass
  theoreticalAirKgKg: number;
  realAirKgKg: number;
  heatingValueRenormalized: boolean;
}

export interface AirPropertiesResult {
  atmosphericPressureKpa: number;
  airDensityKgM3: number;
  absoluteHumidityKgKg: number; // kg water / kg dry air
  airEnthalpyKjKg: number;      // kJ / kg dry air
}

/** Combustion product masses, kg per kg of as-received fuel. */
export interface ProductMasses {
  co2: number;
  h2o: number;
  so2: number;
  o2: number;
  n2: number;
}

export interface StoichiometryResult {
  products: ProductMasses;
  ashKgKg: number;
  realAirWetKgKg: number;
  totalGasKgKg: number;
}

export interface MassBalanceResult {
  fuelFlowKgS: number;
  gasMassFlowKgS: number;
}

export interface EnergyBalanceResult {
  totalEnergyKw: number;
  usefulEnergyKw: number;
  chimneyLossesKw: number;
  adiabaticFlame: SolverResult; // value in K
  outletGasTempK: number;
  realEfficiencyPct: number;
}

export type FlowRegime = 'laminar' | 'transitional' | 'turbulent';

export interface FrictionFactorResult extends SolverResult {
  regime: FlowRegime;
}

export interface FluidDynamicsResult {
  gasDensityKgM3: number;
  volumetricFlowM3S: number;
  ductDiameterM: number;
  ductAreaM2: number;
  gasVelocityMs: number;
  reynoldsNumber: number;
  friction: FrictionFactorResult;
  pressureDropPaM: number;
}

export interface HeatTransferResult {
  internalConvectionResistance: number; // K·m/W
  conductionResistance: number;         // K·m/W
  externalConvectionResistance: number; // K·m/W
  thermalResistance: number;            // K·m/W, series total
  heatTransferCoefficient: number;      // W/(m·K)
  heatLossPerMeterW: number;            // W/m
  externalWallTempC: number;
  refractoryGradientC: number;
  insulationEfficiencyPct: number;
}

export interface EmissionsResult {
  co2EmissionFactorKgKg: number;
  co2ConcentrationDryPct: number;
  volumetricHeatingValueKjM3: number;
}

export interface VolumetricFractions {
  co2Pct: number;
  h2oPct: number;
  so2Pct: number;
  o2Pct: number;
  n2Pct: number;
}
