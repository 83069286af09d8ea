// ─── Universal constants ──────────────────────────────────────────────────────

export const R_UNIVERSAL = 8.314; // J/(mol·K)
export const R_AIR = 287.05;      // J/(kg·K), dry air
export const GRAVITY = 9.81;      // m/s²

export const KELVIN_OFFSET = 273.15;
export const REFERENCE_TEMP_K = 298; // sensible-heat datum for flame temperature

/** Latent heat of vaporisation of water at 25 °C (kJ/kg). */
export const HV_WATER_KJ_KG = 2442;

// ─── Unit conversions ─────────────────────────────────────────────────────────

export const CONVERSION = {
  tonToKg: 1000,
  hourToSec: 3600,
  kwToMw: 0.001,
  inchToM: 0.0254,
  kpaToPa: 1000,
  mmHgToKpa: 0.133322,
  kpaToMmHg: 7.50062,
} as const;

// ─── Standard atmosphere ──────────────────────────────────────────────────────

export const STANDARD_ATMOSPHERE = {
  seaLevelPressureKpa: 101.325,
  lapseRateKPerM: 0.0065,
  seaLevelTempK: 288.15,
  airMolarMassKgMol: 0.02896,
  tropopauseM: 11000,
  scaleHeightM: 8500,
  seaLevelAirDensityKgM3: 1.225,
} as const;

/** Antoine coefficients for water (P in mmHg, T in °C). */
export const ANTOINE_WATER = { A: 8.07131, B: 1730.63, C: 233.426 } as const;

// ─── Air & flue-gas species ───────────────────────────────────────────────────

/** Dry air composition by mass fraction. */
export const AIR_MASS_FRACTION = { o2: 0.232, n2: 0.768 } as const;

export type GasSpecies = 'co2' | 'h2o' | 'so2' | 'o2' | 'n2';

/** Molar mass (g/mol) and mean specific heat (kJ/(kg·K)) near 298 K. */
export const GAS_PROPERTIES: Record<GasSpecies, { molarMassGMol: number; cpKjKgK: number }> = {
  co2: { molarMassGMol: 44.01,  cpKjKgK: 0.844 },
  h2o: { molarMassGMol: 18.015, cpKjKgK: 1.86 },
  so2: { molarMassGMol: 64.066, cpKjKgK: 0.64 },
  o2:  { molarMassGMol: 31.999, cpKjKgK: 0.918 },
  n2:  { molarMassGMol: 28.014, cpKjKgK: 1.04 },
};

/** Average flue-gas specific heat used for the outlet temperature estimate (kJ/(kg·K)). */
export const FLUE_GAS_CP_AVG = 1.1;

/** Dynamic viscosity of hot flue gas, taken as air at 20 °C (Pa·s). */
export const GAS_DYNAMIC_VISCOSITY = 1.8e-5;

// ─── Duct & refractory ────────────────────────────────────────────────────────

export const REFRACTORY = {
  thermalConductivity: 0.5, // W/(m·K)
  thicknessM: 0.15,
  emissivity: 0.8,
  roughnessM: 0.00015,      // absolute wall roughness
} as const;

export const CONVECTION = {
  internalWm2K: 50,
  externalWm2K: 10,
} as const;

/** Typical bagasse bulk density used for volumetric heating value (kg/m³). */
export const FUEL_BULK_DENSITY_KG_M3 = 1200;

// ─── Design limits ────────────────────────────────────────────────────────────

export interface DesignLimits {
  maxVelocityMs: number;
  maxPressureDropPaM: number;
  minEfficiencyPct: number;
  maxExternalWallTempC: number;
}

export const DESIGN_LIMITS: DesignLimits = {
  maxVelocityMs: 20,
  maxPressureDropPaM: 500,
  minEfficiencyPct: 70,
  maxExternalWallTempC: 60,
};
