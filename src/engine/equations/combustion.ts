import { AIR_MASS_FRACTION, GAS_PROPERTIES, HV_WATER_KJ_KG, R_UNIVERSAL } from '../constants';
import type { GasSpecies } from '../constants';
import type { ProductMasses } from '../schema/CombustionInputV1';

export interface HeatingValueResult {
  pcsKjKg: number;
  pciKjKg: number;
  /** 9H + moisture, as % of fuel mass. */
  waterFromCombustion: number;
  /** True when C+H+O+S+ash did not already total 100 and were rescaled. */
  renormalized: boolean;
}

/**
 * Dulong correlation for higher (PCS) and lower (PCI) heating value, kJ/kg.
 *
 * The correlation is defined on a C+H+O+S+ash basis; when those five do not
 * total exactly 100 they are rescaled before use (nitrogen is not part of the
 * basis). PCI subtracts the latent heat of the combustion water and the fuel
 * moisture.
 */
export function dulongHeatingValue(
  carbon: number,
  hydrogen: number,
  oxygen: number,
  sulfur: number,
  ash: number,
  moisture = 0,
): HeatingValueResult {
  const total = carbon + hydrogen + oxygen + sulfur + ash;
  const renormalized = total !== 100 && total > 0;
  const scale = renormalized ? 100 / total : 1;

  const c = carbon * scale;
  const h = hydrogen * scale;
  const o = oxygen * scale;
  const s = sulfur * scale;

  const pcsKjKg = 338.2 * c + 1442.8 * (h - o / 8) + 94.2 * s;
  const waterFromCombustion = 9 * h + moisture;
  const pciKjKg = pcsKjKg - (HV_WATER_KJ_KG * waterFromCombustion) / 100;

  return { pcsKjKg, pciKjKg, waterFromCombustion, renormalized };
}

/**
 * Stoichiometric air requirement, kg air / kg fuel.
 * O2 demand = (2.667C + 8H − 1.333O + 2S)/100, divided by air's 23.2 % O2 by mass.
 */
export function theoreticalAirFuelRatio(
  carbon: number,
  hydrogen: number,
  oxygen: number,
  sulfur: number,
): number {
  const o2Required = (2.667 * carbon + 8 * hydrogen - 1.333 * oxygen + 2 * sulfur) / 100;
  return o2Required / AIR_MASS_FRACTION.o2;
}

export interface CombustionProductsResult {
  products: ProductMasses;
  ashKgKg: number;
  theoreticalAirKgKg: number;
  realAirKgKg: number;
  totalGasKgKg: number;
}

/**
 * Flue-gas product masses per kg of as-received fuel.
 *
 * Dry-basis percentages are scaled by (100 − moisture)/100; the fuel moisture
 * is added to the combustion water. Excess O2 and N2 come from the real air
 * supply (theoretical × (1 + excess/100)).
 */
export function combustionProducts(
  carbon: number,
  hydrogen: number,
  oxygen: number,
  sulfur: number,
  moisture: number,
  ash: number,
  excessAirPct: number,
): CombustionProductsResult {
  const moistureFactor = (100 - moisture) / 100;

  const co2 = (3.67 * carbon * moistureFactor) / 100; // 44/12
  const h2o = (9 * hydrogen * moistureFactor) / 100 + moisture / 100;
  const so2 = (2 * sulfur * moistureFactor) / 100; // 64/32

  const theoreticalAirKgKg = theoreticalAirFuelRatio(
    carbon * moistureFactor,
    hydrogen * moistureFactor,
    oxygen * moistureFactor,
    sulfur * moistureFactor,
  );
  const realAirKgKg = theoreticalAirKgKg * (1 + excessAirPct / 100);

  const o2 = AIR_MASS_FRACTION.o2 * theoreticalAirKgKg * (excessAirPct / 100);
  const n2 = AIR_MASS_FRACTION.n2 * realAirKgKg;

  return {
    products: { co2, h2o, so2, o2, n2 },
    ashKgKg: (ash * moistureFactor) / 100,
    theoreticalAirKgKg,
    realAirKgKg,
    totalGasKgKg: co2 + h2o + so2 + o2 + n2,
  };
}

const SPECIES: readonly GasSpecies[] = ['co2', 'h2o', 'so2', 'o2', 'n2'];

/** Moles of each species for the given masses (mass / molar mass). */
export function speciesMoles(masses: ProductMasses): Record<GasSpecies, number> {
  return {
    co2: masses.co2 / GAS_PROPERTIES.co2.molarMassGMol,
    h2o: masses.h2o / GAS_PROPERTIES.h2o.molarMassGMol,
    so2: masses.so2 / GAS_PROPERTIES.so2.molarMassGMol,
    o2:  masses.o2  / GAS_PROPERTIES.o2.molarMassGMol,
    n2:  masses.n2  / GAS_PROPERTIES.n2.molarMassGMol,
  };
}

/**
 * Density of the flue-gas mixture (kg/m³): ρ = P·M_avg / (R·T), with M_avg
 * the mass-weighted average molar mass. An empty mixture has density 0.
 */
export function gasMixtureDensity(
  temperatureK: number,
  pressurePa: number,
  masses: ProductMasses,
): number {
  let totalMoles = 0;
  let totalMass = 0;
  for (const species of SPECIES) {
    totalMoles += masses[species] / (GAS_PROPERTIES[species].molarMassGMol / 1000);
    totalMass += masses[species];
  }
  const avgMolarMassKgMol = totalMoles > 0 ? totalMass / totalMoles : 0;
  return (pressurePa * avgMolarMassKgMol) / (R_UNIVERSAL * temperatureK);
}

/** Σ mᵢ·Cpᵢ of the products, kJ/K per kg of fuel. */
export function productHeatCapacity(masses: ProductMasses): number {
  return SPECIES.reduce((sum, species) => sum + masses[species] * GAS_PROPERTIES[species].cpKjKgK, 0);
}
