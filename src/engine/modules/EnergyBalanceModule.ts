import type {
  EnergyBalanceResult,
  MassBalanceResult,
  ProductMasses,
} from '../schema/CombustionInputV1';
import { FLUE_GAS_CP_AVG, KELVIN_OFFSET, REFERENCE_TEMP_K } from '../constants';
import { productHeatCapacity } from '../equations/combustion';
import { newtonRaphson } from '../utils/solvers';
import type { SolverResult } from '../utils/solvers';

const FLAME_TEMP_SEED_K = 2000;
const FLAME_TEMP_MAX_ITERATIONS = 50;
const FLAME_TEMP_TOLERANCE_K = 1e-6;

/**
 * Adiabatic flame temperature (K).
 *
 * Solves PCI − Σ mᵢ·Cpᵢ·(T − 298) = 0 per kg of fuel (kJ) with Newton-Raphson
 * seeded at 2000 K. The result is floored at 298 K; a product mixture with no
 * heat capacity leaves the solver unconverged at the floor.
 */
export function solveAdiabaticFlameTemperature(
  pciKjKg: number,
  products: ProductMasses,
): SolverResult {
  const heatCapacity = productHeatCapacity(products);
  if (heatCapacity <= 0) {
    return { value: REFERENCE_TEMP_K, iterations: 0, converged: false };
  }

  const energyBalance = (temperatureK: number): number =>
    pciKjKg - heatCapacity * (temperatureK - REFERENCE_TEMP_K);

  const solved = newtonRaphson(energyBalance, FLAME_TEMP_SEED_K, {
    maxIterations: FLAME_TEMP_MAX_ITERATIONS,
    tolerance: FLAME_TEMP_TOLERANCE_K,
  });
  return { ...solved, value: Math.max(solved.value, REFERENCE_TEMP_K) };
}

export interface EnergyBalanceInput {
  reportedPciKjKg: number;
  calculatedPciKjKg: number;
  furnaceEfficiencyPct: number;
  ambientTempC: number;
  products: ProductMasses;
  massBalance: MassBalanceResult;
}

/**
 * Stage 5: energy balance.
 *
 * Released energy uses the reported PCI; the flame temperature uses the
 * Dulong PCI so it stays consistent with the product masses. The outlet gas
 * temperature assumes a single average flue-gas Cp of 1.1 kJ/(kg·K).
 */
export function runEnergyBalanceModule(input: EnergyBalanceInput): EnergyBalanceResult {
  const { fuelFlowKgS, gasMassFlowKgS } = input.massBalance;

  const totalEnergyKw = fuelFlowKgS * input.reportedPciKjKg;
  const usefulEnergyKw = totalEnergyKw * (input.furnaceEfficiencyPct / 100);

  const ambientK = input.ambientTempC + KELVIN_OFFSET;
  const temperatureRiseK =
    gasMassFlowKgS > 0 ? usefulEnergyKw / (gasMassFlowKgS * FLUE_GAS_CP_AVG) : 0;

  return {
    totalEnergyKw,
    usefulEnergyKw,
    chimneyLossesKw: totalEnergyKw - usefulEnergyKw,
    adiabaticFlame: solveAdiabaticFlameTemperature(input.calculatedPciKjKg, input.products),
    outletGasTempK: ambientK + temperatureRiseK,
    realEfficiencyPct: input.furnaceEfficiencyPct,
  };
}
