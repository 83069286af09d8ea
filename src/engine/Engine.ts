import type { CombustionInputV1 } from './schema/CombustionInputV1';
import type {
  CombustionEngineOutputV1,
  CombustionResultV1,
} from '../contracts/CombustionResultV1';
import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';
import { CONVERSION } from './constants';
import type { DesignLimits } from './constants';
import { runFuelPropertiesModule } from './modules/FuelPropertiesModule';
import { runAirPropertiesModule } from './modules/AirPropertiesModule';
import { runStoichiometryModule } from './modules/StoichiometryModule';
import { runMassBalanceModule } from './modules/MassBalanceModule';
import { runEnergyBalanceModule } from './modules/EnergyBalanceModule';
import { runFluidDynamicsModule } from './modules/FluidDynamicsModule';
import { runHeatTransferModule } from './modules/HeatTransferModule';
import { runEmissionsModule } from './modules/EmissionsModule';
import { runGasCompositionModule } from './modules/GasCompositionModule';
import { runDesignLimitsModule } from './modules/DesignLimitsModule';

/**
 * Runs the eight pipeline stages in order and flattens them into one frozen
 * result. Pure: the input is never mutated and no state is kept between runs.
 */
export function runCombustionPipeline(input: CombustionInputV1): CombustionResultV1 {
  const { fuel, environment, operating } = input;

  const fuelProps = runFuelPropertiesModule(fuel, operating.excessAirPct);
  const air = runAirPropertiesModule(environment);
  const stoich = runStoichiometryModule(fuel, operating.excessAirPct);
  const massBalance = runMassBalanceModule(operating.flowRateTph, fuelProps.realAirKgKg);

  const energy = runEnergyBalanceModule({
    reportedPciKjKg: operating.reportedPciKjKg,
    calculatedPciKjKg: fuelProps.pciKjKg,
    furnaceEfficiencyPct: operating.furnaceEfficiencyPct,
    ambientTempC: environment.dryBulbTempC,
    products: stoich.products,
    massBalance,
  });

  const fluid = runFluidDynamicsModule({
    products: stoich.products,
    gasMassFlowKgS: massBalance.gasMassFlowKgS,
    outletGasTempK: energy.outletGasTempK,
    ambientTempC: environment.dryBulbTempC,
    atmosphericPressureKpa: air.atmosphericPressureKpa,
    ductDiameterIn: operating.ductDiameterIn,
  });

  const heat = runHeatTransferModule(
    fluid.ductDiameterM,
    energy.outletGasTempK,
    environment.dryBulbTempC,
  );
  const emissions = runEmissionsModule(fuelProps.compositionWet, stoich.products, fuelProps.pciKjKg);
  const fractions = runGasCompositionModule(stoich.products);

  const wet = fuelProps.compositionWet;
  const { products } = stoich;

  return Object.freeze({
    pcsKjKg: fuelProps.pcsKjKg,
    pciKjKg: fuelProps.pciKjKg,
    heatingValueRenormalized: fuelProps.heatingValueRenormalized,
    carbonWetPct: wet.carbonPct,
    hydrogenWetPct: wet.hydrogenPct,
    oxygenWetPct: wet.oxygenPct,
    nitrogenWetPct: wet.nitrogenPct,
    sulfurWetPct: wet.sulfurPct,
    ashWetPct: wet.ashPct,
    waterWetPct: wet.waterPct,
    waterFromCombustion: fuelProps.waterFromCombustion,

    atmosphericPressureKpa: air.atmosphericPressureKpa,
    airDensityKgM3: air.airDensityKgM3,
    absoluteHumidityKgKg: air.absoluteHumidityKgKg,
    airEnthalpyKjKg: air.airEnthalpyKjKg,

    theoreticalAirKgKg: fuelProps.theoreticalAirKgKg,
    realAirKgKg: fuelProps.realAirKgKg,
    excessAirPct: operating.excessAirPct,

    co2KgKg: products.co2,
    h2oKgKg: products.h2o,
    so2KgKg: products.so2,
    o2KgKg: products.o2,
    n2KgKg: products.n2,
    ashKgKg: stoich.ashKgKg,
    totalGasKgKg: stoich.totalGasKgKg,

    co2VolPct: fractions.co2Pct,
    h2oVolPct: fractions.h2oPct,
    so2VolPct: fractions.so2Pct,
    o2VolPct: fractions.o2Pct,
    n2VolPct: fractions.n2Pct,

    totalEnergyMw: energy.totalEnergyKw * CONVERSION.kwToMw,
    usefulEnergyMw: energy.usefulEnergyKw * CONVERSION.kwToMw,
    chimneyLossesMw: energy.chimneyLossesKw * CONVERSION.kwToMw,
    adiabaticFlameTempK: energy.adiabaticFlame.value,
    outletGasTempK: energy.outletGasTempK,
    realEfficiencyPct: energy.realEfficiencyPct,

    gasDensityKgM3: fluid.gasDensityKgM3,
    volumetricFlowM3S: fluid.volumetricFlowM3S,
    ductDiameterM: fluid.ductDiameterM,
    ductAreaM2: fluid.ductAreaM2,
    gasVelocityMs: fluid.gasVelocityMs,
    reynoldsNumber: fluid.reynoldsNumber,
    frictionFactor: fluid.friction.value,
    frictionRegime: fluid.friction.regime,
    pressureDropPaM: fluid.pressureDropPaM,

    thermalResistance: heat.thermalResistance,
    heatTransferCoefficient: heat.heatTransferCoefficient,
    heatLossPerMeterW: heat.heatLossPerMeterW,
    externalWallTempC: heat.externalWallTempC,
    refractoryGradientC: heat.refractoryGradientC,
    insulationEfficiencyPct: heat.insulationEfficiencyPct,

    co2EmissionFactorKgKg: emissions.co2EmissionFactorKgKg,
    co2ConcentrationDryPct: emissions.co2ConcentrationDryPct,
    volumetricHeatingValueKjM3: emissions.volumetricHeatingValueKjM3,

    fuelFlowKgS: massBalance.fuelFlowKgS,
    gasMassFlowKgS: massBalance.gasMassFlowKgS,

    solverStatus: Object.freeze({
      flameTemperatureConverged: energy.adiabaticFlame.converged,
      flameTemperatureIterations: energy.adiabaticFlame.iterations,
      frictionFactorConverged: fluid.friction.converged,
      frictionFactorIterations: fluid.friction.iterations,
    }),
  });
}

function collectWarnings(result: CombustionResultV1): string[] {
  const warnings: string[] = [];
  const status = result.solverStatus;

  if (!status.flameTemperatureConverged) {
    warnings.push(
      `Adiabatic flame temperature did not converge after ${status.flameTemperatureIterations} ` +
      `iterations; reported ${result.adiabaticFlameTempK.toFixed(1)} K is the last estimate.`,
    );
  }
  if (!status.frictionFactorConverged) {
    warnings.push(
      `Colebrook friction factor did not converge after ${status.frictionFactorIterations} ` +
      `iterations; pressure drop uses the last estimate.`,
    );
  }
  return warnings;
}

/** Pipeline run plus design-limit flags and solver warnings. */
export function runCombustionEngine(
  input: CombustionInputV1,
  limits?: DesignLimits,
): CombustionEngineOutputV1 {
  const result = runCombustionPipeline(input);
  return {
    meta: { engineVersion: ENGINE_VERSION, contractVersion: CONTRACT_VERSION },
    result,
    designLimits: runDesignLimitsModule(result, limits),
    warnings: collectWarnings(result),
  };
}
