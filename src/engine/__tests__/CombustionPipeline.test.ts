import { describe, it, expect } from 'vitest';
import { runCombustionEngine, runCombustionPipeline } from '../Engine';
import { DEFAULT_COMBUSTION_INPUT, inputForPreset } from '../referenceInputs';
import type { CombustionInputV1, OperatingParameters } from '../schema/CombustionInputV1';
import { solveAdiabaticFlameTemperature } from '../modules/EnergyBalanceModule';
import { runGasCompositionModule } from '../modules/GasCompositionModule';
import { runHeatTransferModule } from '../modules/HeatTransferModule';
import { KELVIN_OFFSET } from '../constants';

function makeInput(operating: Partial<OperatingParameters> = {}): CombustionInputV1 {
  return {
    ...DEFAULT_COMBUSTION_INPUT,
    operating: { ...DEFAULT_COMBUSTION_INPUT.operating, ...operating },
  };
}

const EMPTY_FUEL = {
  carbonPct: 0,
  hydrogenPct: 0,
  oxygenPct: 0,
  nitrogenPct: 100,
  sulfurPct: 0,
  ashPct: 0,
  moisturePct: 0,
};

describe('runCombustionPipeline – bagasse reference case (3000 t/h)', () => {
  const r = runCombustionPipeline(DEFAULT_COMBUSTION_INPUT);

  it('fuel properties', () => {
    expect(r.pcsKjKg).toBeCloseTo(17705.66, 1);
    expect(r.pciKjKg).toBeCloseTo(15566.95, 1);
    expect(r.waterWetPct).toBe(35.09);
    expect(r.carbonWetPct).toBeCloseTo(50.29 * 0.6491, 6);
  });

  it('air properties at 2640 m', () => {
    expect(r.atmosphericPressureKpa).toBeCloseTo(73.3728, 3);
    expect(r.airDensityKgM3).toBeCloseTo(0.88707, 4);
    expect(r.absoluteHumidityKgKg).toBeCloseTo(0.010984, 5);
  });

  it('air requirement on the dry basis', () => {
    expect(r.theoreticalAirKgKg).toBeCloseTo(5.32778, 4);
    expect(r.realAirKgKg).toBeCloseTo(6.92611, 4);
    expect(r.excessAirPct).toBe(30);
  });

  it('mass flows', () => {
    expect(r.fuelFlowKgS).toBeCloseTo(833.333, 3);
    expect(r.gasMassFlowKgS).toBeCloseTo(6605.09, 1);
  });

  it('energy balance in MW and outlet temperature in K', () => {
    expect(r.totalEnergyMw).toBeCloseTo(9472.5, 6);
    expect(r.usefulEnergyMw).toBeCloseTo(8525.25, 6);
    expect(r.chimneyLossesMw).toBeCloseTo(947.25, 6);
    expect(r.outletGasTempK).toBeCloseTo(1461.52, 1);
    expect(r.realEfficiencyPct).toBe(90);
  });

  it('adiabatic flame temperature converges to ~2846 K', () => {
    expect(r.adiabaticFlameTempK).toBeCloseTo(2846.35, 1);
    expect(r.solverStatus.flameTemperatureConverged).toBe(true);
  });

  it('fluid dynamics through a 30 in duct', () => {
    expect(r.ductDiameterM).toBeCloseTo(0.762, 10);
    expect(r.ductAreaM2).toBeCloseTo(0.456037, 5);
    expect(r.gasDensityKgM3).toBeCloseTo(0.28684, 4);
    expect(r.frictionRegime).toBe('turbulent');
  });

  it('emissions', () => {
    expect(r.co2EmissionFactorKgKg).toBeCloseTo(1.19692, 4);
    expect(r.co2ConcentrationDryPct).toBeCloseTo(24.4868, 3);
    expect(r.volumetricHeatingValueKjM3).toBeCloseTo(r.pciKjKg * 1200, 6);
  });

  it('heat transfer through the refractory', () => {
    expect(r.thermalResistance).toBeCloseTo(0.143994, 5);
    expect(r.heatLossPerMeterW).toBeCloseTo(8148.74, 0);
    expect(r.externalWallTempC).toBeCloseTo(259.24, 1);
    expect(r.insulationEfficiencyPct).toBeCloseTo(70.99, 1);
  });
});

describe('runCombustionPipeline – invariants', () => {
  const inputs: Array<[string, CombustionInputV1]> = [
    ['bagasse', DEFAULT_COMBUSTION_INPUT],
    ['wood chips', inputForPreset('wood_chips')],
    ['rice husk', inputForPreset('rice_husk')],
    ['low flow', makeInput({ flowRateTph: 1 })],
    ['high excess air', makeInput({ excessAirPct: 120 })],
  ];

  it.each(inputs)('%s: PCS ≥ PCI', (_, input) => {
    const r = runCombustionPipeline(input);
    expect(r.pcsKjKg).toBeGreaterThanOrEqual(r.pciKjKg);
  });

  it.each(inputs)('%s: volumetric fractions sum to 100', (_, input) => {
    const r = runCombustionPipeline(input);
    const sum = r.co2VolPct + r.h2oVolPct + r.so2VolPct + r.o2VolPct + r.n2VolPct;
    expect(Math.abs(sum - 100)).toBeLessThanOrEqual(1);
  });

  it.each(inputs)('%s: efficiency in (0, 100]', (_, input) => {
    const r = runCombustionPipeline(input);
    expect(r.realEfficiencyPct).toBeGreaterThan(0);
    expect(r.realEfficiencyPct).toBeLessThanOrEqual(100);
  });

  it('returns a frozen result and leaves the input untouched', () => {
    const input = makeInput();
    const before = JSON.stringify(input);
    const r = runCombustionPipeline(input);
    expect(Object.isFrozen(r)).toBe(true);
    expect(JSON.stringify(input)).toBe(before);
  });

  it('is deterministic', () => {
    expect(runCombustionPipeline(DEFAULT_COMBUSTION_INPUT)).toEqual(
      runCombustionPipeline(DEFAULT_COMBUSTION_INPUT),
    );
  });

  it('outlet temperature does not depend on the flow rate', () => {
    const low = runCombustionPipeline(makeInput({ flowRateTph: 1 }));
    const high = runCombustionPipeline(DEFAULT_COMBUSTION_INPUT);
    expect(low.outletGasTempK).toBeCloseTo(high.outletGasTempK, 8);
  });

  it('more excess air lowers the outlet temperature', () => {
    const lean = runCombustionPipeline(makeInput({ excessAirPct: 10 }));
    const rich = runCombustionPipeline(makeInput({ excessAirPct: 30 }));
    expect(lean.outletGasTempK - 273.15).toBeCloseTo(1370.62, 1);
    expect(rich.outletGasTempK).toBeLessThan(lean.outletGasTempK);
  });

  it('1 t/h through a 30 in duct gives 5–25 m/s in turbulent flow', () => {
    const r = runCombustionPipeline(makeInput({ flowRateTph: 1 }));
    expect(r.gasVelocityMs).toBeCloseTo(16.8313, 3);
    expect(r.gasVelocityMs).toBeGreaterThan(5);
    expect(r.gasVelocityMs).toBeLessThan(25);
    expect(r.reynoldsNumber).toBeGreaterThan(2300);
    expect(r.frictionRegime).toBe('turbulent');
    expect(r.solverStatus.frictionFactorConverged).toBe(true);
    expect(r.pressureDropPaM).toBeCloseTo(0.9079, 3);
  });
});

describe('runCombustionPipeline – degenerate fuel', () => {
  const input: CombustionInputV1 = { ...DEFAULT_COMBUSTION_INPUT, fuel: EMPTY_FUEL };

  it('zero-guards every quantity that depends on the gas mixture', () => {
    const r = runCombustionPipeline(input);
    expect(r.totalGasKgKg).toBe(0);
    expect(r.gasDensityKgM3).toBe(0);
    expect(r.volumetricFlowM3S).toBe(0);
    expect(r.gasVelocityMs).toBe(0);
    expect(r.pressureDropPaM).toBe(0);
    expect(r.co2ConcentrationDryPct).toBe(0);
    expect([r.co2VolPct, r.h2oVolPct, r.so2VolPct, r.o2VolPct, r.n2VolPct]).toEqual([0, 0, 0, 0, 0]);
  });

  it('reports the unconverged flame temperature as a warning', () => {
    const output = runCombustionEngine(input);
    expect(output.result.adiabaticFlameTempK).toBe(298);
    expect(output.warnings).toEqual([
      'Adiabatic flame temperature did not converge after 0 iterations; reported 298.0 K is the last estimate.',
    ]);
  });
});

describe('runCombustionEngine', () => {
  it('carries version metadata and no warnings for the reference case', () => {
    const output = runCombustionEngine(DEFAULT_COMBUSTION_INPUT);
    expect(output.meta).toEqual({ engineVersion: '1.0.0', contractVersion: '1' });
    expect(output.warnings).toEqual([]);
  });

  it('flags velocity, pressure drop and wall temperature at 3000 t/h', () => {
    const output = runCombustionEngine(DEFAULT_COMBUSTION_INPUT);
    expect(output.designLimits.map(f => [f.id, f.severity])).toEqual([
      ['gas_velocity', 'fail'],
      ['pressure_drop', 'fail'],
      ['external_wall_temp', 'fail'],
    ]);
  });
});

describe('stage modules', () => {
  it('flame temperature with no heat capacity stays at 298 K unconverged', () => {
    expect(
      solveAdiabaticFlameTemperature(15000, { co2: 0, h2o: 0, so2: 0, o2: 0, n2: 0 }),
    ).toEqual({ value: 298, iterations: 0, converged: false });
  });

  it('flame temperature equals 298 + PCI/ΣmCp', () => {
    const r = solveAdiabaticFlameTemperature(1040, { co2: 0, h2o: 0, so2: 0, o2: 0, n2: 1 });
    expect(r.converged).toBe(true);
    expect(r.value).toBeCloseTo(1298, 6);
  });

  it('gas composition of pure N2 is 100% N2', () => {
    expect(runGasCompositionModule({ co2: 0, h2o: 0, so2: 0, o2: 0, n2: 2 })).toEqual({
      co2Pct: 0,
      h2oPct: 0,
      so2Pct: 0,
      o2Pct: 0,
      n2Pct: 100,
    });
  });

  it('no temperature difference means no heat loss and zero insulation efficiency', () => {
    const r = runHeatTransferModule(0.762, 15 + KELVIN_OFFSET, 15);
    expect(r.heatLossPerMeterW).toBe(0);
    expect(r.insulationEfficiencyPct).toBe(0);
    expect(r.externalWallTempC).toBe(15);
  });

  it('a duct with no diameter loses nothing and stays at ambient', () => {
    const r = runHeatTransferModule(0, 1200, 15);
    expect(r.heatLossPerMeterW).toBe(0);
    expect(r.refractoryGradientC).toBe(0);
    expect(r.insulationEfficiencyPct).toBe(0);
    expect(r.externalWallTempC).toBe(15);
  });

  it('a zero-diameter duct yields only finite numbers through the whole pipeline', () => {
    const r = runCombustionPipeline({
      ...DEFAULT_COMBUSTION_INPUT,
      operating: { ...DEFAULT_COMBUSTION_INPUT.operating, ductDiameterIn: 0 },
    });
    for (const value of Object.values(r)) {
      if (typeof value === 'number') expect(Number.isFinite(value)).toBe(true);
    }
    expect(r.gasVelocityMs).toBe(0);
    expect(r.refractoryGradientC).toBe(0);
  });
});
