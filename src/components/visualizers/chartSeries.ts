import type { CombustionResultV1 } from '../../contracts/CombustionResultV1';
import type { SensitivityReport } from '../../contracts/AnalysisV1';

export interface SensitivityPoint {
  value: number;
  temperatureC: number;
  velocityMs: number;
  pressureDropPaM: number;
  efficiencyPct: number;
}

export interface ChartSlice {
  id: string;
  name: string;
  value: number;
  color: string;
}

const round = (x: number, dp: number): number => parseFloat(x.toFixed(dp));

/** One chart row per sweep sample, in sample order. */
export function buildSensitivitySeries(report: SensitivityReport): SensitivityPoint[] {
  const { sweep } = report;
  return sweep.values.map((value, i) => ({
    value: round(value, 3),
    temperatureC: round(sweep.temperatures[i], 2),
    velocityMs: round(sweep.velocities[i], 2),
    pressureDropPaM: round(sweep.pressureDrops[i], 2),
    efficiencyPct: round(sweep.efficiencies[i], 2),
  }));
}

/** Useful output against chimney losses, MW. */
export function buildEnergyBalanceSlices(result: CombustionResultV1): ChartSlice[] {
  return [
    { id: 'useful', name: 'Useful energy', value: round(result.usefulEnergyMw, 2), color: '#38a169' },
    { id: 'chimney', name: 'Chimney losses', value: round(result.chimneyLossesMw, 2), color: '#e53e3e' },
  ];
}

/** Flue-gas composition by volume, %. Species with no share are left out. */
export function buildGasCompositionSlices(result: CombustionResultV1): ChartSlice[] {
  const slices: ChartSlice[] = [
    { id: 'n2',  name: 'N₂',  value: round(result.n2VolPct, 2),  color: '#3182ce' },
    { id: 'co2', name: 'CO₂', value: round(result.co2VolPct, 2), color: '#718096' },
    { id: 'h2o', name: 'H₂O', value: round(result.h2oVolPct, 2), color: '#63b3ed' },
    { id: 'o2',  name: 'O₂',  value: round(result.o2VolPct, 2),  color: '#48bb78' },
    { id: 'so2', name: 'SO₂', value: round(result.so2VolPct, 2), color: '#d69e2e' },
  ];
  return slices.filter(s => s.value > 0);
}
