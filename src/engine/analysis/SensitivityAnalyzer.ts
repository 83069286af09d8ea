import type { CombustionInputV1 } from '../schema/CombustionInputV1';
import type {
  ChannelRange,
  MultiSensitivityReport,
  RelativeChannel,
  SensitivityRankingEntry,
  SensitivityReport,
  SweepChannel,
  SweepResult,
} from '../../contracts/AnalysisV1';
import { KELVIN_OFFSET } from '../constants';
import { runCombustionPipeline } from '../Engine';
import { gradient, linspace } from '../utils/solvers';
import { clampToDomain, getSweepField } from './sweepFields';
import type { SweepFieldId } from './sweepFields';

// ─── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_SENSITIVITY_RANGE_PCT = 50;
export const DEFAULT_SENSITIVITY_POINTS = 20;
export const DEFAULT_MULTI_RANGE_PCT = 30;
export const DEFAULT_MULTI_POINTS = 15;

/** Composite index weights: temperature, velocity, efficiency. */
const INDEX_WEIGHTS = { temperature: 0.4, velocity: 0.3, efficiency: 0.3 } as const;

const RECOMMENDATION_DEPTH = 3;

// ─── Sweep ────────────────────────────────────────────────────────────────────

/**
 * Runs the pipeline once per sample with only `field` changed.
 * Output channels are in sample order.
 */
export function sweepParameter(
  base: CombustionInputV1,
  field: SweepFieldId,
  values: readonly number[],
): SweepResult {
  const descriptor = getSweepField(field);
  const sweep: SweepResult = {
    parameter: field,
    values: [...values],
    temperatures: [],
    velocities: [],
    pressureDrops: [],
    efficiencies: [],
  };

  for (const value of values) {
    const result = runCombustionPipeline(descriptor.withValue(base, value));
    sweep.temperatures.push(result.outletGasTempK - KELVIN_OFFSET);
    sweep.velocities.push(result.gasVelocityMs);
    sweep.pressureDrops.push(result.pressureDropPaM);
    sweep.efficiencies.push(result.realEfficiencyPct);
  }
  return sweep;
}

// ─── Metrics ──────────────────────────────────────────────────────────────────

function channelRange(series: readonly number[]): ChannelRange {
  if (series.length === 0) return { min: 0, max: 0, span: 0 };
  const min = Math.min(...series);
  const max = Math.max(...series);
  return { min, max, span: max - min };
}

/** derivative·x₀/y₀·100 per sample; all zeros when y₀ is 0. */
function relativeSensitivity(
  derivative: readonly number[],
  x0: number,
  y0: number,
): number[] {
  if (y0 === 0) return derivative.map(() => 0);
  return derivative.map(d => ((d * x0) / y0) * 100);
}

function maxAbs(series: readonly number[]): number {
  return series.reduce((acc, v) => Math.max(acc, Math.abs(v)), 0);
}

/**
 * Sweeps `field` over ±rangePct % of its base value, held to the field's
 * domain, and derives per-sample derivatives, relative sensitivities and
 * channel ranges.
 */
export function analyzeParameter(
  base: CombustionInputV1,
  field: SweepFieldId,
  rangePct = DEFAULT_SENSITIVITY_RANGE_PCT,
  numPoints = DEFAULT_SENSITIVITY_POINTS,
): SensitivityReport {
  const descriptor = getSweepField(field);
  const baseValue = descriptor.read(base);
  const values = linspace(
    clampToDomain(descriptor, baseValue * (1 - rangePct / 100)),
    clampToDomain(descriptor, baseValue * (1 + rangePct / 100)),
    numPoints,
  );

  const sweep = sweepParameter(base, field, values);
  const derivatives: Record<SweepChannel, number[]> = {
    temperature: gradient(sweep.temperatures, values),
    velocity: gradient(sweep.velocities, values),
    pressureDrop: gradient(sweep.pressureDrops, values),
    efficiency: gradient(sweep.efficiencies, values),
  };

  const x0 = values[0] ?? baseValue;
  const relative: Record<RelativeChannel, number[]> = {
    temperature: relativeSensitivity(derivatives.temperature, x0, sweep.temperatures[0] ?? 0),
    velocity: relativeSensitivity(derivatives.velocity, x0, sweep.velocities[0] ?? 0),
    efficiency: relativeSensitivity(derivatives.efficiency, x0, sweep.efficiencies[0] ?? 0),
  };

  return {
    parameter: field,
    label: descriptor.label,
    unit: descriptor.unit,
    baseValue,
    sweep,
    derivatives,
    relativeSensitivity: relative,
    maxSensitivity: {
      temperature: maxAbs(relative.temperature),
      velocity: maxAbs(relative.velocity),
      efficiency: maxAbs(relative.efficiency),
    },
    ranges: {
      temperature: channelRange(sweep.temperatures),
      velocity: channelRange(sweep.velocities),
      pressureDrop: channelRange(sweep.pressureDrops),
      efficiency: channelRange(sweep.efficiencies),
    },
  };
}

// ─── Ranking & recommendations ────────────────────────────────────────────────

export function rankSensitivity(reports: readonly SensitivityReport[]): SensitivityRankingEntry[] {
  return reports
    .map(report => ({
      parameter: report.parameter,
      sensitivityIndex:
        report.maxSensitivity.temperature * INDEX_WEIGHTS.temperature +
        report.maxSensitivity.velocity * INDEX_WEIGHTS.velocity +
        report.maxSensitivity.efficiency * INDEX_WEIGHTS.efficiency,
      maxTemperatureSensitivity: report.maxSensitivity.temperature,
      maxVelocitySensitivity: report.maxSensitivity.velocity,
      maxEfficiencySensitivity: report.maxSensitivity.efficiency,
    }))
    .sort((a, b) => b.sensitivityIndex - a.sensitivityIndex);
}

function recommendationFor(entry: SensitivityRankingEntry): string | null {
  const index = entry.sensitivityIndex;
  const pct = index.toFixed(1);

  switch (entry.parameter) {
    case 'excess_air':
      if (index > 20) {
        return `Excess air is HIGHLY sensitive (${pct}%). Use precise air-fuel ratio control.`;
      }
      if (index > 10) {
        return `Excess air is moderately sensitive (${pct}%). Keep it under statistical process control.`;
      }
      return null;
    case 'furnace_efficiency':
      return index > 15
        ? `Furnace efficiency has a significant impact (${pct}%). Schedule regular preventive maintenance.`
        : null;
    case 'moisture':
      return index > 25
        ? `Fuel moisture is CRITICAL (${pct}%). Add a drying stage or incoming quality control.`
        : null;
    case 'flow_rate':
      return index > 30
        ? `Biomass flow rate is very sensitive (${pct}%). Install calibrated flow meters with PID control.`
        : null;
    default:
      return null;
  }
}

export const STABLE_SYSTEM_RECOMMENDATION =
  'The system is stable across the analysed range. Keep current operating conditions.';

/** Recommendations drawn from the three highest-ranked parameters only. */
export function buildRecommendations(ranking: readonly SensitivityRankingEntry[]): string[] {
  const recommendations = ranking
    .slice(0, RECOMMENDATION_DEPTH)
    .map(recommendationFor)
    .filter((r): r is string => r !== null);

  return recommendations.length > 0 ? recommendations : [STABLE_SYSTEM_RECOMMENDATION];
}

/** Analyses each field (duplicates ignored), then ranks them by composite index. */
export function analyzeMultipleParameters(
  base: CombustionInputV1,
  fields: readonly SweepFieldId[],
  rangePct = DEFAULT_MULTI_RANGE_PCT,
  numPoints = DEFAULT_MULTI_POINTS,
): MultiSensitivityReport {
  const unique = [...new Set(fields)];
  const analysed = unique.map(field => analyzeParameter(base, field, rangePct, numPoints));

  const reports: MultiSensitivityReport['reports'] = {};
  for (const report of analysed) {
    reports[report.parameter] = report;
  }

  const ranking = rankSensitivity(analysed);
  return { reports, ranking, recommendations: buildRecommendations(ranking) };
}
