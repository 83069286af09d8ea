import type { CombustionInputV1 } from '../schema/CombustionInputV1';
import type { CombustionResultV1 } from '../../contracts/CombustionResultV1';
import type {
  OptimizationConstraints,
  OptimizationObjective,
  OptimizationOutcome,
} from '../../contracts/AnalysisV1';
import { runCombustionPipeline } from '../Engine';
import { linspace } from '../utils/solvers';
import { clampToDomain, getSweepField } from './sweepFields';
import type { SweepFieldId } from './sweepFields';

export const DEFAULT_GRID_POINTS = 100;
export const DEFAULT_SEARCH_RANGE_PCT = 50;

const TARGET_OUTLET_TEMP_K = 1273; // 1000 °C
const TARGET_VELOCITY_MS = 15;

export function objectiveScore(objective: OptimizationObjective, result: CombustionResultV1): number {
  switch (objective) {
    case 'efficiency':
      return result.realEfficiencyPct;
    case 'temperature':
      return -Math.abs(result.outletGasTempK - TARGET_OUTLET_TEMP_K);
    case 'velocity':
      return -Math.abs(result.gasVelocityMs - TARGET_VELOCITY_MS);
  }
}

/** Only constraints that were supplied are checked. */
export function satisfiesConstraints(
  result: CombustionResultV1,
  constraints: OptimizationConstraints,
): boolean {
  if (constraints.maxVelocityMs !== undefined && result.gasVelocityMs > constraints.maxVelocityMs) {
    return false;
  }
  if (constraints.minEfficiencyPct !== undefined && result.realEfficiencyPct < constraints.minEfficiencyPct) {
    return false;
  }
  if (constraints.maxOutletTempK !== undefined && result.outletGasTempK > constraints.maxOutletTempK) {
    return false;
  }
  return true;
}

/**
 * Grid search over one field.
 *
 * The interval is [min, max] when given, otherwise ±rangePct % of the base
 * value, and is held to the field's domain. The first sample with the highest score wins. When no sample meets
 * the constraints the base value is kept and the outcome is `infeasible`.
 */
export function optimizeParameter(
  base: CombustionInputV1,
  field: SweepFieldId,
  objective: OptimizationObjective = 'efficiency',
  constraints: OptimizationConstraints = {},
  gridPoints = DEFAULT_GRID_POINTS,
): OptimizationOutcome {
  const descriptor = getSweepField(field);
  const baseValue = descriptor.read(base);
  const rangePct = constraints.rangePct ?? DEFAULT_SEARCH_RANGE_PCT;
  const lower = clampToDomain(descriptor, constraints.min ?? baseValue * (1 - rangePct / 100));
  const upper = clampToDomain(descriptor, constraints.max ?? baseValue * (1 + rangePct / 100));

  let bestValue = baseValue;
  let bestScore = -Infinity;
  let bestResult: CombustionResultV1 | null = null;
  let feasibleCount = 0;

  const grid = linspace(lower, upper, gridPoints);
  for (const value of grid) {
    const result = runCombustionPipeline(descriptor.withValue(base, value));
    if (!satisfiesConstraints(result, constraints)) continue;
    feasibleCount++;

    const score = objectiveScore(objective, result);
    if (score > bestScore) {
      bestScore = score;
      bestValue = value;
      bestResult = result;
    }
  }

  const baseResult = runCombustionPipeline(base);
  const baseScore = objectiveScore(objective, baseResult);
  const outcome = {
    parameter: field,
    objective,
    baseValue,
    baseScore,
    evaluatedCount: grid.length,
    feasibleCount,
  };

  if (bestResult === null) {
    return {
      ...outcome,
      status: 'infeasible',
      optimalValue: baseValue,
      bestScore: -Infinity,
      improvement: null,
      result: baseResult,
    };
  }

  return {
    ...outcome,
    status: 'optimal',
    optimalValue: bestValue,
    bestScore,
    improvement: bestScore - baseScore,
    result: bestResult,
  };
}
