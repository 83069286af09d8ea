import { describe, it, expect } from 'vitest';
import { objectiveScore, optimizeParameter, satisfiesConstraints } from '../analysis/Optimizer';
import { runCombustionPipeline } from '../Engine';
import { DEFAULT_COMBUSTION_INPUT } from '../referenceInputs';
import type { CombustionInputV1 } from '../schema/CombustionInputV1';

const base: CombustionInputV1 = {
  ...DEFAULT_COMBUSTION_INPUT,
  operating: { ...DEFAULT_COMBUSTION_INPUT.operating, flowRateTph: 1 },
};

describe('objectiveScore', () => {
  const result = runCombustionPipeline(base);

  it('efficiency scores the real efficiency', () => {
    expect(objectiveScore('efficiency', result)).toBe(90);
  });

  it('temperature scores distance from 1273 K', () => {
    expect(objectiveScore('temperature', result)).toBeCloseTo(-Math.abs(result.outletGasTempK - 1273), 10);
  });

  it('velocity scores distance from 15 m/s', () => {
    expect(objectiveScore('velocity', result)).toBeCloseTo(-1.8313, 3);
  });
});

describe('satisfiesConstraints', () => {
  const result = runCombustionPipeline(base);

  it('accepts anything when no constraint is given', () => {
    expect(satisfiesConstraints(result, {})).toBe(true);
  });

  it('checks each supplied bound', () => {
    expect(satisfiesConstraints(result, { maxVelocityMs: 10 })).toBe(false);
    expect(satisfiesConstraints(result, { minEfficiencyPct: 95 })).toBe(false);
    expect(satisfiesConstraints(result, { maxOutletTempK: 1000 })).toBe(false);
    expect(satisfiesConstraints(result, { maxVelocityMs: 20, minEfficiencyPct: 85, maxOutletTempK: 1500 })).toBe(true);
  });
});

describe('optimizeParameter', () => {
  it('finds the upper end of an efficiency search', () => {
    const outcome = optimizeParameter(base, 'furnace_efficiency', 'efficiency', { min: 50, max: 100 }, 11);
    expect(outcome.status).toBe('optimal');
    expect(outcome.optimalValue).toBe(100);
    expect(outcome.bestScore).toBe(100);
    expect(outcome.baseScore).toBe(90);
    expect(outcome.improvement).toBe(10);
    expect(outcome.evaluatedCount).toBe(11);
    expect(outcome.feasibleCount).toBe(11);
    expect(outcome.result.realEfficiencyPct).toBe(100);
  });

  it('keeps the first sample on ties', () => {
    const outcome = optimizeParameter(base, 'excess_air', 'efficiency', {}, 5);
    expect(outcome.optimalValue).toBe(15);
    expect(outcome.improvement).toBe(0);
  });

  it('steers the duct diameter toward 15 m/s', () => {
    const outcome = optimizeParameter(base, 'duct_diameter', 'velocity');
    expect(outcome.status).toBe('optimal');
    expect(outcome.optimalValue).toBeGreaterThan(31);
    expect(outcome.optimalValue).toBeLessThan(32.5);
    expect(Math.abs(outcome.result.gasVelocityMs - 15)).toBeLessThan(0.3);
    expect(outcome.improvement).toBeGreaterThan(0);
  });

  it('targets 1273 K within an outlet temperature cap', () => {
    const free = optimizeParameter(base, 'furnace_efficiency', 'temperature', { min: 50, max: 100 }, 11);
    expect(free.optimalValue).toBe(75);

    const capped = optimizeParameter(
      base,
      'furnace_efficiency',
      'temperature',
      { min: 50, max: 100, maxOutletTempK: 1200 },
      11,
    );
    expect(capped.feasibleCount).toBe(4);
    expect(capped.optimalValue).toBe(65);
    expect(capped.result.outletGasTempK).toBeLessThanOrEqual(1200);
  });

  it('is infeasible when no sample meets the constraints', () => {
    const outcome = optimizeParameter(base, 'excess_air', 'efficiency', { minEfficiencyPct: 95 }, 20);
    expect(outcome.status).toBe('infeasible');
    expect(outcome.optimalValue).toBe(30);
    expect(outcome.baseValue).toBe(30);
    expect(outcome.bestScore).toBe(-Infinity);
    expect(outcome.improvement).toBeNull();
    expect(outcome.feasibleCount).toBe(0);
    expect(outcome.result).toEqual(runCombustionPipeline(base));
  });

  it('never searches beyond 100 % furnace efficiency', () => {
    const outcome = optimizeParameter(base, 'furnace_efficiency');
    expect(outcome.optimalValue).toBe(100);
    expect(outcome.result.realEfficiencyPct).toBe(100);
    expect(outcome.result.chimneyLossesMw).toBeGreaterThanOrEqual(0);

    const wide = optimizeParameter(base, 'furnace_efficiency', 'efficiency', { min: 0, max: 150 }, 5);
    expect(wide.optimalValue).toBe(100);
    expect(wide.result.realEfficiencyPct).toBeLessThanOrEqual(100);
  });

  it('uses rangePct for the search interval when no bounds are given', () => {
    const outcome = optimizeParameter(base, 'furnace_efficiency', 'efficiency', { rangePct: 10 }, 3);
    expect(outcome.optimalValue).toBeCloseTo(99, 10);
  });
});
