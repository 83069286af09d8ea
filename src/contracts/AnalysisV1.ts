import type { CombustionResultV1 } from './CombustionResultV1';
import type { SweepFieldId } from '../engine/analysis/sweepFields';

export type SweepChannel = 'temperature' | 'velocity' | 'pressureDrop' | 'efficiency';

/** Channels that carry a relative sensitivity (pressure drop does not). */
export type RelativeChannel = 'temperature' | 'velocity' | 'efficiency';

export interface SweepResult {
  parameter: SweepFieldId;
  values: number[];
  /** Outlet gas temperature, °C. */
  temperatures: number[];
  velocities: number[];
  pressureDrops: number[];
  efficiencies: number[];
}

export interface ChannelRange {
  min: number;
  max: number;
  span: number;
}

export interface SensitivityReport {
  parameter: SweepFieldId;
  label: string;
  unit: string;
  baseValue: number;
  sweep: SweepResult;
  derivatives: Record<SweepChannel, number[]>;
  relativeSensitivity: Record<RelativeChannel, number[]>;
  maxSensitivity: Record<RelativeChannel, number>;
  ranges: Record<SweepChannel, ChannelRange>;
}

export interface SensitivityRankingEntry {
  parameter: SweepFieldId;
  sensitivityIndex: number;
  maxTemperatureSensitivity: number;
  maxVelocitySensitivity: number;
  maxEfficiencySensitivity: number;
}

export interface MultiSensitivityReport {
  reports: Partial<Record<SweepFieldId, SensitivityReport>>;
  ranking: SensitivityRankingEntry[];
  recommendations: string[];
}

export type OptimizationObjective = 'efficiency' | 'temperature' | 'velocity';

export interface OptimizationConstraints {
  min?: number;
  max?: number;
  /** Half-width of the search interval around the base value, % (default 50). */
  rangePct?: number;
  maxVelocityMs?: number;
  minEfficiencyPct?: number;
  /** Upper bound on outlet gas temperature, K. */
  maxOutletTempK?: number;
}

export interface OptimizationOutcome {
  parameter: SweepFieldId;
  objective: OptimizationObjective;
  status: 'optimal' | 'infeasible';
  optimalValue: number;
  baseValue: number;
  /** −Infinity when no sample met the constraints. */
  bestScore: number;
  baseScore: number;
  /** bestScore − baseScore; null when infeasible. */
  improvement: number | null;
  result: CombustionResultV1;
  evaluatedCount: number;
  feasibleCount: number;
}
