import { getConfig } from '../config';
import type { EngineConfig } from '../config';
import { runCombustionEngine } from '../engine/Engine';
import { analyzeMultipleParameters, analyzeParameter } from '../engine/analysis/SensitivityAnalyzer';
import { optimizeParameter } from '../engine/analysis/Optimizer';
import {
  buildAtmosphericReport,
  calculateCityConditions,
  calculateCustomConditions,
  validateConditions,
} from '../engine/modules/AtmosphericModule';
import type { AtmosphericConditions, ConditionsValidation } from '../engine/modules/AtmosphericModule';
import { listCities } from '../data/referenceCities';
import type { ReferenceCity } from '../data/referenceCities';
import {
  CONVECTION,
  DESIGN_LIMITS,
  FLUE_GAS_CP_AVG,
  GAS_PROPERTIES,
  HV_WATER_KJ_KG,
  REFRACTORY,
  STANDARD_ATMOSPHERE,
} from '../engine/constants';
import {
  InputValidationError,
  atmosphericRequestSchema,
  cityRequestSchema,
  combustionRequestSchema,
  multiSensitivityRequestSchema,
  optimizationRequestSchema,
  parseOrThrow,
  sensitivityRequestSchema,
} from '../engine/normalizer/InputValidator';
import type { ProjectInfo } from '../engine/normalizer/InputValidator';
import type { CombustionEngineOutputV1 } from '../contracts/CombustionResultV1';
import type {
  MultiSensitivityReport,
  OptimizationOutcome,
  SensitivityReport,
} from '../contracts/AnalysisV1';

const LOG_PREFIX = 'Combustion service';

/**
 * Validates, runs and times one operation. Validation failures are logged
 * as warnings and rethrown unchanged.
 */
function runLogged<T>(operation: string, config: EngineConfig, fn: () => T): T {
  const startTime = Date.now();
  try {
    const result = fn();
    if (config.logTimings) {
      console.log(`${LOG_PREFIX}: ${operation} complete in ${Date.now() - startTime}ms`);
    }
    return result;
  } catch (error) {
    if (error instanceof InputValidationError) {
      console.warn(`${LOG_PREFIX}: ${operation} rejected with ${error.issues.length} issue(s)`);
    } else {
      console.error(`${LOG_PREFIX}: ${operation} failed:`, error);
    }
    throw error;
  }
}

// ─── Combustion ───────────────────────────────────────────────────────────────

export interface CombustionResponse extends CombustionEngineOutputV1 {
  project?: ProjectInfo;
}

export function calculateCombustion(
  payload: unknown,
  config: EngineConfig = getConfig(),
): CombustionResponse {
  return runLogged('calculateCombustion', config, () => {
    const request = parseOrThrow(combustionRequestSchema, payload);
    const output = runCombustionEngine(request.input);
    return request.project ? { ...output, project: request.project } : output;
  });
}

// ─── Analysis ─────────────────────────────────────────────────────────────────

export function runSensitivity(
  payload: unknown,
  config: EngineConfig = getConfig(),
): SensitivityReport {
  return runLogged('runSensitivity', config, () => {
    const request = parseOrThrow(sensitivityRequestSchema, payload);
    return analyzeParameter(
      request.input,
      request.parameter,
      request.rangePct ?? config.sensitivityRangePct,
      request.numPoints ?? config.sensitivityPoints,
    );
  });
}

export function runMultiSensitivity(
  payload: unknown,
  config: EngineConfig = getConfig(),
): MultiSensitivityReport {
  return runLogged('runMultiSensitivity', config, () => {
    const request = parseOrThrow(multiSensitivityRequestSchema, payload);
    return analyzeMultipleParameters(
      request.input,
      request.parameters,
      request.rangePct ?? config.multiSensitivityRangePct,
      request.numPoints ?? config.multiSensitivityPoints,
    );
  });
}

export function runOptimization(
  payload: unknown,
  config: EngineConfig = getConfig(),
): OptimizationOutcome {
  return runLogged('runOptimization', config, () => {
    const request = parseOrThrow(optimizationRequestSchema, payload);
    const outcome = optimizeParameter(
      request.input,
      request.parameter,
      request.objective,
      request.constraints,
      request.gridPoints ?? config.optimizerGridPoints,
    );
    if (outcome.status === 'infeasible') {
      console.warn(
        `${LOG_PREFIX}: no ${request.parameter} value in ${outcome.evaluatedCount} samples met the constraints`,
      );
    }
    return outcome;
  });
}

// ─── Atmosphere ───────────────────────────────────────────────────────────────

export interface AtmosphereResponse {
  conditions: AtmosphericConditions;
  validation: ConditionsValidation;
  report: string;
}

export function calculateAtmosphere(
  payload: unknown,
  config: EngineConfig = getConfig(),
): AtmosphereResponse {
  return runLogged('calculateAtmosphere', config, () => {
    const request = parseOrThrow(atmosphericRequestSchema, payload);
    const conditions = calculateCustomConditions(
      request.altitudeM,
      request.dryBulbTempC,
      request.relativeHumidityPct,
    );
    return {
      conditions,
      validation: validateConditions(conditions),
      report: buildAtmosphericReport(conditions),
    };
  });
}

export function getCity(
  payload: unknown,
  config: EngineConfig = getConfig(),
): AtmosphericConditions {
  return runLogged('getCity', config, () => {
    const request = parseOrThrow(cityRequestSchema, payload);
    return calculateCityConditions(request.name);
  });
}

export function listReferenceCities(): ReferenceCity[] {
  return listCities();
}

/** Physical constants and design limits the engine runs with. */
export function getConstants() {
  return {
    standardAtmosphere: STANDARD_ATMOSPHERE,
    gasProperties: GAS_PROPERTIES,
    flueGasCpAvg: FLUE_GAS_CP_AVG,
    latentHeatWaterKjKg: HV_WATER_KJ_KG,
    refractory: REFRACTORY,
    convection: CONVECTION,
    designLimits: DESIGN_LIMITS,
  };
}
