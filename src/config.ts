import dotenv from 'dotenv';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  SENSITIVITY_RANGE_PCT: z.coerce.number().gt(0).max(99).default(50),
  SENSITIVITY_POINTS: z.coerce.number().int().min(2).max(200).default(20),
  MULTI_SENSITIVITY_RANGE_PCT: z.coerce.number().gt(0).max(99).default(30),
  MULTI_SENSITIVITY_POINTS: z.coerce.number().int().min(2).max(200).default(15),
  OPTIMIZER_GRID_POINTS: z.coerce.number().int().min(2).max(1000).default(100),
  ENGINE_LOG_TIMINGS: booleanFlag,
});

export interface EngineConfig {
  sensitivityRangePct: number;
  sensitivityPoints: number;
  multiSensitivityRangePct: number;
  multiSensitivityPoints: number;
  optimizerGridPoints: number;
  logTimings: boolean;
}

/** Parses engine settings from an environment map; unset keys take their defaults. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid engine configuration: ${detail}`);
  }
  const e = parsed.data;
  return {
    sensitivityRangePct: e.SENSITIVITY_RANGE_PCT,
    sensitivityPoints: e.SENSITIVITY_POINTS,
    multiSensitivityRangePct: e.MULTI_SENSITIVITY_RANGE_PCT,
    multiSensitivityPoints: e.MULTI_SENSITIVITY_POINTS,
    optimizerGridPoints: e.OPTIMIZER_GRID_POINTS,
    logTimings: e.ENGINE_LOG_TIMINGS,
  };
}

let cached: EngineConfig | null = null;

/** Loads `.env` once, then reads the process environment. */
export function getConfig(): EngineConfig {
  if (cached === null) {
    dotenv.config();
    cached = loadConfig();
  }
  return cached;
}
