import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('falls back to defaults for unset keys', () => {
    expect(loadConfig({})).toEqual({
      sensitivityRangePct: 50,
      sensitivityPoints: 20,
      multiSensitivityRangePct: 30,
      multiSensitivityPoints: 15,
      optimizerGridPoints: 100,
      logTimings: true,
    });
  });

  it('parses numeric and boolean settings from strings', () => {
    const config = loadConfig({ SENSITIVITY_POINTS: '8', OPTIMIZER_GRID_POINTS: '250', ENGINE_LOG_TIMINGS: 'false' });
    expect(config.sensitivityPoints).toBe(8);
    expect(config.optimizerGridPoints).toBe(250);
    expect(config.logTimings).toBe(false);
  });

  it('rejects values outside their range', () => {
    expect(() => loadConfig({ SENSITIVITY_POINTS: '1' })).toThrow(/^Invalid engine configuration: SENSITIVITY_POINTS: /);
  });

  it('rejects non-numeric values', () => {
    expect(() => loadConfig({ SENSITIVITY_RANGE_PCT: 'wide' })).toThrow(/SENSITIVITY_RANGE_PCT/);
  });

  it('rejects unknown boolean spellings', () => {
    expect(() => loadConfig({ ENGINE_LOG_TIMINGS: 'yes' })).toThrow(/ENGINE_LOG_TIMINGS/);
  });
});
