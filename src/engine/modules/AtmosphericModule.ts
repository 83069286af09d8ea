import type { EnvironmentalConditions } from '../schema/CombustionInputV1';
import { CONVERSION, STANDARD_ATMOSPHERE } from '../constants';
import {
  absoluteHumidity,
  dryAirDensity,
  moistAirEnthalpy,
  pressureAtAltitudeKpa,
  saturatedVaporPressureMmHg,
} from '../equations/atmosphere';
import { getCityConditions } from '../../data/referenceCities';

// ─── Constants ────────────────────────────────────────────────────────────────

const SEA_LEVEL_OXYGEN_FRACTION = 0.21;
const OXYGEN_LOSS_PER_M = 5e-6;
const MIN_OXYGEN_FRACTION = 0.15;

const HIGH_ALTITUDE_WARN_M = 3000;
const HIGH_HUMIDITY_WARN_PCT = 90;
const LOW_PRESSURE_WARN_KPA = 70;

const DENSITY_IMPACT_PCT = 5;
const TEMPERATURE_IMPACT_C = 5;
const HUMIDITY_IMPACT_POINTS = 10;

// ─── Types ────────────────────────────────────────────────────────────────────

export interface AtmosphericConditions extends EnvironmentalConditions {
  /** Site name for reports; omitted for custom conditions. */
  name?: string;
  pressureKpa: number;
  airDensityKgM3: number;
  absoluteHumidityKgKg: number;
  airEnthalpyKjKg: number;
  vaporPressureMmHg: number;
  oxygenFraction: number;
}

export interface ConditionsValidation {
  isValid: boolean;
  warnings: string[];
  errors: string[];
}

export type ComparedField = 'pressureKpa' | 'airDensityKgM3' | 'dryBulbTempC' | 'relativeHumidityPct';

export interface FieldComparison {
  first: number;
  second: number;
  difference: number;
  /** 0 when the first value is 0. */
  percentChange: number;
}

export interface CombustionImpact {
  factor: 'air_density' | 'ambient_temperature' | 'relative_humidity';
  impact: string;
  recommendation: string;
}

export interface ConditionsComparison {
  fields: Record<ComparedField, FieldComparison>;
  impacts: CombustionImpact[];
  overallRisk: 'Low' | 'Medium' | 'High';
  needsAdjustment: boolean;
}

// ─── Calculations ─────────────────────────────────────────────────────────────

/** Available O2 volume fraction, reduced linearly with altitude and floored at 15 %. */
export function oxygenFraction(altitudeM: number): number {
  return Math.max(SEA_LEVEL_OXYGEN_FRACTION - altitudeM * OXYGEN_LOSS_PER_M, MIN_OXYGEN_FRACTION);
}

export function calculateCustomConditions(
  altitudeM: number,
  dryBulbTempC: number,
  relativeHumidityPct: number,
): AtmosphericConditions {
  const pressureKpa = pressureAtAltitudeKpa(altitudeM);
  const absoluteHumidityKgKg = absoluteHumidity(relativeHumidityPct, dryBulbTempC, pressureKpa);

  return {
    altitudeM,
    dryBulbTempC,
    relativeHumidityPct,
    pressureKpa,
    airDensityKgM3: dryAirDensity(dryBulbTempC, pressureKpa),
    absoluteHumidityKgKg,
    airEnthalpyKjKg: moistAirEnthalpy(dryBulbTempC, absoluteHumidityKgKg),
    vaporPressureMmHg: saturatedVaporPressureMmHg(dryBulbTempC),
    oxygenFraction: oxygenFraction(altitudeM),
  };
}

/** Calculated conditions at a reference city's mean altitude, temperature and humidity. */
export function calculateCityConditions(cityName: string): AtmosphericConditions {
  const city = getCityConditions(cityName);
  return {
    ...calculateCustomConditions(city.altitudeM, city.avgTempC, city.avgHumidityPct),
    name: city.name,
  };
}

/**
 * Volumetric air-flow correction relative to sea level: P0 / P(h).
 * 1 at sea level, growing with altitude.
 */
export function altitudeCorrectionFactor(altitudeM: number): number {
  return STANDARD_ATMOSPHERE.seaLevelPressureKpa / pressureAtAltitudeKpa(altitudeM);
}

export function validateConditions(conditions: AtmosphericConditions): ConditionsValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (conditions.altitudeM < 0 || conditions.altitudeM > 5000) {
    errors.push('Altitude out of range (0–5000 m)');
  }
  if (conditions.dryBulbTempC < -20 || conditions.dryBulbTempC > 50) {
    errors.push('Temperature out of range (−20 to 50°C)');
  }
  if (conditions.relativeHumidityPct < 0 || conditions.relativeHumidityPct > 100) {
    errors.push('Relative humidity must be between 0 and 100%');
  }

  if (conditions.altitudeM > HIGH_ALTITUDE_WARN_M) {
    warnings.push('High altitude may require significant air-supply adjustment');
  }
  if (conditions.relativeHumidityPct > HIGH_HUMIDITY_WARN_PCT) {
    warnings.push('High humidity may reduce combustion efficiency');
  }
  if (conditions.pressureKpa < LOW_PRESSURE_WARN_KPA) {
    warnings.push('Low atmospheric pressure detected');
  }

  return { isValid: errors.length === 0, warnings, errors };
}

function compareField(first: number, second: number): FieldComparison {
  return {
    first,
    second,
    difference: second - first,
    percentChange: first !== 0 ? ((second - first) / first) * 100 : 0,
  };
}

export function compareConditions(
  first: AtmosphericConditions,
  second: AtmosphericConditions,
): ConditionsComparison {
  const fields: Record<ComparedField, FieldComparison> = {
    pressureKpa: compareField(first.pressureKpa, second.pressureKpa),
    airDensityKgM3: compareField(first.airDensityKgM3, second.airDensityKgM3),
    dryBulbTempC: compareField(first.dryBulbTempC, second.dryBulbTempC),
    relativeHumidityPct: compareField(first.relativeHumidityPct, second.relativeHumidityPct),
  };

  const impacts: CombustionImpact[] = [];

  const densityChange = fields.airDensityKgM3.percentChange;
  if (Math.abs(densityChange) > DENSITY_IMPACT_PCT) {
    impacts.push({
      factor: 'air_density',
      impact: `${densityChange.toFixed(1)}% change in available oxygen`,
      recommendation: densityChange > 0 ? 'Adjust the air-fuel ratio' : 'Reduce excess air',
    });
  }

  const tempChange = fields.dryBulbTempC.difference;
  if (Math.abs(tempChange) > TEMPERATURE_IMPACT_C) {
    impacts.push({
      factor: 'ambient_temperature',
      impact: `${tempChange.toFixed(1)}°C change affects flame temperature`,
      recommendation: 'Monitor flue-gas temperature',
    });
  }

  const humidityChange = fields.relativeHumidityPct.difference;
  if (Math.abs(humidityChange) > HUMIDITY_IMPACT_POINTS) {
    impacts.push({
      factor: 'relative_humidity',
      impact: `${humidityChange.toFixed(1)} point change in combustion-air humidity`,
      recommendation: 'Account for the extra water in the combustion calculation',
    });
  }

  const overallRisk = impacts.length > 2 ? 'High' : impacts.length > 0 ? 'Medium' : 'Low';
  return { fields, impacts, overallRisk, needsAdjustment: impacts.length > 0 };
}

/** Plain-text summary of site conditions with combustion recommendations. */
export function buildAtmosphericReport(conditions: AtmosphericConditions): string {
  const densityVsSeaLevel = (conditions.airDensityKgM3 / STANDARD_ATMOSPHERE.seaLevelAirDensityKgM3) * 100;
  const oxygenVsSeaLevel = (conditions.oxygenFraction / SEA_LEVEL_OXYGEN_FRACTION) * 100;

  const lines = [
    'ATMOSPHERIC CONDITIONS REPORT',
    '=============================',
    '',
    `Location: ${conditions.name ?? 'Custom'}`,
    `Altitude: ${conditions.altitudeM.toFixed(0)} m a.s.l.`,
    `Temperature: ${conditions.dryBulbTempC.toFixed(1)}°C`,
    `Relative humidity: ${conditions.relativeHumidityPct.toFixed(1)}%`,
    '',
    'CALCULATED PROPERTIES',
    '---------------------',
    `Atmospheric pressure: ${conditions.pressureKpa.toFixed(1)} kPa ` +
      `(${(conditions.pressureKpa * CONVERSION.kpaToMmHg).toFixed(1)} mmHg)`,
    `Air density: ${conditions.airDensityKgM3.toFixed(3)} kg/m³`,
    `Absolute humidity: ${conditions.absoluteHumidityKgKg.toFixed(4)} kg water/kg dry air`,
    `Air enthalpy: ${conditions.airEnthalpyKjKg.toFixed(1)} kJ/kg dry air`,
    `Oxygen fraction: ${(conditions.oxygenFraction * 100).toFixed(2)}% by volume`,
    '',
    'RELATIVE TO SEA LEVEL',
    '---------------------',
    `Density: ${densityVsSeaLevel.toFixed(1)}% of sea-level value`,
    `Available oxygen: ${oxygenVsSeaLevel.toFixed(1)}% of sea-level value`,
    '',
    'COMBUSTION RECOMMENDATIONS',
    '--------------------------',
  ];

  if (conditions.altitudeM > 2000) {
    lines.push('- High altitude: increase volumetric air supply by 15–25%');
  }
  if (conditions.relativeHumidityPct > 80) {
    lines.push('- High humidity: consider preheating the combustion air');
  }
  if (conditions.dryBulbTempC < 10) {
    lines.push('- Low temperature: allow a longer preheating period');
  }

  return lines.join('\n') + '\n';
}
