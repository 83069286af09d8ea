import {
  ANTOINE_WATER,
  CONVERSION,
  GRAVITY,
  KELVIN_OFFSET,
  R_AIR,
  R_UNIVERSAL,
  STANDARD_ATMOSPHERE,
} from '../constants';

/**
 * Barometric pressure (kPa) at a given altitude.
 *
 * Troposphere (h < 11 000 m): P = P0·(1 − L·h/T0)^(g·M/(R·L))
 * Above that an isothermal decay P0·e^(−h/8500) is used.
 */
export function pressureAtAltitudeKpa(altitudeM: number): number {
  const { seaLevelPressureKpa: P0, lapseRateKPerM: L, seaLevelTempK: T0, airMolarMassKgMol: M } =
    STANDARD_ATMOSPHERE;

  if (altitudeM < STANDARD_ATMOSPHERE.tropopauseM) {
    const exponent = (GRAVITY * M) / (R_UNIVERSAL * L);
    return P0 * Math.pow(1 - (L * altitudeM) / T0, exponent);
  }
  return P0 * Math.exp(-altitudeM / STANDARD_ATMOSPHERE.scaleHeightM);
}

/**
 * Saturated vapour pressure of water (mmHg) from the Antoine equation.
 * Coefficients are fitted for roughly 1–100 °C; no range check is applied.
 */
export function saturatedVaporPressureMmHg(tempC: number): number {
  const { A, B, C } = ANTOINE_WATER;
  return Math.pow(10, A - B / (C + tempC));
}

/**
 * Absolute humidity (kg water / kg dry air).
 * Diverges as the partial vapour pressure approaches the total pressure.
 */
export function absoluteHumidity(
  relativeHumidityPct: number,
  dryBulbTempC: number,
  atmosphericPressureKpa: number,
): number {
  const pvKpa =
    (relativeHumidityPct / 100) * saturatedVaporPressureMmHg(dryBulbTempC) * CONVERSION.mmHgToKpa;
  return (0.622 * pvKpa) / (atmosphericPressureKpa - pvKpa);
}

/** Moist-air enthalpy, kJ per kg of dry air. */
export function moistAirEnthalpy(tempC: number, absoluteHumidityKgKg: number): number {
  return 1.006 * tempC + absoluteHumidityKgKg * (2501 + 1.86 * tempC);
}

/** Dry-air density (kg/m³) from the ideal-gas law. */
export function dryAirDensity(tempC: number, pressureKpa: number): number {
  return (pressureKpa * CONVERSION.kpaToPa) / (R_AIR * (tempC + KELVIN_OFFSET));
}
