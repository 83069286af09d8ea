import type { AirPropertiesResult, EnvironmentalConditions } from '../schema/CombustionInputV1';
import {
  absoluteHumidity,
  dryAirDensity,
  moistAirEnthalpy,
  pressureAtAltitudeKpa,
} from '../equations/atmosphere';

/** Stage 2: combustion air at site conditions. */
export function runAirPropertiesModule(environment: EnvironmentalConditions): AirPropertiesResult {
  const atmosphericPressureKpa = pressureAtAltitudeKpa(environment.altitudeM);
  const absoluteHumidityKgKg = absoluteHumidity(
    environment.relativeHumidityPct,
    environment.dryBulbTempC,
    atmosphericPressureKpa,
  );

  return {
    atmosphericPressureKpa,
    airDensityKgM3: dryAirDensity(environment.dryBulbTempC, atmosphericPressureKpa),
    absoluteHumidityKgKg,
    airEnthalpyKjKg: moistAirEnthalpy(environment.dryBulbTempC, absoluteHumidityKgKg),
  };
}
