/**
 * Mean site conditions for reference Colombian cities.
 * `pressureMmHg` and `airDensityKgM3` are published station averages, not
 * values derived from the standard atmosphere.
 */
export interface ReferenceCity {
  name: string;
  altitudeM: number;
  avgTempC: number;
  avgHumidityPct: number;
  pressureMmHg: number;
  airDensityKgM3: number;
}

export const DEFAULT_CITY_NAME = 'Bogotá';

const REFERENCE_CITIES: readonly ReferenceCity[] = [
  { name: 'Bogotá',        altitudeM: 2640, avgTempC: 15, avgHumidityPct: 75, pressureMmHg: 746,  airDensityKgM3: 1.00 },
  { name: 'Medellín',      altitudeM: 1475, avgTempC: 22, avgHumidityPct: 70, pressureMmHg: 845,  airDensityKgM3: 1.05 },
  { name: 'Cali',          altitudeM: 1018, avgTempC: 24, avgHumidityPct: 80, pressureMmHg: 890,  airDensityKgM3: 1.08 },
  { name: 'Barranquilla',  altitudeM: 30,   avgTempC: 28, avgHumidityPct: 85, pressureMmHg: 1010, airDensityKgM3: 1.16 },
  { name: 'Bucaramanga',   altitudeM: 959,  avgTempC: 23, avgHumidityPct: 75, pressureMmHg: 895,  airDensityKgM3: 1.09 },
  { name: 'Pereira',       altitudeM: 1467, avgTempC: 21, avgHumidityPct: 77, pressureMmHg: 846,  airDensityKgM3: 1.06 },
  { name: 'Manizales',     altitudeM: 2150, avgTempC: 17, avgHumidityPct: 78, pressureMmHg: 780,  airDensityKgM3: 1.02 },
  { name: 'Cúcuta',        altitudeM: 320,  avgTempC: 27, avgHumidityPct: 70, pressureMmHg: 975,  airDensityKgM3: 1.12 },
  { name: 'Ibagué',        altitudeM: 1285, avgTempC: 21, avgHumidityPct: 73, pressureMmHg: 865,  airDensityKgM3: 1.07 },
  { name: 'Villavicencio', altitudeM: 467,  avgTempC: 27, avgHumidityPct: 82, pressureMmHg: 955,  airDensityKgM3: 1.10 },
];

function findCity(name: string): ReferenceCity | undefined {
  const key = name.trim().toLocaleLowerCase('es');
  return REFERENCE_CITIES.find(c => c.name.toLocaleLowerCase('es') === key);
}

/** Case-insensitive lookup; unknown names fall back to the default city. */
export function getCityConditions(name: string): ReferenceCity {
  const city = findCity(name) ?? findCity(DEFAULT_CITY_NAME);
  if (!city) {
    throw new Error(`Default reference city "${DEFAULT_CITY_NAME}" is missing`);
  }
  return { ...city };
}

export function isKnownCity(name: string): boolean {
  return findCity(name) !== undefined;
}

/** All reference cities, lowest altitude first. */
export function listCities(): ReferenceCity[] {
  return REFERENCE_CITIES.map(c => ({ ...c })).sort((a, b) => a.altitudeM - b.altitudeM);
}
