import type { CombustionInputV1, FuelComposition } from './schema/CombustionInputV1';

export type BiomassPresetId = 'sugarcane_bagasse' | 'wood_chips' | 'rice_husk';

export interface BiomassPreset {
  id: BiomassPresetId;
  label: string;
  fuel: FuelComposition;
  reportedPciKjKg: number;
}

export const BIOMASS_PRESETS: Record<BiomassPresetId, BiomassPreset> = {
  sugarcane_bagasse: {
    id: 'sugarcane_bagasse',
    label: 'Sugarcane bagasse',
    fuel: {
      carbonPct: 50.29,
      hydrogenPct: 5.82,
      oxygenPct: 42.94,
      nitrogenPct: 0.22,
      sulfurPct: 0.08,
      ashPct: 0.66,
      moisturePct: 35.09,
    },
    reportedPciKjKg: 11367,
  },
  wood_chips: {
    id: 'wood_chips',
    label: 'Wood chips',
    fuel: {
      carbonPct: 50.0,
      hydrogenPct: 6.0,
      oxygenPct: 43.2,
      nitrogenPct: 0.3,
      sulfurPct: 0.02,
      ashPct: 0.48,
      moisturePct: 20,
    },
    reportedPciKjKg: 14500,
  },
  rice_husk: {
    id: 'rice_husk',
    label: 'Rice husk',
    fuel: {
      carbonPct: 38.5,
      hydrogenPct: 5.2,
      oxygenPct: 35.5,
      nitrogenPct: 0.5,
      sulfurPct: 0.1,
      ashPct: 20.2,
      moisturePct: 10,
    },
    reportedPciKjKg: 13000,
  },
};

/** Bagasse-fired furnace at Bogotá mean conditions. */
export const DEFAULT_COMBUSTION_INPUT: CombustionInputV1 = {
  fuel: BIOMASS_PRESETS.sugarcane_bagasse.fuel,
  environment: {
    altitudeM: 2640,
    dryBulbTempC: 15,
    relativeHumidityPct: 75,
  },
  operating: {
    flowRateTph: 3000,
    excessAirPct: 30,
    furnaceEfficiencyPct: 90,
    reportedPciKjKg: BIOMASS_PRESETS.sugarcane_bagasse.reportedPciKjKg,
    ductDiameterIn: 30,
  },
};

/** Default operating point and site with another preset's fuel. */
export function inputForPreset(id: BiomassPresetId): CombustionInputV1 {
  const preset = BIOMASS_PRESETS[id];
  return {
    fuel: { ...preset.fuel },
    environment: { ...DEFAULT_COMBUSTION_INPUT.environment },
    operating: { ...DEFAULT_COMBUSTION_INPUT.operating, reportedPciKjKg: preset.reportedPciKjKg },
  };
}
