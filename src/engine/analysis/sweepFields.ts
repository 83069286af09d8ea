import type {
  CombustionInputV1,
  EnvironmentalConditions,
  FuelComposition,
  OperatingParameters,
} from '../schema/CombustionInputV1';

export const SWEEP_FIELD_IDS = [
  'flow_rate',
  'excess_air',
  'furnace_efficiency',
  'reported_pci',
  'duct_diameter',
  'carbon',
  'hydrogen',
  'oxygen',
  'nitrogen',
  'sulfur',
  'ash',
  'moisture',
  'relative_humidity',
  'dry_bulb_temp',
  'altitude',
] as const;

export type SweepFieldId = (typeof SWEEP_FIELD_IDS)[number];

/** Closed interval a sampled value is held to. */
export interface FieldDomain {
  min: number;
  max: number;
}

export interface SweepFieldDescriptor {
  id: SweepFieldId;
  label: string;
  unit: string;
  domain: FieldDomain;
  read: (input: CombustionInputV1) => number;
  /** Returns a new input with this field set; the argument is left untouched. */
  withValue: (input: CombustionInputV1, value: number) => CombustionInputV1;
}

// ─── Domains ──────────────────────────────────────────────────────────────────

// Zero flow, PCI and diameter are guarded in the pipeline, so sweeps may reach them.
const NON_NEGATIVE: FieldDomain = { min: 0, max: Infinity };
const PERCENT: FieldDomain = { min: 0, max: 100 };

// ─── Field builders ───────────────────────────────────────────────────────────

function operatingField(
  id: SweepFieldId,
  key: keyof OperatingParameters,
  label: string,
  unit: string,
  domain: FieldDomain = NON_NEGATIVE,
): SweepFieldDescriptor {
  return {
    id,
    label,
    unit,
    domain,
    read: input => input.operating[key],
    withValue: (input, value) => ({ ...input, operating: { ...input.operating, [key]: value } }),
  };
}

function fuelField(
  id: SweepFieldId,
  key: keyof FuelComposition,
  label: string,
  domain: FieldDomain = PERCENT,
): SweepFieldDescriptor {
  return {
    id,
    label,
    unit: '%',
    domain,
    read: input => input.fuel[key],
    withValue: (input, value) => ({ ...input, fuel: { ...input.fuel, [key]: value } }),
  };
}

function environmentField(
  id: SweepFieldId,
  key: keyof EnvironmentalConditions,
  label: string,
  unit: string,
  domain: FieldDomain,
): SweepFieldDescriptor {
  return {
    id,
    label,
    unit,
    domain,
    read: input => input.environment[key],
    withValue: (input, value) => ({ ...input, environment: { ...input.environment, [key]: value } }),
  };
}

// ─── Registry ─────────────────────────────────────────────────────────────────

export const SWEEP_FIELDS = {
  flow_rate:          operatingField('flow_rate', 'flowRateTph', 'Biomass flow rate', 't/h'),
  excess_air:         operatingField('excess_air', 'excessAirPct', 'Excess air', '%'),
  furnace_efficiency: operatingField('furnace_efficiency', 'furnaceEfficiencyPct', 'Furnace efficiency', '%', { min: 10, max: 100 }),
  reported_pci:       operatingField('reported_pci', 'reportedPciKjKg', 'Reported PCI', 'kJ/kg'),
  duct_diameter:      operatingField('duct_diameter', 'ductDiameterIn', 'Duct diameter', 'in'),
  carbon:             fuelField('carbon', 'carbonPct', 'Carbon (dry)'),
  hydrogen:           fuelField('hydrogen', 'hydrogenPct', 'Hydrogen (dry)'),
  oxygen:             fuelField('oxygen', 'oxygenPct', 'Oxygen (dry)'),
  nitrogen:           fuelField('nitrogen', 'nitrogenPct', 'Nitrogen (dry)'),
  sulfur:             fuelField('sulfur', 'sulfurPct', 'Sulfur (dry)'),
  ash:                fuelField('ash', 'ashPct', 'Ash (dry)'),
  moisture:           fuelField('moisture', 'moisturePct', 'Moisture', { min: 0, max: 60 }),
  relative_humidity:  environmentField('relative_humidity', 'relativeHumidityPct', 'Relative humidity', '%', PERCENT),
  dry_bulb_temp:      environmentField('dry_bulb_temp', 'dryBulbTempC', 'Dry-bulb temperature', '°C', { min: -20, max: 50 }),
  altitude:           environmentField('altitude', 'altitudeM', 'Altitude', 'm', { min: 0, max: 5000 }),
} satisfies Record<SweepFieldId, SweepFieldDescriptor>;

export function getSweepField(id: SweepFieldId): SweepFieldDescriptor {
  return SWEEP_FIELDS[id];
}

export function isSweepFieldId(value: string): value is SweepFieldId {
  return SWEEP_FIELD_IDS.some(id => id === value);
}

export function clampToDomain(descriptor: SweepFieldDescriptor, value: number): number {
  return Math.min(descriptor.domain.max, Math.max(descriptor.domain.min, value));
}
