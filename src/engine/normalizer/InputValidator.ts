import { z } from 'zod';
import { SWEEP_FIELD_IDS } from '../analysis/sweepFields';

// ─── Errors ───────────────────────────────────────────────────────────────────

/** Rejected payload at the service boundary. `issues` holds one line per problem. */
export class InputValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid input: ${issues.join('; ')}`);
    this.name = 'InputValidationError';
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

/** Parses `payload` or throws InputValidationError listing every issue. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, payload: unknown): z.output<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new InputValidationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

// ─── Combustion input ─────────────────────────────────────────────────────────

export const COMPOSITION_SUM_TOLERANCE_PCT = 0.5;

const percent = z.number().finite().min(0).max(100);

export const fuelCompositionSchema = z
  .object({
    carbonPct: percent,
    hydrogenPct: percent,
    oxygenPct: percent,
    nitrogenPct: percent,
    sulfurPct: percent,
    ashPct: percent,
    moisturePct: z.number().finite().min(0).max(60),
  })
  .superRefine((fuel, ctx) => {
    const sum =
      fuel.carbonPct + fuel.hydrogenPct + fuel.oxygenPct +
      fuel.nitrogenPct + fuel.sulfurPct + fuel.ashPct;
    if (Math.abs(sum - 100) > COMPOSITION_SUM_TOLERANCE_PCT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Dry composition must total 100 ± ${COMPOSITION_SUM_TOLERANCE_PCT}% (got ${sum.toFixed(2)}%)`,
      });
    }
  });

export const environmentalConditionsSchema = z.object({
  altitudeM: z.number().finite().min(0).max(5000),
  dryBulbTempC: z.number().finite().min(-20).max(50),
  relativeHumidityPct: percent,
});

export const operatingParametersSchema = z.object({
  flowRateTph: z.number().finite().positive(),
  excessAirPct: z.number().finite().min(0),
  furnaceEfficiencyPct: z.number().finite().min(10).max(100),
  reportedPciKjKg: z.number().finite().positive(),
  ductDiameterIn: z.number().finite().positive(),
});

export const combustionInputSchema = z.object({
  fuel: fuelCompositionSchema,
  environment: environmentalConditionsSchema,
  operating: operatingParametersSchema,
});

export const projectInfoSchema = z.object({
  projectCode: z.string().min(1),
  documentCode: z.string().min(1).optional(),
  analyst: z.string().min(1).optional(),
  biomassType: z.string().min(1).optional(),
  city: z.string().min(1).optional(),
});

export const combustionRequestSchema = z.object({
  input: combustionInputSchema,
  project: projectInfoSchema.optional(),
});

// ─── Analysis requests ────────────────────────────────────────────────────────

export const sweepFieldSchema = z.enum(SWEEP_FIELD_IDS);

const rangePctSchema = z.number().finite().gt(0).max(99);
const numPointsSchema = z.number().int().min(2).max(200);

export const sensitivityRequestSchema = z.object({
  input: combustionInputSchema,
  parameter: sweepFieldSchema,
  rangePct: rangePctSchema.optional(),
  numPoints: numPointsSchema.optional(),
});

export const multiSensitivityRequestSchema = z.object({
  input: combustionInputSchema,
  parameters: z.array(sweepFieldSchema).min(1),
  rangePct: rangePctSchema.optional(),
  numPoints: numPointsSchema.optional(),
});

export const optimizationConstraintsSchema = z
  .object({
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
    rangePct: rangePctSchema.optional(),
    maxVelocityMs: z.number().finite().positive().optional(),
    minEfficiencyPct: z.number().finite().min(0).max(100).optional(),
    maxOutletTempK: z.number().finite().positive().optional(),
  })
  .refine(c => c.min === undefined || c.max === undefined || c.min < c.max, {
    message: 'min must be below max',
    path: ['min'],
  });

export const optimizationRequestSchema = z.object({
  input: combustionInputSchema,
  parameter: sweepFieldSchema,
  objective: z.enum(['efficiency', 'temperature', 'velocity']).default('efficiency'),
  constraints: optimizationConstraintsSchema.default({}),
  gridPoints: z.number().int().min(2).max(1000).optional(),
});

/** Site conditions are only checked for being numbers; range problems are reported by validateConditions. */
export const atmosphericRequestSchema = z.object({
  altitudeM: z.number().finite(),
  dryBulbTempC: z.number().finite(),
  relativeHumidityPct: z.number().finite(),
});

export const cityRequestSchema = z.object({
  name: z.string().trim().min(1),
});

export type CombustionRequest = z.infer<typeof combustionRequestSchema>;
export type SensitivityRequest = z.infer<typeof sensitivityRequestSchema>;
export type MultiSensitivityRequest = z.infer<typeof multiSensitivityRequestSchema>;
export type OptimizationRequest = z.infer<typeof optimizationRequestSchema>;
export type AtmosphericRequest = z.infer<typeof atmosphericRequestSchema>;
export type ProjectInfo = z.infer<typeof projectInfoSchema>;
