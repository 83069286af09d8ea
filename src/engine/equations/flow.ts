import { GAS_DYNAMIC_VISCOSITY, REFRACTORY } from '../constants';
import type { FrictionFactorResult } from '../schema/CombustionInputV1';
import { fixedPointIterate } from '../utils/solvers';
import type { SolverResult } from '../utils/solvers';

/** Below this Reynolds number the flow is laminar. */
export const LAMINAR_LIMIT_RE = 2300;
/** From this Reynolds number on the flow is fully turbulent. */
export const TURBULENT_ONSET_RE = 4000;

const COLEBROOK_SEED = 0.02;
const COLEBROOK_MAX_ITERATIONS = 10;
const COLEBROOK_TOLERANCE = 1e-6;

/** Re = ρ·v·D / μ */
export function reynoldsNumber(
  velocityMs: number,
  diameterM: number,
  densityKgM3: number,
  viscosityPaS = GAS_DYNAMIC_VISCOSITY,
): number {
  return (densityKgM3 * velocityMs * diameterM) / viscosityPaS;
}

function solveColebrook(re: number, diameterM: number, roughnessM: number): SolverResult {
  const roughnessTerm = roughnessM / (3.7 * diameterM);
  return fixedPointIterate(
    (f) => Math.pow(-2 * Math.log10(roughnessTerm + 2.51 / (re * Math.sqrt(f))), -2),
    COLEBROOK_SEED,
    { maxIterations: COLEBROOK_MAX_ITERATIONS, tolerance: COLEBROOK_TOLERANCE },
  );
}

/**
 * Darcy friction factor.
 *
 *   Re < 2300          laminar, f = 64/Re
 *   2300 ≤ Re < 4000   linear blend from 64/2300 to the Colebrook value at Re = 4000
 *   Re ≥ 4000          Colebrook-White, fixed-point iteration seeded at 0.02
 *
 * The transitional blend is not Colebrook-White. It keeps f continuous at
 * Re = 2300, where switching straight from 64/Re to Colebrook would jump.
 *
 * Non-convergence after 10 iterations returns the last estimate with
 * `converged: false`. A non-positive Re (no flow) gives f = 0.
 */
export function colebrookFrictionFactor(
  re: number,
  diameterM: number,
  roughnessM: number = REFRACTORY.roughnessM,
): FrictionFactorResult {
  if (re <= 0) {
    return { value: 0, iterations: 0, converged: true, regime: 'laminar' };
  }
  if (re < LAMINAR_LIMIT_RE) {
    return { value: 64 / re, iterations: 0, converged: true, regime: 'laminar' };
  }
  if (re >= TURBULENT_ONSET_RE) {
    return { ...solveColebrook(re, diameterM, roughnessM), regime: 'turbulent' };
  }

  const laminarEdge = 64 / LAMINAR_LIMIT_RE;
  const turbulentEdge = solveColebrook(TURBULENT_ONSET_RE, diameterM, roughnessM);
  const weight = (re - LAMINAR_LIMIT_RE) / (TURBULENT_ONSET_RE - LAMINAR_LIMIT_RE);
  return {
    value: laminarEdge + weight * (turbulentEdge.value - laminarEdge),
    iterations: turbulentEdge.iterations,
    converged: turbulentEdge.converged,
    regime: 'transitional',
  };
}

/** Darcy-Weisbach pressure drop per metre of duct (Pa/m): f·(1/D)·(ρv²/2). */
export function darcyPressureDropPerMeter(
  frictionFactor: number,
  densityKgM3: number,
  velocityMs: number,
  diameterM: number,
): number {
  return frictionFactor * (1 / diameterM) * ((densityKgM3 * velocityMs ** 2) / 2);
}
