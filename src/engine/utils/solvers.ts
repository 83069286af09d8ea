/**
 * Small numerical toolkit shared by the equation library and the analysis
 * layer. Iterative solvers never throw on non-convergence: they hand back the
 * last iterate together with a `converged` flag so callers decide whether to
 * surface a warning.
 */

export interface SolverResult {
  value: number;
  iterations: number;
  converged: boolean;
}

export interface IterationOptions {
  maxIterations?: number;
  tolerance?: number;
}

/**
 * Iterate x ← step(x) from `seed` until successive estimates differ by less
 * than `tolerance`.
 */
export function fixedPointIterate(
  step: (x: number) => number,
  seed: number,
  { maxIterations = 10, tolerance = 1e-6 }: IterationOptions = {},
): SolverResult {
  let x = seed;
  for (let i = 1; i <= maxIterations; i++) {
    const next = step(x);
    if (!Number.isFinite(next)) {
      return { value: x, iterations: i, converged: false };
    }
    if (Math.abs(next - x) < tolerance) {
      return { value: next, iterations: i, converged: true };
    }
    x = next;
  }
  return { value: x, iterations: maxIterations, converged: false };
}

/**
 * Newton-Raphson root finder using a central-difference derivative.
 * Stops without converging when the derivative vanishes.
 */
export function newtonRaphson(
  fn: (x: number) => number,
  seed: number,
  { maxIterations = 50, tolerance = 1e-6 }: IterationOptions = {},
): SolverResult {
  let x = seed;
  for (let i = 1; i <= maxIterations; i++) {
    const h = 1e-3 * Math.max(1, Math.abs(x));
    const fx = fn(x);
    const dfx = (fn(x + h) - fn(x - h)) / (2 * h);
    if (dfx === 0 || !Number.isFinite(dfx)) {
      return { value: x, iterations: i, converged: false };
    }
    const next = x - fx / dfx;
    if (!Number.isFinite(next)) {
      return { value: x, iterations: i, converged: false };
    }
    if (Math.abs(next - x) < tolerance) {
      return { value: next, iterations: i, converged: true };
    }
    x = next;
  }
  return { value: x, iterations: maxIterations, converged: false };
}

/** `count` evenly spaced samples over [start, stop], both ends included. */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count <= 0) return [];
  if (count === 1) return [start];
  const step = (stop - start) / (count - 1);
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + i * step));
}

/**
 * dy/dx over a sampled curve with possibly non-uniform spacing.
 *
 * Interior points use second-order central differences; the two ends use
 * one-sided first-order differences. Any stencil with zero spacing yields 0.
 */
export function gradient(y: readonly number[], x: readonly number[]): number[] {
  const n = Math.min(y.length, x.length);
  if (n < 2) return Array.from({ length: n }, () => 0);

  const out = new Array<number>(n).fill(0);
  const oneSided = (i0: number, i1: number): number => {
    const dx = x[i1] - x[i0];
    return dx === 0 ? 0 : (y[i1] - y[i0]) / dx;
  };

  out[0] = oneSided(0, 1);
  out[n - 1] = oneSided(n - 2, n - 1);

  for (let i = 1; i < n - 1; i++) {
    const hd = x[i] - x[i - 1];
    const hs = x[i + 1] - x[i];
    if (hd === 0 || hs === 0 || hd + hs === 0) continue;
    const a = -hs / (hd * (hd + hs));
    const b = (hs - hd) / (hd * hs);
    const c = hd / (hs * (hd + hs));
    out[i] = a * y[i - 1] + b * y[i] + c * y[i + 1];
  }
  return out;
}
