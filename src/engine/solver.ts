import { NoRootInBracketError } from '../domain/errors.js';

export interface BisectOptions {
  xtol?: number;
  rtol?: number;
  maxIterations?: number;
}

const DEFAULTS: Required<BisectOptions> = {
  xtol: 2e-12,
  rtol: 4 * Number.EPSILON,
  maxIterations: 100
};

/**
 * Finds the zero of `f(x, ...args)` between `lower` and `upper` by bisection.
 * Stops when the half-step drops below `xtol + rtol * |x|`, on an exact zero,
 * or after `maxIterations` halvings (returning the last midpoint).
 *
 * @throws NoRootInBracketError when f(lower) and f(upper) share a sign
 */
export function bisect<A extends unknown[]>(
  f: (x: number, ...args: A) => number,
  lower: number,
  upper: number,
  args: A,
  options: BisectOptions = {}
): number {
  const { xtol, rtol, maxIterations } = { ...DEFAULTS, ...options };

  const fLower = f(lower, ...args);
  const fUpper = f(upper, ...args);
  // also rejects NaN at either end
  if (!(fLower * fUpper <= 0)) throw new NoRootInBracketError(lower, upper);
  if (fLower === 0) return lower;
  if (fUpper === 0) return upper;

  let a = lower;
  let step = upper - lower;
  let mid = a;
  for (let i = 0; i < maxIterations; i++) {
    step *= 0.5;
    mid = a + step;
    const fMid = f(mid, ...args);
    if (fMid * fLower >= 0) a = mid;
    if (fMid === 0 || Math.abs(step) < xtol + rtol * Math.abs(mid)) return mid;
  }
  return mid;
}
