/**
 * Root finding for increasing functions of one decimal variable.
 *
 * Used to invert the housing-payment formula: given a target monthly payment,
 * find the home price whose payment meets it. Neither strategy throws on
 * non-convergence; callers read `converged` instead.
 */

import { Decimal, ZERO, toMoney, type Numeric } from './decimal.js';

export type SolverStrategy = 'bisection' | 'fixed-point';

export interface SolverOptions {
  strategy?: SolverStrategy;
  /** Stop once |target − f(x)| is below this. Default: 10 */
  tolerance?: Numeric;
  /** Iteration cap. Default: 100 for bisection, 10 for fixed-point */
  maxIterations?: number;
  /** Starting guess / initial upper bracket. Default: target × gain */
  seed?: Numeric;
  /** Fixed-point step size: x += (target − f(x)) × gain. Default: 200 */
  gain?: Numeric;
}

export interface SolverResult {
  value: Decimal;
  /** target − f(value); positive means the value under-shoots the target */
  residual: Decimal;
  iterations: number;
  converged: boolean;
}

export const DEFAULT_TOLERANCE = 10;
export const DEFAULT_GAIN = 200;
export const DEFAULT_BISECTION_ITERATIONS = 100;
export const DEFAULT_FIXED_POINT_ITERATIONS = 10;

/** Doublings allowed while searching for an upper bracket. */
const MAX_BRACKET_EXPANSIONS = 64;

type IncreasingFunction = (x: Decimal) => Decimal;

/**
 * Solve f(x) = target for x ≥ 0, where f is non-decreasing.
 *
 * When f(0) already meets or exceeds the target, 0 is returned.
 */
export function solveIncreasing(
  f: IncreasingFunction,
  target: Numeric,
  options: SolverOptions = {}
): SolverResult {
  const strategy = options.strategy ?? 'bisection';
  return strategy === 'fixed-point'
    ? fixedPoint(f, toMoney(target), options)
    : bisection(f, toMoney(target), options);
}

/**
 * Bracket-and-bisect.
 *
 * The lower bracket always satisfies f(lower) ≤ target, so an unconverged
 * result errs on the affordable side.
 */
function bisection(f: IncreasingFunction, target: Decimal, options: SolverOptions): SolverResult {
  const tolerance = toMoney(options.tolerance ?? DEFAULT_TOLERANCE);
  const maxIterations = options.maxIterations ?? DEFAULT_BISECTION_ITERATIONS;
  const gain = toMoney(options.gain ?? DEFAULT_GAIN);

  // Target at or below the cost of x = 0
  const atZero = target.minus(f(ZERO));
  if (atZero.lt(tolerance)) {
    return { value: ZERO, residual: atZero, iterations: 0, converged: true };
  }

  let lower = ZERO;
  let lowerResidual = atZero;
  let upper = toMoney(options.seed ?? target.times(gain));
  if (upper.lte(0)) upper = toMoney(1);

  let upperResidual = target.minus(f(upper));
  let expansions = 0;
  while (upperResidual.gt(0) && expansions < MAX_BRACKET_EXPANSIONS) {
    if (upperResidual.lt(tolerance)) {
      return { value: upper, residual: upperResidual, iterations: 0, converged: true };
    }
    lower = upper;
    lowerResidual = upperResidual;
    upper = upper.times(2);
    upperResidual = target.minus(f(upper));
    expansions++;
  }

  if (upperResidual.gt(0)) {
    return { value: lower, residual: lowerResidual, iterations: 0, converged: false };
  }

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const mid = lower.plus(upper).div(2);
    const residual = target.minus(f(mid));

    if (residual.abs().lt(tolerance)) {
      return { value: mid, residual, iterations: iteration, converged: true };
    }

    if (residual.gt(0)) {
      lower = mid;
      lowerResidual = residual;
    } else {
      upper = mid;
    }
  }

  return { value: lower, residual: lowerResidual, iterations: maxIterations, converged: false };
}

/**
 * Damped fixed-point iteration: x ← x + (target − f(x)) × gain.
 *
 * Converges when gain × f'(x) lies in (0, 2); for steep payment curves
 * (high rates, low down payments) it can oscillate, in which case the
 * iterate with the smallest residual is returned.
 */
function fixedPoint(f: IncreasingFunction, target: Decimal, options: SolverOptions): SolverResult {
  const tolerance = toMoney(options.tolerance ?? DEFAULT_TOLERANCE);
  const maxIterations = options.maxIterations ?? DEFAULT_FIXED_POINT_ITERATIONS;
  const gain = toMoney(options.gain ?? DEFAULT_GAIN);

  let value = toMoney(options.seed ?? target.times(gain));
  let best: SolverResult | undefined;

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const residual = target.minus(f(value));

    if (best === undefined || residual.abs().lt(best.residual.abs())) {
      best = { value, residual, iterations: iteration, converged: false };
    }

    if (residual.abs().lt(tolerance)) {
      return { value, residual, iterations: iteration, converged: true };
    }

    value = value.plus(residual.times(gain));
  }

  return best ?? { value, residual: target.minus(f(value)), iterations: 0, converged: false };
}
