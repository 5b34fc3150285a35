/**
 * Temperature root finder for monotonically increasing property residuals.
 *
 * Newton iteration with a central-difference slope runs first. If the slope
 * is unusable or a step leaves the search window, the remaining iteration
 * budget goes to bracketing from the last point followed by bisection.
 */

import type { ResolverConfig } from './config';
import { logDebug } from './debug';

export interface SearchWindow {
  lower: number;  // K
  upper: number;  // K
}

export type RootSearch =
  | { converged: true; temperature: number; residual: number; iterations: number }
  | { converged: false; lastTemperature: number; iterations: number };

const INITIAL_BRACKET_STEP = 10;  // K

function clamp(value: number, window: SearchWindow): number {
  return Math.max(window.lower, Math.min(value, window.upper));
}

/**
 * Find T in the window with residual(T) = 0. `residual` must increase with
 * temperature; the sign tells which way the root lies.
 */
export function findTemperatureRoot(
  residual: (T: number) => number,
  seed: number,
  window: SearchWindow,
  config: ResolverConfig
): RootSearch {
  let T = clamp(seed, window);
  let fT = residual(T);
  let iterations = 0;

  if (fT === 0) {
    return { converged: true, temperature: T, residual: 0, iterations };
  }

  // Newton phase
  while (iterations < config.maxIterations) {
    iterations++;

    const delta = config.derivativeStep;
    const slope = (residual(T + delta) - residual(T - delta)) / (2 * delta);
    if (!Number.isFinite(slope) || slope <= 0) {
      logDebug(`  newton: unusable slope ${slope} at T=${T.toFixed(3)}K, switching to bisection`);
      break;
    }

    const next = T - fT / slope;
    if (!Number.isFinite(next) || next < window.lower || next > window.upper) {
      logDebug(`  newton: step to ${next} leaves [${window.lower}, ${window.upper}], switching to bisection`);
      break;
    }

    const step = next - T;
    T = next;
    fT = residual(T);

    if (Math.abs(step) <= config.temperatureTolerance || Math.abs(fT) <= config.residualTolerance) {
      return { converged: true, temperature: T, residual: fT, iterations };
    }
  }

  return bisect(residual, T, fT, window, config, iterations);
}

function bisect(
  residual: (T: number) => number,
  start: number,
  fStart: number,
  window: SearchWindow,
  config: ResolverConfig,
  iterationsUsed: number
): RootSearch {
  let iterations = iterationsUsed;

  if (!Number.isFinite(fStart)) {
    return { converged: false, lastTemperature: start, iterations };
  }

  // Walk toward the root with a growing step until the sign changes
  const direction = fStart < 0 ? 1 : -1;
  let step = INITIAL_BRACKET_STEP;
  let near = start;
  let far = start;
  let fFar = fStart;

  while (Math.sign(fFar) === Math.sign(fStart)) {
    if (iterations >= config.maxIterations) {
      return { converged: false, lastTemperature: far, iterations };
    }
    iterations++;

    near = far;
    far = clamp(far + direction * step, window);
    fFar = residual(far);
    step *= 2;

    if (fFar === 0) {
      return { converged: true, temperature: far, residual: 0, iterations };
    }
    if (!Number.isFinite(fFar)) {
      return { converged: false, lastTemperature: far, iterations };
    }
    if (far === near) {
      // Pinned at the window edge without a sign change
      return { converged: false, lastTemperature: far, iterations };
    }
  }

  let lo = Math.min(near, far);
  let hi = Math.max(near, far);
  let mid = (lo + hi) / 2;
  let fMid = residual(mid);

  while (hi - lo > config.temperatureTolerance && Math.abs(fMid) > config.residualTolerance) {
    if (iterations >= config.maxIterations) {
      return { converged: false, lastTemperature: mid, iterations };
    }
    iterations++;

    if (fMid < 0) {
      lo = mid;
    } else {
      hi = mid;
    }
    mid = (lo + hi) / 2;
    fMid = residual(mid);
  }

  return { converged: true, temperature: mid, residual: fMid, iterations };
}
