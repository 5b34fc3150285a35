/**
 * Sweep and sensitivity driver.
 *
 * Runs an evaluator over an ordered list of inputs. A CycleError for one
 * input is recorded in that input's outcome and the sweep moves on; any
 * other exception is a bug and propagates.
 */

import { evaluateBrayton } from './brayton';
import { evaluateCombinedCycle } from './combined-cycle';
import type { ResolverConfig } from './config';
import { logDebug } from './debug';
import { isCycleError } from './errors';
import type { CycleError } from './errors';
import type {
  BottomingCycleParameters,
  CombinedCycleResult,
  CycleParameters,
  CycleResult,
  PropertyProvider,
} from './types';

export type SweepOutcome<TInput, TResult> =
  | { input: TInput; ok: true; result: TResult }
  | { input: TInput; ok: false; error: CycleError };

export interface Optimum<TInput, TResult> {
  index: number;
  input: TInput;
  result: TResult;
  value: number;
}

export interface OptimumOptions {
  /** Skip results computed from extrapolated property data */
  excludeExtrapolated?: boolean;
}

/**
 * `count` evenly spaced values from start to stop inclusive.
 */
export function linspace(start: number, stop: number, count: number): number[] {
  if (!Number.isInteger(count) || count < 1) return [];
  if (count === 1) return [start];

  const step = (stop - start) / (count - 1);
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(i === count - 1 ? stop : start + i * step);
  }
  return values;
}

export function runSweep<TInput, TResult>(
  inputs: readonly TInput[],
  evaluate: (input: TInput) => TResult
): SweepOutcome<TInput, TResult>[] {
  const outcomes: SweepOutcome<TInput, TResult>[] = [];

  for (const input of inputs) {
    try {
      outcomes.push({ input, ok: true, result: evaluate(input) });
    } catch (error) {
      if (!isCycleError(error)) throw error;
      logDebug(`sweep: input ${JSON.stringify(input)} failed (${error.kind}): ${error.message}`);
      outcomes.push({ input, ok: false, error });
    }
  }

  const failures = outcomes.filter((o) => !o.ok).length;
  if (failures > 0) {
    console.warn(`[Cycle] Sweep finished with ${failures} of ${inputs.length} inputs failed`);
  }

  return outcomes;
}

/**
 * Linear scan for the largest score. Failed inputs are skipped; ties go to
 * the earliest input. Returns null when nothing qualifies.
 */
export function findOptimum<TInput, TResult extends { extrapolated: boolean }>(
  outcomes: readonly SweepOutcome<TInput, TResult>[],
  score: (result: TResult) => number,
  options: OptimumOptions = {}
): Optimum<TInput, TResult> | null {
  let best: Optimum<TInput, TResult> | null = null;

  for (let index = 0; index < outcomes.length; index++) {
    const outcome = outcomes[index];
    if (!outcome.ok) continue;
    if (options.excludeExtrapolated && outcome.result.extrapolated) continue;

    const value = score(outcome.result);
    if (Number.isNaN(value)) continue;

    if (best === null || value > best.value) {
      best = { index, input: outcome.input, result: outcome.result, value };
    }
  }

  return best;
}

// ============================================================================
// Convenience Drivers
// ============================================================================

export function sweepCompressionRatios(
  provider: PropertyProvider,
  base: CycleParameters,
  ratios: readonly number[],
  config: Partial<ResolverConfig> = {}
): SweepOutcome<number, CycleResult>[] {
  return runSweep(ratios, (compressionRatio) =>
    evaluateBrayton(provider, { ...base, compressionRatio }, config)
  );
}

export function sweepCombinedCycle(
  provider: PropertyProvider,
  base: CycleParameters,
  bottoming: BottomingCycleParameters,
  ratios: readonly number[],
  config: Partial<ResolverConfig> = {}
): SweepOutcome<number, CombinedCycleResult>[] {
  return runSweep(ratios, (compressionRatio) =>
    evaluateCombinedCycle(provider, { ...base, compressionRatio }, bottoming, config)
  );
}

export interface EfficiencyPair {
  compressorEfficiency: number;
  turbineEfficiency: number;
}

/**
 * Sensitivity to component quality at the base compression ratio. Plain
 * numbers set both efficiencies to the same value.
 */
export function sweepIsentropicEfficiencies(
  provider: PropertyProvider,
  base: CycleParameters,
  efficiencies: readonly (number | EfficiencyPair)[],
  config: Partial<ResolverConfig> = {}
): SweepOutcome<EfficiencyPair, CycleResult>[] {
  const pairs = efficiencies.map((e): EfficiencyPair =>
    typeof e === 'number' ? { compressorEfficiency: e, turbineEfficiency: e } : e
  );

  return runSweep(pairs, (pair) => evaluateBrayton(provider, { ...base, ...pair }, config));
}
