/**
 * Default parameters and solver configuration.
 */

import type { BottomingCycleParameters, CycleParameters } from './types';

// ============================================================================
// Resolver Configuration
// ============================================================================

export interface ResolverConfig {
  temperatureTolerance: number;  // K - stop when the Newton step is smaller
  residualTolerance: number;     // stop when |f(T)| is smaller
  maxIterations: number;         // shared budget for Newton and bisection
  derivativeStep: number;        // K - central-difference step for df/dT

  // Search window as a fraction of the property domain bounds. Roots are
  // looked for in [min * (1 - margin), max * (1 + margin)].
  extrapolationMargin: number;
}

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = {
  temperatureTolerance: 1e-6,
  residualTolerance: 1e-10,
  maxIterations: 100,
  derivativeStep: 1e-4,
  extrapolationMargin: 0.25,
};

export function resolveConfig(config: Partial<ResolverConfig> = {}): ResolverConfig {
  return { ...DEFAULT_RESOLVER_CONFIG, ...config };
}

// ============================================================================
// Cycle Defaults
// ============================================================================

/** Ambient inlet, 1200 K firing temperature, 90% components, r = 10 */
export const DEFAULT_CYCLE_PARAMETERS: Readonly<CycleParameters> = Object.freeze({
  compressionRatio: 10,
  compressorEfficiency: 0.9,
  turbineEfficiency: 0.9,
  inletTemperature: 298.15,
  turbineInletTemperature: 1200,
  gasConstant: 0.287,
});

/**
 * Reference bottoming cycle: exhaust cooled to 460 K in the boiler, steam
 * raised only above 400 C turbine exhaust.
 */
export const DEFAULT_BOTTOMING_PARAMETERS: Readonly<BottomingCycleParameters> = Object.freeze({
  stackTemperature: 460,
  exhaustTemperatureThreshold: 673.15,
  rankineHeatInputPerKg: 2917,
  rankineEfficiencyPercent: 36.53,
});
