/**
 * Isentropic State Resolver
 *
 * Inverts the provider's property functions: the temperature with a given
 * entropy (isentropic compressor and turbine exits) and the temperature
 * with a given enthalpy (actual turbine exit).
 */

import { resolveConfig } from './config';
import type { ResolverConfig } from './config';
import { logDebug } from './debug';
import { InvalidParameterError, RootFindingError } from './errors';
import type { SolvedQuantity } from './errors';
import { findTemperatureRoot } from './root-finder';
import type { SearchWindow } from './root-finder';
import type { PropertyProvider } from './types';

export interface ResolvedTemperature {
  temperature: number;   // K
  iterations: number;
  residual: number;      // property units
  extrapolated: boolean; // outside the provider's tabulated domain
}

// ============================================================================
// Seeds
// ============================================================================

/**
 * Ideal-gas exponent approximation (R/cp ~ 0.3) used only to start the
 * search near the expected root.
 */
export const SEED_EXPONENT = 0.3;

export function compressionSeed(inletTemperature: number, compressionRatio: number): number {
  return inletTemperature * Math.pow(compressionRatio, SEED_EXPONENT);
}

export function expansionSeed(inletTemperature: number, compressionRatio: number): number {
  return inletTemperature / Math.pow(compressionRatio, SEED_EXPONENT);
}

export function searchWindow(provider: PropertyProvider, config: ResolverConfig): SearchWindow {
  return {
    lower: provider.domain.min * (1 - config.extrapolationMargin),
    upper: provider.domain.max * (1 + config.extrapolationMargin),
  };
}

// ============================================================================
// Inversions
// ============================================================================

function resolveTemperature(
  quantity: SolvedQuantity,
  property: (T: number) => number,
  provider: PropertyProvider,
  target: number,
  seed: number,
  options: Partial<ResolverConfig>
): ResolvedTemperature {
  if (!Number.isFinite(target)) {
    throw new InvalidParameterError(`${quantity} target`, target, 'must be finite');
  }
  if (!Number.isFinite(seed) || seed <= 0) {
    throw new InvalidParameterError('seed temperature', seed, 'must be a positive finite temperature');
  }

  const config = resolveConfig(options);
  const search = findTemperatureRoot(
    (T) => property(T) - target,
    seed,
    searchWindow(provider, config),
    config
  );

  if (!search.converged) {
    throw new RootFindingError(quantity, target, search.lastTemperature, search.iterations);
  }

  const extrapolated = !provider.isInDomain(search.temperature);
  logDebug(
    `resolve ${quantity}=${target.toFixed(6)}: T=${search.temperature.toFixed(6)}K ` +
    `(seed ${seed.toFixed(2)}K, ${search.iterations} iter${extrapolated ? ', extrapolated' : ''})`
  );

  return {
    temperature: search.temperature,
    iterations: search.iterations,
    residual: search.residual,
    extrapolated,
  };
}

/**
 * Temperature at which entropy(T) equals the target.
 */
export function resolveIsentropicTemperature(
  provider: PropertyProvider,
  entropyTarget: number,
  seedTemperature: number,
  config: Partial<ResolverConfig> = {}
): ResolvedTemperature {
  return resolveTemperature('entropy', (T) => provider.entropy(T), provider, entropyTarget, seedTemperature, config);
}

/**
 * Temperature at which enthalpy(T) equals the target.
 */
export function resolveTemperatureFromEnthalpy(
  provider: PropertyProvider,
  enthalpyTarget: number,
  seedTemperature: number,
  config: Partial<ResolverConfig> = {}
): ResolvedTemperature {
  return resolveTemperature('enthalpy', (T) => provider.enthalpy(T), provider, enthalpyTarget, seedTemperature, config);
}
