/**
 * Cycle Analysis Module Index
 *
 * Main entry point for the gas-turbine and combined-cycle engine.
 */

// Core types
export * from './types';

// Errors
export {
  CycleError,
  RootFindingError,
  InvalidParameterError,
  DegenerateCycleError,
  PropertyTableError,
  SteamPropertyError,
  isCycleError,
} from './errors';
export type { CycleErrorKind, SolvedQuantity } from './errors';

// Configuration and defaults
export {
  DEFAULT_RESOLVER_CONFIG,
  DEFAULT_CYCLE_PARAMETERS,
  DEFAULT_BOTTOMING_PARAMETERS,
  resolveConfig,
} from './config';
export type { ResolverConfig } from './config';

// Air properties
export {
  DEFAULT_AIR_TABLE_PATH,
  loadAirPropertyTable,
  validateAirPropertyTable,
  createTabulatedPropertyProvider,
  createAirPropertyProvider,
} from './air-properties';
export type { AirPropertyTable } from './air-properties';

// State resolution
export {
  SEED_EXPONENT,
  compressionSeed,
  expansionSeed,
  resolveIsentropicTemperature,
  resolveTemperatureFromEnthalpy,
} from './state-resolver';
export type { ResolvedTemperature } from './state-resolver';

export { applyIsentropicEfficiency } from './components';
export type { ComponentMode } from './components';

export { validateCycleParameters, validateBottomingParameters } from './validation';

// Evaluators
export { evaluateBrayton } from './brayton';
export { evaluateCombinedCycle } from './combined-cycle';
export { computeRankineReferencePoint } from './rankine';
export type { RankineCycleConditions, RankineReferencePoint } from './rankine';

// Sweeps
export {
  linspace,
  runSweep,
  findOptimum,
  sweepCompressionRatios,
  sweepCombinedCycle,
  sweepIsentropicEfficiencies,
} from './sweep';
export type { SweepOutcome, Optimum, OptimumOptions, EfficiencyPair } from './sweep';

// Debug
export { setCycleDebug, isCycleDebugEnabled, getCycleDebugLog, clearCycleDebugLog } from './debug';
