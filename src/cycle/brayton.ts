/**
 * Brayton Cycle Evaluator
 *
 * Resolves the four states of the simple gas-turbine cycle with
 * temperature-dependent air properties:
 *   1 compressor inlet, 2 compressor exit, 3 turbine inlet, 4 turbine exit.
 * The pressure ratio across the turbine equals the compression ratio.
 */

import type { ResolverConfig } from './config';
import { applyIsentropicEfficiency } from './components';
import { logDebug } from './debug';
import { DegenerateCycleError } from './errors';
import {
  compressionSeed,
  expansionSeed,
  resolveIsentropicTemperature,
} from './state-resolver';
import type {
  CycleParameters,
  CycleResult,
  CycleWarning,
  PropertyProvider,
  StateLabel,
} from './types';
import { validateCycleParameters } from './validation';

/**
 * Record an extrapolation warning when T lies outside the provider domain.
 */
export function checkDomain(
  provider: PropertyProvider,
  state: StateLabel,
  temperature: number,
  warnings: CycleWarning[]
): void {
  if (!provider.isInDomain(temperature)) {
    logDebug(`  ${state}: T=${temperature.toFixed(2)}K outside [${provider.domain.min}, ${provider.domain.max}]`);
    warnings.push({
      kind: 'extrapolation',
      state,
      temperature,
      domain: { ...provider.domain },
    });
  }
}

export function evaluateBrayton(
  provider: PropertyProvider,
  params: CycleParameters,
  config: Partial<ResolverConfig> = {}
): CycleResult {
  validateCycleParameters(params);

  const {
    compressionRatio: r,
    compressorEfficiency,
    turbineEfficiency,
    inletTemperature: T1,
    turbineInletTemperature: T3,
    gasConstant: R,
  } = params;

  logDebug(`brayton: r=${r}, eta_c=${compressorEfficiency}, eta_t=${turbineEfficiency}, T1=${T1}K, T3=${T3}K`);

  const warnings: CycleWarning[] = [];
  checkDomain(provider, 'compressorInlet', T1, warnings);
  checkDomain(provider, 'turbineInlet', T3, warnings);

  // Entropy change across either machine for pressure ratio r
  const deltaS = R * Math.log(r);

  // Compressor: s(T2s) = s1 + R ln r
  const s1 = provider.entropy(T1);
  const T2s = resolveIsentropicTemperature(provider, s1 + deltaS, compressionSeed(T1, r), config).temperature;
  checkDomain(provider, 'compressorExitIsentropic', T2s, warnings);

  const h1 = provider.enthalpy(T1);
  const h2s = provider.enthalpy(T2s);
  const h2 = applyIsentropicEfficiency(h1, h2s, compressorEfficiency, 'compression');

  // Turbine: s(T4s) = s3 - R ln r
  const s3 = provider.entropy(T3);
  const T4s = resolveIsentropicTemperature(provider, s3 - deltaS, expansionSeed(T3, r), config).temperature;
  checkDomain(provider, 'turbineExitIsentropic', T4s, warnings);

  const h3 = provider.enthalpy(T3);
  const h4s = provider.enthalpy(T4s);
  const h4 = applyIsentropicEfficiency(h3, h4s, turbineEfficiency, 'expansion');

  const compressorWork = h2 - h1;
  const turbineWork = h3 - h4;
  const netWork = turbineWork - compressorWork;
  const heatInput = h3 - h2;

  if (!Number.isFinite(heatInput) || heatInput <= 0) {
    throw new DegenerateCycleError('heatInput', heatInput);
  }
  if (!Number.isFinite(netWork) || netWork <= 0) {
    throw new DegenerateCycleError('netWork', netWork);
  }

  const thermalEfficiency = netWork / heatInput;
  logDebug(
    `  T2s=${T2s.toFixed(2)}K, T4s=${T4s.toFixed(2)}K, w_net=${netWork.toFixed(2)}, ` +
    `q_in=${heatInput.toFixed(2)}, eta=${(thermalEfficiency * 100).toFixed(2)}%`
  );

  return {
    netWork,
    heatInput,
    thermalEfficiency,
    compressorWork,
    turbineWork,
    states: {
      compressorInlet: { temperature: T1, enthalpy: h1 },
      compressorExitIsentropic: { temperature: T2s, enthalpy: h2s },
      compressorExitEnthalpy: h2,
      turbineInlet: { temperature: T3, enthalpy: h3 },
      turbineExitIsentropic: { temperature: T4s, enthalpy: h4s },
      turbineExitEnthalpy: h4,
    },
    extrapolated: warnings.length > 0,
    warnings,
  };
}
