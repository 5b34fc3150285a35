/**
 * Combined Cycle Evaluator
 *
 * Gas-turbine exhaust drives a bottoming steam cycle through a heat
 * recovery boiler. The steam side is a fixed reference operating point:
 * each kg of steam takes `rankineHeatInputPerKg` and converts
 * `rankineEfficiencyPercent` of it to work. Steam can only be raised when
 * the actual turbine exit temperature reaches the threshold; below it the
 * plant runs as a simple cycle.
 */

import { checkDomain, evaluateBrayton } from './brayton';
import type { ResolverConfig } from './config';
import { logDebug } from './debug';
import { resolveTemperatureFromEnthalpy } from './state-resolver';
import type {
  BottomingCycleParameters,
  BottomingOutcome,
  CombinedCycleResult,
  CycleParameters,
  PropertyProvider,
} from './types';
import { validateBottomingParameters } from './validation';

export function evaluateCombinedCycle(
  provider: PropertyProvider,
  params: CycleParameters,
  bottoming: BottomingCycleParameters,
  config: Partial<ResolverConfig> = {}
): CombinedCycleResult {
  validateBottomingParameters(bottoming);
  const brayton = evaluateBrayton(provider, params, config);
  const warnings = [...brayton.warnings];

  // Actual turbine exit temperature: enthalpy(T4) = h4. The isentropic exit
  // sits just below it, which makes it a good starting point.
  const h4 = brayton.states.turbineExitEnthalpy;
  const T4 = resolveTemperatureFromEnthalpy(
    provider,
    h4,
    brayton.states.turbineExitIsentropic.temperature,
    config
  ).temperature;
  checkDomain(provider, 'turbineExit', T4, warnings);

  let outcome: BottomingOutcome;
  let combinedEfficiency: number;

  if (T4 >= bottoming.exhaustTemperatureThreshold) {
    checkDomain(provider, 'stack', bottoming.stackTemperature, warnings);
    const hStack = provider.enthalpy(bottoming.stackTemperature);
    const heatToBottoming = Math.max(0, h4 - hStack);
    const steamMassFraction = heatToBottoming / bottoming.rankineHeatInputPerKg;
    const work = steamMassFraction * (bottoming.rankineHeatInputPerKg * bottoming.rankineEfficiencyPercent / 100);

    outcome = { active: true, heatToBottoming, steamMassFraction, work };
    combinedEfficiency = (brayton.netWork + work) / brayton.heatInput;
    logDebug(
      `combined: T4=${T4.toFixed(2)}K, q_b=${heatToBottoming.toFixed(2)}, m_steam=${steamMassFraction.toFixed(4)}, ` +
      `w_b=${work.toFixed(2)}, eta=${(combinedEfficiency * 100).toFixed(2)}%`
    );
  } else {
    outcome = { active: false };
    combinedEfficiency = brayton.thermalEfficiency;
    warnings.push({
      kind: 'bottoming-inactive',
      turbineExitTemperature: T4,
      threshold: bottoming.exhaustTemperatureThreshold,
    });
    logDebug(`combined: T4=${T4.toFixed(2)}K below ${bottoming.exhaustTemperatureThreshold}K, bottoming inactive`);
  }

  return {
    ...brayton,
    extrapolated: warnings.some((w) => w.kind === 'extrapolation'),
    warnings,
    turbineExitTemperature: T4,
    bottoming: outcome,
    combinedEfficiency,
  };
}
