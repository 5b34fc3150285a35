/**
 * Rankine Reference Point using IAPWS-IF97
 *
 * Derives the two bottoming-cycle constants the combined-cycle evaluator
 * takes as configuration (heat input per kg of steam and cycle efficiency)
 * from a simple Rankine cycle:
 *   1 saturated liquid at condenser pressure
 *   2 pump exit at boiler pressure
 *   3 superheated steam at boiler pressure and turbine inlet temperature
 *   4 turbine exit at condenser pressure
 *
 * Callers give pressures in MPa and get results in kJ/kg. The library works
 * in SI base units (Pa, K, J/kg, J/kg-K) and solves from (p, t) or (p, s)
 * pairs only, so saturation is located by bisecting on the liquid/vapor
 * density jump.
 */

import { IAPWS97_EoS } from '@neutrium/thermo.eos.iapws97';

import { assertEfficiency } from './components';
import { logDebug } from './debug';
import { InvalidParameterError, SteamPropertyError } from './errors';
import type { BottomingCycleParameters } from './types';

const eos = new IAPWS97_EoS();

const P_CRIT = 22.064;          // MPa
const P_TRIPLE = 0.000611657;   // MPa
const T_TRIPLE = 273.16;        // K
const T_CRIT = 647.096;         // K
const RHO_CRIT = 322;           // kg/m³
const T_REGION2_MAX = 1073.15;  // K - upper limit of IF97 region 2

const SATURATION_TOLERANCE = 1e-7;  // K
const MAX_SATURATION_ITERATIONS = 60;

export interface RankineCycleConditions {
  boilerPressure: number;           // MPa
  condenserPressure: number;        // MPa
  turbineInletTemperature: number;  // K
  turbineEfficiency?: number;       // isentropic, default 1
  pumpEfficiency?: number;          // isentropic, default 1
}

export interface RankineReferencePoint
  extends Pick<BottomingCycleParameters, 'rankineHeatInputPerKg' | 'rankineEfficiencyPercent'> {
  pumpWork: number;      // kJ/kg steam
  turbineWork: number;   // kJ/kg steam
  netWork: number;       // kJ/kg steam
  /** Turbine exit quality, null when the exit is superheated */
  turbineExitQuality: number | null;
}

// ============================================================================
// Library Access
// ============================================================================

/** Library state fields are numbers or unit-carrying quantities */
type SteamState = Partial<Record<'t' | 'rho' | 'h' | 's', unknown>>;

type SteamInputs = { p: number; t: number } | { p: number; s: number };

interface SteamPoint {
  t: number;    // K
  rho: number;  // kg/m³
  h: number;    // J/kg
  s: number;    // J/kg-K
}

function steamLabel(inputs: SteamInputs): string {
  const p = `p=${inputs.p} Pa`;
  return 't' in inputs ? `${p}, t=${inputs.t} K` : `${p}, s=${inputs.s} J/kg-K`;
}

function callSolver(inputs: SteamInputs, label: string): SteamState | null | undefined {
  try {
    return eos.solve(inputs);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SteamPropertyError(label, reason, { cause: error });
  }
}

function readField(state: SteamState, field: keyof SteamState, label: string): number {
  const value = state[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new SteamPropertyError(label, `field "${field}" is not a finite number`);
  }
  return value;
}

function solveSteam(inputs: SteamInputs): SteamPoint {
  const label = steamLabel(inputs);
  const state = callSolver(inputs, label);
  if (!state) {
    throw new SteamPropertyError(label, 'no state returned');
  }
  return {
    t: readField(state, 't', label),
    rho: readField(state, 'rho', label),
    h: readField(state, 'h', label),
    s: readField(state, 's', label),
  };
}

// Below the critical point saturated liquid is always denser than the
// critical density and saturated vapor always lighter.
function isLiquid(point: SteamPoint): boolean {
  return point.rho > RHO_CRIT;
}

interface Saturation {
  temperature: number;  // K
  liquid: SteamPoint;
  vapor: SteamPoint;
}

/**
 * Saturation at pressure p (Pa). The returned liquid and vapor points sit
 * within SATURATION_TOLERANCE of the saturation temperature on either side.
 */
function saturation(p: number): Saturation {
  let lo = T_TRIPLE;
  let hi = T_CRIT;
  let liquid = solveSteam({ p, t: lo });
  let vapor = solveSteam({ p, t: hi });

  if (!isLiquid(liquid) || isLiquid(vapor)) {
    throw new SteamPropertyError(steamLabel({ p, t: lo }), `no liquid/vapor boundary between ${lo} K and ${hi} K`);
  }

  for (let i = 0; i < MAX_SATURATION_ITERATIONS && hi - lo > SATURATION_TOLERANCE; i++) {
    const mid = 0.5 * (lo + hi);
    const point = solveSteam({ p, t: mid });
    if (isLiquid(point)) {
      lo = mid;
      liquid = point;
    } else {
      hi = mid;
      vapor = point;
    }
  }

  return { temperature: 0.5 * (lo + hi), liquid, vapor };
}

// ============================================================================
// Cycle
// ============================================================================

function validateConditions(conditions: RankineCycleConditions): void {
  const { boilerPressure, condenserPressure, turbineInletTemperature } = conditions;

  if (!Number.isFinite(condenserPressure) || condenserPressure <= P_TRIPLE) {
    throw new InvalidParameterError(
      'condenserPressure',
      condenserPressure,
      `must be above the triple-point pressure (${P_TRIPLE} MPa)`
    );
  }
  if (!Number.isFinite(boilerPressure) || boilerPressure <= condenserPressure || boilerPressure >= P_CRIT) {
    throw new InvalidParameterError(
      'boilerPressure',
      boilerPressure,
      `must lie between the condenser pressure and ${P_CRIT} MPa`
    );
  }
  if (!Number.isFinite(turbineInletTemperature) || turbineInletTemperature > T_REGION2_MAX) {
    throw new InvalidParameterError(
      'turbineInletTemperature',
      turbineInletTemperature,
      `must not exceed ${T_REGION2_MAX} K`
    );
  }

  assertEfficiency('turbineEfficiency', conditions.turbineEfficiency ?? 1);
  assertEfficiency('pumpEfficiency', conditions.pumpEfficiency ?? 1);
}

/**
 * Isentropic turbine exit at condenser pressure: wet if s3 is below the
 * saturated vapor entropy, otherwise superheated at s(p, T) = s3.
 */
function isentropicExit(condenser: Saturation, p: number, s3: number): { h: number; quality: number | null } {
  const { liquid, vapor } = condenser;

  if (s3 <= vapor.s) {
    const quality = (s3 - liquid.s) / (vapor.s - liquid.s);
    return { h: liquid.h + quality * (vapor.h - liquid.h), quality };
  }

  return { h: solveSteam({ p, s: s3 }).h, quality: null };
}

export function computeRankineReferencePoint(conditions: RankineCycleConditions): RankineReferencePoint {
  validateConditions(conditions);

  const { turbineInletTemperature } = conditions;
  const etaTurbine = conditions.turbineEfficiency ?? 1;
  const etaPump = conditions.pumpEfficiency ?? 1;
  const pBoiler = conditions.boilerPressure * 1e6;       // Pa
  const pCondenser = conditions.condenserPressure * 1e6; // Pa

  const Tsat = saturation(pBoiler).temperature;
  if (turbineInletTemperature <= Tsat) {
    throw new InvalidParameterError(
      'turbineInletTemperature',
      turbineInletTemperature,
      `must exceed the boiler saturation temperature (${Tsat.toFixed(2)} K)`
    );
  }

  // Pump: w = v (P2 - P1), Pa·m³/kg = J/kg
  const condenser = saturation(pCondenser);
  const state1 = condenser.liquid;
  const pumpWork = (pBoiler - pCondenser) / state1.rho / etaPump;
  const h2 = state1.h + pumpWork;

  const state3 = solveSteam({ p: pBoiler, t: turbineInletTemperature });
  const exit = isentropicExit(condenser, pCondenser, state3.s);
  const turbineWork = etaTurbine * (state3.h - exit.h);

  const heatInput = state3.h - h2;
  const netWork = turbineWork - pumpWork;
  const efficiencyPercent = (netWork / heatInput) * 100;

  logDebug(
    `rankine: P=${conditions.boilerPressure}/${conditions.condenserPressure} MPa, T3=${turbineInletTemperature}K, ` +
    `Tsat=${Tsat.toFixed(2)}K, q_in=${(heatInput / 1e3).toFixed(1)}, w_net=${(netWork / 1e3).toFixed(1)}, ` +
    `eta=${efficiencyPercent.toFixed(2)}%`
  );

  return {
    rankineHeatInputPerKg: heatInput / 1e3,
    rankineEfficiencyPercent: efficiencyPercent,
    pumpWork: pumpWork / 1e3,
    turbineWork: turbineWork / 1e3,
    netWork: netWork / 1e3,
    turbineExitQuality: exit.quality,
  };
}
