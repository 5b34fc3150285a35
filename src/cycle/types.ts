/**
 * Cycle Analysis Types
 *
 * Value records shared by the property provider, the state resolver and
 * the cycle evaluators. Units follow the air table: temperature in K,
 * enthalpy in kJ/kg, entropy in kJ/kg-K.
 */

// ============================================================================
// Property Provider
// ============================================================================

export interface TemperatureDomain {
  min: number;  // K
  max: number;  // K
}

/**
 * Temperature-dependent air properties. Entropy must be strictly
 * increasing in temperature over the domain, enthalpy increasing.
 * Implementations may extrapolate outside the domain.
 */
export interface PropertyProvider {
  readonly domain: TemperatureDomain;
  enthalpy(T: number): number;   // kJ/kg
  entropy(T: number): number;    // kJ/kg-K
  isInDomain(T: number): boolean;
}

// ============================================================================
// States
// ============================================================================

export interface ThermodynamicState {
  temperature: number;  // K
  enthalpy: number;     // kJ/kg
}

/**
 * Resolved points around the cycle. Actual (irreversible) exit states are
 * carried as enthalpies only; their temperatures need an extra inversion.
 */
export interface CycleStates {
  compressorInlet: ThermodynamicState;           // 1
  compressorExitIsentropic: ThermodynamicState;  // 2s
  compressorExitEnthalpy: number;                // h2, kJ/kg
  turbineInlet: ThermodynamicState;              // 3
  turbineExitIsentropic: ThermodynamicState;     // 4s
  turbineExitEnthalpy: number;                   // h4, kJ/kg
}

export type StateLabel =
  | 'compressorInlet'
  | 'compressorExitIsentropic'
  | 'turbineInlet'
  | 'turbineExitIsentropic'
  | 'turbineExit'
  | 'stack';

// ============================================================================
// Parameters
// ============================================================================

export interface CycleParameters {
  compressionRatio: number;         // -
  compressorEfficiency: number;     // isentropic, (0, 1]
  turbineEfficiency: number;        // isentropic, (0, 1]
  inletTemperature: number;         // K - T1
  turbineInletTemperature: number;  // K - T3
  gasConstant: number;              // kJ/kg-K
}

/**
 * Fixed operating point of the bottoming steam cycle.
 */
export interface BottomingCycleParameters {
  stackTemperature: number;             // K - exhaust leaves the boiler here
  exhaustTemperatureThreshold: number;  // K - minimum T4 to raise steam
  rankineHeatInputPerKg: number;        // kJ per kg steam
  rankineEfficiencyPercent: number;     // %
}

// ============================================================================
// Warnings
// ============================================================================

export interface ExtrapolationWarning {
  kind: 'extrapolation';
  state: StateLabel;
  temperature: number;
  domain: TemperatureDomain;
}

export interface BottomingInactiveWarning {
  kind: 'bottoming-inactive';
  turbineExitTemperature: number;
  threshold: number;
}

export type CycleWarning = ExtrapolationWarning | BottomingInactiveWarning;

// ============================================================================
// Results
// ============================================================================

export interface CycleResult {
  netWork: number;            // kJ/kg air
  heatInput: number;          // kJ/kg air
  thermalEfficiency: number;  // fraction
  compressorWork: number;     // kJ/kg air
  turbineWork: number;        // kJ/kg air
  states: CycleStates;
  /** True when any resolved temperature lies outside the property domain */
  extrapolated: boolean;
  warnings: CycleWarning[];
}

export type BottomingOutcome =
  | {
      active: true;
      heatToBottoming: number;    // kJ/kg air
      steamMassFraction: number;  // kg steam / kg air
      work: number;               // kJ/kg air
    }
  | { active: false };

export interface CombinedCycleResult extends CycleResult {
  turbineExitTemperature: number;  // K - actual T4
  bottoming: BottomingOutcome;
  combinedEfficiency: number;      // fraction
}
