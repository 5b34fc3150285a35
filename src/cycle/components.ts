/**
 * Compressor and turbine legs with isentropic efficiency.
 */

import { InvalidParameterError } from './errors';

export type ComponentMode = 'compression' | 'expansion';

export function assertEfficiency(name: string, efficiency: number): void {
  if (!Number.isFinite(efficiency) || efficiency <= 0 || efficiency > 1) {
    throw new InvalidParameterError(name, efficiency, 'isentropic efficiency must be in (0, 1]');
  }
}

/**
 * Actual exit enthalpy from the isentropic one.
 *
 * Compression: h_out = h_in + (h_out_s - h_in) / eta, so the compressor
 * needs more work than the isentropic leg.
 * Expansion: h_out = h_in - eta * (h_in - h_out_s), so the turbine
 * delivers less.
 */
export function applyIsentropicEfficiency(
  hIn: number,
  hOutIsentropic: number,
  efficiency: number,
  mode: ComponentMode
): number {
  if (mode === 'compression') {
    assertEfficiency('compressorEfficiency', efficiency);
    return hIn + (hOutIsentropic - hIn) / efficiency;
  }

  assertEfficiency('turbineEfficiency', efficiency);
  return hIn - efficiency * (hIn - hOutIsentropic);
}
