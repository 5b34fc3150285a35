/**
 * Parameter checks run before any property lookup or solve.
 */

import { assertEfficiency } from './components';
import { InvalidParameterError } from './errors';
import type { BottomingCycleParameters, CycleParameters } from './types';

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(name, value, 'must be a positive finite number');
  }
}

export function validateCycleParameters(params: CycleParameters): void {
  if (!Number.isFinite(params.compressionRatio) || params.compressionRatio <= 1) {
    throw new InvalidParameterError('compressionRatio', params.compressionRatio, 'must be greater than 1');
  }

  assertEfficiency('compressorEfficiency', params.compressorEfficiency);
  assertEfficiency('turbineEfficiency', params.turbineEfficiency);
  assertPositive('inletTemperature', params.inletTemperature);
  assertPositive('turbineInletTemperature', params.turbineInletTemperature);
  assertPositive('gasConstant', params.gasConstant);

  if (params.turbineInletTemperature <= params.inletTemperature) {
    throw new InvalidParameterError(
      'turbineInletTemperature',
      params.turbineInletTemperature,
      `must exceed the compressor inlet temperature (${params.inletTemperature} K)`
    );
  }
}

export function validateBottomingParameters(params: BottomingCycleParameters): void {
  assertPositive('stackTemperature', params.stackTemperature);
  assertPositive('exhaustTemperatureThreshold', params.exhaustTemperatureThreshold);
  assertPositive('rankineHeatInputPerKg', params.rankineHeatInputPerKg);

  const eta = params.rankineEfficiencyPercent;
  if (!Number.isFinite(eta) || eta <= 0 || eta > 100) {
    throw new InvalidParameterError('rankineEfficiencyPercent', eta, 'must be in (0, 100]');
  }
}
