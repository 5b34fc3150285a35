/**
 * Cycle analysis errors.
 *
 * Every failure the core raises is a CycleError; the `kind` field tells
 * the sweep driver and callers which one without instanceof chains.
 */

export type CycleErrorKind =
  | 'root-finding-failure'
  | 'invalid-parameter'
  | 'degenerate-cycle'
  | 'invalid-property-table'
  | 'steam-property-failure';

export abstract class CycleError extends Error {
  abstract readonly kind: CycleErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type SolvedQuantity = 'entropy' | 'enthalpy';

/**
 * The temperature inversion did not converge within the iteration budget.
 */
export class RootFindingError extends CycleError {
  readonly kind = 'root-finding-failure';

  constructor(
    readonly quantity: SolvedQuantity,
    readonly target: number,
    readonly lastTemperature: number,
    readonly iterations: number
  ) {
    super(
      `[Cycle] ${quantity} inversion did not converge: target=${target.toFixed(6)}, ` +
      `last T=${lastTemperature.toFixed(3)} K after ${iterations} iterations`
    );
  }
}

export class InvalidParameterError extends CycleError {
  readonly kind = 'invalid-parameter';

  constructor(
    readonly parameter: string,
    readonly value: number,
    reason: string
  ) {
    super(`[Cycle] Invalid ${parameter}=${value}: ${reason}`);
  }
}

export class DegenerateCycleError extends CycleError {
  readonly kind = 'degenerate-cycle';

  constructor(
    readonly quantity: 'heatInput' | 'netWork',
    readonly value: number
  ) {
    super(`[Cycle] Degenerate cycle: ${quantity}=${value} kJ/kg`);
  }
}

export class PropertyTableError extends CycleError {
  readonly kind = 'invalid-property-table';
}

/**
 * The IAPWS-IF97 library rejected a state or returned one without the
 * expected numeric fields. The library's own error, if any, is the cause.
 */
export class SteamPropertyError extends CycleError {
  readonly kind = 'steam-property-failure';

  constructor(
    readonly state: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`[Rankine] IAPWS-IF97 failed at ${state}: ${reason}`, options);
  }
}

export function isCycleError(error: unknown): error is CycleError {
  return error instanceof CycleError;
}
