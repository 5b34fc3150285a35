/**
 * Air Properties - Table Based
 *
 * Ideal-gas enthalpy and standard-state entropy of air as functions of
 * temperature, interpolated from a tabulated data file with natural cubic
 * splines. The provider is built once and is immutable; evaluators receive
 * it explicitly instead of reading module state.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { PropertyTableError } from './errors';
import { createCubicSpline } from './interpolation';
import type { PropertyProvider } from './types';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_AIR_TABLE_PATH = path.resolve(__dirname, '../../data/air-properties.json');

const MIN_TABLE_POINTS = 4;

// ============================================================================
// Table Data
// ============================================================================

export interface AirPropertyTable {
  temperature: readonly number[];  // K
  enthalpy: readonly number[];     // kJ/kg
  entropy: readonly number[];      // kJ/kg-K
}

function readColumn(fields: Map<string, unknown>, name: keyof AirPropertyTable): number[] {
  const column = fields.get(name);
  if (!Array.isArray(column)) {
    throw new PropertyTableError(`[AirProps] Column "${name}" is missing or not an array`);
  }

  return column.map((value, i) => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new PropertyTableError(`[AirProps] Column "${name}" has a non-numeric entry at row ${i}`);
    }
    return value;
  });
}

/**
 * Load the air table from a JSON file with `temperature`, `enthalpy` and
 * `entropy` columns. Other keys (units, description) are ignored.
 */
export function loadAirPropertyTable(filePath: string = DEFAULT_AIR_TABLE_PATH): AirPropertyTable {
  const content = fs.readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(content);

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new PropertyTableError(`[AirProps] ${filePath} does not hold a table object`);
  }

  const fields = new Map<string, unknown>(Object.entries(parsed));
  const table: AirPropertyTable = {
    temperature: readColumn(fields, 'temperature'),
    enthalpy: readColumn(fields, 'enthalpy'),
    entropy: readColumn(fields, 'entropy'),
  };

  console.log(`[AirProps] Loaded ${table.temperature.length} points from ${path.basename(filePath)}`);
  return table;
}

/**
 * Reject tables the resolver cannot invert: mismatched columns, too few
 * points, non-increasing temperature or entropy, decreasing enthalpy.
 */
export function validateAirPropertyTable(table: AirPropertyTable): void {
  const n = table.temperature.length;

  if (table.enthalpy.length !== n || table.entropy.length !== n) {
    throw new PropertyTableError(
      `[AirProps] Column lengths differ: T=${n}, h=${table.enthalpy.length}, s=${table.entropy.length}`
    );
  }
  if (n < MIN_TABLE_POINTS) {
    throw new PropertyTableError(`[AirProps] Need at least ${MIN_TABLE_POINTS} points, got ${n}`);
  }
  if (table.temperature[0] <= 0) {
    throw new PropertyTableError(`[AirProps] Temperatures must be positive, got ${table.temperature[0]} K`);
  }

  for (let i = 1; i < n; i++) {
    const T = table.temperature[i];
    if (T <= table.temperature[i - 1]) {
      throw new PropertyTableError(`[AirProps] Temperature not strictly increasing at row ${i} (${T} K)`);
    }
    if (table.entropy[i] <= table.entropy[i - 1]) {
      throw new PropertyTableError(`[AirProps] Entropy not strictly increasing at ${T} K`);
    }
    if (table.enthalpy[i] < table.enthalpy[i - 1]) {
      throw new PropertyTableError(`[AirProps] Enthalpy decreases at ${T} K`);
    }
  }
}

// ============================================================================
// Provider
// ============================================================================

export function createTabulatedPropertyProvider(table: AirPropertyTable): PropertyProvider {
  validateAirPropertyTable(table);

  const enthalpySpline = createCubicSpline(table.temperature, table.enthalpy);
  const entropySpline = createCubicSpline(table.temperature, table.entropy);
  const domain = Object.freeze({ min: enthalpySpline.xMin, max: enthalpySpline.xMax });

  return Object.freeze({
    domain,
    enthalpy: (T: number) => enthalpySpline.evaluate(T),
    entropy: (T: number) => entropySpline.evaluate(T),
    isInDomain: (T: number) => T >= domain.min && T <= domain.max,
  });
}

/**
 * Provider over the bundled air table, or over the table at `filePath`.
 */
export function createAirPropertyProvider(filePath?: string): PropertyProvider {
  return createTabulatedPropertyProvider(loadAirPropertyTable(filePath));
}
