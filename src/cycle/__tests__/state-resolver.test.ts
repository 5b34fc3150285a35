import { afterEach, beforeAll, describe, it, expect, vi } from 'vitest';
import { createAirPropertyProvider } from '../air-properties';
import { clearCycleDebugLog, getCycleDebugLog, isCycleDebugEnabled, setCycleDebug } from '../debug';
import { InvalidParameterError, RootFindingError } from '../errors';
import {
  compressionSeed,
  expansionSeed,
  resolveIsentropicTemperature,
  resolveTemperatureFromEnthalpy,
  searchWindow,
} from '../state-resolver';
import { DEFAULT_RESOLVER_CONFIG } from '../config';
import type { PropertyProvider } from '../types';

let provider: PropertyProvider;

beforeAll(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  provider = createAirPropertyProvider();
});

afterEach(() => {
  setCycleDebug(false);
  clearCycleDebugLog();
});

// ─── Seeds and search window ──────────────────────────────────────────────────

describe('state resolver – seeds', () => {
  it('compression seed scales the inlet by r^0.3', () => {
    expect(compressionSeed(298.15, 10)).toBeCloseTo(594.8875, 4);
  });

  it('expansion seed divides the inlet by r^0.3', () => {
    expect(expansionSeed(1200, 10)).toBeCloseTo(1200 / Math.pow(10, 0.3), 10);
  });

  it('r = 1 seeds at the inlet temperature', () => {
    expect(compressionSeed(298.15, 1)).toBe(298.15);
    expect(expansionSeed(1200, 1)).toBe(1200);
  });

  it('search window widens the domain by the extrapolation margin', () => {
    expect(searchWindow(provider, DEFAULT_RESOLVER_CONFIG)).toEqual({ lower: 150, upper: 2250 });
  });
});

// ─── Entropy inversion ────────────────────────────────────────────────────────

describe('state resolver – isentropic temperature', () => {
  it.each([250, 420, 600, 1100, 1750])('round-trips entropy(%d K)', (T) => {
    const resolved = resolveIsentropicTemperature(provider, provider.entropy(T), T * 1.2);
    expect(Math.abs(resolved.temperature - T)).toBeLessThan(1e-6);
    expect(resolved.extrapolated).toBe(false);
  });

  it('returns the seed exactly when the target equals its entropy (r = 1)', () => {
    const resolved = resolveIsentropicTemperature(provider, provider.entropy(298.15), 298.15);
    expect(resolved.temperature).toBe(298.15);
    expect(resolved.iterations).toBe(0);
    expect(resolved.residual).toBe(0);
  });

  it('resolves the isentropic compressor exit at r = 10', () => {
    const target = provider.entropy(298.15) + 0.287 * Math.log(10);
    const resolved = resolveIsentropicTemperature(provider, target, compressionSeed(298.15, 10));
    expect(resolved.temperature).toBeCloseTo(570.6675, 3);
    expect(Math.abs(resolved.residual)).toBeLessThan(1e-8);
  });

  it('flags roots outside the tabulated domain as extrapolated', () => {
    const resolved = resolveIsentropicTemperature(provider, provider.entropy(1900), 1800);
    expect(resolved.temperature).toBeCloseTo(1900, 5);
    expect(resolved.extrapolated).toBe(true);
  });

  it('fails explicitly when the target lies beyond the search window', () => {
    try {
      resolveIsentropicTemperature(provider, 20, 1000);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RootFindingError);
      expect(error).toMatchObject({
        kind: 'root-finding-failure',
        quantity: 'entropy',
        target: 20,
        lastTemperature: 2250,
      });
    }
  });

  it('fails when the iteration budget runs out', () => {
    expect(() =>
      resolveIsentropicTemperature(provider, provider.entropy(1500), 300, { maxIterations: 1 })
    ).toThrow(RootFindingError);
  });

  it('rejects a non-finite target or a non-positive seed', () => {
    expect(() => resolveIsentropicTemperature(provider, Number.NaN, 300)).toThrow(InvalidParameterError);
    expect(() => resolveIsentropicTemperature(provider, 7, 0)).toThrow(InvalidParameterError);
  });

  it('honours a looser tolerance with fewer iterations', () => {
    const target = provider.entropy(812.5);
    const tight = resolveIsentropicTemperature(provider, target, 400);
    const loose = resolveIsentropicTemperature(provider, target, 400, { temperatureTolerance: 1 });
    expect(loose.iterations).toBeLessThanOrEqual(tight.iterations);
    expect(Math.abs(loose.temperature - 812.5)).toBeLessThan(5);
  });
});

// ─── Bisection fallback ───────────────────────────────────────────────────────

describe('state resolver – bisection fallback', () => {
  it('converges when the property has a flat stretch that stalls Newton', () => {
    // Constant between 400 and 500 K, so the slope at the seed is zero
    const stepped: PropertyProvider = {
      domain: { min: 200, max: 1000 },
      enthalpy: (T) => T,
      entropy: (T) => (T < 400 ? T / 100 : T > 500 ? (T - 100) / 100 : 4),
      isInDomain: (T) => T >= 200 && T <= 1000,
    };

    const resolved = resolveIsentropicTemperature(stepped, 6, 450);
    expect(resolved.temperature).toBeCloseTo(700, 5);
  });
});

// ─── Enthalpy inversion ───────────────────────────────────────────────────────

describe('state resolver – enthalpy inversion', () => {
  it.each([300, 673.15, 1200])('round-trips enthalpy(%d K)', (T) => {
    const resolved = resolveTemperatureFromEnthalpy(provider, provider.enthalpy(T), 800);
    expect(Math.abs(resolved.temperature - T)).toBeLessThan(1e-6);
  });

  it('reports failures as enthalpy inversions', () => {
    expect(() => resolveTemperatureFromEnthalpy(provider, 1e6, 800)).toThrow(/enthalpy inversion did not converge/);
  });
});

// ─── Debug trace ──────────────────────────────────────────────────────────────

describe('state resolver – debug trace', () => {
  it('records each inversion when debug is enabled', () => {
    setCycleDebug(true);
    expect(isCycleDebugEnabled()).toBe(true);
    resolveIsentropicTemperature(provider, provider.entropy(500), 450);
    const log = getCycleDebugLog();
    expect(log.length).toBe(1);
    expect(log[0]).toMatch(/^resolve entropy=7\.386920: T=500\.000000K \(seed 450\.00K, \d+ iter\)$/);
  });

  it('records nothing when debug is off', () => {
    setCycleDebug(true);
    setCycleDebug(false);
    expect(isCycleDebugEnabled()).toBe(false);
    resolveIsentropicTemperature(provider, provider.entropy(500), 450);
    expect(getCycleDebugLog()).toEqual([]);
  });
});
