import { describe, it, expect } from 'vitest';
import { applyIsentropicEfficiency } from '../components';
import { InvalidParameterError } from '../errors';

// ─── Compression ──────────────────────────────────────────────────────────────

describe('applyIsentropicEfficiency – compression', () => {
  it('divides the isentropic enthalpy rise by the efficiency', () => {
    // 300 + (580 - 300) / 0.8 = 650
    expect(applyIsentropicEfficiency(300, 580, 0.8, 'compression')).toBeCloseTo(650, 10);
  });

  it('needs at least the isentropic work', () => {
    const hIn = 298.6;
    const hOutS = 576.1;
    for (const eta of [0.7, 0.85, 0.95]) {
      const hOut = applyIsentropicEfficiency(hIn, hOutS, eta, 'compression');
      expect(hOut - hIn).toBeGreaterThan(hOutS - hIn);
    }
  });
});

// ─── Expansion ────────────────────────────────────────────────────────────────

describe('applyIsentropicEfficiency – expansion', () => {
  it('scales the isentropic enthalpy drop by the efficiency', () => {
    // 1277.81 - 0.9 * (1277.81 - 677.81) = 737.81
    expect(applyIsentropicEfficiency(1277.81, 677.81, 0.9, 'expansion')).toBeCloseTo(737.81, 10);
  });

  it('delivers at most the isentropic work', () => {
    const hIn = 1277.81;
    const hOutS = 700;
    for (const eta of [0.7, 0.85, 0.95]) {
      const hOut = applyIsentropicEfficiency(hIn, hOutS, eta, 'expansion');
      expect(hIn - hOut).toBeLessThan(hIn - hOutS);
    }
  });
});

// ─── Ideal components and validation ──────────────────────────────────────────

describe('applyIsentropicEfficiency – limits', () => {
  it('returns the isentropic enthalpy when efficiency is 1', () => {
    expect(applyIsentropicEfficiency(300, 580, 1, 'compression')).toBe(580);
    expect(applyIsentropicEfficiency(1277.81, 677.81, 1, 'expansion')).toBeCloseTo(677.81, 10);
  });

  it.each([0, -0.5, 1.2, Number.NaN])('rejects efficiency %s', (eta) => {
    expect(() => applyIsentropicEfficiency(300, 580, eta, 'compression')).toThrow(InvalidParameterError);
    expect(() => applyIsentropicEfficiency(1200, 700, eta, 'expansion')).toThrow(InvalidParameterError);
  });

  it('names the component in the error', () => {
    expect(() => applyIsentropicEfficiency(300, 580, 0, 'compression')).toThrow(
      '[Cycle] Invalid compressorEfficiency=0: isentropic efficiency must be in (0, 1]'
    );
    expect(() => applyIsentropicEfficiency(1200, 700, 1.5, 'expansion')).toThrow(/turbineEfficiency=1\.5/);
  });
});
