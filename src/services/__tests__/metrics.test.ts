import { describe, expect, it } from 'vitest';
import { computeBandMetrics, pickBandForEnergy } from '../metrics';
import { SpectralEngine } from '../spectralEngine';

// X = [2, 0.5, 0, 0.5], powers [4, 0.25, 0, 0.25]
const engine = (() => {
  const built = SpectralEngine.fromReal([3, 2, 1, 2]);
  if (!built.ok) throw built.error;
  return built.value;
})();

describe('computeBandMetrics', () => {
  it('reports the DC-only band against the full signal', () => {
    expect(computeBandMetrics(engine, 0, 0)).toEqual({ energyPct: 88.89, rmsError: 0.7071, epicycles: 1 });
  });

  it('captures everything with the full band', () => {
    expect(computeBandMetrics(engine, 0, 2)).toEqual({ energyPct: 100, rmsError: 0, epicycles: 4 });
  });

  it('counts mirrored vectors', () => {
    expect(computeBandMetrics(engine, 1, 1).epicycles).toBe(2);
  });

  it('returns zeros for an invalid band', () => {
    expect(computeBandMetrics(engine, 2, 1)).toEqual({ energyPct: 0, rmsError: 0, epicycles: 0 });
  });
});

describe('pickBandForEnergy', () => {
  it('returns the smallest kMax reaching the target', () => {
    expect(pickBandForEnergy(engine, 80)).toBe(0);
    expect(pickBandForEnergy(engine, 95)).toBe(1);
  });

  it('clamps the target to 0..100', () => {
    expect(pickBandForEnergy(engine, 0)).toBe(0);
    expect(pickBandForEnergy(engine, -5)).toBe(0);
    expect(pickBandForEnergy(engine, 100)).toBe(2);
    expect(pickBandForEnergy(engine, 250)).toBe(2);
  });

  it('picks 0 for a silent signal', () => {
    const silent = SpectralEngine.fromReal([0, 0, 0]);
    if (!silent.ok) throw silent.error;
    expect(pickBandForEnergy(silent.value, 50)).toBe(0);
  });
});
