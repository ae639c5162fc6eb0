import { abs2, sub } from './complex';
import { bandIndices, type SpectralEngine } from './spectralEngine';

export interface BandMetrics {
  energyPct: number;
  rmsError: number;
  epicycles: number;
}

const EMPTY: BandMetrics = { energyPct: 0, rmsError: 0, epicycles: 0 };

/** Share of spectral energy inside the band, and RMS distance of the band reconstruction from the signal. */
export const computeBandMetrics = (engine: SpectralEngine, kMin: number, kMax: number): BandMetrics => {
  const filtered = engine.filteredRange(kMin, kMax);
  if (!filtered.ok) return EMPTY;

  const powers = engine.powerSpectrum();
  const totalEnergy = powers.reduce((acc, e) => acc + e, 0);
  const indices = bandIndices(engine.size(), kMin, kMax);
  const captured = indices.reduce((acc, k) => acc + powers[k], 0);

  const original = engine.original();
  let errorSum = 0;
  for (let n = 0; n < original.length; n++) {
    errorSum += abs2(sub(filtered.value[n], original[n]));
  }
  const rmsError = Math.sqrt(errorSum / original.length);

  return {
    energyPct: totalEnergy > 0 ? Number(((captured / totalEnergy) * 100).toFixed(2)) : 0,
    rmsError: Number(rmsError.toFixed(4)),
    epicycles: indices.length
  };
};

/** Smallest kMax (with kMin = 0) whose band holds at least targetPct of the energy. */
export const pickBandForEnergy = (engine: SpectralEngine, targetPct: number): number => {
  const maxK = engine.maxFrequency();
  const clampedTarget = Math.max(0, Math.min(100, targetPct));
  if (clampedTarget <= 0) return 0;
  if (clampedTarget >= 100) return maxK;

  const powers = engine.powerSpectrum();
  const totalEnergy = powers.reduce((acc, e) => acc + e, 0);
  if (!Number.isFinite(totalEnergy) || totalEnergy <= 0) return 0;

  const desired = (clampedTarget / 100) * totalEnergy;
  const N = engine.size();
  let cumulative = 0;
  for (let k = 0; k <= maxK; k++) {
    cumulative += powers[k];
    if (k > 0 && N - k !== k) cumulative += powers[N - k];
    if (cumulative >= desired) return k;
  }
  return maxK;
};
