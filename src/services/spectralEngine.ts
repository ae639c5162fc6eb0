import type { Complex, Point } from '../types';
import { abs2, add, expi, fromPoints, fromReal, isFiniteComplex, mul, scale, sub, ZERO } from './complex';
import { fail, ok, type Result } from './errors';

export interface EngineOptions {
  /** Subtract the mean of all samples before transforming. */
  center?: boolean;
}

export interface CenteredSpectrum {
  frequencies: number[];
  powers: number[];
}

const isIndex = (value: number) => Number.isInteger(value) && value >= 0;

/**
 * Direct O(N^2) DFT, analysis-normalized:
 * X_k = (1/N) * sum_{n=0}^{N-1} x_n * e^(-i * 2 * pi * k * n / N)
 */
export const dft = (x: readonly Complex[]): Complex[] => {
  const N = x.length;
  const X: Complex[] = [];

  for (let k = 0; k < N; k++) {
    let sumRe = 0;
    let sumIm = 0;

    for (let n = 0; n < N; n++) {
      const phi = (2 * Math.PI * k * n) / N;
      const c = Math.cos(phi);
      const s = Math.sin(phi);
      // (re + i*im) * (cos - i*sin)
      sumRe += x[n].re * c + x[n].im * s;
      sumIm += x[n].im * c - x[n].re * s;
    }

    X.push({ re: sumRe / N, im: sumIm / N });
  }

  return X;
};

/**
 * Coefficient indices touched by the band [kMin, kMax], in chain order:
 * each k followed by its negative-frequency mirror N-k. Index 0 and the
 * Nyquist index of an even-length signal are their own mirrors and appear once.
 */
export const bandIndices = (size: number, kMin: number, kMax: number): number[] => {
  const indices: number[] = [];
  for (let k = kMin; k <= kMax; k++) {
    indices.push(k);
    const mirror = size - k;
    if (k > 0 && mirror !== k) indices.push(mirror);
  }
  return indices;
};

/** The read-only query surface playback needs from an engine. */
export interface SpectralSource {
  size(): number;
  original(): readonly Complex[];
  maxFrequency(): number;
  validateRange(kMin: number, kMax: number): Result<void>;
  filteredRange(kMin: number, kMax: number): Result<Complex[]>;
  getComponent(frequency: number, timeStep: number): Result<Complex>;
}

export class SpectralEngine implements SpectralSource {
  private readonly samples: readonly Complex[];
  private readonly transform: readonly Complex[];

  private constructor(samples: Complex[], transform: Complex[]) {
    this.samples = Object.freeze(samples.map((s) => Object.freeze({ ...s })));
    this.transform = Object.freeze(transform.map((c) => Object.freeze(c)));
  }

  static create(samples: readonly Complex[], options: EngineOptions = {}): Result<SpectralEngine> {
    if (samples.length === 0) {
      return fail('EmptyInput', 'Input signal is empty');
    }
    const badIndex = samples.findIndex((s) => !isFiniteComplex(s));
    if (badIndex >= 0) {
      return fail('NonFiniteValue', `Sample ${badIndex} contains NaN or Infinity`);
    }

    let signal = samples.map((s) => ({ re: s.re, im: s.im }));
    if (options.center) {
      const mean = scale(signal.reduce(add, ZERO), 1 / signal.length);
      signal = signal.map((s) => sub(s, mean));
    }

    return ok(new SpectralEngine(signal, dft(signal)));
  }

  static fromReal(values: readonly number[], options?: EngineOptions): Result<SpectralEngine> {
    return SpectralEngine.create(fromReal(values), options);
  }

  static fromPoints(points: readonly Point[], options?: EngineOptions): Result<SpectralEngine> {
    return SpectralEngine.create(fromPoints(points), options);
  }

  size(): number {
    return this.samples.length;
  }

  original(): readonly Complex[] {
    return this.samples;
  }

  coefficients(): readonly Complex[] {
    return this.transform;
  }

  maxFrequency(): number {
    return Math.floor(this.samples.length / 2);
  }

  validateRange(kMin: number, kMax: number): Result<void> {
    const max = this.maxFrequency();
    if (!isIndex(kMin) || !isIndex(kMax) || kMin > kMax || kMax > max) {
      return fail('InvalidRange', `Frequency range [${kMin}, ${kMax}] out of bounds (max ${max})`);
    }
    return ok(undefined);
  }

  /** Inverse transform restricted to [kMin, kMax] and the mirrored negative frequencies. */
  filteredRange(kMin: number, kMax: number): Result<Complex[]> {
    const valid = this.validateRange(kMin, kMax);
    if (!valid.ok) return valid;

    const N = this.size();
    const indices = bandIndices(N, kMin, kMax);
    const out: Complex[] = [];

    for (let n = 0; n < N; n++) {
      let re = 0;
      let im = 0;
      for (const k of indices) {
        const theta = (2 * Math.PI * k * n) / N;
        const cosT = Math.cos(theta);
        const sinT = Math.sin(theta);
        const c = this.transform[k];
        re += c.re * cosT - c.im * sinT;
        im += c.re * sinT + c.im * cosT;
      }
      out.push({ re, im });
    }

    return ok(out);
  }

  powerSpectrum(): number[] {
    return this.transform.map(abs2);
  }

  /** Same powers with frequency 0 in the middle and signed frequency labels. */
  centeredPowerSpectrum(): CenteredSpectrum {
    const N = this.size();
    const shift = Math.min(this.maxFrequency() + 1, N);
    const powers = this.powerSpectrum();
    const frequencies = powers.map((_, k) => k);

    const rotate = <T>(xs: T[]) => [...xs.slice(shift), ...xs.slice(0, shift)];
    return {
      frequencies: rotate(frequencies).map((k, i) => (i < N - shift ? k - N : k)),
      powers: rotate(powers)
    };
  }

  /** Value of one epicycle vector: X_k * e^(i * 2 * pi * k * t / N). */
  getComponent(frequency: number, timeStep: number): Result<Complex> {
    const N = this.size();
    if (!isIndex(frequency) || frequency >= N) {
      return fail('FrequencyOutOfBounds', `Frequency ${frequency} outside 0..${N - 1}`);
    }
    const theta = (2 * Math.PI * frequency * timeStep) / N;
    return ok(mul(this.transform[frequency], expi(theta)));
  }
}
