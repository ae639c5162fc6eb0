import { describe, expect, it, vi } from 'vitest';
import { abs, add, expi, isFiniteComplex, mul, scale, sub, toPoint } from '../complex';
import { consoleErrorSink, fail, ok, SpectralError } from '../errors';

describe('complex arithmetic', () => {
  it('adds, subtracts, multiplies and scales', () => {
    const a = { re: 1, im: 2 };
    const b = { re: 3, im: -1 };
    expect(add(a, b)).toEqual({ re: 4, im: 1 });
    expect(sub(a, b)).toEqual({ re: -2, im: 3 });
    expect(mul(a, b)).toEqual({ re: 5, im: 5 });
    expect(scale(a, 2)).toEqual({ re: 2, im: 4 });
    expect(abs({ re: 3, im: 4 })).toBe(5);
    expect(toPoint(a)).toEqual({ x: 1, y: 2 });
  });

  it('builds unit phasors', () => {
    const quarter = expi(Math.PI / 2);
    expect(quarter.re).toBeCloseTo(0, 12);
    expect(quarter.im).toBeCloseTo(1, 12);
  });

  it('detects non-finite parts', () => {
    expect(isFiniteComplex({ re: 1, im: 0 })).toBe(true);
    expect(isFiniteComplex({ re: 1, im: Number.NEGATIVE_INFINITY })).toBe(false);
  });
});

describe('results', () => {
  it('wraps values and typed errors', () => {
    expect(ok(3)).toEqual({ ok: true, value: 3 });
    const failed = fail('EmptyInput', 'Input signal is empty');
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error).toBeInstanceOf(SpectralError);
      expect(failed.error.name).toBe('SpectralError');
      expect(failed.error.kind).toBe('EmptyInput');
    }
  });

  it('logs through the console sink', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    consoleErrorSink(new SpectralError('FrequencyOutOfBounds', 'Frequency 9 outside 0..7'));
    expect(spy).toHaveBeenCalledWith('[FrequencyOutOfBounds] Frequency 9 outside 0..7');
    spy.mockRestore();
  });
});
