import type { Complex, Point } from '../types';

export const ZERO: Complex = Object.freeze({ re: 0, im: 0 });

export const add = (a: Complex, b: Complex): Complex => ({ re: a.re + b.re, im: a.im + b.im });

export const sub = (a: Complex, b: Complex): Complex => ({ re: a.re - b.re, im: a.im - b.im });

// (a + bi)(c + di) = (ac - bd) + i(ad + bc)
export const mul = (a: Complex, b: Complex): Complex => ({
  re: a.re * b.re - a.im * b.im,
  im: a.re * b.im + a.im * b.re
});

export const scale = (a: Complex, s: number): Complex => ({ re: a.re * s, im: a.im * s });

/** e^(i * theta) */
export const expi = (theta: number): Complex => ({ re: Math.cos(theta), im: Math.sin(theta) });

export const abs2 = (a: Complex): number => a.re * a.re + a.im * a.im;

export const abs = (a: Complex): number => Math.hypot(a.re, a.im);

export const isFiniteComplex = (a: Complex): boolean => Number.isFinite(a.re) && Number.isFinite(a.im);

export const fromReal = (values: readonly number[]): Complex[] => values.map((re) => ({ re, im: 0 }));

export const fromPoints = (points: readonly Point[]): Complex[] =>
  points.map((p) => ({ re: p.x, im: p.y }));

export const toPoint = (c: Complex): Point => ({ x: c.re, y: c.im });
