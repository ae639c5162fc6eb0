import type { Complex, ExampleSignal } from '../types';
import shapes from '../data/examples.json';
import { fromReal } from './complex';

const range = (n: number) => Array.from({ length: n }, (_, i) => i);

// --- 1-D signals ---

/** 1 strictly between `low` and `high`, 0 elsewhere. */
export const generateStep = (size = shapes.real.step.size, low = shapes.real.step.low, high = shapes.real.step.high) =>
  fromReal(range(size).map((i) => (i > low && i < high ? 1 : 0)));

export const generateSine = (size = shapes.real.sine.size, cycles = shapes.real.sine.cycles) =>
  fromReal(range(size).map((i) => Math.sin((2 * Math.PI * cycles * i) / size)));

export const generateSquareWave = (size = shapes.real.square.size, cycles = shapes.real.square.cycles) =>
  fromReal(range(size).map((i) => (((cycles * i) / size) % 1 < 0.5 ? 1 : -1)));

export const generateTriangle = (size = shapes.real.triangle.size, cycles = shapes.real.triangle.cycles) =>
  fromReal(
    range(size).map((i) => {
      const phase = ((cycles * i) / size) % 1;
      return phase < 0.5 ? 4 * phase - 1 : 3 - 4 * phase;
    })
  );

// --- Closed curves, x = re, y = im ---

export const generateCircle = (steps = shapes.curves.circle.steps, radius = shapes.curves.circle.radius): Complex[] =>
  range(steps).map((i) => {
    const angle = (2 * Math.PI * i) / steps;
    return { re: radius * Math.cos(angle), im: radius * Math.sin(angle) };
  });

export const generateSquare = (
  stepsPerSide = shapes.curves.square.stepsPerSide,
  half = shapes.curves.square.half
): Complex[] => {
  const points: Complex[] = [];
  const edge = (i: number) => -half + (i * 2 * half) / stepsPerSide;
  for (let i = 0; i < stepsPerSide; i++) points.push({ re: edge(i), im: -half });
  for (let i = 0; i < stepsPerSide; i++) points.push({ re: half, im: edge(i) });
  for (let i = 0; i < stepsPerSide; i++) points.push({ re: -edge(i), im: half });
  for (let i = 0; i < stepsPerSide; i++) points.push({ re: -half, im: -edge(i) });
  return points;
};

export const generateHeart = (steps = shapes.curves.heart.steps, scale = shapes.curves.heart.scale): Complex[] =>
  range(steps).map((i) => {
    const a = (2 * Math.PI * i) / steps;
    const x = 16 * Math.pow(Math.sin(a), 3);
    const y = 13 * Math.cos(a) - 5 * Math.cos(2 * a) - 2 * Math.cos(3 * a) - Math.cos(4 * a);
    return { re: x * scale, im: y * scale };
  });

export const generateInfinity = (steps = shapes.curves.infinity.steps, scale = shapes.curves.infinity.scale): Complex[] =>
  range(steps).map((i) => {
    const t = (2 * Math.PI * i) / steps;
    return { re: scale * Math.cos(t), im: scale * Math.sin(t) * Math.cos(t) };
  });

export const EXAMPLES: readonly ExampleSignal[] = [
  { id: 'step', name: 'Step', kind: 'REAL', closed: false, samples: generateStep() },
  { id: 'sine', name: 'Sine', kind: 'REAL', closed: false, samples: generateSine() },
  { id: 'square-wave', name: 'Square wave', kind: 'REAL', closed: false, samples: generateSquareWave() },
  { id: 'triangle', name: 'Triangle', kind: 'REAL', closed: false, samples: generateTriangle() },
  { id: 'circle', name: 'Circle', kind: 'CURVE', closed: true, samples: generateCircle() },
  { id: 'square', name: 'Square', kind: 'CURVE', closed: true, samples: generateSquare() },
  { id: 'heart', name: 'Heart', kind: 'CURVE', closed: true, samples: generateHeart() },
  { id: 'infinity', name: 'Infinity', kind: 'CURVE', closed: true, samples: generateInfinity() }
];

export const findExample = (id: string): ExampleSignal | undefined => EXAMPLES.find((e) => e.id === id);
