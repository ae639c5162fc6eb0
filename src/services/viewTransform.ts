import type { Point } from '../types';

export type Viewport = { width: number; height: number };

/** Visible window of signal space; y grows upwards. */
export type PlotRange = {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
};

export const DEFAULT_RANGE: PlotRange = { xMin: -1, xMax: 1, yMin: -1, yMax: 1 };

export const isValidViewport = (viewport: Viewport) =>
  Number.isFinite(viewport.width) &&
  Number.isFinite(viewport.height) &&
  viewport.width > 0 &&
  viewport.height > 0;

const widen = (min: number, max: number, padding: number): [number, number] => {
  const span = max - min;
  if (span <= 1e-9) {
    const half = Math.max(Math.abs(min) * padding, 1);
    return [min - half, max + half];
  }
  return [min - span * padding, max + span * padding];
};

export const fitRangeToPoints = (points: readonly Point[], padding = 0.1): PlotRange => {
  if (points.length === 0) return DEFAULT_RANGE;

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    if (p.x < minX) minX = p.x;
    if (p.y < minY) minY = p.y;
    if (p.x > maxX) maxX = p.x;
    if (p.y > maxY) maxY = p.y;
  }

  if (!Number.isFinite(minX) || !Number.isFinite(minY) || !Number.isFinite(maxX) || !Number.isFinite(maxY)) {
    return DEFAULT_RANGE;
  }

  const [xMin, xMax] = widen(minX, maxX, padding);
  const [yMin, yMax] = widen(minY, maxY, padding);
  return { xMin, xMax, yMin, yMax };
};

/** Grows one axis of the range so one unit spans the same pixels on both axes. */
export const preserveAspect = (range: PlotRange, viewport: Viewport): PlotRange => {
  if (!isValidViewport(viewport)) return range;
  const xSpan = range.xMax - range.xMin;
  const ySpan = range.yMax - range.yMin;
  const aspect = viewport.width / viewport.height;

  if (xSpan / ySpan > aspect) {
    const yCenter = (range.yMin + range.yMax) / 2;
    const half = xSpan / aspect / 2;
    return { ...range, yMin: yCenter - half, yMax: yCenter + half };
  }
  const xCenter = (range.xMin + range.xMax) / 2;
  const half = (ySpan * aspect) / 2;
  return { ...range, xMin: xCenter - half, xMax: xCenter + half };
};

export const dataToScreen = (p: Point, range: PlotRange, viewport: Viewport): Point => ({
  x: ((p.x - range.xMin) / (range.xMax - range.xMin)) * viewport.width,
  y: viewport.height - ((p.y - range.yMin) / (range.yMax - range.yMin)) * viewport.height
});

export const screenToData = (p: Point, range: PlotRange, viewport: Viewport): Point => ({
  x: range.xMin + (p.x / viewport.width) * (range.xMax - range.xMin),
  y: range.yMax - (p.y / viewport.height) * (range.yMax - range.yMin)
});
