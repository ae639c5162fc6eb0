import type { Complex, Point, SignalKind } from '../types';
import { ARROW_WIDTH, COLORS, GRID_DIVISIONS, LINE_WIDTH_ORIGINAL, LINE_WIDTH_RECONSTRUCTED } from '../constants';
import type { DrawingSurface } from './canvasSurface';
import { ok, type Result } from './errors';
import type { CenteredSpectrum, SpectralSource } from './spectralEngine';
import type { PlaybackFrame } from './playbackController';
import { toPoint } from './complex';
import { epicycleColor } from './visualUtils';

/**
 * 2-D curves plot (re, im) directly. Real signals plot (index, re) and the
 * epicycle chain is laid horizontally at the current index so its tip lands
 * on the reconstructed value.
 */
export const projectSignal = (samples: readonly Complex[], kind: SignalKind): Point[] =>
  kind === 'CURVE' ? samples.map(toPoint) : samples.map((c, i) => ({ x: i, y: c.re }));

const projectVector = (c: Complex, kind: SignalKind, currentPoint: number): Point =>
  kind === 'CURVE' ? toPoint(c) : { x: currentPoint + c.im, y: c.re };

export const drawFrame = (surface: DrawingSurface, frame: PlaybackFrame, kind: SignalKind) => {
  surface.clear();
  surface.grid(COLORS.grid, GRID_DIVISIONS);
  surface.polyline(projectSignal(frame.original, kind), COLORS.original, LINE_WIDTH_ORIGINAL);
  surface.polyline(projectSignal(frame.reconstruction, kind), COLORS.reconstruction, LINE_WIDTH_RECONSTRUCTED);

  const maxMagnitude = frame.epicycles.reduce((acc, e) => Math.max(acc, e.magnitude), 0);
  for (const e of frame.epicycles) {
    surface.arrow(
      projectVector(e.from, kind, frame.currentPoint),
      projectVector(e.to, kind, frame.currentPoint),
      epicycleColor(e.magnitude, maxMagnitude),
      ARROW_WIDTH
    );
  }
};

/** Static view: the signal and its whole band reconstruction, no vectors. */
export const drawBand = (
  surface: DrawingSurface,
  engine: SpectralSource,
  kMin: number,
  kMax: number,
  kind: SignalKind
): Result<void> => {
  const filtered = engine.filteredRange(kMin, kMax);
  if (!filtered.ok) return filtered;

  surface.clear();
  surface.grid(COLORS.grid, GRID_DIVISIONS);
  surface.polyline(projectSignal(engine.original(), kind), COLORS.original, LINE_WIDTH_ORIGINAL);
  surface.polyline(projectSignal(filtered.value, kind), COLORS.reconstruction, LINE_WIDTH_RECONSTRUCTED);
  return ok(undefined);
};

export const drawSpectrum = (surface: DrawingSurface, spectrum: CenteredSpectrum) => {
  surface.clear();
  surface.bars(spectrum.frequencies, spectrum.powers, 0.8, COLORS.spectrum);
};
