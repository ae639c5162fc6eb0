/** Playback speed in samples per second. */
export const DEFAULT_SPEED = 60;
export const SPEED_UP_FACTOR = 1.5;
export const SLOW_DOWN_FACTOR = 2 / 3;

/** Longest frame delta (seconds) fed to playback, so a backgrounded tab does not jump. */
export const MAX_FRAME_DELTA = 0.1;

export const DEFAULT_K_MIN = 0;
export const DEFAULT_K_MAX = 10;
export const ENERGY_TARGET_PCT = 95;

export const CANVAS_WIDTH = 800;
export const CANVAS_HEIGHT = 400;
export const SPECTRUM_HEIGHT = 160;

export const PLOT_PADDING = 0.1;
export const GRID_DIVISIONS = 10;

export const COLORS = {
  original: '#1f77b4',
  reconstruction: '#ff7f0e',
  spectrum: '#9467bd',
  grid: 'rgba(148, 163, 184, 0.22)',
  background: '#0f172a'
} as const;

export const LINE_WIDTH_ORIGINAL = 1;
export const LINE_WIDTH_RECONSTRUCTED = 2;
export const ARROW_WIDTH = 2;
