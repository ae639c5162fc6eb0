import { describe, expect, it } from 'vitest';
import {
  DEFAULT_RANGE,
  dataToScreen,
  fitRangeToPoints,
  isValidViewport,
  preserveAspect,
  screenToData
} from '../viewTransform';

const unit = { xMin: -1, xMax: 1, yMin: -1, yMax: 1 };

describe('viewTransform', () => {
  it('maps data to screen with y flipped and back again', () => {
    const viewport = { width: 200, height: 100 };
    expect(dataToScreen({ x: -1, y: 1 }, unit, viewport)).toEqual({ x: 0, y: 0 });
    expect(dataToScreen({ x: 0, y: 0 }, unit, viewport)).toEqual({ x: 100, y: 50 });

    const back = screenToData({ x: 150, y: 25 }, unit, viewport);
    expect(back.x).toBeCloseTo(0.5, 12);
    expect(back.y).toBeCloseTo(0.5, 12);
  });

  it('fits a padded range around the points', () => {
    const range = fitRangeToPoints(
      [
        { x: 0, y: 0 },
        { x: 10, y: 20 }
      ],
      0.1
    );
    expect(range.xMin).toBeCloseTo(-1, 12);
    expect(range.xMax).toBeCloseTo(11, 12);
    expect(range.yMin).toBeCloseTo(-2, 12);
    expect(range.yMax).toBeCloseTo(22, 12);
  });

  it('widens degenerate spans and falls back for empty input', () => {
    expect(fitRangeToPoints([{ x: 5, y: 5 }])).toEqual({ xMin: 4, xMax: 6, yMin: 4, yMax: 6 });
    expect(fitRangeToPoints([])).toEqual(DEFAULT_RANGE);
    expect(fitRangeToPoints([{ x: Number.NaN, y: 0 }])).toEqual(DEFAULT_RANGE);
  });

  it('grows the short axis to keep unit aspect', () => {
    expect(preserveAspect(unit, { width: 200, height: 100 })).toEqual({ xMin: -2, xMax: 2, yMin: -1, yMax: 1 });
    expect(preserveAspect(unit, { width: 100, height: 200 })).toEqual({ xMin: -1, xMax: 1, yMin: -2, yMax: 2 });
  });

  it('leaves the range alone for an unusable viewport', () => {
    const viewport = { width: 0, height: 100 };
    expect(isValidViewport(viewport)).toBe(false);
    expect(preserveAspect(unit, viewport)).toBe(unit);
  });
});
