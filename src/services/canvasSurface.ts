import type { Point } from '../types';
import { dataToScreen, screenToData, type PlotRange, type Viewport } from './viewTransform';

/** Drawing primitives in signal space; implementations own the pixel mapping. */
export interface DrawingSurface {
  clear(): void;
  grid(color: string, divisions: number): void;
  polyline(points: readonly Point[], color: string, width: number): void;
  arrow(from: Point, to: Point, color: string, width: number): void;
  bars(xs: readonly number[], heights: readonly number[], barWidth: number, color: string): void;
}

export type PlotContext = Pick<
  CanvasRenderingContext2D,
  'beginPath' | 'moveTo' | 'lineTo' | 'stroke' | 'fill' | 'closePath' | 'clearRect' | 'fillRect'
> & {
  strokeStyle: CanvasRenderingContext2D['strokeStyle'];
  fillStyle: CanvasRenderingContext2D['fillStyle'];
  lineWidth: number;
};

const HEAD_RATIO = 0.25;
const MAX_HEAD_PX = 10;
const HEAD_ANGLE = Math.PI / 7;

export class CanvasSurface implements DrawingSurface {
  constructor(
    private readonly ctx: PlotContext,
    private readonly viewport: Viewport,
    private readonly range: PlotRange,
    private readonly background?: string
  ) {}

  /** Canvas pixel position back to signal space. */
  toData(pixel: Point): Point {
    return screenToData(pixel, this.range, this.viewport);
  }

  private toScreen(p: Point): Point {
    return dataToScreen(p, this.range, this.viewport);
  }

  clear(): void {
    this.ctx.clearRect(0, 0, this.viewport.width, this.viewport.height);
    if (this.background) {
      this.ctx.fillStyle = this.background;
      this.ctx.fillRect(0, 0, this.viewport.width, this.viewport.height);
    }
  }

  /** Evenly spaced reference lines across the whole viewport. */
  grid(color: string, divisions: number): void {
    if (divisions < 1) return;
    const { width, height } = this.viewport;
    this.ctx.strokeStyle = color;
    this.ctx.lineWidth = 1;
    for (let i = 0; i <= divisions; i++) {
      const x = (i * width) / divisions;
      this.ctx.beginPath();
      this.ctx.moveTo(x, 0);
      this.ctx.lineTo(x, height);
      this.ctx.stroke();
    }
    for (let i = 0; i <= divisions; i++) {
      const y = (i * height) / divisions;
      this.ctx.beginPath();
      this.ctx.moveTo(0, y);
      this.ctx.lineTo(width, y);
      this.ctx.stroke();
    }
  }

  polyline(points: readonly Point[], color: string, width: number): void {
    if (points.length < 2) return;
    this.ctx.strokeStyle = color;
    this.ctx.lineWidth = width;
    this.ctx.beginPath();
    points.forEach((p, i) => {
      const s = this.toScreen(p);
      if (i === 0) this.ctx.moveTo(s.x, s.y);
      else this.ctx.lineTo(s.x, s.y);
    });
    this.ctx.stroke();
  }

  arrow(from: Point, to: Point, color: string, width: number): void {
    const a = this.toScreen(from);
    const b = this.toScreen(to);
    const length = Math.hypot(b.x - a.x, b.y - a.y);

    this.ctx.strokeStyle = color;
    this.ctx.lineWidth = width;
    this.ctx.beginPath();
    this.ctx.moveTo(a.x, a.y);
    this.ctx.lineTo(b.x, b.y);
    this.ctx.stroke();

    if (length < 1e-6) return;

    const head = Math.min(length * HEAD_RATIO, MAX_HEAD_PX);
    const angle = Math.atan2(b.y - a.y, b.x - a.x);
    this.ctx.fillStyle = color;
    this.ctx.beginPath();
    this.ctx.moveTo(b.x, b.y);
    this.ctx.lineTo(b.x - head * Math.cos(angle - HEAD_ANGLE), b.y - head * Math.sin(angle - HEAD_ANGLE));
    this.ctx.lineTo(b.x - head * Math.cos(angle + HEAD_ANGLE), b.y - head * Math.sin(angle + HEAD_ANGLE));
    this.ctx.closePath();
    this.ctx.fill();
  }

  bars(xs: readonly number[], heights: readonly number[], barWidth: number, color: string): void {
    this.ctx.fillStyle = color;
    const count = Math.min(xs.length, heights.length);
    for (let i = 0; i < count; i++) {
      const base = this.toScreen({ x: xs[i] - barWidth / 2, y: 0 });
      const top = this.toScreen({ x: xs[i] + barWidth / 2, y: heights[i] });
      this.ctx.fillRect(base.x, top.y, top.x - base.x, base.y - top.y);
    }
  }
}
