import { MAX_FRAME_DELTA } from '../constants';
import type { PlaybackClock, TickHandler } from './playbackController';

export interface FrameScheduler {
  requestFrame(callback: (timestamp: number) => void): number;
  cancelFrame(handle: number): void;
}

export const browserScheduler: FrameScheduler = {
  requestFrame: (callback) => window.requestAnimationFrame(callback),
  cancelFrame: (handle) => window.cancelAnimationFrame(handle)
};

/**
 * Drives a TickHandler from an animation-frame scheduler. Elapsed time is
 * reported in seconds; the first frame after start() reports 0.
 */
export class FrameClock implements PlaybackClock {
  private handle: number | null = null;
  private lastTimestamp: number | null = null;
  private handler: TickHandler | null = null;

  constructor(
    private readonly scheduler: FrameScheduler = browserScheduler,
    private readonly maxDelta: number = MAX_FRAME_DELTA
  ) {}

  bind(handler: TickHandler | null): void {
    this.handler = handler;
  }

  isRunning(): boolean {
    return this.handle !== null;
  }

  start(): void {
    if (this.handle !== null) return;
    this.lastTimestamp = null;
    this.handle = this.scheduler.requestFrame(this.frame);
  }

  stop(): void {
    if (this.handle === null) return;
    this.scheduler.cancelFrame(this.handle);
    this.handle = null;
    this.lastTimestamp = null;
  }

  private readonly frame = (timestamp: number) => {
    const prev = this.lastTimestamp;
    const elapsed = prev === null ? 0 : Math.min(Math.max(timestamp - prev, 0) / 1000, this.maxDelta);
    this.lastTimestamp = timestamp;

    // re-arm before ticking; onTick may call stop()
    this.handle = this.scheduler.requestFrame(this.frame);
    this.handler?.onTick(elapsed);
  };
}
