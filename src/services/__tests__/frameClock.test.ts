import { describe, expect, it, vi } from 'vitest';
import { FrameClock, type FrameScheduler } from '../frameClock';
import { PlaybackController } from '../playbackController';
import { SpectralEngine } from '../spectralEngine';

class FakeScheduler implements FrameScheduler {
  private pending = new Map<number, (timestamp: number) => void>();
  private nextHandle = 1;

  requestFrame(callback: (timestamp: number) => void): number {
    const handle = this.nextHandle++;
    this.pending.set(handle, callback);
    return handle;
  }

  cancelFrame(handle: number): void {
    this.pending.delete(handle);
  }

  pendingCount(): number {
    return this.pending.size;
  }

  fire(timestamp: number): void {
    const callbacks = [...this.pending.values()];
    this.pending.clear();
    callbacks.forEach((cb) => cb(timestamp));
  }
}

describe('FrameClock', () => {
  it('requests a single frame however often it is started', () => {
    const scheduler = new FakeScheduler();
    const clock = new FrameClock(scheduler);
    clock.start();
    clock.start();
    expect(scheduler.pendingCount()).toBe(1);
    expect(clock.isRunning()).toBe(true);
  });

  it('reports seconds between frames, zero on the first and clamped after a stall', () => {
    const scheduler = new FakeScheduler();
    const clock = new FrameClock(scheduler, 0.1);
    const onTick = vi.fn();
    clock.bind({ onTick });
    clock.start();

    scheduler.fire(1000);
    scheduler.fire(1016);
    scheduler.fire(6000);

    expect(onTick).toHaveBeenCalledTimes(3);
    expect(onTick.mock.calls[0][0]).toBe(0);
    expect(onTick.mock.calls[1][0]).toBeCloseTo(0.016, 12);
    expect(onTick.mock.calls[2][0]).toBe(0.1);
  });

  it('cancels the pending frame on stop', () => {
    const scheduler = new FakeScheduler();
    const clock = new FrameClock(scheduler);
    const onTick = vi.fn();
    clock.bind({ onTick });
    clock.start();
    clock.stop();

    expect(scheduler.pendingCount()).toBe(0);
    expect(clock.isRunning()).toBe(false);
    scheduler.fire(16);
    expect(onTick).not.toHaveBeenCalled();
  });

  it('lets a handler stop the clock from inside a tick', () => {
    const scheduler = new FakeScheduler();
    const clock = new FrameClock(scheduler);
    clock.bind({ onTick: () => clock.stop() });
    clock.start();
    scheduler.fire(16);
    expect(scheduler.pendingCount()).toBe(0);
    expect(clock.isRunning()).toBe(false);
  });

  it('drives a playback controller between start and stop', () => {
    const scheduler = new FakeScheduler();
    const clock = new FrameClock(scheduler);
    const engine = SpectralEngine.fromReal([0, 1, 2, 3, 4, 5, 6, 7]);
    if (!engine.ok) throw engine.error;

    const controller = new PlaybackController(engine.value, { clock, speed: 10 });
    clock.bind(controller);

    controller.start();
    expect(clock.isRunning()).toBe(true);
    scheduler.fire(0);
    scheduler.fire(100);
    expect(controller.currentPoint()).toBe(1);

    controller.stop();
    expect(clock.isRunning()).toBe(false);
    expect(controller.currentPoint()).toBe(0);
  });

  it('schedules nothing while playback is paused', () => {
    const scheduler = new FakeScheduler();
    const clock = new FrameClock(scheduler);
    const engine = SpectralEngine.fromReal([0, 1, 2, 3, 4, 5, 6, 7]);
    if (!engine.ok) throw engine.error;

    const controller = new PlaybackController(engine.value, { clock, speed: 10 });
    clock.bind(controller);
    controller.start();
    scheduler.fire(0);
    scheduler.fire(100);

    controller.pause();
    expect(scheduler.pendingCount()).toBe(0);

    controller.play();
    expect(scheduler.pendingCount()).toBe(1);
    // first frame after resuming reports no elapsed time
    scheduler.fire(5000);
    expect(controller.currentPoint()).toBe(1);
    scheduler.fire(5100);
    expect(controller.currentPoint()).toBe(2);
  });
});
