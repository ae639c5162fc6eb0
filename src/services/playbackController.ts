import type { Complex, Epicycle, PlaybackState } from '../types';
import { abs, add, ZERO } from './complex';
import { consoleErrorSink, ok, SpectralError, type ErrorSink, type Result } from './errors';
import { bandIndices, SpectralEngine, type EngineOptions, type SpectralSource } from './spectralEngine';
import { DEFAULT_SPEED, SLOW_DOWN_FACTOR, SPEED_UP_FACTOR } from '../constants';

export interface PlaybackFrame {
  original: readonly Complex[];
  reconstruction: Complex[];
  epicycles: Epicycle[];
  tip: Complex;
  currentPoint: number;
}

/** Anything that wants to be called once per display frame. */
export interface TickHandler {
  onTick(elapsed: number): void;
}

/** The scheduler side of playback: told when to start and stop issuing ticks. */
export interface PlaybackClock {
  start(): void;
  stop(): void;
}

export type FrameSink = (frame: PlaybackFrame) => void;

export interface PlaybackOptions {
  kMin?: number;
  kMax?: number;
  speed?: number;
  /** Closed curves wrap; open signals draw one sample past the current point. */
  closed?: boolean;
  clock?: PlaybackClock;
  onFrame?: FrameSink;
  onError?: ErrorSink;
}

const clampBand = (kMin: number, kMax: number, maxFrequency: number): [number, number] => {
  const clampIndex = (k: number) => Math.max(0, Math.min(maxFrequency, Number.isFinite(k) ? Math.floor(k) : 0));
  const lo = clampIndex(kMin);
  const hi = clampIndex(kMax);
  return lo <= hi ? [lo, hi] : [hi, hi];
};

export class PlaybackController implements TickHandler {
  readonly engine: SpectralSource;
  private readonly closed: boolean;
  private readonly clock?: PlaybackClock;
  private readonly onFrame?: FrameSink;
  private readonly onError: ErrorSink;

  private state: PlaybackState = 'STOPPED';
  private position = 0;
  private pointSpeed: number;
  private kMin: number;
  private kMax: number;

  constructor(engine: SpectralSource, options: PlaybackOptions = {}) {
    this.engine = engine;
    this.closed = options.closed ?? true;
    this.clock = options.clock;
    this.onFrame = options.onFrame;
    this.onError = options.onError ?? consoleErrorSink;
    this.pointSpeed = options.speed !== undefined && Number.isFinite(options.speed) ? options.speed : DEFAULT_SPEED;
    [this.kMin, this.kMax] = clampBand(options.kMin ?? 0, options.kMax ?? engine.maxFrequency(), engine.maxFrequency());
  }

  getState(): PlaybackState {
    return this.state;
  }

  isPaused(): boolean {
    return this.state === 'PAUSED';
  }

  isStopped(): boolean {
    return this.state === 'STOPPED';
  }

  start(): void {
    if (this.state !== 'STOPPED') return;
    this.position = 0;
    this.state = 'PLAYING';
    this.clock?.start();
  }

  play(): void {
    if (this.state !== 'PAUSED') return;
    this.state = 'PLAYING';
    this.clock?.start();
  }

  pause(): void {
    if (this.state !== 'PLAYING') return;
    this.state = 'PAUSED';
    this.clock?.stop();
  }

  stop(): void {
    if (this.state === 'STOPPED') return;
    this.state = 'STOPPED';
    this.position = 0;
    this.clock?.stop();
  }

  togglePlayPause(): void {
    if (this.state === 'STOPPED') this.start();
    else if (this.state === 'PLAYING') this.pause();
    else this.play();
  }

  speed(): number {
    return this.pointSpeed;
  }

  setSpeed(speed: number): void {
    if (!Number.isFinite(speed)) {
      this.onError(new SpectralError('NonFiniteValue', `Ignoring non-finite playback speed: ${speed}`));
      return;
    }
    this.pointSpeed = speed;
  }

  speedUp(): void {
    this.setSpeed(this.pointSpeed * SPEED_UP_FACTOR);
  }

  slowDown(): void {
    this.setSpeed(this.pointSpeed * SLOW_DOWN_FACTOR);
  }

  band(): [number, number] {
    return [this.kMin, this.kMax];
  }

  setBand(kMin: number, kMax: number): Result<void> {
    const valid = this.engine.validateRange(kMin, kMax);
    if (!valid.ok) return valid;
    this.kMin = kMin;
    this.kMax = kMax;
    return ok(undefined);
  }

  getPosition(): number {
    return this.position;
  }

  currentPoint(): number {
    const N = this.engine.size();
    return (N + Math.floor(this.position)) % N;
  }

  onTick(elapsed: number): void {
    this.step(elapsed);
  }

  step(elapsed: number): PlaybackFrame | undefined {
    if (this.state !== 'PLAYING') return undefined;
    if (!Number.isFinite(elapsed)) {
      this.onError(new SpectralError('NonFiniteValue', `Ignoring non-finite elapsed time: ${elapsed}`));
      return undefined;
    }

    const N = this.engine.size();
    this.position += this.pointSpeed * elapsed;
    this.position = ((this.position % N) + N) % N;

    const frame = this.frame();
    if (frame) this.onFrame?.(frame);
    return frame;
  }

  /** What should be drawn at the current position, or undefined if the band query failed. */
  frame(): PlaybackFrame | undefined {
    const N = this.engine.size();
    const current = this.currentPoint();

    const filtered = this.engine.filteredRange(this.kMin, this.kMax);
    if (!filtered.ok) {
      this.onError(filtered.error);
      return undefined;
    }
    const visible = this.closed ? current + 1 : Math.min(current + 2, N);

    const epicycles: Epicycle[] = [];
    let tip = ZERO;
    for (const k of bandIndices(N, this.kMin, this.kMax)) {
      const component = this.engine.getComponent(k, current);
      if (!component.ok) {
        this.onError(component.error);
        return undefined;
      }
      const next = add(tip, component.value);
      epicycles.push({ from: tip, to: next, frequency: k, magnitude: abs(component.value) });
      tip = next;
    }

    return {
      original: this.engine.original(),
      reconstruction: filtered.value.slice(0, visible),
      epicycles,
      tip,
      currentPoint: current
    };
  }
}

/** Builds an engine and a controller bound to it; a failed construction yields no controller. */
export const createPlayback = (
  samples: readonly Complex[],
  options: PlaybackOptions & EngineOptions = {}
): Result<PlaybackController> => {
  const engine = SpectralEngine.create(samples, { center: options.center });
  if (!engine.ok) return engine;
  return ok(new PlaybackController(engine.value, options));
};
