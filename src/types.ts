export interface Point {
  x: number;
  y: number;
}

export interface Complex {
  re: number;
  im: number;
}

/** One arrow of the rotating-vector chain, tail at `from`, head at `to`. */
export interface Epicycle {
  from: Complex;
  to: Complex;
  frequency: number;
  magnitude: number;
}

export type PlaybackState = 'STOPPED' | 'PAUSED' | 'PLAYING';

export type SignalKind = 'REAL' | 'CURVE';

export interface ExampleSignal {
  id: string;
  name: string;
  kind: SignalKind;
  closed: boolean;
  samples: Complex[];
}
