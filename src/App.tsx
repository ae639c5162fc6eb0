import React, { useCallback, useEffect, useMemo, useRef, useState, type PointerEvent } from 'react';
import type { ExampleSignal, PlaybackState, Point } from './types';
import {
  CANVAS_HEIGHT,
  CANVAS_WIDTH,
  COLORS,
  DEFAULT_K_MAX,
  DEFAULT_K_MIN,
  ENERGY_TARGET_PCT,
  PLOT_PADDING,
  SPECTRUM_HEIGHT
} from './constants';
import { CanvasSurface } from './services/canvasSurface';
import { consoleErrorSink } from './services/errors';
import { EXAMPLES, findExample } from './services/examples';
import { FrameClock } from './services/frameClock';
import { drawBand, drawFrame, drawSpectrum, projectSignal } from './services/frameRenderer';
import { computeBandMetrics, pickBandForEnergy, type BandMetrics } from './services/metrics';
import { PlaybackController } from './services/playbackController';
import { SpectralEngine } from './services/spectralEngine';
import { fitRangeToPoints, preserveAspect } from './services/viewTransform';
import Toolbar from './components/Toolbar';
import MathPanel from './components/MathPanel';

const MAIN_VIEWPORT = { width: CANVAS_WIDTH, height: CANVAS_HEIGHT };
const SPECTRUM_VIEWPORT = { width: CANVAS_WIDTH, height: SPECTRUM_HEIGHT };

const App: React.FC = () => {
  const [exampleId, setExampleId] = useState(EXAMPLES[0].id);
  const [band, setBandState] = useState<[number, number]>([DEFAULT_K_MIN, DEFAULT_K_MAX]);
  const [playbackState, setPlaybackState] = useState<PlaybackState>('STOPPED');
  const [speed, setSpeed] = useState(0);
  const [showMath, setShowMath] = useState(true);
  const [engine, setEngine] = useState<SpectralEngine | null>(null);
  const [pointer, setPointer] = useState<Point | null>(null);

  const canvasRef = useRef<HTMLCanvasElement>(null);
  const spectrumRef = useRef<HTMLCanvasElement>(null);
  const controllerRef = useRef<PlaybackController | null>(null);
  const clockRef = useRef<FrameClock | null>(null);
  const surfaceRef = useRef<CanvasSurface | null>(null);
  const bandRef = useRef(band);
  bandRef.current = band;

  const example: ExampleSignal = findExample(exampleId) ?? EXAMPLES[0];

  const syncControls = useCallback(() => {
    const controller = controllerRef.current;
    if (!controller) return;
    setPlaybackState(controller.getState());
    setSpeed(controller.speed());
  }, []);

  const redraw = useCallback(() => {
    const controller = controllerRef.current;
    const surface = surfaceRef.current;
    if (!controller || !surface) return;
    // 1-D signals show the whole band while not animating
    if (example.kind === 'REAL' && controller.getState() !== 'PLAYING') {
      const [kMin, kMax] = controller.band();
      const drawn = drawBand(surface, controller.engine, kMin, kMax, example.kind);
      if (!drawn.ok) consoleErrorSink(drawn.error);
      return;
    }
    const frame = controller.frame();
    if (frame) drawFrame(surface, frame, example.kind);
  }, [example.kind]);

  // A new signal gets a fresh engine/controller pair; the old one is stopped and dropped.
  useEffect(() => {
    const ctx = canvasRef.current?.getContext('2d');
    if (!ctx) return;

    const clock = clockRef.current ?? new FrameClock();
    clockRef.current = clock;

    const range = fitRangeToPoints(projectSignal(example.samples, example.kind), PLOT_PADDING);
    const surface = new CanvasSurface(
      ctx,
      MAIN_VIEWPORT,
      example.kind === 'CURVE' ? preserveAspect(range, MAIN_VIEWPORT) : range,
      COLORS.background
    );
    surfaceRef.current = surface;

    const built = SpectralEngine.create(example.samples);
    if (!built.ok) {
      consoleErrorSink(built.error);
      controllerRef.current = null;
      clock.bind(null);
      setEngine(null);
      return;
    }

    const [kMin, kMax] = bandRef.current;
    const controller = new PlaybackController(built.value, {
      kMin,
      kMax,
      closed: example.closed,
      clock,
      onFrame: (frame) => drawFrame(surface, frame, example.kind),
      onError: consoleErrorSink
    });
    controllerRef.current = controller;
    clock.bind(controller);
    setBandState(controller.band());
    setEngine(built.value);
    syncControls();
    redraw();

    return () => {
      controller.stop();
    };
  }, [example, redraw, syncControls]);

  useEffect(() => {
    const ctx = spectrumRef.current?.getContext('2d');
    if (!ctx || !engine) return;
    const spectrum = engine.centeredPowerSpectrum();
    const maxPower = spectrum.powers.reduce((acc, p) => Math.max(acc, p), 0);
    const maxK = engine.maxFrequency();
    const surface = new CanvasSurface(
      ctx,
      SPECTRUM_VIEWPORT,
      { xMin: -maxK - 1, xMax: maxK + 1, yMin: 0, yMax: maxPower > 0 ? maxPower * 1.1 : 1 },
      COLORS.background
    );
    drawSpectrum(surface, spectrum);
  }, [engine]);

  useEffect(() => () => clockRef.current?.stop(), []);

  const handleBandChange = useCallback(
    (kMin: number, kMax: number) => {
      const controller = controllerRef.current;
      if (!controller) return;
      const result = controller.setBand(kMin, kMax);
      if (!result.ok) {
        consoleErrorSink(result.error);
        return;
      }
      setBandState([kMin, kMax]);
      if (controller.getState() !== 'PLAYING') redraw();
    },
    [redraw]
  );

  const handleFitEnergy = useCallback(() => {
    if (engine) handleBandChange(0, pickBandForEnergy(engine, ENERGY_TARGET_PCT));
  }, [engine, handleBandChange]);

  const handleTogglePlay = useCallback(() => {
    controllerRef.current?.togglePlayPause();
    syncControls();
    redraw();
  }, [redraw, syncControls]);

  const handlePointerMove = useCallback((e: PointerEvent<HTMLCanvasElement>) => {
    const surface = surfaceRef.current;
    if (!surface) return;
    const rect = e.currentTarget.getBoundingClientRect();
    if (rect.width === 0 || rect.height === 0) return;
    setPointer(
      surface.toData({
        x: ((e.clientX - rect.left) * CANVAS_WIDTH) / rect.width,
        y: ((e.clientY - rect.top) * CANVAS_HEIGHT) / rect.height
      })
    );
  }, []);

  const handleStop = useCallback(() => {
    controllerRef.current?.stop();
    syncControls();
    redraw();
  }, [redraw, syncControls]);

  const handleFaster = useCallback(() => {
    controllerRef.current?.speedUp();
    syncControls();
  }, [syncControls]);

  const handleSlower = useCallback(() => {
    controllerRef.current?.slowDown();
    syncControls();
  }, [syncControls]);

  const metrics: BandMetrics | null = useMemo(
    () => (engine ? computeBandMetrics(engine, band[0], band[1]) : null),
    [engine, band]
  );

  return (
    <div className="epicycle-stage" data-example={example.id} data-state={playbackState}>
      <Toolbar
        examples={EXAMPLES}
        exampleId={example.id}
        onSelectExample={setExampleId}
        playbackState={playbackState}
        onTogglePlay={handleTogglePlay}
        onStop={handleStop}
        onFaster={handleFaster}
        onSlower={handleSlower}
        speed={speed}
        kMin={band[0]}
        kMax={band[1]}
        maxFrequency={engine?.maxFrequency() ?? 0}
        onBandChange={handleBandChange}
        onFitEnergy={handleFitEnergy}
        energyTarget={ENERGY_TARGET_PCT}
        showMath={showMath}
        setShowMath={setShowMath}
      />

      <canvas
        ref={canvasRef}
        width={CANVAS_WIDTH}
        height={CANVAS_HEIGHT}
        className="epicycle-canvas"
        onPointerMove={handlePointerMove}
        onPointerLeave={() => setPointer(null)}
      />
      <div className="font-mono text-xs text-slate-400" aria-live="polite">
        {pointer ? `x = ${pointer.x.toFixed(3)}, y = ${pointer.y.toFixed(3)}` : '\u00a0'}
      </div>
      <canvas ref={spectrumRef} width={CANVAS_WIDTH} height={SPECTRUM_HEIGHT} className="spectrum-canvas" />

      {showMath && engine && metrics && (
        <MathPanel size={engine.size()} kMin={band[0]} kMax={band[1]} metrics={metrics} />
      )}
    </div>
  );
};

export default App;
