import React, { type ChangeEvent } from 'react';
import { Calculator, ChevronsLeft, ChevronsRight, Pause, Play, Square, Target } from 'lucide-react';
import type { ExampleSignal, PlaybackState } from '../types';

interface ToolbarProps {
  examples: readonly ExampleSignal[];
  exampleId: string;
  onSelectExample: (id: string) => void;
  playbackState: PlaybackState;
  onTogglePlay: () => void;
  onStop: () => void;
  onFaster: () => void;
  onSlower: () => void;
  speed: number;
  kMin: number;
  kMax: number;
  maxFrequency: number;
  onBandChange: (kMin: number, kMax: number) => void;
  onFitEnergy: () => void;
  energyTarget: number;
  showMath: boolean;
  setShowMath: (s: boolean) => void;
}

const parseIndex = (e: ChangeEvent<HTMLInputElement>) => {
  const value = parseInt(e.target.value, 10);
  return Number.isNaN(value) ? 0 : value;
};

const Toolbar: React.FC<ToolbarProps> = ({
  examples,
  exampleId,
  onSelectExample,
  playbackState,
  onTogglePlay,
  onStop,
  onFaster,
  onSlower,
  speed,
  kMin,
  kMax,
  maxFrequency,
  onBandChange,
  onFitEnergy,
  energyTarget,
  showMath,
  setShowMath
}) => {
  const isPlaying = playbackState === 'PLAYING';

  return (
    <div className="epicycle-toolbar flex flex-wrap items-center gap-3 p-3">
      <div className="flex gap-1" role="group" aria-label="Examples">
        {examples.map((ex) => (
          <button
            key={ex.id}
            type="button"
            className={`example-btn ${ex.id === exampleId ? 'active' : ''}`}
            onClick={() => onSelectExample(ex.id)}
          >
            {ex.name}
          </button>
        ))}
      </div>

      <div className="flex items-center gap-1">
        <button type="button" onClick={onSlower} title="Slower" aria-label="Slower">
          <ChevronsLeft size={18} />
        </button>
        <button type="button" onClick={onTogglePlay} title={isPlaying ? 'Pause' : 'Play'} aria-label="Play or pause">
          {isPlaying ? <Pause size={18} /> : <Play size={18} />}
        </button>
        <button type="button" onClick={onStop} title="Stop" aria-label="Stop" disabled={playbackState === 'STOPPED'}>
          <Square size={18} />
        </button>
        <button type="button" onClick={onFaster} title="Faster" aria-label="Faster">
          <ChevronsRight size={18} />
        </button>
        <span className="font-mono text-xs text-slate-300">{speed.toFixed(1)} samples/s</span>
      </div>

      <label className="flex items-center gap-1 text-sm">
        k<sub>min</sub>
        <input
          type="number"
          min={0}
          max={kMax}
          value={kMin}
          onChange={(e) => onBandChange(parseIndex(e), kMax)}
          className="w-16"
        />
      </label>
      <label className="flex items-center gap-1 text-sm">
        k<sub>max</sub>
        <input
          type="number"
          min={kMin}
          max={maxFrequency}
          value={kMax}
          onChange={(e) => onBandChange(kMin, parseIndex(e))}
          className="w-16"
        />
      </label>

      <button
        type="button"
        onClick={onFitEnergy}
        title={`Smallest band holding ${energyTarget}% of the energy`}
        aria-label="Fit band to energy"
      >
        <Target size={18} />
      </button>

      <button
        type="button"
        onClick={() => setShowMath(!showMath)}
        className={showMath ? 'active' : ''}
        title="Show the math"
        aria-label="Toggle math panel"
      >
        <Calculator size={18} />
      </button>
    </div>
  );
};

export default Toolbar;
