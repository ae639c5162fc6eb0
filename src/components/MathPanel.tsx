import React, { useMemo, useState } from 'react';
import katex from 'katex';
import 'katex/dist/katex.min.css';
import { ChevronLeft, ChevronRight } from 'lucide-react';
import type { BandMetrics } from '../services/metrics';

interface MathPanelProps {
  size: number;
  kMin: number;
  kMax: number;
  metrics: BandMetrics;
}

type View = 'dft' | 'band' | 'component';

const VIEWS: View[] = ['dft', 'band', 'component'];

const TITLES: Record<View, string> = {
  dft: 'Analysis',
  band: 'Band reconstruction',
  component: 'One epicycle'
};

const MathPanel: React.FC<MathPanelProps> = ({ size, kMin, kMax, metrics }) => {
  const [view, setView] = useState<View>('dft');

  const html = useMemo(() => {
    const opts = { throwOnError: false, displayMode: true };
    const equations: Record<View, string> = {
      dft: `X_k = \\frac{1}{N} \\sum_{n=0}^{N-1} x_n\\, e^{-i 2\\pi k n / N}, \\quad N = ${size}`,
      band: `\\hat{x}_n = \\sum_{k=${kMin}}^{${kMax}} \\left( X_k\\, e^{i 2\\pi k n / N} + [k>0]\\, X_{N-k}\\, e^{i 2\\pi (N-k) n / N} \\right)`,
      component: `v_k(t) = X_k\\, e^{i 2\\pi k t / ${size}}`
    };
    return katex.renderToString(equations[view], opts);
  }, [view, size, kMin, kMax]);

  const stats = useMemo(
    () =>
      katex.renderToString(
        `\\text{energy} = ${metrics.energyPct.toFixed(2)}\\%,\\quad \\text{RMS} = ${metrics.rmsError.toFixed(4)},\\quad ${metrics.epicycles}\\ \\text{vectors}`,
        { throwOnError: false }
      ),
    [metrics]
  );

  const cycle = (delta: number) => {
    const idx = VIEWS.indexOf(view);
    setView(VIEWS[(idx + delta + VIEWS.length) % VIEWS.length]);
  };

  return (
    <aside className="math-panel p-4 space-y-2">
      <header className="flex items-center justify-between">
        <button type="button" onClick={() => cycle(-1)} aria-label="Previous formula">
          <ChevronLeft size={16} />
        </button>
        <h2 className="text-sm font-semibold">{TITLES[view]}</h2>
        <button type="button" onClick={() => cycle(1)} aria-label="Next formula">
          <ChevronRight size={16} />
        </button>
      </header>
      <div dangerouslySetInnerHTML={{ __html: html }} />
      <div className="text-xs" dangerouslySetInnerHTML={{ __html: stats }} />
    </aside>
  );
};

export default MathPanel;
