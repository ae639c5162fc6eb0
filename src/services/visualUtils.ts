const clamp01 = (v: number) => Math.min(1, Math.max(0, v));

export const normalizeMagnitude = (magnitude: number, maxMagnitude: number) => {
  if (!Number.isFinite(magnitude) || maxMagnitude <= 0) return 0;
  return clamp01(magnitude / maxMagnitude);
};

/** Larger vectors shift from green towards yellow and become more opaque. */
export const epicycleColor = (magnitude: number, maxMagnitude: number) => {
  const ratio = normalizeMagnitude(magnitude, maxMagnitude);
  const hue = 130 - (130 - 55) * ratio;
  const alpha = 0.45 + 0.5 * ratio;
  return `hsla(${hue.toFixed(1)}, 70%, 45%, ${alpha.toFixed(2)})`;
};
