export type ScalePoint = readonly [input: number, output: number];

export const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(max, value));

/**
 * Piecewise-linear interpolation through `points` (sorted by input). Inputs before the
 * first point or after the last take that point's output.
 */
export const interpolate = (value: number, points: readonly ScalePoint[]): number => {
  if (points.length === 0) throw new Error('interpolate requires at least one point');

  const [firstX, firstY] = points[0];
  if (value <= firstX) return firstY;

  for (let i = 1; i < points.length; i++) {
    const [x0, y0] = points[i - 1];
    const [x1, y1] = points[i];
    if (value <= x1) {
      if (x1 === x0) return y1;
      return y0 + ((value - x0) / (x1 - x0)) * (y1 - y0);
    }
  }

  return points[points.length - 1][1];
};

export const toUnitScore = (value: number, points: readonly ScalePoint[]): number =>
  clamp(interpolate(value, points), 0, 1);
