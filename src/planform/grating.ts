import { createGrid, gridFromFunction, type Grid } from './grid.js';

const TAU = Math.PI * 2;

/**
 * Evenly spaced samples over [start, end]. A single sample sits at the midpoint so a
 * one-pixel axis stays centered.
 */
export const linspace = (start: number, end: number, count: number): Float64Array => {
  const samples = new Float64Array(Math.max(0, Math.floor(count)));
  if (samples.length === 1) {
    samples[0] = (start + end) / 2;
    return samples;
  }
  const step = (end - start) / (samples.length - 1);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = start + step * i;
  }
  if (samples.length > 1) {
    samples[samples.length - 1] = end;
  }
  return samples;
};

/** Pixel coordinate grids anchored at the top-left corner: x = column, y = row. */
export const makeCoordinateGrids = (size: number): { x: Grid; y: Grid } => ({
  x: gridFromFunction(size, size, (_row, col) => col),
  y: gridFromFunction(size, size, (row) => row),
});

/**
 * Isotropic Gaussian envelope centered on the image. Uses its own centered axis spanning
 * [-size/2, size/2], not the pixel coordinate grids.
 */
export const makeGaussianMask = (imageSizePx: number, gaussianSpaceConstant: number): Grid => {
  const axis = linspace(-imageSizePx / 2, imageSizePx / 2, imageSizePx);
  const denominator = gaussianSpaceConstant * gaussianSpaceConstant;
  return gridFromFunction(imageSizePx, imageSizePx, (row, col) => {
    const x = axis[col];
    const y = axis[row];
    return Math.exp(-(x * x + y * y) / denominator);
  });
};

/**
 * Plane sine-wave grating `amplitude * cos(a*x + b*y + phase)` with
 * `(a, b) = 2π·cyclesPerPixel·(cos angle, sin angle)`.
 */
export const grating = (
  coordX: Grid,
  coordY: Grid,
  amplitude: number,
  phase: number,
  angle: number,
  cyclesPerPixel: number,
): Grid => {
  if (coordX.width !== coordY.width || coordX.height !== coordY.height) {
    throw new RangeError('Grating coordinate grids must share a shape');
  }
  const f = cyclesPerPixel * TAU;
  const a = Math.cos(angle) * f;
  const b = Math.sin(angle) * f;
  const result = createGrid(coordX.width, coordX.height);
  const xs = coordX.data;
  const ys = coordY.data;
  const out = result.data;
  for (let i = 0; i < out.length; i++) {
    out[i] = amplitude * Math.cos(a * xs[i] + b * ys[i] + phase);
  }
  return result;
};
