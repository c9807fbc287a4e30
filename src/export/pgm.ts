import type { Grid } from '../planform/grid.js';

const PGM_MAXVAL = 255;

/** Quantizes a [0, grayScale] image to one byte per pixel. */
export const quantizeToBytes = (grid: Grid, grayScale: number): Uint8Array => {
  if (!(grayScale > 0)) {
    throw new RangeError(`grayScale must be positive (received ${grayScale})`);
  }
  const bytes = new Uint8Array(grid.data.length);
  for (let i = 0; i < bytes.length; i++) {
    const unit = Math.min(1, Math.max(0, grid.data[i] / grayScale));
    bytes[i] = Math.round(unit * PGM_MAXVAL);
  }
  return bytes;
};

/** Binary (P5) 8-bit PGM, rows top to bottom. */
export const encodePgm = (grid: Grid, grayScale: number): Buffer => {
  const header = Buffer.from(`P5\n${grid.width} ${grid.height}\n${PGM_MAXVAL}\n`, 'ascii');
  return Buffer.concat([header, quantizeToBytes(grid, grayScale)]);
};
