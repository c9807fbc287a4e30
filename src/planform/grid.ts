/**
 * Dense row-major 2D field of float64 samples. Row index is y, column index is x.
 */
export type Grid = {
  readonly width: number;
  readonly height: number;
  readonly data: Float64Array;
};

export type GridStats = {
  min: number;
  max: number;
  mean: number;
};

const assertDimensions = (width: number, height: number) => {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
    throw new RangeError(`Grid dimensions must be non-negative integers (received ${width}x${height})`);
  }
};

const assertSameShape = (a: Grid, b: Grid) => {
  if (a.width !== b.width || a.height !== b.height) {
    throw new RangeError(
      `Grid shape mismatch: ${a.width}x${a.height} vs ${b.width}x${b.height}`,
    );
  }
};

export const createGrid = (width: number, height: number, fill = 0): Grid => {
  assertDimensions(width, height);
  const data = new Float64Array(width * height);
  if (fill !== 0) {
    data.fill(fill);
  }
  return { width, height, data };
};

export const gridFromFunction = (
  width: number,
  height: number,
  sample: (row: number, col: number) => number,
): Grid => {
  const grid = createGrid(width, height);
  let index = 0;
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      grid.data[index++] = sample(row, col);
    }
  }
  return grid;
};

export const gridAt = (grid: Grid, row: number, col: number): number => {
  if (row < 0 || row >= grid.height || col < 0 || col >= grid.width) {
    throw new RangeError(`Grid index (${row}, ${col}) outside ${grid.width}x${grid.height}`);
  }
  return grid.data[row * grid.width + col];
};

export const mapGrid = (grid: Grid, fn: (value: number, index: number) => number): Grid => {
  const result = createGrid(grid.width, grid.height);
  const source = grid.data;
  for (let i = 0; i < source.length; i++) {
    result.data[i] = fn(source[i], i);
  }
  return result;
};

export const addGrids = (...grids: Grid[]): Grid => {
  const [first, ...rest] = grids;
  if (!first) {
    throw new RangeError('addGrids requires at least one grid');
  }
  rest.forEach((grid) => assertSameShape(first, grid));
  const result = createGrid(first.width, first.height);
  const out = result.data;
  out.set(first.data);
  for (const grid of rest) {
    const source = grid.data;
    for (let i = 0; i < out.length; i++) {
      out[i] += source[i];
    }
  }
  return result;
};

export const scaleGrid = (grid: Grid, factor: number): Grid =>
  mapGrid(grid, (value) => value * factor);

export const multiplyGrids = (a: Grid, b: Grid): Grid => {
  assertSameShape(a, b);
  const right = b.data;
  return mapGrid(a, (value, index) => value * right[index]);
};

export const cosGrid = (grid: Grid): Grid => mapGrid(grid, Math.cos);

export const gridToRows = (grid: Grid): number[][] => {
  const rows: number[][] = [];
  for (let row = 0; row < grid.height; row++) {
    const start = row * grid.width;
    rows.push(Array.from(grid.data.subarray(start, start + grid.width)));
  }
  return rows;
};

export const gridStats = (grid: Grid): GridStats => {
  const { data } = grid;
  if (data.length === 0) {
    return { min: 0, max: 0, mean: 0 };
  }
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  let sum = 0;
  for (let i = 0; i < data.length; i++) {
    const value = data[i];
    if (value < min) min = value;
    if (value > max) max = value;
    sum += value;
  }
  return { min, max, mean: sum / data.length };
};
