import test from 'node:test';
import assert from 'node:assert/strict';

import { grating, linspace, makeCoordinateGrids, makeGaussianMask } from '../src/planform/grating.js';
import { createGrid, gridAt, gridFromFunction } from '../src/planform/grid.js';

const assertClose = (actual: number, expected: number, tolerance = 1e-12) => {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `expected ${actual} to be within ${tolerance} of ${expected}`,
  );
};

test('linspace spans both ends and centers a single sample', () => {
  assert.deepEqual(Array.from(linspace(-2, 2, 5)), [-2, -1, 0, 1, 2]);
  assert.deepEqual(Array.from(linspace(0, 1, 1)), [0.5]);
  assert.deepEqual(Array.from(linspace(-0.5, 0.5, 1)), [0]);
  assert.equal(linspace(0, 1, 0).length, 0);
  const uneven = linspace(-3, 3, 7);
  assert.equal(uneven[0], -3);
  assert.equal(uneven[6], 3);
});

test('coordinate grids are anchored at the top-left pixel', () => {
  const { x, y } = makeCoordinateGrids(2);
  assert.deepEqual(Array.from(x.data), [0, 1, 0, 1]);
  assert.deepEqual(Array.from(y.data), [0, 0, 1, 1]);
});

test('a horizontal grating advances along x only', () => {
  const x = gridFromFunction(4, 2, (_row, col) => col);
  const y = gridFromFunction(4, 2, (row) => row);
  // a quarter cycle per pixel
  const result = grating(x, y, 2, 0, 0, 0.25);
  const expected = [2, 0, -2, 0];
  for (let row = 0; row < 2; row++) {
    expected.forEach((value, col) => assertClose(gridAt(result, row, col), value));
  }
});

test('a vertical grating advances along y only', () => {
  const x = gridFromFunction(2, 3, (_row, col) => col);
  const y = gridFromFunction(2, 3, (row) => row);
  const result = grating(x, y, 1, 0, Math.PI / 2, 0.5);
  assertClose(gridAt(result, 0, 0), 1);
  assertClose(gridAt(result, 0, 1), 1, 1e-9);
  assertClose(gridAt(result, 1, 0), -1);
  assertClose(gridAt(result, 2, 1), 1, 1e-9);
});

test('phase shifts the grating at the origin', () => {
  const zero = createGrid(1, 1);
  assert.equal(grating(zero, zero, 0.75, Math.PI, 1.1, 0.3).data[0], -0.75);
  assert.equal(grating(zero, zero, 0.75, 0, 1.1, 0.3).data[0], 0.75);
});

test('grating rejects coordinate grids of different shapes', () => {
  assert.throws(() => grating(createGrid(2, 2), createGrid(3, 2), 1, 0, 0, 0.1), RangeError);
});

test('gaussian mask peaks at the image center and is radially symmetric', () => {
  const mask = makeGaussianMask(5, 2);
  assert.equal(gridAt(mask, 2, 2), 1);
  const corner = Math.exp(-(6.25 + 6.25) / 4);
  assert.equal(gridAt(mask, 0, 0), corner);
  assert.equal(gridAt(mask, 4, 4), corner);
  assert.equal(gridAt(mask, 0, 4), corner);
  assert.equal(gridAt(mask, 2, 0), Math.exp(-6.25 / 4));
  assert.equal(gridAt(mask, 1, 2), gridAt(mask, 2, 1));
  for (const value of mask.data) {
    assert.ok(value > 0 && value <= 1);
  }
});

test('a wide envelope leaves the image almost unattenuated', () => {
  const mask = makeGaussianMask(600, 1800);
  // corner distance^2 = 2 * 300^2
  assertClose(gridAt(mask, 0, 0), Math.exp(-(180000 / 3240000)), 1e-12);
  assert.ok(gridAt(mask, 0, 0) > 0.94);
});
