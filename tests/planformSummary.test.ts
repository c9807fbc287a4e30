import test from 'node:test';
import assert from 'node:assert/strict';

import { generatePlanform } from '../src/planform/generate.js';
import { gridFromFunction } from '../src/planform/grid.js';
import { createPlanformResolver } from '../src/planform/resolve.js';
import { hashGrid, summarizePlanform } from '../src/planform/summary.js';
import type { Planform, PlanformInit } from '../src/planform/types.js';

const resolve = createPlanformResolver({ logger: { info: () => {} } });

const build = (init: PlanformInit): Planform => {
  const resolved = resolve(init);
  return { ...resolved, images: generatePlanform(resolved) };
};

const INIT: PlanformInit = {
  imageSizePx: 12,
  cyclesPerImage: 2,
  gaussianSpaceConstant: 8,
  grayScale: 255,
  amplitude: 1,
  baseAngleOffset: 0,
  latticeAngle: Math.atan2(1, 3),
  phaseOffset: 0,
  componentCount: 6,
};

test('summary lists parameters and per-image statistics', () => {
  const planform = build(INIT);
  const { summary } = summarizePlanform(planform);
  assert.deepEqual(summary.params, INIT);
  assert.equal(summary.cyclesPerPixel, 2 / 12);
  assert.deepEqual(Object.keys(summary.images).sort(), Object.keys(planform.images).sort());
  const p56 = summary.images.P56;
  assert.equal(p56.width, 12);
  assert.equal(p56.height, 12);
  assert.ok(p56.min >= 0 && p56.max <= 255 && p56.min <= p56.mean && p56.mean <= p56.max);
  assert.match(p56.hash, /^[0-9a-f]{64}$/);
});

test('summary digests are stable and track parameter changes', () => {
  const first = summarizePlanform(build(INIT));
  const second = summarizePlanform(build({ ...INIT }));
  assert.equal(second.digest, first.digest);
  assert.equal(second.json, first.json);
  const rotated = summarizePlanform(build({ ...INIT, baseAngleOffset: 0.5 }));
  assert.notEqual(rotated.digest, first.digest);
});

test('the hexagonal C5 image hash matches C3', () => {
  const { summary } = summarizePlanform(build(INIT));
  assert.equal(summary.images.C5.hash, summary.images.C3.hash);
  assert.notEqual(summary.images.P56.hash, summary.images.P34.hash);
});

test('hashGrid distinguishes pixel values and layout', () => {
  const a = gridFromFunction(2, 3, (row, col) => row + col);
  const b = gridFromFunction(2, 3, (row, col) => row + col);
  const transposed = gridFromFunction(3, 2, (row, col) => row + col);
  const shifted = gridFromFunction(2, 3, (row, col) => row + col + 1e-12);
  assert.equal(hashGrid(a), hashGrid(b));
  assert.notEqual(hashGrid(a), hashGrid(shifted));
  assert.equal(hashGrid(a).length, 64);
  assert.notEqual(hashGrid(a), hashGrid(transposed));
});
