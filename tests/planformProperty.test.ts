import test from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';

import { generatePlanform } from '../src/planform/generate.js';
import { createPlanformResolver } from '../src/planform/resolve.js';

const resolve = createPlanformResolver({ logger: { info: () => {} } });

const finite = (min: number, max: number) =>
  fc.double({ min, max, noNaN: true, noDefaultInfinity: true });

const planformInitArb = fc.record({
  imageSizePx: fc.integer({ min: 1, max: 12 }),
  cyclesPerImage: finite(0.1, 40),
  gaussianSpaceConstant: finite(0.5, 100),
  grayScale: finite(0.5, 1000),
  amplitude: finite(-1, 1),
  baseAngleOffset: finite(-10, 10),
  latticeAngle: finite(-10, 10),
  phaseOffset: finite(-10, 10),
  componentCount: fc.constantFrom(4, 6),
});

test('every output pixel lies within [0, grayScale]', () => {
  fc.assert(
    fc.property(planformInitArb, (init) => {
      const images = generatePlanform(resolve(init));
      for (const grid of Object.values(images)) {
        assert.equal(grid.width, init.imageSizePx);
        assert.equal(grid.height, init.imageSizePx);
        for (const value of grid.data) {
          assert.ok(
            value >= 0 && value <= init.grayScale,
            `pixel ${value} outside [0, ${init.grayScale}]`,
          );
        }
      }
    }),
    { numRuns: 150 },
  );
});

test('generation is a pure function of the input record', () => {
  fc.assert(
    fc.property(planformInitArb, (init) => {
      const first = generatePlanform(resolve(init));
      const second = generatePlanform(resolve({ ...init }));
      assert.deepStrictEqual(second, first);
    }),
    { numRuns: 50 },
  );
});

test('the gaussian mask stays within (0, 1] and resolution is stable', () => {
  fc.assert(
    fc.property(planformInitArb, (init) => {
      const first = resolve(init);
      const second = resolve(first);
      assert.deepStrictEqual(second.gaussianMask, first.gaussianMask);
      assert.deepStrictEqual(second.coordGridX, first.coordGridX);
      assert.deepStrictEqual(second.coordGridY, first.coordGridY);
      assert.equal(second.cyclesPerPixel, first.cyclesPerPixel);
      for (const value of first.gaussianMask.data) {
        assert.ok(value > 0 && value <= 1);
      }
    }),
    { numRuns: 100 },
  );
});
