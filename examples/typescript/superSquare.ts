/**
 * Builds a square planform and its super-square counterpart and compares the images.
 *
 *   npx tsx examples/typescript/superSquare.ts
 */

import { gridStats, makePlanform, summarizePlanform } from '../../src/index.js';

const square = makePlanform({ imageSizePx: 256 });
const superSquare = makePlanform({ imageSizePx: 256, phaseOffset: Math.PI });

for (const planform of [square, superSquare]) {
  const { digest } = summarizePlanform(planform);
  const stats = gridStats(planform.images.C1);
  console.log(
    `phase ${planform.phaseOffset.toFixed(3)}: digest ${digest.slice(0, 16)} C1 mean ${stats.mean.toFixed(3)}`,
  );
}
