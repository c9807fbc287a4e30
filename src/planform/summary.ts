import { hashBytes, hashCanonicalJson } from '../serialization/canonicalJson.js';
import { gridStats, type Grid } from './grid.js';
import type { Planform, PlanformParams } from './types.js';

export type PlanformImageSummary = {
  width: number;
  height: number;
  min: number;
  max: number;
  mean: number;
  /** BLAKE3 hex digest of the little-endian float64 pixels. */
  hash: string;
};

export type PlanformSummary = {
  params: PlanformParams;
  cyclesPerPixel: number;
  images: Record<string, PlanformImageSummary>;
};

export type PlanformSummaryResult = {
  summary: PlanformSummary;
  json: string;
  digest: string;
};

const gridBytes = (grid: Grid): Uint8Array => {
  const bytes = new Uint8Array(grid.data.length * Float64Array.BYTES_PER_ELEMENT);
  const view = new DataView(bytes.buffer);
  grid.data.forEach((value, index) => {
    view.setFloat64(index * Float64Array.BYTES_PER_ELEMENT, value, true);
  });
  return bytes;
};

export const hashGrid = (grid: Grid): string => hashBytes(gridBytes(grid));

const pickParams = (planform: Planform): PlanformParams => ({
  imageSizePx: planform.imageSizePx,
  cyclesPerImage: planform.cyclesPerImage,
  gaussianSpaceConstant: planform.gaussianSpaceConstant,
  grayScale: planform.grayScale,
  amplitude: planform.amplitude,
  baseAngleOffset: planform.baseAngleOffset,
  latticeAngle: planform.latticeAngle,
  phaseOffset: planform.phaseOffset,
  componentCount: planform.componentCount,
});

export const summarizePlanform = (
  planform: Planform,
  options: { indent?: number } = {},
): PlanformSummaryResult => {
  const images: Record<string, PlanformImageSummary> = {};
  for (const [name, grid] of Object.entries(planform.images)) {
    images[name] = {
      width: grid.width,
      height: grid.height,
      ...gridStats(grid),
      hash: hashGrid(grid),
    };
  }
  const summary: PlanformSummary = {
    params: pickParams(planform),
    cyclesPerPixel: planform.cyclesPerPixel,
    images,
  };
  const { json, hash } = hashCanonicalJson(summary, options);
  return { summary, json, digest: hash };
};
