import type { Grid } from './grid.js';

export const PLANFORM_PARAM_KEYS = [
  'imageSizePx',
  'cyclesPerImage',
  'gaussianSpaceConstant',
  'grayScale',
  'amplitude',
  'baseAngleOffset',
  'latticeAngle',
  'phaseOffset',
  'componentCount',
] as const;
export type PlanformParamKey = (typeof PLANFORM_PARAM_KEYS)[number];

/**
 * Caller-facing planform parameters. Angles and phases are in radians.
 *  - imageSizePx: side length of the square output grid
 *  - cyclesPerImage: full sine cycles spanning the image width
 *  - gaussianSpaceConstant: envelope width in pixels
 *  - grayScale: output intensity ceiling
 *  - amplitude: grating peak deviation before gray mapping
 *  - baseAngleOffset: rotation applied to every component
 *  - latticeAngle: half-angle splitting each pair of grating directions
 *  - phaseOffset: phase of the second pair (4-component lattices only)
 *  - componentCount: lattice topology, 4 or 6
 */
export type PlanformParams = {
  imageSizePx: number;
  cyclesPerImage: number;
  gaussianSpaceConstant: number;
  grayScale: number;
  amplitude: number;
  baseAngleOffset: number;
  latticeAngle: number;
  phaseOffset: number;
  componentCount: number;
};

/** Partial planform record; absent, `undefined` and `null` fields are defaulted. */
export type PlanformInit = {
  [K in PlanformParamKey]?: PlanformParams[K] | null;
};

export type ResolvedPlanform = PlanformParams & {
  readonly coordGridX: Grid;
  readonly coordGridY: Grid;
  readonly cyclesPerPixel: number;
  readonly gaussianMask: Grid;
};

export const COMPONENT_COUNTS = [4, 6] as const;
export type ComponentCount = (typeof COMPONENT_COUNTS)[number];

export type SquareImageName = 'C1' | 'C2' | 'C3' | 'C4' | 'P12' | 'P34' | 'P1234';
export type HexagonalImageName =
  | 'C1'
  | 'C2'
  | 'C3'
  | 'C4'
  | 'C5'
  | 'C6'
  | 'P12'
  | 'P34'
  | 'P56'
  | 'P123456';

export type SquarePlanformImages = Record<SquareImageName, Grid>;
export type HexagonalPlanformImages = Record<HexagonalImageName, Grid>;
export type PlanformImages = SquarePlanformImages | HexagonalPlanformImages;

export type Planform = ResolvedPlanform & {
  readonly images: PlanformImages;
};

export type LatticeComponent = {
  /** Component label, C1..C6. */
  readonly label: string;
  /** Absolute orientation: baseAngleOffset + axis + offset. */
  readonly angle: number;
  readonly phase: number;
};

export type PlanformLogger = {
  info(message: string): void;
};
