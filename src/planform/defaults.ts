import { InvalidInputError } from './errors.js';
import type { PlanformInit, PlanformParams } from './types.js';

const DEFAULT_IMAGE_SIZE_PX = 600;

const INTERNAL_DEFAULT_PLANFORM_PARAMS: PlanformParams = {
  imageSizePx: DEFAULT_IMAGE_SIZE_PX,
  cyclesPerImage: 12,
  // Three default image widths; fixed, it does not follow a caller-supplied imageSizePx.
  gaussianSpaceConstant: 3 * DEFAULT_IMAGE_SIZE_PX,
  grayScale: 255,
  amplitude: 1,
  baseAngleOffset: 0,
  // 3:1 lattice
  latticeAngle: Math.atan2(1, 3),
  // 0 = square, pi = super-square
  phaseOffset: 0,
  componentCount: 4,
};

export const PLANFORM_DEFAULTS: Readonly<PlanformParams> = Object.freeze({
  ...INTERNAL_DEFAULT_PLANFORM_PARAMS,
});

export const getDefaultPlanformParams = (): PlanformParams => ({
  ...INTERNAL_DEFAULT_PLANFORM_PARAMS,
});

const PLANFORM_PRESETS_INTERNAL = {
  square: { componentCount: 4, phaseOffset: 0 },
  'super-square': { componentCount: 4, phaseOffset: Math.PI },
  hexagonal: { componentCount: 6 },
} satisfies Record<string, PlanformInit>;

export type PlanformPresetName = keyof typeof PLANFORM_PRESETS_INTERNAL;

export const PLANFORM_PRESET_NAMES = Object.keys(
  PLANFORM_PRESETS_INTERNAL,
) as PlanformPresetName[];

export const isPlanformPresetName = (name: string): name is PlanformPresetName =>
  Object.prototype.hasOwnProperty.call(PLANFORM_PRESETS_INTERNAL, name);

export const getPlanformPreset = (name: string): PlanformInit => {
  if (!isPlanformPresetName(name)) {
    throw new InvalidInputError(`Unknown planform preset "${name}"`, [
      {
        field: 'preset',
        message: `expected one of ${PLANFORM_PRESET_NAMES.join(', ')}`,
      },
    ]);
  }
  const preset: PlanformInit = PLANFORM_PRESETS_INTERNAL[name];
  return { ...preset };
};
