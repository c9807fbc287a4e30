import { getDefaultPlanformParams } from './defaults.js';
import { InvalidInputError, TooManyArgumentsError, type PlanformInputIssue } from './errors.js';
import { makeCoordinateGrids, makeGaussianMask } from './grating.js';
import {
  PLANFORM_PARAM_KEYS,
  type PlanformInit,
  type PlanformLogger,
  type PlanformParamKey,
  type PlanformParams,
  type ResolvedPlanform,
} from './types.js';

export type PlanformResolverOptions = {
  /** Sink for default-assignment notices. Defaults to `console`. */
  logger?: PlanformLogger;
};

export type PlanformResolver = (...args: unknown[]) => ResolvedPlanform;

const isPlainRecord = (value: unknown): value is Record<string, unknown> => {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

const POSITIVE_KEYS: ReadonlySet<PlanformParamKey> = new Set(['gaussianSpaceConstant', 'grayScale']);

const checkField = (key: PlanformParamKey, value: unknown): string | null => {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return `expected a finite number (received ${String(value)})`;
  }
  if (key === 'imageSizePx' && (!Number.isInteger(value) || value < 1)) {
    return `expected a positive integer (received ${value})`;
  }
  if (POSITIVE_KEYS.has(key) && value <= 0) {
    return `expected a positive number (received ${value})`;
  }
  return null;
};

const readInit = (arg: unknown): PlanformInit => {
  if (arg === undefined) {
    return {};
  }
  if (!isPlainRecord(arg)) {
    throw new InvalidInputError('Planform input must be a structured record', [
      { field: '(root)', message: `received ${Array.isArray(arg) ? 'array' : typeof arg}` },
    ]);
  }
  const issues: PlanformInputIssue[] = [];
  const init: PlanformInit = {};
  for (const key of PLANFORM_PARAM_KEYS) {
    const value = arg[key];
    if (value === undefined || value === null) {
      continue;
    }
    const problem = checkField(key, value);
    if (problem) {
      issues.push({ field: key, message: problem });
    } else if (typeof value === 'number') {
      init[key] = value;
    }
  }
  if (issues.length > 0) {
    throw new InvalidInputError(
      `Invalid planform parameters: ${issues.map((issue) => issue.field).join(', ')}`,
      issues,
    );
  }
  return init;
};

const applyDefaults = (init: PlanformInit, logger: PlanformLogger): PlanformParams => {
  const defaults = getDefaultPlanformParams();
  const params = { ...defaults };
  for (const key of PLANFORM_PARAM_KEYS) {
    const supplied = init[key];
    if (supplied === undefined || supplied === null) {
      logger.info(`Assigning default value of ${key} = ${String(defaults[key])}`);
    } else {
      params[key] = supplied;
    }
  }
  return params;
};

/**
 * Builds a resolver that turns an optional partial planform record into a complete one.
 * Coordinate grids, `cyclesPerPixel` and the Gaussian mask are recomputed on every call.
 */
export const createPlanformResolver = (options: PlanformResolverOptions = {}): PlanformResolver => {
  const logger = options.logger ?? console;
  return (...args: unknown[]): ResolvedPlanform => {
    if (args.length > 1) {
      throw new TooManyArgumentsError(args.length);
    }
    const params = applyDefaults(readInit(args[0]), logger);
    const { x, y } = makeCoordinateGrids(params.imageSizePx);
    return {
      ...params,
      coordGridX: x,
      coordGridY: y,
      cyclesPerPixel: params.cyclesPerImage / params.imageSizePx,
      gaussianMask: makeGaussianMask(params.imageSizePx, params.gaussianSpaceConstant),
    };
  };
};

export const resolvePlanform: PlanformResolver = createPlanformResolver();
