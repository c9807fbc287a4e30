import { UnsupportedTopologyError } from './errors.js';
import { grating } from './grating.js';
import { addGrids, mapGrid, multiplyGrids, type Grid } from './grid.js';
import { resolvePlanform } from './resolve.js';
import {
  COMPONENT_COUNTS,
  type ComponentCount,
  type HexagonalPlanformImages,
  type LatticeComponent,
  type Planform,
  type PlanformImages,
  type PlanformInit,
  type ResolvedPlanform,
  type SquarePlanformImages,
} from './types.js';

type LatticeTopology = {
  /** Angle between the axes of consecutive pairs. */
  pairAngle: number;
  /** Per-component axis, in units of pairAngle. */
  axes: readonly number[];
  /** Sign applied to latticeAngle for each component. */
  offsetSigns: readonly (1 | -1)[];
  /** Whether phaseOffset applies to each component. */
  phased: readonly boolean[];
};

const LATTICE_TOPOLOGIES: Record<ComponentCount, LatticeTopology> = {
  // C1/C2 and C3/C4 are orthogonal pairs rotated by +θ and -θ.
  4: {
    pairAngle: Math.PI / 2,
    axes: [0, 1, 1, 0],
    offsetSigns: [1, 1, -1, -1],
    phased: [false, false, true, true],
  },
  // Three pair axes 2π/3 apart; phaseOffset has no defined meaning here and is not applied.
  6: {
    pairAngle: (2 * Math.PI) / 3,
    axes: [0, 1, 1, 0, 2, 2],
    offsetSigns: [1, 1, -1, -1, 1, -1],
    phased: [false, false, false, false, false, false],
  },
};

export const isComponentCount = (value: number): value is ComponentCount =>
  COMPONENT_COUNTS.some((count) => count === value);

const requireTopology = (componentCount: number): LatticeTopology => {
  if (!isComponentCount(componentCount)) {
    throw new UnsupportedTopologyError(componentCount);
  }
  return LATTICE_TOPOLOGIES[componentCount];
};

/** Orientation and phase of every grating in the planform's lattice. */
export const latticeComponents = (
  planform: Pick<
    ResolvedPlanform,
    'componentCount' | 'baseAngleOffset' | 'latticeAngle' | 'phaseOffset'
  >,
): LatticeComponent[] => {
  const topology = requireTopology(planform.componentCount);
  return topology.axes.map((axis, index) => ({
    label: `C${index + 1}`,
    angle:
      planform.baseAngleOffset +
      axis * topology.pairAngle +
      topology.offsetSigns[index] * planform.latticeAngle,
    phase: topology.phased[index] ? planform.phaseOffset : 0,
  }));
};

/** Maps a signal in [-1, 1] onto [0, grayScale]. */
export const normalizeToGray = (raw: Grid, grayScale: number): Grid => {
  const half = grayScale / 2;
  return mapGrid(raw, (value) => value * half + half);
};

/**
 * Synthesizes the lattice gratings and composes them into the named images.
 *
 * For 6-component lattices the images stored under `C5` and `C6` are built from the C3
 * and C4 gratings; the true C5 and C6 only contribute to `P56` and `P123456`.
 */
export const generatePlanform = (planform: ResolvedPlanform): PlanformImages => {
  const components = latticeComponents(planform);
  const { coordGridX, coordGridY, amplitude, cyclesPerPixel, gaussianMask, grayScale } = planform;

  const gratings = components.map((component) =>
    grating(coordGridX, coordGridY, amplitude, component.phase, component.angle, cyclesPerPixel),
  );
  const windowed = (raw: Grid) => normalizeToGray(multiplyGrids(raw, gaussianMask), grayScale);
  const mean = (...grids: Grid[]) => {
    const count = grids.length;
    return mapGrid(addGrids(...grids), (value) => value / count);
  };

  const [c1, c2, c3, c4] = gratings;
  const common = {
    C1: windowed(c1),
    C2: windowed(c2),
    C3: windowed(c3),
    C4: windowed(c4),
    P12: windowed(mean(c1, c2)),
    P34: windowed(mean(c3, c4)),
  };

  if (gratings.length === 4) {
    const images: SquarePlanformImages = {
      ...common,
      P1234: windowed(mean(c1, c2, c3, c4)),
    };
    return images;
  }

  const [, , , , c5, c6] = gratings;
  const images: HexagonalPlanformImages = {
    ...common,
    C5: windowed(c3),
    C6: windowed(c4),
    P56: windowed(mean(c5, c6)),
    P123456: windowed(mean(c1, c2, c3, c4, c5, c6)),
  };
  return images;
};

/** Resolves an optional partial record and attaches the generated images. */
export const makePlanform = (init?: PlanformInit): Planform => {
  const resolved = resolvePlanform(init);
  return { ...resolved, images: generatePlanform(resolved) };
};
