import {
  unsupportedKind,
  type Axis,
  type Operation,
  type PathPoint,
  type Point,
  type ProfileOptions,
} from '@toolpath/shared';

/**
 * How a group of drill points was laid out. Subroutine output relies on it to
 * step between holes with relative moves.
 */
export type DrillLayout =
  | { kind: 'points' }
  | { kind: 'linear'; axis: Axis; spacing: number; count: number }
  | { kind: 'grid'; xSpacing: number; ySpacing: number; xCount: number; yCount: number };

interface Source {
  operationIndex: number;
  operationId: string;
}

export interface DrillGroup extends Source {
  layout: DrillLayout;
  points: Point[];
}

export interface CircleInstance extends Source, ProfileOptions {
  center: Point;
  diameter: number;
}

export interface HexagonInstance extends Source, ProfileOptions {
  center: Point;
  flatToFlat: number;
}

export interface LineInstance extends Source, ProfileOptions {
  points: PathPoint[];
}

export interface ExpandedOperations {
  drills: DrillGroup[];
  circles: CircleInstance[];
  hexagons: HexagonInstance[];
  lines: LineInstance[];
}

/**
 * Points of a linear pattern.
 * @returns `count` points; empty for count ≤ 0.
 */
export const expandLinear = (start: Point, axis: Axis, spacing: number, count: number): Point[] => {
  const points: Point[] = [];
  for (let i = 0; i < count; i++) {
    points.push(
      axis === 'x'
        ? { x: start.x + i * spacing, y: start.y }
        : { x: start.x, y: start.y + i * spacing },
    );
  }
  return points;
};

/**
 * Points of a grid pattern in row-major order. The order is the machining
 * sequence.
 */
export const expandGrid = (
  start: Point,
  xSpacing: number,
  ySpacing: number,
  xCount: number,
  yCount: number,
): Point[] => {
  const points: Point[] = [];
  for (let row = 0; row < yCount; row++) {
    for (let col = 0; col < xCount; col++) {
      points.push({ x: start.x + col * xSpacing, y: start.y + row * ySpacing });
    }
  }
  return points;
};

const profileOf = (operation: ProfileOptions): ProfileOptions => ({
  compensation: operation.compensation,
  leadIn: operation.leadIn,
  holdTime: operation.holdTime,
});

/**
 * Expands every operation into concrete instances, grouped by shape and kept
 * in input order within each group.
 */
export const expandOperations = (operations: readonly Operation[]): ExpandedOperations => {
  const expanded: ExpandedOperations = { drills: [], circles: [], hexagons: [], lines: [] };

  operations.forEach((operation, operationIndex) => {
    const source: Source = { operationIndex, operationId: operation.id };
    switch (operation.kind) {
      case 'drill-single':
        expanded.drills.push({
          ...source,
          layout: { kind: 'points' },
          points: [{ x: operation.x, y: operation.y }],
        });
        break;
      case 'drill-linear':
        expanded.drills.push({
          ...source,
          layout: {
            kind: 'linear',
            axis: operation.axis,
            spacing: operation.spacing,
            count: operation.count,
          },
          points: expandLinear(operation.start, operation.axis, operation.spacing, operation.count),
        });
        break;
      case 'drill-grid':
        expanded.drills.push({
          ...source,
          layout: {
            kind: 'grid',
            xSpacing: operation.xSpacing,
            ySpacing: operation.ySpacing,
            xCount: operation.xCount,
            yCount: operation.yCount,
          },
          points: expandGrid(
            operation.start,
            operation.xSpacing,
            operation.ySpacing,
            operation.xCount,
            operation.yCount,
          ),
        });
        break;
      case 'circle-single':
        expanded.circles.push({
          ...source,
          ...profileOf(operation),
          center: { ...operation.center },
          diameter: operation.diameter,
        });
        break;
      case 'circle-linear':
        for (const center of expandLinear(operation.start, operation.axis, operation.spacing, operation.count)) {
          expanded.circles.push({ ...source, ...profileOf(operation), center, diameter: operation.diameter });
        }
        break;
      case 'hexagon-single':
        expanded.hexagons.push({
          ...source,
          ...profileOf(operation),
          center: { ...operation.center },
          flatToFlat: operation.flatToFlat,
        });
        break;
      case 'hexagon-linear':
        for (const center of expandLinear(operation.start, operation.axis, operation.spacing, operation.count)) {
          expanded.hexagons.push({ ...source, ...profileOf(operation), center, flatToFlat: operation.flatToFlat });
        }
        break;
      case 'line-path':
        expanded.lines.push({ ...source, ...profileOf(operation), points: operation.points.map((p) => ({ ...p })) });
        break;
      default:
        unsupportedKind(operation, 'operation');
    }
  });

  return expanded;
};
