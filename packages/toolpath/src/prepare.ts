import {
  compensateLinePath,
  compensatedHexagonVertices,
  cutRadius,
  expandOperations,
  filterTubeVoids,
  hexagonVertices,
  isClosedPath,
  type CircleInstance,
  type DrillGroup,
  type HexagonInstance,
  type LineInstance,
} from '@toolpath/geometry';
import { InvalidGeometryError, type Material, type Operation, type PathPoint, type Point } from '@toolpath/shared';

export interface PreparedCircle extends CircleInstance {
  /** Radius the tool center follows. */
  cutRadius: number;
}

export interface PreparedHexagon extends HexagonInstance {
  /** Nominal vertices, vertex 0 at the top. */
  vertices: Point[];
  /** Compensated vertices the tool center follows. */
  toolpath: Point[];
}

export interface PreparedLine extends LineInstance {
  toolpath: PathPoint[];
  closed: boolean;
}

/**
 * Expanded, filtered and compensated geometry. Both the program assembler
 * and the preview consume this; neither re-derives it.
 */
export interface PreparedGeometry {
  drills: DrillGroup[];
  circles: PreparedCircle[];
  hexagons: PreparedHexagon[];
  lines: PreparedLine[];
  /** Instances dropped by the tube void filter. */
  skipped: number;
}

export interface PrepareOptions {
  cutToolDiameter: number;
  drillToolDiameter: number;
  skipTubeVoid: boolean;
}

/**
 * Runs `fn`, attaching the operation index to geometry failures that do not
 * carry one yet.
 */
export const forOperation = <T>(operationIndex: number, fn: () => T): T => {
  try {
    return fn();
  } catch (error) {
    if (error instanceof InvalidGeometryError && error.operationIndex === undefined) {
      throw new InvalidGeometryError(error.message, operationIndex);
    }
    throw error;
  }
};

export const prepareGeometry = (
  operations: readonly Operation[],
  material: Material,
  options: PrepareOptions,
): PreparedGeometry => {
  const expanded = expandOperations(operations);
  const { operations: kept, skipped } = options.skipTubeVoid
    ? filterTubeVoids(expanded, material, options.drillToolDiameter)
    : { operations: expanded, skipped: 0 };
  const tool = options.cutToolDiameter;

  return {
    drills: kept.drills,
    circles: kept.circles.map((circle) => ({
      ...circle,
      cutRadius: forOperation(circle.operationIndex, () => cutRadius(circle.diameter, tool, circle.compensation)),
    })),
    hexagons: kept.hexagons.map((hexagon) => ({
      ...hexagon,
      vertices: hexagonVertices(hexagon.center, hexagon.flatToFlat),
      toolpath: forOperation(hexagon.operationIndex, () =>
        compensatedHexagonVertices(hexagon.center, hexagon.flatToFlat, tool, hexagon.compensation),
      ),
    })),
    lines: kept.lines.map((line) => {
      const toolpath = forOperation(line.operationIndex, () =>
        compensateLinePath(line.points, tool, line.compensation),
      );
      return { ...line, toolpath, closed: isClosedPath(line.points) };
    }),
    skipped,
  };
};
