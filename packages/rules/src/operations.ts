import {
  compensateLinePath,
  distance,
  expandOperations,
  hexagonApothem,
  hexagonCircumradius,
  type ExpandedOperations,
} from '@toolpath/geometry';
import {
  InvalidGeometryError,
  type Issue,
  type MachineBounds,
  type Operation,
  type PathPoint,
  type Point,
} from '@toolpath/shared';

export interface RuleContext {
  operations: readonly Operation[];
  expanded: ExpandedOperations;
  bounds: MachineBounds;
  allowNegativeCoordinates: boolean;
  /** When set, line paths are checked where the tool center actually runs. */
  toolDiameter?: number;
}

export type Rule = (context: RuleContext) => Issue[];

/** Largest start/end radius difference accepted for an arc. */
export const ARC_RADIUS_TOLERANCE = 0.001;

const at = (p: Point) => `(${p.x}, ${p.y})`;

const error = (code: string, message: string, operationIndex?: number, operationId?: string): Issue => ({
  code,
  severity: 'error' as const,
  message,
  operationIndex,
  operationId,
});

export const ruleHasOperations: Rule = ({ operations }) =>
  operations.length > 0 ? [] : [error('NO_OPERATIONS', 'Project has no operations')];

const patternOf = (operation: Operation): { spacings: number[]; counts: number[] } | null => {
  switch (operation.kind) {
    case 'drill-linear':
    case 'circle-linear':
    case 'hexagon-linear':
      return { spacings: [operation.spacing], counts: [operation.count] };
    case 'drill-grid':
      return { spacings: [operation.xSpacing, operation.ySpacing], counts: [operation.xCount, operation.yCount] };
    default:
      return null;
  }
};

export const rulePatternCounts: Rule = ({ operations }) =>
  operations.flatMap((operation, index) => {
    const pattern = patternOf(operation);
    if (!pattern) {
      return [];
    }
    const issues: Issue[] = [];
    pattern.counts.forEach((count, axis) => {
      if (!Number.isInteger(count) || count < 1) {
        issues.push(error('INVALID_COUNT', `Pattern count must be a whole number of at least 1, got ${count}`, index, operation.id));
      } else if (count > 1 && pattern.spacings[axis] === 0) {
        issues.push(error('INVALID_SPACING', 'Pattern spacing must not be zero when repeating', index, operation.id));
      }
    });
    return issues;
  });

export const ruleFeatureSize: Rule = ({ operations }) =>
  operations.flatMap((operation, index) => {
    if ((operation.kind === 'circle-single' || operation.kind === 'circle-linear') && !(operation.diameter > 0)) {
      return [error('INVALID_SIZE', `Circle diameter must be positive, got ${operation.diameter}`, index, operation.id)];
    }
    if ((operation.kind === 'hexagon-single' || operation.kind === 'hexagon-linear') && !(operation.flatToFlat > 0)) {
      return [
        error('INVALID_SIZE', `Hexagon flat-to-flat must be positive, got ${operation.flatToFlat}`, index, operation.id),
      ];
    }
    return [];
  });

export const ruleLinePathShape: Rule = ({ operations }) =>
  operations.flatMap((operation, index) => {
    if (operation.kind !== 'line-path') {
      return [];
    }
    const { points, id } = operation;
    if (points.length < 2) {
      return [error('LINE_TOO_SHORT', `Line path needs at least 2 points, got ${points.length}`, index, id)];
    }
    const issues: Issue[] = [];
    if (points[0].kind !== 'start') {
      issues.push(error('LINE_START', 'Line path must begin with a start point', index, id));
    }
    points.slice(1).forEach((p, i) => {
      if (p.kind === 'start') {
        issues.push(error('LINE_START', `Line path has a start point at position ${i + 1}`, index, id));
      }
    });
    return issues;
  });

const beyond = (p: Point, bounds: MachineBounds, reachX: number, reachY: number) =>
  p.x + reachX > bounds.maxX || p.y + reachY > bounds.maxY;

const belowZero = (p: Point, allowNegative: boolean, reachX: number, reachY: number) =>
  !allowNegative && (p.x - reachX < 0 || p.y - reachY < 0);

export const ruleDrillBounds: Rule = ({ expanded, bounds, allowNegativeCoordinates }) =>
  expanded.drills.flatMap((group) =>
    group.points.flatMap((p) => {
      if (beyond(p, bounds, 0, 0)) {
        return [error('OUT_OF_BOUNDS', `Drill point ${at(p)} exceeds machine bounds`, group.operationIndex, group.operationId)];
      }
      if (belowZero(p, allowNegativeCoordinates, 0, 0)) {
        return [
          error(
            'OUT_OF_BOUNDS',
            `Drill point ${at(p)} is outside machine bounds (negative coordinate)`,
            group.operationIndex,
            group.operationId,
          ),
        ];
      }
      return [];
    }),
  );

export const ruleCircleBounds: Rule = ({ expanded, bounds, allowNegativeCoordinates }) =>
  expanded.circles.flatMap((circle) => {
    const radius = circle.diameter / 2;
    if (beyond(circle.center, bounds, radius, radius)) {
      return [
        error(
          'OUT_OF_BOUNDS',
          `Circle at ${at(circle.center)} extends outside machine bounds`,
          circle.operationIndex,
          circle.operationId,
        ),
      ];
    }
    if (belowZero(circle.center, allowNegativeCoordinates, radius, radius)) {
      return [
        error('OUT_OF_BOUNDS', `Circle at ${at(circle.center)} extends past zero`, circle.operationIndex, circle.operationId),
      ];
    }
    return [];
  });

/** Point-up hexagons reach the apothem in X and the circumradius in Y. */
export const ruleHexagonBounds: Rule = ({ expanded, bounds, allowNegativeCoordinates }) =>
  expanded.hexagons.flatMap((hexagon) => {
    const reachX = hexagonApothem(hexagon.flatToFlat);
    const reachY = hexagonCircumradius(hexagon.flatToFlat);
    if (beyond(hexagon.center, bounds, reachX, reachY)) {
      return [
        error(
          'OUT_OF_BOUNDS',
          `Hexagon at ${at(hexagon.center)} extends outside machine bounds`,
          hexagon.operationIndex,
          hexagon.operationId,
        ),
      ];
    }
    if (belowZero(hexagon.center, allowNegativeCoordinates, reachX, reachY)) {
      return [
        error('OUT_OF_BOUNDS', `Hexagon at ${at(hexagon.center)} extends past zero`, hexagon.operationIndex, hexagon.operationId),
      ];
    }
    return [];
  });

export const ruleLineBounds: Rule = ({ expanded, bounds, allowNegativeCoordinates, toolDiameter }) =>
  expanded.lines.flatMap((line) => {
    let points: PathPoint[];
    try {
      points =
        toolDiameter === undefined
          ? compensateLinePath(line.points, 0, 'none')
          : compensateLinePath(line.points, toolDiameter, line.compensation);
    } catch (e) {
      if (e instanceof InvalidGeometryError) {
        return [error(e.code, e.message, line.operationIndex, line.operationId)];
      }
      throw e;
    }
    return points.flatMap((p) => {
      const where = `(${p.x.toFixed(3)}, ${p.y.toFixed(3)})`;
      if (beyond(p, bounds, 0, 0)) {
        return [error('OUT_OF_BOUNDS', `Line point ${where} exceeds machine bounds`, line.operationIndex, line.operationId)];
      }
      if (belowZero(p, allowNegativeCoordinates, 0, 0)) {
        return [error('OUT_OF_BOUNDS', `Line point ${where} has negative coordinate`, line.operationIndex, line.operationId)];
      }
      return [];
    });
  });

/**
 * Arcs whose end lies on a different radius than their start. The path is
 * still cut, but compensated output will be discontinuous.
 */
export const ruleArcGeometry: Rule = ({ operations }) =>
  operations.flatMap((operation, index) => {
    if (operation.kind !== 'line-path') {
      return [];
    }
    return operation.points.flatMap((p, i): Issue[] => {
      if (p.kind !== 'arc' || i === 0) {
        return [];
      }
      const start = operation.points[i - 1];
      const startRadius = distance(start, p.center);
      const endRadius = distance(p, p.center);
      const difference = Math.abs(startRadius - endRadius);
      if (difference <= ARC_RADIUS_TOLERANCE) {
        return [];
      }
      return [
        {
          code: 'ARC_RADIUS_MISMATCH',
          severity: 'warning',
          message:
            `Arc from ${at(start)} to ${at(p)} has invalid geometry: ` +
            `start is ${startRadius.toFixed(4)}" from center ${at(p.center)}, ` +
            `but end is ${endRadius.toFixed(4)}" from center. ` +
            `Difference of ${difference.toFixed(4)}" exceeds tolerance of ${ARC_RADIUS_TOLERANCE}". ` +
            'This will cause discontinuities in tool-compensated paths.',
          operationIndex: index,
          operationId: operation.id,
        },
      ];
    });
  });

export const runAllOperationRules: Rule = (context) => [
  ...ruleHasOperations(context),
  ...rulePatternCounts(context),
  ...ruleFeatureSize(context),
  ...ruleLinePathShape(context),
  ...ruleDrillBounds(context),
  ...ruleCircleBounds(context),
  ...ruleHexagonBounds(context),
  ...ruleLineBounds(context),
  ...ruleArcGeometry(context),
];

export interface ValidateOptions {
  allowNegativeCoordinates?: boolean;
  toolDiameter?: number;
}

export const operationIssues = (
  operations: readonly Operation[],
  bounds: MachineBounds,
  options: ValidateOptions = {},
): Issue[] =>
  runAllOperationRules({
    operations,
    expanded: expandOperations(operations),
    bounds,
    allowNegativeCoordinates: options.allowNegativeCoordinates ?? false,
    toolDiameter: options.toolDiameter,
  });
