import { arcDirection, cornerFactors, pointsEqual } from '@toolpath/geometry';
import type { ArcDirection, CutToolParams, GenerationSettings, LeadInType, PathPoint, Point } from '@toolpath/shared';
import {
  DEFAULT_APPROACH_ANGLE,
  circleLeadInPoint,
  helicalFallbackWarning,
  helixRadiusForCircle,
  helixRadiusForHexagon,
  hexagonLeadInPoint,
  lineLeadInPoint,
  pointAtAngle,
  resolveLeadIn,
} from './leadIn';
import type { PreparedCircle, PreparedGeometry, PreparedHexagon, PreparedLine } from './prepare';

/** Below this the helix already sits on the profile and needs no transition. */
const TRANSITION_TOLERANCE = 0.001;

export type CutShape = 'circle' | 'hexagon' | 'line';

export type CutMove =
  | { kind: 'line'; to: Point; cornerSeverity: number }
  | { kind: 'arc'; to: Point; center: Point; direction: ArcDirection; cornerSeverity: number }
  /** Full revolution starting and ending at the current position. */
  | { kind: 'circle'; center: Point; direction: ArcDirection };

export type HelixTransition =
  | { kind: 'none' }
  | { kind: 'line' }
  | { kind: 'arc'; center: Point; direction: ArcDirection };

/**
 * How the tool reaches depth. Helix revolutions always run clockwise around
 * `center`, starting and ending at the path's entry point.
 */
export type CutEntry =
  | { kind: 'plunge' }
  | { kind: 'ramp' }
  | { kind: 'helical'; center: Point; radius: number; transition: HelixTransition };

export interface CutPath {
  shape: CutShape;
  operationIndex: number;
  operationId: string;
  /** Where the tool rapids to before descending. */
  entryPoint: Point;
  /** First point of the profile at depth. */
  profileStart: Point;
  entry: CutEntry;
  moves: CutMove[];
  /** Open paths retract at their last point instead of leading out. */
  closed: boolean;
  holdTime: number;
}

export interface CutContext {
  settings: GenerationSettings;
  tool: CutToolParams;
  leadInDistance: number;
}

export interface CutBuild {
  path: CutPath;
  warnings: string[];
}

const resolveType = (
  requested: LeadInType,
  helixRadius: number | null,
  description: string,
  operationIndex: number,
): { type: LeadInType; warnings: string[] } => {
  if (requested === 'helical' && helixRadius === null) {
    return { type: 'ramp', warnings: [helicalFallbackWarning(description, operationIndex)] };
  }
  return { type: requested, warnings: [] };
};

export const buildCircleCut = (circle: PreparedCircle, { settings, tool, leadInDistance }: CutContext): CutBuild => {
  const leadIn = resolveLeadIn(circle.leadIn, settings.leadInDefaults.circle);
  const angle = leadIn.approachAngle ?? DEFAULT_APPROACH_ANGLE;
  const { center, cutRadius: radius } = circle;
  const profileStart = pointAtAngle(center, radius, angle);
  const helixRadius = helixRadiusForCircle(radius, tool.toolDiameter, circle.compensation);
  const { type, warnings } = resolveType(leadIn.type, helixRadius, `Circle d=${circle.diameter}"`, circle.operationIndex);

  let entry: CutEntry = { kind: 'plunge' };
  let entryPoint = profileStart;
  if (type === 'ramp') {
    entry = { kind: 'ramp' };
    entryPoint = circleLeadInPoint(center, radius, leadInDistance, angle);
  } else if (type === 'helical' && helixRadius !== null) {
    entryPoint = pointAtAngle(center, helixRadius, angle);
    const gap = radius - helixRadius;
    const transition: HelixTransition =
      Math.abs(gap) < TRANSITION_TOLERANCE
        ? { kind: 'none' }
        : {
            kind: 'arc',
            center: { x: (entryPoint.x + profileStart.x) / 2, y: (entryPoint.y + profileStart.y) / 2 },
            direction: gap > 0 ? 'cw' : 'ccw',
          };
    entry = { kind: 'helical', center, radius: helixRadius, transition };
  }

  return {
    path: {
      shape: 'circle',
      operationIndex: circle.operationIndex,
      operationId: circle.operationId,
      entryPoint,
      profileStart,
      entry,
      moves: [{ kind: 'circle', center, direction: 'cw' }],
      closed: true,
      holdTime: circle.holdTime,
    },
    warnings,
  };
};

export const buildHexagonCut = (hexagon: PreparedHexagon, { settings, tool, leadInDistance }: CutContext): CutBuild => {
  const leadIn = resolveLeadIn(hexagon.leadIn, settings.leadInDefaults.hexagon);
  const { center, toolpath } = hexagon;
  const profileStart = toolpath[0];
  const helixRadius = helixRadiusForHexagon(hexagon.flatToFlat, tool.toolDiameter, hexagon.compensation);
  const { type, warnings } = resolveType(
    leadIn.type,
    helixRadius,
    `Hexagon f2f=${hexagon.flatToFlat}"`,
    hexagon.operationIndex,
  );

  let entry: CutEntry = { kind: 'plunge' };
  let entryPoint = profileStart;
  if (type === 'ramp') {
    entry = { kind: 'ramp' };
    entryPoint = hexagonLeadInPoint(
      toolpath,
      leadInDistance,
      leadIn.approachAngle === undefined ? undefined : { center, approachAngle: leadIn.approachAngle },
    );
  } else if (type === 'helical' && helixRadius !== null) {
    const angle = leadIn.approachAngle ?? (hexagon.compensation === 'exterior' ? 0 : DEFAULT_APPROACH_ANGLE);
    entryPoint = pointAtAngle(center, helixRadius, angle);
    entry = {
      kind: 'helical',
      center,
      radius: helixRadius,
      transition: pointsEqual(entryPoint, profileStart) ? { kind: 'none' } : { kind: 'line' },
    };
  }

  const moves = [...toolpath.slice(1), profileStart].map((to): CutMove => ({ kind: 'line', to, cornerSeverity: 1 }));
  return {
    path: {
      shape: 'hexagon',
      operationIndex: hexagon.operationIndex,
      operationId: hexagon.operationId,
      entryPoint,
      profileStart,
      entry,
      moves,
      closed: true,
      holdTime: hexagon.holdTime,
    },
    warnings,
  };
};

const moveTo = (from: PathPoint, to: PathPoint, cornerSeverity: number): CutMove =>
  to.kind === 'arc'
    ? {
        kind: 'arc',
        to: { x: to.x, y: to.y },
        center: { ...to.center },
        direction: arcDirection(from, to, to.center, to.direction),
        cornerSeverity,
      }
    : { kind: 'line', to: { x: to.x, y: to.y }, cornerSeverity };

export const buildLineCut = (line: PreparedLine, { settings, leadInDistance }: CutContext): CutBuild => {
  const leadIn = resolveLeadIn(line.leadIn, settings.leadInDefaults.line);
  const warnings: string[] = [];
  const { toolpath, closed } = line;
  const profileStart = { x: toolpath[0].x, y: toolpath[0].y };

  let type = leadIn.type;
  if (type === 'helical') {
    warnings.push(`operations[${line.operationIndex}]: Line path does not support helical lead-in, using ramp`);
    type = 'ramp';
  }

  const entryPoint =
    type === 'ramp'
      ? lineLeadInPoint(toolpath, leadInDistance, line.compensation, closed, leadIn.approachAngle)
      : profileStart;
  const factors = cornerFactors(toolpath);
  const moves = toolpath.slice(1).map((p, i) => moveTo(toolpath[i], p, factors[i + 1]));

  return {
    path: {
      shape: 'line',
      operationIndex: line.operationIndex,
      operationId: line.operationId,
      entryPoint,
      profileStart,
      entry: type === 'ramp' ? { kind: 'ramp' } : { kind: 'plunge' },
      moves,
      closed,
      holdTime: line.holdTime,
    },
    warnings,
  };
};

/** Cut paths for all profile geometry in emission order: circles, hexagons, lines. */
export const buildCutPaths = (geometry: PreparedGeometry, context: CutContext): CutBuild[] => [
  ...geometry.circles.map((circle) => buildCircleCut(circle, context)),
  ...geometry.hexagons.map((hexagon) => buildHexagonCut(hexagon, context)),
  ...geometry.lines.map((line) => buildLineCut(line, context)),
];
