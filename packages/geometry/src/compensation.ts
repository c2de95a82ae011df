import { InvalidGeometryError, type CompensationMode, type PathPoint, type Point } from '@toolpath/shared';
import { arcDirection, arcMidpoint } from './arcs';
import { hexagonApothem, hexagonVertexOffset, hexagonVertices, moveTowards } from './hexagon';
import {
  cross,
  distance,
  isClosedPath,
  leftNormal,
  lineCircleIntersection,
  lineIntersection,
  pathWinding,
  sub,
} from './primitives';

/** Consecutive path points closer than this form a degenerate segment. */
export const ZERO_LENGTH_TOLERANCE = 1e-6;

/**
 * Signed offset of the cut boundary for a compensation mode.
 * @returns 0 for none, −radius for interior, +radius for exterior.
 */
export const getCompensationOffset = (toolDiameter: number, mode: CompensationMode): number => {
  switch (mode) {
    case 'interior':
      return -toolDiameter / 2;
    case 'exterior':
      return toolDiameter / 2;
    default:
      return 0;
  }
};

/**
 * Radius the tool center follows for a circular feature.
 * @throws InvalidGeometryError when compensation leaves no room for the tool.
 */
export const cutRadius = (diameter: number, toolDiameter: number, mode: CompensationMode): number => {
  const radius = diameter / 2 + getCompensationOffset(toolDiameter, mode);
  if (radius <= 0) {
    throw new InvalidGeometryError(
      `Circle diameter ${diameter.toFixed(4)} is too small for ${mode} compensation with tool diameter ${toolDiameter.toFixed(4)}`,
    );
  }
  return radius;
};

/**
 * Hexagon vertices the tool center follows. Each vertex moves along its
 * bisector so every flat shifts by exactly the tool radius.
 */
export const compensatedHexagonVertices = (
  center: Point,
  flatToFlat: number,
  toolDiameter: number,
  mode: CompensationMode,
): Point[] => {
  const vertices = hexagonVertices(center, flatToFlat);
  if (mode === 'none') {
    return vertices;
  }
  const toolRadius = toolDiameter / 2;
  if (mode === 'interior' && hexagonApothem(flatToFlat) - toolRadius <= 0) {
    throw new InvalidGeometryError(
      `Hexagon flat-to-flat ${flatToFlat.toFixed(4)} is too small for interior compensation with tool diameter ${toolDiameter.toFixed(4)}`,
    );
  }
  const amount = mode === 'interior' ? hexagonVertexOffset(toolRadius) : -hexagonVertexOffset(toolRadius);
  return vertices.map((vertex) => moveTowards(vertex, center, amount));
};

/**
 * @throws InvalidGeometryError on a segment of (near) zero length.
 */
export const assertNoZeroLengthSegments = (points: readonly PathPoint[]): void => {
  for (let i = 1; i < points.length; i++) {
    if (distance(points[i - 1], points[i]) < ZERO_LENGTH_TOLERANCE) {
      throw new InvalidGeometryError(
        `Zero-length segment between points ${i - 1} and ${i} at (${points[i].x.toFixed(4)}, ${points[i].y.toFixed(4)})`,
      );
    }
  }
};

type OffsetSegment =
  | { kind: 'straight'; start: Point; end: Point; source: PathPoint }
  | { kind: 'arc'; start: Point; end: Point; center: Point; source: Extract<PathPoint, { kind: 'arc' }> };

const placeAt = (source: PathPoint, p: Point): PathPoint =>
  source.kind === 'arc'
    ? { kind: 'arc', x: p.x, y: p.y, center: { ...source.center }, direction: source.direction }
    : { kind: 'straight', x: p.x, y: p.y };

const offsetArc = (
  start: Point,
  end: Point,
  source: Extract<PathPoint, { kind: 'arc' }>,
  offset: number,
  toolRadius: number,
  mode: CompensationMode,
): OffsetSegment => {
  const { center } = source;
  const direction = arcDirection(start, end, center, source.direction);
  const mid = arcMidpoint(start, end, center, direction);
  const bulgesLeft = cross(sub(end, start), sub(mid, start)) > 0;
  const change = bulgesLeft === offset > 0 ? toolRadius : -toolRadius;

  const r1 = distance(start, center);
  const r2 = distance(end, center);
  if (r1 + change <= 0 || r2 + change <= 0) {
    throw new InvalidGeometryError(
      `Arc radius (${Math.min(r1, r2).toFixed(4)}) is too small for ${mode} compensation with tool radius ${toolRadius.toFixed(4)}`,
    );
  }
  const scaled = (p: Point, r: number): Point => {
    const k = r > 0 ? (r + change) / r : 1;
    return { x: center.x + (p.x - center.x) * k, y: center.y + (p.y - center.y) * k };
  };
  return { kind: 'arc', start: scaled(start, r1), end: scaled(end, r2), center, source };
};

const offsetStraight = (start: Point, end: Point, source: PathPoint, offset: number): OffsetSegment => {
  const n = leftNormal(start, end);
  return {
    kind: 'straight',
    start: { x: start.x + n.x * offset, y: start.y + n.y * offset },
    end: { x: end.x + n.x * offset, y: end.y + n.y * offset },
    source,
  };
};

const radiusAt = (segment: OffsetSegment, p: Point): number =>
  segment.kind === 'arc' ? distance(p, segment.center) : 0;

/**
 * Where offset segment `a` hands over to offset segment `b`. Straight pairs
 * meet at their line intersection, a straight and an arc where the line
 * crosses the arc's circle. Without an intersection the nearer offset
 * endpoint is used.
 */
const joinPoint = (a: OffsetSegment, b: OffsetSegment): Point => {
  if (a.kind === 'straight' && b.kind === 'straight') {
    return lineIntersection(a.start, a.end, b.start, b.end) ?? a.end;
  }
  if (a.kind === 'arc' && b.kind === 'straight') {
    return lineCircleIntersection(b.start, b.end, a.center, radiusAt(a, a.end), a.end) ?? a.end;
  }
  if (a.kind === 'straight' && b.kind === 'arc') {
    return lineCircleIntersection(a.start, a.end, b.center, radiusAt(b, b.start), b.start) ?? b.start;
  }
  return a.end;
};

/**
 * Offsets a line path by the tool radius.
 *
 * Closed paths (first and last point within 1e-4) are offset towards the
 * inside for interior and the outside for exterior, using the path winding.
 * Open paths treat the left of travel as the inside of a counter-clockwise
 * path. Straight segments are offset in parallel; arcs keep their center and
 * change radius. Corners are re-joined at the intersection of neighbouring
 * offset segments. Two adjacent arcs are bridged by a short straight move.
 *
 * @throws InvalidGeometryError when an arc radius would drop to zero or below.
 */
export const compensateLinePath = (
  points: readonly PathPoint[],
  toolDiameter: number,
  mode: CompensationMode,
): PathPoint[] => {
  assertNoZeroLengthSegments(points);
  if (mode === 'none' || points.length < 2) {
    return points.map((p) => ({ ...p }));
  }

  const toolRadius = toolDiameter / 2;
  const closed = isClosedPath(points);
  const winding = pathWinding(points);
  const offset =
    mode === 'exterior'
      ? winding >= 0 ? -toolRadius : toolRadius
      : winding >= 0 ? toolRadius : -toolRadius;

  const n = closed ? points.length - 1 : points.length;
  const segmentCount = closed ? n : n - 1;
  const segments: OffsetSegment[] = [];
  for (let i = 0; i < segmentCount; i++) {
    const j = (i + 1) % n;
    const start = points[i];
    const end = points[j];
    // The closing segment keeps the arc data of the original last point.
    const source = closed && j === 0 ? points[points.length - 1] : end;
    segments.push(
      source.kind === 'arc'
        ? offsetArc(start, end, source, offset, toolRadius, mode)
        : offsetStraight(start, end, source, offset),
    );
  }

  const first = segments[0];
  const last = segments[segments.length - 1];
  const opening = closed && !(first.kind === 'arc' && last.kind === 'arc') ? joinPoint(last, first) : first.start;

  const result: PathPoint[] = [{ kind: 'start', x: opening.x, y: opening.y }];
  segments.forEach((segment, i) => {
    if (i === segments.length - 1 && !closed) {
      result.push(placeAt(segment.source, segment.end));
      return;
    }
    const next = segments[(i + 1) % segments.length];
    if (segment.kind === 'arc' && next.kind === 'arc') {
      result.push(placeAt(segment.source, segment.end));
      result.push({ kind: 'straight', x: next.start.x, y: next.start.y });
      return;
    }
    result.push(placeAt(segment.source, joinPoint(segment, next)));
  });
  return result;
};
