import type { PathPoint, Point } from '@toolpath/shared';
import { arcDirection, arcTangent } from './arcs';

/** Interior angles at or above this are treated as straight-through. */
export const CORNER_ANGLE_THRESHOLD = 120;

export interface Corner {
  index: number;
  point: Point;
  /** Interior angle in degrees: 180 is straight, 0 is a full reversal. */
  angle: number;
  severity: number;
}

const unit = (from: Point, to: Point): Point => {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const mag = Math.hypot(dx, dy);
  return mag < 1e-4 ? { x: 1, y: 0 } : { x: dx / mag, y: dy / mag };
};

/**
 * Direction of travel arriving at `points[index]` (incoming) or leaving it
 * along the segment that ends at `points[index + 1]` (outgoing).
 */
const travelDirection = (points: readonly PathPoint[], index: number, outgoing: boolean): Point => {
  const segmentEnd = outgoing ? points[index + 1] : points[index];
  const segmentStart = outgoing ? points[index] : points[index - 1];
  if (segmentEnd.kind === 'arc') {
    const direction = arcDirection(segmentStart, segmentEnd, segmentEnd.center, segmentEnd.direction);
    return arcTangent(points[index], segmentEnd.center, direction);
  }
  return unit(segmentStart, segmentEnd);
};

/**
 * Feed multiplier for a corner of the given interior angle.
 * ≥120° → 1, [90,120) → 0.75, [60,90) → 0.5, [30,60) → 0.4, below → 0.3.
 */
export const cornerSeverityFactor = (angle: number): number => {
  if (angle >= 120) return 1;
  if (angle >= 90) return 0.75;
  if (angle >= 60) return 0.5;
  if (angle >= 30) return 0.4;
  return 0.3;
};

/**
 * Sharp direction changes at the interior points of a path.
 */
export const identifyCorners = (
  points: readonly PathPoint[],
  threshold = CORNER_ANGLE_THRESHOLD,
): Corner[] => {
  const corners: Corner[] = [];
  for (let i = 1; i < points.length - 1; i++) {
    const incoming = travelDirection(points, i, false);
    const outgoing = travelDirection(points, i, true);
    const cos = Math.max(-1, Math.min(1, incoming.x * outgoing.x + incoming.y * outgoing.y));
    const angle = 180 - (Math.acos(cos) * 180) / Math.PI;
    if (angle < threshold) {
      corners.push({ index: i, point: { x: points[i].x, y: points[i].y }, angle, severity: cornerSeverityFactor(angle) });
    }
  }
  return corners;
};

/**
 * Severity factor for the move arriving at each point; 1 where there is no
 * corner.
 */
export const cornerFactors = (points: readonly PathPoint[]): number[] => {
  const factors = points.map(() => 1);
  for (const corner of identifyCorners(points)) {
    factors[corner.index] = corner.severity;
  }
  return factors;
};
