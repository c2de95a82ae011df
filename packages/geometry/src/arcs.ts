import type { ArcDirection, Point } from '@toolpath/shared';

/**
 * Resolves the travel direction of an arc from `current` to `destination`
 * around `center`. An explicit hint (case-insensitive) always wins; otherwise
 * the sign of (current − center) × (destination − center) decides, and a
 * collinear semicircle falls back to clockwise.
 */
export const arcDirection = (
  current: Point,
  destination: Point,
  center: Point,
  hint?: string,
): ArcDirection => {
  const normalized = hint?.toLowerCase();
  if (normalized === 'cw' || normalized === 'ccw') {
    return normalized;
  }
  const cross =
    (current.x - center.x) * (destination.y - center.y) -
    (current.y - center.y) * (destination.x - center.x);
  return cross > 0 ? 'ccw' : 'cw';
};

/** I/J words: the center relative to the arc's start. */
export const arcOffsets = (current: Point, center: Point): Point => ({
  x: center.x - current.x,
  y: center.y - current.y,
});

export const motionCode = (direction: ArcDirection): 'G02' | 'G03' =>
  direction === 'cw' ? 'G02' : 'G03';

/**
 * Unit tangent of travel at `p` on a circle around `center`.
 * @returns (1, 0) when `p` sits on the center.
 */
export const arcTangent = (p: Point, center: Point, direction: ArcDirection): Point => {
  const rx = p.x - center.x;
  const ry = p.y - center.y;
  const t = direction === 'ccw' ? { x: -ry, y: rx } : { x: ry, y: -rx };
  const mag = Math.hypot(t.x, t.y);
  if (mag < 1e-4) {
    return { x: 1, y: 0 };
  }
  return { x: t.x / mag, y: t.y / mag };
};

/**
 * Angular sweep of an arc in radians, in (0, 2π]. Coincident endpoints
 * describe a full circle.
 */
export const arcSweep = (start: Point, end: Point, center: Point, direction: ArcDirection): number => {
  const a0 = Math.atan2(start.y - center.y, start.x - center.x);
  const a1 = Math.atan2(end.y - center.y, end.x - center.x);
  let sweep = direction === 'cw' ? a0 - a1 : a1 - a0;
  if (sweep <= 0) {
    sweep += 2 * Math.PI;
  }
  return sweep;
};

/** Point halfway along the arc, at the start radius. */
export const arcMidpoint = (start: Point, end: Point, center: Point, direction: ArcDirection): Point => {
  const a0 = Math.atan2(start.y - center.y, start.x - center.x);
  const half = arcSweep(start, end, center, direction) / 2;
  const mid = direction === 'cw' ? a0 - half : a0 + half;
  const r = Math.hypot(start.x - center.x, start.y - center.y);
  return { x: center.x + r * Math.cos(mid), y: center.y + r * Math.sin(mid) };
};
