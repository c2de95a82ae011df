import type { Point } from '@toolpath/shared';

/** Tolerance used to decide whether a path returns to its first point. */
export const CLOSED_PATH_TOLERANCE = 1e-4;

/** Denominator below which two lines are treated as parallel. */
export const PARALLEL_EPSILON = 1e-10;

export const point = (x: number, y: number): Point => ({ x, y });

export const add = (a: Point, b: Point): Point => ({ x: a.x + b.x, y: a.y + b.y });
export const sub = (a: Point, b: Point): Point => ({ x: a.x - b.x, y: a.y - b.y });
export const scale = (v: Point, k: number): Point => ({ x: v.x * k, y: v.y * k });
export const dot = (a: Point, b: Point): number => a.x * b.x + a.y * b.y;

/** z-component of the 2D cross product. */
export const cross = (a: Point, b: Point): number => a.x * b.y - a.y * b.x;

export const length = (v: Point): number => Math.hypot(v.x, v.y);
export const distance = (a: Point, b: Point): number => Math.hypot(b.x - a.x, b.y - a.y);

/**
 * Unit vector in the direction of `v`.
 * @returns null for a zero-length vector.
 */
export const normalize = (v: Point): Point | null => {
  const len = length(v);
  return len === 0 ? null : { x: v.x / len, y: v.y / len };
};

/**
 * Direction for an angle given in degrees clockwise from 12 o'clock,
 * the convention operators use for approach angles.
 */
export const compassDirection = (degrees: number): Point => {
  const radians = ((90 - degrees) * Math.PI) / 180;
  return { x: Math.cos(radians), y: Math.sin(radians) };
};

/**
 * Left-hand unit normal of the segment a→b.
 * @returns (0, 0) for coincident points.
 */
export const leftNormal = (a: Point, b: Point): Point => {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const len = Math.hypot(dx, dy);
  if (len === 0) {
    return { x: 0, y: 0 };
  }
  return { x: -dy / len, y: dx / len };
};

/**
 * Intersection of the infinite lines through (p1, p2) and (p3, p4).
 * @returns null when the lines are parallel.
 */
export const lineIntersection = (p1: Point, p2: Point, p3: Point, p4: Point): Point | null => {
  const denom = (p1.x - p2.x) * (p3.y - p4.y) - (p1.y - p2.y) * (p3.x - p4.x);
  if (Math.abs(denom) < PARALLEL_EPSILON) {
    return null;
  }
  const t = ((p1.x - p3.x) * (p3.y - p4.y) - (p1.y - p3.y) * (p3.x - p4.x)) / denom;
  return { x: p1.x + t * (p2.x - p1.x), y: p1.y + t * (p2.y - p1.y) };
};

/**
 * Intersection of the line through (p1, p2) with a circle.
 * When the line crosses twice, the root closest to `preferNear` wins.
 * @returns null when the line misses the circle or is degenerate.
 */
export const lineCircleIntersection = (
  p1: Point,
  p2: Point,
  center: Point,
  radius: number,
  preferNear: Point,
): Point | null => {
  const d = sub(p2, p1);
  const f = sub(p1, center);
  const a = dot(d, d);
  if (a < PARALLEL_EPSILON) {
    return null;
  }
  const b = 2 * dot(f, d);
  const c = dot(f, f) - radius * radius;
  const discriminant = b * b - 4 * a * c;
  if (discriminant < 0) {
    return null;
  }
  const root = Math.sqrt(discriminant);
  const candidates = [(-b - root) / (2 * a), (-b + root) / (2 * a)].map((t) => add(p1, scale(d, t)));
  const [first, second] = candidates;
  return distance(first, preferNear) <= distance(second, preferNear) ? first : second;
};

export const isClosedPath = (points: readonly Point[]): boolean => {
  if (points.length < 3) {
    return false;
  }
  const first = points[0];
  const last = points[points.length - 1];
  return (
    Math.abs(first.x - last.x) < CLOSED_PATH_TOLERANCE &&
    Math.abs(first.y - last.y) < CLOSED_PATH_TOLERANCE
  );
};

/**
 * Signed area by the shoelace formula over the points as given.
 * Positive for counter-clockwise paths.
 */
export const pathWinding = (points: readonly Point[]): number => {
  let sum = 0;
  for (let i = 0; i < points.length; i++) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    sum += a.x * b.y - b.x * a.y;
  }
  return sum / 2;
};

export const pointsEqual = (a: Point, b: Point, tolerance = CLOSED_PATH_TOLERANCE): boolean =>
  Math.abs(a.x - b.x) < tolerance && Math.abs(a.y - b.y) < tolerance;
