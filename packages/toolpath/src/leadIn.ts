import {
  compassDirection,
  distance,
  hexagonApothem,
  hexagonCircumradius,
  hexagonVertexOffset,
  leftNormal,
  normalize,
  pathWinding,
  sub,
} from '@toolpath/geometry';
import type { CompensationMode, GenerationSettings, LeadInSpec, LeadInType, Point } from '@toolpath/shared';

export const DEFAULT_APPROACH_ANGLE = 90;
export const RAMP_FALLBACK_DISTANCE = 0.25;
export const MIN_HELIX_RADIUS = 0.05;
export const HELIX_CLEARANCE = 0.025;

/** Feed ramp for the helix revolutions, as fractions from plunge to cutting feed. */
const HELIX_FEED_FRACTIONS = [0.25, 0.5, 0.75] as const;

export type EntryPlan =
  | { kind: 'plunge' }
  | { kind: 'ramp'; from: Point }
  | { kind: 'helical'; center: Point; radius: number; from: Point };

export interface ResolvedLeadIn {
  type: LeadInType;
  /** Present in manual mode only. */
  approachAngle?: number;
}

/**
 * Horizontal run of a ramp that drops `passStep` at `rampAngle` degrees.
 * Falls back to 0.25" when either input is not positive.
 */
export const rampLeadInDistance = (rampAngle: number, passStep: number): number => {
  if (rampAngle <= 0 || passStep <= 0) {
    return RAMP_FALLBACK_DISTANCE;
  }
  return passStep / Math.tan((rampAngle * Math.PI) / 180);
};

export const resolveLeadInDistance = (settings: GenerationSettings, passStep: number): number =>
  settings.leadInDistance ?? rampLeadInDistance(settings.rampAngle, passStep);

export const resolveLeadIn = (leadIn: LeadInSpec, fallback: LeadInType): ResolvedLeadIn =>
  leadIn.mode === 'manual' ? { type: leadIn.type, approachAngle: leadIn.approachAngle } : { type: fallback };

/** Caps the helix at one clearance beyond the tool radius; null when it ends up under the minimum. */
const clampHelix = (available: number, toolRadius: number): number | null => {
  const radius = Math.min(available, toolRadius + HELIX_CLEARANCE);
  return radius < MIN_HELIX_RADIUS ? null : radius;
};

/**
 * Helix radius for a circular pocket, or null when the circle is too small
 * and the entry has to fall back to a ramp. Exterior cuts spiral just outside
 * the toolpath so the part is left intact.
 */
export const helixRadiusForCircle = (
  cutRadius: number,
  toolDiameter: number,
  mode: CompensationMode,
): number | null => {
  if (mode === 'exterior') {
    return cutRadius + HELIX_CLEARANCE;
  }
  return clampHelix(cutRadius - HELIX_CLEARANCE, toolDiameter / 2);
};

export const helixRadiusForHexagon = (
  flatToFlat: number,
  toolDiameter: number,
  mode: CompensationMode,
): number | null => {
  const toolRadius = toolDiameter / 2;
  switch (mode) {
    case 'exterior':
      return hexagonCircumradius(flatToFlat) + hexagonVertexOffset(toolRadius) + HELIX_CLEARANCE;
    case 'interior':
      return clampHelix(hexagonApothem(flatToFlat) - toolRadius - HELIX_CLEARANCE, toolRadius);
    default:
      return clampHelix(hexagonApothem(flatToFlat) - HELIX_CLEARANCE, toolRadius);
  }
};

export const helixRevolutions = (depth: number, pitch: number): number =>
  pitch <= 0 ? 1 : Math.max(1, Math.ceil(depth / pitch));

/**
 * Feed for each helix revolution, stepping from the plunge rate towards the
 * cutting feed.
 */
export const helixFeedSchedule = (revolutions: number, plungeRate: number, endFeed: number): number[] => {
  const at = (fraction: number) => plungeRate + (endFeed - plungeRate) * fraction;
  if (revolutions === 1) {
    return [at(HELIX_FEED_FRACTIONS[2])];
  }
  if (revolutions === 2) {
    return [at(HELIX_FEED_FRACTIONS[1]), at(HELIX_FEED_FRACTIONS[2])];
  }
  return Array.from({ length: revolutions }, (_, r) => at(HELIX_FEED_FRACTIONS[Math.min(r, 2)]));
};

export const pointAtAngle = (center: Point, radius: number, approachAngle: number): Point => {
  const dir = compassDirection(approachAngle);
  return { x: center.x + radius * dir.x, y: center.y + radius * dir.y };
};

/** Ramp start for a circle: radially outward from the profile start. */
export const circleLeadInPoint = (
  center: Point,
  cutRadius: number,
  leadInDistance: number,
  approachAngle = DEFAULT_APPROACH_ANGLE,
): Point => pointAtAngle(center, cutRadius + leadInDistance, approachAngle);

/**
 * Ramp start for a hexagon. By default the first edge is extended backwards
 * from vertex 0; a manual approach angle places it beyond vertex 0's radius
 * in that direction instead.
 */
export const hexagonLeadInPoint = (
  vertices: readonly Point[],
  leadInDistance: number,
  manual?: { center: Point; approachAngle: number },
): Point => {
  const [v0, v1] = vertices;
  if (manual) {
    return pointAtAngle(manual.center, distance(v0, manual.center) + leadInDistance, manual.approachAngle);
  }
  const edge = distance(v0, v1) < 1e-4 ? null : normalize(sub(v1, v0));
  if (!edge) {
    return { ...v0 };
  }
  return { x: v0.x - edge.x * leadInDistance, y: v0.y - edge.y * leadInDistance };
};

/**
 * Ramp start for a line path. A manual angle wins; closed compensated paths
 * enter perpendicular from the waste side; otherwise the first segment is
 * extended backwards.
 */
export const lineLeadInPoint = (
  points: readonly Point[],
  leadInDistance: number,
  compensation: CompensationMode,
  closed: boolean,
  approachAngle?: number,
): Point => {
  const [p0, p1] = points;
  if (approachAngle !== undefined) {
    return pointAtAngle(p0, leadInDistance, approachAngle);
  }
  if (closed && compensation !== 'none') {
    const left = leftNormal(p0, p1);
    const counterClockwise = pathWinding(points) >= 0;
    const wasteOnLeft = compensation === 'interior' ? counterClockwise : !counterClockwise;
    const side = wasteOnLeft ? 1 : -1;
    return { x: p0.x + left.x * leadInDistance * side, y: p0.y + left.y * leadInDistance * side };
  }
  const dir = normalize(sub(p1, p0));
  if (!dir) {
    return { ...p0 };
  }
  return { x: p0.x - dir.x * leadInDistance, y: p0.y - dir.y * leadInDistance };
};

/** @param description shape and size, e.g. `Circle d=0.5"`. */
export const helicalFallbackWarning = (description: string, operationIndex: number): string =>
  `operations[${operationIndex}]: ${description} too small for helical lead-in, using ramp`;
