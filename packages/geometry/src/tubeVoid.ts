import type { Material, Point } from '@toolpath/shared';
import type { Bounds } from './hexagon';
import { hexagonCircumradius } from './hexagon';
import type { ExpandedOperations } from './patterns';

/** Hollow region of a rectangular tube. */
export const voidBounds = (outerWidth: number, outerHeight: number, wallThickness: number): Bounds => ({
  minX: wallThickness,
  minY: wallThickness,
  maxX: outerWidth - wallThickness,
  maxY: outerHeight - wallThickness,
});

/**
 * True when a disc of `radius` around `p` lies strictly inside `bounds`.
 */
export const pointInVoid = (p: Point, bounds: Bounds, radius = 0): boolean =>
  p.x - radius > bounds.minX &&
  p.x + radius < bounds.maxX &&
  p.y - radius > bounds.minY &&
  p.y + radius < bounds.maxY;

export const circleInVoid = (center: Point, diameter: number, bounds: Bounds): boolean =>
  pointInVoid(center, bounds, diameter / 2);

export const hexagonInVoid = (center: Point, flatToFlat: number, bounds: Bounds): boolean =>
  pointInVoid(center, bounds, hexagonCircumradius(flatToFlat));

export interface TubeVoidFilterResult {
  operations: ExpandedOperations;
  skipped: number;
}

/**
 * Drops drill points, circles and hexagons that would only cut air inside a
 * tube. Line paths are never filtered. A drill pattern that loses any point
 * degrades to individually placed points.
 */
export const filterTubeVoids = (
  expanded: ExpandedOperations,
  material: Material,
  drillDiameter: number,
): TubeVoidFilterResult => {
  if (material.form !== 'tube') {
    return { operations: expanded, skipped: 0 };
  }
  const bounds = voidBounds(material.outerWidth, material.outerHeight, material.wallThickness);
  let skipped = 0;

  const drills = expanded.drills.flatMap((group) => {
    const points = group.points.filter((p) => !pointInVoid(p, bounds, drillDiameter / 2));
    skipped += group.points.length - points.length;
    if (points.length === 0) {
      return [];
    }
    return [{ ...group, points, layout: points.length === group.points.length ? group.layout : { kind: 'points' as const } }];
  });
  const circles = expanded.circles.filter((c) => !circleInVoid(c.center, c.diameter, bounds));
  const hexagons = expanded.hexagons.filter((h) => !hexagonInVoid(h.center, h.flatToFlat, bounds));
  skipped += expanded.circles.length - circles.length + expanded.hexagons.length - hexagons.length;

  return { operations: { drills, circles, hexagons, lines: expanded.lines }, skipped };
};
