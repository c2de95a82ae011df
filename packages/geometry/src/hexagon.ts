import type { CompensationMode, Point } from '@toolpath/shared';

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export const hexagonApothem = (flatToFlat: number): number => flatToFlat / 2;

export const hexagonCircumradius = (flatToFlat: number): number => flatToFlat / Math.sqrt(3);

/**
 * Vertices of a point-up hexagon: vertex 0 at the top, then clockwise.
 */
export const hexagonVertices = (center: Point, flatToFlat: number): Point[] => {
  const r = hexagonCircumradius(flatToFlat);
  const vertices: Point[] = [];
  for (let i = 0; i < 6; i++) {
    const angle = Math.PI / 2 - (i * Math.PI) / 3;
    vertices.push({ x: center.x + r * Math.cos(angle), y: center.y + r * Math.sin(angle) });
  }
  return vertices;
};

/**
 * Axis-aligned extent: flats bound x, points bound y.
 */
export const hexagonBounds = (center: Point, flatToFlat: number): Bounds => {
  const apothem = hexagonApothem(flatToFlat);
  const r = hexagonCircumradius(flatToFlat);
  return {
    minX: center.x - apothem,
    minY: center.y - r,
    maxX: center.x + apothem,
    maxY: center.y + r,
  };
};

/**
 * Moves a point along the line to `center` by `amount`. Negative amounts move
 * it away.
 */
export const moveTowards = (p: Point, center: Point, amount: number): Point => {
  const dx = center.x - p.x;
  const dy = center.y - p.y;
  const len = Math.hypot(dx, dy);
  if (len === 0) {
    return { ...p };
  }
  return { x: p.x + (dx / len) * amount, y: p.y + (dy / len) * amount };
};

/**
 * Vertex offset that shifts every flat of a regular hexagon by `toolRadius`:
 * the bisector distance r / sin(60°).
 */
export const hexagonVertexOffset = (toolRadius: number): number => (toolRadius * 2) / Math.sqrt(3);
