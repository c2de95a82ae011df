import type { ArcDirection, MachineBounds, Point } from '@toolpath/shared';
import { PADDING_PX, PX_PER_INCH } from './config';

export type PreviewMode = 'feature' | 'toolpath' | 'off';

export const PREVIEW_MODES: readonly PreviewMode[] = ['feature', 'toolpath', 'off'];

export interface Stroke {
  color: string;
  width: number;
  dash?: string;
  opacity?: number;
}

/** Path segments in screen space; arcs carry the flags an SVG arc needs. */
export type PathSegment =
  | { kind: 'line'; to: Point }
  | { kind: 'arc'; to: Point; radius: number; largeArc: boolean; clockwise: boolean };

export type SceneNode =
  | { kind: 'rect'; x: number; y: number; width: number; height: number; fill: string; stroke?: Stroke }
  | { kind: 'line'; from: Point; to: Point; stroke: Stroke }
  | { kind: 'point'; at: Point; radius: number; fill: string; stroke?: Stroke }
  | { kind: 'circle'; center: Point; radius: number; stroke: Stroke }
  | { kind: 'polygon'; points: Point[]; stroke: Stroke }
  | { kind: 'path'; start: Point; segments: PathSegment[]; closed: boolean; stroke: Stroke }
  | {
      kind: 'text';
      at: Point;
      text: string;
      color: string;
      size: number;
      anchor: 'start' | 'middle' | 'end';
      bold?: boolean;
    };

/** Everything in a scene is already in screen pixels, y pointing down. */
export interface Scene {
  width: number;
  height: number;
  background: string;
  nodes: SceneNode[];
}

export interface ScreenTransform {
  scale: number;
  padding: number;
  /** Machine height in inches; the y flip pivots on it. */
  height: number;
}

export const createTransform = (
  bounds: MachineBounds,
  scale = PX_PER_INCH,
  padding = PADDING_PX,
): ScreenTransform => ({ scale, padding, height: bounds.maxY });

export const toScreen = ({ scale, padding, height }: ScreenTransform, p: Point): Point => ({
  x: padding + p.x * scale,
  y: padding + (height - p.y) * scale,
});

export const toScreenLength = ({ scale }: ScreenTransform, inches: number): number => inches * scale;

/**
 * Screen arc from `start` to `end` around `center`, all in machine space.
 * Flipping y keeps the visual turning sense, so a clockwise machine arc is
 * drawn with the clockwise sweep flag.
 */
export const screenArc = (
  transform: ScreenTransform,
  start: Point,
  end: Point,
  center: Point,
  direction: ArcDirection,
  sweepRadians: number,
): PathSegment => ({
  kind: 'arc',
  to: toScreen(transform, end),
  radius: toScreenLength(transform, Math.hypot(start.x - center.x, start.y - center.y)),
  largeArc: sweepRadians > Math.PI,
  clockwise: direction === 'cw',
});
