import { arcDirection, arcSweep, isClosedPath, voidBounds } from '@toolpath/geometry';
import type { MachineBounds, Material, PathPoint, Point } from '@toolpath/shared';
import type { PreparedGeometry } from '@toolpath/toolpath';
import {
  AXIS_LABEL_EVERY,
  COLORS,
  DASH,
  GRID_INCH,
  LABEL_OFFSET_PX,
  POINT_RADIUS_PX,
  PX_PER_INCH,
  PADDING_PX,
} from './config';
import {
  createTransform,
  screenArc,
  toScreen,
  toScreenLength,
  type PathSegment,
  type PreviewMode,
  type Scene,
  type SceneNode,
  type ScreenTransform,
  type Stroke,
} from './scene';

/** Where the tool enters and where it meets the profile. */
export interface LeadInMarker {
  entryPoint: Point;
  profileStart: Point;
}

export interface PreviewOptions {
  bounds: MachineBounds;
  material: Material;
  leadIns?: readonly LeadInMarker[];
  scale?: number;
  padding?: number;
}

const featureStroke = (color: string): Stroke => ({ color, width: 2 });
const toolpathStroke = (color: string): Stroke => ({ color, width: 1.5, dash: DASH.toolpath, opacity: 0.7 });

export const formatPoint = (p: Point): string => `(${p.x.toFixed(3)}, ${p.y.toFixed(3)})`;

const label = (t: ScreenTransform, p: Point, text: string, color: string): SceneNode => {
  const at = toScreen(t, p);
  return {
    kind: 'text',
    at: { x: at.x + LABEL_OFFSET_PX.x, y: at.y + LABEL_OFFSET_PX.y },
    text,
    color,
    size: 11,
    anchor: 'start',
  };
};

const sequence = (at: Point, n: number, color: string): SceneNode => ({
  kind: 'text',
  at: { x: at.x, y: at.y + 5 },
  text: String(n),
  color,
  size: 16,
  anchor: 'middle',
  bold: true,
});

export const pathNode = (t: ScreenTransform, points: readonly PathPoint[], stroke: Stroke): SceneNode => {
  const segments: PathSegment[] = [];
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1];
    const p = points[i];
    if (p.kind === 'arc') {
      const direction = arcDirection(prev, p, p.center, p.direction);
      segments.push(screenArc(t, prev, p, p.center, direction, arcSweep(prev, p, p.center, direction)));
    } else {
      segments.push({ kind: 'line', to: toScreen(t, p) });
    }
  }
  return {
    kind: 'path',
    start: toScreen(t, points[0]),
    segments,
    closed: points.length > 2 && isClosedPath(points),
    stroke,
  };
};

const gridNodes = (t: ScreenTransform, bounds: MachineBounds): SceneNode[] => {
  const nodes: SceneNode[] = [];
  const stroke: Stroke = { color: COLORS.grid, width: 1 };
  for (let x = GRID_INCH; x < bounds.maxX; x += GRID_INCH) {
    nodes.push({ kind: 'line', from: toScreen(t, { x, y: 0 }), to: toScreen(t, { x, y: bounds.maxY }), stroke });
  }
  for (let y = GRID_INCH; y < bounds.maxY; y += GRID_INCH) {
    nodes.push({ kind: 'line', from: toScreen(t, { x: 0, y }), to: toScreen(t, { x: bounds.maxX, y }), stroke });
  }
  return nodes;
};

const axisLabels = (t: ScreenTransform, bounds: MachineBounds): SceneNode[] => {
  const nodes: SceneNode[] = [];
  const base = toScreen(t, { x: 0, y: 0 });
  for (let x = 0; x <= bounds.maxX; x += AXIS_LABEL_EVERY) {
    nodes.push({
      kind: 'text',
      at: { x: toScreen(t, { x, y: 0 }).x, y: base.y + 14 },
      text: String(x),
      color: COLORS.axisLabel,
      size: 10,
      anchor: 'middle',
    });
  }
  for (let y = AXIS_LABEL_EVERY; y <= bounds.maxY; y += AXIS_LABEL_EVERY) {
    nodes.push({
      kind: 'text',
      at: { x: base.x - 4, y: toScreen(t, { x: 0, y }).y + 4 },
      text: String(y),
      color: COLORS.axisLabel,
      size: 10,
      anchor: 'end',
    });
  }
  return nodes;
};

/** Screen rectangle spanning two machine corners. */
const rectBetween = (t: ScreenTransform, min: Point, max: Point) => {
  const topLeft = toScreen(t, { x: min.x, y: max.y });
  return {
    x: topLeft.x,
    y: topLeft.y,
    width: toScreenLength(t, max.x - min.x),
    height: toScreenLength(t, max.y - min.y),
  };
};

const materialNodes = (t: ScreenTransform, material: Material): SceneNode[] => {
  if (material.form !== 'tube') {
    return [];
  }
  const hollow = voidBounds(material.outerWidth, material.outerHeight, material.wallThickness);
  return [
    {
      kind: 'rect',
      ...rectBetween(t, { x: 0, y: 0 }, { x: material.outerWidth, y: material.outerHeight }),
      fill: 'none',
      stroke: { color: COLORS.materialOutline, width: 2 },
    },
    {
      kind: 'rect',
      ...rectBetween(t, { x: hollow.minX, y: hollow.minY }, { x: hollow.maxX, y: hollow.maxY }),
      fill: COLORS.tubeVoidFill,
      stroke: { color: COLORS.tubeVoidStroke, width: 1, dash: DASH.tubeVoid },
    },
  ];
};

const leadInNodes = (t: ScreenTransform, marker: LeadInMarker): SceneNode[] => [
  {
    kind: 'line',
    from: toScreen(t, marker.entryPoint),
    to: toScreen(t, marker.profileStart),
    stroke: { color: COLORS.leadIn, width: 2, dash: DASH.leadIn },
  },
  {
    kind: 'point',
    at: toScreen(t, marker.entryPoint),
    radius: POINT_RADIUS_PX,
    fill: COLORS.leadIn,
    stroke: { color: COLORS.leadInStroke, width: 1 },
  },
];

const centroid = (points: readonly Point[]): Point => ({
  x: points.reduce((sum, p) => sum + p.x, 0) / points.length,
  y: points.reduce((sum, p) => sum + p.y, 0) / points.length,
});

/**
 * Projects prepared geometry into a screen-space scene.
 *
 * Features are numbered in emission order (drills, circles, hexagons, lines).
 * `feature` labels the nominal geometry, `toolpath` the compensated path the
 * tool center follows, and `off` draws no coordinate labels. Compensated
 * outlines are dashed and only drawn when an operation asks for compensation.
 */
export const renderPreview = (
  geometry: PreparedGeometry,
  mode: PreviewMode,
  options: PreviewOptions,
): Scene => {
  const { bounds, material } = options;
  const t = createTransform(bounds, options.scale ?? PX_PER_INCH, options.padding ?? PADDING_PX);
  const nodes: SceneNode[] = [
    {
      kind: 'rect',
      ...rectBetween(t, { x: 0, y: 0 }, { x: bounds.maxX, y: bounds.maxY }),
      fill: 'none',
      stroke: { color: COLORS.bounds, width: 1 },
    },
    ...gridNodes(t, bounds),
    ...axisLabels(t, bounds),
    ...materialNodes(t, material),
  ];
  const labels: SceneNode[] = [];
  let seq = 1;

  for (const group of geometry.drills) {
    for (const p of group.points) {
      const at = toScreen(t, p);
      nodes.push({ kind: 'point', at, radius: POINT_RADIUS_PX, fill: COLORS.drill });
      nodes.push(sequence({ x: at.x, y: at.y - 14 }, seq++, COLORS.drill));
      if (mode !== 'off') {
        labels.push(label(t, p, formatPoint(p), COLORS.drill));
      }
    }
  }

  for (const circle of geometry.circles) {
    const center = toScreen(t, circle.center);
    nodes.push({
      kind: 'circle',
      center,
      radius: toScreenLength(t, circle.diameter / 2),
      stroke: featureStroke(COLORS.circle),
    });
    if (circle.compensation !== 'none') {
      nodes.push({
        kind: 'circle',
        center,
        radius: toScreenLength(t, circle.cutRadius),
        stroke: toolpathStroke(COLORS.circle),
      });
    }
    nodes.push(sequence(center, seq++, COLORS.circle));
    if (mode === 'feature') {
      labels.push(label(t, circle.center, `${formatPoint(circle.center)} d=${circle.diameter.toFixed(3)}`, COLORS.circle));
    } else if (mode === 'toolpath') {
      labels.push(label(t, circle.center, `${formatPoint(circle.center)} r=${circle.cutRadius.toFixed(3)}`, COLORS.circle));
    }
  }

  for (const hexagon of geometry.hexagons) {
    nodes.push({
      kind: 'polygon',
      points: hexagon.vertices.map((v) => toScreen(t, v)),
      stroke: featureStroke(COLORS.hexagon),
    });
    if (hexagon.compensation !== 'none') {
      nodes.push({
        kind: 'polygon',
        points: hexagon.toolpath.map((v) => toScreen(t, v)),
        stroke: toolpathStroke(COLORS.hexagon),
      });
    }
    nodes.push(sequence(toScreen(t, hexagon.center), seq++, COLORS.hexagon));
    if (mode === 'feature') {
      labels.push(
        label(t, hexagon.center, `${formatPoint(hexagon.center)} f2f=${hexagon.flatToFlat.toFixed(3)}`, COLORS.hexagon),
      );
    } else if (mode === 'toolpath') {
      labels.push(...hexagon.toolpath.map((v) => label(t, v, formatPoint(v), COLORS.hexagon)));
    }
  }

  for (const line of geometry.lines) {
    if (line.points.length === 0) {
      continue;
    }
    nodes.push(pathNode(t, line.points, featureStroke(COLORS.line)));
    if (line.compensation !== 'none') {
      nodes.push(pathNode(t, line.toolpath, toolpathStroke(COLORS.line)));
    }
    nodes.push(sequence(toScreen(t, centroid(line.points)), seq++, COLORS.line));
    const shown: readonly PathPoint[] = mode === 'toolpath' ? line.toolpath : mode === 'feature' ? line.points : [];
    labels.push(...shown.map((p) => label(t, p, formatPoint(p), COLORS.line)));
  }

  for (const marker of options.leadIns ?? []) {
    nodes.push(...leadInNodes(t, marker));
  }

  return {
    width: toScreenLength(t, bounds.maxX) + 2 * t.padding,
    height: toScreenLength(t, bounds.maxY) + 2 * t.padding,
    background: COLORS.background,
    nodes: [...nodes, ...labels],
  };
};
