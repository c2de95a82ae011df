import { arcOffsets, motionCode, pointsEqual } from '@toolpath/geometry';
import type { Axis, CutToolParams, GenerationSettings, Point } from '@toolpath/shared';
import {
  helixFeedSchedule,
  helixRevolutions,
  type CutMove,
  type CutPath,
  type FeedCoordinator,
} from '@toolpath/toolpath';
import type { Block } from './gcode';

/** Relative Y below this is left off a ramp or lead-out line. */
const AXIS_EPSILON = 1e-4;

export interface PassContext {
  tool: CutToolParams;
  settings: GenerationSettings;
  feed: FeedCoordinator;
}

export interface PassPlan {
  index: number;
  /** Depth already reached before this pass (positive, inches below Z0). */
  fromDepth: number;
  step: number;
}

export type BodyMode = 'subroutine' | 'inline';

const round4 = (value: number): number => Number(value.toFixed(4));

const delta = (from: Point, to: Point): Point => ({ x: round4(to.x - from.x), y: round4(to.y - from.y) });

const relativeLine = (d: Point, extra: { z?: number; f?: number }): Block =>
  Math.abs(d.y) < AXIS_EPSILON ? { code: 'G01', x: d.x, ...extra } : { code: 'G01', x: d.x, y: d.y, ...extra };

const dwell = (holdTime: number): Block[] => (holdTime > 0 ? [{ code: 'G04', p: Math.trunc(holdTime * 1000) }] : []);

const cuttingFeed = (ctx: PassContext, passIndex: number, isArc: boolean, cornerSeverity = 1): number =>
  ctx.feed(ctx.tool.feedRate, { passIndex, isArc, cornerSeverity });

/**
 * Blocks that take the tool from the entry point down to the profile start.
 * In subroutine mode Z is relative; circles also keep X/Y relative so one
 * body serves every circle of the same size.
 */
const entryBlocks = (path: CutPath, pass: PassPlan, ctx: PassContext, mode: BodyMode): Block[] => {
  const { entry, entryPoint, profileStart } = path;
  const plunge = ctx.tool.plungeRate;
  const relative = mode === 'subroutine';
  const target = pass.fromDepth + pass.step;

  switch (entry.kind) {
    case 'plunge':
      return [{ code: 'G01', z: relative ? -pass.step : -target, f: plunge }];
    case 'ramp':
      return relative
        ? [relativeLine(delta(entryPoint, profileStart), { z: -pass.step, f: plunge })]
        : [{ code: 'G01', x: profileStart.x, y: profileStart.y, z: -target, f: plunge }];
    case 'helical': {
      const revolutions = helixRevolutions(pass.step, ctx.settings.helixPitch);
      const drop = pass.step / revolutions;
      const feeds = helixFeedSchedule(revolutions, plunge, cuttingFeed(ctx, pass.index, true));
      const { x: i, y: j } = arcOffsets(entryPoint, entry.center);
      const blocks = feeds.map((f, r): Block =>
        relative
          ? { code: 'G02', x: 0, y: 0, z: -drop, i, j, f }
          : { code: 'G02', x: entryPoint.x, y: entryPoint.y, z: -(pass.fromDepth + drop * (r + 1)), i, j, f },
      );
      const { transition } = entry;
      if (transition.kind === 'arc') {
        const offsets = arcOffsets(entryPoint, transition.center);
        const end = relative && path.shape === 'circle' ? delta(entryPoint, profileStart) : profileStart;
        blocks.push({
          code: motionCode(transition.direction),
          x: end.x,
          y: end.y,
          i: offsets.x,
          j: offsets.y,
          f: cuttingFeed(ctx, pass.index, true),
        });
      }
      return blocks;
    }
  }
};

/** Straight transition from a helix onto a polygon; always absolute. */
const transitionBlocks = (path: CutPath, pass: PassPlan, ctx: PassContext): Block[] =>
  path.entry.kind === 'helical' && path.entry.transition.kind === 'line'
    ? [{ code: 'G01', x: path.profileStart.x, y: path.profileStart.y, f: cuttingFeed(ctx, pass.index, false) }]
    : [];

const moveBlocks = (moves: readonly CutMove[], from: Point, passIndex: number, ctx: PassContext): Block[] => {
  let current = from;
  return moves.map((move): Block => {
    switch (move.kind) {
      case 'line':
        current = move.to;
        return { code: 'G01', x: move.to.x, y: move.to.y, f: cuttingFeed(ctx, passIndex, false, move.cornerSeverity) };
      case 'arc': {
        const { x: i, y: j } = arcOffsets(current, move.center);
        current = move.to;
        return {
          code: motionCode(move.direction),
          x: move.to.x,
          y: move.to.y,
          i,
          j,
          f: cuttingFeed(ctx, passIndex, true, move.cornerSeverity),
        };
      }
      case 'circle': {
        const { x: i, y: j } = arcOffsets(current, move.center);
        return { code: motionCode(move.direction), i, j, f: cuttingFeed(ctx, passIndex, true) };
      }
    }
  });
};

const leadOutBlocks = (path: CutPath, pass: PassPlan, ctx: PassContext, mode: BodyMode): Block[] => {
  if (!path.closed || pointsEqual(path.entryPoint, path.profileStart)) {
    return [];
  }
  const f = cuttingFeed(ctx, pass.index, false);
  if (mode === 'subroutine' && path.shape === 'circle') {
    const back = delta(path.entryPoint, path.profileStart);
    return [{ code: 'G91' }, relativeLine({ x: -back.x, y: -back.y }, { f }), { code: 'G90' }];
  }
  return [{ code: 'G01', x: path.entryPoint.x, y: path.entryPoint.y, f }];
};

/** Open paths lift straight up from their last point. */
const retractBlocks = (path: CutPath, ctx: PassContext): Block[] =>
  path.closed ? [] : [{ code: 'G00', z: ctx.settings.travelHeight }];

/**
 * One pass over a cut path. Closed bodies start and end at the entry point
 * at depth, so the caller can repeat them per pass. Open bodies end retracted
 * above their last point and the caller repositions before the next pass.
 */
export const cutPassBlocks = (path: CutPath, pass: PassPlan, ctx: PassContext, mode: BodyMode): Block[] => {
  const profile = [
    ...transitionBlocks(path, pass, ctx),
    ...moveBlocks(path.moves, path.profileStart, pass.index, ctx),
    ...leadOutBlocks(path, pass, ctx, mode),
    ...retractBlocks(path, ctx),
  ];
  if (mode === 'inline') {
    return [...dwell(path.holdTime), ...entryBlocks(path, pass, ctx, mode), ...profile];
  }
  return [{ code: 'G91' }, ...dwell(path.holdTime), ...entryBlocks(path, pass, ctx, mode), { code: 'G90' }, ...profile];
};

/** Peck cycle for one hole in absolute coordinates, starting at Z0. */
export const inlinePeckBlocks = (pecks: readonly number[], plungeRate: number, safetyHeight: number): Block[] =>
  pecks.flatMap((depth, k) => {
    const blocks: Block[] = [
      { code: 'G01', z: -depth, f: plungeRate },
      { code: 'G00', z: safetyHeight },
    ];
    if (k < pecks.length - 1) {
      blocks.push({ code: 'G00', z: 0 });
    }
    return blocks;
  });

/**
 * Drills one hole with relative pecks, then steps to the next hole along
 * `axis`. Called with a loop count to walk a row.
 */
export const drillSubroutineBody = (
  pecks: readonly number[],
  plungeRate: number,
  travelHeight: number,
  axis: Axis,
  spacing: number,
): Block[] => [
  { code: 'G00', z: 0 },
  { code: 'G91' },
  ...pecks.flatMap((depth): Block[] => [
    { code: 'G01', z: -depth, f: plungeRate },
    { code: 'G00', z: depth },
  ]),
  { code: 'G00', z: travelHeight },
  axis === 'x' ? { code: 'G00', x: spacing } : { code: 'G00', y: spacing },
  { code: 'G90' },
];
