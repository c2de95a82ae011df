import { materialDepth, passDepths, planPasses, type DrillGroup, type Pass } from '@toolpath/geometry';
import { errorsOf, operationIssues, runAllToolingRules, warningsOf } from '@toolpath/rules';
import {
  ValidationError,
  type CutToolParams,
  type DrillToolParams,
  type GenerationRequest,
  type GenerationResult,
  type GenerationSettings,
} from '@toolpath/shared';
import {
  buildCutPaths,
  createFeedCoordinator,
  prepareGeometry,
  resolveLeadInDistance,
  type CutContext,
  type CutPath,
} from '@toolpath/toolpath';
import { cutPassBlocks, drillSubroutineBody, inlinePeckBlocks, type PassContext } from './bodies';
import { programFooter, programHeader, renderProgram, sanitizeProjectName, subroutineCall, type Block } from './gcode';
import { SubroutineRegistry, type SubroutineKind } from './subroutines';

/** Peck depth used when the drill parameters give none. */
export const DEFAULT_PECK_DEPTH = 0.05;

interface Assembly {
  settings: GenerationSettings;
  projectName: string;
  registry: SubroutineRegistry | null;
}

const requireTool = <T>(tool: T | undefined, message: string): T => {
  if (tool === undefined) {
    throw new ValidationError([message]);
  }
  return tool;
};

const call = ({ settings, projectName }: Assembly, number: number, loops: number): Block =>
  subroutineCall(settings.basePath, projectName, number, loops);

const drillBlocks = (groups: readonly DrillGroup[], tool: DrillToolParams, depth: number, assembly: Assembly): Block[] => {
  const { settings, registry } = assembly;
  const pecks = passDepths(depth, tool.peckingDepth > 0 ? tool.peckingDepth : DEFAULT_PECK_DEPTH);
  const blocks: Block[] = [];

  const inline = (group: DrillGroup) => {
    for (const p of group.points) {
      blocks.push({ code: 'G00', x: p.x, y: p.y, z: settings.travelHeight }, { code: 'G00', z: 0 });
      blocks.push(...inlinePeckBlocks(pecks, tool.plungeRate, settings.safetyHeight));
    }
  };

  for (const group of groups) {
    const { layout } = group;
    if (!registry || group.points.length < 2 || layout.kind === 'points') {
      inline(group);
      continue;
    }
    const [start] = group.points;
    if (layout.kind === 'linear') {
      const number = registry.register(
        'drill',
        drillSubroutineBody(pecks, tool.plungeRate, settings.travelHeight, layout.axis, layout.spacing),
      );
      blocks.push({ code: 'G00', x: start.x, y: start.y, z: settings.travelHeight }, call(assembly, number, layout.count));
      continue;
    }
    const number = registry.register(
      'drill',
      drillSubroutineBody(pecks, tool.plungeRate, settings.travelHeight, 'x', layout.xSpacing),
    );
    for (let row = 0; row < layout.yCount; row++) {
      blocks.push(
        { code: 'G00', x: start.x, y: start.y + row * layout.ySpacing, z: settings.travelHeight },
        call(assembly, number, layout.xCount),
      );
    }
  }
  return blocks;
};

/**
 * Open paths retract at their last point after every pass, so each pass is
 * repositioned at the entry and descends from Z0 to its own depth. Every
 * depth gets its own body.
 */
const openPathBlocks = (
  path: CutPath,
  passes: readonly Pass[],
  ctx: PassContext,
  assembly: Assembly,
  position: readonly Block[],
): Block[] =>
  passes.flatMap((pass) => {
    const plan = { index: pass.index, fromDepth: 0, step: pass.depth };
    if (!assembly.registry) {
      return [...position, ...cutPassBlocks(path, plan, ctx, 'inline')];
    }
    const number = assembly.registry.register(path.shape, cutPassBlocks(path, plan, ctx, 'subroutine'));
    return [...position, call(assembly, number, 1)];
  });

/**
 * Emits one cut path with all its passes. With subroutines the first pass
 * gets its own body only when its feeds differ from the steady passes.
 */
const cutBlocks = (path: CutPath, depth: number, ctx: PassContext, assembly: Assembly): Block[] => {
  const { settings, registry } = assembly;
  const passes = planPasses(depth, ctx.tool.passDepth);
  const position: Block[] = [
    { code: 'G00', x: path.entryPoint.x, y: path.entryPoint.y, z: settings.travelHeight },
    { code: 'G00', z: 0 },
  ];
  if (!path.closed) {
    return [...openPathBlocks(path, passes, ctx, assembly, position), { code: 'G00', z: settings.safetyHeight }];
  }
  const blocks = [...position];

  if (registry) {
    const kind: SubroutineKind = path.shape;
    const pass = (index: number) => ({ index, fromDepth: 0, step: passes[0].step });
    const first = registry.register(kind, cutPassBlocks(path, pass(0), ctx, 'subroutine'));
    const steady = passes.length > 1 ? registry.register(kind, cutPassBlocks(path, pass(1), ctx, 'subroutine')) : first;
    if (steady === first) {
      blocks.push(call(assembly, first, passes.length));
    } else {
      blocks.push(call(assembly, first, 1), call(assembly, steady, passes.length - 1));
    }
  } else {
    for (const pass of passes) {
      const plan = { index: pass.index, fromDepth: pass.depth - pass.step, step: pass.step };
      blocks.push(...cutPassBlocks(path, plan, ctx, 'inline'));
    }
  }

  blocks.push({ code: 'G00', z: settings.safetyHeight });
  return blocks;
};

/**
 * Turns a request into a main program and its subroutine files.
 *
 * Emission order is drills, circles, hexagons, then lines. Any blocking
 * issue aborts the whole request before text is produced.
 *
 * @throws ValidationError for out-of-bounds or malformed operations and missing tools.
 * @throws InvalidGeometryError when compensation leaves no room for the tool.
 */
export const generateProgram = (request: GenerationRequest, settings: GenerationSettings): GenerationResult => {
  const { operations, material, drillTool, cutTool } = request;
  const issues = [
    ...operationIssues(operations, settings.bounds, {
      allowNegativeCoordinates: settings.allowNegativeCoordinates,
      toolDiameter: cutTool?.toolDiameter,
    }),
    ...runAllToolingRules({ operations, drillTool, cutTool, settings }),
  ];
  const errors = errorsOf(issues);
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  const warnings = warningsOf(issues);

  const geometry = prepareGeometry(operations, material, {
    cutToolDiameter: cutTool?.toolDiameter ?? 0,
    drillToolDiameter: drillTool?.toolDiameter ?? 0,
    skipTubeVoid: request.skipTubeVoid ?? false,
  });
  if (geometry.skipped > 0) {
    warnings.push(`Skipped ${geometry.skipped} feature(s) inside the tube void`);
  }

  const assembly: Assembly = {
    settings,
    projectName: sanitizeProjectName(request.projectName),
    registry: settings.supportsSubroutines ? new SubroutineRegistry() : null,
  };
  const hasDrills = geometry.drills.length > 0;
  const hasCuts = geometry.circles.length + geometry.hexagons.length + geometry.lines.length > 0;
  const drill = hasDrills ? requireTool(drillTool, 'Drill operations need drill tool parameters') : undefined;
  const cut: CutToolParams | undefined = hasCuts ? requireTool(cutTool, 'Profile operations need cut tool parameters') : undefined;
  const spindle = drill?.spindleSpeed ?? cut?.spindleSpeed ?? 0;

  const body: Block[] = [];
  if (drill) {
    body.push(...drillBlocks(geometry.drills, drill, materialDepth(material) + (drill.tipCompensation ?? 0), assembly));
  }
  if (cut) {
    if (cut.spindleSpeed !== spindle) {
      body.push({ code: 'M03', s: cut.spindleSpeed });
    }
    const depth = materialDepth(material) + settings.cutThroughBuffer;
    const [firstPass] = planPasses(depth, cut.passDepth);
    const context: CutContext = { settings, tool: cut, leadInDistance: resolveLeadInDistance(settings, firstPass.step) };
    const passContext: PassContext = { settings, tool: cut, feed: createFeedCoordinator(settings) };
    for (const build of buildCutPaths(geometry, context)) {
      warnings.push(...build.warnings);
      body.push(...cutBlocks(build.path, depth, passContext, assembly));
    }
  }

  return {
    mainProgram: renderProgram([
      ...programHeader(spindle, settings.spindleWarmupSeconds, settings.safetyHeight),
      ...body,
      ...programFooter(settings.safetyHeight),
    ]),
    subroutines: assembly.registry?.files() ?? [],
    warnings,
  };
};
