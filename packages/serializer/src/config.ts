import type { GenerationRequest, GenerationSettings, Material } from '@toolpath/shared';

const RULE = '='.repeat(60);
const SECTION = '-'.repeat(40);

const section = (title: string, rows: readonly string[]): string[] => [SECTION, title, SECTION, ...rows, ''];

const materialRows = (material: Material): string[] =>
  material.form === 'sheet'
    ? ['Form: sheet', `Thickness: ${material.thickness} in`]
    : [
        'Form: tube',
        `Outer Width: ${material.outerWidth} in`,
        `Outer Height: ${material.outerHeight} in`,
        `Wall Thickness: ${material.wallThickness} in`,
      ];

const countByKind = (request: GenerationRequest): string[] => {
  const counts = new Map<string, number>();
  for (const operation of request.operations) {
    counts.set(operation.kind, (counts.get(operation.kind) ?? 0) + 1);
  }
  return [...counts.entries()].map(([kind, count]) => `${kind}: ${count}`);
};

/**
 * Human-readable record of the inputs behind a generated package, written
 * next to the programs as config.txt.
 */
export const formatConfig = (
  request: GenerationRequest,
  settings: GenerationSettings,
  projectName: string,
  generatedAt: Date,
): string => {
  const { drillTool, cutTool } = request;
  const lines = [
    RULE,
    'G-CODE GENERATION CONFIG',
    `Generated: ${generatedAt.toISOString()}`,
    RULE,
    '',
    ...section('PROJECT', [`Name: ${projectName}`, `Tube Void Skip: ${request.skipTubeVoid ?? false}`]),
    ...section('MATERIAL', materialRows(request.material)),
  ];
  if (drillTool) {
    lines.push(
      ...section('DRILL TOOL', [
        `Size: ${drillTool.toolDiameter} in`,
        `Spindle Speed: ${drillTool.spindleSpeed} RPM`,
        `Plunge Rate: ${drillTool.plungeRate} in/min`,
        `Pecking Depth: ${drillTool.peckingDepth} in`,
        ...(drillTool.tipCompensation ? [`Tip Compensation: ${drillTool.tipCompensation} in`] : []),
      ]),
    );
  }
  if (cutTool) {
    lines.push(
      ...section('CUT TOOL', [
        `Size: ${cutTool.toolDiameter} in`,
        `Spindle Speed: ${cutTool.spindleSpeed} RPM`,
        `Feed Rate: ${cutTool.feedRate} in/min`,
        `Plunge Rate: ${cutTool.plungeRate} in/min`,
        `Pass Depth: ${cutTool.passDepth} in`,
      ]),
    );
  }
  lines.push(
    ...section('MACHINE SETTINGS', [
      `Max X: ${settings.bounds.maxX} in`,
      `Max Y: ${settings.bounds.maxY} in`,
      `Supports Subroutines: ${settings.supportsSubroutines}`,
      `Allow Negative Coordinates: ${settings.allowNegativeCoordinates}`,
      `Base Path: ${settings.basePath}`,
    ]),
    ...section('GENERAL SETTINGS', [
      `Safety Height: ${settings.safetyHeight} in`,
      `Travel Height: ${settings.travelHeight} in`,
      `Spindle Warmup: ${settings.spindleWarmupSeconds} s`,
      `Ramp Angle: ${settings.rampAngle} deg`,
      `Helix Pitch: ${settings.helixPitch} in`,
      `First Pass Feed Factor: ${settings.firstPassFeedFactor}`,
      `Corner Slowdown: ${settings.cornerSlowdownEnabled} (${settings.cornerFeedFactor})`,
      `Arc Slowdown: ${settings.arcSlowdownEnabled} (${settings.arcFeedFactor})`,
      `Cut Through Buffer: ${settings.cutThroughBuffer} in`,
    ]),
    ...section('OPERATIONS', countByKind(request)),
    RULE,
    'END CONFIG',
    RULE,
  );
  return lines.join('\n');
};
