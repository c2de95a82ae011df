import type {
  CutToolParams,
  DrillToolParams,
  GenerationSettings,
  Issue,
  LeadInType,
  Operation,
} from '@toolpath/shared';

export interface ToolingContext {
  operations: readonly Operation[];
  drillTool?: DrillToolParams;
  cutTool?: CutToolParams;
  settings: GenerationSettings;
}

export type ToolingRule = (context: ToolingContext) => Issue[];

const isDrill = (operation: Operation) => operation.kind.startsWith('drill-');

const defaultLeadIn = (operation: Operation, settings: GenerationSettings): LeadInType | null => {
  switch (operation.kind) {
    case 'circle-single':
    case 'circle-linear':
      return settings.leadInDefaults.circle;
    case 'hexagon-single':
    case 'hexagon-linear':
      return settings.leadInDefaults.hexagon;
    case 'line-path':
      return settings.leadInDefaults.line;
    default:
      return null;
  }
};

export const ruleToolsPresent: ToolingRule = ({ operations, drillTool, cutTool }) => {
  const issues: Issue[] = [];
  if (!drillTool && operations.some(isDrill)) {
    issues.push({ code: 'MISSING_TOOL', severity: 'error', message: 'Drill operations need drill tool parameters' });
  }
  if (!cutTool && operations.some((o) => !isDrill(o))) {
    issues.push({ code: 'MISSING_TOOL', severity: 'error', message: 'Profile operations need cut tool parameters' });
  }
  return issues;
};

const positiveFields = (label: string, tool: CutToolParams | DrillToolParams): Issue[] =>
  (['spindleSpeed', 'feedRate', 'plungeRate', 'toolDiameter'] as const)
    .filter((field) => !(tool[field] > 0))
    .map((field) => ({
      code: 'INVALID_TOOL',
      severity: 'error' as const,
      message: `${label} ${field} must be positive, got ${tool[field]}`,
    }));

export const ruleToolValues: ToolingRule = ({ drillTool, cutTool }) => [
  ...(drillTool ? positiveFields('Drill tool', drillTool) : []),
  ...(cutTool ? positiveFields('Cut tool', cutTool) : []),
];

/**
 * A pass deeper than the tool is wide is an error; anything past
 * `maxStepdownFactor` of the diameter is a warning.
 */
export const ruleStepdown: ToolingRule = ({ cutTool, settings }) => {
  if (!cutTool || !(cutTool.passDepth > 0) || !(cutTool.toolDiameter > 0)) {
    return [];
  }
  const { passDepth, toolDiameter } = cutTool;
  const ratio = passDepth / toolDiameter;
  if (passDepth > toolDiameter) {
    return [
      {
        code: 'STEPDOWN_EXCEEDS_TOOL',
        severity: 'error',
        message:
          `Pass depth (${passDepth.toFixed(4)}") exceeds tool diameter (${toolDiameter.toFixed(4)}"). ` +
          'This will almost certainly break the end mill. Reduce pass depth.',
      },
    ];
  }
  if (ratio > settings.maxStepdownFactor) {
    return [
      {
        code: 'AGGRESSIVE_STEPDOWN',
        severity: 'warning',
        message:
          `Pass depth (${passDepth.toFixed(4)}") is ${(ratio * 100).toFixed(0)}% of tool diameter (${toolDiameter.toFixed(4)}"). ` +
          `Recommended maximum is ${(settings.maxStepdownFactor * 100).toFixed(0)}%. ` +
          'Consider reducing pass depth to avoid tool breakage.',
      },
    ];
  }
  return [];
};

export const ruleFeedRates: ToolingRule = ({ cutTool }) =>
  cutTool && cutTool.plungeRate > cutTool.feedRate
    ? [
        {
          code: 'PLUNGE_EXCEEDS_FEED',
          severity: 'warning',
          message:
            `Plunge rate (${cutTool.plungeRate} in/min) exceeds feed rate (${cutTool.feedRate} in/min). ` +
            'Verify this is intentional for your material and tool.',
        },
      ]
    : [];

export const ruleLeadInDisabled: ToolingRule = ({ operations, settings }) =>
  operations.flatMap((operation, index): Issue[] => {
    const fallback = defaultLeadIn(operation, settings);
    if (fallback === null || !('leadIn' in operation)) {
      return [];
    }
    const type = operation.leadIn.mode === 'manual' ? operation.leadIn.type : fallback;
    return type === 'none'
      ? [
          {
            code: 'LEAD_IN_DISABLED',
            severity: 'warning',
            message: 'Lead-in disabled; the tool plunges vertically at the profile start',
            operationIndex: index,
            operationId: operation.id,
          },
        ]
      : [];
  });

export const runAllToolingRules: ToolingRule = (context) => [
  ...ruleToolsPresent(context),
  ...ruleToolValues(context),
  ...ruleStepdown(context),
  ...ruleFeedRates(context),
  ...ruleLeadInDisabled(context),
];
