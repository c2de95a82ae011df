import { createGenerationSettings, type CircleSingleOperation, type CutToolParams, type Operation } from '@toolpath/shared';
import { runAllToolingRules, ruleFeedRates, ruleLeadInDisabled, ruleStepdown, ruleToolsPresent, warningsOf } from '..';

const settings = createGenerationSettings();
const cutTool: CutToolParams = { spindleSpeed: 18000, feedRate: 40, plungeRate: 10, passDepth: 0.05, toolDiameter: 0.25 };
const circle: CircleSingleOperation = {
  kind: 'circle-single',
  id: 'c',
  center: { x: 1, y: 1 },
  diameter: 0.5,
  compensation: 'interior',
  leadIn: { mode: 'auto' },
  holdTime: 0,
};

describe('tooling rules', () => {
  it('is quiet for a sensible setup', () => {
    expect(runAllToolingRules({ operations: [circle], cutTool, settings })).toEqual([]);
  });

  it('requires the tool each operation family uses', () => {
    const issues = ruleToolsPresent({ operations: [{ kind: 'drill-single', id: 'd', x: 1, y: 1 }, circle], settings });
    expect(issues.map((i) => i.message)).toEqual([
      'Drill operations need drill tool parameters',
      'Profile operations need cut tool parameters',
    ]);
  });

  it('blocks a pass deeper than the tool is wide', () => {
    const [issue] = ruleStepdown({ operations: [circle], cutTool: { ...cutTool, passDepth: 0.3 }, settings });
    expect(issue.severity).toBe('error');
    expect(issue.message).toBe(
      'Pass depth (0.3000") exceeds tool diameter (0.2500"). This will almost certainly break the end mill. Reduce pass depth.',
    );
  });

  it('warns about a stepdown past the configured fraction', () => {
    const issues = ruleStepdown({ operations: [circle], cutTool: { ...cutTool, passDepth: 0.2 }, settings });
    expect(warningsOf(issues)).toEqual([
      'Pass depth (0.2000") is 80% of tool diameter (0.2500"). Recommended maximum is 50%. ' +
        'Consider reducing pass depth to avoid tool breakage.',
    ]);
  });

  it('warns when plunging faster than feeding', () => {
    const issues = ruleFeedRates({ operations: [circle], cutTool: { ...cutTool, plungeRate: 60 }, settings });
    expect(warningsOf(issues)).toEqual([
      'Plunge rate (60 in/min) exceeds feed rate (40 in/min). Verify this is intentional for your material and tool.',
    ]);
  });

  it('warns about profiles without a lead-in', () => {
    const manual: Operation = { ...circle, leadIn: { mode: 'manual', type: 'none', approachAngle: 90 } };
    const noLineLeadIn = createGenerationSettings({ leadInDefaults: { circle: 'helical', hexagon: 'helical', line: 'none' } });
    const line: Operation = {
      kind: 'line-path',
      id: 'l',
      compensation: 'none',
      leadIn: { mode: 'auto' },
      holdTime: 0,
      points: [
        { kind: 'start', x: 0, y: 0 },
        { kind: 'straight', x: 1, y: 0 },
      ],
    };
    expect(warningsOf(ruleLeadInDisabled({ operations: [circle, manual, line], settings: noLineLeadIn }))).toEqual([
      'operations[1]: Lead-in disabled; the tool plunges vertically at the profile start',
      'operations[2]: Lead-in disabled; the tool plunges vertically at the profile start',
    ]);
  });
});
