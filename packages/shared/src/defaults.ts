import type { GenerationSettings } from './index';

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  safetyHeight: 0.5,
  travelHeight: 0.25,
  spindleWarmupSeconds: 2,
  rampAngle: 3,
  helixPitch: 0.04,
  maxStepdownFactor: 0.5,
  firstPassFeedFactor: 0.7,
  cornerFeedFactor: 0.5,
  arcFeedFactor: 0.8,
  cornerSlowdownEnabled: true,
  arcSlowdownEnabled: true,
  supportsSubroutines: true,
  bounds: { maxX: 15, maxY: 15 },
  allowNegativeCoordinates: false,
  cutThroughBuffer: 0,
  leadInDefaults: { circle: 'helical', hexagon: 'helical', line: 'ramp' },
  basePath: 'C:\\Mach3\\GCode',
};

/** Fallback stock thickness when a material record carries none. */
export const DEFAULT_MATERIAL_DEPTH = 0.125;

/**
 * Builds the settings value for one generation run.
 * Nested objects are merged one level deep.
 */
export const createGenerationSettings = (
  overrides: Partial<GenerationSettings> = {},
): GenerationSettings => ({
  ...DEFAULT_GENERATION_SETTINGS,
  ...overrides,
  bounds: { ...DEFAULT_GENERATION_SETTINGS.bounds, ...overrides.bounds },
  leadInDefaults: { ...DEFAULT_GENERATION_SETTINGS.leadInDefaults, ...overrides.leadInDefaults },
});
