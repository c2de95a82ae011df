export type Inches = number;

export interface Point { x: Inches; y: Inches }

export type Axis = 'x' | 'y';
export type CompensationMode = 'none' | 'interior' | 'exterior';
export type LeadInType = 'helical' | 'ramp' | 'none';
export type ArcDirection = 'cw' | 'ccw';

export type LeadInSpec =
  | { mode: 'auto' }
  | { mode: 'manual'; type: LeadInType; approachAngle: number };

export type PathPoint =
  | { kind: 'start'; x: Inches; y: Inches }
  | { kind: 'straight'; x: Inches; y: Inches }
  | { kind: 'arc'; x: Inches; y: Inches; center: Point; direction?: ArcDirection };

export interface ProfileOptions {
  compensation: CompensationMode;
  leadIn: LeadInSpec;
  /** Dwell at the start of every pass, seconds. */
  holdTime: number;
}

export interface DrillSingleOperation { kind: 'drill-single'; id: string; x: Inches; y: Inches }

export interface DrillLinearOperation {
  kind: 'drill-linear';
  id: string;
  start: Point;
  axis: Axis;
  spacing: Inches;
  count: number;
}

export interface DrillGridOperation {
  kind: 'drill-grid';
  id: string;
  start: Point;
  xSpacing: Inches;
  ySpacing: Inches;
  xCount: number;
  yCount: number;
}

export interface CircleSingleOperation extends ProfileOptions {
  kind: 'circle-single';
  id: string;
  center: Point;
  diameter: Inches;
}

export interface CircleLinearOperation extends ProfileOptions {
  kind: 'circle-linear';
  id: string;
  start: Point;
  axis: Axis;
  spacing: Inches;
  count: number;
  diameter: Inches;
}

export interface HexagonSingleOperation extends ProfileOptions {
  kind: 'hexagon-single';
  id: string;
  center: Point;
  flatToFlat: Inches;
}

export interface HexagonLinearOperation extends ProfileOptions {
  kind: 'hexagon-linear';
  id: string;
  start: Point;
  axis: Axis;
  spacing: Inches;
  count: number;
  flatToFlat: Inches;
}

export interface LinePathOperation extends ProfileOptions {
  kind: 'line-path';
  id: string;
  points: PathPoint[];
}

export type Operation =
  | DrillSingleOperation
  | DrillLinearOperation
  | DrillGridOperation
  | CircleSingleOperation
  | CircleLinearOperation
  | HexagonSingleOperation
  | HexagonLinearOperation
  | LinePathOperation;

export type OperationKind = Operation['kind'];

export const OPERATION_KINDS: readonly OperationKind[] = [
  'drill-single',
  'drill-linear',
  'drill-grid',
  'circle-single',
  'circle-linear',
  'hexagon-single',
  'hexagon-linear',
  'line-path',
];

export interface DrillToolParams {
  spindleSpeed: number;
  feedRate: number;
  plungeRate: number;
  peckingDepth: Inches;
  toolDiameter: Inches;
  /** Extra depth so the drill point clears the stock. */
  tipCompensation?: Inches;
}

export interface CutToolParams {
  spindleSpeed: number;
  feedRate: number;
  plungeRate: number;
  passDepth: Inches;
  toolDiameter: Inches;
}

export type Material =
  | { form: 'sheet'; thickness: Inches }
  | { form: 'tube'; outerWidth: Inches; outerHeight: Inches; wallThickness: Inches };

export interface MachineBounds { maxX: Inches; maxY: Inches }

export interface LeadInDefaults {
  circle: LeadInType;
  hexagon: LeadInType;
  line: LeadInType;
}

export interface GenerationSettings {
  safetyHeight: Inches;
  travelHeight: Inches;
  spindleWarmupSeconds: number;
  /** Explicit ramp length; derived from rampAngle and the pass depth when absent. */
  leadInDistance?: Inches;
  rampAngle: number;
  helixPitch: Inches;
  maxStepdownFactor: number;
  firstPassFeedFactor: number;
  cornerFeedFactor: number;
  arcFeedFactor: number;
  cornerSlowdownEnabled: boolean;
  arcSlowdownEnabled: boolean;
  supportsSubroutines: boolean;
  bounds: MachineBounds;
  allowNegativeCoordinates: boolean;
  cutThroughBuffer: Inches;
  leadInDefaults: LeadInDefaults;
  basePath: string;
}

export interface GenerationRequest {
  projectName: string;
  operations: Operation[];
  material: Material;
  drillTool?: DrillToolParams;
  cutTool?: CutToolParams;
  /** Drop operations that fall entirely inside a tube's hollow. */
  skipTubeVoid?: boolean;
}

export interface SubroutineFile {
  number: number;
  content: string;
}

export interface GenerationResult {
  mainProgram: string;
  subroutines: SubroutineFile[];
  warnings: string[];
}

export type Severity = 'error' | 'warning' | 'info';
export interface Issue {
  code: string;
  severity: Severity;
  message: string;
  operationIndex?: number;
  operationId?: string;
}

export * from './defaults';
export * from './errors';
