import { ValidationError } from '@toolpath/shared';

interface Axes {
  x?: number;
  y?: number;
  z?: number;
}

/**
 * One line of output. Every variant carries only numbers, flags or a subroutine
 * path, and `renderBlock` is the only way to turn a block into text, so no
 * comment can reach a program.
 */
export type Block =
  | ({ code: 'G00' } & Axes)
  /** Rapid to machine zero, written with bare integer words. */
  | { code: 'home'; withZ: boolean }
  | ({ code: 'G01'; f?: number } & Axes)
  | ({ code: 'G02' | 'G03'; i: number; j: number; f?: number } & Axes)
  /** Dwell; `p` is passed through as an integer. */
  | { code: 'G04'; p: number }
  /** Inch units and absolute positioning in one line. */
  | { code: 'G20' }
  | { code: 'G90' }
  | { code: 'G91' }
  | { code: 'M03'; s: number }
  | { code: 'M05' }
  | { code: 'M30' }
  | { code: 'M98'; path: string; loops: number }
  | { code: 'M99' }
  | { code: '%' };

/** Characters that would open a comment or break the call syntax. */
const FORBIDDEN_PATH_CHARS = /[();\r\n]/;

export const formatCoordinate = (value: number): string => {
  const text = value.toFixed(4);
  return text === '-0.0000' ? '0.0000' : text;
};

export const formatFeed = (value: number): string => {
  const text = value.toFixed(1);
  return text === '-0.0' ? '0.0' : text;
};

export const formatInteger = (value: number): string => String(Math.round(value));

const axisWords = ({ x, y, z }: Axes): string[] => {
  const words: string[] = [];
  if (x !== undefined) words.push(`X${formatCoordinate(x)}`);
  if (y !== undefined) words.push(`Y${formatCoordinate(y)}`);
  if (z !== undefined) words.push(`Z${formatCoordinate(z)}`);
  return words;
};

const feedWord = (f: number | undefined): string[] => (f === undefined ? [] : [`F${formatFeed(f)}`]);

export const renderBlock = (block: Block): string => {
  switch (block.code) {
    case 'G00':
      return ['G00', ...axisWords(block)].join(' ');
    case 'home':
      return block.withZ ? 'G00 X0 Y0 Z0' : 'G00 X0 Y0';
    case 'G01':
      return ['G01', ...axisWords(block), ...feedWord(block.f)].join(' ');
    case 'G02':
    case 'G03':
      return [
        block.code,
        ...axisWords(block),
        `I${formatCoordinate(block.i)}`,
        `J${formatCoordinate(block.j)}`,
        ...feedWord(block.f),
      ].join(' ');
    case 'G04':
      return `G04 P${formatInteger(block.p)}`;
    case 'G20':
      return 'G20 G90';
    case 'M03':
      return `M03 S${formatInteger(block.s)}`;
    case 'M98':
      if (FORBIDDEN_PATH_CHARS.test(block.path)) {
        throw new ValidationError([`Subroutine path contains a forbidden character: ${JSON.stringify(block.path)}`]);
      }
      return `M98 (-${block.path}) L${formatInteger(block.loops)}`;
    case 'G90':
    case 'G91':
    case 'M05':
    case 'M30':
    case 'M99':
    case '%':
      return block.code;
  }
};

export const renderProgram = (blocks: readonly Block[]): string => blocks.map(renderBlock).join('\n');

export const programHeader = (spindleSpeed: number, warmupSeconds: number, safetyHeight: number): Block[] => [
  { code: 'G20' },
  { code: 'home', withZ: true },
  { code: 'G00', z: safetyHeight },
  { code: 'M03', s: spindleSpeed },
  { code: 'G04', p: warmupSeconds },
];

export const programFooter = (safetyHeight: number): Block[] => [
  { code: 'M05' },
  { code: 'G00', z: safetyHeight },
  { code: 'home', withZ: false },
  { code: 'M30' },
];

export const subroutineEnd = (): Block[] => [{ code: 'M99' }, { code: '%' }];

/** Spaces become underscores, anything else outside [A-Za-z0-9_-] is dropped, 50 characters at most. */
export const sanitizeProjectName = (name: string): string =>
  name.replace(/ /g, '_').replace(/[^a-zA-Z0-9_-]/g, '').slice(0, 50);

/** Absolute controller-side path of a subroutine file, always with backslashes. */
export const subroutinePath = (basePath: string, projectName: string, subroutineNumber: number): string =>
  `${basePath}\\${projectName}\\${subroutineNumber}.nc`.replace(/\//g, '\\');

export const subroutineCall = (
  basePath: string,
  projectName: string,
  subroutineNumber: number,
  loops: number,
): Block => ({ code: 'M98', path: subroutinePath(basePath, projectName, subroutineNumber), loops });
