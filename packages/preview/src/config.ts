// Screen constants
export const PX_PER_INCH = 50;
export const PADDING_PX = 20;
export const GRID_INCH = 1;
export const AXIS_LABEL_EVERY = 5;
export const POINT_RADIUS_PX = 4;
/** Labels sit this far right of and below the point they describe. */
export const LABEL_OFFSET_PX = { x: 8, y: 14 } as const;

export const COLORS = {
  drill: '#2F055A',
  circle: '#5a7a8a',
  hexagon: '#c9a87c',
  line: '#5a8a6e',
  leadIn: '#ff8c00',
  leadInStroke: '#cc7000',
  background: '#f8f9fa',
  grid: '#e9ecef',
  bounds: '#adb5bd',
  materialOutline: '#dee2e6',
  tubeVoidFill: '#e9ecef',
  tubeVoidStroke: '#ced4da',
  axisLabel: '#6c757d',
} as const;

export const DASH = {
  toolpath: '5,3',
  leadIn: '3,2',
  tubeVoid: '4,4',
} as const;
