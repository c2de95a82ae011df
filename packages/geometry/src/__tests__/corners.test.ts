import type { PathPoint } from '@toolpath/shared';
import { cornerFactors, cornerSeverityFactor, identifyCorners } from '..';

const polyline = (...coords: [number, number][]): PathPoint[] =>
  coords.map(([x, y], i) => ({ kind: i === 0 ? 'start' : 'straight', x, y }));

describe('corners', () => {
  it('bins interior angles into feed factors', () => {
    expect(cornerSeverityFactor(180)).toBe(1);
    expect(cornerSeverityFactor(120)).toBe(1);
    expect(cornerSeverityFactor(119.9)).toBe(0.75);
    expect(cornerSeverityFactor(90)).toBe(0.75);
    expect(cornerSeverityFactor(60)).toBe(0.5);
    expect(cornerSeverityFactor(45)).toBe(0.4);
    expect(cornerSeverityFactor(10)).toBe(0.3);
  });

  it('finds right angles on a square outline', () => {
    const corners = identifyCorners(polyline([0, 0], [1, 0], [1, 1], [0, 1]));
    expect(corners.map((c) => c.index)).toEqual([1, 2]);
    expect(corners[0].angle).toBeCloseTo(90, 8);
    expect(cornerFactors(polyline([0, 0], [1, 0], [1, 1], [0, 1]))).toEqual([1, 0.75, 0.75, 1]);
  });

  it('ignores straight runs and gentle bends', () => {
    expect(identifyCorners(polyline([0, 0], [1, 0], [2, 0]))).toEqual([]);
    expect(identifyCorners(polyline([0, 0], [1, 0], [2, 1]))).toEqual([]);
  });

  it('grades sharp turns and reversals', () => {
    expect(identifyCorners(polyline([0, 0], [1, 0], [0, 1]))[0].severity).toBe(0.4);
    expect(identifyCorners(polyline([0, 0], [1, 0], [0, 0]))[0].severity).toBe(0.3);
  });

  it('uses arc tangents where a segment is an arc', () => {
    const path: PathPoint[] = [
      { kind: 'start', x: 0, y: 0 },
      { kind: 'straight', x: 1, y: 0 },
      { kind: 'arc', x: 2, y: 1, center: { x: 1, y: 1 } },
    ];
    expect(cornerFactors(path)).toEqual([1, 1, 1]);
  });
});
