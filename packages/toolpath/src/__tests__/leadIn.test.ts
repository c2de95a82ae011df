import { hexagonVertices } from '@toolpath/geometry';
import type { PathPoint } from '@toolpath/shared';
import {
  circleLeadInPoint,
  helixFeedSchedule,
  helixRadiusForCircle,
  helixRadiusForHexagon,
  helixRevolutions,
  hexagonLeadInPoint,
  lineLeadInPoint,
  rampLeadInDistance,
  resolveLeadIn,
} from '..';

const expectPoint = (actual: { x: number; y: number }, x: number, y: number) => {
  expect(actual.x).toBeCloseTo(x, 6);
  expect(actual.y).toBeCloseTo(y, 6);
};

describe('lead-in planner', () => {
  describe('rampLeadInDistance', () => {
    it('derives the run from the ramp angle', () => {
      expect(rampLeadInDistance(45, 0.1)).toBeCloseTo(0.1, 10);
    });

    it('falls back for non-positive inputs', () => {
      expect(rampLeadInDistance(0, 0.05)).toBe(0.25);
      expect(rampLeadInDistance(3, 0)).toBe(0.25);
    });
  });

  it('uses the shape default in auto mode and the request in manual mode', () => {
    expect(resolveLeadIn({ mode: 'auto' }, 'helical')).toEqual({ type: 'helical' });
    expect(resolveLeadIn({ mode: 'manual', type: 'ramp', approachAngle: 180 }, 'helical')).toEqual({
      type: 'ramp',
      approachAngle: 180,
    });
  });

  describe('helix radius', () => {
    it('caps the radius just past the tool radius', () => {
      expect(helixRadiusForCircle(0.375, 0.25, 'interior')).toBeCloseTo(0.15, 10);
    });

    it('returns null when the circle is too small', () => {
      expect(helixRadiusForCircle(0.06, 0.25, 'none')).toBeNull();
    });

    it('spirals outside the cut for exterior circles', () => {
      expect(helixRadiusForCircle(0.5, 0.25, 'exterior')).toBeCloseTo(0.525, 10);
    });

    it('sizes hexagon helices from the apothem or the compensated circumradius', () => {
      expect(helixRadiusForHexagon(1, 0.25, 'interior')).toBeCloseTo(0.15, 10);
      expect(helixRadiusForHexagon(1, 0.25, 'exterior')).toBeCloseTo(1.25 / Math.sqrt(3) + 0.025, 10);
      expect(helixRadiusForHexagon(0.3, 0.25, 'interior')).toBeNull();
    });

    it('rejects a helix capped below the minimum radius by a small tool', () => {
      expect(helixRadiusForCircle(0.234375, 0.03125, 'interior')).toBeNull();
      expect(helixRadiusForHexagon(0.5, 0.03125, 'interior')).toBeNull();
      expect(helixRadiusForHexagon(0.5, 0.03125, 'none')).toBeNull();
    });
  });

  it('counts at least one revolution', () => {
    expect(helixRevolutions(0.125, 0.04)).toBe(4);
    expect(helixRevolutions(0.04, 0.04)).toBe(1);
    expect(helixRevolutions(0.1, 0)).toBe(1);
  });

  it('steps helix feeds from plunge towards the cutting feed', () => {
    expect(helixFeedSchedule(1, 10, 50)).toEqual([40]);
    expect(helixFeedSchedule(2, 10, 50)).toEqual([30, 40]);
    expect(helixFeedSchedule(4, 10, 50)).toEqual([20, 30, 40, 40]);
  });

  it('places the circle lead-in radially outside the profile start', () => {
    expectPoint(circleLeadInPoint({ x: 0, y: 0 }, 0.5, 0.25), 0.75, 0);
    expectPoint(circleLeadInPoint({ x: 0, y: 0 }, 0.5, 0.25, 0), 0, 0.75);
  });

  describe('hexagonLeadInPoint', () => {
    const vertices = hexagonVertices({ x: 0, y: 0 }, Math.sqrt(3));

    it('extends the first edge backwards', () => {
      expectPoint(hexagonLeadInPoint(vertices, 0.5), -0.5 * Math.cos(Math.PI / 6), 1.25);
    });

    it('follows a manual approach angle', () => {
      expectPoint(hexagonLeadInPoint(vertices, 0.5, { center: { x: 0, y: 0 }, approachAngle: 0 }), 0, 1.5);
    });
  });

  describe('lineLeadInPoint', () => {
    const square: PathPoint[] = [
      { kind: 'start', x: 0, y: 0 },
      { kind: 'straight', x: 1, y: 0 },
      { kind: 'straight', x: 1, y: 1 },
      { kind: 'straight', x: 0, y: 1 },
      { kind: 'straight', x: 0, y: 0 },
    ];

    it('extends an open path backwards', () => {
      expectPoint(lineLeadInPoint([{ x: 1, y: 1 }, { x: 2, y: 1 }], 0.5, 'none', false), 0.5, 1);
    });

    it('lets a manual angle override the path direction', () => {
      expectPoint(lineLeadInPoint([{ x: 1, y: 1 }, { x: 2, y: 1 }], 0.5, 'none', false, 180), 1, 0.5);
    });

    it('enters closed compensated paths from the waste side', () => {
      expectPoint(lineLeadInPoint(square, 0.5, 'interior', true), 0, 0.5);
      expectPoint(lineLeadInPoint(square, 0.5, 'exterior', true), 0, -0.5);
    });
  });
});
