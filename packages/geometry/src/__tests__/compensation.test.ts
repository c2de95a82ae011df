import { InvalidGeometryError, type PathPoint } from '@toolpath/shared';
import { compensateLinePath, cutRadius, getCompensationOffset } from '..';

const square: PathPoint[] = [
  { kind: 'start', x: 0, y: 0 },
  { kind: 'straight', x: 1, y: 0 },
  { kind: 'straight', x: 1, y: 1 },
  { kind: 'straight', x: 0, y: 1 },
  { kind: 'straight', x: 0, y: 0 },
];

const expectCorners = (path: PathPoint[], corners: [number, number][]) => {
  expect(path).toHaveLength(corners.length);
  path.forEach((p, i) => {
    expect(p.x).toBeCloseTo(corners[i][0], 10);
    expect(p.y).toBeCloseTo(corners[i][1], 10);
  });
};

describe('compensation', () => {
  describe('getCompensationOffset', () => {
    it('signs the tool radius by mode', () => {
      expect(getCompensationOffset(0.25, 'none')).toBe(0);
      expect(getCompensationOffset(0.25, 'interior')).toBe(-0.125);
      expect(getCompensationOffset(0.25, 'exterior')).toBe(0.125);
    });
  });

  describe('cutRadius', () => {
    it('orders interior < none < exterior', () => {
      expect(cutRadius(1, 0.25, 'interior')).toBe(0.375);
      expect(cutRadius(1, 0.25, 'none')).toBe(0.5);
      expect(cutRadius(1, 0.25, 'exterior')).toBe(0.625);
    });

    it('fails when interior compensation collapses the circle', () => {
      expect(() => cutRadius(0.2, 0.25, 'interior')).toThrow(InvalidGeometryError);
    });
  });

  describe('compensateLinePath', () => {
    it('grows a counter-clockwise square for exterior cuts', () => {
      const path = compensateLinePath(square, 0.25, 'exterior');
      expectCorners(path, [
        [-0.125, -0.125],
        [1.125, -0.125],
        [1.125, 1.125],
        [-0.125, 1.125],
        [-0.125, -0.125],
      ]);
      expect(path.map((p) => p.kind)).toEqual(['start', 'straight', 'straight', 'straight', 'straight']);
    });

    it('shrinks a counter-clockwise square for interior cuts', () => {
      expectCorners(compensateLinePath(square, 0.25, 'interior'), [
        [0.125, 0.125],
        [0.875, 0.125],
        [0.875, 0.875],
        [0.125, 0.875],
        [0.125, 0.125],
      ]);
    });

    it('treats a clockwise square the same way', () => {
      const clockwise = [...square].reverse().map((p, i): PathPoint => ({ kind: i === 0 ? 'start' : 'straight', x: p.x, y: p.y }));
      expectCorners(compensateLinePath(clockwise, 0.25, 'exterior'), [
        [-0.125, -0.125],
        [-0.125, 1.125],
        [1.125, 1.125],
        [1.125, -0.125],
        [-0.125, -0.125],
      ]);
    });

    it('keeps open path ends on their offset segments', () => {
      const path = compensateLinePath(square.slice(0, 3), 0.25, 'interior');
      expectCorners(path, [
        [0, 0.125],
        [0.875, 0.125],
        [0.875, 1],
      ]);
    });

    it('returns a copy when compensation is off', () => {
      const path = compensateLinePath(square, 0.25, 'none');
      expect(path).toEqual(square);
      expect(path).not.toBe(square);
    });

    it('changes arc radius and keeps the arc center', () => {
      const path = compensateLinePath(
        [
          { kind: 'start', x: 1, y: 0 },
          { kind: 'arc', x: -1, y: 0, center: { x: 0, y: 0 }, direction: 'ccw' },
        ],
        0.5,
        'interior',
      );
      expectCorners(path, [
        [0.75, 0],
        [-0.75, 0],
      ]);
      expect(path[1]).toEqual({ kind: 'arc', x: -0.75, y: 0, center: { x: 0, y: 0 }, direction: 'ccw' });
    });

    it('fails when an arc radius would become negative', () => {
      expect(() =>
        compensateLinePath(
          [
            { kind: 'start', x: 1, y: 0 },
            { kind: 'arc', x: -1, y: 0, center: { x: 0, y: 0 }, direction: 'ccw' },
          ],
          2.5,
          'interior',
        ),
      ).toThrow('Arc radius (1.0000) is too small for interior compensation with tool radius 1.2500');
    });

    it('rejects zero-length segments', () => {
      expect(() =>
        compensateLinePath(
          [
            { kind: 'start', x: 0, y: 0 },
            { kind: 'straight', x: 0, y: 0 },
            { kind: 'straight', x: 1, y: 0 },
          ],
          0.25,
          'none',
        ),
      ).toThrow(InvalidGeometryError);
    });
  });
});
