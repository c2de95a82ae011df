import { compensatedHexagonVertices, hexagonBounds, hexagonVertices } from '..';

describe('hexagon', () => {
  const center = { x: 2, y: 3 };

  it('places vertex 0 at the top and proceeds clockwise', () => {
    const [v0, v1] = hexagonVertices({ x: 0, y: 0 }, Math.sqrt(3));
    expect(v0.x).toBeCloseTo(0, 10);
    expect(v0.y).toBeCloseTo(1, 10);
    expect(v1.x).toBeCloseTo(Math.sqrt(3) / 2, 10);
    expect(v1.y).toBeCloseTo(0.5, 10);
  });

  it('is point-symmetric about the center with 60° between neighbours', () => {
    const vertices = hexagonVertices(center, 1.5);
    for (let i = 0; i < 3; i++) {
      expect(vertices[i].x + vertices[i + 3].x).toBeCloseTo(2 * center.x, 10);
      expect(vertices[i].y + vertices[i + 3].y).toBeCloseTo(2 * center.y, 10);
    }
    for (let i = 0; i < 6; i++) {
      const a = vertices[i];
      const b = vertices[(i + 1) % 6];
      const angleA = Math.atan2(a.y - center.y, a.x - center.x);
      const angleB = Math.atan2(b.y - center.y, b.x - center.x);
      const step = (((angleA - angleB) * 180) / Math.PI + 360) % 360;
      expect(step).toBeCloseTo(60, 8);
    }
  });

  it('bounds x by the apothem and y by the circumradius', () => {
    const bounds = hexagonBounds({ x: 1, y: 1 }, 2);
    expect(bounds.minX).toBe(0);
    expect(bounds.maxX).toBe(2);
    expect(bounds.minY).toBeCloseTo(1 - 2 / Math.sqrt(3), 10);
    expect(bounds.maxY).toBeCloseTo(1 + 2 / Math.sqrt(3), 10);
  });

  describe('compensatedHexagonVertices', () => {
    const flatX = (vertices: { x: number }[]) => vertices[1].x;

    it('returns the nominal vertices without compensation', () => {
      expect(compensatedHexagonVertices({ x: 0, y: 0 }, 2, 0.25, 'none')).toEqual(hexagonVertices({ x: 0, y: 0 }, 2));
    });

    it('pulls every flat in by the tool radius for interior cuts', () => {
      expect(flatX(compensatedHexagonVertices({ x: 0, y: 0 }, 2, 0.25, 'interior'))).toBeCloseTo(0.875, 10);
    });

    it('pushes every flat out by the tool radius for exterior cuts', () => {
      expect(flatX(compensatedHexagonVertices({ x: 0, y: 0 }, 2, 0.25, 'exterior'))).toBeCloseTo(1.125, 10);
    });

    it('rejects a hexagon narrower than the tool', () => {
      expect(() => compensatedHexagonVertices({ x: 0, y: 0 }, 0.2, 0.25, 'interior')).toThrow('too small for interior');
    });
  });
});
