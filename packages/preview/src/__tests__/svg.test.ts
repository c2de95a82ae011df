import { fmt, nodeToSvg, sceneToSvg } from '..';

describe('svg output', () => {
  it('formats numbers with at most two decimals', () => {
    expect(fmt(18.75)).toBe('18.75');
    expect(fmt(20)).toBe('20');
    expect(fmt(1 / 3)).toBe('0.33');
    expect(fmt(-0.001)).toBe('0');
  });

  it('writes arc segments with their flags', () => {
    const svg = nodeToSvg({
      kind: 'path',
      start: { x: 0, y: 0 },
      segments: [{ kind: 'arc', to: { x: 10, y: 0 }, radius: 5, largeArc: false, clockwise: true }],
      closed: false,
      stroke: { color: '#000', width: 1 },
    });
    expect(svg).toBe('<path d="M 0 0 A 5 5 0 0 1 10 0" fill="none" stroke="#000" stroke-width="1"/>');
  });

  it('closes closed paths', () => {
    const svg = nodeToSvg({
      kind: 'path',
      start: { x: 0, y: 0 },
      segments: [
        { kind: 'line', to: { x: 10, y: 0 } },
        { kind: 'line', to: { x: 0, y: 0 } },
      ],
      closed: true,
      stroke: { color: '#000', width: 1.5, dash: '5,3', opacity: 0.7 },
    });
    expect(svg).toBe(
      '<path d="M 0 0 L 10 0 L 0 0 Z" fill="none" stroke="#000" stroke-width="1.5" stroke-dasharray="5,3" opacity="0.7"/>',
    );
  });

  it('escapes label text', () => {
    const svg = nodeToSvg({ kind: 'text', at: { x: 1, y: 2 }, text: 'a<b', color: '#111', size: 10, anchor: 'start' });
    expect(svg).toBe(
      '<text x="1" y="2" font-size="10" fill="#111" text-anchor="start" font-family="Arial, sans-serif">a&lt;b</text>',
    );
  });

  it('wraps nodes in an svg root', () => {
    const svg = sceneToSvg({
      width: 240,
      height: 140,
      background: '#fff',
      nodes: [{ kind: 'polygon', points: [{ x: 0, y: 0 }, { x: 1, y: 2.5 }], stroke: { color: '#222', width: 2 } }],
    });
    expect(svg.split('\n')).toEqual([
      '<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 240 140" width="240" height="140" style="background: #fff">',
      '<polygon points="0,0 1,2.5" fill="none" stroke="#222" stroke-width="2"/>',
      '</svg>',
    ]);
  });
});
