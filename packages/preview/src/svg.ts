import type { PathSegment, Scene, SceneNode, Stroke } from './scene';

/** Two decimals at most, no trailing zeros, no negative zero. */
export const fmt = (n: number): string => {
  const rounded = Number(n.toFixed(2));
  return String(rounded === 0 ? 0 : rounded);
};

const escapeXml = (text: string): string =>
  text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

const strokeAttrs = (stroke?: Stroke): string => {
  if (!stroke) {
    return '';
  }
  let attrs = ` stroke="${stroke.color}" stroke-width="${fmt(stroke.width)}"`;
  if (stroke.dash) {
    attrs += ` stroke-dasharray="${stroke.dash}"`;
  }
  if (stroke.opacity !== undefined) {
    attrs += ` opacity="${fmt(stroke.opacity)}"`;
  }
  return attrs;
};

const segmentData = (segment: PathSegment): string => {
  if (segment.kind === 'line') {
    return `L ${fmt(segment.to.x)} ${fmt(segment.to.y)}`;
  }
  const r = fmt(segment.radius);
  return `A ${r} ${r} 0 ${segment.largeArc ? 1 : 0} ${segment.clockwise ? 1 : 0} ${fmt(segment.to.x)} ${fmt(segment.to.y)}`;
};

export const nodeToSvg = (node: SceneNode): string => {
  switch (node.kind) {
    case 'rect':
      return `<rect x="${fmt(node.x)}" y="${fmt(node.y)}" width="${fmt(node.width)}" height="${fmt(node.height)}" fill="${node.fill}"${strokeAttrs(node.stroke)}/>`;
    case 'line':
      return `<line x1="${fmt(node.from.x)}" y1="${fmt(node.from.y)}" x2="${fmt(node.to.x)}" y2="${fmt(node.to.y)}"${strokeAttrs(node.stroke)}/>`;
    case 'point':
      return `<circle cx="${fmt(node.at.x)}" cy="${fmt(node.at.y)}" r="${fmt(node.radius)}" fill="${node.fill}"${strokeAttrs(node.stroke)}/>`;
    case 'circle':
      return `<circle cx="${fmt(node.center.x)}" cy="${fmt(node.center.y)}" r="${fmt(node.radius)}" fill="none"${strokeAttrs(node.stroke)}/>`;
    case 'polygon': {
      const points = node.points.map((p) => `${fmt(p.x)},${fmt(p.y)}`).join(' ');
      return `<polygon points="${points}" fill="none"${strokeAttrs(node.stroke)}/>`;
    }
    case 'path': {
      const parts = [`M ${fmt(node.start.x)} ${fmt(node.start.y)}`, ...node.segments.map(segmentData)];
      if (node.closed) {
        parts.push('Z');
      }
      return `<path d="${parts.join(' ')}" fill="none"${strokeAttrs(node.stroke)}/>`;
    }
    case 'text': {
      const weight = node.bold ? ' font-weight="bold"' : '';
      return `<text x="${fmt(node.at.x)}" y="${fmt(node.at.y)}" font-size="${node.size}"${weight} fill="${node.color}" text-anchor="${node.anchor}" font-family="Arial, sans-serif">${escapeXml(node.text)}</text>`;
    }
  }
};

export const sceneToSvg = (scene: Scene): string => {
  const w = fmt(scene.width);
  const h = fmt(scene.height);
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${w} ${h}" width="${w}" height="${h}" style="background: ${scene.background}">`,
    ...scene.nodes.map(nodeToSvg),
    '</svg>',
  ].join('\n');
};
