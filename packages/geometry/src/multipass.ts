import { DEFAULT_MATERIAL_DEPTH, type Material } from '@toolpath/shared';

export interface Pass {
  /** Zero-based pass index. */
  index: number;
  /** Cumulative depth reached at the end of this pass. */
  depth: number;
  /** Depth removed by this pass alone. */
  step: number;
}

/**
 * Number of passes needed to reach `totalDepth` without exceeding
 * `passDepth` per pass. A non-positive pass depth means a single pass.
 */
export const numPasses = (totalDepth: number, passDepth: number): number => {
  if (passDepth <= 0) {
    return 1;
  }
  return Math.max(1, Math.ceil(totalDepth / passDepth));
};

/**
 * Cumulative depth after each pass, evenly redistributed so every pass
 * removes `totalDepth / numPasses`.
 */
export const passDepths = (totalDepth: number, passDepth: number): number[] => {
  const count = numPasses(totalDepth, passDepth);
  return Array.from({ length: count }, (_, i) => ((i + 1) * totalDepth) / count);
};

export const planPasses = (totalDepth: number, passDepth: number): Pass[] => {
  const count = numPasses(totalDepth, passDepth);
  return passDepths(totalDepth, passDepth).map((depth, index) => ({ index, depth, step: totalDepth / count }));
};

/** Depth to cut through: wall thickness for tube, thickness for sheet. */
export const materialDepth = (material: Material): number => {
  const depth = material.form === 'tube' ? material.wallThickness : material.thickness;
  return depth > 0 ? depth : DEFAULT_MATERIAL_DEPTH;
};
