import type { GenerationSettings } from '@toolpath/shared';

export interface FeedContext {
  /** Zero-based pass index. */
  passIndex: number;
  isArc: boolean;
  /** Corner severity of the move's end point; 1 when it is not a corner. */
  cornerSeverity: number;
}

/**
 * One stage of feed reduction. A disabled adjuster leaves the feed untouched.
 */
export interface FeedAdjuster {
  readonly name: string;
  readonly enabled: boolean;
  adjust(feed: number, context: FeedContext): number;
}

export type FeedCoordinator = (baseFeed: number, context: FeedContext) => number;

export const firstPassAdjuster = (factor: number): FeedAdjuster => ({
  name: 'first-pass',
  enabled: factor < 1,
  adjust: (feed, { passIndex }) => (passIndex === 0 ? feed * factor : feed),
});

export const cornerSlowdownAdjuster = (enabled: boolean, factor: number): FeedAdjuster => ({
  name: 'corner-slowdown',
  enabled,
  adjust: (feed, { cornerSeverity }) => (cornerSeverity < 1 ? feed * factor * cornerSeverity : feed),
});

export const arcSlowdownAdjuster = (enabled: boolean, factor: number): FeedAdjuster => ({
  name: 'arc-slowdown',
  enabled,
  adjust: (feed, { isArc }) => (isArc ? feed * factor : feed),
});

/**
 * Chains adjusters in the given order; the result is the product of every
 * enabled stage.
 */
export const composeAdjusters = (adjusters: readonly FeedAdjuster[]): FeedCoordinator => {
  const active = adjusters.filter((adjuster) => adjuster.enabled);
  return (baseFeed, context) => active.reduce((feed, adjuster) => adjuster.adjust(feed, context), baseFeed);
};

/** First-pass, then corner, then arc. */
export const createFeedCoordinator = (settings: GenerationSettings): FeedCoordinator =>
  composeAdjusters([
    firstPassAdjuster(settings.firstPassFeedFactor),
    cornerSlowdownAdjuster(settings.cornerSlowdownEnabled, settings.cornerFeedFactor),
    arcSlowdownAdjuster(settings.arcSlowdownEnabled, settings.arcFeedFactor),
  ]);
