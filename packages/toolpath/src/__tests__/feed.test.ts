import { createGenerationSettings } from '@toolpath/shared';
import { arcSlowdownAdjuster, composeAdjusters, cornerSlowdownAdjuster, createFeedCoordinator, firstPassAdjuster } from '..';

const straight = { passIndex: 1, isArc: false, cornerSeverity: 1 };

describe('feed coordinator', () => {
  it('slows only the first pass', () => {
    const adjuster = firstPassAdjuster(0.7);
    expect(adjuster.adjust(100, { ...straight, passIndex: 0 })).toBeCloseTo(70);
    expect(adjuster.adjust(100, straight)).toBe(100);
  });

  it('treats a first-pass factor of 1 as disabled', () => {
    expect(firstPassAdjuster(1).enabled).toBe(false);
  });

  it('scales corners by factor and severity', () => {
    const adjuster = cornerSlowdownAdjuster(true, 0.5);
    expect(adjuster.adjust(100, { ...straight, cornerSeverity: 0.75 })).toBeCloseTo(37.5);
    expect(adjuster.adjust(100, straight)).toBe(100);
  });

  it('slows arcs only', () => {
    const adjuster = arcSlowdownAdjuster(true, 0.8);
    expect(adjuster.adjust(50, { ...straight, isArc: true })).toBeCloseTo(40);
    expect(adjuster.adjust(50, straight)).toBe(50);
  });

  it('multiplies every enabled stage', () => {
    const feed = createFeedCoordinator(createGenerationSettings());
    expect(feed(100, { passIndex: 0, isArc: true, cornerSeverity: 0.75 })).toBeCloseTo(21);
  });

  it('leaves the feed alone when every stage is off', () => {
    const feed = createFeedCoordinator(
      createGenerationSettings({ firstPassFeedFactor: 1, cornerSlowdownEnabled: false, arcSlowdownEnabled: false }),
    );
    expect(feed(100, { passIndex: 0, isArc: true, cornerSeverity: 0.3 })).toBe(100);
  });

  it('skips disabled adjusters when composing', () => {
    const spy = jest.fn((feed: number) => feed * 2);
    const feed = composeAdjusters([{ name: 'double', enabled: false, adjust: spy }]);
    expect(feed(10, straight)).toBe(10);
    expect(spy).not.toHaveBeenCalled();
  });
});
