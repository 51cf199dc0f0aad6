/**
 * StressTrend Unit Tests
 */

import { StressTrend } from '../../../src/mood/stress-trend';

describe('StressTrend', () => {
  it('should report 0 before any update', () => {
    expect(new StressTrend().current()).toBe(0);
  });

  it('should start from the first score and smooth later ones', () => {
    const trend = new StressTrend(0.3);

    expect(trend.update(40)).toBe(40);
    // 40 + 0.3 * (60 - 40)
    expect(trend.update(60)).toBe(46);
  });

  it('should publish a degraded score as-is without moving the average', () => {
    const trend = new StressTrend(0.5);
    trend.update(80);

    expect(trend.update(12.34, true)).toBe(12.3);
    expect(trend.current()).toBe(80);
    // 80 + 0.5 * (40 - 80)
    expect(trend.update(40)).toBe(60);
  });

  it('should publish degraded scores before any clean sample', () => {
    const trend = new StressTrend(0.3);

    expect(trend.update(100, true)).toBe(100);
    expect(trend.current()).toBe(0);
    expect(trend.update(30)).toBe(30);
  });

  it('should follow the raw score with smoothing of 1', () => {
    const trend = new StressTrend(1);
    trend.update(10);

    expect(trend.update(72.25)).toBe(72.3);
  });

  it('should start over after reset', () => {
    const trend = new StressTrend(0.3);
    trend.update(90);

    trend.reset();

    expect(trend.current()).toBe(0);
    expect(trend.update(20)).toBe(20);
  });
});
