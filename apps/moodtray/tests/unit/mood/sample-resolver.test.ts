/**
 * MetricSampleResolver Unit Tests
 */

import { MetricSampleResolver } from '../../../src/mood/sample-resolver';
import { classify } from '../../../src/mood/classifier';
import { isDegradedFor } from '../../../src/mood/types';
import { makeReading, thresholds } from '../../helpers/fixtures';

describe('MetricSampleResolver', () => {
  let resolver: MetricSampleResolver;

  beforeEach(() => {
    resolver = new MetricSampleResolver();
  });

  it('should pass complete readings through unchanged', () => {
    const sample = resolver.resolve(makeReading(42, 55, 120, 1000));

    expect(sample).toEqual({
      cpuPct: 42,
      ramPct: 55,
      netKbps: 120,
      timestamp: 1000,
      degraded: false,
      substituted: [],
    });
  });

  it('should substitute the last known value for a missing metric', () => {
    resolver.resolve(makeReading(40, 50, 300));

    const sample = resolver.resolve(makeReading(45, 52, null));

    expect(sample.netKbps).toBe(300);
    expect(sample.cpuPct).toBe(45);
    expect(sample.degraded).toBe(true);
    expect(sample.substituted).toEqual(['network']);
  });

  it('should classify an unreadable network counter from its last known value', () => {
    resolver.resolve(makeReading(10, 20, 700));

    const sample = resolver.resolve(makeReading(10, 20, null));

    // 700 KB/s is past the busy threshold of 600; 0 KB/s would read calm
    expect(classify(sample, thresholds()).state).toBe('busy');
  });

  it('should count a substitute as degraded only for the metrics in use', () => {
    const sample = resolver.resolve(makeReading(40, 50, null));

    expect(isDegradedFor(sample, ['cpu', 'ram', 'network'])).toBe(true);
    expect(isDegradedFor(sample, ['cpu'])).toBe(false);
  });

  it('should substitute 0 when no prior value exists', () => {
    const sample = resolver.resolve(makeReading(null, 60, null));

    expect(sample.cpuPct).toBe(0);
    expect(sample.netKbps).toBe(0);
    expect(sample.substituted).toEqual(['cpu', 'network']);
    expect(sample.degraded).toBe(true);
  });

  it('should treat non-finite values as missing', () => {
    resolver.resolve(makeReading(30, 30, 30));

    const sample = resolver.resolve(makeReading(Number.NaN, 30, Number.POSITIVE_INFINITY));

    expect(sample.cpuPct).toBe(30);
    expect(sample.netKbps).toBe(30);
    expect(sample.substituted).toEqual(['cpu', 'network']);
  });

  it('should clamp percentages to [0, 100] and throughput to >= 0', () => {
    const sample = resolver.resolve(makeReading(130, -5, -10));

    expect(sample.cpuPct).toBe(100);
    expect(sample.ramPct).toBe(0);
    expect(sample.netKbps).toBe(0);
  });

  it('should return frozen samples', () => {
    const sample = resolver.resolve(makeReading(1, 2, 3));

    expect(Object.isFrozen(sample)).toBe(true);
  });

  it('should forget last known values on reset', () => {
    resolver.resolve(makeReading(10, 20, 30));
    expect(resolver.getLastKnown('ram')).toBe(20);

    resolver.reset();

    expect(resolver.getLastKnown('ram')).toBeNull();
    expect(resolver.resolve(makeReading(10, null, 30)).ramPct).toBe(0);
  });
});
