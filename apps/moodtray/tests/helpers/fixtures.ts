/**
 * Shared test fixtures
 */

import { MetricReading, MetricSample, ThresholdConfig } from '../../src/mood/types';
import { AnimationFrame } from '../../src/animation/types';
import { defaultThresholds } from '../../src/utils/config';

export const makeSample = (
  cpuPct: number,
  ramPct: number,
  netKbps: number,
  overrides: Partial<MetricSample> = {}
): MetricSample => ({
  cpuPct,
  ramPct,
  netKbps,
  timestamp: 1_700_000_000_000,
  degraded: false,
  substituted: [],
  ...overrides,
});

export const makeReading = (
  cpuPct: number | null,
  ramPct: number | null,
  netKbps: number | null,
  timestamp: number = 1_700_000_000_000
): MetricReading => ({ cpuPct, ramPct, netKbps, timestamp });

export const thresholds = (overrides: Partial<ThresholdConfig> = {}): ThresholdConfig => ({
  ...defaultThresholds(),
  ...overrides,
});

export const frames = (prefix: string, count: number, durationMs: number = 100): AnimationFrame[] =>
  Array.from({ length: count }, (_, index) => ({
    handle: `${prefix}-${index}`,
    durationMs,
  }));
