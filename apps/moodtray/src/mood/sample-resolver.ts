/**
 * Turns raw readings into complete samples. An unreadable field takes its
 * last known good value, or 0 when none exists; either way the sample is degraded.
 */

import { MetricName, MetricReading, MetricSample } from './types';
import { createLogger } from '../utils/logger';

const logger = createLogger('MetricSampleResolver');

type LastKnown = Record<MetricName, number | null>;

const clampPercent = (value: number): number => Math.max(0, Math.min(100, value));

export class MetricSampleResolver {
  private lastKnown: LastKnown = { cpu: null, ram: null, network: null };

  resolve(reading: MetricReading): MetricSample {
    const substituted: MetricName[] = [];

    const pick = (metric: MetricName, value: number | null): number => {
      if (value !== null && Number.isFinite(value)) {
        this.lastKnown[metric] = value;
        return value;
      }

      substituted.push(metric);
      const fallback = this.lastKnown[metric];
      logger.withFields({ metric }).debug('Metric unavailable, substituting', {
        substitute: fallback ?? 0,
        stale: fallback !== null,
      });
      return fallback ?? 0;
    };

    const cpuPct = clampPercent(pick('cpu', reading.cpuPct));
    const ramPct = clampPercent(pick('ram', reading.ramPct));
    const netKbps = Math.max(0, pick('network', reading.netKbps));

    return Object.freeze({
      cpuPct,
      ramPct,
      netKbps,
      timestamp: reading.timestamp,
      degraded: substituted.length > 0,
      substituted: Object.freeze(substituted),
    });
  }

  getLastKnown(metric: MetricName): number | null {
    return this.lastKnown[metric];
  }

  reset(): void {
    this.lastKnown = { cpu: null, ram: null, network: null };
  }
}
