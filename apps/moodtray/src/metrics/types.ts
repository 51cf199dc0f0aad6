import type { MetricReading } from '../mood/types';

/**
 * Anything that can produce one metric reading per poll. A field that cannot
 * be read comes back as null rather than failing the whole reading.
 */
export interface MetricSource {
  sample(): Promise<MetricReading>;
}
