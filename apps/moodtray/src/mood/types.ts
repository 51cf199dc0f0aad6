/**
 * Mood Classification Type Definitions
 */

/**
 * Emotion states in ascending severity. Array position is the severity rank.
 */
export const EMOTION_STATES = ['calm', 'active', 'busy', 'stressed', 'overloaded'] as const;

export type EmotionState = (typeof EMOTION_STATES)[number];

export type MetricName = 'cpu' | 'ram' | 'network';

export const METRIC_NAMES: readonly MetricName[] = ['cpu', 'ram', 'network'];

/**
 * Which metrics take part in classification. `emotion` uses all of them;
 * the single-metric modes watch one resource.
 */
export type MonitorMode = 'emotion' | MetricName;

export const MONITOR_MODES: readonly MonitorMode[] = ['emotion', 'cpu', 'ram', 'network'];

export function isMonitorMode(value: string): value is MonitorMode {
  return MONITOR_MODES.some((mode) => mode === value);
}

/**
 * Boundaries for one metric. Must satisfy calm <= busy <= high <= critical.
 */
export interface MetricThresholds {
  /** At or below this the metric counts as calm */
  calm: number;

  /** A single metric at or above this makes the system busy */
  busy: number;

  /** Counted towards the multi-resource stressed rule */
  high: number;

  /** Hard cap; reaching it is overloaded */
  critical: number;
}

export interface ThresholdConfig {
  cpu: MetricThresholds;
  ram: MetricThresholds;
  network: MetricThresholds;

  /** How many metrics must be high at once for `stressed` */
  multipleResourcesThreshold: number;
}

/**
 * Raw reading from a metric source. `null` marks a counter that could not be read.
 */
export interface MetricReading {
  cpuPct: number | null;
  ramPct: number | null;
  netKbps: number | null;

  /** Unix timestamp in milliseconds */
  timestamp: number;
}

/**
 * A complete sample, with unreadable fields already substituted
 */
export interface MetricSample {
  readonly cpuPct: number;
  readonly ramPct: number;
  readonly netKbps: number;
  readonly timestamp: number;

  /** True when any field is a stale or zero substitute */
  readonly degraded: boolean;

  readonly substituted: readonly MetricName[];
}

export interface Classification {
  state: EmotionState;

  /** Normalized severity magnitude (0 to 100) */
  stressScore: number;
}

export function severityRank(state: EmotionState): number {
  return EMOTION_STATES.indexOf(state);
}

export function isEscalation(from: EmotionState, to: EmotionState): boolean {
  return severityRank(to) > severityRank(from);
}

export function metricValue(sample: MetricSample, metric: MetricName): number {
  switch (metric) {
    case 'cpu':
      return sample.cpuPct;
    case 'ram':
      return sample.ramPct;
    case 'network':
      return sample.netKbps;
  }
}

export function metricsForMode(mode: MonitorMode): readonly MetricName[] {
  return mode === 'emotion' ? METRIC_NAMES : [mode];
}

/**
 * True when any of `metrics` in the sample is a substitute
 */
export function isDegradedFor(sample: MetricSample, metrics: readonly MetricName[]): boolean {
  return sample.substituted.some((metric) => metrics.includes(metric));
}
