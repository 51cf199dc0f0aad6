/**
 * Stressor analysis for tooltips and debugging
 */

import { EmotionState, MetricName, MetricSample, METRIC_NAMES, ThresholdConfig, metricValue } from './types';

const METRIC_LABELS: Record<MetricName, string> = {
  cpu: 'CPU',
  ram: 'RAM',
  network: 'Network',
};

const formatValue = (metric: MetricName, value: number): string =>
  metric === 'network' ? `${value.toFixed(1)} KB/s` : `${value.toFixed(1)}%`;

/**
 * List metrics at or above their high threshold, e.g. "High CPU (82.0%)"
 */
export function describeStressors(
  sample: MetricSample,
  config: ThresholdConfig,
  metrics: readonly MetricName[] = METRIC_NAMES
): string[] {
  return metrics
    .filter((metric) => metricValue(sample, metric) >= config[metric].high)
    .map((metric) => `High ${METRIC_LABELS[metric]} (${formatValue(metric, metricValue(sample, metric))})`);
}

export function stateLabel(state: EmotionState): string {
  return state.charAt(0).toUpperCase() + state.slice(1);
}

/**
 * Tooltip text, e.g. "Mood: Busy (42.5% stress): High CPU (75.0%)"
 */
export function formatTooltip(
  state: EmotionState,
  stressScore: number,
  stressors: readonly string[] = []
): string {
  const base = `Mood: ${stateLabel(state)} (${stressScore.toFixed(1)}% stress)`;
  return stressors.length > 0 ? `${base}: ${stressors.join(', ')}` : base;
}
