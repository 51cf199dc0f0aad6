/**
 * EmotionClassifier
 * Maps one metric sample onto an emotion state and a stress score
 */

import {
  Classification,
  EmotionState,
  MetricName,
  MetricSample,
  METRIC_NAMES,
  MetricThresholds,
  ThresholdConfig,
  metricValue,
} from './types';

/**
 * Fraction of the calm-to-critical span a value has covered, unclamped
 */
function spanRatio(value: number, thresholds: MetricThresholds): number {
  const span = thresholds.critical - thresholds.calm;
  if (span <= 0) {
    return value > thresholds.calm ? 1 : 0;
  }
  return (value - thresholds.calm) / span;
}

/**
 * Calculate stress score from the most severe metric
 * @returns Stress score (0 to 100)
 */
export function calculateStressScore(
  sample: MetricSample,
  config: ThresholdConfig,
  metrics: readonly MetricName[] = METRIC_NAMES
): number {
  let worst = 0;
  for (const metric of metrics) {
    worst = Math.max(worst, spanRatio(metricValue(sample, metric), config[metric]));
  }

  const score = Math.max(0, Math.min(100, worst * 100));
  return Number(score.toFixed(1));
}

/**
 * Determine the emotion state, evaluating from the most severe state down.
 * Thresholds are assumed valid; the config loader rejects bad ordering.
 */
export function determineEmotionState(
  sample: MetricSample,
  config: ThresholdConfig,
  metrics: readonly MetricName[] = METRIC_NAMES
): EmotionState {
  const values = metrics.map((metric) => ({
    value: metricValue(sample, metric),
    thresholds: config[metric],
  }));

  if (values.some(({ value, thresholds }) => value >= thresholds.critical)) {
    return 'overloaded';
  }

  const highCount = values.filter(({ value, thresholds }) => value >= thresholds.high).length;
  if (highCount >= config.multipleResourcesThreshold) {
    return 'stressed';
  }

  if (values.some(({ value, thresholds }) => value >= thresholds.busy)) {
    return 'busy';
  }

  if (values.some(({ value, thresholds }) => value > thresholds.calm)) {
    return 'active';
  }

  return 'calm';
}

/**
 * Classify a sample. Total: every sample yields exactly one state.
 */
export function classify(
  sample: MetricSample,
  config: ThresholdConfig,
  metrics: readonly MetricName[] = METRIC_NAMES
): Classification {
  return {
    state: determineEmotionState(sample, config, metrics),
    stressScore: calculateStressScore(sample, config, metrics),
  };
}

/**
 * Classifier bound to one threshold set. The orchestrator swaps the
 * thresholds when the UI layer pushes a new configuration.
 */
export class EmotionClassifier {
  constructor(private config: ThresholdConfig) {}

  classify(sample: MetricSample, metrics: readonly MetricName[] = METRIC_NAMES): Classification {
    return classify(sample, this.config, metrics);
  }

  getThresholds(): ThresholdConfig {
    return this.config;
  }

  setThresholds(config: ThresholdConfig): void {
    this.config = config;
  }
}
