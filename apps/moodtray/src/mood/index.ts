/**
 * Mood Classification Module
 * Main entry point for turning metric samples into emotion states
 */

export { EmotionClassifier, classify, determineEmotionState, calculateStressScore } from './classifier';
export { MetricSampleResolver } from './sample-resolver';
export { StressTrend } from './stress-trend';
export { describeStressors, formatTooltip, stateLabel } from './stressors';

export {
  EMOTION_STATES,
  METRIC_NAMES,
  MONITOR_MODES,
  severityRank,
  isEscalation,
  metricValue,
  metricsForMode,
  isMonitorMode,
  isDegradedFor,
} from './types';
export type {
  Classification,
  EmotionState,
  MetricName,
  MetricReading,
  MetricSample,
  MetricThresholds,
  MonitorMode,
  ThresholdConfig,
} from './types';
