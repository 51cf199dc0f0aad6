/**
 * MoodTray public API
 */

export * from './mood';
export * from './animation';
export * from './orchestrator';
export { StateTracker } from './tracker/state-tracker';
export type { TrackerState, TrackerUpdate } from './tracker/state-tracker';
export { NodeMetricSource, parseNetDev } from './metrics/node-metric-source';
export type { MetricSource } from './metrics/types';
export type { Renderer } from './renderer/types';
export { TerminalRenderer, formatStatusLine } from './renderer/terminal-renderer';
export type { StatusStream } from './renderer/terminal-renderer';
export { loadMoodConfig, parseMoodConfig, assertValidThresholds, validateThresholdOrder, listSkins } from './config/loader';
export type { SkinSummary } from './config/loader';
export { CONFIG, DEFAULT_SETTINGS, defaultThresholds, getConfig } from './utils/config';
export type { MoodConfig, MoodSettings } from './utils/config';
export * from './utils/errors';
export { LoggingErrorReporter } from './utils/error-reporter';
export type { ErrorReporter } from './utils/error-reporter';
export { Logger, LogLevel, createLogger } from './utils/logger';
