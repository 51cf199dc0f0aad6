/**
 * MoodTray Configuration
 *
 * Central defaults for thresholds, timers and playback, plus environment overrides.
 */

import { isMonitorMode } from '../mood/types';
import type { MonitorMode, ThresholdConfig } from '../mood/types';
import type { SkinManifest } from '../animation/types';

/**
 * Main configuration object
 */
export const CONFIG = {
  /**
   * Classification thresholds per metric (percent for CPU/RAM, KB/s for network)
   */
  thresholds: {
    cpu: { calm: 20, busy: 60, high: 70, critical: 85 },
    ram: { calm: 30, busy: 60, high: 75, critical: 85 },
    network: { calm: 50, busy: 600, high: 800, critical: 2000 },
    multipleResourcesThreshold: 2,
  },

  tracker: {
    dwellCycles: 3,          // Consecutive polls before a non-critical change commits
  },

  timers: {
    pollIntervalMs: 500,     // Metrics sampling cadence
    animationIntervalMs: 33, // ~30 fps
  },

  animation: {
    maxPlaybackMultiplier: 2.5, // Playback speed at stress 100
    defaultFps: 8,
  },

  stress: {
    smoothing: 0.3,          // EMA weight of the newest score (0 to 1]
  },

  mode: 'emotion',

  skin: 'default',

  logging: {
    level: process.env.LOG_LEVEL || 'info',  // Log level: debug, info, warn, error
    pretty: process.env.NODE_ENV !== 'production',
  },

  paths: {
    config: './config/moodtray.json',
    skins: './assets/skins',
  },
} as const;

/**
 * Settings the orchestrator runs with
 */
export interface MoodSettings {
  pollIntervalMs: number;
  animationIntervalMs: number;
  dwellCycles: number;
  maxPlaybackMultiplier: number;
  stressSmoothing: number;
  mode: MonitorMode;
  currentSkin: string;
}

/**
 * Fully resolved configuration: defaults, then file, then environment
 */
export interface MoodConfig {
  thresholds: ThresholdConfig;
  settings: MoodSettings;
  skins: Record<string, SkinManifest>;
}

export const DEFAULT_SETTINGS: MoodSettings = {
  pollIntervalMs: CONFIG.timers.pollIntervalMs,
  animationIntervalMs: CONFIG.timers.animationIntervalMs,
  dwellCycles: CONFIG.tracker.dwellCycles,
  maxPlaybackMultiplier: CONFIG.animation.maxPlaybackMultiplier,
  stressSmoothing: CONFIG.stress.smoothing,
  mode: CONFIG.mode,
  currentSkin: CONFIG.skin,
};

export const defaultThresholds = (): ThresholdConfig => ({
  cpu: { ...CONFIG.thresholds.cpu },
  ram: { ...CONFIG.thresholds.ram },
  network: { ...CONFIG.thresholds.network },
  multipleResourcesThreshold: CONFIG.thresholds.multipleResourcesThreshold,
});

/**
 * Settings overridden through environment variables
 */
export const readEnvOverrides = (
  env: NodeJS.ProcessEnv = process.env
): Partial<MoodSettings> => {
  const overrides: Partial<MoodSettings> = {};

  if (env.MOODTRAY_POLL_INTERVAL_MS) {
    overrides.pollIntervalMs = parseInt(env.MOODTRAY_POLL_INTERVAL_MS, 10);
  }
  if (env.MOODTRAY_ANIMATION_INTERVAL_MS) {
    overrides.animationIntervalMs = parseInt(env.MOODTRAY_ANIMATION_INTERVAL_MS, 10);
  }
  if (env.MOODTRAY_DWELL_CYCLES) {
    overrides.dwellCycles = parseInt(env.MOODTRAY_DWELL_CYCLES, 10);
  }
  if (env.MOODTRAY_MAX_PLAYBACK_MULTIPLIER) {
    overrides.maxPlaybackMultiplier = parseFloat(env.MOODTRAY_MAX_PLAYBACK_MULTIPLIER);
  }
  if (env.MOODTRAY_MODE && isMonitorMode(env.MOODTRAY_MODE)) {
    overrides.mode = env.MOODTRAY_MODE;
  }
  if (env.MOODTRAY_SKIN) {
    overrides.currentSkin = env.MOODTRAY_SKIN;
  }

  return overrides;
};

/**
 * Default settings with environment overrides applied
 */
export const getConfig = (env: NodeJS.ProcessEnv = process.env): MoodSettings => ({
  ...DEFAULT_SETTINGS,
  ...readEnvOverrides(env),
});

export const getPaths = (env: NodeJS.ProcessEnv = process.env) => ({
  config: env.MOODTRAY_CONFIG_PATH || CONFIG.paths.config,
  skins: env.MOODTRAY_SKIN_DIR || CONFIG.paths.skins,
});

/**
 * Validate runtime settings; returns the list of problems found
 */
export const validateSettings = (settings: MoodSettings): string[] => {
  const problems: string[] = [];

  if (!Number.isInteger(settings.pollIntervalMs) || settings.pollIntervalMs < 50) {
    problems.push('poll interval must be an integer of at least 50 ms');
  }
  if (!Number.isInteger(settings.animationIntervalMs) || settings.animationIntervalMs < 1) {
    problems.push('animation interval must be a positive integer');
  }
  if (settings.animationIntervalMs >= settings.pollIntervalMs) {
    problems.push('animation interval must be shorter than the poll interval');
  }
  if (!Number.isInteger(settings.dwellCycles) || settings.dwellCycles < 1) {
    problems.push('dwell cycles must be an integer of at least 1');
  }
  if (!(settings.maxPlaybackMultiplier >= 1)) {
    problems.push('max playback multiplier must be at least 1.0');
  }
  if (!(settings.stressSmoothing > 0 && settings.stressSmoothing <= 1)) {
    problems.push('stress smoothing must be in (0, 1]');
  }

  return problems;
};

