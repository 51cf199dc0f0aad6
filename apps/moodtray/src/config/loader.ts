/**
 * Threshold / settings loader
 *
 * Produces a validated MoodConfig or throws ConfigError. The classifier never
 * re-validates, so every ordering check happens here.
 */

import * as fs from 'fs';
import { MoodConfigFile, moodConfigFileSchema } from './schema';
import { METRIC_NAMES, ThresholdConfig } from '../mood/types';
import { SkinManifest } from '../animation/types';
import {
  DEFAULT_SETTINGS,
  MoodConfig,
  MoodSettings,
  defaultThresholds,
  readEnvOverrides,
  validateSettings,
} from '../utils/config';
import { ConfigError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('ConfigLoader');

type FileThresholds = MoodConfigFile['emotion_thresholds'];
type FileSettings = MoodConfigFile['settings'];

/**
 * Map the per-state file sections onto per-metric thresholds.
 *
 * `single_resource_threshold` sets the CPU/RAM busy level (network at ten
 * times the value) and `any_critical_threshold` caps the CPU/RAM critical
 * level, as older config files expect.
 */
export function buildThresholds(
  file: FileThresholds,
  base: ThresholdConfig = defaultThresholds()
): ThresholdConfig {
  const { calm, busy, stressed, overloaded } = file;
  const single = busy.single_resource_threshold;
  const anyCritical = overloaded.any_critical_threshold;

  const critical = (explicit: number | undefined, fallback: number): number => {
    const given = [explicit, anyCritical].filter((value): value is number => value !== undefined);
    return given.length > 0 ? Math.min(...given) : fallback;
  };

  return {
    cpu: {
      calm: calm.cpu_max ?? base.cpu.calm,
      busy: busy.cpu_busy ?? single ?? base.cpu.busy,
      high: stressed.cpu_high ?? base.cpu.high,
      critical: critical(overloaded.cpu_critical, base.cpu.critical),
    },
    ram: {
      calm: calm.ram_max ?? base.ram.calm,
      busy: busy.ram_busy ?? single ?? base.ram.busy,
      high: stressed.ram_high ?? base.ram.high,
      critical: critical(overloaded.ram_critical, base.ram.critical),
    },
    network: {
      calm: calm.network_max_kbps ?? base.network.calm,
      busy: busy.network_busy_kbps ?? (single !== undefined ? single * 10 : base.network.busy),
      high: stressed.network_high_kbps ?? base.network.high,
      critical: overloaded.network_critical_kbps ?? base.network.critical,
    },
    multipleResourcesThreshold:
      stressed.multiple_resources_threshold ?? base.multipleResourcesThreshold,
  };
}

/**
 * Check calm <= busy <= high <= critical for every metric
 * @returns One message per violation; empty when valid
 */
export function validateThresholdOrder(config: ThresholdConfig): string[] {
  const problems: string[] = [];

  for (const metric of METRIC_NAMES) {
    const { calm, busy, high, critical } = config[metric];
    if (calm > busy) {
      problems.push(`${metric}: calm (${calm}) exceeds busy (${busy})`);
    }
    if (busy > high) {
      problems.push(`${metric}: busy (${busy}) exceeds high (${high})`);
    }
    if (high > critical) {
      problems.push(`${metric}: high (${high}) exceeds critical (${critical})`);
    }
  }

  if (!Number.isInteger(config.multipleResourcesThreshold) || config.multipleResourcesThreshold < 1) {
    problems.push('multiple resources threshold must be a positive integer');
  }

  return problems;
}

export function assertValidThresholds(config: ThresholdConfig): ThresholdConfig {
  const problems = validateThresholdOrder(config);
  if (problems.length > 0) {
    throw new ConfigError('Threshold ordering is invalid', { problems });
  }
  return config;
}

function buildSettings(file: FileSettings, env: NodeJS.ProcessEnv): MoodSettings {
  const fromFile: Partial<MoodSettings> = {};

  if (file.poll_interval_ms !== undefined) fromFile.pollIntervalMs = file.poll_interval_ms;
  if (file.animation_interval_ms !== undefined) fromFile.animationIntervalMs = file.animation_interval_ms;
  if (file.dwell_cycles !== undefined) fromFile.dwellCycles = file.dwell_cycles;
  if (file.max_playback_multiplier !== undefined) fromFile.maxPlaybackMultiplier = file.max_playback_multiplier;
  if (file.stress_smoothing !== undefined) fromFile.stressSmoothing = file.stress_smoothing;
  if (file.animation_mode !== undefined) fromFile.mode = file.animation_mode;
  if (file.current_skin !== undefined) fromFile.currentSkin = file.current_skin;

  return {
    ...DEFAULT_SETTINGS,
    ...fromFile,
    ...readEnvOverrides(env),
  };
}

function buildSkins(file: MoodConfigFile['skins']): Record<string, SkinManifest> {
  const skins: Record<string, SkinManifest> = {};
  for (const [id, skin] of Object.entries(file)) {
    skins[id] = {
      name: skin.name ?? id,
      animations: skin.animations,
    };
  }
  return skins;
}

/**
 * Validate an already-parsed JSON document
 */
export function parseMoodConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): MoodConfig {
  const parsed = moodConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Configuration file is malformed', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const thresholds = assertValidThresholds(buildThresholds(parsed.data.emotion_thresholds));

  const settings = buildSettings(parsed.data.settings, env);
  const settingProblems = validateSettings(settings);
  if (settingProblems.length > 0) {
    throw new ConfigError('Settings are invalid', { problems: settingProblems });
  }

  return {
    thresholds,
    settings,
    skins: buildSkins(parsed.data.skins),
  };
}

export interface SkinSummary {
  id: string;
  name: string;
}

/**
 * Skins configured in `config.skins`, sorted by id, for a skin picker
 */
export function listSkins(config: MoodConfig): SkinSummary[] {
  return Object.entries(config.skins)
    .map(([id, skin]) => ({ id, name: skin.name }))
    .sort((a, b) => a.id.localeCompare(b.id));
}

/**
 * Read and validate a JSON config file. A missing file yields the defaults.
 */
export async function loadMoodConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<MoodConfig> {
  if (!fs.existsSync(filePath)) {
    logger.warn(`Config file not found at ${filePath}, using defaults`);
    return parseMoodConfig({}, env);
  }

  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Could not read config file ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const config = parseMoodConfig(raw, env);
  logger.info('Configuration loaded', { path: filePath, mode: config.settings.mode });
  return config;
}
