/**
 * Config loader Unit Tests
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  assertValidThresholds,
  buildThresholds,
  listSkins,
  loadMoodConfig,
  parseMoodConfig,
  validateThresholdOrder,
} from '../../../src/config/loader';
import { DEFAULT_SETTINGS, defaultThresholds } from '../../../src/utils/config';
import { ConfigError } from '../../../src/utils/errors';
import { thresholds } from '../../helpers/fixtures';

const noEnv: NodeJS.ProcessEnv = {};

describe('parseMoodConfig', () => {
  it('should produce the defaults for an empty document', () => {
    const config = parseMoodConfig({}, noEnv);

    expect(config.thresholds).toEqual(defaultThresholds());
    expect(config.settings).toEqual(DEFAULT_SETTINGS);
    expect(config.skins).toEqual({});
  });

  it('should map per-state sections onto per-metric thresholds', () => {
    const config = parseMoodConfig(
      {
        emotion_thresholds: {
          calm: { cpu_max: 10 },
          stressed: { multiple_resources_threshold: 3, network_high_kbps: 900 },
        },
      },
      noEnv
    );

    expect(config.thresholds.cpu.calm).toBe(10);
    expect(config.thresholds.network.high).toBe(900);
    expect(config.thresholds.multipleResourcesThreshold).toBe(3);
    expect(config.thresholds.ram).toEqual(defaultThresholds().ram);
  });

  it('should ignore unknown keys', () => {
    const config = parseMoodConfig(
      {
        version: 2,
        emotion_thresholds: { calm: { cpu_max: 15, description: 'quiet' } },
        appearance: { theme: 'dark' },
      },
      noEnv
    );

    expect(config.thresholds.cpu.calm).toBe(15);
  });

  it('should reject out-of-order thresholds', () => {
    let caught: unknown;
    try {
      parseMoodConfig({ emotion_thresholds: { calm: { cpu_max: 65 } } }, noEnv);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      code: 'CONFIG_ERROR',
      recoverable: false,
      details: { problems: ['cpu: calm (65) exceeds busy (60)'] },
    });
  });

  it('should reject values of the wrong type', () => {
    expect(() => parseMoodConfig({ settings: { poll_interval_ms: 'fast' } }, noEnv)).toThrow(
      'Configuration file is malformed'
    );
  });

  it('should reject a non-object document', () => {
    expect(() => parseMoodConfig(['calm'], noEnv)).toThrow(ConfigError);
  });

  it('should reject percentages above 100', () => {
    expect(() => parseMoodConfig({ emotion_thresholds: { overloaded: { cpu_critical: 120 } } }, noEnv)).toThrow(
      ConfigError
    );
  });

  it('should reject an animation interval not shorter than the poll interval', () => {
    expect(() =>
      parseMoodConfig({ settings: { poll_interval_ms: 500, animation_interval_ms: 600 } }, noEnv)
    ).toThrow('Settings are invalid');
  });

  it('should read settings and skins', () => {
    const config = parseMoodConfig(
      {
        settings: { poll_interval_ms: 1000, animation_mode: 'ram', current_skin: 'cat' },
        skins: { cat: { animations: { calm: { fps: 2 } } } },
      },
      noEnv
    );

    expect(config.settings.pollIntervalMs).toBe(1000);
    expect(config.settings.mode).toBe('ram');
    expect(config.settings.currentSkin).toBe('cat');
    expect(config.skins.cat).toEqual({ name: 'cat', animations: { calm: { fps: 2 } } });
  });

  it('should let environment variables override the file', () => {
    const config = parseMoodConfig(
      { settings: { poll_interval_ms: 1000, animation_mode: 'cpu' } },
      { MOODTRAY_POLL_INTERVAL_MS: '2000', MOODTRAY_MODE: 'bogus', MOODTRAY_SKIN: 'robot' }
    );

    expect(config.settings.pollIntervalMs).toBe(2000);
    expect(config.settings.mode).toBe('cpu');
    expect(config.settings.currentSkin).toBe('robot');
  });
});

describe('buildThresholds', () => {
  const empty = { calm: {}, busy: {}, stressed: {}, overloaded: {} };

  it('should apply single_resource_threshold to every busy level', () => {
    const result = buildThresholds({ ...empty, busy: { single_resource_threshold: 65 } });

    expect(result.cpu.busy).toBe(65);
    expect(result.ram.busy).toBe(65);
    expect(result.network.busy).toBe(650);
  });

  it('should prefer explicit busy values over single_resource_threshold', () => {
    const result = buildThresholds({ ...empty, busy: { cpu_busy: 50, single_resource_threshold: 65 } });

    expect(result.cpu.busy).toBe(50);
    expect(result.ram.busy).toBe(65);
  });

  it('should cap CPU and RAM critical levels with any_critical_threshold', () => {
    const result = buildThresholds({
      ...empty,
      overloaded: { cpu_critical: 90, any_critical_threshold: 80 },
    });

    expect(result.cpu.critical).toBe(80);
    expect(result.ram.critical).toBe(80);
    expect(result.network.critical).toBe(2000);
  });
});

describe('listSkins', () => {
  it('should list configured skins sorted by id', () => {
    const config = parseMoodConfig(
      {
        skins: {
          robot: { name: 'Tin Robot', animations: {} },
          cat: { animations: { calm: { fps: 2 } } },
        },
      },
      noEnv
    );

    expect(listSkins(config)).toEqual([
      { id: 'cat', name: 'cat' },
      { id: 'robot', name: 'Tin Robot' },
    ]);
  });

  it('should return an empty list when no skins are configured', () => {
    expect(listSkins(parseMoodConfig({}, noEnv))).toEqual([]);
  });
});

describe('validateThresholdOrder', () => {
  it('should accept the defaults', () => {
    expect(validateThresholdOrder(defaultThresholds())).toEqual([]);
  });

  it('should accept equal neighbouring thresholds', () => {
    expect(validateThresholdOrder(thresholds({ cpu: { calm: 50, busy: 50, high: 50, critical: 50 } }))).toEqual([]);
  });

  it('should list every violation', () => {
    const problems = validateThresholdOrder(
      thresholds({
        ram: { calm: 30, busy: 80, high: 75, critical: 70 },
        multipleResourcesThreshold: 0,
      })
    );

    expect(problems).toEqual([
      'ram: busy (80) exceeds high (75)',
      'ram: high (75) exceeds critical (70)',
      'multiple resources threshold must be a positive integer',
    ]);
  });

  it('should throw from assertValidThresholds', () => {
    expect(() => assertValidThresholds(thresholds({ multipleResourcesThreshold: 1.5 }))).toThrow(
      'Threshold ordering is invalid'
    );
  });
});

describe('loadMoodConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'moodtray-config-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should fall back to defaults when the file is missing', async () => {
    const config = await loadMoodConfig(path.join(tempDir, 'missing.json'), noEnv);

    expect(config.thresholds).toEqual(defaultThresholds());
    expect(config.settings).toEqual(DEFAULT_SETTINGS);
  });

  it('should reject a file that is not JSON', async () => {
    const filePath = path.join(tempDir, 'broken.json');
    await fs.writeFile(filePath, '{ "settings": ');

    await expect(loadMoodConfig(filePath, noEnv)).rejects.toThrow(`Config file ${filePath} is not valid JSON`);
  });

  it('should load the bundled configuration', async () => {
    const config = await loadMoodConfig(path.resolve(__dirname, '../../../config/moodtray.json'), noEnv);

    expect(config.thresholds).toEqual(defaultThresholds());
    expect(config.settings).toEqual(DEFAULT_SETTINGS);
    expect(config.skins.default.name).toBe('Classic Penguin');
    expect(config.skins.default.animations.overloaded).toEqual({ fps: 24 });
  });
});
