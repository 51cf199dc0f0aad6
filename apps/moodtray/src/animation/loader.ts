/**
 * Loads skin frames from disk: `<skinDir>/<state>/*.png`, sorted by file name.
 * A missing state directory leaves the state out of the set; the scheduler
 * resolves it by fallback.
 */

import * as fs from 'fs';
import * as path from 'path';
import { EMOTION_STATES, EmotionState } from '../mood/types';
import { AnimationFrame, AnimationSet, SkinManifest } from './types';
import { CONFIG } from '../utils/config';
import { createLogger } from '../utils/logger';

const logger = createLogger('AnimationLoader');

const FRAME_EXTENSIONS = new Set(['.png']);

/**
 * Directory names used by the older three-animation skins
 */
const LEGACY_DIRECTORIES: Partial<Record<EmotionState, string>> = {
  calm: 'idle',
  active: 'walk',
  busy: 'run',
};

async function listFrameFiles(directory: string): Promise<string[] | null> {
  if (!fs.existsSync(directory)) {
    return null;
  }

  try {
    const entries = await fs.promises.readdir(directory);
    return entries
      .filter((entry) => FRAME_EXTENSIONS.has(path.extname(entry).toLowerCase()))
      .sort();
  } catch (error) {
    logger.warn(`Could not read animation directory ${directory}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

export function frameDurationMs(fps: number): number {
  return fps > 0 ? Math.round(1000 / fps) : Math.round(1000 / CONFIG.animation.defaultFps);
}

export async function loadAnimationSet(
  skinDir: string,
  manifest?: SkinManifest
): Promise<AnimationSet> {
  const animations: AnimationSet = {};

  for (const state of EMOTION_STATES) {
    const legacy = LEGACY_DIRECTORIES[state];
    const candidates = legacy ? [state, legacy] : [state];

    for (const name of candidates) {
      const directory = path.resolve(skinDir, name);
      const files = await listFrameFiles(directory);
      if (!files || files.length === 0) {
        continue;
      }

      const fps = manifest?.animations[state]?.fps ?? CONFIG.animation.defaultFps;
      const durationMs = frameDurationMs(fps);
      const frames: AnimationFrame[] = files.map((file) => ({
        handle: path.join(directory, file),
        durationMs,
      }));

      animations[state] = frames;
      logger.debug(`Loaded ${frames.length} frames for ${path.basename(skinDir)}/${name}`, { state, fps });
      break;
    }
  }

  const loaded = Object.keys(animations).length;
  if (loaded === 0) {
    logger.warn(`No animation frames found under ${skinDir}`);
  } else {
    logger.info('Skin loaded', { skin: manifest?.name ?? path.basename(skinDir), states: loaded });
  }

  return animations;
}
