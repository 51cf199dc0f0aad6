/**
 * Animation Type Definitions
 */

import type { EmotionState } from '../mood/types';

/**
 * Opaque reference to a bitmap; the loaders use absolute file paths
 */
export type FrameHandle = string;

export interface AnimationFrame {
  readonly handle: FrameHandle;

  /** Nominal display time at playback multiplier 1.0 */
  readonly durationMs: number;
}

/**
 * Per-state cyclic frame sequences. Missing states are resolved by fallback.
 */
export type AnimationSet = Partial<Record<EmotionState, readonly AnimationFrame[]>>;

export interface AnimationManifest {
  fps: number;
}

export interface SkinManifest {
  name: string;
  animations: Partial<Record<EmotionState, AnimationManifest>>;
}

export const PLACEHOLDER_FRAME: AnimationFrame = {
  handle: 'placeholder',
  durationMs: 1000,
};
