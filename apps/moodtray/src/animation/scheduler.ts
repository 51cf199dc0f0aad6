/**
 * AnimationScheduler - per-state cyclic frame player
 *
 * Runs on its own clock, independent of metric polling. Frame sequences are
 * resolved when an animation set is installed; ticks only move the playhead.
 */

import { EMOTION_STATES, EmotionState, severityRank } from '../mood/types';
import { AnimationFrame, AnimationSet, FrameHandle, PLACEHOLDER_FRAME } from './types';
import { AssetMissingError } from '../utils/errors';
import { CONFIG } from '../utils/config';
import { createLogger } from '../utils/logger';

const logger = createLogger('AnimationScheduler');

export interface AnimationSchedulerOptions {
  /** Playback speed at stress score 100 */
  maxPlaybackMultiplier?: number;

  /** Frame used when no state down the chain has frames */
  placeholder?: AnimationFrame;

  initialState?: EmotionState;
}

export interface ResolvedSequence {
  frames: readonly AnimationFrame[];

  /** State the frames belong to; null for the placeholder */
  resolvedFrom: EmotionState | null;
}

export interface PlaybackSnapshot {
  state: EmotionState;
  frameIndex: number;
  elapsedInFrame: number;
  playbackMultiplier: number;
  frame: AnimationFrame;
  resolvedFrom: EmotionState | null;
}

/**
 * Resolve every state to a playable sequence: own frames, else the nearest
 * lower-severity state with frames, else the placeholder.
 */
export function resolveSequences(
  animations: AnimationSet,
  placeholder: AnimationFrame = PLACEHOLDER_FRAME
): Record<EmotionState, ResolvedSequence> {
  const resolve = (state: EmotionState): ResolvedSequence => {
    for (let rank = severityRank(state); rank >= 0; rank--) {
      const candidate = EMOTION_STATES[rank];
      const frames = animations[candidate];
      if (frames && frames.length > 0) {
        return { frames, resolvedFrom: candidate };
      }
    }
    return { frames: [placeholder], resolvedFrom: null };
  };

  return {
    calm: resolve('calm'),
    active: resolve('active'),
    busy: resolve('busy'),
    stressed: resolve('stressed'),
    overloaded: resolve('overloaded'),
  };
}

export class AnimationScheduler {
  private sequences: Record<EmotionState, ResolvedSequence>;
  private readonly maxPlaybackMultiplier: number;
  private readonly placeholder: AnimationFrame | undefined;

  private activeState: EmotionState;
  private frameIndex = 0;
  private elapsedInFrame = 0;
  private playbackMultiplier = 1;
  private lastTickAt: number | null = null;

  constructor(animations: AnimationSet, options: AnimationSchedulerOptions = {}) {
    this.maxPlaybackMultiplier = Math.max(
      options.maxPlaybackMultiplier ?? CONFIG.animation.maxPlaybackMultiplier,
      1
    );
    this.activeState = options.initialState ?? 'calm';
    this.placeholder = options.placeholder;
    this.sequences = this.install(animations);
  }

  /**
   * Replace the frame set (skin change). The active state restarts at frame 0.
   */
  setAnimations(animations: AnimationSet, now: number): void {
    this.sequences = this.install(animations);
    this.setState(this.activeState, now);
  }

  /**
   * Switch to a committed state; playback restarts at the first frame
   */
  setState(state: EmotionState, now: number): void {
    this.activeState = state;
    this.frameIndex = 0;
    this.elapsedInFrame = 0;
    this.lastTickAt = now;
  }

  /**
   * Scale playback linearly from 1.0 at score 0 to the max at score 100
   */
  setStressScore(score: number): void {
    const clamped = Math.max(0, Math.min(100, score));
    this.playbackMultiplier = 1 + (this.maxPlaybackMultiplier - 1) * (clamped / 100);
  }

  /**
   * Advance the playhead to `now` and return the frame to display. Calling it
   * again with the same `now` returns the same frame without side effects.
   */
  tick(now: number): FrameHandle {
    if (this.lastTickAt === null) {
      this.lastTickAt = now;
      return this.currentFrame().handle;
    }

    // A clock that runs backwards contributes nothing
    const delta = Math.max(0, now - this.lastTickAt);
    this.lastTickAt = Math.max(this.lastTickAt, now);
    this.elapsedInFrame += delta;

    const { frames } = this.sequences[this.activeState];
    const threshold = this.effectiveDuration(this.currentFrame());

    if (this.elapsedInFrame >= threshold) {
      this.elapsedInFrame -= threshold;
      this.frameIndex = (this.frameIndex + 1) % frames.length;

      // Drop backlog instead of skipping frames after a stall
      if (this.elapsedInFrame >= this.effectiveDuration(this.currentFrame())) {
        this.elapsedInFrame = 0;
      }
    }

    return this.currentFrame().handle;
  }

  getState(): EmotionState {
    return this.activeState;
  }

  getFrameIndex(): number {
    return this.frameIndex;
  }

  getPlaybackMultiplier(): number {
    return this.playbackMultiplier;
  }

  getSequence(state: EmotionState): ResolvedSequence {
    return this.sequences[state];
  }

  /**
   * States running on another state's frames or on the placeholder
   */
  degradedStates(): EmotionState[] {
    return EMOTION_STATES.filter((state) => this.sequences[state].resolvedFrom !== state);
  }

  current(): PlaybackSnapshot {
    const { resolvedFrom } = this.sequences[this.activeState];
    return {
      state: this.activeState,
      frameIndex: this.frameIndex,
      elapsedInFrame: this.elapsedInFrame,
      playbackMultiplier: this.playbackMultiplier,
      frame: this.currentFrame(),
      resolvedFrom,
    };
  }

  // Degraded mode is reported once per state per install, never per tick
  private install(animations: AnimationSet): Record<EmotionState, ResolvedSequence> {
    const sequences = resolveSequences(animations, this.placeholder);
    for (const state of EMOTION_STATES) {
      const { resolvedFrom } = sequences[state];
      if (resolvedFrom !== state) {
        const warning = new AssetMissingError(state, resolvedFrom);
        logger.withFields({ state }).warn(warning.message, warning.toJSON());
      }
    }
    return sequences;
  }

  private currentFrame(): AnimationFrame {
    const { frames } = this.sequences[this.activeState];
    return frames[this.frameIndex] ?? frames[0];
  }

  private effectiveDuration(frame: AnimationFrame): number {
    return Math.max(frame.durationMs, 1) / this.playbackMultiplier;
  }
}
