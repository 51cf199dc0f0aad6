/**
 * Animation Module
 */

export { AnimationScheduler, resolveSequences } from './scheduler';
export type { AnimationSchedulerOptions, PlaybackSnapshot, ResolvedSequence } from './scheduler';
export { loadAnimationSet, frameDurationMs } from './loader';
export { PLACEHOLDER_FRAME } from './types';
export type { AnimationFrame, AnimationManifest, AnimationSet, FrameHandle, SkinManifest } from './types';
