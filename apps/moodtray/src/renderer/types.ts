import type { FrameHandle } from '../animation/types';

/**
 * Receives a frame whenever the displayed frame changes. A returned promise
 * marks the render as in flight; frames produced meanwhile are dropped.
 */
export interface Renderer {
  render(frame: FrameHandle, tooltip: string): void | Promise<void>;
}
