/**
 * MoodTray - Terminal Renderer
 *
 * Stand-in for a tray icon: rewrites one status line per frame.
 */

import * as path from 'path';
import chalk from 'chalk';
import { EMOTION_STATES, EmotionState } from '../mood/types';
import { FrameHandle } from '../animation/types';
import { Renderer } from './types';

type Colorizer = (text: string) => string;

const STATE_COLORS: Record<EmotionState, Colorizer> = {
  calm: chalk.green,
  active: chalk.cyan,
  busy: chalk.yellow,
  stressed: chalk.magenta,
  overloaded: chalk.red.bold,
};

const STATE_EMOJI: Record<EmotionState, string> = {
  calm: '😌',
  active: '🙂',
  busy: '😅',
  stressed: '😰',
  overloaded: '🥵',
};

/**
 * Pull the state name back out of a tooltip such as "Mood: Busy (...)"
 */
export function stateFromTooltip(tooltip: string): EmotionState | null {
  const match = /^Mood: (\w+)/.exec(tooltip);
  if (!match) {
    return null;
  }
  const name = match[1].toLowerCase();
  return EMOTION_STATES.find((state) => state === name) ?? null;
}

export function formatStatusLine(frame: FrameHandle, tooltip: string): string {
  const state = stateFromTooltip(tooltip);
  const colorize = state ? STATE_COLORS[state] : chalk.white;
  const emoji = state ? STATE_EMOJI[state] : '🐧';
  return `${emoji}  ${colorize(tooltip)} ${chalk.gray(`[${path.basename(frame)}]`)}`;
}

/**
 * The part of a tty stream the renderer writes to
 */
export interface StatusStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

export class TerminalRenderer implements Renderer {
  constructor(private readonly stream: StatusStream = process.stdout) {}

  render(frame: FrameHandle, tooltip: string): void {
    const line = formatStatusLine(frame, tooltip);
    if (this.stream.isTTY) {
      this.stream.write(`\r\x1b[2K${line}`);
    } else {
      this.stream.write(`${line}\n`);
    }
  }
}
