/**
 * StateTracker
 * Hysteresis between raw classifications and the committed emotion state
 */

import { EmotionState, isEscalation } from '../mood/types';
import { ConfigError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('StateTracker');

export interface TrackerState {
  committed: EmotionState;
  candidate: EmotionState;
  candidateStreak: number;

  /** Timestamp of the last commit; null until the first one */
  lastCommitTime: number | null;
}

export interface TrackerUpdate {
  changed: boolean;
  committed: EmotionState;
  candidate: EmotionState;
  streak: number;
}

/**
 * Holds one candidate transition at a time. Escalation to `overloaded`
 * commits at once; every other change needs `dwellCycles` consecutive polls.
 */
export class StateTracker {
  private state: TrackerState;

  constructor(private readonly dwellCycles: number = 3) {
    if (!Number.isInteger(dwellCycles) || dwellCycles < 1) {
      throw new ConfigError('Dwell cycles must be an integer of at least 1', { dwellCycles });
    }
    this.state = StateTracker.initialState();
  }

  private static initialState(): TrackerState {
    return {
      committed: 'calm',
      candidate: 'calm',
      candidateStreak: 0,
      lastCommitTime: null,
    };
  }

  /**
   * Feed one raw classification; called once per poll cycle
   */
  update(classified: EmotionState, now: number = Date.now()): TrackerUpdate {
    const { committed } = this.state;

    if (classified === committed) {
      this.state.candidate = committed;
      this.state.candidateStreak = 0;
      return this.result(false);
    }

    if (classified === 'overloaded' && isEscalation(committed, classified)) {
      return this.commit(classified, now);
    }

    if (classified === this.state.candidate) {
      this.state.candidateStreak += 1;
    } else {
      this.state.candidate = classified;
      this.state.candidateStreak = 1;
    }

    if (this.state.candidateStreak >= this.dwellCycles) {
      return this.commit(classified, now);
    }

    return this.result(false);
  }

  getCommitted(): EmotionState {
    return this.state.committed;
  }

  snapshot(): TrackerState {
    return { ...this.state };
  }

  reset(): void {
    this.state = StateTracker.initialState();
  }

  private commit(next: EmotionState, now: number): TrackerUpdate {
    logger.debug('Committing state change', {
      from: this.state.committed,
      to: next,
      streak: this.state.candidateStreak,
    });

    this.state = {
      committed: next,
      candidate: next,
      candidateStreak: 0,
      lastCommitTime: now,
    };
    return this.result(true);
  }

  private result(changed: boolean): TrackerUpdate {
    return {
      changed,
      committed: this.state.committed,
      candidate: this.state.candidate,
      streak: this.state.candidateStreak,
    };
  }
}
