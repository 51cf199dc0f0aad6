import { EmotionState } from '../mood/types';

export interface MoodSnapshot {
  readonly state: EmotionState;
  readonly stressScore: number;
  readonly tooltip: string;

  /** Bumped every time the committed state differs from the previous snapshot */
  readonly version: number;
}

/**
 * The only structure shared between the poll path (writer) and the
 * animation path (reader). Snapshots are replaced whole, never mutated.
 */
export class MoodCell {
  private snapshot: MoodSnapshot;

  constructor(initial: Omit<MoodSnapshot, 'version'>) {
    this.snapshot = Object.freeze({ ...initial, version: 0 });
  }

  publish(next: Omit<MoodSnapshot, 'version'>): MoodSnapshot {
    const version = next.state === this.snapshot.state
      ? this.snapshot.version
      : this.snapshot.version + 1;

    this.snapshot = Object.freeze({ ...next, version });
    return this.snapshot;
  }

  read(): MoodSnapshot {
    return this.snapshot;
  }
}
