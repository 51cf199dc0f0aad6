/**
 * Orchestrator - drives the poll and animation timers
 *
 * Poll path:      source -> resolver -> classifier -> tracker -> trend -> MoodCell
 * Animation path: MoodCell -> scheduler -> renderer
 *
 * The poll path never touches the scheduler and the animation path never
 * touches the tracker; the MoodCell snapshot is all that crosses between them.
 */

import { EmotionClassifier } from '../mood/classifier';
import { MetricSampleResolver } from '../mood/sample-resolver';
import { StressTrend } from '../mood/stress-trend';
import { describeStressors, formatTooltip } from '../mood/stressors';
import {
  Classification,
  MONITOR_MODES,
  MetricReading,
  MetricSample,
  MonitorMode,
  ThresholdConfig,
  isDegradedFor,
  isMonitorMode,
  metricsForMode,
} from '../mood/types';
import { StateTracker, TrackerState } from '../tracker/state-tracker';
import { AnimationScheduler, PlaybackSnapshot } from '../animation/scheduler';
import { AnimationSet, FrameHandle } from '../animation/types';
import { MetricSource } from '../metrics/types';
import { Renderer } from '../renderer/types';
import { MoodCell, MoodSnapshot } from './mood-cell';
import { assertValidThresholds } from '../config/loader';
import { DEFAULT_SETTINGS, MoodSettings, validateSettings } from '../utils/config';
import {
  ConfigError,
  MetricsUnavailableError,
  MoodTrayError,
  RendererFailureError,
  handleError,
} from '../utils/errors';
import { ErrorReporter, LoggingErrorReporter } from '../utils/error-reporter';
import { createLogger } from '../utils/logger';

const logger = createLogger('Orchestrator');

const isPromiseLike = (value: unknown): value is PromiseLike<void> =>
  typeof value === 'object' && value !== null && typeof Reflect.get(value, 'then') === 'function';

export interface OrchestratorOptions {
  source: MetricSource;
  renderer: Renderer;
  thresholds: ThresholdConfig;
  animations: AnimationSet;
  settings?: Partial<MoodSettings>;
  errorReporter?: ErrorReporter;
  clock?: () => number;
}

export interface OrchestratorStatus {
  running: boolean;
  mode: MonitorMode;
  mood: MoodSnapshot;
  lastSample: MetricSample | null;
  lastClassification: Classification | null;
  tracker: TrackerState;
  playback: PlaybackSnapshot;
}

export class Orchestrator {
  private readonly settings: MoodSettings;
  private readonly source: MetricSource;
  private readonly renderer: Renderer;
  private readonly errorReporter: ErrorReporter;
  private readonly clock: () => number;

  private readonly classifier: EmotionClassifier;
  private readonly resolver = new MetricSampleResolver();
  private readonly tracker: StateTracker;
  private readonly trend: StressTrend;
  private readonly scheduler: AnimationScheduler;
  private readonly cell: MoodCell;

  private mode: MonitorMode;
  private pendingMode: MonitorMode | null = null;
  private pendingThresholds: ThresholdConfig | null = null;
  private pendingAnimations: AnimationSet | null = null;

  private pollTimer: NodeJS.Timeout | null = null;
  private animationTimer: NodeJS.Timeout | null = null;
  private detachAbort: (() => void) | null = null;
  private running = false;
  private stopped = false;

  private pollInFlight = false;
  private renderInFlight = false;
  private lastSeenVersion = 0;
  private lastRenderedFrame: FrameHandle | null = null;
  private lastSample: MetricSample | null = null;
  private lastClassification: Classification | null = null;

  constructor(options: OrchestratorOptions) {
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    const problems = validateSettings(this.settings);
    if (problems.length > 0) {
      throw new ConfigError('Settings are invalid', { problems });
    }

    this.source = options.source;
    this.renderer = options.renderer;
    this.errorReporter = options.errorReporter ?? new LoggingErrorReporter();
    this.clock = options.clock ?? (() => Date.now());
    this.mode = this.settings.mode;

    this.classifier = new EmotionClassifier(assertValidThresholds(options.thresholds));
    this.tracker = new StateTracker(this.settings.dwellCycles);
    this.trend = new StressTrend(this.settings.stressSmoothing);
    this.scheduler = new AnimationScheduler(options.animations, {
      maxPlaybackMultiplier: this.settings.maxPlaybackMultiplier,
    });

    const committed = this.tracker.getCommitted();
    this.cell = new MoodCell({
      state: committed,
      stressScore: 0,
      tooltip: formatTooltip(committed, 0),
    });
  }

  /**
   * Start both timers. Aborting `signal` has the same effect as stop().
   */
  start(signal?: AbortSignal): void {
    if (this.running || this.stopped) {
      return;
    }
    if (signal?.aborted) {
      this.stopped = true;
      return;
    }

    this.running = true;
    const snapshot = this.cell.read();
    this.lastSeenVersion = snapshot.version;
    this.scheduler.setState(snapshot.state, this.clock());

    if (signal) {
      const onAbort = () => this.stop();
      signal.addEventListener('abort', onAbort, { once: true });
      this.detachAbort = () => signal.removeEventListener('abort', onAbort);
    }

    this.pollTimer = setInterval(() => this.schedulePoll(), this.settings.pollIntervalMs);
    this.animationTimer = setInterval(() => this.animationTick(), this.settings.animationIntervalMs);

    logger.info('Monitoring started', {
      mode: this.mode,
      pollIntervalMs: this.settings.pollIntervalMs,
      animationIntervalMs: this.settings.animationIntervalMs,
    });

    this.schedulePoll();
  }

  /**
   * Stop both timers. In-flight samples are discarded when they arrive and
   * pending renders are not waited for.
   */
  stop(): void {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    this.running = false;

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.animationTimer) {
      clearInterval(this.animationTimer);
      this.animationTimer = null;
    }
    this.detachAbort?.();
    this.detachAbort = null;

    logger.info('Monitoring stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Switch monitor mode; takes effect on the next poll cycle
   * @throws ConfigError for an unknown mode
   */
  setMode(mode: string): void {
    if (!isMonitorMode(mode)) {
      throw new ConfigError(`Unknown monitor mode '${mode}'`, { mode, allowed: MONITOR_MODES });
    }
    this.pendingMode = mode;
  }

  /**
   * Swap the skin; the animation path picks it up on its next tick and
   * restarts the current state at frame 0
   */
  setAnimations(animations: AnimationSet): void {
    this.pendingAnimations = animations;
  }

  /**
   * Replace the thresholds; takes effect on the next poll cycle
   * @throws ConfigError when the ordering is invalid
   */
  setThresholds(config: ThresholdConfig): void {
    this.pendingThresholds = assertValidThresholds(config);
  }

  /**
   * Run one poll cycle. Skipped while a previous sample is still in flight.
   */
  async pollOnce(): Promise<void> {
    if (this.stopped || this.pollInFlight) {
      return;
    }

    this.pollInFlight = true;
    let reading: MetricReading;
    try {
      reading = await this.source.sample();
    } catch (error) {
      if (!this.stopped) {
        this.report(new MetricsUnavailableError('all', error));
      }
      return;
    } finally {
      this.pollInFlight = false;
    }

    if (this.stopped) {
      logger.debug('Discarding sample that arrived after shutdown');
      return;
    }

    this.processReading(reading);
  }

  /**
   * One animation step: pick up a new committed state, advance the
   * playhead, render if the frame changed.
   */
  animationTick(now: number = this.clock()): void {
    if (this.stopped) {
      return;
    }

    if (this.pendingAnimations) {
      this.scheduler.setAnimations(this.pendingAnimations, now);
      this.pendingAnimations = null;
      this.lastRenderedFrame = null;
      logger.info('Skin changed', { degradedStates: this.scheduler.degradedStates() });
    }

    const mood = this.cell.read();
    if (mood.version !== this.lastSeenVersion) {
      this.lastSeenVersion = mood.version;
      this.scheduler.setState(mood.state, now);
    }
    this.scheduler.setStressScore(mood.stressScore);

    const frame = this.scheduler.tick(now);
    if (frame === this.lastRenderedFrame || this.renderInFlight) {
      return;
    }

    this.renderFrame(frame, mood.tooltip);
  }

  getStatus(): OrchestratorStatus {
    return {
      running: this.running,
      mode: this.mode,
      mood: this.cell.read(),
      lastSample: this.lastSample,
      lastClassification: this.lastClassification,
      tracker: this.tracker.snapshot(),
      playback: this.scheduler.current(),
    };
  }

  private schedulePoll(): void {
    this.pollOnce().catch((error: unknown) => this.report(handleError(error)));
  }

  private applyPendingControl(): void {
    if (this.pendingThresholds) {
      this.classifier.setThresholds(this.pendingThresholds);
      this.pendingThresholds = null;
      this.trend.reset();
      logger.info('Thresholds updated');
    }
    if (this.pendingMode && this.pendingMode !== this.mode) {
      logger.info('Monitor mode changed', { from: this.mode, to: this.pendingMode });
      this.mode = this.pendingMode;
      this.trend.reset();
    }
    this.pendingMode = null;
  }

  private processReading(reading: MetricReading): void {
    this.applyPendingControl();

    const sample = this.resolver.resolve(reading);
    const metrics = metricsForMode(this.mode);
    const classification = this.classifier.classify(sample, metrics);
    const update = this.tracker.update(classification.state, this.clock());
    const degraded = isDegradedFor(sample, metrics);
    const stressScore = this.trend.update(classification.stressScore, degraded);
    const stressors = describeStressors(sample, this.classifier.getThresholds(), metrics);

    this.cell.publish({
      state: update.committed,
      stressScore,
      tooltip: formatTooltip(update.committed, stressScore, stressors),
    });

    this.lastSample = sample;
    this.lastClassification = classification;

    if (update.changed) {
      logger.info('Mood changed', {
        mood: update.committed,
        stressScore,
        degraded,
      });
    }
  }

  private renderFrame(frame: FrameHandle, tooltip: string): void {
    this.lastRenderedFrame = frame;

    let result: void | Promise<void>;
    try {
      result = this.renderer.render(frame, tooltip);
    } catch (error) {
      this.report(new RendererFailureError(frame, error));
      return;
    }

    if (isPromiseLike(result)) {
      this.renderInFlight = true;
      void Promise.resolve(result)
        .catch((error: unknown) => {
          if (!this.stopped) {
            this.report(new RendererFailureError(frame, error));
          }
        })
        .finally(() => {
          this.renderInFlight = false;
        });
    }
  }

  private report(error: MoodTrayError): void {
    try {
      this.errorReporter.report(error);
    } catch (reporterError) {
      logger.error('Error reporter failed', reporterError, { original: error.code });
    }
  }
}
