/**
 * MoodTray Custom Error Classes
 *
 * Only configuration errors are fatal; everything else is reported and the
 * timers keep running.
 */

/**
 * Base application error
 */
export class MoodTrayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = true,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'MoodTrayError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      recoverable: this.recoverable,
      details: this.details,
      timestamp: Date.now(),
    };
  }
}

/**
 * Malformed or out-of-order thresholds (fatal at startup)
 */
export class ConfigError extends MoodTrayError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', false, details);
    this.name = 'ConfigError';
  }
}

/**
 * A metric counter could not be read
 */
export class MetricsUnavailableError extends MoodTrayError {
  constructor(public readonly metric: string, cause?: unknown) {
    super(
      `Metric '${metric}' is unavailable`,
      'METRICS_UNAVAILABLE',
      true,
      cause instanceof Error ? { cause: cause.message } : undefined
    );
    this.name = 'MetricsUnavailableError';
  }
}

/**
 * No frames were loaded for an emotion state
 */
export class AssetMissingError extends MoodTrayError {
  constructor(state: string, resolvedFrom: string | null) {
    const message = resolvedFrom
      ? `No frames for '${state}', falling back to '${resolvedFrom}'`
      : `No frames for '${state}', using placeholder frame`;
    super(message, 'ASSET_MISSING', true, { state, resolvedFrom });
    this.name = 'AssetMissingError';
  }
}

/**
 * The external render callback threw or rejected
 */
export class RendererFailureError extends MoodTrayError {
  constructor(frame: string, cause: unknown) {
    super(
      `Render of frame '${frame}' failed`,
      'RENDERER_FAILURE',
      true,
      { frame, cause: cause instanceof Error ? cause.message : String(cause) }
    );
    this.name = 'RendererFailureError';
  }
}

/**
 * Type guard for MoodTrayError
 */
export const isMoodTrayError = (error: unknown): error is MoodTrayError => {
  return error instanceof MoodTrayError;
};

/**
 * Error handler utility
 */
export const handleError = (error: unknown): MoodTrayError => {
  if (isMoodTrayError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new MoodTrayError(
      error.message,
      'UNKNOWN_ERROR',
      true,
      { originalError: error.name }
    );
  }

  return new MoodTrayError(
    'An unknown error occurred',
    'UNKNOWN_ERROR',
    true,
    { originalError: String(error) }
  );
};
