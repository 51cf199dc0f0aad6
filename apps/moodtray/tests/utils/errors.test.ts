/**
 * Error classes and reporter
 */

import {
  AssetMissingError,
  ConfigError,
  MetricsUnavailableError,
  MoodTrayError,
  RendererFailureError,
  handleError,
  isMoodTrayError,
} from '../../src/utils/errors';
import { LoggingErrorReporter } from '../../src/utils/error-reporter';
import { Logger } from '../../src/utils/logger';

describe('errors', () => {
  it('should mark only configuration errors as fatal', () => {
    expect(new ConfigError('bad').recoverable).toBe(false);
    expect(new MetricsUnavailableError('cpu').recoverable).toBe(true);
    expect(new AssetMissingError('busy', 'calm').recoverable).toBe(true);
    expect(new RendererFailureError('f.png', new Error('gone')).recoverable).toBe(true);
  });

  it('should describe asset fallbacks', () => {
    expect(new AssetMissingError('stressed', 'busy').message).toBe("No frames for 'stressed', falling back to 'busy'");
    expect(new AssetMissingError('calm', null).message).toBe("No frames for 'calm', using placeholder frame");
  });

  it('should carry the render failure cause', () => {
    const error = new RendererFailureError('f.png', new Error('surface lost'));

    expect(error.code).toBe('RENDERER_FAILURE');
    expect(error.details).toEqual({ frame: 'f.png', cause: 'surface lost' });
  });

  it('should serialize to JSON', () => {
    const json = new MetricsUnavailableError('network', new Error('EACCES')).toJSON();

    expect(json).toMatchObject({
      error: 'METRICS_UNAVAILABLE',
      message: "Metric 'network' is unavailable",
      recoverable: true,
      details: { cause: 'EACCES' },
    });
  });

  describe('handleError', () => {
    it('should pass MoodTrayErrors through', () => {
      const original = new ConfigError('bad');

      expect(handleError(original)).toBe(original);
    });

    it('should wrap plain errors and other values', () => {
      expect(handleError(new TypeError('oops'))).toMatchObject({
        code: 'UNKNOWN_ERROR',
        message: 'oops',
        details: { originalError: 'TypeError' },
      });
      expect(handleError(42).details).toEqual({ originalError: '42' });
      expect(isMoodTrayError(handleError('x'))).toBe(true);
    });
  });
});

describe('LoggingErrorReporter', () => {
  let logger: Logger;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logger = new Logger('Test', 'debug');
    warnSpy = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(logger, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should log recoverable errors as warnings', () => {
    new LoggingErrorReporter(logger).report(new MetricsUnavailableError('cpu'));

    expect(warnSpy).toHaveBeenCalledWith("Metric 'cpu' is unavailable", expect.objectContaining({ error: 'METRICS_UNAVAILABLE' }));
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should log fatal errors as errors', () => {
    const error: MoodTrayError = new ConfigError('bad thresholds', { problems: ['x'] });

    new LoggingErrorReporter(logger).report(error);

    expect(errorSpy).toHaveBeenCalledWith('bad thresholds', error, { problems: ['x'] });
    expect(warnSpy).not.toHaveBeenCalled();
  });
});
