/**
 * Observability sink for recoverable failures
 */

import { MoodTrayError } from './errors';
import { Logger, createLogger } from './logger';

export interface ErrorReporter {
  report(error: MoodTrayError): void;
}

/**
 * Default reporter: recoverable errors are warnings, the rest are errors
 */
export class LoggingErrorReporter implements ErrorReporter {
  constructor(private readonly logger: Logger = createLogger('ErrorReporter')) {}

  report(error: MoodTrayError): void {
    if (error.recoverable) {
      this.logger.warn(error.message, error.toJSON());
      return;
    }
    this.logger.error(error.message, error, error.details);
  }
}
