/**
 * Fatal configuration error, raised at startup (invalid retry settings, missing broker endpoint, malformed config file).
 *
 * @module
 */

import {
  type ErrorContext,
  type ErrorSeverity,
  formatLogPrefix,
  quoted,
  type TaxonomyError,
} from './types.js';

/** Invalid or incomplete configuration. Never raised once the process is running. */
export class ConfigError extends Error implements TaxonomyError {
  readonly code = 'CONFIG_INVALID';
  readonly severity: ErrorSeverity = 'critical';
  readonly userMessage =
    'The service is misconfigured. Please contact support.';
  /** One entry per violated rule. */
  readonly issues: string[];
  readonly timestamp = new Date();

  constructor(
    summary: string,
    issues: string[] = [],
    options: { cause?: unknown } = {},
  ) {
    super(issues.length > 0 ? `${summary}: ${issues.join('; ')}` : summary, {
      cause: options.cause,
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }

  logContext(): string {
    return [
      formatLogPrefix(this.code, this.severity, this.timestamp),
      quoted('reason', this.message),
    ].join(' ');
  }

  toContext(ids: { userId?: string; traceId?: string } = {}): ErrorContext {
    return {
      errorCode: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      userId: ids.userId,
      traceId: ids.traceId,
      metadata: { issues: this.issues.join('; ') },
    };
  }
}
