/**
 * Shared shapes for the error taxonomy: severity levels, operator context, and the user-facing error response.
 *
 * @module
 */

import { z } from 'zod';

export const errorSeveritySchema = z.enum([
  'info',
  'warning',
  'error',
  'critical',
]);

export type ErrorSeverity = z.infer<typeof errorSeveritySchema>;

/** Operator-facing context attached to an error. */
export interface ErrorContext {
  /** Machine-readable error code. */
  errorCode: string;
  severity: ErrorSeverity;
  /** When the error was raised. */
  timestamp: Date;
  jobId?: string;
  userId?: string;
  traceId?: string;
  /** Free-form debugging fields (raw reasons live here, never in user messages). */
  metadata: Record<string, string>;
}

/** Wire shape returned to callers outside the system boundary. */
export const errorResponseSchema = z.object({
  error_code: z.string(),
  user_message: z.string(),
  severity: errorSeveritySchema,
  timestamp: z.string(),
  request_id: z.string().optional(),
});

export type ErrorResponse = z.infer<typeof errorResponseSchema>;

/** Common surface of every error in the taxonomy. */
export interface TaxonomyError extends Error {
  /** Stable machine-readable code. */
  readonly code: string;
  readonly severity: ErrorSeverity;
  /** Sanitized message safe to show to end users. */
  readonly userMessage: string;
  /** When the error was raised. */
  readonly timestamp: Date;
  /** Verbose single-line context for operator logs. */
  logContext(): string;
  /** Structured context for operator logs. */
  toContext(ids?: { userId?: string; traceId?: string }): ErrorContext;
}

/** Render the `[CODE] error_code=… severity=… timestamp=…` prefix shared by all log contexts. */
export function formatLogPrefix(
  code: string,
  severity: ErrorSeverity,
  timestamp: Date,
): string {
  return `[${code}] error_code=${code} severity=${severity} timestamp=${timestamp.toISOString()}`;
}

/** Render a quoted `key="value"` log field. */
export function quoted(key: string, value: string): string {
  return `${key}="${value.replace(/"/g, '\\"')}"`;
}
