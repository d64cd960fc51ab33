/**
 * Low-level errors raised by command transports before classification into the taxonomy.
 *
 * @module
 */

/** How an HTTP exchange failed before any broker reply could be read. */
export type HttpFailureKind = 'timeout' | 'network' | 'status' | 'malformed';

/** HTTP-layer failure (timeout, connection, non-2xx status, unreadable body). */
export class HttpTransportError extends Error {
  readonly kind: HttpFailureKind;
  /** Response status, when a response arrived. */
  readonly statusCode?: number;

  constructor(
    kind: HttpFailureKind,
    message: string,
    options: { statusCode?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'HttpTransportError';
    this.kind = kind;
    this.statusCode = options.statusCode;
  }
}

/** Error reported by the broker itself (e.g. `BUSYGROUP ...`, `OOM ...`, `WRONGTYPE ...`). */
export class BrokerReplyError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'BrokerReplyError';
  }

  /** Leading upper-case token of the reply, e.g. `BUSYGROUP`. */
  get prefix(): string {
    return /^([A-Z]+)\b/.exec(this.message)?.[1] ?? '';
  }
}
