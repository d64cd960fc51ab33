/**
 * Dedupe key derivation from payload content.
 */

import { JSONPath } from 'jsonpath-plus';

import { QueueError } from '../errors/queue-error.js';
import { type JobPayload, toWire } from '../schemas/payload.js';

/**
 * Resolve the dedupe key for a payload: its explicit `dedupeKey`, else the first value a JSONPath expression selects from the wire form (e.g. `$.user_id`), else null.
 */
export function deriveDedupeKey(
  payload: JobPayload,
  expr?: string,
): string | null {
  if (payload.dedupeKey !== undefined) return payload.dedupeKey;
  if (expr === undefined || expr.length === 0) return null;

  let result: unknown;
  try {
    result = JSONPath({ path: expr, json: toWire(payload), wrap: true });
  } catch (err) {
    throw new QueueError(
      'invalid_payload',
      `Invalid dedupe expression '${expr}': ${err instanceof Error ? err.message : String(err)}`,
      { jobId: payload.jobId, cause: err },
    );
  }

  if (!Array.isArray(result) || result.length === 0) return null;
  const [first]: unknown[] = result;
  if (first === null || first === undefined) return null;
  const key = typeof first === 'object' ? JSON.stringify(first) : String(first);
  return key.trim().length > 0 ? key : null;
}
