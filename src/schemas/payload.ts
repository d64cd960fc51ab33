/**
 * Reading-job payload: the wire schema (snake_case JSON), the in-code type, and the codec between them.
 *
 * @module
 */

import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import { QueueError } from '../errors/queue-error.js';

/** Number of cards a reading can draw. */
export const cardCountSchema = z.union([z.literal(3), z.literal(5)]);

export type CardCount = z.infer<typeof cardCountSchema>;

/** JSON shape of a payload as stored on a broker or passed between processes. */
export const jobPayloadWireSchema = z.object({
  job_id: z.string().min(1),
  user_id: z.string().uuid(),
  question: z.string(),
  card_count: cardCountSchema,
  schema_version: z.string(),
  prompt_version: z.string(),
  dedupe_key: z.string().nullish(),
  trace_id: z.string().nullish(),
  /** RFC3339 timestamp. */
  created_at: z.string().datetime({ offset: true }),
  metadata: z.record(z.unknown()).default({}),
});

export type JobPayloadWire = z.input<typeof jobPayloadWireSchema>;

/** Immutable unit of work submitted to the queue. */
export interface JobPayload {
  /** Producer-assigned, globally unique identifier. */
  readonly jobId: string;
  readonly userId: string;
  /** Free-text question the reading answers. */
  readonly question: string;
  readonly cardCount: CardCount;
  readonly schemaVersion: string;
  /** Prompt template identifier (e.g. "v2025-11-20-a"). */
  readonly promptVersion: string;
  /** Suppresses duplicate submissions within the dedupe TTL window. */
  readonly dedupeKey?: string;
  readonly traceId?: string;
  readonly createdAt: Date;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/** Fields a producer must supply; the rest get defaults. */
export type JobPayloadInput = Pick<
  JobPayload,
  'userId' | 'question' | 'cardCount' | 'promptVersion'
> &
  Partial<
    Pick<
      JobPayload,
      | 'jobId'
      | 'schemaVersion'
      | 'dedupeKey'
      | 'traceId'
      | 'createdAt'
      | 'metadata'
    >
  >;

/**
 * Build a payload, assigning a random job id and the current time when absent. Throws QueueError(invalid_payload) when the result would not survive the wire codec.
 */
export function createJobPayload(input: JobPayloadInput): JobPayload {
  return validatePayload({
    jobId: input.jobId ?? randomUUID(),
    userId: input.userId,
    question: input.question,
    cardCount: input.cardCount,
    schemaVersion: input.schemaVersion ?? '1',
    promptVersion: input.promptVersion,
    dedupeKey: input.dedupeKey,
    traceId: input.traceId,
    createdAt: input.createdAt ?? new Date(),
    metadata: input.metadata ?? {},
  });
}

/** Convert a payload to its wire shape. Absent optional fields are omitted. */
export function toWire(payload: JobPayload): JobPayloadWire {
  return {
    job_id: payload.jobId,
    user_id: payload.userId,
    question: payload.question,
    card_count: payload.cardCount,
    schema_version: payload.schemaVersion,
    prompt_version: payload.promptVersion,
    ...(payload.dedupeKey !== undefined
      ? { dedupe_key: payload.dedupeKey }
      : {}),
    ...(payload.traceId !== undefined ? { trace_id: payload.traceId } : {}),
    created_at: payload.createdAt.toISOString(),
    metadata: { ...payload.metadata },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Check that a payload encodes to a valid wire object, so every backend hands back what it accepted. Throws QueueError(invalid_payload).
 */
export function validatePayload(payload: JobPayload): JobPayload {
  if (Number.isNaN(payload.createdAt.getTime())) {
    throw new QueueError('invalid_payload', 'created_at: Invalid date');
  }
  const parsed = jobPayloadWireSchema.safeParse(toWire(payload));
  if (!parsed.success) {
    throw new QueueError('invalid_payload', formatIssues(parsed.error));
  }
  return payload;
}

/** Validate an already-parsed wire object. Throws QueueError(invalid_payload). */
export function fromWire(value: unknown): JobPayload {
  const parsed = jobPayloadWireSchema.safeParse(value);
  if (!parsed.success) {
    throw new QueueError('invalid_payload', formatIssues(parsed.error));
  }

  const wire = parsed.data;
  return {
    jobId: wire.job_id,
    userId: wire.user_id,
    question: wire.question,
    cardCount: wire.card_count,
    schemaVersion: wire.schema_version,
    promptVersion: wire.prompt_version,
    dedupeKey: wire.dedupe_key ?? undefined,
    traceId: wire.trace_id ?? undefined,
    createdAt: new Date(wire.created_at),
    metadata: wire.metadata,
  };
}

/** Producer-side wire shape: identity, creation time and schema version are filled in when absent. */
export const jobSubmissionSchema = jobPayloadWireSchema.extend({
  job_id: z.string().min(1).optional(),
  schema_version: z.string().optional(),
  created_at: z.string().datetime({ offset: true }).optional(),
});

/** Build a payload from a submission object. Throws QueueError(invalid_payload). */
export function fromSubmission(value: unknown): JobPayload {
  const parsed = jobSubmissionSchema.safeParse(value);
  if (!parsed.success) {
    throw new QueueError('invalid_payload', formatIssues(parsed.error));
  }

  const s = parsed.data;
  return createJobPayload({
    jobId: s.job_id,
    userId: s.user_id,
    question: s.question,
    cardCount: s.card_count,
    schemaVersion: s.schema_version,
    promptVersion: s.prompt_version,
    dedupeKey: s.dedupe_key ?? undefined,
    traceId: s.trace_id ?? undefined,
    createdAt: s.created_at === undefined ? undefined : new Date(s.created_at),
    metadata: s.metadata,
  });
}

/** Serialize a payload to JSON for a broker entry. */
export function encodePayload(payload: JobPayload): string {
  return JSON.stringify(toWire(payload));
}

/** Parse a broker entry's JSON. Throws QueueError(invalid_payload) on bad JSON or shape. */
export function decodePayload(json: string): JobPayload {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    throw new QueueError(
      'invalid_payload',
      `Payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  return fromWire(value);
}
