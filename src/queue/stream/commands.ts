/**
 * Broker command seam shared by the native and HTTP stream transports, plus zod parsers for the stream replies the queue consumes.
 *
 * @module
 */

import { z } from 'zod';

import { BrokerReplyError } from '../../errors/transport.js';

export type CommandArg = string | number;

export interface ExecuteOptions {
  /** The command may block server-side (XREADGROUP … BLOCK). */
  blocking?: boolean;
}

/** Sends one broker command and resolves with its decoded reply. */
export interface CommandExecutor {
  execute(
    command: string,
    args: CommandArg[],
    options?: ExecuteOptions,
  ): Promise<unknown>;
  close(): Promise<void>;
}

/** `[id, [field, value, ...]]` */
const streamEntrySchema = z.tuple([z.string(), z.array(z.string())]);

/** A stream entry with its field list folded into a record. */
export interface StreamEntry {
  id: string;
  fields: Record<string, string>;
}

function toEntry([id, flat]: z.infer<typeof streamEntrySchema>): StreamEntry {
  const fields: Record<string, string> = {};
  for (let i = 0; i + 1 < flat.length; i += 2) {
    fields[flat[i] ?? ''] = flat[i + 1] ?? '';
  }
  return { id, fields };
}

/** XREADGROUP: nil, or `[[stream, [entry, ...]], ...]`. */
const readGroupReplySchema = z
  .array(z.tuple([z.string(), z.array(streamEntrySchema)]))
  .nullable();

/** XAUTOCLAIM: `[cursor, [entry | nil, ...], deleted?]`. Entries trimmed from the stream come back without fields. */
const autoClaimReplySchema = z
  .tuple([
    z.string(),
    z.array(
      z.union([
        streamEntrySchema,
        z.tuple([z.string(), z.null()]),
        z.null(),
      ]),
    ),
  ])
  .rest(z.unknown());

/** XPENDING extended form: `[[id, consumer, idleMs, deliveries], ...]`. */
const pendingRangeReplySchema = z.array(
  z.tuple([z.string(), z.string(), z.coerce.number(), z.coerce.number()]),
);

/** XPENDING summary form: `[count, smallest, largest, consumers]`. */
const pendingSummaryReplySchema = z
  .tuple([z.coerce.number()])
  .rest(z.unknown());

const integerReplySchema = z.coerce.number().int();

function parse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  command: string,
  reply: unknown,
): T {
  const result = schema.safeParse(reply);
  if (!result.success) {
    throw new BrokerReplyError(
      `ERR unexpected ${command} reply: ${result.error.issues
        .map((i) => `${i.path.join('.') || '(root)'} ${i.message}`)
        .join('; ')}`,
    );
  }
  return result.data;
}

export function parseReadGroupReply(reply: unknown): StreamEntry[] {
  const streams = parse(readGroupReplySchema, 'XREADGROUP', reply) ?? [];
  return streams.flatMap(([, entries]) => entries.map(toEntry));
}

export function parseAutoClaimReply(reply: unknown): StreamEntry[] {
  const [, entries] = parse(autoClaimReplySchema, 'XAUTOCLAIM', reply);
  return entries.flatMap((entry) => {
    if (entry === null) return [];
    const [id, flat] = entry;
    return flat === null ? [] : [toEntry([id, flat])];
  });
}

/** Delivery count of the first pending entry in the reply, or undefined when none. */
export function parsePendingDeliveries(reply: unknown): number | undefined {
  const rows = parse(pendingRangeReplySchema, 'XPENDING', reply);
  return rows[0]?.[3];
}

export function parsePendingCount(reply: unknown): number {
  return parse(pendingSummaryReplySchema, 'XPENDING', reply)[0];
}

export function parseInteger(command: string, reply: unknown): number {
  return parse(integerReplySchema, command, reply);
}

export function parseEntryId(reply: unknown): string {
  return parse(z.string(), 'XADD', reply);
}

/** True for the broker's "consumer group already exists" reply. */
export function isBusyGroup(err: unknown): boolean {
  return (
    err instanceof BrokerReplyError &&
    (err.prefix === 'BUSYGROUP' || /already exists/i.test(err.message))
  );
}
