/**
 * Deduplication gate: atomic set-if-absent with expiry.
 *
 * `trySetKey` is the only race-safe check. `exists` followed by `trySetKey` can interleave with another producer and is for inspection only.
 *
 * @module
 */

import type { Logger } from 'pino';

import { classifyError } from '../errors/classify.js';
import { QueueError } from '../errors/queue-error.js';
import type { CommandExecutor } from '../queue/stream/commands.js';
import { parseInteger } from '../queue/stream/commands.js';

export interface DedupeGate {
  /** Set the key with a TTL iff it is absent. True when this caller won. */
  trySetKey(key: string, ttlSeconds: number): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  /** Remove the key. Missing keys are a no-op. */
  deleteKey(key: string): Promise<void>;
  /** Remaining seconds, or null for missing or non-expiring keys. */
  getTtl(key: string): Promise<number | null>;
}

function checkKey(key: string): void {
  if (key.trim().length === 0) {
    throw new QueueError('invalid_payload', 'Dedupe key must not be empty');
  }
}

function checkTtl(ttlSeconds: number): void {
  if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
    throw new QueueError(
      'invalid_payload',
      `Dedupe TTL must be a positive integer number of seconds, got ${String(ttlSeconds)}`,
    );
  }
}

export interface BrokerDedupeGateOptions {
  /** Prepended to every key. */
  keyPrefix?: string;
  logger?: Logger;
}

/** Dedupe gate over broker key commands (`SET NX EX`, `EXISTS`, `DEL`, `TTL`). */
export function createBrokerDedupeGate(
  executor: CommandExecutor,
  options: BrokerDedupeGateOptions = {},
): DedupeGate {
  const prefix = options.keyPrefix ?? '';

  async function send(
    command: string,
    args: Array<string | number>,
  ): Promise<unknown> {
    try {
      return await executor.execute(command, args);
    } catch (err) {
      const error = classifyError(err);
      options.logger?.warn(
        { context: error.logContext() },
        `Dedupe ${command} failed`,
      );
      throw error;
    }
  }

  return {
    async trySetKey(key, ttlSeconds) {
      checkKey(key);
      checkTtl(ttlSeconds);
      const reply = await send('SET', [
        prefix + key,
        '1',
        'NX',
        'EX',
        ttlSeconds,
      ]);
      return reply === 'OK';
    },

    async exists(key) {
      checkKey(key);
      return parseInteger('EXISTS', await send('EXISTS', [prefix + key])) > 0;
    },

    async deleteKey(key) {
      checkKey(key);
      await send('DEL', [prefix + key]);
    },

    async getTtl(key) {
      checkKey(key);
      const ttl = parseInteger('TTL', await send('TTL', [prefix + key]));
      return ttl < 0 ? null : ttl;
    },
  };
}

export interface MemoryDedupeGateOptions {
  /** Current time in ms. */
  now?: () => number;
}

export interface MemoryDedupeGate extends DedupeGate {
  /** Number of keys held, expired ones not yet swept included. */
  size(): number;
}

/** In-process dedupe gate. Expired keys are swept on every `trySetKey`. */
export function createMemoryDedupeGate(
  options: MemoryDedupeGateOptions = {},
): MemoryDedupeGate {
  const now = options.now ?? Date.now;
  const expiries = new Map<string, number>();

  function live(key: string): number | undefined {
    const expiresAt = expiries.get(key);
    if (expiresAt !== undefined && expiresAt <= now()) {
      expiries.delete(key);
      return undefined;
    }
    return expiresAt;
  }

  function sweep(): void {
    const current = now();
    for (const [key, expiresAt] of expiries) {
      if (expiresAt <= current) expiries.delete(key);
    }
  }

  return {
    async trySetKey(key, ttlSeconds) {
      checkKey(key);
      checkTtl(ttlSeconds);
      sweep();
      if (expiries.has(key)) return false;
      expiries.set(key, now() + ttlSeconds * 1000);
      return true;
    },

    async exists(key) {
      checkKey(key);
      return live(key) !== undefined;
    },

    async deleteKey(key) {
      checkKey(key);
      expiries.delete(key);
    },

    async getTtl(key) {
      checkKey(key);
      const expiresAt = live(key);
      return expiresAt === undefined
        ? null
        : Math.ceil((expiresAt - now()) / 1000);
    },

    size() {
      return expiries.size;
    },
  };
}
