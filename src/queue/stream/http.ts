/**
 * Request/response transport: each command is one authenticated POST to a REST command proxy (Upstash-style), answered with `{"result": …}` or `{"error": "…"}`.
 *
 * @module
 */

import type { Logger } from 'pino';
import { z } from 'zod';

import {
  BrokerReplyError,
  HttpTransportError,
} from '../../errors/transport.js';
import { httpPost, type HttpResponse } from '../../lib/http.js';
import type { CommandExecutor } from './commands.js';
import { createStreamQueue, type StreamQueue } from './stream-queue.js';

const errorReplySchema = z.object({ error: z.string() });

export interface HttpExecutorOptions {
  url: string;
  token: string;
  timeoutMs?: number;
}

function snippet(body: string): string {
  return body.length > 200 ? `${body.slice(0, 200)}…` : body;
}

function statusError(res: HttpResponse): HttpTransportError {
  return new HttpTransportError(
    'status',
    `HTTP ${String(res.statusCode)}: ${snippet(res.body)}`,
    { statusCode: res.statusCode },
  );
}

/** Create an executor that sends every command as `POST url` with body `["CMD", ...args]`. */
export function createHttpExecutor(
  options: HttpExecutorOptions,
): CommandExecutor {
  const { url, token, timeoutMs = 10000 } = options;

  return {
    async execute(command, args) {
      const res = await httpPost(
        url,
        {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
        },
        JSON.stringify([command, ...args.map(String)]),
        timeoutMs,
      );
      const ok = res.statusCode >= 200 && res.statusCode < 300;

      let body: unknown;
      try {
        body = JSON.parse(res.body);
      } catch (err) {
        if (!ok) throw statusError(res);
        throw new HttpTransportError(
          'malformed',
          `Unreadable reply body: ${snippet(res.body)}`,
          { statusCode: res.statusCode, cause: err },
        );
      }

      const brokerError = errorReplySchema.safeParse(body);
      if (brokerError.success) {
        throw new BrokerReplyError(brokerError.data.error);
      }
      if (!ok) throw statusError(res);

      if (typeof body !== 'object' || body === null || !('result' in body)) {
        throw new HttpTransportError(
          'malformed',
          `Reply has neither result nor error: ${snippet(res.body)}`,
          { statusCode: res.statusCode },
        );
      }
      return body.result;
    },

    async close() {
      // Connections are per request.
    },
  };
}

export interface HttpStreamQueueConfig extends HttpExecutorOptions {
  streamKey: string;
  consumerGroup: string;
  deadLetterKey?: string;
  claimIdleMs?: number | null;
}

/** Create a stream queue reached through the HTTP command proxy. Reads never block; callers poll. */
export function createHttpStreamQueue(
  config: HttpStreamQueueConfig,
  logger?: Logger,
): StreamQueue {
  return createStreamQueue({
    executor: createHttpExecutor(config),
    backend: 'http',
    streamKey: config.streamKey,
    consumerGroup: config.consumerGroup,
    deadLetterKey: config.deadLetterKey,
    blockMs: null,
    claimIdleMs: config.claimIdleMs,
    logger,
  });
}
