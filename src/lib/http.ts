/**
 * Shared HTTP utility for making POST requests.
 */

import type { IncomingMessage } from 'node:http';
import { request as httpRequest } from 'node:http';
import { request as httpsRequest } from 'node:https';

import { HttpTransportError } from '../errors/transport.js';

/** Raw response of a completed exchange. Status interpretation is left to the caller. */
export interface HttpResponse {
  statusCode: number;
  body: string;
}

/**
 * Make an HTTP/HTTPS POST request. Resolves with the status and raw body of any response; rejects with an HttpTransportError on timeout or connection failure.
 */
export function httpPost(
  url: string,
  headers: Record<string, string>,
  body: string,
  timeoutMs = 30000,
): Promise<HttpResponse> {
  return new Promise((resolve, reject) => {
    const parsedUrl = new URL(url);
    const isHttps = parsedUrl.protocol === 'https:';
    const requestFn = isHttps ? httpsRequest : httpRequest;

    const req = requestFn(
      {
        hostname: parsedUrl.hostname,
        port: parsedUrl.port,
        path: parsedUrl.pathname + parsedUrl.search,
        method: 'POST',
        headers: {
          ...headers,
          'Content-Length': Buffer.byteLength(body),
        },
        timeout: timeoutMs,
      },
      (res: IncomingMessage) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });
        // Decode once: a multi-byte character may straddle two chunks.
        res.on('end', () => {
          resolve({
            statusCode: res.statusCode ?? 0,
            body: Buffer.concat(chunks).toString('utf8'),
          });
        });
        res.on('error', (err: Error) => {
          reject(
            new HttpTransportError(
              'network',
              `Response aborted: ${err.message}`,
              { cause: err },
            ),
          );
        });
      },
    );

    // A destroyed request also emits 'error'; only the first rejection counts.
    req.on('error', (err: Error) => {
      reject(
        new HttpTransportError('network', `Request failed: ${err.message}`, {
          cause: err,
        }),
      );
    });
    req.on('timeout', () => {
      reject(
        new HttpTransportError(
          'timeout',
          `Request timed out after ${String(timeoutMs)}ms`,
        ),
      );
      req.destroy();
    });

    req.write(body);
    req.end();
  });
}
