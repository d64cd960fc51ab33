/**
 * Tests for configuration loading.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigError } from '../errors/config-error.js';
import { loadConfig } from './load.js';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'reading-queue-test-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const path = join(testDir, 'config.json');
    writeFileSync(
      path,
      typeof content === 'string' ? content : JSON.stringify(content),
    );
    return path;
  }

  it('should apply defaults with no file and an empty environment', () => {
    const config = loadConfig({ env: {} });
    expect(config.port).toBe(3200);
    expect(config.queue).toEqual({
      backend: 'memory',
      streamKey: 'tarot:jobs',
      consumerGroup: 'tarot-workers',
      blockMs: 5000,
      claimIdleMs: 60000,
    });
    expect(config.dedupe).toEqual({ ttlSeconds: 300, keyPrefix: '' });
    expect(config.retry).toEqual({
      maxAttempts: 3,
      baseDelayMs: 1000,
      maxDelayMs: 30000,
      backoffMultiplier: 2,
      jitter: true,
    });
    expect(config.worker).toEqual({
      consumerId: 'worker-1',
      pollIntervalMs: 1000,
      concurrency: 1,
    });
    expect(config.log).toEqual({ level: 'info' });
  });

  it('should read a config file', () => {
    const configPath = writeConfig({
      port: 4000,
      queue: { backend: 'redis', redis: { url: 'redis://127.0.0.1:6379' } },
      retry: { maxAttempts: 5 },
    });
    const config = loadConfig({ configPath, env: {} });
    expect(config.port).toBe(4000);
    expect(config.queue.backend).toBe('redis');
    expect(config.queue.redis?.url).toBe('redis://127.0.0.1:6379');
    expect(config.retry.maxAttempts).toBe(5);
    expect(config.retry.baseDelayMs).toBe(1000);
  });

  it('should overlay environment variables on the file', () => {
    const configPath = writeConfig({ port: 4000, log: { level: 'debug' } });
    const config = loadConfig({
      configPath,
      env: {
        QUEUE_BACKEND: 'redis',
        REDIS_URL: 'redis://cache:6379',
        REDIS_STREAM_KEY: 'readings',
        REDIS_CONSUMER_GROUP: 'readers',
        DEDUPE_TTL_SECONDS: '60',
        WORKER_CONSUMER_ID: 'worker-7',
        LOG_LEVEL: 'warn',
        PORT: '5000',
      },
    });

    expect(config.port).toBe(5000);
    expect(config.queue).toMatchObject({
      backend: 'redis',
      redis: { url: 'redis://cache:6379' },
      streamKey: 'readings',
      consumerGroup: 'readers',
    });
    expect(config.dedupe.ttlSeconds).toBe(60);
    expect(config.worker.consumerId).toBe('worker-7');
    expect(config.log.level).toBe('warn');
  });

  it('should use the proxy stream names only for the http backend', () => {
    const env = {
      UPSTASH_REDIS_URL: 'https://proxy.example.com',
      UPSTASH_REDIS_TOKEN: 'test-token',
      UPSTASH_REDIS_STREAM_KEY: 'proxy:jobs',
      UPSTASH_REDIS_CONSUMER_GROUP: 'proxy-workers',
    };

    const http = loadConfig({ env: { ...env, QUEUE_BACKEND: 'http' } });
    expect(http.queue).toMatchObject({
      backend: 'http',
      streamKey: 'proxy:jobs',
      consumerGroup: 'proxy-workers',
      http: { url: 'https://proxy.example.com', token: 'test-token', timeoutMs: 10000 },
    });

    const memory = loadConfig({ env });
    expect(memory.queue.streamKey).toBe('tarot:jobs');
  });

  it('should require a url for the redis backend', () => {
    const err = configError(() => loadConfig({ env: { QUEUE_BACKEND: 'redis' } }));
    expect(err.code).toBe('CONFIG_INVALID');
    expect(err.issues).toEqual([
      'queue.redis.url: required when queue.backend is "redis"',
    ]);
  });

  it('should require url and token for the http backend', () => {
    const err = configError(() =>
      loadConfig({
        env: { QUEUE_BACKEND: 'http', UPSTASH_REDIS_URL: 'https://proxy.example.com' },
      }),
    );
    expect(err.issues).toEqual(['queue.http.token: Required']);
  });

  it('should reject a zero block time, which would wait forever', () => {
    const configPath = writeConfig({ queue: { blockMs: 0 } });
    const err = configError(() => loadConfig({ configPath, env: {} }));
    expect(err.issues).toEqual([
      'queue.blockMs: Number must be greater than 0',
    ]);
  });

  it('should reject invalid retry settings', () => {
    const configPath = writeConfig({ retry: { backoffMultiplier: 1 } });
    const err = configError(() => loadConfig({ configPath, env: {} }));
    expect(err.issues).toEqual([
      'retry.backoffMultiplier: backoffMultiplier (1) must be greater than 1',
    ]);
  });

  it('should reject a non-numeric port from the environment', () => {
    const err = configError(() => loadConfig({ env: { PORT: 'eighty' } }));
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]).toMatch(/^port: /);
  });

  it('should report unreadable and malformed files', () => {
    expect(
      configError(() => loadConfig({ configPath: join(testDir, 'missing.json'), env: {} }))
        .message,
    ).toMatch(/^Cannot read config file /);

    const configPath = writeConfig('{ not json');
    expect(configError(() => loadConfig({ configPath, env: {} })).message).toMatch(
      /is not valid JSON/,
    );
  });
});
