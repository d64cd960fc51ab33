/**
 * Configuration loading: optional JSON file, overlaid with environment variables, validated against the schema.
 *
 * @module
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { z } from 'zod';

import { ConfigError } from '../errors/config-error.js';
import { type AppConfig, appConfigSchema } from '../schemas/config.js';

/** Options for {@link loadConfig}. */
export interface LoadConfigOptions {
  /** JSON config file; defaults apply when omitted. */
  configPath?: string;
  /** Environment to overlay. Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

type Section = Record<string, unknown>;

const sectionSchema = z.record(z.unknown());

/** Get (creating when absent) a nested object in the raw config. */
function section(parent: Section, key: string): Section {
  const parsed = sectionSchema.safeParse(parent[key]);
  const value: Section = parsed.success ? { ...parsed.data } : {};
  parent[key] = value;
  return value;
}

function readFile(configPath: string): Section {
  const fullPath = resolve(configPath);
  let raw: string;
  try {
    raw = readFileSync(fullPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Cannot read config file ${fullPath}`,
      [err instanceof Error ? err.message : String(err)],
      { cause: err },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(
      `Config file ${fullPath} is not valid JSON`,
      [err instanceof Error ? err.message : String(err)],
      { cause: err },
    );
  }

  const root = sectionSchema.safeParse(parsed);
  if (!root.success) {
    throw new ConfigError(`Config file ${fullPath} must contain a JSON object`);
  }
  return { ...root.data };
}

/** Apply environment overrides onto a raw (pre-validation) config object. */
export function applyEnv(raw: Section, env: NodeJS.ProcessEnv): Section {
  const set = (path: string[], value: unknown): void => {
    const key = path[path.length - 1];
    if (key === undefined) return;
    let target = raw;
    for (const segment of path.slice(0, -1)) target = section(target, segment);
    target[key] = value;
  };

  if (env.QUEUE_BACKEND) set(['queue', 'backend'], env.QUEUE_BACKEND);
  if (env.REDIS_URL) set(['queue', 'redis', 'url'], env.REDIS_URL);
  if (env.REDIS_STREAM_KEY) set(['queue', 'streamKey'], env.REDIS_STREAM_KEY);
  if (env.REDIS_CONSUMER_GROUP) {
    set(['queue', 'consumerGroup'], env.REDIS_CONSUMER_GROUP);
  }

  if (env.UPSTASH_REDIS_URL) {
    set(['queue', 'http', 'url'], env.UPSTASH_REDIS_URL);
  }
  if (env.UPSTASH_REDIS_TOKEN) {
    set(['queue', 'http', 'token'], env.UPSTASH_REDIS_TOKEN);
  }
  // The proxy's stream names win only when the proxy is the selected backend.
  const backend = sectionSchema.safeParse(raw.queue);
  if (backend.success && backend.data.backend === 'http') {
    if (env.UPSTASH_REDIS_STREAM_KEY) {
      set(['queue', 'streamKey'], env.UPSTASH_REDIS_STREAM_KEY);
    }
    if (env.UPSTASH_REDIS_CONSUMER_GROUP) {
      set(['queue', 'consumerGroup'], env.UPSTASH_REDIS_CONSUMER_GROUP);
    }
  }

  if (env.DEDUPE_TTL_SECONDS) {
    set(['dedupe', 'ttlSeconds'], Number(env.DEDUPE_TTL_SECONDS));
  }
  if (env.WORKER_CONSUMER_ID) {
    set(['worker', 'consumerId'], env.WORKER_CONSUMER_ID);
  }
  if (env.LOG_LEVEL) set(['log', 'level'], env.LOG_LEVEL);
  if (env.PORT) set(['port'], Number(env.PORT));

  return raw;
}

/** Load and validate configuration. Throws ConfigError on any failure. */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const raw = options.configPath ? readFile(options.configPath) : {};
  const result = appConfigSchema.safeParse(
    applyEnv(raw, options.env ?? process.env),
  );
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}
