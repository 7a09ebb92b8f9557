/**
 * Configuration loading for Signalpost
 *
 * Loads ~/.signalpost/.env, then an optional ~/.signalpost/signalpost.json,
 * merges it over the defaults, applies env overrides and validates the result.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ValidationError } from '../infra/errors';
import { createLogger } from './logger';

const logger = createLogger('config');

// Load .env file from ~/.signalpost/.env first, then CWD fallback
dotenvConfig({ path: join(homedir(), '.signalpost', '.env') });
dotenvConfig();

// =============================================================================
// SCHEMA
// =============================================================================

const positiveInt = z.coerce.number().int().positive();

const configSchema = z.object({
  stateDir: z.string().min(1),
  database: z.object({
    /** sql.js file; null keeps everything in memory */
    file: z.string().min(1).nullable(),
  }),
  alerts: z.object({
    intervalMs: positiveInt,
  }),
  delivery: z
    .object({
      intervalMs: positiveInt,
      batchSize: positiveInt.max(500),
      maxAttempts: positiveInt.max(100),
      baseDelayMs: positiveInt,
      maxDelayMs: positiveInt,
      requestTimeoutMs: positiveInt,
      staleAfterMs: positiveInt,
      userAgent: z.string().min(1),
    })
    .refine((d) => d.maxDelayMs >= d.baseDelayMs, {
      message: 'maxDelayMs must be >= baseDelayMs',
      path: ['maxDelayMs'],
    })
    // The last entry of a batch may wait behind every request before it
    .refine((d) => d.staleAfterMs > d.batchSize * d.requestTimeoutMs, {
      message: 'staleAfterMs must exceed batchSize * requestTimeoutMs',
      path: ['staleAfterMs'],
    }),
});

export type SignalpostConfig = z.infer<typeof configSchema>;
export type DeliveryConfig = SignalpostConfig['delivery'];

// =============================================================================
// PATHS
// =============================================================================

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.SIGNALPOST_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.signalpost');
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.SIGNALPOST_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'signalpost.json');
}

// =============================================================================
// DEFAULTS
// =============================================================================

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): SignalpostConfig {
  const stateDir = resolveStateDir(env);
  return {
    stateDir,
    database: { file: join(stateDir, 'signalpost.db') },
    alerts: { intervalMs: 30_000 },
    delivery: {
      intervalMs: 5_000,
      batchSize: 10,
      maxAttempts: 5,
      baseDelayMs: 1_000,
      maxDelayMs: 15 * 60 * 1000,
      requestTimeoutMs: 10_000,
      staleAfterMs: 5 * 60 * 1000,
      userAgent: 'Signalpost-Webhook/1.0',
    },
  };
}

// =============================================================================
// MERGING
// =============================================================================

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteEnvVars(item, env));
  }
  if (isPlainObject(value)) {
    const result: PlainObject = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = substituteEnvVars(inner, env);
    }
    return result;
  }
  return value;
}

/**
 * Deep merge two objects. Protects against prototype pollution.
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: PlainObject = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

function readConfigFile(configPath: string): PlainObject {
  if (!existsSync(configPath)) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    if (isPlainObject(parsed)) return parsed;
    logger.error({ configPath }, 'Config file must contain a JSON object, ignoring it');
  } catch (err) {
    logger.error({ configPath, err }, 'Failed to parse config file');
  }
  return {};
}

/** Env overrides; unset variables are left out so they do not mask file values. */
function envOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const alerts: PlainObject = {};
  const delivery: PlainObject = {};
  const database: PlainObject = {};

  if (env.SIGNALPOST_ALERT_INTERVAL_MS) alerts.intervalMs = env.SIGNALPOST_ALERT_INTERVAL_MS;
  if (env.SIGNALPOST_DELIVERY_INTERVAL_MS) delivery.intervalMs = env.SIGNALPOST_DELIVERY_INTERVAL_MS;
  if (env.SIGNALPOST_DELIVERY_BATCH_SIZE) delivery.batchSize = env.SIGNALPOST_DELIVERY_BATCH_SIZE;
  if (env.SIGNALPOST_DELIVERY_TIMEOUT_MS) delivery.requestTimeoutMs = env.SIGNALPOST_DELIVERY_TIMEOUT_MS;
  if (env.SIGNALPOST_DB_FILE) {
    database.file = env.SIGNALPOST_DB_FILE === ':memory:' ? null : resolveUserPath(env.SIGNALPOST_DB_FILE);
  }

  return { alerts, delivery, database };
}

/**
 * Load configuration from file and environment.
 * Throws ValidationError when the merged result is invalid.
 */
export function loadConfig(options: { path?: string; env?: NodeJS.ProcessEnv } = {}): SignalpostConfig {
  const env = options.env ?? process.env;
  const configPath = options.path ?? resolveConfigPath(env);

  const fileConfig = substituteEnvVars(readConfigFile(configPath), env);
  const merged = deepMerge(
    deepMerge(defaultConfig(env), isPlainObject(fileConfig) ? fileConfig : {}),
    envOverrides(env),
  );

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}
