/**
 * Configuration engine for the query bus.
 *
 * Resolution priority: overrides > Environment vars > Config file > Defaults
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { QueryBusError } from './errors.js';
import { QueryErrorCode } from '../types/error-codes.js';

export const OVERFLOW_STRATEGIES = ['buffer', 'drop', 'latest', 'error'] as const;
export const ERROR_POLICIES = ['log', 'ignore', 'rethrow'] as const;

const configSchema = z.object({
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    filePath: z.string(),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
  scatterGather: z.object({
    defaultTimeoutMs: z.number().int().nonnegative(),
    errorPolicy: z.enum(ERROR_POLICIES),
  }),
  updates: z.object({
    overflow: z.enum(OVERFLOW_STRATEGIES),
    // "unbounded" keeps every update until the consumer asks for it.
    bufferSize: z.union([z.number().int().positive(), z.literal('unbounded')]),
  }),
});

export type QueryBusConfig = z.infer<typeof configSchema>;

/** Default configuration values. */
export const DEFAULTS: QueryBusConfig = {
  logging: {
    level: 'info',
    filePath: '',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
  scatterGather: {
    defaultTimeoutMs: 5_000,
    errorPolicy: 'log',
  },
  updates: {
    overflow: 'buffer',
    bufferSize: 'unbounded',
  },
};

export const CONFIG_FILE_NAME = 'querybus.config.json';

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  QUERYBUS_LOG_LEVEL: 'logging.level',
  QUERYBUS_LOG_FILE: 'logging.filePath',
  QUERYBUS_SCATTER_GATHER_TIMEOUT_MS: 'scatterGather.defaultTimeoutMs',
  QUERYBUS_ERROR_POLICY: 'scatterGather.errorPolicy',
  QUERYBUS_UPDATE_OVERFLOW: 'updates.overflow',
  QUERYBUS_UPDATE_BUFFER_SIZE: 'updates.bufferSize',
};

/**
 * Raised when a merged configuration does not satisfy the schema.
 */
export class ConfigValidationError extends QueryBusError {
  readonly issues: Array<{ path: string; message: string }>;

  constructor(issues: Array<{ path: string; message: string }>) {
    super(
      QueryErrorCode.CONFIG_INVALID,
      `Invalid query bus configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join(', ')}`,
      { details: { issues } },
    );
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current: Record<string, unknown> = obj;
  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[parts[parts.length - 1] ?? path] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/**
 * Validate a merged configuration object against the schema.
 */
export function validateConfig(raw: unknown): QueryBusConfig {
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigValidationError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    );
  }
  return parsed.data;
}

async function readConfigFile(path: string): Promise<Record<string, unknown> | null> {
  if (!existsSync(path)) return null;
  const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
  if (!isRecord(parsed)) {
    throw new ConfigValidationError([{ path: '', message: `${path} must contain a JSON object` }]);
  }
  return parsed;
}

export interface LoadConfigOptions {
  /** Directory searched for querybus.config.json. Defaults to process.cwd(). */
  cwd?: string;
  /** Explicit config file; wins over QUERYBUS_CONFIG and cwd lookup. */
  configPath?: string;
  /** Environment to read. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Highest priority values, e.g. from CLI flags or tests. */
  overrides?: Record<string, unknown>;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < config file < environment vars < overrides
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<QueryBusConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let merged: Record<string, unknown> = structuredClone(DEFAULTS);

  const filePath = options.configPath ?? env['QUERYBUS_CONFIG'] ?? resolve(cwd, CONFIG_FILE_NAME);
  const fileConfig = await readConfigFile(resolve(cwd, filePath));
  if (fileConfig) {
    merged = deepMerge(merged, fileConfig);
  }

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = env[envKey];
    if (envValue !== undefined) {
      // A log file path of "false" or "0" is still a path.
      setNestedValue(
        merged,
        configPath,
        configPath === 'logging.filePath' ? envValue : parseEnvValue(envValue),
      );
    }
  }

  if (options.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}
