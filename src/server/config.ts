import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from '../types/index.js';
import { LogFormat, LogLevel, LogTarget } from '../utils/logger.js';
import { getConfigPathFromEnv, readEnvOverrides } from '../utils/env.js';
import { MAX_TIMEOUT_MS } from './runtime/timeout.js';

const MiB = 1024 * 1024;

const positiveInt = z.number().int().positive();
const timeoutMs = positiveInt.max(MAX_TIMEOUT_MS);

const SizeLimitsSchema = z
  .object({
    maxMessageBytes: positiveInt.default(2 * MiB),
    maxParameterBytes: positiveInt.default(1 * MiB),
    maxResultBytes: positiveInt.default(10 * MiB),
  })
  .strict()
  .refine((limits) => limits.maxParameterBytes <= limits.maxMessageBytes, {
    message: 'maxParameterBytes must not exceed maxMessageBytes',
    path: ['maxParameterBytes'],
  });

/**
 * Server configuration. Loaded once at startup, then frozen; nothing in the
 * server re-reads it mid-session.
 */
export const ServerConfigSchema = z
  .object({
    defaultTimeoutMs: timeoutMs.default(300_000),
    perToolTimeoutsMs: z.record(timeoutMs).default({}),
    concurrency: z
      .object({
        maxConcurrency: positiveInt.default(10),
        perToolLimits: z.record(positiveInt).default({}),
      })
      .strict()
      .default({}),
    sizeLimits: SizeLimitsSchema.default({}),
    security: z
      .object({
        enforceConfirmation: z.boolean().default(true),
      })
      .strict()
      .default({}),
    logging: z
      .object({
        level: z.nativeEnum(LogLevel).default(LogLevel.INFO),
        format: z.nativeEnum(LogFormat).default(LogFormat.TEXT),
        target: z.nativeEnum(LogTarget).default(LogTarget.CONSOLE),
        logDir: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    builtins: z.boolean().default(true),
  })
  .strict();

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type ConfigInput = z.input<typeof ServerConfigSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; falls back to `MCP_STDIO_HOST_CONFIG` */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence layer, typically built from CLI flags */
  overrides?: ConfigInput;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge configuration layers; later layers win, plain objects
 * merge key by key, everything else is replaced
 */
export function mergeConfigLayers(
  ...layers: Record<string, unknown>[]
): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) {
        continue;
      }
      const existing = merged[key];
      merged[key] =
        isPlainObject(existing) && isPlainObject(value)
          ? mergeConfigLayers(existing, value)
          : value;
    }
  }
  return merged;
}

function deepFreeze<T>(value: T): T {
  if (isPlainObject(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Read a JSON or YAML configuration file into an untyped layer
 */
export function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let parsed: unknown;
  try {
    parsed =
      path.extname(filePath).toLowerCase() === '.json'
        ? JSON.parse(raw)
        : yaml.load(raw);
  } catch (error) {
    throw new ConfigError(`Cannot parse config file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  // An empty YAML document loads as undefined
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain an object`);
  }
  return parsed;
}

/**
 * Validate a merged layer and freeze the result
 */
export function parseServerConfig(input: unknown): ServerConfig {
  const result = ServerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
      })
    );
  }
  return deepFreeze(result.data);
}

/**
 * Build the effective configuration: defaults < config file < environment <
 * overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): ServerConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? getConfigPathFromEnv(env);

  const fileLayer = configPath ? readConfigFile(configPath) : {};
  const envLayer = readEnvOverrides(env);

  return parseServerConfig(
    mergeConfigLayers(fileLayer, envLayer, options.overrides ?? {})
  );
}

/**
 * Timeout for one definition: per-tool config, then the definition, then the
 * default. Capped at what a timer can represent.
 */
export function resolveTimeoutMs(
  config: ServerConfig,
  key: string,
  definitionTimeoutMs?: number
): number {
  return Math.min(
    config.perToolTimeoutsMs[key] ?? definitionTimeoutMs ?? config.defaultTimeoutMs,
    MAX_TIMEOUT_MS
  );
}
