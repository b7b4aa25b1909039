import { z } from 'zod';
import { ConfigError } from '../types/index.js';
import type { ConfigInput } from '../server/config.js';
import { MAX_TIMEOUT_MS } from '../server/runtime/timeout.js';
import { LogFormat, LogLevel, LogTarget } from './logger.js';

const positiveInt = (label: string) =>
  z
    .string()
    .regex(/^\d+$/, `${label} must be a positive integer`)
    .transform(Number)
    .refine((val) => val > 0, `${label} must be greater than zero`);

const timeoutMs = (label: string) =>
  positiveInt(label).refine(
    (val) => val <= MAX_TIMEOUT_MS,
    `${label} must not exceed ${MAX_TIMEOUT_MS}`
  );

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((val) => val === 'true' || val === '1');

/**
 * Environment variable schema. Everything is optional: unset variables leave
 * the lower configuration layers untouched.
 */
const EnvSchema = z.object({
  MCP_STDIO_HOST_CONFIG: z.string().min(1).optional(),
  MCP_STDIO_HOST_DEFAULT_TIMEOUT_MS: timeoutMs('Default timeout').optional(),
  MCP_STDIO_HOST_MAX_CONCURRENCY: positiveInt('Max concurrency').optional(),
  MCP_STDIO_HOST_MAX_MESSAGE_BYTES: positiveInt('Max message bytes').optional(),
  MCP_STDIO_HOST_MAX_PARAMETER_BYTES: positiveInt(
    'Max parameter bytes'
  ).optional(),
  MCP_STDIO_HOST_MAX_RESULT_BYTES: positiveInt('Max result bytes').optional(),
  MCP_STDIO_HOST_ENFORCE_CONFIRMATION: booleanFlag.optional(),
  MCP_STDIO_HOST_BUILTINS: booleanFlag.optional(),

  // Logging
  MCP_STDIO_HOST_LOG_LEVEL: z.nativeEnum(LogLevel).optional(),
  MCP_STDIO_HOST_LOG_FORMAT: z.nativeEnum(LogFormat).optional(),
  MCP_STDIO_HOST_LOG_TARGET: z.nativeEnum(LogTarget).optional(),
  MCP_STDIO_HOST_LOG_DIR: z.string().min(1).optional(),
});

export type ValidatedEnv = z.infer<typeof EnvSchema>;

/**
 * Validates the environment. Unlike a missing variable, a malformed one is a
 * startup error.
 */
export function getValidatedEnv(
  env: NodeJS.ProcessEnv = process.env
): ValidatedEnv {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      'Invalid environment',
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }
  return result.data;
}

/**
 * Translate validated environment variables into a configuration layer
 */
export function readEnvOverrides(
  env: NodeJS.ProcessEnv = process.env
): ConfigInput {
  const vars = getValidatedEnv(env);
  const layer: ConfigInput = {};

  if (vars.MCP_STDIO_HOST_DEFAULT_TIMEOUT_MS !== undefined) {
    layer.defaultTimeoutMs = vars.MCP_STDIO_HOST_DEFAULT_TIMEOUT_MS;
  }
  if (vars.MCP_STDIO_HOST_MAX_CONCURRENCY !== undefined) {
    layer.concurrency = { maxConcurrency: vars.MCP_STDIO_HOST_MAX_CONCURRENCY };
  }

  const sizeLimits: NonNullable<ConfigInput['sizeLimits']> = {};
  if (vars.MCP_STDIO_HOST_MAX_MESSAGE_BYTES !== undefined) {
    sizeLimits.maxMessageBytes = vars.MCP_STDIO_HOST_MAX_MESSAGE_BYTES;
  }
  if (vars.MCP_STDIO_HOST_MAX_PARAMETER_BYTES !== undefined) {
    sizeLimits.maxParameterBytes = vars.MCP_STDIO_HOST_MAX_PARAMETER_BYTES;
  }
  if (vars.MCP_STDIO_HOST_MAX_RESULT_BYTES !== undefined) {
    sizeLimits.maxResultBytes = vars.MCP_STDIO_HOST_MAX_RESULT_BYTES;
  }
  if (Object.keys(sizeLimits).length > 0) {
    layer.sizeLimits = sizeLimits;
  }

  if (vars.MCP_STDIO_HOST_ENFORCE_CONFIRMATION !== undefined) {
    layer.security = {
      enforceConfirmation: vars.MCP_STDIO_HOST_ENFORCE_CONFIRMATION,
    };
  }
  if (vars.MCP_STDIO_HOST_BUILTINS !== undefined) {
    layer.builtins = vars.MCP_STDIO_HOST_BUILTINS;
  }

  const logging: NonNullable<ConfigInput['logging']> = {};
  if (vars.MCP_STDIO_HOST_LOG_LEVEL !== undefined) {
    logging.level = vars.MCP_STDIO_HOST_LOG_LEVEL;
  }
  if (vars.MCP_STDIO_HOST_LOG_FORMAT !== undefined) {
    logging.format = vars.MCP_STDIO_HOST_LOG_FORMAT;
  }
  if (vars.MCP_STDIO_HOST_LOG_TARGET !== undefined) {
    logging.target = vars.MCP_STDIO_HOST_LOG_TARGET;
  }
  if (vars.MCP_STDIO_HOST_LOG_DIR !== undefined) {
    logging.logDir = vars.MCP_STDIO_HOST_LOG_DIR;
  }
  if (Object.keys(logging).length > 0) {
    layer.logging = logging;
  }

  return layer;
}

/**
 * Path of the configuration file named by the environment, if any
 */
export function getConfigPathFromEnv(
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  return getValidatedEnv(env).MCP_STDIO_HOST_CONFIG;
}
