import { InvalidArgumentError } from '@commander-js/extra-typings';
import yaml from 'js-yaml';
import type { Readable, Writable } from 'stream';
import { McpStdioServer } from '../server/index.js';
import type { ConfigInput, ServerConfig } from '../server/config.js';
import { flagLabels } from '../server/registries/definitionRegistry.js';
import { MAX_TIMEOUT_MS } from '../server/runtime/timeout.js';
import { LogLevel, type Logger, type LogFormat } from '../utils/logger.js';
import { output as defaultOutput, type OutputService } from '../utils/output.js';

/**
 * Flags shared by commands that load configuration
 */
export interface ConfigFlags {
  maxConcurrency?: number;
  timeout?: number;
  maxMessageBytes?: number;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  builtins?: boolean;
  verbose?: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

export function parseTimeoutMs(value: string): number {
  const parsed = parsePositiveInt(value);
  if (parsed > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(`Timeout must not exceed ${MAX_TIMEOUT_MS} ms, got ${value}.`);
  }
  return parsed;
}

/**
 * Turn CLI flags into the highest-precedence configuration layer. Only flags
 * the user actually passed are set.
 */
export function buildConfigOverrides(flags: ConfigFlags): ConfigInput {
  const overrides: ConfigInput = {};

  if (flags.timeout !== undefined) {
    overrides.defaultTimeoutMs = flags.timeout;
  }
  if (flags.maxConcurrency !== undefined) {
    overrides.concurrency = { maxConcurrency: flags.maxConcurrency };
  }
  if (flags.maxMessageBytes !== undefined) {
    overrides.sizeLimits = { maxMessageBytes: flags.maxMessageBytes };
  }

  const logging: NonNullable<ConfigInput['logging']> = {};
  const level = flags.verbose ? LogLevel.DEBUG : flags.logLevel;
  if (level !== undefined) {
    logging.level = level;
  }
  if (flags.logFormat !== undefined) {
    logging.format = flags.logFormat;
  }
  if (Object.keys(logging).length > 0) {
    overrides.logging = logging;
  }

  // commander reports `builtins: true` when --no-builtins is absent
  if (flags.builtins === false) {
    overrides.builtins = false;
  }
  return overrides;
}

export interface ServeStreams {
  input?: Readable;
  output?: Writable;
}

/**
 * Command implementations behind the CLI
 */
export class CliHandlers {
  constructor(
    private readonly config: ServerConfig,
    private readonly out: OutputService = defaultOutput
  ) {}

  /** Built-in tools, whatever `builtins` is set to */
  listTools(): void {
    const server = new McpStdioServer({ config: { ...this.config, builtins: true } });

    if (this.out.isJson) {
      this.out.writeJson(server.tools.list());
      return;
    }

    this.out.writeTable(
      ['Name', 'Flags', 'Description'],
      server.tools
        .values()
        .map((tool) => [tool.name, flagLabels(tool).join(', '), tool.description ?? ''])
    );
  }

  showConfig(): void {
    if (this.out.isJson) {
      this.out.writeJson(this.config);
      return;
    }
    this.out.writeLine(yaml.dump(this.config, { skipInvalid: true }).trimEnd());
  }

  /**
   * Serve until the peer closes stdin or a signal arrives
   */
  async serve(logger: Logger, streams: ServeStreams = {}): Promise<void> {
    const server = new McpStdioServer({
      config: this.config,
      logger,
      input: streams.input,
      output: streams.output,
    });

    const shutdown = (signal: string): void => {
      logger.info(`Received ${signal}, shutting down`);
      server
        .close()
        .then(() => {
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error during shutdown', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    await server.serve();
  }
}
