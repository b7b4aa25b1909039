#!/usr/bin/env node

import { Command, Option } from '@commander-js/extra-typings';
import {
  CliHandlers,
  buildConfigOverrides,
  parsePositiveInt,
  parseTimeoutMs,
  type ConfigFlags,
} from './cli/handlers.js';
import { loadConfig, type ServerConfig } from './server/config.js';
import { getServerInfo } from './server/utils/serverInfo.js';
import { ConfigError } from './types/index.js';
import { emergencyError } from './utils/emergencyLog.js';
import { LogFormat, LogLevel, Logger } from './utils/logger.js';
import { OutputService } from './utils/output.js';

class CliError extends Error {
  public readonly code: string;

  constructor(message: string, code = 'CLI_ERROR') {
    super(message);
    this.name = 'CliError';
    this.code = code;
  }
}

class CommandExecutionError extends CliError {
  public readonly commandName: string;
  public readonly originalError: Error;

  constructor(commandName: string, originalError: Error) {
    super(`Failed to ${commandName}: ${originalError.message}`, 'COMMAND_EXECUTION_ERROR');
    this.name = 'CommandExecutionError';
    this.commandName = commandName;
    this.originalError = originalError;
  }
}

// Used until the configuration (and its logging section) has been loaded
const bootstrapLogger = new Logger({ context: 'cli' });

function resolveConfig(flags: ConfigFlags & { config?: string }): ServerConfig {
  return loadConfig({
    configPath: flags.config,
    env: process.env,
    overrides: buildConfigOverrides(flags),
  });
}

function createLogger(config: ServerConfig): Logger {
  return new Logger({
    level: config.logging.level,
    format: config.logging.format,
    target: config.logging.target,
    logDir: config.logging.logDir,
    context: 'server',
  });
}

function toCommandError(commandName: string, error: unknown): CommandExecutionError {
  return new CommandExecutionError(
    commandName,
    error instanceof Error ? error : new Error(String(error))
  );
}

/**
 * One-shot commands: report failures on stderr and set the exit code
 */
async function executeCommand(
  commandName: string,
  handler: () => Promise<void> | void
): Promise<void> {
  try {
    await handler();
  } catch (error) {
    const cliError = toCommandError(commandName, error);
    bootstrapLogger.error(cliError.message);
    if (error instanceof ConfigError) {
      for (const issue of error.issues) {
        bootstrapLogger.error(`  ${issue}`);
      }
    } else if (cliError.originalError.stack) {
      bootstrapLogger.debug('Stack trace:', { stack: cliError.originalError.stack });
    }
    process.exitCode = 1;
  }
}

/**
 * Last-resort handlers for the long-running server
 */
function installProcessHandlers(logger: Logger): void {
  process.on('uncaughtException', (error) => {
    logger.error(error, { handler: 'uncaughtException' });
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    if (reason instanceof Error) {
      logger.error(reason, { handler: 'unhandledRejection' });
    } else {
      logger.error('Unhandled rejection', { reason: String(reason) });
    }
  });
}

const program = new Command()
  .name('mcp-stdio-host')
  .description('Framed JSON-RPC stdio host for MCP tools, resources and prompts')
  .version(getServerInfo().version)
  .addHelpText(
    'after',
    `
Environment Variables:
  MCP_STDIO_HOST_CONFIG                 - Path to a JSON or YAML config file
  MCP_STDIO_HOST_DEFAULT_TIMEOUT_MS     - Default per-call timeout (default: 300000)
  MCP_STDIO_HOST_MAX_CONCURRENCY        - Global concurrent call limit (default: 10)
  MCP_STDIO_HOST_MAX_MESSAGE_BYTES      - Largest accepted frame body (default: 2 MiB)
  MCP_STDIO_HOST_MAX_PARAMETER_BYTES    - Largest call arguments (default: 1 MiB)
  MCP_STDIO_HOST_MAX_RESULT_BYTES       - Largest handler result (default: 10 MiB)
  MCP_STDIO_HOST_ENFORCE_CONFIRMATION   - Require confirm:true for guarded tools (default: true)
  MCP_STDIO_HOST_BUILTINS               - Register the built-in definitions (default: true)

Logging Variables:
  MCP_STDIO_HOST_LOG_LEVEL              - Log level: error, warn, info, debug (default: info)
  MCP_STDIO_HOST_LOG_FORMAT             - Log format: text, json (default: text)
  MCP_STDIO_HOST_LOG_TARGET             - Log target: console, file, both (default: console)
  MCP_STDIO_HOST_LOG_DIR                - Log directory for the file target (default: ./.logs)

Logs always go to stderr; stdout carries protocol frames only.`
  );

program
  .command('serve')
  .description('Serve MCP requests over stdin/stdout')
  .option('-c, --config <file>', 'JSON or YAML configuration file')
  .option('--max-concurrency <n>', 'Global concurrent call limit', parsePositiveInt)
  .option('--timeout <ms>', 'Default per-call timeout in milliseconds', parseTimeoutMs)
  .option('--max-message-bytes <n>', 'Largest accepted frame body', parsePositiveInt)
  .addOption(
    new Option('--log-level <level>', 'Log level').choices(Object.values(LogLevel))
  )
  .addOption(
    new Option('--log-format <format>', 'Log format').choices(Object.values(LogFormat))
  )
  .option('--no-builtins', 'Do not register the built-in definitions')
  .option('-v, --verbose', 'Enable verbose (debug) logging')
  .action(async (options): Promise<void> => {
    await executeCommand('start server', async () => {
      const config = resolveConfig(options);
      const logger = createLogger(config);
      installProcessHandlers(logger);
      await new CliHandlers(config).serve(logger);
    });
  });

program
  .command('tools')
  .description('List the built-in tools')
  .option('--json', 'Output as JSON')
  .action(async (options): Promise<void> => {
    await executeCommand('list tools', () => {
      const out = new OutputService({ format: options.json ? 'json' : 'plain' });
      new CliHandlers(resolveConfig({}), out).listTools();
    });
  });

program
  .command('config')
  .description('Print the effective configuration')
  .option('-c, --config <file>', 'JSON or YAML configuration file')
  .option('--json', 'Output as JSON')
  .action(async (options): Promise<void> => {
    await executeCommand('show configuration', () => {
      const out = new OutputService({ format: options.json ? 'json' : 'plain' });
      new CliHandlers(resolveConfig({ config: options.config }), out).showConfig();
    });
  });

program.exitOverride((err) => {
  if (err.exitCode === 0) {
    process.exit(0);
  }
  if (err.message !== '(outputHelp)') {
    bootstrapLogger.error(err.message);
  }
  process.exit(err.exitCode);
});

program.parseAsync().catch((error: unknown) => {
  emergencyError('CLI failed', error);
  process.exitCode = 1;
});
