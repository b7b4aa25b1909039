import type { Readable, Writable } from 'stream';
import { InternalServerError } from '../types/index.js';
import type {
  HandlerParams,
  PromptDefinition,
  ResourceDefinition,
  ToolDefinition,
} from '../types/handlers.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import type { ServerConfig } from './config.js';
import { JsonRpcConnection } from './connection.js';
import { Dispatcher } from './dispatcher.js';
import { CallPipeline } from './pipeline/callPipeline.js';
import { PromptRegistry } from './registries/promptRegistry.js';
import { ResourceRegistry } from './registries/resourceRegistry.js';
import { ToolRegistry } from './registries/toolRegistry.js';
import { CancellationRegistry } from './runtime/cancellation.js';
import {
  ConcurrencyLimiter,
  type ConcurrencySnapshot,
} from './runtime/concurrencyLimiter.js';
import { StdioTransport } from './transport/stdioTransport.js';
import type { ServerInfo } from './utils/serverInfo.js';
import { SizeValidator } from './validation/sizeValidator.js';
import { registerBuiltins } from './builtins/index.js';

export interface McpStdioServerOptions {
  readonly config: ServerConfig;
  readonly logger?: Logger;
  /** Defaults to process.stdin */
  readonly input?: Readable;
  /** Defaults to process.stdout */
  readonly output?: Writable;
  /** Overrides the name and version read from package.json */
  readonly serverInfo?: ServerInfo;
}

export interface ServerStatus {
  serving: boolean;
  uptimeMs: number;
  inFlight: number;
  concurrency: ConcurrencySnapshot;
  registered: { tools: number; resources: number; prompts: number };
}

/**
 * Stdio host for tools, resources and prompts. Register definitions, then
 * call `serve()`; it resolves when the peer closes the input.
 */
export class McpStdioServer {
  readonly config: ServerConfig;
  readonly tools = new ToolRegistry();
  readonly resources = new ResourceRegistry();
  readonly prompts = new PromptRegistry();

  private readonly logger: Logger;
  private readonly limiter: ConcurrencyLimiter;
  private readonly cancellations = new CancellationRegistry();
  private readonly startedAt = Date.now();
  private connection: JsonRpcConnection | undefined;

  constructor(private readonly options: McpStdioServerOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createSilentLogger();
    this.limiter = new ConcurrencyLimiter(this.config.concurrency);

    if (this.config.builtins) {
      registerBuiltins({
        config: this.config,
        tools: this.tools,
        resources: this.resources,
        prompts: this.prompts,
        status: () => this.status(),
      });
    }
  }

  registerTool<TParams extends HandlerParams, TResult>(
    definition: ToolDefinition<TParams, TResult>
  ): this {
    this.tools.register(definition);
    return this;
  }

  registerResource<TParams extends HandlerParams, TResult>(
    definition: ResourceDefinition<TParams, TResult>
  ): this {
    this.resources.register(definition);
    return this;
  }

  registerPrompt<TParams extends HandlerParams>(
    definition: PromptDefinition<TParams>
  ): this {
    this.prompts.register(definition);
    return this;
  }

  status(): ServerStatus {
    return {
      serving: this.connection !== undefined,
      uptimeMs: Date.now() - this.startedAt,
      inFlight: this.cancellations.size,
      concurrency: this.limiter.snapshot(),
      registered: {
        tools: this.tools.size,
        resources: this.resources.size,
        prompts: this.prompts.size,
      },
    };
  }

  /**
   * Freeze the registries and answer requests until the input ends. At end
   * of input every in-flight call is cancelled and its response written
   * before this resolves.
   */
  async serve(): Promise<void> {
    if (this.connection) {
      throw new InternalServerError('Server is already serving');
    }

    this.tools.freeze();
    this.resources.freeze();
    this.prompts.freeze();

    const transport = new StdioTransport({
      input: this.options.input ?? process.stdin,
      output: this.options.output ?? process.stdout,
      maxMessageBytes: this.config.sizeLimits.maxMessageBytes,
      logger: this.logger.child('transport'),
    });
    const pipeline = new CallPipeline({
      config: this.config,
      tools: this.tools,
      resources: this.resources,
      prompts: this.prompts,
      limiter: this.limiter,
      cancellations: this.cancellations,
      sizeValidator: new SizeValidator(this.config.sizeLimits),
      sender: transport,
      logger: this.logger.child('pipeline'),
    });
    const dispatcher = new Dispatcher({
      pipeline,
      tools: this.tools,
      resources: this.resources,
      prompts: this.prompts,
      cancellations: this.cancellations,
      logger: this.logger.child('dispatcher'),
      serverInfo: this.options.serverInfo,
    });
    this.connection = new JsonRpcConnection({
      transport,
      dispatcher,
      cancellations: this.cancellations,
      logger: this.logger.child('connection'),
    });

    this.logger.info('MCP server started in stdio mode', {
      tools: this.tools.size,
      resources: this.resources.size,
      prompts: this.prompts.size,
    });
    await this.connection.run();
    this.logger.info('MCP server stopped');
  }

  /**
   * Stop accepting frames, cancel in-flight calls and wait for their
   * responses. `serve()` still resolves only once the input ends.
   */
  async close(): Promise<void> {
    await this.connection?.close();
  }
}

export { loadConfig, parseServerConfig } from './config.js';
export type { ServerConfig, ConfigInput } from './config.js';
export type {
  ToolDefinition,
  ResourceDefinition,
  PromptDefinition,
  PromptResult,
} from '../types/handlers.js';
export { CancellationToken } from './runtime/cancellation.js';
export { ProgressNotifier } from './runtime/progress.js';
