import {
  InvalidRequestError,
  MethodNotFoundError,
} from '../types/index.js';
import {
  DefinitionKind,
  MCP_PROTOCOL_VERSION,
  McpMethod,
  McpNotification,
} from '../types/enums.js';
import type {
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  RequestId,
} from '../types/jsonrpc.js';
import type { Logger } from '../utils/logger.js';
import type { CallPipeline } from './pipeline/callPipeline.js';
import type { ToolRegistry } from './registries/toolRegistry.js';
import type { ResourceRegistry } from './registries/resourceRegistry.js';
import type { PromptRegistry } from './registries/promptRegistry.js';
import type { CancellationRegistry } from './runtime/cancellation.js';
import { errorResponse, successResponse } from './protocol/messages.js';
import { logCallError, toWireError } from './utils/errorConverter.js';
import { getServerInfo, type ServerInfo } from './utils/serverInfo.js';

export interface DispatcherOptions {
  pipeline: CallPipeline;
  tools: ToolRegistry;
  resources: ResourceRegistry;
  prompts: PromptRegistry;
  cancellations: CancellationRegistry;
  logger: Logger;
  /** Defaults to the package name and version */
  serverInfo?: ServerInfo;
}

type MethodHandler = (request: JsonRpcRequest) => unknown;

function readId(params: JsonRpcNotification['params'], field: string): RequestId | undefined {
  if (params === undefined || Array.isArray(params)) {
    return undefined;
  }
  const value = params[field];
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

/**
 * Routes requests to method handlers and notifications to the cancellation
 * registry. `handleRequest` always produces exactly one response and never
 * rejects.
 */
export class Dispatcher {
  private readonly methodHandlers: Map<string, MethodHandler>;
  private readonly inFlight = new Set<RequestId>();
  private readonly logger: Logger;

  constructor(private readonly options: DispatcherOptions) {
    this.logger = options.logger;
    this.methodHandlers = this.createMethodHandlerMap();
  }

  private createMethodHandlerMap(): Map<string, MethodHandler> {
    const { pipeline, tools, resources, prompts } = this.options;
    const handlers = new Map<string, MethodHandler>();
    handlers.set(McpMethod.Initialize, () => this.handleInitialize());
    handlers.set(McpMethod.Ping, () => ({}));
    handlers.set(McpMethod.ToolsList, () => ({ tools: tools.list() }));
    handlers.set(McpMethod.ToolsCall, (request) =>
      pipeline.run(DefinitionKind.Tool, request)
    );
    handlers.set(McpMethod.ResourcesList, () => ({ resources: resources.list() }));
    handlers.set(McpMethod.ResourcesRead, (request) =>
      pipeline.run(DefinitionKind.Resource, request)
    );
    handlers.set(McpMethod.PromptsList, () => ({ prompts: prompts.list() }));
    handlers.set(McpMethod.PromptsGet, (request) =>
      pipeline.run(DefinitionKind.Prompt, request)
    );
    return handlers;
  }

  /** Requests currently between receipt and response */
  get inFlightCount(): number {
    return this.inFlight.size;
  }

  async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const { id, method } = request;

    if (this.inFlight.has(id)) {
      const error = new InvalidRequestError(`Request id ${id} is already in flight`);
      logCallError(this.logger, error, { requestId: id, method });
      return errorResponse(id, toWireError(error));
    }

    this.inFlight.add(id);
    this.logger.debug(`Routing ${method}`, { requestId: id });
    try {
      const handler = this.methodHandlers.get(method);
      if (!handler) {
        throw new MethodNotFoundError(method);
      }
      const result = await handler(request);
      return successResponse(id, result);
    } catch (error) {
      logCallError(this.logger, error, { requestId: id, method });
      return errorResponse(id, toWireError(error, id));
    } finally {
      this.inFlight.delete(id);
    }
  }

  handleNotification(message: JsonRpcNotification): void {
    switch (message.method) {
      case McpNotification.CancelRequest:
        this.cancel(readId(message.params, 'id'));
        return;
      case McpNotification.Cancelled:
        this.cancel(readId(message.params, 'requestId'));
        return;
      case McpNotification.Initialized:
        this.logger.info('Client initialized');
        return;
      default:
        this.logger.debug(`Ignoring notification ${message.method}`);
    }
  }

  private cancel(requestId: RequestId | undefined): void {
    if (requestId === undefined) {
      this.logger.debug('Ignoring cancellation without a request id');
      return;
    }
    const found = this.options.cancellations.cancel(requestId);
    this.logger.debug(
      found ? 'Cancellation requested' : 'Cancellation for unknown or finished request',
      { requestId }
    );
  }

  private handleInitialize(): Record<string, unknown> {
    const serverInfo = this.options.serverInfo ?? getServerInfo();
    return {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: { tools: {}, resources: {}, prompts: {} },
      serverInfo: { name: serverInfo.name, version: serverInfo.version },
    };
  }
}
