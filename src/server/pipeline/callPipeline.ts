import {
  CancellationError,
  InternalServerError,
  InvalidParamsError,
  PermissionDeniedError,
  TimeoutError,
  ValidationError,
} from '../../types/index.js';
import { DefinitionKind } from '../../types/enums.js';
import type {
  DefinitionBase,
  HandlerParams,
  PromptMessage,
  PromptResult,
  ResourceReadResult,
  ToolCallResult,
} from '../../types/handlers.js';
import type { JsonRpcParams, RequestId } from '../../types/jsonrpc.js';
import type { Logger } from '../../utils/logger.js';
import { resolveTimeoutMs, type ServerConfig } from '../config.js';
import type { PromptRegistry } from '../registries/promptRegistry.js';
import {
  DEFAULT_RESOURCE_MIME_TYPE,
  type ResourceRegistry,
} from '../registries/resourceRegistry.js';
import type { ToolRegistry } from '../registries/toolRegistry.js';
import {
  CancellationToken,
  type CancellationRegistry,
} from '../runtime/cancellation.js';
import type { ConcurrencyLimiter } from '../runtime/concurrencyLimiter.js';
import {
  ProgressNotifier,
  readProgressToken,
  type ProgressSender,
} from '../runtime/progress.js';
import { withTimeout } from '../runtime/timeout.js';
import { zodFieldErrors } from '../utils/errorConverter.js';
import type { SizeValidator } from '../validation/sizeValidator.js';

export interface CallPipelineOptions {
  config: ServerConfig;
  tools: ToolRegistry;
  resources: ResourceRegistry;
  prompts: PromptRegistry;
  limiter: ConcurrencyLimiter;
  cancellations: CancellationRegistry;
  sizeValidator: SizeValidator;
  /** Outbound channel for progress notifications */
  sender?: ProgressSender;
  logger: Logger;
}

export interface CallRequest {
  id: RequestId;
  params?: JsonRpcParams | undefined;
}

export type CallResult = ToolCallResult | ResourceReadResult | PromptResult;

interface AdmittedCall {
  kind: DefinitionKind;
  /** Limiter and per-call config key */
  key: string;
  definition: DefinitionBase;
  args: HandlerParams;
  request: CallRequest;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireObjectParams(params: JsonRpcParams | undefined): Record<string, unknown> {
  if (params === undefined) {
    return {};
  }
  if (!isPlainObject(params)) {
    throw new InvalidParamsError('params must be an object', {
      invalidFields: ['params'],
    });
  }
  return params;
}

function requireString(params: Record<string, unknown>, field: string): string {
  const value = params[field];
  if (value === undefined) {
    throw new InvalidParamsError(`Missing required parameter: ${field}`, {
      missingFields: [field],
    });
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new InvalidParamsError(`Parameter ${field} must be a non-empty string`, {
      invalidFields: [field],
    });
  }
  return value;
}

function readArguments(params: Record<string, unknown>): HandlerParams {
  const args = params.arguments;
  if (args === undefined) {
    return {};
  }
  if (!isPlainObject(args)) {
    throw new InvalidParamsError('arguments must be an object', {
      invalidFields: ['arguments'],
    });
  }
  return args;
}

function encodeJson(value: unknown): string {
  return JSON.stringify(value) ?? 'null';
}

function isPromptMessage(value: unknown): value is PromptMessage {
  if (!isPlainObject(value)) {
    return false;
  }
  const { role, content } = value;
  return (
    (role === 'user' || role === 'assistant') &&
    isPlainObject(content) &&
    content.type === 'text' &&
    typeof content.text === 'string'
  );
}

function isPromptResult(value: unknown): value is PromptResult {
  if (!isPlainObject(value)) {
    return false;
  }
  const { description, messages } = value;
  return (
    (description === undefined || typeof description === 'string') &&
    Array.isArray(messages) &&
    messages.every(isPromptMessage)
  );
}

/**
 * Runs one tool, resource or prompt call from lookup to wire result.
 *
 * Stages short-circuit on the first failure: lookup, params size,
 * confirmation gate, params schema, admission, execution under a slot, a
 * deadline and the request's cancellation token, then result checks. Errors
 * propagate to the caller untouched.
 */
export class CallPipeline {
  private readonly options: CallPipelineOptions;

  constructor(options: CallPipelineOptions) {
    this.options = options;

    for (const tool of options.tools.values()) {
      if (tool.maxConcurrency !== undefined) {
        options.limiter.setDefaultLimit(tool.name, tool.maxConcurrency);
      }
    }
    for (const resource of options.resources.values()) {
      if (resource.maxConcurrency !== undefined) {
        options.limiter.setDefaultLimit(
          limiterKey(DefinitionKind.Resource, resource.name),
          resource.maxConcurrency
        );
      }
    }
    for (const prompt of options.prompts.values()) {
      if (prompt.maxConcurrency !== undefined) {
        options.limiter.setDefaultLimit(
          limiterKey(DefinitionKind.Prompt, prompt.name),
          prompt.maxConcurrency
        );
      }
    }
  }

  async run(kind: DefinitionKind, request: CallRequest): Promise<CallResult> {
    switch (kind) {
      case DefinitionKind.Tool:
        return this.callTool(request);
      case DefinitionKind.Resource:
        return this.readResource(request);
      case DefinitionKind.Prompt:
        return this.getPrompt(request);
    }
  }

  /** `tools/call {name, arguments?}` */
  async callTool(request: CallRequest): Promise<ToolCallResult> {
    const params = requireObjectParams(request.params);
    const name = requireString(params, 'name');
    const definition = this.options.tools.resolve(name);

    const result = await this.execute({
      kind: DefinitionKind.Tool,
      key: limiterKey(DefinitionKind.Tool, definition.name),
      definition,
      args: readArguments(params),
      request,
    });

    const wire: ToolCallResult = {
      content: [{ type: 'text', text: encodeJson(result) }],
    };
    if (definition.resultSchema) {
      wire.structuredContent = isPlainObject(result) ? result : { result };
    }
    return wire;
  }

  /**
   * `resources/read {uri}`. The handler receives the request params minus
   * `_meta`, so a prefix resource sees the concrete uri.
   */
  async readResource(request: CallRequest): Promise<ResourceReadResult> {
    const params = requireObjectParams(request.params);
    const uri = requireString(params, 'uri');
    const definition = this.options.resources.resolve(uri);

    const { _meta: _ignored, ...args } = params;
    const result = await this.execute({
      kind: DefinitionKind.Resource,
      key: limiterKey(DefinitionKind.Resource, definition.name),
      definition,
      args: { ...args, uri },
      request,
    });

    return {
      contents: [
        {
          uri,
          mimeType:
            definition.mimeType ??
            (typeof result === 'string' ? DEFAULT_RESOURCE_MIME_TYPE : 'application/json'),
          text: typeof result === 'string' ? result : encodeJson(result),
        },
      ],
    };
  }

  /** `prompts/get {name, arguments?}` */
  async getPrompt(request: CallRequest): Promise<PromptResult> {
    const params = requireObjectParams(request.params);
    const name = requireString(params, 'name');
    const definition = this.options.prompts.resolve(name);

    const result = await this.execute({
      kind: DefinitionKind.Prompt,
      key: limiterKey(DefinitionKind.Prompt, definition.name),
      definition,
      args: readArguments(params),
      request,
    });

    if (!isPromptResult(result)) {
      throw new InternalServerError(
        `Prompt ${definition.name} returned an invalid prompt result`
      );
    }
    return result;
  }

  private async execute(call: AdmittedCall): Promise<unknown> {
    const { config, limiter, cancellations, sizeValidator, logger } = this.options;
    const { definition, key, request } = call;

    sizeValidator.validateParameters(call.args);
    const gated = this.applyConfirmationGate(call);
    const params = this.validateParams(call, gated);

    if (!limiter.canStart(key)) {
      throw limiter.limitError(key);
    }

    const token = new CancellationToken(request.id);
    cancellations.register(request.id, token);
    const progress = new ProgressNotifier(
      readProgressToken(request.params),
      this.options.sender,
      logger
    );
    const timeoutMs = resolveTimeoutMs(config, key, definition.timeoutMs);
    const startedAt = Date.now();

    logger.debug('Call admitted', { requestId: request.id, kind: call.kind, name: key, timeoutMs });

    let result: unknown;
    try {
      result = await limiter.execute(key, () =>
        raceCancellation(token, () =>
          withTimeout(
            async () => definition.handler(params, token, progress),
            timeoutMs,
            definition.name
          )
        )
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        token.cancel();
      }
      throw error;
    } finally {
      progress.close();
      cancellations.remove(request.id);
    }

    logger.debug('Call completed', {
      requestId: request.id,
      name: key,
      durationMs: Date.now() - startedAt,
    });

    sizeValidator.validateResult(result);
    return this.validateResult(call, result);
  }

  /**
   * `confirm: true` must accompany calls to definitions that require it; the
   * flag is not part of the definition's own params
   */
  private applyConfirmationGate(call: AdmittedCall): HandlerParams {
    const { definition, args } = call;
    if (!definition.requiresConfirmation) {
      return args;
    }

    const { confirm, ...rest } = args;
    if (this.options.config.security.enforceConfirmation && confirm !== true) {
      throw new PermissionDeniedError(
        `${capitalize(call.kind)} ${definition.name} requires confirmation`,
        'Pass "confirm": true in the call arguments to proceed'
      );
    }
    return rest;
  }

  private validateParams(call: AdmittedCall, args: HandlerParams): HandlerParams {
    const schema = call.definition.paramsSchema;
    if (!schema) {
      return args;
    }

    const parsed = schema.safeParse(args);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid parameters for ${call.kind} ${call.definition.name}`,
        zodFieldErrors(parsed.error)
      );
    }
    return parsed.data;
  }

  private validateResult(call: AdmittedCall, result: unknown): unknown {
    const schema = call.definition.resultSchema;
    if (!schema) {
      return result;
    }

    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      this.options.logger.error(
        `${capitalize(call.kind)} ${call.definition.name} returned a result that does not match its schema`,
        { fieldErrors: zodFieldErrors(parsed.error) }
      );
      throw new InternalServerError(
        `${capitalize(call.kind)} ${call.definition.name} returned an invalid result`
      );
    }
    return parsed.data;
  }
}

/**
 * Tools are limited under their own name; resources and prompts under a
 * kind prefix so they never share a budget with a tool
 */
export function limiterKey(kind: DefinitionKind, name: string): string {
  return kind === DefinitionKind.Tool ? name : `${kind}:${name}`;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Settle with a CancellationError as soon as the token fires, even if the
 * body ignores it
 */
async function raceCancellation<T>(
  token: CancellationToken,
  body: () => Promise<T>
): Promise<T> {
  const cancelled = token.onCancel.then((): never => {
    throw new CancellationError(token.requestId);
  });
  return Promise.race([body(), cancelled]);
}
