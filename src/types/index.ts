import type { RequestId } from './jsonrpc.js';

export type {
  RequestId,
  JsonRpcRequest,
  JsonRpcNotification,
  JsonRpcResponse,
  JsonRpcError,
  ParsedMessage,
  ParseFailure,
} from './jsonrpc.js';
export {
  JsonRpcErrorCode,
  McpMethod,
  McpNotification,
  DefinitionKind,
} from './enums.js';

export interface ErrorOptions {
  readonly cause?: unknown;
  readonly context?: Record<string, unknown>;
}

/**
 * Base error class for every failure the server knows how to put on the wire
 */
export abstract class McpServerError extends Error {
  abstract readonly code: string;
  readonly context: Record<string, unknown> | undefined;

  constructor(message: string, options: ErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.context = options.context;

    // Maintain proper stack trace for where our error was thrown (V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ToolNotFoundError extends McpServerError {
  readonly code = 'TOOL_NOT_FOUND';

  constructor(
    readonly toolName: string,
    options?: ErrorOptions
  ) {
    super(`Tool not found: ${toolName}`, options);
  }
}

export class ResourceNotFoundError extends McpServerError {
  readonly code = 'RESOURCE_NOT_FOUND';

  constructor(
    readonly uri: string,
    options?: ErrorOptions
  ) {
    super(`Resource not found: ${uri}`, options);
  }
}

export class PromptNotFoundError extends McpServerError {
  readonly code = 'PROMPT_NOT_FOUND';

  constructor(
    readonly promptId: string,
    options?: ErrorOptions
  ) {
    super(`Prompt not found: ${promptId}`, options);
  }
}

export class MethodNotFoundError extends McpServerError {
  readonly code = 'METHOD_NOT_FOUND';

  constructor(
    readonly methodName: string,
    options?: ErrorOptions
  ) {
    super(`Method not found: ${methodName}`, options);
  }
}

/**
 * Thrown when params fail schema validation. `fieldErrors` is keyed by the
 * dotted path of the offending field (`(root)` for the params object itself).
 */
export class ValidationError extends McpServerError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    message: string,
    readonly fieldErrors?: Record<string, string[]>,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export interface InvalidParamsDetails {
  readonly missingFields?: string[];
  readonly invalidFields?: string[];
}

export class InvalidParamsError extends McpServerError {
  readonly code = 'INVALID_PARAMS';
  readonly missingFields: string[] | undefined;
  readonly invalidFields: string[] | undefined;

  constructor(
    message: string,
    details: InvalidParamsDetails = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.missingFields = details.missingFields;
    this.invalidFields = details.invalidFields;
  }
}

export class InvalidRequestError extends McpServerError {
  readonly code = 'INVALID_REQUEST';

  constructor(message: string, options?: ErrorOptions) {
    super(`Invalid request: ${message}`, options);
  }
}

export class CancellationError extends McpServerError {
  readonly code = 'CANCELLED';

  constructor(
    readonly requestId?: RequestId,
    options?: ErrorOptions
  ) {
    super(
      requestId !== undefined
        ? `Request cancelled: ${requestId}`
        : 'Operation was cancelled',
      options
    );
  }
}

export class TimeoutError extends McpServerError {
  readonly code = 'TIMEOUT';

  constructor(
    readonly timeoutMs: number,
    readonly operationName?: string,
    options?: ErrorOptions
  ) {
    super(
      operationName !== undefined
        ? `Operation (${operationName}) timed out after ${timeoutMs / 1000}s`
        : `Operation timed out after ${timeoutMs / 1000}s`,
      options
    );
  }
}

export class ConcurrencyLimitError extends McpServerError {
  readonly code = 'CONCURRENCY_LIMIT';

  constructor(
    readonly toolName: string,
    readonly current: number,
    readonly limit: number,
    options?: ErrorOptions
  ) {
    super(
      `Maximum concurrency reached for tool: ${toolName} (current: ${current}, limit: ${limit})`,
      options
    );
  }
}

export class PermissionDeniedError extends McpServerError {
  readonly code = 'PERMISSION_DENIED';

  constructor(
    message: string,
    readonly reason?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class InternalServerError extends McpServerError {
  readonly code = 'INTERNAL_ERROR';
}

/**
 * Raised while loading configuration; never reaches the wire
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR';

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}
