import { ZodError } from 'zod';
import {
  CancellationError,
  ConcurrencyLimitError,
  InternalServerError,
  InvalidParamsError,
  InvalidRequestError,
  McpServerError,
  MethodNotFoundError,
  PermissionDeniedError,
  PromptNotFoundError,
  ResourceNotFoundError,
  TimeoutError,
  ToolNotFoundError,
  ValidationError,
} from '../../types/index.js';
import { JsonRpcErrorCode } from '../../types/enums.js';
import type { JsonRpcError, RequestId } from '../../types/jsonrpc.js';
import type { Logger } from '../../utils/logger.js';

/**
 * True for the closed set of errors the server raises on purpose
 */
export function isKnownError(error: unknown): error is McpServerError {
  return error instanceof McpServerError;
}

/**
 * Group zod issues by dotted field path; `(root)` for the value itself
 */
export function zodFieldErrors(error: ZodError): Record<string, string[]> {
  const fieldErrors: Record<string, string[]> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    (fieldErrors[key] ??= []).push(issue.message);
  }
  return fieldErrors;
}

/**
 * Text for an arbitrary thrown value. `String()` throws for objects without a
 * usable `toString`, such as `Object.create(null)`.
 */
export function describeValue(value: unknown): string {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

function build(
  code: number,
  message: string,
  data: Record<string, unknown>,
  requestId: RequestId | undefined
): JsonRpcError {
  const merged = requestId === undefined ? data : { ...data, requestId };
  const entries = Object.entries(merged).filter(([, v]) => v !== undefined);
  return entries.length > 0
    ? { code, message, data: Object.fromEntries(entries) }
    : { code, message };
}

/**
 * Map any thrown value to a JSON-RPC error. Never includes a stack trace.
 */
export function toWireError(error: unknown, requestId?: RequestId): JsonRpcError {
  if (error instanceof ToolNotFoundError) {
    return build(JsonRpcErrorCode.NotFound, error.message, { tool: error.toolName }, requestId);
  }
  if (error instanceof ResourceNotFoundError) {
    return build(JsonRpcErrorCode.NotFound, error.message, { uri: error.uri }, requestId);
  }
  if (error instanceof PromptNotFoundError) {
    return build(
      JsonRpcErrorCode.NotFound,
      error.message,
      { promptId: error.promptId },
      requestId
    );
  }
  if (error instanceof MethodNotFoundError) {
    return build(
      JsonRpcErrorCode.MethodNotFound,
      error.message,
      { method: error.methodName },
      requestId
    );
  }
  if (error instanceof ValidationError) {
    return build(
      JsonRpcErrorCode.InvalidParams,
      error.message,
      { fieldErrors: error.fieldErrors },
      requestId
    );
  }
  if (error instanceof InvalidParamsError) {
    return build(
      JsonRpcErrorCode.InvalidParams,
      error.message,
      { missingFields: error.missingFields, invalidFields: error.invalidFields },
      requestId
    );
  }
  if (error instanceof ZodError) {
    return build(
      JsonRpcErrorCode.InvalidParams,
      'Invalid parameters',
      { fieldErrors: zodFieldErrors(error) },
      requestId
    );
  }
  if (error instanceof InvalidRequestError) {
    return build(JsonRpcErrorCode.InvalidRequest, error.message, {}, requestId);
  }
  if (error instanceof CancellationError) {
    return build(
      JsonRpcErrorCode.Canceled,
      error.message,
      { requestId: error.requestId },
      requestId
    );
  }
  if (error instanceof TimeoutError) {
    return build(
      JsonRpcErrorCode.Timeout,
      error.message,
      { timeout: error.timeoutMs / 1000, operation: error.operationName },
      requestId
    );
  }
  if (error instanceof ConcurrencyLimitError) {
    return build(
      JsonRpcErrorCode.PermissionDenied,
      error.message,
      { tool: error.toolName, current: error.current, limit: error.limit },
      requestId
    );
  }
  if (error instanceof PermissionDeniedError) {
    return build(
      JsonRpcErrorCode.PermissionDenied,
      error.message,
      { reason: error.reason },
      requestId
    );
  }
  if (error instanceof InternalServerError) {
    return build(JsonRpcErrorCode.InternalError, error.message, {}, requestId);
  }

  return build(
    JsonRpcErrorCode.InternalError,
    'Internal error',
    { error: error instanceof Error ? error.message : describeValue(error) },
    requestId
  );
}

/**
 * Known errors are expected outcomes and log at warn; anything else is a bug
 * and logs at error with its stack
 */
export function logCallError(
  logger: Logger,
  error: unknown,
  context: Record<string, unknown>
): void {
  if (isKnownError(error)) {
    logger.warn(error.message, { ...context, errorCode: error.code });
  } else if (error instanceof ZodError) {
    logger.warn('Handler rejected its parameters', {
      ...context,
      fieldErrors: zodFieldErrors(error),
    });
  } else if (error instanceof Error) {
    logger.error(error, context);
  } else {
    logger.error('Operation failed with a non-Error value', {
      ...context,
      error: describeValue(error),
    });
  }
}
